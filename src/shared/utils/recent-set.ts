/**
 * Fixed-capacity set that forgets its oldest entries first.
 *
 * `markIfNew` is the only mutating call the pipeline needs: it checks and
 * inserts in one synchronous step, so two monitors racing on the same key
 * within one event-loop turn cannot both see it as new.
 */
export class RecentSet {
  private readonly entries = new Set<string>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`RecentSet capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * @returns true when the key was not present (and is now recorded)
   */
  markIfNew(key: string): boolean {
    if (this.entries.has(key)) return false;

    this.entries.add(key);
    while (this.entries.size > this.capacity) {
      // Set iterates in insertion order
      const oldest = this.entries.values().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return true;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
