/**
 * =============================================================================
 * NOTIFICATION MODULE - QUIET HOURS
 * =============================================================================
 *
 * Time-of-day windows in a configured timezone. A window whose start is
 * after its end wraps past midnight (23:00-07:00). Start is inclusive, end
 * exclusive; start == end is an empty window.
 * =============================================================================
 */

const TIME_OF_DAY = /^([01]?\d|2[0-3]):([0-5]\d)$/;

/**
 * "HH:mm" → minutes since midnight, or null when malformed
 */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_OF_DAY.exec(value.trim());
  if (!match) return null;
  return parseInt(match[1], 10) * 60 + parseInt(match[2], 10);
}

/**
 * Minutes since local midnight of `date` in `timeZone`
 */
export function localMinutes(date: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(date);

  const hour = parseInt(parts.find(p => p.type === 'hour')?.value ?? '0', 10);
  const minute = parseInt(parts.find(p => p.type === 'minute')?.value ?? '0', 10);
  return (hour % 24) * 60 + minute;
}

export function isWithinWindow(minutes: number, start: number, end: number): boolean {
  if (start === end) return false;
  if (start < end) return minutes >= start && minutes < end;
  return minutes >= start || minutes < end;
}

export interface QuietHoursSettings {
  quietHoursEnabled: boolean;
  quietHoursStart: string;
  quietHoursEnd: string;
}

export function isInQuietHours(settings: QuietHoursSettings, now: Date, timeZone: string): boolean {
  if (!settings.quietHoursEnabled) return false;

  const start = parseTimeOfDay(settings.quietHoursStart);
  const end = parseTimeOfDay(settings.quietHoursEnd);
  if (start === null || end === null) return false;

  return isWithinWindow(localMinutes(now, timeZone), start, end);
}
