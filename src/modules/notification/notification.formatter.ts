/**
 * =============================================================================
 * NOTIFICATION MODULE - FORMATTER
 * =============================================================================
 *
 * Renders the HTML body of a driver notification:
 *
 *   ⭐ [ADMIN] 🔊 Уфа - Казань
 *
 *   <original text>
 *
 *   • Маршрут до точки "А"
 *   ──────────────────
 *   Заказ выложил: @author
 *   Заказ выложен в группах:
 *   ➡️ Group one ✅
 *   ➡️ Group two
 *
 *   ✅ = наша группа
 * =============================================================================
 */

import { ADMIN_EXTRA_PREFIX } from '../../core/constants';
import type { MessageAuthor } from '../order-extractor/order.types';

export const DIVIDER = '──────────────────';
export const SERVICE_BADGE = '✅';

export interface GroupPosting {
  title: string;
  link: string;
  isService: boolean;
}

export interface NotificationView {
  pointA: string;
  pointB: string;
  text: string;
  favorite: boolean;
  adminExtra: boolean;
  author: MessageAuthor | null;
  groups: GroupPosting[];
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function anchor(href: string, label: string): string {
  return `<a href="${escapeHtml(href)}">${escapeHtml(label)}</a>`;
}

export function mapLink(place: string): string {
  return `https://yandex.ru/maps/?text=${encodeURIComponent(place)}`;
}

/**
 * Link to the author's profile, or null when nothing identifies them
 */
export function authorLink(author: MessageAuthor | null): string | null {
  if (!author) return null;
  if (author.username) {
    const username = author.username.replace(/^@/, '');
    return anchor(`https://t.me/${username}`, `@${username}`);
  }
  if (author.id) {
    return anchor(`tg://user?id=${author.id}`, author.firstName || 'Автор');
  }
  return author.firstName ? escapeHtml(author.firstName) : null;
}

function groupLine(group: GroupPosting): string {
  const badge = group.isService ? ` ${SERVICE_BADGE}` : '';
  return `${anchor(group.link, group.title)}${badge}`;
}

export function renderNotification(view: NotificationView): string {
  const star = view.favorite ? '⭐ ' : '';
  const admin = view.adminExtra ? ADMIN_EXTRA_PREFIX : '';
  const lines: string[] = [
    `${star}${admin}🔊 ${escapeHtml(view.pointA)} - ${escapeHtml(view.pointB)}`,
    '',
    escapeHtml(view.text.trim()),
    '',
    `• ${anchor(mapLink(view.pointA), 'Маршрут до точки "А"')}`,
    DIVIDER
  ];

  const author = authorLink(view.author);
  if (author) {
    lines.push(`Заказ выложил: ${author}`);
  }

  if (view.groups.length === 1) {
    lines.push(`Заказ выложен тут: ${groupLine(view.groups[0])}`);
  } else if (view.groups.length > 1) {
    lines.push('Заказ выложен в группах:');
    for (const group of view.groups) {
      lines.push(`➡️ ${groupLine(group)}`);
    }
  }

  if (view.groups.some(g => g.isService)) {
    lines.push('', `${SERVICE_BADGE} = наша группа`);
  }

  return lines.join('\n');
}
