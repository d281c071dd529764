/**
 * Values computed on read from a canonical alert: age, tag summary, open
 * state, display order and the row/description read models.
 */

import { type Alert, type AlertDescription, type AlertRow, CLOSED_STATUSES } from './types.js';

const MINUTE_SECONDS = 60;
const HOUR_SECONDS = 60 * MINUTE_SECONDS;
const DAY_SECONDS = 24 * HOUR_SECONDS;

/** `Nd`, `Nh` or `Nm` for the largest nonzero unit; `-` without a timestamp. */
export function formatAge(createdAt: Date | null, now: Date = new Date()): string {
  if (createdAt === null) return '-';

  const totalSeconds = Math.max(Math.floor((now.getTime() - createdAt.getTime()) / 1000), 0);
  const days = Math.floor(totalSeconds / DAY_SECONDS);
  const hours = Math.floor((totalSeconds % DAY_SECONDS) / HOUR_SECONDS);
  const minutes = Math.floor((totalSeconds % HOUR_SECONDS) / MINUTE_SECONDS);

  if (days > 0) return `${days}d`;
  if (hours > 0) return `${hours}h`;
  return `${minutes}m`;
}

export function formatTags(tags: readonly string[]): string {
  return tags.length === 0 ? '-' : tags.join(', ');
}

export function isOpenStatus(status: string): boolean {
  return !CLOSED_STATUSES.has(status);
}

/** Admission rule for the store: an identity and an open status. */
export function isDisplayable(alert: Alert): boolean {
  return alert.id !== '' && isOpenStatus(alert.status);
}

/**
 * Newest first. Alerts without a timestamp sort as the earliest possible
 * value, so they end up last; ties keep their incoming order.
 */
export function sortByCreatedDesc(alerts: readonly Alert[]): Alert[] {
  const key = (alert: Alert): number =>
    alert.createdAt === null ? Number.NEGATIVE_INFINITY : alert.createdAt.getTime();
  return [...alerts].sort((a, b) => {
    const diff = key(b) - key(a);
    return Number.isNaN(diff) ? 0 : diff;
  });
}

export function toAlertRow(alert: Alert, now: Date = new Date()): AlertRow {
  return {
    id: alert.id,
    priority: alert.priority,
    status: alert.status,
    age: formatAge(alert.createdAt, now),
    acknowledgedBy: alert.acknowledgedBy,
    tagsDisplay: formatTags(alert.tags),
    message: alert.message,
  };
}

export function toAlertDescription(alert: Alert, now: Date = new Date()): AlertDescription {
  return {
    alertId: alert.id,
    title: alert.message,
    description: alert.description,
    status: alert.status,
    priority: alert.priority,
    age: formatAge(alert.createdAt, now),
    acknowledgedBy: alert.acknowledgedBy,
    tagsDisplay: formatTags(alert.tags),
  };
}
