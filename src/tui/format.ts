/**
 * Display helpers for the terminal UI.
 */

export type StatusColor = 'green' | 'red' | 'yellow';

const ACKED_STATUSES = new Set(['acked', 'acknowledged']);

export function statusColor(status: string): StatusColor {
  const normalized = status.trim().toLowerCase();
  if (ACKED_STATUSES.has(normalized)) return 'green';
  if (normalized === 'open') return 'red';
  return 'yellow';
}

const URL_PATTERN = /(?<!\()(https?:\/\/[^\s<>)]+)/;
const RUNBOOK_MARKDOWN_PATTERN = /\[[^\]]*runbook[^\]]*\]\((https?:\/\/[^)\s]+)\)/i;
const RUNBOOK_PLAIN_PATTERN = /runbook\s*[:=-]?\s*(https?:\/\/[^\s<>)]+)/i;

function cleanUrl(url: string): string {
  return url.replace(/[.,;:]+$/, '');
}

/**
 * Runbook link in an alert description: a markdown link whose label mentions
 * "runbook", then a `runbook: <url>` label, then the first bare URL.
 */
export function extractRunbookUrl(text: string): string | null {
  for (const pattern of [RUNBOOK_MARKDOWN_PATTERN, RUNBOOK_PLAIN_PATTERN, URL_PATTERN]) {
    const url = pattern.exec(text)?.[1];
    if (url) return cleanUrl(url);
  }
  return null;
}

export function formatClock(date: Date): string {
  return date.toTimeString().slice(0, 8);
}
