/**
 * Canonical alert records and the read models handed to the presentation layer.
 *
 * @module alerts/types
 */

/**
 * Canonical alert, independent of the payload shape it was decoded from.
 * Produced only by the normalizer; the store hands out frozen copies.
 */
export interface Alert {
  readonly id: string;
  readonly priority: string;
  readonly status: string;
  readonly message: string;
  readonly description: string;
  readonly createdAt: Date | null;
  /** Never empty: `-` when nobody is known. */
  readonly acknowledgedBy: string;
  readonly tags: readonly string[];
}

/** One table row, with the derived columns already computed. */
export interface AlertRow {
  id: string;
  priority: string;
  status: string;
  age: string;
  acknowledgedBy: string;
  tagsDisplay: string;
  message: string;
}

export interface AlertDescription {
  alertId: string;
  title: string;
  description: string;
  status: string;
  priority: string;
  age: string;
  acknowledgedBy: string;
  tagsDisplay: string;
}

export type AlertAction = 'acknowledge' | 'close';

export const CLOSED_STATUSES: ReadonlySet<string> = new Set(['closed', 'resolved']);

/** Status written locally while an acknowledge is in flight. */
export const ACKNOWLEDGED_STATUS = 'acknowledged';
