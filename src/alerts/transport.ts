import type { JsonObject } from '../types/index.js';

/**
 * Remote operations the alert engine depends on. Every method rejects with a
 * `TransportError` on connectivity, HTTP status or decoding failures.
 */
export interface AlertTransport {
  /** Response envelope of the open-alert list endpoint (one page). */
  listAlerts(): Promise<JsonObject>;
  /** Response envelope of the alert detail endpoint. */
  getAlert(alertId: string): Promise<JsonObject>;
  acknowledgeAlert(alertId: string): Promise<void>;
  closeAlert(alertId: string): Promise<void>;
}
