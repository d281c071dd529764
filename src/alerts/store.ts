/**
 * Alert Store
 *
 * The single in-memory collection behind the alert table: an ordered list of
 * ids for display order plus an id → alert map. Every operation is
 * synchronous, so on Node's event loop each one completes before any other
 * task observes the store.
 *
 * Values are frozen on the way in and copied on the way out; no caller ever
 * holds a reference that a later mutation could change underneath it.
 *
 * @module alerts/store
 */

import type { EventBus } from '../kernel/event-bus.js';
import { freezeAlert } from './normalizer.js';
import type { Alert } from './types.js';

export type AlertTransform = (current: Alert) => Alert;

export class AlertStore {
  private order: string[] = [];
  private alerts: Map<string, Alert> = new Map();
  private readonly eventBus: EventBus | undefined;

  constructor(eventBus?: EventBus) {
    this.eventBus = eventBus;
  }

  get size(): number {
    return this.order.length;
  }

  /**
   * Discard the current contents and install `alerts` in the given order.
   * A later duplicate id replaces the earlier value but keeps its position.
   */
  replace(alerts: readonly Alert[]): void {
    const order: string[] = [];
    const byId = new Map<string, Alert>();

    for (const alert of alerts) {
      if (!byId.has(alert.id)) {
        order.push(alert.id);
      }
      byId.set(alert.id, freezeAlert(alert));
    }

    this.order = order;
    this.alerts = byId;
    this.changed('replace');
  }

  /** Frozen copy of the alerts in display order. */
  snapshot(): readonly Alert[] {
    const result: Alert[] = [];
    for (const id of this.order) {
      const alert = this.alerts.get(id);
      if (alert) result.push(freezeAlert(alert));
    }
    return Object.freeze(result);
  }

  get(id: string): Alert | undefined {
    const alert = this.alerts.get(id);
    return alert ? freezeAlert(alert) : undefined;
  }

  has(id: string): boolean {
    return this.alerts.has(id);
  }

  /** Display index of `id`, or -1. */
  indexOf(id: string): number {
    return this.order.indexOf(id);
  }

  idAt(index: number): string | undefined {
    return this.order[index];
  }

  /**
   * Replace the alert at `id` with `transform(current)`, keeping its
   * position. The transform cannot change the identity. No-op if absent.
   */
  applyLocalMutation(id: string, transform: AlertTransform): boolean {
    const current = this.alerts.get(id);
    if (!current) return false;

    const next = transform(freezeAlert(current));
    this.alerts.set(id, freezeAlert({ ...next, id }));
    this.changed('mutate');
    return true;
  }

  remove(id: string): boolean {
    const index = this.order.indexOf(id);
    if (index === -1) return false;

    this.order.splice(index, 1);
    this.alerts.delete(id);
    this.changed('remove');
    return true;
  }

  /**
   * Write `alert` back as the value for its id. If the id is no longer in the
   * display order it is reinserted at `atIndex`, clamped to the current
   * bounds; otherwise it keeps its present position.
   */
  restore(alert: Alert, atIndex: number): void {
    if (!this.order.includes(alert.id)) {
      const insertAt = Math.min(Math.max(atIndex, 0), this.order.length);
      this.order.splice(insertAt, 0, alert.id);
    }
    this.alerts.set(alert.id, freezeAlert(alert));
    this.changed('restore');
  }

  private changed(reason: 'replace' | 'mutate' | 'remove' | 'restore'): void {
    this.eventBus?.emit('alerts:changed', { count: this.order.length, reason });
  }
}
