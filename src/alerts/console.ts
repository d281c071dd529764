/**
 * JSM Alerts: Alert Console
 *
 * The façade the presentation layer talks to. Owns the store, the optimistic
 * mutator and the refresh cycle, and turns every outcome into a notification
 * on the event bus. Each trigger is its own task; the only place any of them
 * changes the store is a synchronous step inside the owning component.
 *
 * @module alerts/console
 */

import { EventBus } from '../kernel/event-bus.js';
import type { NotificationLevel } from '../types/index.js';
import { toAlertRow } from './derived.js';
import { type MutationOutcome, OptimisticMutator } from './mutator.js';
import { RefreshCycle } from './refresh-cycle.js';
import { AlertStore } from './store.js';
import type { AlertTransport } from './transport.js';
import type { Alert, AlertAction, AlertDescription, AlertRow } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ActionOutcome {
  ok: boolean;
  level: NotificationLevel;
  message: string;
}

export type DetailOutcome =
  | { ok: true; description: AlertDescription }
  | { ok: false; level: NotificationLevel; message: string };

export interface AlertConsoleOptions {
  refreshIntervalSeconds: number;
  actor?: string;
  eventBus?: EventBus;
}

const PAST_TENSE: Record<AlertAction, string> = {
  acknowledge: 'Acknowledged',
  close: 'Closed',
};

// ═══════════════════════════════════════════════════════════════════════════
// CONSOLE
// ═══════════════════════════════════════════════════════════════════════════

export class AlertConsole {
  readonly eventBus: EventBus;
  private readonly store: AlertStore;
  private readonly mutator: OptimisticMutator;
  private readonly refreshCycle: RefreshCycle;

  constructor(transport: AlertTransport, options: AlertConsoleOptions) {
    this.eventBus = options.eventBus ?? new EventBus();
    this.store = new AlertStore(this.eventBus);
    this.mutator = new OptimisticMutator(this.store, transport, this.eventBus, {
      actor: options.actor,
    });
    this.refreshCycle = new RefreshCycle(this.store, transport, this.eventBus, {
      intervalMs: options.refreshIntervalSeconds * 1000,
      reconcile: (alerts) => this.mutator.overlayPending(alerts),
    });

    // Background refreshes report only their failures
    this.eventBus.on('alerts:refresh_failed', ({ error }) => {
      this.notify('error', error);
    });
  }

  /** Load once, then keep refreshing on the configured interval. */
  async start(): Promise<ActionOutcome> {
    this.refreshCycle.start();
    const result = await this.refreshCycle.refresh();
    return result.ok
      ? { ok: true, level: 'info', message: `Open alerts: ${result.count}` }
      : { ok: false, level: 'error', message: result.error.message };
  }

  stop(): void {
    this.refreshCycle.stop();
  }

  // ─── Reads ────────────────────────────────────────────────────────────────

  currentView(now: Date = new Date()): AlertRow[] {
    return this.store.snapshot().map((alert) => toAlertRow(alert, now));
  }

  snapshot(): readonly Alert[] {
    return this.store.snapshot();
  }

  get openCount(): number {
    return this.store.size;
  }

  pendingActions(): ReadonlyMap<string, AlertAction> {
    return this.mutator.pendingActions();
  }

  /**
   * Resolve a table cursor position to an alert id. Reports a warning and
   * returns undefined when there is nothing to select.
   */
  selectAt(index: number): string | undefined {
    if (this.store.size === 0) {
      this.notify('warning', 'No alerts loaded');
      return undefined;
    }
    const alertId = index >= 0 ? this.store.idAt(index) : undefined;
    if (alertId === undefined) {
      this.notify('warning', 'Select an alert first');
    }
    return alertId;
  }

  // ─── Triggers ─────────────────────────────────────────────────────────────

  async triggerRefresh(): Promise<ActionOutcome> {
    const result = await this.refreshCycle.refresh();
    // Failures were already reported through alerts:refresh_failed
    if (!result.ok) {
      return { ok: false, level: 'error', message: result.error.message };
    }
    return this.notify('info', `Refreshed: ${result.count} open alerts`);
  }

  async triggerAcknowledge(alertId: string): Promise<ActionOutcome> {
    return this.report(await this.mutator.acknowledge(alertId));
  }

  async triggerClose(alertId: string): Promise<ActionOutcome> {
    return this.report(await this.mutator.close(alertId));
  }

  async requestDetail(alertId: string): Promise<DetailOutcome> {
    if (!alertId) {
      const outcome = this.notify('warning', 'Could not resolve selected alert');
      return { ok: false, level: outcome.level, message: outcome.message };
    }

    const result = await this.mutator.view(alertId);
    if (!result.success) {
      const outcome = this.notify('error', result.error.message);
      return { ok: false, level: outcome.level, message: outcome.message };
    }
    return { ok: true, description: result.data };
  }

  // ─── Notifications ────────────────────────────────────────────────────────

  private report(outcome: MutationOutcome): ActionOutcome {
    switch (outcome.status) {
      case 'confirmed':
        return this.notify('info', `${PAST_TENSE[outcome.action]} alert ${outcome.alertId}`);
      case 'rolled_back':
        return this.notify('error', outcome.error.message);
      case 'rejected':
        return this.notify('warning', outcome.error.message);
    }
  }

  private notify(level: NotificationLevel, message: string): ActionOutcome {
    this.eventBus.emit('notify', { level, message, timestamp: new Date() });
    return { ok: level === 'info', level, message };
  }
}
