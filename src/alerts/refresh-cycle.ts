/**
 * REFRESH CYCLE - Periodic open-alert reload
 *
 * Fetches one page of alerts, normalizes and filters it, orders it newest
 * first and swaps it into the store in one step. Runs on a fixed interval and
 * on request; a request made while a fetch is outstanding joins that fetch.
 * A failed refresh leaves the store exactly as it was.
 */

import type { Logger } from 'pino';
import type { EventBus } from '../kernel/event-bus.js';
import { truncateText } from '../utils/format.js';
import { createLogger, formatError } from '../utils/logger.js';
import { formatAge, formatTags, isDisplayable, sortByCreatedDesc } from './derived.js';
import { extractAlertList } from './extractor.js';
import { normalizeAlert } from './normalizer.js';
import type { AlertStore } from './store.js';
import type { AlertTransport } from './transport.js';
import type { Alert } from './types.js';

export type RefreshOutcome =
  | { ok: true; count: number; dropped: number }
  | { ok: false; error: Error };

export interface RefreshCycleOptions {
  intervalMs: number;
  /** Adjusts the sorted batch before it replaces the store contents. */
  reconcile?: (alerts: readonly Alert[]) => Alert[];
}

export class RefreshCycle {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<RefreshOutcome> | null = null;
  private readonly intervalMs: number;
  private readonly reconcile: (alerts: readonly Alert[]) => Alert[];
  private readonly log: Logger;

  constructor(
    private readonly store: AlertStore,
    private readonly transport: AlertTransport,
    private readonly eventBus: EventBus,
    options: RefreshCycleOptions
  ) {
    this.intervalMs = options.intervalMs;
    this.reconcile = options.reconcile ?? ((alerts) => [...alerts]);
    this.log = createLogger('refresh-cycle');
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  start(): void {
    if (this.timer !== null) return;

    this.timer = setInterval(() => {
      void this.refresh();
    }, this.intervalMs);
    this.log.info({ intervalMs: this.intervalMs }, 'Auto-refresh enabled');
  }

  stop(): void {
    if (this.timer === null) return;

    clearInterval(this.timer);
    this.timer = null;
    this.log.info('Auto-refresh stopped');
  }

  /**
   * Run one refresh, or join the one already in flight. Never rejects.
   */
  refresh(): Promise<RefreshOutcome> {
    if (this.inFlight !== null) {
      this.log.debug('Refresh already in flight, coalescing');
      return this.inFlight;
    }

    this.inFlight = this.execute().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async execute(): Promise<RefreshOutcome> {
    const startTime = Date.now();
    this.log.debug('Refreshing open alerts');

    let candidates: Alert[];
    let dropped = 0;
    try {
      const envelope = await this.transport.listAlerts();
      candidates = [];
      for (const raw of extractAlertList(envelope)) {
        const normalized = normalizeAlert(raw);
        if (!normalized.success) {
          dropped++;
          continue;
        }
        this.logAlert(normalized.data);
        if (isDisplayable(normalized.data)) {
          candidates.push(normalized.data);
        } else {
          dropped++;
        }
      }
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.log.error({ err: formatError(error) }, 'Failed to refresh open alerts');
      this.eventBus.emit('alerts:refresh_failed', { error: cause.message, timestamp: new Date() });
      return { ok: false, error: cause };
    }

    const alerts = this.reconcile(sortByCreatedDesc(candidates));
    this.store.replace(alerts);

    const durationMs = Date.now() - startTime;
    this.log.info({ count: alerts.length, dropped, durationMs }, 'Refresh completed');
    this.eventBus.emit('alerts:refreshed', {
      count: alerts.length,
      dropped,
      durationMs,
      timestamp: new Date(),
    });
    return { ok: true, count: alerts.length, dropped };
  }

  private logAlert(alert: Alert): void {
    this.log.debug(
      {
        id: alert.id,
        priority: alert.priority,
        status: alert.status,
        age: formatAge(alert.createdAt),
        ackedBy: alert.acknowledgedBy,
        tags: formatTags(alert.tags),
        message: truncateText(alert.message, 250),
      },
      'Alert details',
    );
  }
}
