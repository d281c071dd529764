import type { AlertAction } from '../alerts/types.js';
import type { NotificationLevel } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from 'pino';

/**
 * EventMap interface defining event name to payload mappings.
 * The EventBus is the only coupling between the alert engine and the
 * presentation layer.
 */
export interface EventMap {
  // ── Store events ───────────────────────────────────────────────────────
  'alerts:changed': { count: number; reason: 'replace' | 'mutate' | 'remove' | 'restore' };
  'alerts:refreshed': { count: number; dropped: number; durationMs: number; timestamp: Date };
  'alerts:refresh_failed': { error: string; timestamp: Date };

  // ── Optimistic mutation events ─────────────────────────────────────────
  'mutation:pending': { alertId: string; action: AlertAction; index: number };
  'mutation:confirmed': { alertId: string; action: AlertAction };
  'mutation:rolled_back': { alertId: string; action: AlertAction; error: string };

  // ── User-facing notifications ──────────────────────────────────────────
  'notify': { level: NotificationLevel; message: string; timestamp: Date };

  // ── System events ──────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

/**
 * Typed pub/sub event system
 */
export class EventBus {
  private listeners: Map<string, Set<(payload: unknown) => void>> = new Map();
  private readonly log: Logger;

  constructor() {
    this.log = createLogger('event-bus');
  }

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }

    handlers.add(handler as (payload: unknown) => void);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler as (payload: unknown) => void);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event to all subscribers. A throwing handler is logged and
   * reported on `system:handler_error`; the remaining handlers still run.
   */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);

        this.log.error({ event: String(event), err: error }, 'Error in event handler');

        // Guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event: String(event),
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }
}
