/**
 * Optimistic Mutator
 *
 * Applies acknowledge/close to the store before the API confirms them, then
 * keeps or reverts the change once the remote call settles.
 *
 * State Machine (one instance per triggered action):
 * IDLE → PENDING → CONFIRMED
 *           |
 *           +→ ROLLED_BACK (snapshot restored at its captured index)
 *
 * The rollback snapshot is a frozen copy taken before the local change, so
 * restoring it always yields the pre-action value.
 *
 * @module alerts/mutator
 */

import type { Logger } from 'pino';
import type { EventBus } from '../kernel/event-bus.js';
import { type Result, ok, err } from '../types/index.js';
import { createLogger, formatError } from '../utils/logger.js';
import { toAlertDescription } from './derived.js';
import {
  type AlertConsoleError,
  InvalidResponseShapeError,
  PreconditionError,
  TransportError,
} from './errors.js';
import { extractSingleAlert } from './extractor.js';
import { formatAcknowledgedBy, normalizeAlert } from './normalizer.js';
import type { AlertStore } from './store.js';
import type { AlertTransport } from './transport.js';
import {
  type Alert,
  type AlertAction,
  type AlertDescription,
  ACKNOWLEDGED_STATUS,
} from './types.js';

// ─── Lifecycle States ─────────────────────────────────────────────────────────

export type MutationState = 'idle' | 'pending' | 'confirmed' | 'rolled_back';

const VALID_TRANSITIONS: Record<MutationState, MutationState[]> = {
  idle:        ['pending'],
  pending:     ['confirmed', 'rolled_back'],
  confirmed:   [],  // Terminal state
  rolled_back: [],  // Terminal state
};

export class OptimisticMutation {
  private currentState: MutationState = 'idle';
  private captured: { alert: Alert; index: number } | null = null;

  constructor(
    readonly action: AlertAction,
    readonly alertId: string
  ) {}

  get state(): MutationState {
    return this.currentState;
  }

  /** The pre-action value and display index, once pending. */
  get snapshot(): { alert: Alert; index: number } | null {
    return this.captured;
  }

  begin(alert: Alert, index: number): void {
    this.transition('pending');
    this.captured = { alert, index };
  }

  confirm(): void {
    this.transition('confirmed');
  }

  rollBack(): { alert: Alert; index: number } {
    this.transition('rolled_back');
    if (this.captured === null) {
      throw new Error(`Mutation ${this.action} on ${this.alertId} has no snapshot`);
    }
    return this.captured;
  }

  private transition(to: MutationState): void {
    if (!VALID_TRANSITIONS[this.currentState].includes(to)) {
      throw new Error(
        `Invalid mutation transition ${this.currentState} → ${to} for ${this.action} on ${this.alertId}`
      );
    }
    this.currentState = to;
  }
}

// ─── Outcomes ─────────────────────────────────────────────────────────────────

export type MutationOutcome =
  | { status: 'confirmed'; action: AlertAction; alertId: string }
  | { status: 'rolled_back'; action: AlertAction; alertId: string; error: Error }
  | { status: 'rejected'; action: AlertAction; alertId: string; error: PreconditionError };

interface PendingEntry {
  action: AlertAction;
  /** Re-applies the optimistic change to a freshly fetched value; null drops it. */
  overlay: (alert: Alert) => Alert | null;
}

export interface OptimisticMutatorOptions {
  /** Identity shown as the acknowledger until the next refresh. */
  actor?: string;
}

// ─── Mutator ──────────────────────────────────────────────────────────────────

export class OptimisticMutator {
  private readonly pending = new Map<string, PendingEntry>();
  private readonly actor: string | undefined;
  private readonly log: Logger;

  constructor(
    private readonly store: AlertStore,
    private readonly transport: AlertTransport,
    private readonly eventBus: EventBus,
    options: OptimisticMutatorOptions = {}
  ) {
    this.actor = options.actor ? formatAcknowledgedBy(options.actor) : undefined;
    this.log = createLogger('optimistic-mutator');
  }

  /** Ids with an acknowledge or close still waiting for the API. */
  pendingActions(): ReadonlyMap<string, AlertAction> {
    return new Map([...this.pending].map(([id, entry]) => [id, entry.action]));
  }

  acknowledge(alertId: string): Promise<MutationOutcome> {
    const markAcknowledged = (alert: Alert): Alert => ({
      ...alert,
      status: ACKNOWLEDGED_STATUS,
      acknowledgedBy: this.actor ?? alert.acknowledgedBy,
    });

    return this.run('acknowledge', alertId, {
      applyLocal: () => this.store.applyLocalMutation(alertId, markAcknowledged),
      overlay: markAcknowledged,
      remote: () => this.transport.acknowledgeAlert(alertId),
    });
  }

  close(alertId: string): Promise<MutationOutcome> {
    return this.run('close', alertId, {
      applyLocal: () => this.store.remove(alertId),
      overlay: () => null,
      remote: () => this.transport.closeAlert(alertId),
    });
  }

  /**
   * Re-apply in-flight optimistic changes to a freshly fetched batch so a
   * refresh that lands before the API reflects them does not undo them.
   */
  overlayPending(alerts: readonly Alert[]): Alert[] {
    if (this.pending.size === 0) return [...alerts];

    const result: Alert[] = [];
    for (const alert of alerts) {
      const entry = this.pending.get(alert.id);
      const next = entry ? entry.overlay(alert) : alert;
      if (next !== null) result.push(next);
    }
    return result;
  }

  /**
   * Fetch the full detail of one alert. Never touches the store.
   */
  async view(alertId: string): Promise<Result<AlertDescription, AlertConsoleError>> {
    this.log.debug({ alertId }, 'Fetching alert details');
    try {
      const envelope = await this.transport.getAlert(alertId);
      const raw = extractSingleAlert(envelope);
      if (raw === null) {
        const keys = Object.keys(envelope).sort();
        this.log.error({ alertId, keys }, 'Invalid alert details response format');
        return err(new InvalidResponseShapeError(alertId, keys));
      }

      const normalized = normalizeAlert(raw);
      if (!normalized.success) {
        return err(normalized.error);
      }
      return ok(toAlertDescription(normalized.data));
    } catch (error) {
      this.log.error({ alertId, err: formatError(error) }, 'Failed to fetch alert details');
      return err(asTransportError(error, 'GET', `/v1/alerts/${alertId}`));
    }
  }

  private async run(
    action: AlertAction,
    alertId: string,
    steps: {
      applyLocal: () => void;
      overlay: PendingEntry['overlay'];
      remote: () => Promise<void>;
    }
  ): Promise<MutationOutcome> {
    const current = this.store.get(alertId);
    if (!current) {
      return { status: 'rejected', action, alertId, error: new PreconditionError('Select an alert first') };
    }
    if (this.pending.has(alertId)) {
      return {
        status: 'rejected',
        action,
        alertId,
        error: new PreconditionError(`Alert ${alertId} already has an action in progress`),
      };
    }

    const mutation = new OptimisticMutation(action, alertId);
    const index = this.store.indexOf(alertId);
    mutation.begin(current, index);
    this.pending.set(alertId, { action, overlay: steps.overlay });
    steps.applyLocal();
    this.eventBus.emit('mutation:pending', { alertId, action, index });

    this.log.info({ alertId, action }, 'Applying alert action');
    try {
      await steps.remote();
    } catch (error) {
      this.pending.delete(alertId);
      const { alert, index: restoreIndex } = mutation.rollBack();
      this.store.restore(alert, restoreIndex);

      const cause = error instanceof Error ? error : new Error(String(error));
      this.log.error({ alertId, action, err: formatError(error) }, 'Alert action failed, rolled back');
      this.eventBus.emit('mutation:rolled_back', { alertId, action, error: cause.message });
      return { status: 'rolled_back', action, alertId, error: cause };
    }

    this.pending.delete(alertId);
    mutation.confirm();
    this.eventBus.emit('mutation:confirmed', { alertId, action });
    return { status: 'confirmed', action, alertId };
  }
}

function asTransportError(error: unknown, method: string, path: string): AlertConsoleError {
  if (error instanceof TransportError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`${method} ${path} failed: ${message}`, method, path, undefined, { cause: error });
}
