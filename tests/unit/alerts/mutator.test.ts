import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InvalidResponseShapeError, TransportError } from '../../../src/alerts/errors.js';
import { OptimisticMutation, OptimisticMutator } from '../../../src/alerts/mutator.js';
import { AlertStore } from '../../../src/alerts/store.js';
import type { AlertTransport } from '../../../src/alerts/transport.js';
import type { Alert } from '../../../src/alerts/types.js';
import { EventBus } from '../../../src/kernel/event-bus.js';
import type { JsonObject } from '../../../src/types/index.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function makeAlert(id: string, overrides: Partial<Alert> = {}): Alert {
  return {
    id,
    priority: 'P2',
    status: 'open',
    message: `Alert ${id}`,
    description: `Alert ${id}`,
    createdAt: new Date('2026-10-19T10:00:00Z'),
    acknowledgedBy: '-',
    tags: ['prod'],
    ...overrides,
  };
}

function deferred() {
  let settle: { resolve: () => void; reject: (error: Error) => void } = {
    resolve: () => {},
    reject: () => {},
  };
  const promise = new Promise<void>((resolve, reject) => {
    settle = { resolve: () => resolve(), reject };
  });
  return {
    promise,
    resolve: () => settle.resolve(),
    reject: (error: Error) => settle.reject(error),
  };
}

function createTransport() {
  return {
    listAlerts: vi.fn<() => Promise<JsonObject>>().mockResolvedValue({ data: [] }),
    getAlert: vi.fn<(alertId: string) => Promise<JsonObject>>().mockResolvedValue({}),
    acknowledgeAlert: vi.fn<(alertId: string) => Promise<void>>().mockResolvedValue(undefined),
    closeAlert: vi.fn<(alertId: string) => Promise<void>>().mockResolvedValue(undefined),
  } satisfies AlertTransport;
}

// ─── OptimisticMutation ──────────────────────────────────────────────────────

describe('OptimisticMutation', () => {
  it('should move idle → pending → confirmed', () => {
    const mutation = new OptimisticMutation('acknowledge', 'a');
    mutation.begin(makeAlert('a'), 0);
    mutation.confirm();

    expect(mutation.state).toBe('confirmed');
  });

  it('should return the captured snapshot on rollback', () => {
    const alert = makeAlert('a');
    const mutation = new OptimisticMutation('close', 'a');
    mutation.begin(alert, 4);

    expect(mutation.rollBack()).toEqual({ alert, index: 4 });
    expect(mutation.state).toBe('rolled_back');
  });

  it('should reject transitions out of order', () => {
    const mutation = new OptimisticMutation('acknowledge', 'x');

    expect(() => mutation.confirm()).toThrow('Invalid mutation transition idle → confirmed for acknowledge on x');

    mutation.begin(makeAlert('x'), 0);
    mutation.confirm();
    expect(() => mutation.rollBack()).toThrow('Invalid mutation transition confirmed → rolled_back');
  });
});

// ─── OptimisticMutator ───────────────────────────────────────────────────────

describe('OptimisticMutator', () => {
  let eventBus: EventBus;
  let store: AlertStore;
  let transport: ReturnType<typeof createTransport>;
  let mutator: OptimisticMutator;

  beforeEach(() => {
    eventBus = new EventBus();
    store = new AlertStore(eventBus);
    transport = createTransport();
    mutator = new OptimisticMutator(store, transport, eventBus, { actor: 'me@example.com' });
    store.replace([makeAlert('a'), makeAlert('b'), makeAlert('c'), makeAlert('d')]);
  });

  describe('acknowledge()', () => {
    it('should apply the change locally before the API answers, then roll back on failure', async () => {
      const remote = deferred();
      transport.acknowledgeAlert.mockReturnValue(remote.promise);
      const before = store.get('c');

      const pending = mutator.acknowledge('c');

      expect(store.indexOf('c')).toBe(2);
      expect(store.get('c')?.status).toBe('acknowledged');
      expect(store.get('c')?.acknowledgedBy).toBe('me');
      expect(mutator.pendingActions().get('c')).toBe('acknowledge');

      remote.reject(new Error('POST /v1/alerts/c/acknowledge failed with 500: <hidden>'));
      const outcome = await pending;

      expect(outcome.status).toBe('rolled_back');
      expect(store.indexOf('c')).toBe(2);
      expect(store.get('c')).toEqual(before);
      expect(mutator.pendingActions().size).toBe(0);
    });

    it('should keep the optimistic value once confirmed', async () => {
      const confirmed = vi.fn();
      eventBus.on('mutation:confirmed', confirmed);

      const outcome = await mutator.acknowledge('a');

      expect(outcome).toEqual({ status: 'confirmed', action: 'acknowledge', alertId: 'a' });
      expect(store.get('a')?.status).toBe('acknowledged');
      expect(transport.acknowledgeAlert).toHaveBeenCalledWith('a');
      expect(confirmed).toHaveBeenCalledWith({ alertId: 'a', action: 'acknowledge' });
    });

    it('should leave the acknowledger untouched without an actor', async () => {
      const anonymous = new OptimisticMutator(store, transport, eventBus);
      store.replace([makeAlert('a', { acknowledgedBy: 'bot' })]);

      await anonymous.acknowledge('a');

      expect(store.get('a')?.acknowledgedBy).toBe('bot');
    });

    it('should emit the pending event with the captured index', () => {
      const pending = vi.fn();
      eventBus.on('mutation:pending', pending);

      void mutator.acknowledge('b');

      expect(pending).toHaveBeenCalledWith({ alertId: 'b', action: 'acknowledge', index: 1 });
    });
  });

  describe('close()', () => {
    it('should remove the alert, then reinsert it at its index on failure', async () => {
      const remote = deferred();
      transport.closeAlert.mockReturnValue(remote.promise);
      const before = store.get('b');
      const rolledBack = vi.fn();
      eventBus.on('mutation:rolled_back', rolledBack);

      const pending = mutator.close('b');

      expect(store.has('b')).toBe(false);
      expect(store.size).toBe(3);

      remote.reject(new Error('offline'));
      const outcome = await pending;

      expect(outcome.status).toBe('rolled_back');
      expect(store.snapshot().map((alert) => alert.id)).toEqual(['a', 'b', 'c', 'd']);
      expect(store.get('b')).toEqual(before);
      expect(rolledBack).toHaveBeenCalledWith({ alertId: 'b', action: 'close', error: 'offline' });
    });

    it('should keep the alert removed once confirmed', async () => {
      const outcome = await mutator.close('d');

      expect(outcome.status).toBe('confirmed');
      expect(store.has('d')).toBe(false);
    });
  });

  describe('preconditions', () => {
    it('should reject an unknown alert without calling the API', async () => {
      const outcome = await mutator.acknowledge('missing');

      expect(outcome.status).toBe('rejected');
      if (outcome.status === 'rejected') {
        expect(outcome.error.message).toBe('Select an alert first');
      }
      expect(transport.acknowledgeAlert).not.toHaveBeenCalled();
    });

    it('should reject a second action while one is pending on the same alert', async () => {
      const remote = deferred();
      transport.acknowledgeAlert.mockReturnValue(remote.promise);

      const first = mutator.acknowledge('a');
      const second = await mutator.close('a');

      expect(second.status).toBe('rejected');
      if (second.status === 'rejected') {
        expect(second.error.message).toBe('Alert a already has an action in progress');
      }
      expect(transport.closeAlert).not.toHaveBeenCalled();

      remote.resolve();
      await first;
      expect((await mutator.close('a')).status).toBe('confirmed');
    });
  });

  describe('overlayPending()', () => {
    it('should re-apply pending changes to a fetched batch', () => {
      const ack = deferred();
      const close = deferred();
      transport.acknowledgeAlert.mockReturnValue(ack.promise);
      transport.closeAlert.mockReturnValue(close.promise);
      void mutator.acknowledge('a');
      void mutator.close('b');

      const result = mutator.overlayPending([makeAlert('a'), makeAlert('b'), makeAlert('e')]);

      expect(result.map((alert) => [alert.id, alert.status])).toEqual([
        ['a', 'acknowledged'],
        ['e', 'open'],
      ]);
    });

    it('should pass the batch through with nothing pending', () => {
      const batch = [makeAlert('a')];

      expect(mutator.overlayPending(batch)).toEqual(batch);
    });
  });

  describe('view()', () => {
    it('should describe a wrapped alert', async () => {
      transport.getAlert.mockResolvedValue({
        data: { id: 'a', message: 'Disk full', description: 'See runbook', status: 'open', priority: 'p1' },
      });

      const result = await mutator.view('a');

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.title).toBe('Disk full');
        expect(result.data.description).toBe('See runbook');
        expect(result.data.priority).toBe('P1');
        expect(result.data.age).toBe('-');
      }
    });

    it('should fail on an unrecognised response shape', async () => {
      transport.getAlert.mockResolvedValue({ took: 0.2, requestId: 'r-1' });

      const result = await mutator.view('a');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidResponseShapeError);
        expect(result.error.message).toBe('Invalid alert response format');
      }
    });

    it('should wrap unexpected errors as transport errors', async () => {
      transport.getAlert.mockRejectedValue(new Error('boom'));

      const result = await mutator.view('a');

      if (!result.success) {
        expect(result.error).toBeInstanceOf(TransportError);
        expect(result.error.message).toBe('GET /v1/alerts/a failed: boom');
      } else {
        expect.unreachable('view should have failed');
      }
    });

    it('should pass transport errors through unchanged', async () => {
      const error = new TransportError('GET /v1/alerts/a failed with 404: <hidden>', 'GET', '/v1/alerts/a', 404);
      transport.getAlert.mockRejectedValue(error);

      const result = await mutator.view('a');

      expect(result).toEqual({ success: false, error });
    });

    it('should not touch the store', async () => {
      transport.getAlert.mockResolvedValue({ id: 'a', status: 'closed' });
      await mutator.view('a');

      expect(store.get('a')?.status).toBe('open');
    });
  });
});
