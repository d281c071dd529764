import { describe, it, expect, beforeEach } from 'vitest';
import { AlertStore } from '../../../src/alerts/store.js';
import type { Alert } from '../../../src/alerts/types.js';
import { EventBus } from '../../../src/kernel/event-bus.js';

function makeAlert(id: string, overrides: Partial<Alert> = {}): Alert {
  return {
    id,
    priority: 'P2',
    status: 'open',
    message: `Alert ${id}`,
    description: `Alert ${id}`,
    createdAt: new Date('2026-10-19T10:00:00Z'),
    acknowledgedBy: '-',
    tags: [],
    ...overrides,
  };
}

describe('AlertStore', () => {
  let eventBus: EventBus;
  let store: AlertStore;
  let reasons: string[];

  beforeEach(() => {
    eventBus = new EventBus();
    store = new AlertStore(eventBus);
    reasons = [];
    eventBus.on('alerts:changed', ({ reason }) => reasons.push(reason));
    store.replace([makeAlert('a'), makeAlert('b'), makeAlert('c')]);
  });

  describe('replace()', () => {
    it('should install alerts in the given order', () => {
      expect(store.snapshot().map((alert) => alert.id)).toEqual(['a', 'b', 'c']);
      expect(store.size).toBe(3);
    });

    it('should keep the first position and the last value for duplicate ids', () => {
      store.replace([
        makeAlert('x', { message: 'first' }),
        makeAlert('y'),
        makeAlert('x', { message: 'second' }),
      ]);

      expect(store.snapshot().map((alert) => alert.id)).toEqual(['x', 'y']);
      expect(store.get('x')?.message).toBe('second');
    });

    it('should discard previous contents', () => {
      store.replace([]);

      expect(store.size).toBe(0);
      expect(store.has('a')).toBe(false);
    });
  });

  describe('reads', () => {
    it('should hand out copies rather than stored references', () => {
      const first = store.get('a');
      const second = store.get('a');

      expect(first).toEqual(second);
      expect(first).not.toBe(second);
      expect(first?.createdAt).not.toBe(second?.createdAt);
    });

    it('should return frozen snapshots', () => {
      const snapshot = store.snapshot();

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot[0])).toBe(true);
    });

    it('should not see changes made after a snapshot was taken', () => {
      const before = store.snapshot();
      store.applyLocalMutation('a', (alert) => ({ ...alert, status: 'acknowledged' }));

      expect(before[0]?.status).toBe('open');
      expect(store.get('a')?.status).toBe('acknowledged');
    });

    it('should report positions', () => {
      expect(store.indexOf('c')).toBe(2);
      expect(store.indexOf('missing')).toBe(-1);
      expect(store.idAt(1)).toBe('b');
      expect(store.idAt(3)).toBeUndefined();
    });
  });

  describe('applyLocalMutation()', () => {
    it('should replace the value in place', () => {
      const changed = store.applyLocalMutation('b', (alert) => ({ ...alert, status: 'acknowledged' }));

      expect(changed).toBe(true);
      expect(store.indexOf('b')).toBe(1);
      expect(store.get('b')?.status).toBe('acknowledged');
    });

    it('should not let the transform change the id', () => {
      store.applyLocalMutation('b', (alert) => ({ ...alert, id: 'other', priority: 'P1' }));

      expect(store.get('b')?.priority).toBe('P1');
      expect(store.has('other')).toBe(false);
    });

    it('should do nothing for an unknown id', () => {
      expect(store.applyLocalMutation('zzz', (alert) => alert)).toBe(false);
      expect(reasons).toEqual(['replace']);
    });
  });

  describe('remove()', () => {
    it('should drop the alert from order and values', () => {
      expect(store.remove('b')).toBe(true);
      expect(store.snapshot().map((alert) => alert.id)).toEqual(['a', 'c']);
      expect(store.get('b')).toBeUndefined();
    });

    it('should return false for an unknown id', () => {
      expect(store.remove('zzz')).toBe(false);
    });
  });

  describe('restore()', () => {
    it('should reinsert a removed alert at its index', () => {
      const original = store.get('b');
      store.remove('b');
      if (original) store.restore(original, 1);

      expect(store.snapshot().map((alert) => alert.id)).toEqual(['a', 'b', 'c']);
      expect(store.get('b')).toEqual(original);
    });

    it('should clamp the index to the current bounds', () => {
      store.restore(makeAlert('z'), 10);
      store.restore(makeAlert('y'), -4);

      expect(store.snapshot().map((alert) => alert.id)).toEqual(['y', 'a', 'b', 'c', 'z']);
    });

    it('should overwrite the value of a present alert without moving it', () => {
      store.restore(makeAlert('c', { status: 'open', message: 'restored' }), 0);

      expect(store.indexOf('c')).toBe(2);
      expect(store.get('c')?.message).toBe('restored');
    });
  });

  it('should emit a change event for every modification', () => {
    store.applyLocalMutation('a', (alert) => alert);
    store.remove('a');
    store.restore(makeAlert('a'), 0);

    expect(reasons).toEqual(['replace', 'mutate', 'remove', 'restore']);
  });
});
