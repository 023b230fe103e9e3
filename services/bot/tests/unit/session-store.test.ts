import { describe, it, expect, vi, afterEach } from 'vitest';
import { SessionStore } from '../../src/session/session-store.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SessionStore', () => {
  it('keeps one state per key', () => {
    const s = new SessionStore<string>();
    s.set('a', 'first');
    s.set('a', 'second');
    s.set('b', 'other');

    expect(s.get('a')).toBe('second');
    expect(s.size()).toBe(2);
    expect(s.clear('a')).toBe(true);
    expect(s.clear('a')).toBe(false);
    expect(s.get('a')).toBeUndefined();
  });

  it('runs tasks for one key in submission order', async () => {
    const s = new SessionStore<string>();
    const gate = deferred();
    const order: string[] = [];

    const first = s.runExclusive('chat', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = s.runExclusive('chat', async () => {
      order.push('second');
    });

    expect(s.pending()).toBe(1);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('does not hold other keys behind a slow one', async () => {
    const s = new SessionStore<string>();
    const gate = deferred();
    const order: string[] = [];

    const slow = s.runExclusive('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await s.runExclusive('b', async () => {
      order.push('b');
    });

    expect(order).toEqual(['b']);
    gate.resolve();
    await slow;
    expect(order).toEqual(['b', 'a']);
  });

  it('keeps the chain going after a failed task', async () => {
    const s = new SessionStore<string>();

    const failed = s.runExclusive('chat', () => Promise.reject(new Error('boom')));
    const next = s.runExclusive('chat', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('forgets a key once its queue drains', async () => {
    const s = new SessionStore<string>();
    await s.runExclusive('chat', async () => undefined);
    await new Promise((r) => setTimeout(r, 0));
    expect(s.pending()).toBe(0);
  });

  describe('ttl', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('reads an expired state as absent', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      const s = new SessionStore<string>({ ttlMs: 60_000 });
      s.set('chat', 'awaiting');

      vi.setSystemTime(new Date('2024-01-01T00:00:59Z'));
      expect(s.get('chat')).toBe('awaiting');

      vi.setSystemTime(new Date('2024-01-01T00:01:00Z'));
      expect(s.get('chat')).toBeUndefined();
    });

    it('sweeps expired entries on set', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      const s = new SessionStore<string>({ ttlMs: 60_000 });
      for (let i = 0; i < 50; i++) s.set(`chat-${i}`, 'awaiting');

      vi.setSystemTime(new Date('2024-01-08T00:00:00Z'));
      s.set('fresh', 'awaiting');

      expect(s.size()).toBe(1);
      expect(s.get('fresh')).toBe('awaiting');
    });

    it('keeps states indefinitely without a ttl', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
      const s = new SessionStore<string>();
      s.set('chat', 'awaiting');

      vi.setSystemTime(new Date('2025-01-01T00:00:00Z'));
      expect(s.get('chat')).toBe('awaiting');
    });
  });
});
