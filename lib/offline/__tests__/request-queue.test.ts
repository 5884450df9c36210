import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import type { OfflineRequest } from '@/types';

import { developmentConfig } from '../config';
import { InvalidRequestError, QueueFullError } from '../errors';
import { silentLogger } from '../logger';
import { MemoryKeyValueStore } from '../memory-store';
import { RequestQueue, compareRequests, shouldRetry, type RequestQueueConfig } from '../request-queue';

const T0 = 1_700_000_000_000;

function createQueue(overrides: Partial<RequestQueueConfig> = {}) {
  const store = new MemoryKeyValueStore<OfflineRequest>();
  const config = developmentConfig({ maxRetries: 3, maxQueueSize: 10, ...overrides });
  const queue = new RequestQueue(store, config, { logger: silentLogger });
  return { store, queue };
}

describe('RequestQueue', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('enqueue', () => {
    it('returns a one-element list after enqueueing r1', async () => {
      const { queue } = createQueue();

      await queue.enqueue({ id: 'r1', method: 'POST', url: '/posts', priority: 'high' });
      const ordered = await queue.dequeueOrdered();

      expect(ordered).toHaveLength(1);
      expect(ordered[0]).toEqual({
        id: 'r1',
        method: 'POST',
        url: '/posts',
        createdAt: T0,
        sequence: 0,
        priority: 'high',
        retryCount: 0,
      });
    });

    it('fills in id, createdAt and a normal priority', async () => {
      const { queue } = createQueue();

      const request = await queue.enqueue({ method: 'PUT', url: '/items/1', body: { qty: 2 } });

      expect(request.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(request.createdAt).toBe(T0);
      expect(request.priority).toBe('normal');
      expect(request.body).toEqual({ qty: 2 });
    });

    it('persists before resolving', async () => {
      const { queue, store } = createQueue();

      const request = await queue.enqueue({ method: 'DELETE', url: '/items/9' });

      expect(await store.get(request.id)).toEqual(request);
    });

    it('rejects with QueueFullError at maxQueueSize', async () => {
      const { queue } = createQueue({ maxQueueSize: 2 });
      await queue.enqueue({ method: 'POST', url: '/a' });
      await queue.enqueue({ method: 'POST', url: '/b' });

      const error = await queue.enqueue({ method: 'POST', url: '/c' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(QueueFullError);
      if (!(error instanceof QueueFullError)) return;
      expect(error.maxQueueSize).toBe(2);
      expect(await queue.size()).toBe(2);
    });

    it('admits only maxQueueSize requests under concurrent enqueue', async () => {
      const { queue } = createQueue({ maxQueueSize: 3 });

      const outcomes = await Promise.allSettled(
        ['/a', '/b', '/c', '/d', '/e'].map((url) => queue.enqueue({ method: 'POST', url }))
      );

      expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(3);
      expect(await queue.size()).toBe(3);
    });

    it('rejects a malformed draft with the offending fields', async () => {
      const { queue } = createQueue();

      const error = await queue.enqueue({ method: 'POST', url: '' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidRequestError);
      if (!(error instanceof InvalidRequestError)) return;
      expect(error.details).toEqual({ issues: [{ field: 'url', message: 'Must not be empty' }] });
    });

    it('rejects a duplicate id', async () => {
      const { queue } = createQueue();
      await queue.enqueue({ id: 'dup', method: 'POST', url: '/a' });

      await expect(queue.enqueue({ id: 'dup', method: 'POST', url: '/b' })).rejects.toBeInstanceOf(
        InvalidRequestError
      );
    });
  });

  describe('dequeueOrdered', () => {
    it('hands out snapshots that do not write through to the queue', async () => {
      const { queue } = createQueue({ queuePersistence: false });
      await queue.enqueue({ id: 'r1', method: 'PUT', url: '/posts/1', body: { title: 'a' } });

      const [snapshot] = await queue.dequeueOrdered();
      if (!snapshot) throw new Error('expected a queued request');
      snapshot.retryCount = 99;
      snapshot.body = { title: 'edited' };
      const fetched = await queue.get('r1');
      if (!fetched) throw new Error('expected a queued request');
      fetched.priority = 'low';

      expect(await queue.get('r1')).toMatchObject({ retryCount: 0, priority: 'normal', body: { title: 'a' } });
    });

    it('orders by priority, then FIFO', async () => {
      const { queue } = createQueue();

      await queue.enqueue({ id: 'R1', method: 'POST', url: '/1', priority: 'low' });
      await queue.enqueue({ id: 'R2', method: 'POST', url: '/2', priority: 'high' });
      await queue.enqueue({ id: 'R3', method: 'POST', url: '/3', priority: 'normal' });

      expect((await queue.dequeueOrdered()).map((r) => r.id)).toEqual(['R2', 'R3', 'R1']);
    });

    it('keeps insertion order for requests created in the same millisecond', async () => {
      const { queue } = createQueue();

      for (const id of ['a', 'b', 'c']) {
        await queue.enqueue({ id, method: 'POST', url: `/${id}` });
      }

      expect((await queue.dequeueOrdered()).map((r) => r.id)).toEqual(['a', 'b', 'c']);
    });

    it('keeps the original createdAt position after a failure', async () => {
      const { queue } = createQueue();
      await queue.enqueue({ id: 'first', method: 'POST', url: '/1' });
      vi.setSystemTime(T0 + 10);
      await queue.enqueue({ id: 'second', method: 'POST', url: '/2' });
      vi.setSystemTime(T0 + 20);

      await queue.markFailed('first', 'timeout');

      expect((await queue.dequeueOrdered()).map((r) => r.id)).toEqual(['first', 'second']);
    });

    it('does not mutate the queue', async () => {
      const { queue } = createQueue();
      await queue.enqueue({ method: 'POST', url: '/1' });

      await queue.dequeueOrdered();
      await queue.dequeueOrdered();

      expect(await queue.size()).toBe(1);
    });
  });

  describe('markFailed', () => {
    it('removes the request on the failure that reaches maxRetries', async () => {
      const { queue } = createQueue({ maxRetries: 3 });
      await queue.enqueue({ id: 'r', method: 'POST', url: '/r' });

      const first = await queue.markFailed('r', 'boom 1');
      expect(first?.exhausted).toBe(false);
      expect((await queue.get('r'))?.retryCount).toBe(1);

      const second = await queue.markFailed('r', 'boom 2');
      expect(second?.exhausted).toBe(false);
      expect(await queue.get('r')).toMatchObject({ retryCount: 2, lastError: 'boom 2' });

      const third = await queue.markFailed('r', 'boom 3');
      expect(third).toMatchObject({ exhausted: true, request: { id: 'r', retryCount: 3, lastError: 'boom 3' } });
      expect(await queue.get('r')).toBeUndefined();
    });

    it('stores nextRetryAt and lastAttemptAt', async () => {
      const { queue } = createQueue();
      await queue.enqueue({ id: 'r', method: 'POST', url: '/r' });
      vi.setSystemTime(T0 + 100);

      await queue.markFailed('r', 'boom', { nextRetryAt: T0 + 2100 });

      expect(await queue.get('r')).toMatchObject({ lastAttemptAt: T0 + 100, nextRetryAt: T0 + 2100 });
    });

    it('removes at once on a terminal failure', async () => {
      const { queue } = createQueue({ maxRetries: 5 });
      await queue.enqueue({ id: 'r', method: 'POST', url: '/r' });

      const result = await queue.markFailed('r', 'forbidden', { terminal: true });

      expect(result?.exhausted).toBe(true);
      expect(await queue.size()).toBe(0);
    });

    it('returns null for an unknown id', async () => {
      const { queue } = createQueue();

      expect(await queue.markFailed('nope', 'boom')).toBeNull();
    });
  });

  describe('removal', () => {
    it('treats a second markSucceeded or remove as a no-op', async () => {
      const { queue } = createQueue();
      const listener = vi.fn();
      await queue.enqueue({ id: 'a', method: 'POST', url: '/a' });
      await queue.enqueue({ id: 'b', method: 'POST', url: '/b' });
      queue.subscribe(listener);

      await queue.markSucceeded('a');
      await queue.markSucceeded('a');
      await queue.remove('b');
      await queue.remove('b');

      expect(await queue.size()).toBe(0);
      expect(listener.mock.calls).toEqual([[1], [0]]);
    });

    it('clears everything', async () => {
      const { queue } = createQueue();
      await queue.enqueue({ method: 'POST', url: '/a' });
      await queue.enqueue({ method: 'POST', url: '/b' });

      await queue.clear();

      expect(await queue.dequeueOrdered()).toEqual([]);
    });
  });

  describe('update and markAttempt', () => {
    it('patches a queued request', async () => {
      const { queue } = createQueue();
      await queue.enqueue({ id: 'r', method: 'PATCH', url: '/r', body: { v: 1 } });

      const updated = await queue.update('r', { body: { v: 2 }, force: true });

      expect(updated).toMatchObject({ id: 'r', body: { v: 2 }, force: true, retryCount: 0 });
      expect(await queue.update('missing', { force: true })).toBeUndefined();
    });

    it('stamps lastAttemptAt', async () => {
      const { queue } = createQueue();
      await queue.enqueue({ id: 'r', method: 'POST', url: '/r' });
      vi.setSystemTime(T0 + 42);

      expect((await queue.markAttempt('r'))?.lastAttemptAt).toBe(T0 + 42);
    });
  });

  describe('persistence', () => {
    it('restores requests and continues the sequence after a restart', async () => {
      const store = new MemoryKeyValueStore<OfflineRequest>();
      const config = developmentConfig();
      const before = new RequestQueue(store, config, { logger: silentLogger });
      await before.enqueue({ id: 'a', method: 'POST', url: '/a' });
      await before.enqueue({ id: 'b', method: 'POST', url: '/b' });

      const after = new RequestQueue(store, config, { logger: silentLogger });
      const restored = await after.load();
      const next = await after.enqueue({ id: 'c', method: 'POST', url: '/c' });

      expect(restored.map((r) => r.id)).toEqual(['a', 'b']);
      expect(next.sequence).toBe(2);
      expect((await after.dequeueOrdered()).map((r) => r.id)).toEqual(['a', 'b', 'c']);
    });

    it('drops unreadable records on load', async () => {
      const store = new MemoryKeyValueStore<OfflineRequest>();
      const valid: OfflineRequest = {
        id: 'ok',
        method: 'POST',
        url: '/ok',
        createdAt: T0,
        sequence: 0,
        priority: 'normal',
        retryCount: 0,
      };
      await store.put('ok', valid);
      await store.put('broken', { ...valid, id: 'broken', url: '' });

      const queue = new RequestQueue(store, developmentConfig(), { logger: silentLogger });

      expect((await queue.load()).map((r) => r.id)).toEqual(['ok']);
      expect(await store.keys()).toEqual(['ok']);
    });

    it('keeps requests in memory only when queuePersistence is off', async () => {
      const { queue, store } = createQueue({ queuePersistence: false });

      await queue.enqueue({ id: 'r', method: 'POST', url: '/r' });

      expect(await queue.size()).toBe(1);
      expect(store.size).toBe(0);
    });
  });

  describe('subscribe', () => {
    it('emits the size after each change until unsubscribed', async () => {
      const { queue } = createQueue();
      const sizes: number[] = [];
      const unsubscribe = queue.subscribe((size) => sizes.push(size));

      await queue.enqueue({ id: 'a', method: 'POST', url: '/a' });
      await queue.enqueue({ id: 'b', method: 'POST', url: '/b' });
      await queue.markFailed('a', 'boom');
      unsubscribe();
      await queue.clear();

      expect(sizes).toEqual([1, 2, 2]);
    });
  });
});

describe('queue helpers', () => {
  const request = (overrides: Partial<OfflineRequest>): OfflineRequest => ({
    id: 'x',
    method: 'POST',
    url: '/x',
    createdAt: 0,
    sequence: 0,
    priority: 'normal',
    retryCount: 0,
    ...overrides,
  });

  it('shouldRetry compares retryCount with maxRetries', () => {
    expect(shouldRetry(request({ retryCount: 2 }), 3)).toBe(true);
    expect(shouldRetry(request({ retryCount: 3 }), 3)).toBe(false);
    expect(shouldRetry(request({ retryCount: 0 }), 0)).toBe(false);
  });

  it('compareRequests falls back to sequence', () => {
    const a = request({ id: 'a', createdAt: 5, sequence: 7 });
    const b = request({ id: 'b', createdAt: 5, sequence: 3 });

    expect([a, b].sort(compareRequests).map((r) => r.id)).toEqual(['b', 'a']);
  });
});
