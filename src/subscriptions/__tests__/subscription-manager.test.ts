/**
 * Tests for UserSubscriptionManager and its stores
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createClient } from '@supabase/supabase-js';
import { UserSubscriptionManager } from '../subscription-manager.ts';
import { InMemorySubscriptionStore } from '../memory-store.ts';
import { SupabaseSubscriptionStore, SUBSCRIBERS_TABLE } from '../supabase-store.ts';
import { InvalidArgumentError } from '../../utils/errors.ts';

describe('UserSubscriptionManager', () => {
  let manager: UserSubscriptionManager;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    manager = new UserSubscriptionManager(new InMemorySubscriptionStore());
  });

  it('subscribes a new chat once', async () => {
    await expect(manager.subscribeUser(123)).resolves.toBe(true);
    await expect(manager.subscribeUser(123)).resolves.toBe(false);
    await expect(manager.isSubscribed(123)).resolves.toBe(true);
    await expect(manager.getSubscriberCount()).resolves.toBe(1);
  });

  it('unsubscribes only subscribed chats', async () => {
    await manager.subscribeUser(123);

    await expect(manager.unsubscribeUser(123)).resolves.toBe(true);
    await expect(manager.unsubscribeUser(123)).resolves.toBe(false);
    await expect(manager.isSubscribed(123)).resolves.toBe(false);
  });

  it('accepts group chat ids', async () => {
    await expect(manager.subscribeUser(-1001234567890)).resolves.toBe(true);
    await expect(manager.getAllSubscribers()).resolves.toEqual([-1001234567890]);
  });

  it.each([0, 1.5, Number.NaN, Number.MAX_SAFE_INTEGER + 1])('rejects chat id %s', async chatId => {
    await expect(manager.subscribeUser(chatId)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(manager.unsubscribeUser(chatId)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(manager.isSubscribed(chatId)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('reports the validation message', async () => {
    await expect(manager.subscribeUser(0)).rejects.toThrow('Invalid chat id: 0. Must be a non-zero integer.');
  });

  it('lists subscribers in subscription order', async () => {
    await manager.subscribeUser(3);
    await manager.subscribeUser(1);
    await manager.subscribeUser(2);

    await expect(manager.getAllSubscribers()).resolves.toEqual([3, 1, 2]);
  });

  it('clears all subscriptions', async () => {
    await manager.subscribeUser(1);
    await manager.subscribeUser(2);

    await manager.clearSubscriptions();

    await expect(manager.getSubscriberCount()).resolves.toBe(0);
  });
});

/**
 * Minimal in-process PostgREST stand-in for the subscribers table:
 * understands the filters and verbs the store issues.
 */
function createFakePostgrest() {
  const rows = new Set<number>();
  let failNext: string | null = null;

  const json = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

  const matches = (url: URL) => {
    const filter = url.searchParams.get('chat_id');
    if (!filter) return Array.from(rows);
    const [op, raw] = filter.split('.');
    const value = Number(raw);
    return Array.from(rows).filter(id => (op === 'eq' ? id === value : id !== value));
  };

  const fetchFn = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    if (!url.pathname.endsWith(`/rest/v1/${SUBSCRIBERS_TABLE}`)) {
      return json({ message: `unexpected path ${url.pathname}` }, 404);
    }
    if (failNext) {
      const message = failNext;
      failNext = null;
      return json({ message, code: 'XX000', details: null, hint: null }, 500);
    }

    const method = init?.method ?? 'GET';
    if (method === 'POST') {
      const body: unknown = JSON.parse(String(init?.body));
      const incoming: unknown[] = Array.isArray(body) ? body : [body];
      const inserted: { chat_id: number }[] = [];
      for (const row of incoming) {
        if (typeof row !== 'object' || row === null || !('chat_id' in row)) continue;
        const chatId = Number(row.chat_id);
        if (!rows.has(chatId)) {
          rows.add(chatId);
          inserted.push({ chat_id: chatId });
        }
      }
      return json(inserted, 201);
    }
    if (method === 'DELETE') {
      const removed = matches(url);
      for (const id of removed) rows.delete(id);
      return json(removed.map(id => ({ chat_id: id })));
    }

    const limit = Number(url.searchParams.get('limit') ?? Infinity);
    return json(matches(url).slice(0, limit).map(id => ({ chat_id: id })));
  };

  return {
    rows,
    fetchFn,
    failWith(message: string) {
      failNext = message;
    },
  };
}

describe('SupabaseSubscriptionStore', () => {
  let fake: ReturnType<typeof createFakePostgrest>;
  let store: SupabaseSubscriptionStore;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    fake = createFakePostgrest();
    const supabase = createClient('http://localhost:54321', 'test-service-key', {
      auth: { persistSession: false, autoRefreshToken: false },
      global: { fetch: fake.fetchFn },
    });
    store = new SupabaseSubscriptionStore(supabase);
  });

  it('adds a chat once', async () => {
    await expect(store.add(42)).resolves.toBe(true);
    await expect(store.add(42)).resolves.toBe(false);
    expect(Array.from(fake.rows)).toEqual([42]);
  });

  it('checks membership', async () => {
    await store.add(42);

    await expect(store.has(42)).resolves.toBe(true);
    await expect(store.has(7)).resolves.toBe(false);
  });

  it('removes a chat', async () => {
    await store.add(42);

    await expect(store.remove(42)).resolves.toBe(true);
    await expect(store.remove(42)).resolves.toBe(false);
  });

  it('lists chat ids as numbers', async () => {
    await store.add(1);
    await store.add(-100200);

    await expect(store.list()).resolves.toEqual([1, -100200]);
  });

  it('clears every row', async () => {
    await store.add(1);
    await store.add(2);

    await store.clear();

    expect(fake.rows.size).toBe(0);
  });

  it('turns query errors into exceptions', async () => {
    fake.failWith('relation does not exist');

    await expect(store.list()).rejects.toThrow('Subscription list failed: relation does not exist');
  });
});
