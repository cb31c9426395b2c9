import type { SubscriptionStore } from './types.ts';

/**
 * Process-local subscriber set, used when Supabase is not configured.
 * Subscriptions are lost on restart.
 */
export class InMemorySubscriptionStore implements SubscriptionStore {
  private subscribers = new Set<number>();

  async add(chatId: number): Promise<boolean> {
    if (this.subscribers.has(chatId)) return false;
    this.subscribers.add(chatId);
    return true;
  }

  async remove(chatId: number): Promise<boolean> {
    return this.subscribers.delete(chatId);
  }

  async has(chatId: number): Promise<boolean> {
    return this.subscribers.has(chatId);
  }

  async list(): Promise<number[]> {
    return Array.from(this.subscribers);
  }

  async clear(): Promise<void> {
    this.subscribers.clear();
  }
}
