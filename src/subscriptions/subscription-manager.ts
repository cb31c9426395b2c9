/**
 * User Subscription Manager
 *
 * Validates chat ids and logs subscription changes on top of a
 * SubscriptionStore (in-memory or Supabase).
 */

import { InvalidArgumentError } from '../utils/errors.ts';
import type { SubscriptionStore } from './types.ts';

function assertChatId(chatId: number): void {
  if (!Number.isSafeInteger(chatId) || chatId === 0) {
    throw new InvalidArgumentError(`Invalid chat id: ${chatId}. Must be a non-zero integer.`);
  }
}

export class UserSubscriptionManager {
  constructor(private readonly store: SubscriptionStore) {}

  /** true if newly subscribed, false if already subscribed */
  async subscribeUser(chatId: number): Promise<boolean> {
    assertChatId(chatId);
    const added = await this.store.add(chatId);
    if (added) {
      console.log(`[Subscriptions] Chat ${chatId} subscribed`);
    }
    return added;
  }

  /** true if unsubscribed, false if it was not subscribed */
  async unsubscribeUser(chatId: number): Promise<boolean> {
    assertChatId(chatId);
    const removed = await this.store.remove(chatId);
    if (removed) {
      console.log(`[Subscriptions] Chat ${chatId} unsubscribed`);
    }
    return removed;
  }

  async isSubscribed(chatId: number): Promise<boolean> {
    assertChatId(chatId);
    return this.store.has(chatId);
  }

  async getAllSubscribers(): Promise<number[]> {
    return this.store.list();
  }

  async getSubscriberCount(): Promise<number> {
    return (await this.store.list()).length;
  }

  async clearSubscriptions(): Promise<void> {
    const count = await this.getSubscriberCount();
    if (count > 0) {
      console.warn(`[Subscriptions] Clearing ${count} subscriptions`);
    }
    await this.store.clear();
  }
}
