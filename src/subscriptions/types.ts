/**
 * Subscriber storage contract. Chat ids are Telegram chat ids
 * (negative for groups).
 */
export interface SubscriptionStore {
  /** true if the chat was added, false if it was already present */
  add(chatId: number): Promise<boolean>;
  /** true if the chat was removed, false if it was not present */
  remove(chatId: number): Promise<boolean>;
  has(chatId: number): Promise<boolean>;
  list(): Promise<number[]>;
  clear(): Promise<void>;
}
