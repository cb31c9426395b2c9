/**
 * Supabase Subscription Store
 *
 * Persists subscribed chat ids in the `sma_alert_subscribers` table
 * (see supabase/migrations). Query errors are logged and rethrown so the
 * command handler can tell the user something went wrong.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { SubscriptionStore } from './types.ts';

export const SUBSCRIBERS_TABLE = 'sma_alert_subscribers';

export class SupabaseSubscriptionStore implements SubscriptionStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly table: string = SUBSCRIBERS_TABLE
  ) {}

  async add(chatId: number): Promise<boolean> {
    const { data, error } = await this.supabase
      .from(this.table)
      .upsert({ chat_id: chatId }, { onConflict: 'chat_id', ignoreDuplicates: true })
      .select('chat_id');

    if (error) this.fail('add', error);
    return (data ?? []).length > 0;
  }

  async remove(chatId: number): Promise<boolean> {
    const { data, error } = await this.supabase
      .from(this.table)
      .delete()
      .eq('chat_id', chatId)
      .select('chat_id');

    if (error) this.fail('remove', error);
    return (data ?? []).length > 0;
  }

  async has(chatId: number): Promise<boolean> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select('chat_id')
      .eq('chat_id', chatId)
      .limit(1);

    if (error) this.fail('has', error);
    return (data ?? []).length > 0;
  }

  async list(): Promise<number[]> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select('chat_id');

    if (error) this.fail('list', error);
    return (data ?? []).map(row => Number(row.chat_id));
  }

  async clear(): Promise<void> {
    const { error } = await this.supabase
      .from(this.table)
      .delete()
      .neq('chat_id', 0);

    if (error) this.fail('clear', error);
  }

  private fail(operation: string, error: { message: string }): never {
    console.error(`[SupabaseSubscriptionStore] ${operation} failed:`, error.message);
    throw new Error(`Subscription ${operation} failed: ${error.message}`);
  }
}
