/**
 * Read-only access to the hosted log table through the Supabase client.
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { WebSocket } from 'ws';
import type { ConnectionSettings } from './config';
import { QueryError } from './errors';

export interface RangeQuery {
  from: Date;
  to: Date;
  limit: number;
}

/** Anything that can return raw log rows for a time range, newest first. */
export interface LogSource {
  queryRange(query: RangeQuery): Promise<unknown[]>;
}

export function createSupabaseClient(
  settings: ConnectionSettings,
  fetchImpl?: typeof fetch
): SupabaseClient {
  return createClient(settings.url, settings.key, {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    global: fetchImpl ? { fetch: fetchImpl } : undefined,
    // Node 20 has no global WebSocket; the client insists on a transport at construction.
    realtime: { transport: WebSocket },
  });
}

export class SupabaseLogSource implements LogSource {
  constructor(private client: SupabaseClient, private settings: ConnectionSettings) {}

  async queryRange({ from, to, limit }: RangeQuery): Promise<unknown[]> {
    const column = this.settings.timestampColumn;
    const { data, error } = await this.client
      .from(this.settings.table)
      .select('*')
      .gte(column, from.toISOString())
      .lte(column, to.toISOString())
      .order(column, { ascending: false })
      .limit(limit);
    if (error) {
      throw new QueryError(error.message, error.code);
    }
    return data ?? [];
  }
}
