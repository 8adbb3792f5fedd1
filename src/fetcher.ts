import { createLogger } from './logger';
import { parseRows } from './parser';
import type { LogSource } from './supabase';
import { TtlCache } from './ttlCache';
import { FetchResult } from './types';
import { errorMessage } from './errors';

const log = createLogger('fetcher');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface LogFetcherOptions {
  ttlMs: number;
  rowLimit: number;
  now?: () => number;
}

/**
 * Loads the trailing `days` of log rows. Successful results are memoized per
 * `days` for ttlMs; a cached hit returns the very same record array even if
 * the table changed meanwhile. Failures are reported, never cached, never retried.
 */
export class LogFetcher {
  private cache: TtlCache<number, FetchResult>;
  private now: () => number;
  readonly rowLimit: number;

  constructor(private source: LogSource, options: LogFetcherOptions) {
    this.now = options.now ?? Date.now;
    this.rowLimit = options.rowLimit;
    this.cache = new TtlCache(options.ttlMs, this.now);
  }

  async fetch(days: number): Promise<FetchResult> {
    const cached = this.cache.get(days);
    if (cached) {
      return { ...cached, fromCache: true };
    }

    const nowTs = this.now();
    const from = new Date(nowTs - days * DAY_MS);
    const to = new Date(nowTs);
    let rows: unknown[];
    try {
      rows = await this.source.queryRange({ from, to, limit: this.rowLimit });
    } catch (e) {
      log.error({ err: e, days }, 'failed to fetch task logs');
      return {
        records: [],
        fetchedAt: nowTs,
        fromCache: false,
        skipped: 0,
        truncated: false,
        error: `Failed to fetch data: ${errorMessage(e)}`,
      };
    }

    const { records, skipped } = parseRows(rows);
    if (skipped.length > 0) {
      log.warn({ skipped: skipped.length, first: skipped[0].message }, 'skipped unreadable log rows');
    }
    records.sort((a, b) => b.ts - a.ts || b.id - a.id);
    const result: FetchResult = {
      records,
      fetchedAt: nowTs,
      fromCache: false,
      skipped: skipped.length,
      truncated: rows.length >= this.rowLimit,
    };
    log.debug({ days, rows: rows.length, records: records.length }, 'fetched task logs');
    this.cache.set(days, result);
    return result;
  }

  /** Drops the memoized result for one window, or for all windows. */
  invalidate(days?: number): void {
    if (days === undefined) {
      this.cache.clear();
      return;
    }
    this.cache.delete(days);
  }
}
