import { describe, expect, it } from 'vitest';

import { LogFetcher } from '../src/fetcher';
import type { LogSource, RangeQuery } from '../src/supabase';
import { TtlCache } from '../src/ttlCache';

class FakeSource implements LogSource {
  rows: unknown[] = [];
  failWith?: Error;
  queries: RangeQuery[] = [];

  async queryRange(query: RangeQuery): Promise<unknown[]> {
    this.queries.push(query);
    if (this.failWith) throw this.failWith;
    return this.rows.slice(0, query.limit);
  }
}

function row(id: number, createdAt: string, level = 'INFO') {
  return { id, created_at: createdAt, task_name: `task-${id}`, level, message: 'm', run_source: 'local' };
}

function setup(ttlMs = 60_000, rowLimit = 1000) {
  let now = Date.parse('2025-03-10T12:00:00Z');
  const source = new FakeSource();
  const fetcher = new LogFetcher(source, { ttlMs, rowLimit, now: () => now });
  return {
    source,
    fetcher,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe('TtlCache', () => {
  it('expires entries once they reach the ttl', () => {
    let now = 0;
    const cache = new TtlCache<number, string>(1000, () => now);
    cache.set(7, 'rows');
    now = 999;
    expect(cache.get(7)).toBe('rows');
    now = 1000;
    expect(cache.get(7)).toBeUndefined();
    expect(cache.size()).toBe(0);
  });
});

describe('LogFetcher', () => {
  it('queries the trailing window with the row cap', async () => {
    const { source, fetcher } = setup(60_000, 500);
    await fetcher.fetch(7);
    expect(source.queries).toEqual([
      { from: new Date('2025-03-03T12:00:00Z'), to: new Date('2025-03-10T12:00:00Z'), limit: 500 },
    ]);
  });

  it('returns records newest first', async () => {
    const { source, fetcher } = setup();
    source.rows = [row(1, '2025-03-08T00:00:00Z'), row(2, '2025-03-09T00:00:00Z')];
    const result = await fetcher.fetch(7);
    expect(result.records.map((r) => r.id)).toEqual([2, 1]);
    expect(result.fromCache).toBe(false);
    expect(result.error).toBeUndefined();
  });

  it('serves the same rows within the ttl even if the store changed', async () => {
    const { source, fetcher, advance } = setup();
    source.rows = [row(1, '2025-03-08T00:00:00Z')];
    const first = await fetcher.fetch(7);
    source.rows = [row(1, '2025-03-08T00:00:00Z'), row(2, '2025-03-09T00:00:00Z', 'ERROR')];
    advance(59_999);
    const second = await fetcher.fetch(7);
    expect(second.fromCache).toBe(true);
    expect(second.records).toBe(first.records);
    expect(source.queries).toHaveLength(1);
  });

  it('re-queries after the ttl', async () => {
    const { source, fetcher, advance } = setup();
    source.rows = [row(1, '2025-03-08T00:00:00Z')];
    await fetcher.fetch(7);
    source.rows = [row(1, '2025-03-08T00:00:00Z'), row(2, '2025-03-09T00:00:00Z')];
    advance(60_000);
    const result = await fetcher.fetch(7);
    expect(result.fromCache).toBe(false);
    expect(result.records).toHaveLength(2);
  });

  it('keys the memo table by days', async () => {
    const { source, fetcher } = setup();
    await fetcher.fetch(7);
    await fetcher.fetch(3);
    await fetcher.fetch(7);
    expect(source.queries).toHaveLength(2);
  });

  it('drops the memoized result on invalidate', async () => {
    const { source, fetcher } = setup();
    await fetcher.fetch(7);
    await fetcher.fetch(3);
    fetcher.invalidate(7);
    await fetcher.fetch(7);
    await fetcher.fetch(3);
    expect(source.queries).toHaveLength(3);
    fetcher.invalidate();
    await fetcher.fetch(3);
    expect(source.queries).toHaveLength(4);
  });

  it('fails soft to an empty result and does not cache the failure', async () => {
    const { source, fetcher } = setup();
    source.failWith = new Error('JWT expired');
    const failed = await fetcher.fetch(7);
    expect(failed.records).toEqual([]);
    expect(failed.error).toBe('Failed to fetch data: JWT expired');

    source.failWith = undefined;
    source.rows = [row(1, '2025-03-08T00:00:00Z')];
    const recovered = await fetcher.fetch(7);
    expect(recovered.error).toBeUndefined();
    expect(recovered.records).toHaveLength(1);
    expect(source.queries).toHaveLength(2);
  });

  it('flags truncation and skipped rows', async () => {
    const { source, fetcher } = setup(60_000, 2);
    source.rows = [row(1, '2025-03-08T00:00:00Z'), { id: 2, created_at: 'garbage' }, row(3, '2025-03-09T00:00:00Z')];
    const result = await fetcher.fetch(7);
    expect(result.truncated).toBe(true);
    expect(result.skipped).toBe(1);
    expect(result.records.map((r) => r.id)).toEqual([1]);
  });
});
