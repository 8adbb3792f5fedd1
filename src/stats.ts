import {
  AlertSummary,
  DailyBucket,
  DurationStats,
  ErrorEntry,
  ErrorRank,
  FilterOptions,
  LatestRun,
  LevelCount,
  LogFilters,
  LogRecord,
  RunSourceBreakdown,
  ScriptSourceRow,
  ScriptStats,
  Summary,
} from './types';

export const SUCCESS_LEVEL = 'INFO';
export const FAILURE_LEVELS: ReadonlySet<string> = new Set(['ERROR', 'CRITICAL']);
export const KNOWN_LEVELS = ['INFO', 'ERROR', 'CRITICAL'];
export const KNOWN_SOURCES = ['local', 'github'];
export const RECENT_ERROR_LIMIT = 5;

const DAY_MS = 24 * 60 * 60 * 1000;

export function isSuccess(record: LogRecord): boolean {
  return record.level === SUCCESS_LEVEL;
}

export function isFailure(record: LogRecord): boolean {
  return FAILURE_LEVELS.has(record.level);
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function rate(part: number, total: number): number {
  return total > 0 ? part / total : 0;
}

function groupBy<K>(records: LogRecord[], key: (r: LogRecord) => K): Map<K, LogRecord[]> {
  const groups = new Map<K, LogRecord[]>();
  for (const record of records) {
    const k = key(record);
    const group = groups.get(k);
    if (group) group.push(record);
    else groups.set(k, [record]);
  }
  return groups;
}

/** Narrows records by exact-match predicates; unset filters match everything. */
export function applyFilters(records: LogRecord[], filters: LogFilters): LogRecord[] {
  const { taskName, level, runSource } = filters;
  if (!taskName && !level && !runSource) return records;
  return records.filter(
    (r) =>
      (!taskName || r.taskName === taskName) &&
      (!level || r.level === level) &&
      (!runSource || r.runSource === runSource)
  );
}

export function summarize(records: LogRecord[]): Summary {
  let success = 0;
  let failure = 0;
  const scripts = new Set<string>();
  for (const r of records) {
    if (isSuccess(r)) success++;
    else if (isFailure(r)) failure++;
    scripts.add(r.taskName);
  }
  return {
    total: records.length,
    success,
    failure,
    successRate: rate(success, records.length),
    distinctScripts: scripts.size,
  };
}

export function utcDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

/** One bucket per UTC date between the first and last observed day, gaps zero-filled. */
export function dailyTrend(records: LogRecord[]): DailyBucket[] {
  if (records.length === 0) return [];
  const buckets = new Map<string, DailyBucket>();
  let minTs = Infinity;
  let maxTs = -Infinity;
  for (const r of records) {
    const date = utcDate(r.ts);
    let bucket = buckets.get(date);
    if (!bucket) {
      bucket = { date, count: 0, success: 0, failure: 0 };
      buckets.set(date, bucket);
    }
    bucket.count++;
    if (isSuccess(r)) bucket.success++;
    else if (isFailure(r)) bucket.failure++;
    minTs = Math.min(minTs, r.ts);
    maxTs = Math.max(maxTs, r.ts);
  }
  const result: DailyBucket[] = [];
  const last = utcDate(maxTs);
  for (let day = Date.parse(utcDate(minTs)); ; day += DAY_MS) {
    const date = utcDate(day);
    result.push(buckets.get(date) ?? { date, count: 0, success: 0, failure: 0 });
    if (date >= last) break;
  }
  return result;
}

export function scriptStats(records: LogRecord[]): ScriptStats[] {
  const rows: ScriptStats[] = [];
  for (const [taskName, group] of groupBy(records, (r) => r.taskName)) {
    const { success, failure } = summarize(group);
    rows.push({ taskName, total: group.length, success, failure, successRate: rate(success, group.length) });
  }
  return rows.sort((a, b) => b.total - a.total || byName(a.taskName, b.taskName));
}

export function runSourceBreakdown(records: LogRecord[]): RunSourceBreakdown {
  const sources = Array.from(groupBy(records, (r) => r.runSource), ([source, group]) => ({
    source,
    count: group.length,
  })).sort((a, b) => b.count - a.count || byName(a.source, b.source));

  const byScript: ScriptSourceRow[] = [];
  for (const [taskName, group] of groupBy(records, (r) => r.taskName)) {
    const counts: Record<string, number> = {};
    for (const r of group) counts[r.runSource] = (counts[r.runSource] ?? 0) + 1;
    byScript.push({ taskName, total: group.length, counts });
  }
  byScript.sort((a, b) => b.total - a.total || byName(a.taskName, b.taskName));
  return { sources, byScript };
}

export function recentErrors(records: LogRecord[], limit = RECENT_ERROR_LIMIT): ErrorEntry[] {
  return records
    .filter(isFailure)
    .sort((a, b) => b.ts - a.ts || b.id - a.id)
    .slice(0, limit)
    .map((r) => ({ id: r.id, taskName: r.taskName, timestamp: r.timestamp, level: r.level, message: r.message }));
}

/** Error counts per script; ties are broken by script name. */
export function errorRanking(records: LogRecord[]): ErrorRank[] {
  return Array.from(groupBy(records.filter(isFailure), (r) => r.taskName), ([taskName, group]) => ({
    taskName,
    count: group.length,
  })).sort((a, b) => b.count - a.count || byName(a.taskName, b.taskName));
}

/** Linear interpolation between closest ranks; `sorted` must be ascending and non-empty. */
export function quantile(sorted: number[], q: number): number {
  const pos = (sorted.length - 1) * q;
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (pos - lower);
}

export function durationStats(records: LogRecord[]): DurationStats[] {
  const timed = records.filter((r) => r.durationSeconds !== undefined);
  const rows: DurationStats[] = [];
  for (const [taskName, group] of groupBy(timed, (r) => r.taskName)) {
    const values = group.map((r) => r.durationSeconds ?? 0);
    const sorted = [...values].sort((a, b) => a - b);
    const sum = values.reduce((acc, v) => acc + v, 0);
    rows.push({
      taskName,
      count: values.length,
      mean: sum / values.length,
      max: sorted[sorted.length - 1],
      min: sorted[0],
      q1: quantile(sorted, 0.25),
      median: quantile(sorted, 0.5),
      q3: quantile(sorted, 0.75),
      values,
    });
  }
  return rows.sort((a, b) => b.mean - a.mean || byName(a.taskName, b.taskName));
}

export function levelDistribution(records: LogRecord[]): LevelCount[] {
  return Array.from(groupBy(records, (r) => r.level), ([level, group]) => ({ level, count: group.length })).sort(
    (a, b) => b.count - a.count || byName(a.level, b.level)
  );
}

/** Most recent record of every script, newest first. */
export function latestRuns(records: LogRecord[]): LatestRun[] {
  const latest = new Map<string, LogRecord>();
  for (const r of records) {
    const current = latest.get(r.taskName);
    if (!current || r.ts > current.ts || (r.ts === current.ts && r.id > current.id)) {
      latest.set(r.taskName, r);
    }
  }
  return Array.from(latest.values())
    .sort((a, b) => b.ts - a.ts || b.id - a.id)
    .map((r) => ({
      taskName: r.taskName,
      status: isSuccess(r) ? 'success' : r.level,
      message: isFailure(r) ? r.message : undefined,
      runSource: r.runSource,
      timestamp: r.timestamp,
    }));
}

export function alertSummary(records: LogRecord[]): AlertSummary {
  const failures = records.filter(isFailure).sort((a, b) => b.ts - a.ts || b.id - a.id);
  const failedScripts: string[] = [];
  for (const r of failures) {
    if (!failedScripts.includes(r.taskName)) failedScripts.push(r.taskName);
  }
  return { errorCount: failures.length, failedScripts };
}

export function filterOptions(records: LogRecord[]): FilterOptions {
  const tasks = new Set<string>();
  const levels = new Set<string>(KNOWN_LEVELS);
  const sources = new Set<string>(KNOWN_SOURCES);
  for (const r of records) {
    tasks.add(r.taskName);
    levels.add(r.level);
    sources.add(r.runSource);
  }
  return {
    tasks: Array.from(tasks).sort(byName),
    levels: Array.from(levels).sort(byName),
    sources: Array.from(sources).sort(byName),
  };
}
