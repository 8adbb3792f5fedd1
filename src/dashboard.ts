import type { LogFetcher } from './fetcher';
import {
  alertSummary,
  applyFilters,
  dailyTrend,
  durationStats,
  errorRanking,
  filterOptions,
  latestRuns,
  levelDistribution,
  recentErrors,
  runSourceBreakdown,
  scriptStats,
  summarize,
} from './stats';
import {
  AlertSummary,
  DailyBucket,
  DurationStats,
  ErrorEntry,
  ErrorRank,
  FetchResult,
  FilterOptions,
  LatestRun,
  LevelCount,
  LogFilters,
  LogRecord,
  RunSourceBreakdown,
  ScriptStats,
  Summary,
} from './types';

export interface DashboardQuery {
  days: number;
  filters: LogFilters;
}

export interface DashboardView {
  generatedAt: string;
  days: number;
  filters: LogFilters;
  options: FilterOptions;
  fetch: {
    fetchedAt: string;
    fromCache: boolean;
    rowLimit: number;
    truncated: boolean;
    skipped: number;
    error?: string;
  };
  empty: boolean;
  summary: Summary;
  alerts: AlertSummary;
  latestRuns: LatestRun[];
  scripts: ScriptStats[];
  daily: DailyBucket[];
  levels: LevelCount[];
  runSources: RunSourceBreakdown;
  recentErrors: ErrorEntry[];
  errorRanking: ErrorRank[];
  performance: DurationStats[];
}

/** Derives every aggregate from an already fetched record set. */
export function buildDashboard(
  result: FetchResult,
  query: DashboardQuery,
  rowLimit: number,
  now: number = Date.now()
): DashboardView {
  const records: LogRecord[] = applyFilters(result.records, query.filters);
  return {
    generatedAt: new Date(now).toISOString(),
    days: query.days,
    filters: query.filters,
    options: filterOptions(result.records),
    fetch: {
      fetchedAt: new Date(result.fetchedAt).toISOString(),
      fromCache: result.fromCache,
      rowLimit,
      truncated: result.truncated,
      skipped: result.skipped,
      error: result.error,
    },
    empty: records.length === 0,
    summary: summarize(records),
    alerts: alertSummary(records),
    latestRuns: latestRuns(records),
    scripts: scriptStats(records),
    daily: dailyTrend(records),
    levels: levelDistribution(records),
    runSources: runSourceBreakdown(records),
    recentErrors: recentErrors(records),
    errorRanking: errorRanking(records),
    performance: durationStats(records),
  };
}

/**
 * Handles control changes: a new lookback window goes through the fetcher
 * (served from its memo table while fresh), filter changes only re-derive
 * aggregates, and refresh drops the memoized rows for the window.
 */
export class DashboardService {
  constructor(private fetcher: LogFetcher, private now: () => number = Date.now) {}

  async load(query: DashboardQuery): Promise<DashboardView> {
    const result = await this.fetcher.fetch(query.days);
    return buildDashboard(result, query, this.fetcher.rowLimit, this.now());
  }

  async records(query: DashboardQuery): Promise<{ result: FetchResult; records: LogRecord[] }> {
    const result = await this.fetcher.fetch(query.days);
    return { result, records: applyFilters(result.records, query.filters) };
  }

  refresh(days: number): void {
    this.fetcher.invalidate(days);
  }
}
