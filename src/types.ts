export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface LogRecord {
  id: number;
  timestamp: string; // ISO-8601
  ts: number; // epoch millis
  taskName: string;
  level: string;
  message: string;
  runSource: string;
  details?: JsonObject;
  durationSeconds?: number;
  metadata?: JsonValue;
}

export interface LogFilters {
  taskName?: string;
  level?: string;
  runSource?: string;
}

export interface FetchResult {
  records: LogRecord[];
  fetchedAt: number;
  fromCache: boolean;
  skipped: number;
  truncated: boolean;
  error?: string;
}

export interface Summary {
  total: number;
  success: number;
  failure: number;
  successRate: number; // 0..1
  distinctScripts: number;
}

export interface DailyBucket {
  date: string; // YYYY-MM-DD (UTC)
  count: number;
  success: number;
  failure: number;
}

export interface ScriptStats {
  taskName: string;
  total: number;
  success: number;
  failure: number;
  successRate: number;
}

export interface SourceCount {
  source: string;
  count: number;
}

export interface ScriptSourceRow {
  taskName: string;
  total: number;
  counts: Record<string, number>;
}

export interface RunSourceBreakdown {
  sources: SourceCount[];
  byScript: ScriptSourceRow[];
}

export interface ErrorEntry {
  id: number;
  taskName: string;
  timestamp: string;
  level: string;
  message: string;
}

export interface ErrorRank {
  taskName: string;
  count: number;
}

export interface DurationStats {
  taskName: string;
  count: number;
  mean: number;
  max: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  values: number[];
}

export interface LevelCount {
  level: string;
  count: number;
}

export interface LatestRun {
  taskName: string;
  status: string; // 'success' or the failing level
  message?: string;
  runSource: string;
  timestamp: string;
}

export interface AlertSummary {
  errorCount: number;
  failedScripts: string[];
}

export interface FilterOptions {
  tasks: string[];
  levels: string[];
  sources: string[];
}
