import { z } from 'zod';
import { JsonObject, JsonValue, LogRecord } from './types';

const DURATION_KEYS = ['duration_seconds', 'duration', 'execution_time', 'elapsed_seconds'];

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);

const nullableText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? '' : String(v)));

const rowSchema = z.object({
  id: z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]),
  timestamp: z.string().nullish(),
  created_at: z.string().nullish(),
  task_name: nullableText,
  level: nullableText,
  message: nullableText,
  run_source: nullableText,
  details: jsonValue.nullish(),
  metadata: jsonValue.nullish(),
});

export class RowParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RowParseError';
  }
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Payloads sometimes arrive as serialized JSON text. */
function normalizeDetails(raw: JsonValue | null | undefined): JsonObject | undefined {
  if (raw === null || raw === undefined) return undefined;
  if (typeof raw === 'string') {
    try {
      const parsed = jsonValue.safeParse(JSON.parse(raw));
      return parsed.success && isJsonObject(parsed.data) ? parsed.data : undefined;
    } catch {
      return undefined;
    }
  }
  return isJsonObject(raw) ? raw : undefined;
}

export function extractDuration(details: JsonObject | undefined): number | undefined {
  if (!details) return undefined;
  for (const key of DURATION_KEYS) {
    const value = details[key];
    if (value === undefined || value === null) continue;
    const num = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
    if (Number.isFinite(num) && num >= 0) return num;
  }
  return undefined;
}

export function parseRow(raw: unknown): LogRecord {
  const parsed = rowSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RowParseError(`invalid row: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`);
  }
  const row = parsed.data;
  const rawTs = row.timestamp ?? row.created_at;
  const ts = rawTs ? Date.parse(rawTs) : NaN;
  if (isNaN(ts)) {
    throw new RowParseError(`invalid row ${row.id}: missing or unparseable timestamp`);
  }
  const details = normalizeDetails(row.details);
  return {
    id: row.id,
    timestamp: new Date(ts).toISOString(),
    ts,
    taskName: row.task_name.trim() || 'unknown',
    level: row.level.trim().toUpperCase(),
    message: row.message,
    runSource: row.run_source.trim() || 'unknown',
    details,
    durationSeconds: extractDuration(details),
    metadata: row.metadata ?? undefined,
  };
}

/** Parses every row, dropping the ones that cannot be read. */
export function parseRows(rows: unknown[]): { records: LogRecord[]; skipped: RowParseError[] } {
  const records: LogRecord[] = [];
  const skipped: RowParseError[] = [];
  for (const raw of rows) {
    try {
      records.push(parseRow(raw));
    } catch (e) {
      if (!(e instanceof RowParseError)) throw e;
      skipped.push(e);
    }
  }
  return { records, skipped };
}
