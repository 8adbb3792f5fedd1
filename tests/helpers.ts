import type { LogRecord } from '../src/types';

let nextId = 1;

export function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  const timestamp = overrides.timestamp ?? '2025-03-01T10:00:00.000Z';
  return {
    id: nextId++,
    taskName: 'nightly-sync',
    level: 'INFO',
    message: 'done',
    runSource: 'local',
    ...overrides,
    timestamp,
    ts: Date.parse(timestamp),
  };
}
