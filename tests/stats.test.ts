import { describe, expect, it } from 'vitest';

import {
  alertSummary,
  applyFilters,
  dailyTrend,
  durationStats,
  errorRanking,
  filterOptions,
  latestRuns,
  levelDistribution,
  quantile,
  recentErrors,
  runSourceBreakdown,
  scriptStats,
  summarize,
} from '../src/stats';
import type { LogRecord } from '../src/types';
import { makeRecord } from './helpers';

const t1 = '2025-03-01T08:00:00.000Z';
const t2 = '2025-03-01T09:00:00.000Z';
const t3 = '2025-03-01T10:00:00.000Z';

function sample(): LogRecord[] {
  return [
    makeRecord({ taskName: 'A', level: 'INFO', timestamp: t1 }),
    makeRecord({ taskName: 'B', level: 'ERROR', timestamp: t2, message: 'B broke' }),
    makeRecord({ taskName: 'A', level: 'ERROR', timestamp: t3, message: 'A broke' }),
  ];
}

describe('summarize', () => {
  it('counts the A/B example', () => {
    expect(summarize(sample())).toEqual({
      total: 3,
      success: 1,
      failure: 2,
      successRate: 1 / 3,
      distinctScripts: 2,
    });
  });

  it('returns zeros for no records', () => {
    expect(summarize([])).toEqual({ total: 0, success: 0, failure: 0, successRate: 0, distinctScripts: 0 });
  });

  it('does not count unknown levels as success or failure', () => {
    const records = [
      makeRecord({ level: 'INFO' }),
      makeRecord({ level: 'WARNING' }),
      makeRecord({ level: 'CRITICAL' }),
    ];
    const s = summarize(records);
    expect(s.success + s.failure).toBe(2);
    expect(s.total).toBe(3);
    expect(s.successRate).toBeGreaterThanOrEqual(0);
    expect(s.successRate).toBeLessThanOrEqual(1);
  });
});

describe('scriptStats', () => {
  it('computes per-script counts ordered by total', () => {
    expect(scriptStats(sample())).toEqual([
      { taskName: 'A', total: 2, success: 1, failure: 1, successRate: 0.5 },
      { taskName: 'B', total: 1, success: 0, failure: 1, successRate: 0 },
    ]);
  });

  it('partitions the overall total', () => {
    const records = [
      ...sample(),
      makeRecord({ taskName: 'C', level: 'CRITICAL' }),
      makeRecord({ taskName: 'C', level: 'DEBUG' }),
    ];
    const sum = scriptStats(records).reduce((acc, row) => acc + row.total, 0);
    expect(sum).toBe(summarize(records).total);
  });

  it('breaks ties by script name', () => {
    const records = [makeRecord({ taskName: 'zeta' }), makeRecord({ taskName: 'alpha' })];
    expect(scriptStats(records).map((s) => s.taskName)).toEqual(['alpha', 'zeta']);
  });
});

describe('errorRanking', () => {
  it('ranks tied scripts by name', () => {
    expect(errorRanking(sample())).toEqual([
      { taskName: 'A', count: 1 },
      { taskName: 'B', count: 1 },
    ]);
  });

  it('puts the script with most errors first', () => {
    const records = [
      makeRecord({ taskName: 'A', level: 'ERROR' }),
      makeRecord({ taskName: 'B', level: 'ERROR' }),
      makeRecord({ taskName: 'B', level: 'CRITICAL' }),
    ];
    expect(errorRanking(records)[0]).toEqual({ taskName: 'B', count: 2 });
  });
});

describe('dailyTrend', () => {
  it('creates one bucket per observed date', () => {
    const records = [
      makeRecord({ timestamp: '2025-03-01T01:00:00.000Z' }),
      makeRecord({ timestamp: '2025-03-01T22:00:00.000Z', level: 'ERROR' }),
      makeRecord({ timestamp: '2025-03-02T03:00:00.000Z' }),
    ];
    expect(dailyTrend(records)).toEqual([
      { date: '2025-03-01', count: 2, success: 1, failure: 1 },
      { date: '2025-03-02', count: 1, success: 1, failure: 0 },
    ]);
  });

  it('zero-fills gaps between observed dates', () => {
    const records = [
      makeRecord({ timestamp: '2025-03-04T12:00:00.000Z' }),
      makeRecord({ timestamp: '2025-03-01T12:00:00.000Z' }),
    ];
    expect(dailyTrend(records).map((d) => [d.date, d.count])).toEqual([
      ['2025-03-01', 1],
      ['2025-03-02', 0],
      ['2025-03-03', 0],
      ['2025-03-04', 1],
    ]);
  });

  it('is empty for no records', () => {
    expect(dailyTrend([])).toEqual([]);
  });
});

describe('recentErrors', () => {
  it('returns at most five, newest first', () => {
    const records = Array.from({ length: 8 }, (_, i) =>
      makeRecord({ level: i % 2 ? 'ERROR' : 'CRITICAL', timestamp: `2025-03-0${i + 1}T00:00:00.000Z`, message: `e${i}` })
    );
    records.push(makeRecord({ level: 'INFO', timestamp: '2025-03-09T00:00:00.000Z' }));
    const errors = recentErrors(records);
    expect(errors).toHaveLength(5);
    expect(errors.map((e) => e.message)).toEqual(['e7', 'e6', 'e5', 'e4', 'e3']);
  });

  it('does not reorder the input', () => {
    const records = sample();
    const before = records.map((r) => r.id);
    recentErrors(records);
    expect(records.map((r) => r.id)).toEqual(before);
  });
});

describe('runSourceBreakdown', () => {
  it('counts sources overall and per script', () => {
    const records = [
      makeRecord({ taskName: 'A', runSource: 'github' }),
      makeRecord({ taskName: 'A', runSource: 'local' }),
      makeRecord({ taskName: 'A', runSource: 'github' }),
      makeRecord({ taskName: 'B', runSource: 'local' }),
    ];
    expect(runSourceBreakdown(records)).toEqual({
      sources: [
        { source: 'github', count: 2 },
        { source: 'local', count: 2 },
      ],
      byScript: [
        { taskName: 'A', total: 3, counts: { github: 2, local: 1 } },
        { taskName: 'B', total: 1, counts: { local: 1 } },
      ],
    });
  });
});

describe('durationStats', () => {
  it('summarizes durations per script and skips untimed records', () => {
    const records = [
      makeRecord({ taskName: 'fast', durationSeconds: 1 }),
      makeRecord({ taskName: 'fast', durationSeconds: 3 }),
      makeRecord({ taskName: 'slow', durationSeconds: 4 }),
      makeRecord({ taskName: 'slow', durationSeconds: 2 }),
      makeRecord({ taskName: 'slow', durationSeconds: 1 }),
      makeRecord({ taskName: 'slow', durationSeconds: 3 }),
      makeRecord({ taskName: 'untimed' }),
    ];
    const [slow, fast] = durationStats(records);
    expect(slow).toEqual({
      taskName: 'slow',
      count: 4,
      mean: 2.5,
      max: 4,
      min: 1,
      q1: 1.75,
      median: 2.5,
      q3: 3.25,
      values: [4, 2, 1, 3],
    });
    expect(fast.mean).toBe(2);
    expect(durationStats(records)).toHaveLength(2);
  });

  it('interpolates quantiles', () => {
    expect(quantile([10], 0.5)).toBe(10);
    expect(quantile([1, 2, 3], 0.5)).toBe(2);
  });
});

describe('applyFilters', () => {
  const records = [
    makeRecord({ taskName: 'A', level: 'INFO', runSource: 'local' }),
    makeRecord({ taskName: 'A', level: 'ERROR', runSource: 'github' }),
    makeRecord({ taskName: 'B', level: 'ERROR', runSource: 'github' }),
  ];

  it('matches everything when unset', () => {
    expect(applyFilters(records, {})).toHaveLength(3);
  });

  it('combines predicates with AND', () => {
    const out = applyFilters(records, { taskName: 'A', level: 'ERROR', runSource: 'github' });
    expect(out).toEqual([records[1]]);
  });

  it('yields empty aggregates when nothing matches', () => {
    const none = applyFilters(records, { taskName: 'missing' });
    expect(none).toEqual([]);
    expect(summarize(none).total).toBe(0);
    expect(scriptStats(none)).toEqual([]);
    expect(errorRanking(none)).toEqual([]);
    expect(durationStats(none)).toEqual([]);
    expect(runSourceBreakdown(none)).toEqual({ sources: [], byScript: [] });
    expect(alertSummary(none)).toEqual({ errorCount: 0, failedScripts: [] });
  });
});

describe('overview tables', () => {
  it('distributes levels by count', () => {
    expect(levelDistribution(sample())).toEqual([
      { level: 'ERROR', count: 2 },
      { level: 'INFO', count: 1 },
    ]);
  });

  it('keeps the latest run per script', () => {
    expect(latestRuns(sample())).toEqual([
      { taskName: 'A', status: 'ERROR', message: 'A broke', runSource: 'local', timestamp: t3 },
      { taskName: 'B', status: 'ERROR', message: 'B broke', runSource: 'local', timestamp: t2 },
    ]);
  });

  it('hides the message of successful runs', () => {
    const [run] = latestRuns([makeRecord({ taskName: 'ok', message: 'all good' })]);
    expect(run.status).toBe('success');
    expect(run.message).toBeUndefined();
  });

  it('lists failed scripts by most recent failure', () => {
    expect(alertSummary(sample())).toEqual({ errorCount: 2, failedScripts: ['A', 'B'] });
  });

  it('offers known levels and sources even without data', () => {
    expect(filterOptions([])).toEqual({
      tasks: [],
      levels: ['CRITICAL', 'ERROR', 'INFO'],
      sources: ['github', 'local'],
    });
  });
});
