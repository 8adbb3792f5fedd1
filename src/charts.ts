import type { ChartConfiguration } from 'chart.js';
import type { DashboardView } from './dashboard';

export type DashboardChart =
  | ChartConfiguration<'line', number[], string>
  | ChartConfiguration<'pie', number[], string>
  | ChartConfiguration<'bar', number[], string>
  | ChartConfiguration<'bar', [number, number][], string>;

export const LEVEL_COLORS: Record<string, string> = {
  INFO: '#00CC96',
  ERROR: '#EF553B',
  CRITICAL: '#AB63FA',
};
const FALLBACK_COLOR = '#8E9AAF';
const SOURCE_PALETTE = ['#636EFA', '#FFA15A', '#19D3F3', '#FF6692', '#B6E880', '#FF97FF'];

export function levelColor(level: string): string {
  return LEVEL_COLORS[level] ?? FALLBACK_COLOR;
}

function sourceColor(index: number): string {
  return SOURCE_PALETTE[index % SOURCE_PALETTE.length];
}

function title(text: string) {
  return { display: true, text };
}

export function dailyTrendChart(view: DashboardView): ChartConfiguration<'line', number[], string> {
  return {
    type: 'line',
    data: {
      labels: view.daily.map((d) => d.date),
      datasets: [
        { label: 'Executions', data: view.daily.map((d) => d.count), borderColor: '#636EFA', tension: 0.25 },
        { label: 'Success', data: view.daily.map((d) => d.success), borderColor: LEVEL_COLORS.INFO, tension: 0.25 },
        { label: 'Failed', data: view.daily.map((d) => d.failure), borderColor: LEVEL_COLORS.ERROR, tension: 0.25 },
      ],
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      interaction: { mode: 'index', intersect: false },
      plugins: { title: title('Daily Execution Count') },
      scales: { y: { beginAtZero: true, ticks: { precision: 0 } } },
    },
  };
}

export function levelPieChart(view: DashboardView): ChartConfiguration<'pie', number[], string> {
  return {
    type: 'pie',
    data: {
      labels: view.levels.map((l) => l.level),
      datasets: [
        {
          data: view.levels.map((l) => l.count),
          backgroundColor: view.levels.map((l) => levelColor(l.level)),
        },
      ],
    },
    options: { responsive: true, maintainAspectRatio: false, plugins: { title: title('Execution Result Distribution') } },
  };
}

export function scriptOutcomeChart(view: DashboardView): ChartConfiguration<'bar', number[], string> {
  return {
    type: 'bar',
    data: {
      labels: view.scripts.map((s) => s.taskName),
      datasets: [
        { label: 'Success', data: view.scripts.map((s) => s.success), backgroundColor: LEVEL_COLORS.INFO },
        { label: 'Failed', data: view.scripts.map((s) => s.failure), backgroundColor: LEVEL_COLORS.ERROR },
      ],
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      plugins: { title: title('Runs per Script') },
      scales: { x: { stacked: true }, y: { stacked: true, beginAtZero: true, ticks: { precision: 0 } } },
    },
  };
}

export function runSourceChart(view: DashboardView): ChartConfiguration<'pie', number[], string> {
  const { sources } = view.runSources;
  return {
    type: 'pie',
    data: {
      labels: sources.map((s) => s.source),
      datasets: [{ data: sources.map((s) => s.count), backgroundColor: sources.map((_, i) => sourceColor(i)) }],
    },
    options: { responsive: true, maintainAspectRatio: false, plugins: { title: title('Runs by Source') } },
  };
}

export function runSourceByScriptChart(view: DashboardView): ChartConfiguration<'bar', number[], string> {
  const { sources, byScript } = view.runSources;
  return {
    type: 'bar',
    data: {
      labels: byScript.map((row) => row.taskName),
      datasets: sources.map((s, i) => ({
        label: s.source,
        data: byScript.map((row) => row.counts[s.source] ?? 0),
        backgroundColor: sourceColor(i),
      })),
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      plugins: { title: title('Run Source per Script') },
      scales: { x: { stacked: true }, y: { stacked: true, beginAtZero: true, ticks: { precision: 0 } } },
    },
  };
}

export function errorRankingChart(view: DashboardView): ChartConfiguration<'bar', number[], string> {
  return {
    type: 'bar',
    data: {
      labels: view.errorRanking.map((e) => e.taskName),
      datasets: [{ label: 'Errors', data: view.errorRanking.map((e) => e.count), backgroundColor: LEVEL_COLORS.ERROR }],
    },
    options: {
      indexAxis: 'y',
      responsive: true,
      maintainAspectRatio: false,
      plugins: { title: title('Errors per Script'), legend: { display: false } },
      scales: { x: { beginAtZero: true, ticks: { precision: 0 } } },
    },
  };
}

/** Box-style plot: the min–max range behind the interquartile range. */
export function durationDistributionChart(view: DashboardView): ChartConfiguration<'bar', [number, number][], string> {
  return {
    type: 'bar',
    data: {
      labels: view.performance.map((p) => p.taskName),
      datasets: [
        {
          label: 'Q1–Q3',
          data: view.performance.map((p): [number, number] => [p.q1, p.q3]),
          backgroundColor: 'rgba(99, 110, 250, 0.75)',
          grouped: false,
          barPercentage: 0.5,
        },
        {
          label: 'Min–Max',
          data: view.performance.map((p): [number, number] => [p.min, p.max]),
          backgroundColor: 'rgba(99, 110, 250, 0.2)',
          grouped: false,
          barPercentage: 0.15,
        },
      ],
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      plugins: { title: title('Execution Duration Distribution (s)') },
      scales: { y: { beginAtZero: true } },
    },
  };
}

/** Chart configs keyed by canvas id; charts with nothing to draw are left out. */
export function buildCharts(view: DashboardView): Record<string, DashboardChart> {
  if (view.empty) return {};
  const charts: Record<string, DashboardChart> = {
    'chart-daily': dailyTrendChart(view),
    'chart-levels': levelPieChart(view),
    'chart-scripts': scriptOutcomeChart(view),
    'chart-sources': runSourceChart(view),
    'chart-sources-by-script': runSourceByScriptChart(view),
  };
  if (view.errorRanking.length > 0) charts['chart-errors'] = errorRankingChart(view);
  if (view.performance.length > 0) charts['chart-durations'] = durationDistributionChart(view);
  return charts;
}
