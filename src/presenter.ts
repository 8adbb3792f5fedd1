import { buildCharts, levelColor } from './charts';
import { MAX_DAYS, MIN_DAYS } from './config';
import type { DashboardView } from './dashboard';
import type { ConfigurationError } from './errors';
import type { LogFilters } from './types';

export const CHART_SCRIPT_PATH = '/vendor/chart.umd.js';

export interface RenderContext {
  token?: string;
}

export function escapeHtml(value: unknown): string {
  return String(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** JSON safe to inline inside a <script> element. */
export function serializeForScript(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/** "2025-03-01T10:00:00.000Z" -> "2025-03-01 10:00:00" (UTC) */
export function formatTimestamp(iso: string): string {
  return iso.slice(0, 19).replace('T', ' ');
}

function formatSeconds(value: number): string {
  return value.toFixed(2);
}

export function dashboardQueryString(days: number, filters: LogFilters, ctx: RenderContext = {}): string {
  const params = new URLSearchParams({ days: String(days) });
  if (filters.taskName) params.set('task', filters.taskName);
  if (filters.level) params.set('level', filters.level);
  if (filters.runSource) params.set('source', filters.runSource);
  if (ctx.token) params.set('token', ctx.token);
  return params.toString();
}

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>${escapeHtml(title)}</title>
    <meta name="viewport" content="width=device-width,initial-scale=1" />
    <style>
      :root { font-family: system-ui, sans-serif; color: #1f2430; background: #f5f6fa; }
      body { margin: 0; display: grid; grid-template-columns: 260px 1fr; min-height: 100vh; }
      aside { background: #fff; border-right: 1px solid #e2e5ee; padding: 24px; }
      aside label { display: block; margin: 16px 0 4px; font-size: 13px; color: #5a6275; }
      aside select, aside input[type=range], aside button { width: 100%; }
      main { padding: 24px 32px; }
      h1 { margin-top: 0; }
      .alert { padding: 12px 16px; border-radius: 8px; margin-bottom: 16px; }
      .alert.error { background: #fde8e6; color: #8a1f11; }
      .alert.warning { background: #fff4dc; color: #7a5200; }
      .alert.success { background: #e3f7ee; color: #0c6b45; }
      .tiles { display: grid; grid-template-columns: repeat(5, 1fr); gap: 16px; }
      .tile { background: #fff; border-radius: 10px; padding: 16px; border: 1px solid #e2e5ee; }
      .tile h3 { margin: 0 0 6px; font-size: 13px; color: #5a6275; font-weight: 500; }
      .tile p { margin: 0; font-size: 24px; font-weight: 600; }
      section { margin-top: 32px; }
      .grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(360px, 1fr)); gap: 24px; }
      .chart { background: #fff; border-radius: 10px; border: 1px solid #e2e5ee; padding: 12px; height: 340px; }
      table { width: 100%; border-collapse: collapse; background: #fff; }
      th, td { padding: 8px 12px; text-align: left; border-bottom: 1px solid #eceef4; font-size: 14px; }
      th { cursor: pointer; user-select: none; color: #5a6275; font-weight: 500; }
      .level { font-weight: 600; }
      .empty { color: #5a6275; font-style: italic; }
      footer { margin-top: 40px; text-align: center; color: #888; font-size: 13px; }
    </style>
  </head>
  <body>
${body}
  </body>
</html>`;
}

function table(label: string, headers: string[], rows: string[][]): string {
  if (rows.length === 0) return `<p class="empty">No data in range.</p>`;
  const head = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join('');
  const body = rows.map((cells) => `<tr>${cells.map((c) => `<td>${c}</td>`).join('')}</tr>`).join('\n');
  return `<table class="sortable" aria-label="${escapeHtml(label)}"><thead><tr>${head}</tr></thead><tbody>
${body}
</tbody></table>`;
}

function level(value: string): string {
  return `<span class="level" style="color:${levelColor(value)}">${escapeHtml(value)}</span>`;
}

function select(name: string, label: string, values: string[], selected: string | undefined): string {
  const options = [`<option value="">All</option>`]
    .concat(
      values.map(
        (v) => `<option value="${escapeHtml(v)}"${v === selected ? ' selected' : ''}>${escapeHtml(v)}</option>`
      )
    )
    .join('');
  return `<label for="${name}">${escapeHtml(label)}</label>
      <select id="${name}" name="${name}" onchange="this.form.submit()">${options}</select>`;
}

function sidebar(view: DashboardView, ctx: RenderContext): string {
  const { filters, options } = view;
  const tokenField = ctx.token ? `<input type="hidden" name="token" value="${escapeHtml(ctx.token)}" />` : '';
  const refreshQuery = ctx.token ? `?${new URLSearchParams({ token: ctx.token }).toString()}` : '';
  return `    <aside>
      <h2>Settings</h2>
      <form method="get" action="/">
        ${tokenField}
        <label for="days">Time range: <output id="days-value">${view.days}</output> day(s)</label>
        <input id="days" type="range" name="days" min="${MIN_DAYS}" max="${MAX_DAYS}" step="1" value="${view.days}"
          oninput="document.getElementById('days-value').textContent = this.value" onchange="this.form.submit()" />
        ${select('task', 'Script', options.tasks, filters.taskName)}
        ${select('level', 'Log level', options.levels, filters.level)}
        ${select('source', 'Run source', options.sources, filters.runSource)}
      </form>
      <form method="post" action="/refresh${escapeHtml(refreshQuery)}">
        <input type="hidden" name="days" value="${view.days}" />
        <input type="hidden" name="task" value="${escapeHtml(filters.taskName ?? '')}" />
        <input type="hidden" name="level" value="${escapeHtml(filters.level ?? '')}" />
        <input type="hidden" name="source" value="${escapeHtml(filters.runSource ?? '')}" />
        <p><button type="submit">Refresh Data</button></p>
      </form>
    </aside>`;
}

function notices(view: DashboardView): string {
  const out: string[] = [];
  if (view.fetch.error) {
    out.push(`<div class="alert error" role="alert">${escapeHtml(view.fetch.error)}</div>`);
  }
  if (view.fetch.truncated) {
    out.push(
      `<div class="alert warning">Showing the most recent ${view.fetch.rowLimit} rows; older rows in the window are not included.</div>`
    );
  }
  if (view.fetch.skipped > 0) {
    out.push(`<div class="alert warning">${view.fetch.skipped} unreadable row(s) were skipped.</div>`);
  }
  return out.join('\n');
}

function alertsSection(view: DashboardView): string {
  const { errorCount, failedScripts } = view.alerts;
  const banner =
    errorCount > 0
      ? `<div class="alert error"><strong>${errorCount} task(s) failed!</strong> Failed scripts: ${failedScripts
          .map(escapeHtml)
          .join(', ')}</div>`
      : `<div class="alert success">All tasks are running successfully!</div>`;
  return `<section><h2>Alerts</h2>${banner}</section>`;
}

function tile(label: string, value: string | number): string {
  return `<div class="tile"><h3>${escapeHtml(label)}</h3><p>${escapeHtml(value)}</p></div>`;
}

function metricsSection(view: DashboardView): string {
  const s = view.summary;
  return `<section><h2>Key Metrics</h2><div class="tiles">
${tile('Total Runs', s.total)}
${tile('Success', s.success)}
${tile('Failed', s.failure)}
${tile('Success Rate', formatPercent(s.successRate))}
${tile('Total Scripts', s.distinctScripts)}
</div></section>`;
}

function canvas(id: string, charts: Record<string, unknown>): string {
  return id in charts ? `<div class="chart"><canvas id="${id}"></canvas></div>` : '';
}

function dashboardBody(view: DashboardView, charts: Record<string, unknown>): string {
  const latest = table(
    'Task logs',
    ['Task Name', 'Status', 'Message', 'Run Source', 'Last Run'],
    view.latestRuns.map((r) => [
      escapeHtml(r.taskName),
      r.status === 'success' ? `<span style="color:${levelColor('INFO')}">Success</span>` : level(r.status),
      escapeHtml(r.message ?? '-'),
      escapeHtml(r.runSource),
      escapeHtml(formatTimestamp(r.timestamp)),
    ])
  );
  const scripts = table(
    'Script statistics',
    ['Script', 'Total Runs', 'Success', 'Failed', 'Success Rate'],
    view.scripts.map((s) => [
      escapeHtml(s.taskName),
      String(s.total),
      String(s.success),
      String(s.failure),
      formatPercent(s.successRate),
    ])
  );
  const sources = view.runSources.sources.map((s) => s.source);
  const crossTab = table(
    'Run source per script',
    ['Script', ...sources, 'Total'],
    view.runSources.byScript.map((row) => [
      escapeHtml(row.taskName),
      ...sources.map((s) => String(row.counts[s] ?? 0)),
      String(row.total),
    ])
  );
  const errors = table(
    'Recent errors',
    ['Task Name', 'Level', 'Time', 'Message'],
    view.recentErrors.map((e) => [
      escapeHtml(e.taskName),
      level(e.level),
      escapeHtml(formatTimestamp(e.timestamp)),
      escapeHtml(e.message),
    ])
  );
  const ranking = table(
    'Error ranking',
    ['Script', 'Errors'],
    view.errorRanking.map((e) => [escapeHtml(e.taskName), String(e.count)])
  );
  const durations = table(
    'Execution durations',
    ['Script', 'Runs', 'Mean (s)', 'Median (s)', 'Max (s)'],
    view.performance.map((p) => [
      escapeHtml(p.taskName),
      String(p.count),
      formatSeconds(p.mean),
      formatSeconds(p.median),
      formatSeconds(p.max),
    ])
  );

  return `${alertsSection(view)}
${metricsSection(view)}
<section><h2>Task Logs</h2>${latest}</section>
<section><h2>Script Execution Statistics</h2>${scripts}
<div class="grid">${canvas('chart-scripts', charts)}</div></section>
<section><h2>Execution Trends</h2><div class="grid">
${canvas('chart-daily', charts)}
${canvas('chart-levels', charts)}
</div></section>
<section><h2>Run Sources</h2><div class="grid">
${canvas('chart-sources', charts)}
${canvas('chart-sources-by-script', charts)}
</div>${crossTab}</section>
<section><h2>Error Analysis</h2><h3>Recent Errors</h3>${errors}
<h3>Errors per Script</h3><div class="grid">${canvas('chart-errors', charts)}<div>${ranking}</div></div></section>
<section><h2>Performance</h2><div class="grid">${canvas('chart-durations', charts)}<div>${durations}</div></div></section>`;
}

const CLIENT_SCRIPT = `
      for (const [id, config] of Object.entries(DASHBOARD_CHARTS)) {
        const el = document.getElementById(id);
        if (el && window.Chart) new Chart(el, config);
      }
      document.querySelectorAll('table.sortable th').forEach(function (th) {
        th.addEventListener('click', function () {
          const table = th.closest('table');
          const index = Array.prototype.indexOf.call(th.parentNode.children, th);
          const asc = th.dataset.dir !== 'asc';
          th.dataset.dir = asc ? 'asc' : 'desc';
          const body = table.tBodies[0];
          const rows = Array.from(body.rows);
          const key = function (row) {
            const text = row.cells[index].textContent.trim();
            const num = parseFloat(text);
            return isNaN(num) ? text.toLowerCase() : num;
          };
          rows.sort(function (a, b) {
            const ka = key(a), kb = key(b);
            return (ka < kb ? -1 : ka > kb ? 1 : 0) * (asc ? 1 : -1);
          });
          rows.forEach(function (row) { body.appendChild(row); });
        });
      });`;

export function renderDashboard(view: DashboardView, ctx: RenderContext = {}): string {
  const charts = buildCharts(view);
  const content = view.empty
    ? `<div class="alert warning">No data available in the selected range. Please ensure scripts have been executed.</div>`
    : dashboardBody(view, charts);
  const body = `${sidebar(view, ctx)}
    <main>
      <h1>Task Logs Dashboard</h1>
${notices(view)}
${content}
      <footer>Last Updated: ${escapeHtml(formatTimestamp(view.generatedAt))} UTC${
        view.fetch.fromCache ? ` · cached since ${escapeHtml(formatTimestamp(view.fetch.fetchedAt))} UTC` : ''
      }</footer>
    </main>
    <script src="${CHART_SCRIPT_PATH}"></script>
    <script>
      const DASHBOARD_CHARTS = ${serializeForScript(charts)};${CLIENT_SCRIPT}
    </script>`;
  return page('Task Logs Dashboard', body);
}

export function renderConfigError(error: ConfigurationError): string {
  const items = error.problems.map((p) => `<li>${escapeHtml(p)}</li>`).join('');
  return page(
    'Task Logs Dashboard',
    `    <main style="grid-column: 1 / -1">
      <h1>Task Logs Dashboard</h1>
      <div class="alert error" role="alert">Error: Supabase credentials not configured. Please check the .env file.<ul>${items}</ul></div>
    </main>`
  );
}

export function renderServerError(message: string): string {
  return page(
    'Task Logs Dashboard',
    `    <main style="grid-column: 1 / -1">
      <h1>Task Logs Dashboard</h1>
      <div class="alert error" role="alert">${escapeHtml(message)}</div>
    </main>`
  );
}
