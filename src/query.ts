import { z } from 'zod';
import { DEFAULT_DAYS, MAX_DAYS, MIN_DAYS } from './config';
import type { DashboardQuery } from './dashboard';
import type { LogFilters } from './types';

const filterValue = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v && v.toLowerCase() !== 'all' ? v : undefined));

export const daysSchema = z.coerce.number().int().min(MIN_DAYS).max(MAX_DAYS).default(DEFAULT_DAYS);

const filterFields = {
  task: filterValue,
  level: filterValue.transform((v) => v?.toUpperCase()),
  source: filterValue,
};

const filtersSchema = z
  .object(filterFields)
  .transform((q): LogFilters => ({ taskName: q.task, level: q.level, runSource: q.source }));

export const dashboardQuerySchema = z.object({ days: daysSchema, ...filterFields }).transform(
  (q): DashboardQuery => ({
    days: q.days,
    filters: { taskName: q.task, level: q.level, runSource: q.source },
  })
);

/** Browser-facing parse: anything unreadable falls back to the defaults. */
export function parseDashboardQuery(input: unknown): DashboardQuery {
  const parsed = dashboardQuerySchema.safeParse(input);
  if (parsed.success) return parsed.data;
  const days = z.object({ days: daysSchema }).safeParse(input);
  const filters = filtersSchema.safeParse(input);
  return {
    days: days.success ? days.data.days : DEFAULT_DAYS,
    filters: filters.success ? filters.data : {},
  };
}
