import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import http from 'http';
import cors from 'cors';
import helmet from 'helmet';
import path from 'path';
import { ZodError } from 'zod';
import { CONFIG } from './config';
import type { DashboardService } from './dashboard';
import type { ConfigurationError } from './errors';
import { createLogger } from './logger';
import {
  CHART_SCRIPT_PATH,
  dashboardQueryString,
  renderConfigError,
  renderDashboard,
  renderServerError,
} from './presenter';
import { dashboardQuerySchema, daysSchema, parseDashboardQuery } from './query';

const log = createLogger('server');

export type Backend = { ok: true; service: DashboardService } | { ok: false; error: ConfigurationError };

export interface ServerOptions {
  token: string;
  corsOrigin: string;
}

function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function queryToken(req: Request): string | undefined {
  return typeof req.query.token === 'string' && req.query.token ? req.query.token : undefined;
}

function validationFailure(res: Response, error: ZodError) {
  res.status(400).json({
    ok: false,
    error: 'Validation failed',
    details: error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message, code: issue.code })),
  });
}

function chartScriptFile(): string {
  return path.join(path.dirname(require.resolve('chart.js')), 'chart.umd.js');
}

export function createServer(
  backend: Backend,
  options: ServerOptions = { token: CONFIG.token, corsOrigin: CONFIG.corsOrigin }
) {
  const app = express();
  app.disable('x-powered-by');
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: options.corsOrigin === '*' ? true : options.corsOrigin }));
  app.use(express.urlencoded({ extended: false }));

  function authMiddleware(req: Request, res: Response, next: NextFunction) {
    if (!options.token) return next();
    const header = req.headers['authorization'];
    const urlToken = queryToken(req) || '';
    const bearer = header && header.startsWith('Bearer ') ? header.slice(7) : '';
    if (bearer === options.token || urlToken === options.token) return next();
    return res.status(401).json({ error: 'unauthorized' });
  }

  /** Config problems are shown, never thrown: every data route answers 503 until fixed. */
  function withService(html: boolean, handler: (service: DashboardService, req: Request, res: Response) => Promise<void>) {
    return asyncHandler(async (req, res) => {
      if (!backend.ok) {
        if (html) res.status(503).type('html').send(renderConfigError(backend.error));
        else res.status(503).json({ ok: false, error: backend.error.message });
        return;
      }
      await handler(backend.service, req, res);
    });
  }

  const server = http.createServer(app);

  // REST endpoints
  app.get('/api/v1/health', (_req: Request, res: Response) => res.json({ ok: true, configured: backend.ok }));

  app.get(
    '/api/v1/dashboard',
    authMiddleware,
    withService(false, async (service, req, res) => {
      const parsed = dashboardQuerySchema.safeParse(req.query);
      if (!parsed.success) return validationFailure(res, parsed.error);
      res.json(await service.load(parsed.data));
    })
  );

  app.get(
    '/api/v1/logs',
    authMiddleware,
    withService(false, async (service, req, res) => {
      const parsed = dashboardQuerySchema.safeParse(req.query);
      if (!parsed.success) return validationFailure(res, parsed.error);
      const { result, records } = await service.records(parsed.data);
      res.json({
        records,
        fetchedAt: new Date(result.fetchedAt).toISOString(),
        fromCache: result.fromCache,
        error: result.error,
      });
    })
  );

  app.post(
    '/api/v1/refresh',
    authMiddleware,
    withService(false, async (service, req, res) => {
      const parsed = daysSchema.safeParse(req.query.days);
      if (!parsed.success) return validationFailure(res, parsed.error);
      service.refresh(parsed.data);
      log.info({ days: parsed.data }, 'cache invalidated');
      res.json({ ok: true, days: parsed.data });
    })
  );

  // Browser UI
  app.get(CHART_SCRIPT_PATH, (_req: Request, res: Response, next: NextFunction) => {
    res.sendFile(chartScriptFile(), (err) => {
      if (err) next(err);
    });
  });

  app.get(
    '/',
    authMiddleware,
    withService(true, async (service, req, res) => {
      const query = parseDashboardQuery(req.query);
      const view = await service.load(query);
      res.type('html').send(renderDashboard(view, { token: queryToken(req) }));
    })
  );

  app.post(
    '/refresh',
    authMiddleware,
    withService(true, async (service, req, res) => {
      const query = parseDashboardQuery(req.body);
      service.refresh(query.days);
      log.info({ days: query.days }, 'cache invalidated');
      res.redirect(303, `/?${dashboardQueryString(query.days, query.filters, { token: queryToken(req) })}`);
    })
  );

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    log.error({ err, path: req.path }, 'request failed');
    const message = 'Something went wrong while rendering the dashboard.';
    if (req.path.startsWith('/api/')) res.status(500).json({ ok: false, error: message });
    else res.status(500).type('html').send(renderServerError(message));
  });

  return { app, server };
}
