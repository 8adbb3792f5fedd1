import './preload-dotenv';
import type { SupabaseClient } from '@supabase/supabase-js';
import { CONFIG, resolveConnection } from './config';
import { DashboardService } from './dashboard';
import { ConfigurationError, errorMessage } from './errors';
import { LogFetcher } from './fetcher';
import { logger } from './logger';
import { Backend, createServer } from './server';
import { createSupabaseClient, SupabaseLogSource } from './supabase';

function createBackend(): Backend {
  const connection = resolveConnection();
  if (!connection.ok) {
    logger.error({ problems: connection.error.problems }, connection.error.message);
    return { ok: false, error: connection.error };
  }
  const { settings } = connection;
  let client: SupabaseClient;
  try {
    client = createSupabaseClient(settings);
  } catch (err) {
    const error = new ConfigurationError([`Supabase client could not be created: ${errorMessage(err)}`]);
    logger.error({ problems: error.problems }, error.message);
    return { ok: false, error };
  }
  const source = new SupabaseLogSource(client, settings);
  const fetcher = new LogFetcher(source, { ttlMs: CONFIG.cacheTtlMs, rowLimit: settings.rowLimit });
  return { ok: true, service: new DashboardService(fetcher) };
}

const { server } = createServer(createBackend());

server.listen(CONFIG.port, CONFIG.host, () => {
  logger.info(`task-logs-dashboard listening on http://${CONFIG.host}:${CONFIG.port}`);
});

process.on('SIGINT', () => process.exit(0));
process.on('SIGTERM', () => process.exit(0));
