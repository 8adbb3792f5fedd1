import pino from 'pino';

const env = process.env.NODE_ENV;
const isTest = env === 'test';
const isDev = env !== 'production' && !isTest;

const _pino = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  transport: isDev
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined,
});

export const logger = _pino;

/** Structured logger with module context */
export function createLogger(module: string): pino.Logger {
  return _pino.child({ module });
}
