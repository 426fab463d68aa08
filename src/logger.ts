/**
 * Structured logging with pino. Logs go to stderr so stdout stays free for
 * crawl output (JSONL events, page lists).
 */
import { createRequire } from 'node:module';
import pino from 'pino';

const require = createRequire(import.meta.url);
const isDev = process.env.NODE_ENV === 'development';

/** pino-pretty is a dev dependency; production installs fall back to JSON lines. */
function usePrettyTransport(): boolean {
  if (!isDev) return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch (e) {
    console.debug('pino-pretty not resolvable, logging JSON:', e);
    return false;
  }
}

const VALID_LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
type LogLevel = (typeof VALID_LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel && isLogLevel(envLevel) ? envLevel : 'info';
}

const options = {
  level: getLogLevel(),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: {
    service: 'crawlkit',
  },
};

export const logger = usePrettyTransport()
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));
