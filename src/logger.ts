/**
 * Structured logging with pino. Records go to stderr so that CLI output on
 * stdout stays parseable JSON.
 */
import { createRequire } from 'node:module';
import pino, { type LevelWithSilent, type LoggerOptions } from 'pino';

const require = createRequire(import.meta.url);

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LevelWithSilent {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

/** pino-pretty is optional and only used in development. */
function prettyTransportAvailable(): boolean {
  if (process.env.NODE_ENV !== 'development') return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch (e) {
    console.debug('pino-pretty not available, using JSON logs:', e);
    return false;
  }
}

const options: LoggerOptions = {
  level: levelFromEnv(),
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: { service: 'folio-extract' },
};

export const logger = prettyTransportAvailable()
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
