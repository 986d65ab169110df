import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig, type LogLevel } from './env.schema.js';

type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  /** Overrides LOGGER_LOG_LEVEL */
  level?: LogLevel | undefined;
  /** Replaces the stderr/file streams, e.g. to capture entries in tests */
  destination?: pino.DestinationStream | undefined;
}

let overrides: LoggerConfig = {};
let rootLogger: pino.Logger | undefined;
const categoryLoggers = new Map<string, pino.Logger>();

function isTestEnvironment(env: LoggerEnvConfig): boolean {
  return env.NODE_ENV === 'test' || process.env['VITEST'] === 'true';
}

function createDestination(env: LoggerEnvConfig): pino.DestinationStream {
  if (overrides.destination) return overrides.destination;

  // Silent under test unless a destination is injected
  if (isTestEnvironment(env)) {
    return { write: () => undefined };
  }

  // stdout carries the rendered accounts, so diagnostics go to stderr
  const console = pino.destination({ dest: 2, sync: true });
  if (!env.LOGGER_FILE_LOG_ENABLED) return console;

  return pino.multistream([
    { level: 'trace', stream: console },
    { level: 'trace', stream: pino.destination({ dest: env.LOGGER_FILE_LOG_PATH, mkdir: true, sync: true }) },
  ]);
}

function createRootLogger(): pino.Logger {
  const env = validateLoggerEnv(process.env);

  return pino(
    {
      base: { service: env.LOGGER_SERVICE_NAME },
      level: overrides.level ?? env.LOGGER_LOG_LEVEL,
      serializers: { error: pino.stdSerializers.err },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    createDestination(env)
  );
}

function resolveCategoryLogger(category: string): pino.Logger {
  const cached = categoryLoggers.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const child = rootLogger.child({ category });
  categoryLoggers.set(category, child);
  return child;
}

/**
 * Category logger that resolves the underlying pino child on every call, so
 * loggers created at module load follow a later `initLogger(...)`.
 */
class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  private log(level: EntryLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    const logger = resolveCategoryLogger(this.category);
    if (typeof msgOrObj === 'string') {
      logger[level](msgOrObj);
    } else {
      logger[level](msgOrObj, maybeMsg);
    }
  }
}

const loggerCache = new Map<string, Logger>();

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

/**
 * Reconfigure logging at runtime (CLI flags, tests). Drops the root logger so
 * the next entry is written with the new settings.
 */
export function initLogger(config: LoggerConfig): void {
  flushLoggers();
  overrides = { ...config };
  rootLogger = undefined;
  categoryLoggers.clear();
}

export function flushLoggers(): void {
  rootLogger?.flush();
}
