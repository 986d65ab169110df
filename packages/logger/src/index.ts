export { initLogger, getLogger, flushLoggers, type Logger, type LoggerConfig } from './logger.js';
export { LOG_LEVELS, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
