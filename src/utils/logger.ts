import { Logger } from '@aws-lambda-powertools/logger';
import { createLocalLogger, LOG_LEVELS, LogLevelName, LogMeta } from './localLogger';

export type { LogMeta, LogLevelName } from './localLogger';

export interface AppLogger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  addContext(attributes: LogMeta): void;
  setLevel(level: LogLevelName): void;
}

function resolveLevel(value: string | undefined): LogLevelName {
  const upper = (value || 'INFO').toUpperCase();
  return LOG_LEVELS.find(level => level === upper) || 'INFO';
}

// JSON output is opt-in; a terminal user gets the readable format
const useJson = process.env.LOG_FORMAT === 'json';

const powertoolsLogger = new Logger({
  serviceName: process.env.SERVICE_NAME || 'quicksight-sync',
  logLevel: resolveLevel(process.env.LOG_LEVEL),
});

powertoolsLogger.appendKeys({
  environment: process.env.NODE_ENV || 'development',
});

function serializeError(error: unknown): LogMeta {
  if (error instanceof Error) {
    return {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
    };
  }
  return error === undefined ? {} : { error };
}

const structuredLogger: AppLogger = {
  info: (message, meta) => {
    if (meta) {
      powertoolsLogger.info(message, meta);
    } else {
      powertoolsLogger.info(message);
    }
  },

  warn: (message, meta) => {
    if (meta) {
      powertoolsLogger.warn(message, meta);
    } else {
      powertoolsLogger.warn(message);
    }
  },

  error: (message, error, meta) => {
    powertoolsLogger.error(message, { ...serializeError(error), ...meta });
  },

  debug: (message, meta) => {
    if (meta) {
      powertoolsLogger.debug(message, meta);
    } else {
      powertoolsLogger.debug(message);
    }
  },

  addContext: (attributes) => {
    powertoolsLogger.appendKeys(attributes);
  },

  setLevel: (level) => {
    powertoolsLogger.setLogLevel(level);
  },
};

/**
 * Application logger backed by AWS Lambda Powertools.
 * Human-readable lines by default, structured JSON with LOG_FORMAT=json.
 */
export const logger: AppLogger = useJson
  ? structuredLogger
  : createLocalLogger(powertoolsLogger, resolveLevel(process.env.LOG_LEVEL));
