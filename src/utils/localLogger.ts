import type { Logger } from '@aws-lambda-powertools/logger';

/**
 * Human-readable logger for terminal use
 * Wraps the Powertools logger with a more readable format
 */

export type LogMeta = Record<string, unknown>;

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'] as const;
export type LogLevelName = typeof LOG_LEVELS[number];

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

function describeErrorField(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const stack = 'stack' in error && typeof error.stack === 'string' ? error.stack : undefined;
    return { message: String(error.message), stack };
  }
  return { message: String(error) };
}

export function formatMessage(level: Exclude<LogLevelName, 'SILENT'>, message: string, meta?: LogMeta, verbose = false): string {
  const timestamp = new Date().toISOString().split('T')[1].replace('Z', '');
  const levelColors: Record<string, string> = {
    ERROR: colors.red,
    WARN: colors.yellow,
    INFO: colors.green,
    DEBUG: colors.dim,
  };

  const levelColor = levelColors[level] || colors.reset;
  const levelText = level.padEnd(5);

  let output = `${colors.dim}[${timestamp}]${colors.reset} ${levelColor}${levelText}${colors.reset} ${message}`;

  if (meta && Object.keys(meta).length > 0) {
    // Only show important fields unless debugging
    const { error, kind, assetId, duration, statusCode, ...rest } = meta;

    if (error !== undefined) {
      const details = describeErrorField(error);
      output += `\n${colors.red}  └─ Error: ${details.message}${colors.reset}`;
      if (details.stack && level === 'ERROR' && verbose) {
        output += `\n${colors.dim}     ${details.stack.split('\n').slice(1, 3).join('\n     ')}${colors.reset}`;
      }
    }

    const importantFields: string[] = [];
    if (kind) importantFields.push(`kind=${String(kind)}`);
    if (assetId) importantFields.push(`id=${String(assetId)}`);
    if (duration) importantFields.push(`${String(duration)}ms`);
    if (statusCode) importantFields.push(`status=${String(statusCode)}`);

    if (importantFields.length > 0) {
      output += ` ${colors.dim}(${importantFields.join(', ')})${colors.reset}`;
    }

    if (verbose && Object.keys(rest).length > 0) {
      output += `\n${colors.dim}  └─ ${JSON.stringify(rest, null, 2)}${colors.reset}`;
    }
  }

  return output;
}

export const createLocalLogger = (powertoolsLogger: Logger, initialLevel: LogLevelName) => {
  let threshold = LOG_LEVELS.indexOf(initialLevel);
  // Store context for local logging
  let localContext: LogMeta = {};

  const enabled = (level: LogLevelName) => LOG_LEVELS.indexOf(level) >= threshold;
  const verbose = () => threshold === 0;

  // Diagnostics go to stderr so command output on stdout stays clean
  const write = (level: Exclude<LogLevelName, 'SILENT'>, message: string, meta?: LogMeta) => {
    if (!enabled(level)) return;
    console.error(formatMessage(level, message, { ...localContext, ...meta }, verbose()));
  };

  return {
    info: (message: string, meta?: LogMeta) => {
      write('INFO', message, meta);
    },

    warn: (message: string, meta?: LogMeta) => {
      write('WARN', message, meta);
    },

    error: (message: string, error?: unknown, meta?: LogMeta) => {
      if (error instanceof Error) {
        write('ERROR', message, {
          error: {
            name: error.name,
            message: error.message,
            stack: error.stack,
          },
          ...meta,
        });
      } else {
        write('ERROR', message, error === undefined ? meta : { error, ...meta });
      }
    },

    debug: (message: string, meta?: LogMeta) => {
      write('DEBUG', message, meta);
    },

    addContext: (attributes: LogMeta) => {
      localContext = { ...localContext, ...attributes };
      // Also update Powertools for consistency
      powertoolsLogger.appendKeys(attributes);
    },

    setLevel: (level: LogLevelName) => {
      threshold = LOG_LEVELS.indexOf(level);
      powertoolsLogger.setLogLevel(level);
    },
  };
};
