/**
 * Levelled logger
 *
 * Every line carries the logger's scope (the site domain for client
 * loggers) as a `[scope]` prefix.
 *
 * - Minimum level from WIKIBOT_LOG_LEVEL (default: warn)
 * - LOG_FORMAT=json writes one JSON object per line
 */

/** Log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'text' | 'json';
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_VALUES;
}

function levelFromEnv(): LogLevel {
  const value = process.env.WIKIBOT_LOG_LEVEL?.toLowerCase();
  return isLogLevel(value) ? value : 'warn';
}

function formatFromEnv(): 'text' | 'json' {
  return process.env.LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'text';
}

function formatData(data: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) continue;
    parts.push(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  }
  return parts.join(' ');
}

/**
 * Create a logger for a scope
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVEL_VALUES[options.level ?? levelFromEnv()];
  const format = options.format ?? formatFromEnv();

  const write = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LOG_LEVEL_VALUES[level] < minLevel) return;

    let line: string;
    if (format === 'json') {
      line = JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        scope,
        message,
        ...(data ? { data } : {}),
      });
    } else {
      const suffix = data && Object.keys(data).length > 0 ? ` ${formatData(data)}` : '';
      line = `[${scope}] ${message}${suffix}`;
    }

    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
