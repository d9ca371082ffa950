import type { TelemetryClient, TelemetryLevel } from '@stitchwork/telemetry';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  child(source: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  telemetry?: TelemetryClient;
}

function formatTime(): string {
  return new Date().toLocaleTimeString('en-US', {
    hour: 'numeric',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  });
}

/**
 * Console logger in the `<time> [Source] message` form. Entries at or above
 * the configured level also go to the telemetry client, when one is given.
 */
export function createLogger(source: string, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const telemetry = options.telemetry;

  function write(level: TelemetryLevel, message: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < threshold) return;

    const line = `${formatTime()} [${source}] ${message}`;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (metadata && Object.keys(metadata).length > 0) {
      sink(line, metadata);
    } else {
      sink(line);
    }

    telemetry?.log(level, message, { source, ...metadata });
  }

  return {
    debug: (message, metadata) => write('debug', message, metadata),
    info: (message, metadata) => write('info', message, metadata),
    warn: (message, metadata) => write('warn', message, metadata),
    error: (message, metadata) => write('error', message, metadata),
    child: (childSource) => createLogger(childSource, options),
  };
}

export const silentLogger: Logger = createLogger('silent', { level: 'silent' });
