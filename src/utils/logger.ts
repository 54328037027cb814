/**
 * Tagged console logging. Every component writes through its own tag so that
 * lines can be traced back to it: `[RefreshCoordinator] ...`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

let verboseLogging = process.env.SAFETY_HUB_VERBOSE_LOGGING === 'true';

/**
 * Enables or disables debug lines for every logger
 */
export function setVerboseLogging(enabled: boolean): void {
  verboseLogging = enabled;
}

export function isVerboseLoggingEnabled(): boolean {
  return verboseLogging;
}

function write(level: LogLevel, tag: string, message: string, context?: Record<string, unknown>): void {
  const line = `[${tag}] ${message}`;
  const args: unknown[] = context === undefined ? [line] : [line, context];
  switch (level) {
    case 'debug':
      if (verboseLogging) {
        console.debug(...args);
      }
      return;
    case 'info':
      console.info(...args);
      return;
    case 'warn':
      console.warn(...args);
      return;
    case 'error':
      console.error(...args);
      return;
  }
}

/**
 * Creates a logger whose lines are prefixed with the given tag
 */
export function createLogger(tag: string): Logger {
  return {
    debug: (message, context) => write('debug', tag, message, context),
    info: (message, context) => write('info', tag, message, context),
    warn: (message, context) => write('warn', tag, message, context),
    error: (message, context) => write('error', tag, message, context)
  };
}
