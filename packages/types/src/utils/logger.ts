export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  scope?: string;
  level?: LogLevel;
  write?: (line: string) => void;
}

/**
 * Formats a log line as `[LEVEL] scope: message {context}`.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  scope?: string,
  context?: Record<string, unknown>
): string {
  const prefix = `[${level.toUpperCase()}]`;
  const body = scope !== undefined && scope !== '' ? `${scope}: ${message}` : message;
  if (context === undefined || Object.keys(context).length === 0) {
    return `${prefix} ${body}`;
  }
  return `${prefix} ${body} ${JSON.stringify(context, errorReplacer)}`;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Logger writing to stderr so stdout stays free for command output.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  // eslint-disable-next-line no-console
  const write = options.write ?? ((line: string): void => console.error(line));

  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(formatLogLine(level, message, options.scope, context));
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}

/** Discards everything; handy as a default in tests. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
