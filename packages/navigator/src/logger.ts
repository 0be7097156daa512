/**
 * Leveled logger for the navigator.
 *
 * Lines go to stderr (`console.error`) so they never mix with command
 * output or the MCP stdio transport. Each line carries the level and, for
 * scoped loggers, the scope: `[INFO] [feed] Loaded GTFS feed`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogWriter = (line: string, ...args: unknown[]) => void;

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** A logger whose lines are tagged with `scope` */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  /** Checked on every debug call; defaults to the DEBUG environment variable */
  debugEnabled?: () => boolean;
  write?: LogWriter;
}

const writeToStderr: LogWriter = (line, ...args) => {
  console.error(line, ...args);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debugEnabled ?? (() => Boolean(process.env.DEBUG));
  const write = options.write ?? writeToStderr;
  const tag = options.scope === undefined ? '' : ` [${options.scope}]`;

  const log = (level: LogLevel, message: string, args: unknown[]) => {
    write(`[${level.toUpperCase()}]${tag} ${message}`, ...args);
  };

  return {
    debug: (message, ...args) => {
      if (debugEnabled()) {
        log('debug', message, args);
      }
    },
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    child: (scope) =>
      createLogger({
        scope: options.scope === undefined ? scope : `${options.scope}:${scope}`,
        debugEnabled,
        write,
      }),
  };
}

export const logger = createLogger();
