/**
 * Console logger for the packages that run outside a Fastify request.
 *
 * Calls look like pino's (`log.info(obj, msg)` or `log.info(msg)`). Lines
 * below the threshold are dropped; the threshold comes from `LOG_LEVEL`
 * unless one is passed in.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SINK: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase();
  return level === 'debug' || level === 'warn' || level === 'error' ? level : 'info';
}

export function createLogger(name: string, level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  const emit =
    (at: LogLevel) =>
    (objOrMsg: Record<string, unknown> | string, msg?: string): void => {
      if (RANK[at] < RANK[level]) return;
      if (typeof objOrMsg === 'string') {
        SINK[at](`[${name}] ${objOrMsg}`);
      } else {
        SINK[at](`[${name}] ${msg ?? ''}`, objOrMsg);
      }
    };
  return { debug: emit('debug'), info: emit('info'), warn: emit('warn'), error: emit('error') };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
