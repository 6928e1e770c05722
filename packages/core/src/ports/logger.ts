export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** Pino-style call: structured fields first, message second, or a bare message. */
export interface LogMethod {
  (obj: Record<string, unknown>, msg?: string): void;
  (msg: string): void;
}

/**
 * Structured logger port. Components bind their own context with `child`
 * (`{ component: 'history-store' }`) and log fields rather than formatted text.
 */
export interface Logger {
  trace : LogMethod;
  debug : LogMethod;
  info  : LogMethod;
  warn  : LogMethod;
  error : LogMethod;
  fatal : LogMethod;

  child(bindings: Record<string, unknown>): Logger;
}
