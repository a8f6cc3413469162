/**
 * Minimal logging surface used across the server. `console` satisfies it,
 * as does the stderr logger from `utils/logger.ts`.
 */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";
