import type { LogLevel } from "./logger.js";

export type BraintreeEnvironment = "sandbox" | "production";

export type TransportKind = "stdio" | "http";

/**
 * Process-wide settings, built once at startup by `loadConfig` and frozen.
 */
export interface BraintreeMcpConfig {
  readonly merchantId: string;
  readonly publicKey: string;
  readonly privateKey: string;
  readonly environment: BraintreeEnvironment;
  /** Value of the `Braintree-Version` header (YYYY-MM-DD). */
  readonly apiVersion: string;
  /** Per-request upstream timeout in milliseconds. */
  readonly timeoutMs: number;
  readonly transport: TransportKind;
  readonly host: string;
  readonly port: number;
  readonly logLevel: LogLevel;
}
