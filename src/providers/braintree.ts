import type { BraintreeEnvironment, BraintreeMcpConfig } from "../types/config.js";
import {
  BraintreeEndpoint,
  DEFAULT_API_VERSION,
  SERVER_NAME,
  SERVER_VERSION,
} from "../utils/constants.js";
import { BaseGraphQLProvider, type ProviderOptions } from "./base.js";

export interface BraintreeProviderOpts extends ProviderOptions {
  publicKey: string;
  privateKey: string;
  environment?: BraintreeEnvironment;
  apiVersion?: string;
}

/**
 * Braintree GraphQL API.
 *
 * Authenticates every request with HTTP Basic auth over the public/private key
 * pair and pins the schema with the `Braintree-Version` header.
 */
export class BraintreeProvider extends BaseGraphQLProvider {
  private readonly authorization: string;
  private readonly environment: BraintreeEnvironment;
  private readonly apiVersion: string;

  constructor(opts: BraintreeProviderOpts) {
    super(opts);

    if (!opts.publicKey || !opts.privateKey) {
      throw new Error("[BraintreeProvider] publicKey and privateKey are required");
    }

    this.authorization = `Basic ${Buffer.from(`${opts.publicKey}:${opts.privateKey}`).toString("base64")}`;
    this.environment = opts.environment ?? "sandbox";
    this.apiVersion = opts.apiVersion ?? DEFAULT_API_VERSION;

    this.logger.debug(`[BraintreeProvider] ready (${this.environment}, version ${this.apiVersion})`);
  }

  get endpoint(): string {
    return BraintreeEndpoint[this.environment];
  }

  protected override buildHeaders(): Record<string, string> {
    return {
      Authorization: this.authorization,
      "Braintree-Version": this.apiVersion,
      "Content-Type": "application/json",
      Accept: "application/json",
      "User-Agent": `${SERVER_NAME}/${SERVER_VERSION}`,
    };
  }
}

/**
 * Build the provider from the startup configuration.
 */
export function createBraintreeProvider(
  config: BraintreeMcpConfig,
  opts: ProviderOptions = {}
): BraintreeProvider {
  return new BraintreeProvider({
    publicKey: config.publicKey,
    privateKey: config.privateKey,
    environment: config.environment,
    apiVersion: config.apiVersion,
    timeoutMs: config.timeoutMs,
    ...opts,
  });
}
