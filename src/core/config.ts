/**
 * Environment configuration, validated with zod.
 *
 * Read once at startup; the result is frozen and handed to everything that
 * needs it. Nothing downstream reads `process.env` directly.
 */
import { z } from "zod";
import type { BraintreeMcpConfig } from "../types/config.js";
import { ConfigError } from "../utils/errors.js";
import { DEFAULT_API_VERSION, Defaults } from "../utils/constants.js";

const envSchema = z.object({
    BRAINTREE_MERCHANT_ID: z.string(),
    BRAINTREE_PUBLIC_KEY: z.string(),
    BRAINTREE_PRIVATE_KEY: z.string(),

    /** sandbox | production */
    BRAINTREE_ENVIRONMENT: z.enum(["sandbox", "production"]).default("sandbox"),

    BRAINTREE_API_VERSION: z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, "must be a date in YYYY-MM-DD form")
        .default(DEFAULT_API_VERSION),

    BRAINTREE_TIMEOUT_MS: z.coerce.number().int().positive().default(Defaults.TIMEOUT_MS),

    MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),

    MCP_HOST: z.string().default(Defaults.HOST),

    MCP_PORT: z.coerce.number().int().min(0).max(65535).default(Defaults.PORT),

    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default(Defaults.LOG_LEVEL),
});

export type EnvLike = Record<string, string | undefined>;

/**
 * Build the configuration from an environment map (normally `process.env`).
 *
 * Blank values count as unset, so `BRAINTREE_ENVIRONMENT=` falls back to the
 * sandbox default and `BRAINTREE_PRIVATE_KEY=` is reported as missing.
 *
 * @throws ConfigError listing every missing or invalid variable.
 */
export function loadConfig(env: EnvLike): BraintreeMcpConfig {
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        const trimmed = value?.trim();
        if (trimmed) present[key] = trimmed;
    }

    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        );
    }

    const vars = parsed.data;
    return Object.freeze({
        merchantId: vars.BRAINTREE_MERCHANT_ID,
        publicKey: vars.BRAINTREE_PUBLIC_KEY,
        privateKey: vars.BRAINTREE_PRIVATE_KEY,
        environment: vars.BRAINTREE_ENVIRONMENT,
        apiVersion: vars.BRAINTREE_API_VERSION,
        timeoutMs: vars.BRAINTREE_TIMEOUT_MS,
        transport: vars.MCP_TRANSPORT,
        host: vars.MCP_HOST,
        port: vars.MCP_PORT,
        logLevel: vars.LOG_LEVEL,
    });
}
