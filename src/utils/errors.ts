/**
 * Raised by `loadConfig` when the environment cannot produce a usable
 * configuration. Fatal at startup.
 */
export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

export interface UpstreamErrorOptions {
    /** HTTP status, when the upstream answered with a non-2xx response. */
    status?: number;
    body?: string;
    cause?: unknown;
}

/**
 * Transport-level failure talking to the GraphQL endpoint: network, DNS, TLS,
 * timeout or a non-2xx status. GraphQL `errors` inside a 2xx body are never
 * turned into this.
 */
export class UpstreamError extends Error {
    readonly status?: number;
    readonly body?: string;

    constructor(message: string, options: UpstreamErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = "UpstreamError";
        this.status = options.status;
        this.body = options.body;
    }
}

/**
 * Best-effort one-line description of anything thrown.
 * An `UpstreamError` message already names its cause, so it is used as is.
 */
export function describeError(err: unknown): string {
    if (err instanceof UpstreamError) {
        return err.message;
    }
    if (err instanceof Error) {
        return err.cause instanceof Error && err.cause.message !== err.message
            ? `${err.message} (${err.cause.message})`
            : err.message;
    }
    return String(err);
}
