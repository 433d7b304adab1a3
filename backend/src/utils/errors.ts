/**
 * Error types shared by the slskd client, the batcher and the importer.
 */

/**
 * Raised for any failed exchange with the slskd HTTP API: non-2xx responses,
 * bodies that are not JSON, and transport failures. Transport failures and
 * timeouts carry status 0.
 */
export class SlskdApiError extends Error {
    readonly status: number;
    readonly rawMessage: string;

    constructor(status: number, message: string) {
        super(`slskd API error (${status}): ${message}`);
        this.name = "SlskdApiError";
        this.status = status;
        this.rawMessage = message;
    }

    get isNotFound(): boolean {
        return this.status === 404;
    }

    get isRetryable(): boolean {
        return this.status === 0 || this.status === 429 || this.status >= 500;
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

export class InvalidSourceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "InvalidSourceError";
    }
}

/** A requested import target that falls outside the library root */
export class InvalidTargetError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "InvalidTargetError";
    }
}

/**
 * Anything that is not an API error (DNS failure inside a dependency,
 * unexpected throw) is treated as transient.
 */
export function isRetryableError(error: unknown): boolean {
    if (error instanceof SlskdApiError) {
        return error.isRetryable;
    }
    return true;
}

export function errorMessage(error: unknown): string {
    if (error instanceof SlskdApiError) {
        return error.rawMessage;
    }
    return error instanceof Error ? error.message : String(error);
}

/** Status a route handler answers with when `error` reaches it */
export function httpStatusFor(error: unknown): number {
    if (error instanceof SlskdApiError) return 502;
    if (error instanceof InvalidSourceError || error instanceof InvalidTargetError) return 400;
    return 500;
}
