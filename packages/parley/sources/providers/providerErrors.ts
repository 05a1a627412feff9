export type ProviderFailureKind = "network" | "provider" | "schema";

/**
 * Timeout or connection failure; retried with backoff before it surfaces.
 */
export class NetworkError extends Error {
    readonly kind = "network";
    readonly timedOut: boolean;

    constructor(message: string, options?: { timedOut?: boolean; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "NetworkError";
        this.timedOut = options?.timedOut ?? false;
    }
}

/**
 * Structured error envelope returned by a backend. Never retried.
 */
export class ProviderError extends Error {
    readonly kind = "provider";
    readonly type: string | null;
    readonly code: string | null;

    constructor(message: string, options?: { type?: string | null; code?: string | null; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "ProviderError";
        this.type = options?.type ?? null;
        this.code = options?.code ?? null;
    }
}

/**
 * Wire response with missing or unexpected fields.
 */
export class SchemaError extends Error {
    readonly kind = "schema";

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "SchemaError";
    }
}

export type ProviderFailure = NetworkError | ProviderError | SchemaError;

export function providerFailureIs(error: unknown): error is ProviderFailure {
    return error instanceof NetworkError || error instanceof ProviderError || error instanceof SchemaError;
}
