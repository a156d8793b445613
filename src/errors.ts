export type ErrorKind =
    | "initialization"
    | "run"
    | "timeout"
    | "capture"
    | "transcription"
    | "synthesis"
    | "remote";

/**
 * Tagged result returned by every wrapper around an external call.
 */
export type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; kind: ErrorKind; detail: string };

export function ok<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

export function err(kind: ErrorKind, detail: string): Outcome<never> {
    return { ok: false, kind, detail };
}

export class ServiceError extends Error {
    constructor(
        message: string,
        readonly kind: ErrorKind,
        readonly context: string
    ) {
        super(message);
        this.name = "AIServiceError";
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Create standardized error with context
 */
export function createServiceError(
    message: string,
    context: string,
    originalError?: unknown,
    kind: ErrorKind = "remote"
): ServiceError {
    const errorMessage = originalError !== undefined
        ? `${context}: ${message} (${describeError(originalError)})`
        : `${context}: ${message}`;

    return new ServiceError(errorMessage, kind, context);
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === "AbortError" || error.name === "APIUserAbortError");
}
