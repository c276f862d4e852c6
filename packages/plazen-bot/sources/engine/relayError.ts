export type RelayErrorKind = "backend_unavailable" | "config_invalid";

/**
 * Error raised when the relay cannot complete a request or start up.
 * Expects: kind is stable and drives the user-facing reply.
 */
export class RelayError extends Error {
    readonly kind: RelayErrorKind;

    constructor(kind: RelayErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "RelayError";
        this.kind = kind;
    }
}

export function relayErrorIs(error: unknown, kind?: RelayErrorKind): error is RelayError {
    if (!(error instanceof RelayError)) {
        return false;
    }
    return kind === undefined || error.kind === kind;
}
