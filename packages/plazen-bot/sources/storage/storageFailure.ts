import { RelayError } from "../engine/relayError.js";

/**
 * Wraps a PostgREST error or a thrown transport failure into a backend_unavailable RelayError.
 */
export function storageFailure(operation: string, cause: unknown): RelayError {
    const detail = failureDetail(cause);
    return new RelayError("backend_unavailable", `${operation} failed: ${detail}`, { cause });
}

function failureDetail(cause: unknown): string {
    if (!cause || typeof cause !== "object") {
        return "unknown error";
    }
    const message =
        "message" in cause && typeof cause.message === "string" && cause.message.length > 0
            ? cause.message
            : "unknown error";
    const code = "code" in cause && typeof cause.code === "string" && cause.code.length > 0 ? ` (${cause.code})` : "";
    return `${message}${code}`;
}

/**
 * Awaits a PostgREST request and returns its rows, turning both error responses and rejections into RelayError.
 */
export async function storageRun<T>(
    operation: string,
    request: PromiseLike<{ data: T | null; error: unknown }>
): Promise<T | null> {
    let response: { data: T | null; error: unknown };
    try {
        response = await request;
    } catch (error) {
        throw storageFailure(operation, error);
    }
    if (response.error) {
        throw storageFailure(operation, response.error);
    }
    return response.data;
}
