export type RecordedRequest = {
    url: URL;
    method: string;
    headers: Headers;
};

export type StorageTestFetch = {
    fetch: typeof fetch;
    requests: RecordedRequest[];
};

/**
 * In-process stand-in for the PostgREST endpoint; responds through `respond` and records every request.
 */
export function storageTestFetch(respond: (request: RecordedRequest) => Response | Promise<Response>): StorageTestFetch {
    const requests: RecordedRequest[] = [];
    const fetchImpl: typeof fetch = async (input, init) => {
        const href = input instanceof Request ? input.url : String(input);
        const request: RecordedRequest = {
            url: new URL(href),
            method: init?.method ?? "GET",
            headers: new Headers(init?.headers)
        };
        requests.push(request);
        return respond(request);
    };
    return { fetch: fetchImpl, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { "content-type": "application/json" }
    });
}
