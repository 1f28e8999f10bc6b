import type { HttpRequestOptions, HttpClientResponse } from "../types";

export type { HttpRequestOptions, HttpClientResponse };

/** Minimal HTTP client type used for dependency injection. */
export type HttpClient = (url: string, options?: HttpRequestOptions) => Promise<HttpClientResponse>;

const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_ERROR_BODY_LENGTH = 1000;

/** Non-2xx response from a downstream service. */
export class HttpStatusError extends Error {
    constructor(
        readonly status: number,
        readonly url: string,
        readonly responseBody: string,
    ) {
        super(`HTTP ${status} from ${url}`);
        this.name = "HttpStatusError";
    }
}

/** The downstream service did not answer within the configured timeout. */
export class HttpTimeoutError extends Error {
    constructor(readonly url: string, readonly timeoutMs: number, options?: { cause?: unknown }) {
        super(`Request to ${url} timed out after ${timeoutMs}ms`, options);
        this.name = "HttpTimeoutError";
    }
}

export interface JsonHttpClientOptions {
    timeoutMs?: number;
    userAgent?: string;
    fetchImpl?: typeof fetch;
}

function parseBody(text: string): unknown {
    try {
        return text ? JSON.parse(text) : null;
    } catch {
        return { raw: text };
    }
}

/** JSON HTTP client with a per-request timeout; throws HttpStatusError on non-2xx responses. */
export function createJsonHttpClient({
    timeoutMs = DEFAULT_TIMEOUT_MS,
    userAgent = "roles-service",
    fetchImpl = fetch,
}: JsonHttpClientOptions = {}): HttpClient {
    return async (url, { method = "GET", headers = {}, body } = {}) => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => { controller.abort(); }, timeoutMs);

        let res: Response;
        try {
            res = await fetchImpl(url, {
                method,
                headers: {
                    Accept: "application/json",
                    "User-Agent": userAgent,
                    ...(body !== undefined ? { "Content-Type": "application/json" } : {}),
                    ...headers,
                },
                body: body !== undefined ? JSON.stringify(body) : undefined,
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === "AbortError") {
                throw new HttpTimeoutError(url, timeoutMs, { cause: error });
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }

        const text = await res.text();
        if (!res.ok) {
            const snippet = text.length > MAX_ERROR_BODY_LENGTH
                ? `${text.slice(0, MAX_ERROR_BODY_LENGTH)}...[truncated]`
                : text;
            throw new HttpStatusError(res.status, url, snippet);
        }
        return { status: res.status, body: parseBody(text) };
    };
}
