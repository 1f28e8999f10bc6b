import type { HttpClient } from "../utils/http";
import { HttpStatusError } from "../utils/http";
import type { HttpRequestOptions, HttpClientResponse } from "../types";
import type { ITracingService } from "../interfaces/ITracingService";
import type { TraceContext } from "../tracing/traceContext";
import { downstreamTraceHeader } from "../tracing/traceContext";
import { TRACE_HEADER } from "../tracing/traceHeader";

/** HttpClient that takes the caller's trace context with every call. */
export type TracedHttpClient = (
    ctx: TraceContext,
    url: string,
    options?: HttpRequestOptions,
) => Promise<HttpClientResponse>;

/**
 * Wraps an HttpClient so every call is recorded as a named "remote" subsegment
 * and carries the trace header to the downstream service.
 * The wrapped client behaves identically otherwise.
 */
export function captureHttpClient(tracer: ITracingService, name: string, client: HttpClient): TracedHttpClient {
    return (ctx, url, options = {}) => tracer.withSubsegment(ctx, name, async (callCtx) => {
        const { entity } = callCtx;
        entity?.setHttpRequest({ method: (options.method ?? "GET").toUpperCase(), url, traced: true });

        const traceHeader = downstreamTraceHeader(callCtx);
        const headers = traceHeader ? { ...options.headers, [TRACE_HEADER]: traceHeader } : options.headers;

        try {
            const response = await client(url, { ...options, headers });
            entity?.setHttpResponse({ status: response.status });
            return response;
        } catch (error: unknown) {
            if (error instanceof HttpStatusError) {
                entity?.setHttpResponse({ status: error.status });
                entity?.addError(error, { remote: true, status: error.status });
            } else {
                // Timeouts and connection failures never reached the downstream service.
                entity?.addError(error);
            }
            throw error;
        }
    }, { namespace: "remote" });
}
