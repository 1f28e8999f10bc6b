import type { HttpResponse } from "../types";
import type { IHttpRequest } from "../interfaces/IHttpRequest";
import type { ISampler } from "../interfaces/ISampler";
import type { ISegmentEmitter } from "../interfaces/ISegmentEmitter";
import { Segment, systemClock } from "../tracing/segment";
import type { Clock } from "../tracing/segment";
import { EMPTY_TRACE_CONTEXT, contextWithEntity } from "../tracing/traceContext";
import type { TraceContext } from "../tracing/traceContext";
import { TRACE_HEADER, formatTraceHeader, generateTraceId, parseTraceHeader } from "../tracing/traceHeader";

/** Route handler that receives the context of the request's open segment. */
export type TracedHandler = (request: IHttpRequest, ctx: TraceContext) => Promise<HttpResponse>;

/** Handler as seen by the router; `ctx` carries request-scoped state such as a cancellation signal. */
export type RequestHandler = (request: IHttpRequest, ctx?: TraceContext) => Promise<HttpResponse>;

export interface TracingMiddlewareOptions {
    emitter: ISegmentEmitter;
    sampler: ISampler;
    /** Overrides every route's segment name when set. */
    tracingName?: string;
    origin?: string;
    serviceVersion?: string;
    clock?: Clock;
    idGenerator?: () => string;
}

function requestUrl(request: IHttpRequest): string {
    const path = request.getRawPath();
    const host = request.getHeader("host");
    if (!host) return path;
    const proto = request.getHeader("x-forwarded-proto") ?? "https";
    return `${proto}://${host}${path}`;
}

/**
 * Opens one segment per request, runs the handler with it, and always closes
 * and emits it, whatever the handler does.
 */
export class TracingMiddleware {
    private readonly clock: Clock;

    constructor(private readonly options: TracingMiddlewareOptions) {
        this.clock = options.clock ?? systemClock;
    }

    /** Wraps a handler so its requests are traced under a fixed segment name. */
    named(segmentName: string, handler: TracedHandler): RequestHandler {
        return (request, ctx = EMPTY_TRACE_CONTEXT) => this.trace(segmentName, request, handler, ctx);
    }

    private async trace(
        segmentName: string,
        request: IHttpRequest,
        handler: TracedHandler,
        ctx: TraceContext,
    ): Promise<HttpResponse> {
        const name = this.options.tracingName ?? segmentName;
        const method = request.getMethod().toUpperCase();
        // A malformed header parses to null and is treated as absent.
        const incoming = parseTraceHeader(request.getHeader(TRACE_HEADER));

        const segment = new Segment(name, {
            traceId: incoming?.root ?? generateTraceId(this.clock()),
            parentId: incoming?.parent,
            sampled: incoming?.sampled ?? this.options.sampler.shouldSample({
                serviceName: name,
                host: request.getHeader("host"),
                method,
                path: request.getRawPath(),
            }),
            origin: this.options.origin,
            serviceVersion: this.options.serviceVersion,
            clock: this.clock,
            idGenerator: this.options.idGenerator,
        });

        const forwardedFor = request.getHeader("x-forwarded-for");
        const userAgent = request.getHeader("user-agent");
        const clientIp = forwardedFor ? forwardedFor.split(",")[0].trim() : request.getSourceIp();
        segment.setHttpRequest({
            method,
            url: requestUrl(request),
            ...(userAgent ? { user_agent: userAgent } : {}),
            ...(clientIp ? { client_ip: clientIp } : {}),
            ...(forwardedFor ? { x_forwarded_for: true } : {}),
        });

        try {
            const response = await handler(request, contextWithEntity(ctx, segment));
            segment.setHttpResponse({
                status: response.statusCode,
                content_length: Buffer.byteLength(response.body, "utf8"),
            });
            return {
                ...response,
                headers: {
                    ...response.headers,
                    [TRACE_HEADER]: formatTraceHeader({ root: segment.traceId, sampled: segment.sampled, extra: [] }),
                },
            };
        } catch (error: unknown) {
            segment.setHttpResponse({ status: 500 });
            segment.addError(error);
            throw error;
        } finally {
            segment.close();
            this.options.emitter.emit(segment);
        }
    }
}
