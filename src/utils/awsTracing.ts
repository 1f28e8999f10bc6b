import { HttpRequest } from "@smithy/protocol-http";
import type { BuildMiddleware, MetadataBearer } from "@smithy/types";
import type { ITracingService } from "../interfaces/ITracingService";
import type { TraceContext } from "../tracing/traceContext";
import { downstreamTraceHeader } from "../tracing/traceContext";
import { TRACE_HEADER } from "../tracing/traceHeader";
import { Subsegment } from "../tracing/segment";

export const TRACE_HEADER_MIDDLEWARE_NAME = "traceHeaderMiddleware";

export interface AwsCallTarget {
    /** Subsegment name, e.g. "DynamoDB". */
    service: string;
    operation: string;
    region?: string;
    tableName?: string;
}

interface CallMetadata {
    httpStatusCode?: number;
    requestId?: string;
    attempts?: number;
}

function callMetadataOf(value: unknown): CallMetadata {
    if (typeof value !== "object" || value === null || !("$metadata" in value)) return {};
    const metadata = value.$metadata;
    if (typeof metadata !== "object" || metadata === null) return {};
    const result: CallMetadata = {};
    if ("httpStatusCode" in metadata && typeof metadata.httpStatusCode === "number") {
        result.httpStatusCode = metadata.httpStatusCode;
    }
    if ("requestId" in metadata && typeof metadata.requestId === "string") {
        result.requestId = metadata.requestId;
    }
    if ("attempts" in metadata && typeof metadata.attempts === "number") {
        result.attempts = metadata.attempts;
    }
    return result;
}

/** Build-step middleware that stamps the trace header on the outgoing AWS request. */
export function traceHeaderMiddleware<Input extends object, Output extends object>(
    traceHeader: string,
): BuildMiddleware<Input, Output> {
    return (next) => async (args) => {
        if (HttpRequest.isInstance(args.request)) {
            args.request.headers[TRACE_HEADER] = traceHeader;
        }
        return next(args);
    };
}

/**
 * Runs one AWS SDK call inside an "aws" subsegment named after the service.
 * `send` receives the trace header to stamp on the request, when tracing is active.
 */
export function captureAwsCall<Output extends MetadataBearer>(
    tracer: ITracingService,
    ctx: TraceContext,
    target: AwsCallTarget,
    send: (traceHeader: string | undefined) => Promise<Output>,
): Promise<Output> {
    return tracer.withSubsegment(ctx, target.service, async (callCtx) => {
        const subsegment = callCtx.entity instanceof Subsegment ? callCtx.entity : undefined;
        const record = ({ requestId, attempts }: CallMetadata): void => {
            subsegment?.setAws({
                operation: target.operation,
                ...(target.region ? { region: target.region } : {}),
                ...(target.tableName ? { table_name: target.tableName } : {}),
                ...(requestId ? { request_id: requestId } : {}),
                ...(attempts !== undefined ? { retries: Math.max(attempts - 1, 0) } : {}),
            });
        };

        try {
            const output = await send(downstreamTraceHeader(callCtx));
            const metadata = callMetadataOf(output);
            record(metadata);
            const { httpStatusCode } = metadata;
            if (httpStatusCode !== undefined) subsegment?.setHttpResponse({ status: httpStatusCode });
            return output;
        } catch (error: unknown) {
            const metadata = callMetadataOf(error);
            record(metadata);
            const { httpStatusCode } = metadata;
            if (httpStatusCode !== undefined) {
                subsegment?.setHttpResponse({ status: httpStatusCode });
                subsegment?.addError(error, { remote: true, status: httpStatusCode });
            } else {
                subsegment?.addError(error);
            }
            throw error;
        }
    }, { namespace: "aws" });
}
