import type { TraceContext } from "../tracing/traceContext";

export interface SubsegmentOptions {
    /** "remote" for calls to other services, "aws" for AWS SDK calls. */
    namespace?: string;
}

/**
 * Generic tracing interface for observability.
 * Concrete implementations decide how subsegments are recorded and emitted.
 */
export interface ITracingService {
    /**
     * Executes an async function inside a named subsegment of the context's active entity.
     * The subsegment is closed however the function settles; its outcome is returned unchanged.
     * Implementations must run the function untraced when the context has no active entity.
     */
    withSubsegment<T>(
        ctx: TraceContext,
        name: string,
        fn: (ctx: TraceContext) => Promise<T>,
        options?: SubsegmentOptions,
    ): Promise<T>;
}
