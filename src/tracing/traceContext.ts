import type { TraceEntity } from "./segment";
import { formatTraceHeader } from "./traceHeader";

/**
 * Tracing state carried explicitly through a call chain.
 * Each request gets its own context; nothing is shared between requests.
 */
export interface TraceContext {
    /** The segment or subsegment new work should attach to. */
    readonly entity?: TraceEntity;
    /** Aborts when the originating request is cancelled or times out. */
    readonly signal?: AbortSignal;
}

export const EMPTY_TRACE_CONTEXT: TraceContext = Object.freeze({});

export function contextWithEntity(ctx: TraceContext, entity: TraceEntity): TraceContext {
    return { ...ctx, entity };
}

/**
 * Header value for a downstream call made from the active entity,
 * or undefined when the context carries no entity.
 */
export function downstreamTraceHeader(ctx: TraceContext): string | undefined {
    const { entity } = ctx;
    if (!entity) return undefined;
    return formatTraceHeader({
        root: entity.segment.traceId,
        parent: entity.id,
        sampled: entity.segment.sampled,
        extra: [],
    });
}
