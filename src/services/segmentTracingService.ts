import type { ITracingService, SubsegmentOptions } from "../interfaces/ITracingService";
import type { AttachOutcome, MetadataValue, AnnotationValue, Subsegment } from "../tracing/segment";
import { contextWithEntity } from "../tracing/traceContext";
import type { TraceContext } from "../tracing/traceContext";

export type { ITracingService, SubsegmentOptions };

/** What to do when work is captured without an open segment in its context. */
export type ContextMissingStrategy = "LOG_ERROR" | "IGNORE_ERROR";

export type ContextAttachOutcome = AttachOutcome | { kind: "untraced" };

/** ITracingService backed by the in-process segment model. */
export class SegmentTracingService implements ITracingService {
    constructor(private readonly contextMissing: ContextMissingStrategy = "IGNORE_ERROR") {}

    async withSubsegment<T>(
        ctx: TraceContext,
        name: string,
        fn: (ctx: TraceContext) => Promise<T>,
        options: SubsegmentOptions = {},
    ): Promise<T> {
        let subsegment: Subsegment | undefined;
        if (ctx.entity && !ctx.entity.isClosed) {
            subsegment = ctx.entity.addNewSubsegment(name, options.namespace);
        } else if (this.contextMissing === "LOG_ERROR") {
            console.error(`No open trace entity for subsegment "${name}"; running untraced.`);
        }
        if (!subsegment) {
            return fn(ctx);
        }

        const active = subsegment;
        const { signal } = ctx;
        // A cancelled request must not leave its subsegments open.
        const onAbort = (): void => { active.close({ incomplete: true }); };
        signal?.addEventListener("abort", onAbort, { once: true });
        if (signal?.aborted) onAbort();

        try {
            const result = await fn(contextWithEntity(ctx, active));
            active.close();
            return result;
        } catch (error: unknown) {
            // close({ error }) skips an undefined rejection.
            active.addError(error);
            active.close();
            throw error;
        } finally {
            signal?.removeEventListener("abort", onAbort);
        }
    }
}

/** Attaches metadata to the context's active entity. */
export function addMetadata(
    ctx: TraceContext,
    key: string,
    value: MetadataValue,
    namespace?: string,
): ContextAttachOutcome {
    if (!ctx.entity) return { kind: "untraced" };
    return ctx.entity.addMetadata(key, value, namespace);
}

/** Attaches an indexed annotation to the context's active entity. */
export function addAnnotation(ctx: TraceContext, key: string, value: AnnotationValue): ContextAttachOutcome {
    if (!ctx.entity) return { kind: "untraced" };
    return ctx.entity.addAnnotation(key, value);
}
