import crypto from "crypto";

/** Header used to propagate trace context between services. */
export const TRACE_HEADER = "X-Amzn-Trace-Id";

const TRACE_ID_PATTERN = /^1-[0-9a-f]{8}-[0-9a-f]{24}$/;
const ENTITY_ID_PATTERN = /^[0-9a-f]{16}$/;

export interface TraceHeader {
    root: string;
    parent?: string;
    /** undefined means the upstream caller made no sampling decision. */
    sampled?: boolean;
    /** Unrecognised key/value pairs (e.g. Lineage), kept in their original order. */
    extra: [string, string][];
}

export function isValidTraceId(value: string): boolean {
    return TRACE_ID_PATTERN.test(value);
}

export function isValidEntityId(value: string): boolean {
    return ENTITY_ID_PATTERN.test(value);
}

/** Returns a trace id of the form 1-{epoch hex}-{96 random bits}. */
export function generateTraceId(epochSeconds: number = Date.now() / 1000): string {
    const epochHex = Math.floor(epochSeconds).toString(16).padStart(8, "0").slice(-8);
    return `1-${epochHex}-${crypto.randomBytes(12).toString("hex")}`;
}

export function generateEntityId(): string {
    return crypto.randomBytes(8).toString("hex");
}

/**
 * Parses an X-Amzn-Trace-Id header value.
 * Returns null when the header is absent or carries no well-formed Root.
 */
export function parseTraceHeader(raw: string | undefined | null): TraceHeader | null {
    if (!raw) return null;

    let root: string | undefined;
    let parent: string | undefined;
    let sampled: boolean | undefined;
    const extra: [string, string][] = [];

    for (const part of raw.split(";")) {
        const eq = part.indexOf("=");
        if (eq <= 0) continue;
        const key = part.slice(0, eq).trim();
        const value = part.slice(eq + 1).trim();
        switch (key.toLowerCase()) {
            case "root":
                root = value.toLowerCase();
                break;
            case "parent":
                parent = value.toLowerCase();
                break;
            case "sampled":
                if (value === "1") sampled = true;
                else if (value === "0") sampled = false;
                break;
            default:
                extra.push([key, value]);
        }
    }

    if (!root || !isValidTraceId(root)) return null;

    return {
        root,
        ...(parent && isValidEntityId(parent) ? { parent } : {}),
        ...(sampled !== undefined ? { sampled } : {}),
        extra,
    };
}

export function formatTraceHeader(header: TraceHeader): string {
    const parts = [`Root=${header.root}`];
    if (header.parent) parts.push(`Parent=${header.parent}`);
    if (header.sampled !== undefined) parts.push(`Sampled=${header.sampled ? "1" : "0"}`);
    for (const [key, value] of header.extra) {
        parts.push(`${key}=${value}`);
    }
    return parts.join(";");
}
