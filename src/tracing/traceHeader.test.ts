import { describe, it, expect } from "vitest";
import {
    parseTraceHeader,
    formatTraceHeader,
    generateTraceId,
    generateEntityId,
    isValidTraceId,
    isValidEntityId,
} from "./traceHeader";

const ROOT = "1-5759e988-bd862e3fe1be46a994272793";
const PARENT = "53995c3f42cd8ad8";

describe("parseTraceHeader", () => {
    it("parses root, parent and sampling decision", () => {
        expect(parseTraceHeader(`Root=${ROOT};Parent=${PARENT};Sampled=1`)).toEqual({
            root: ROOT,
            parent: PARENT,
            sampled: true,
            extra: [],
        });
    });

    it("accepts keys in any case and order with surrounding whitespace", () => {
        const header = parseTraceHeader(" sampled=0 ; root = 1-5759E988-BD862E3FE1BE46A994272793 ");
        expect(header?.root).toBe(ROOT);
        expect(header?.sampled).toBe(false);
        expect(header?.parent).toBeUndefined();
    });

    it("leaves sampled undefined when the caller deferred the decision", () => {
        const header = parseTraceHeader(`Root=${ROOT};Sampled=?`);
        expect(header).not.toBeNull();
        expect(header?.sampled).toBeUndefined();
    });

    it("keeps unrecognised keys in order", () => {
        const header = parseTraceHeader(`Root=${ROOT};Lineage=a87bd80c:0;Self=1-abc`);
        expect(header?.extra).toEqual([["Lineage", "a87bd80c:0"], ["Self", "1-abc"]]);
    });

    it("drops a malformed parent but keeps the root", () => {
        const header = parseTraceHeader(`Root=${ROOT};Parent=not-an-id`);
        expect(header?.root).toBe(ROOT);
        expect(header?.parent).toBeUndefined();
    });

    it.each([
        [undefined],
        [null],
        [""],
        ["garbage"],
        [`Parent=${PARENT};Sampled=1`],
        ["Root=1-xyz-123;Sampled=1"],
        ["Root=2-5759e988-bd862e3fe1be46a994272793"],
    ])("returns null for %s", (raw) => {
        expect(parseTraceHeader(raw)).toBeNull();
    });
});

describe("formatTraceHeader", () => {
    it("writes root, parent, sampled and extra keys", () => {
        expect(formatTraceHeader({ root: ROOT, parent: PARENT, sampled: true, extra: [["Lineage", "a87bd80c:0"]] }))
            .toBe(`Root=${ROOT};Parent=${PARENT};Sampled=1;Lineage=a87bd80c:0`);
    });

    it("omits parent and sampled when absent", () => {
        expect(formatTraceHeader({ root: ROOT, extra: [] })).toBe(`Root=${ROOT}`);
    });

    it("writes Sampled=0 for an unsampled trace", () => {
        expect(formatTraceHeader({ root: ROOT, sampled: false, extra: [] })).toBe(`Root=${ROOT};Sampled=0`);
    });
});

describe("id generation", () => {
    it("embeds the epoch seconds in hex", () => {
        const id = generateTraceId(1465510280.75);
        expect(id).toMatch(/^1-5759e988-[0-9a-f]{24}$/);
        expect(isValidTraceId(id)).toBe(true);
    });

    it("generates 16 hex character entity ids", () => {
        const id = generateEntityId();
        expect(id).toMatch(/^[0-9a-f]{16}$/);
        expect(isValidEntityId(id)).toBe(true);
    });

    it("generates distinct trace ids", () => {
        expect(generateTraceId(1)).not.toBe(generateTraceId(1));
    });
});
