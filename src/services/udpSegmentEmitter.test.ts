import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock, MockInstance } from "vitest";
import type { Socket } from "dgram";
import { UdpSegmentEmitter, MAX_PACKET_BYTES } from "./udpSegmentEmitter";
import { Segment, MAX_SEGMENT_DOCUMENT_BYTES } from "../tracing/segment";

const TRACE_ID = "1-5759e988-bd862e3fe1be46a994272793";
const ADDRESS = { host: "127.0.0.1", port: 2000 };
const HEADER = '{"format":"json","version":1}\n';

// ── helpers ───────────────────────────────────────────────────────────────────

type SendCallback = (error: Error | null) => void;
type SendFn = (msg: string, port: number, host: string, cb: SendCallback) => void;

function makeSocket(send: Mock<SendFn> = vi.fn<SendFn>()) {
    return { socket: { send, close: vi.fn() } as unknown as Socket, send };
}

function closedSegment(sampled = true): Segment {
    const segment = new Segment("GetRoles", { traceId: TRACE_ID, sampled });
    segment.addNewSubsegment("BuildRolesDetail").close();
    segment.close();
    return segment;
}

function payloads(send: Mock<SendFn>): unknown[] {
    return send.mock.calls.map(([msg]) => {
        expect(msg.startsWith(HEADER)).toBe(true);
        return JSON.parse(msg.slice(HEADER.length));
    });
}

describe("UdpSegmentEmitter", () => {
    let errorSpy: MockInstance<typeof console.error>;

    beforeEach(() => {
        errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("sends the whole tree as one framed datagram", () => {
        const { socket, send } = makeSocket();
        const segment = closedSegment();

        new UdpSegmentEmitter(ADDRESS, socket).emit(segment);

        expect(send).toHaveBeenCalledOnce();
        expect(send.mock.calls[0][1]).toBe(2000);
        expect(send.mock.calls[0][2]).toBe("127.0.0.1");
        expect(payloads(send)).toEqual([segment.toDocument()]);
    });

    it("skips unsampled segments", () => {
        const { socket, send } = makeSocket();
        new UdpSegmentEmitter(ADDRESS, socket).emit(closedSegment(false));
        expect(send).not.toHaveBeenCalled();
    });

    it("skips segments that are still open", () => {
        const { socket, send } = makeSocket();
        new UdpSegmentEmitter(ADDRESS, socket).emit(new Segment("GetRoles", { traceId: TRACE_ID }));
        expect(send).not.toHaveBeenCalled();
    });

    it("streams children separately when the tree is too large", () => {
        const { socket, send } = makeSocket();
        const segment = new Segment("GetRoles", { traceId: TRACE_ID });
        const first = segment.addNewSubsegment("first");
        first.addMetadata("blob", "a".repeat(300));
        first.close();
        const second = segment.addNewSubsegment("second");
        second.addMetadata("blob", "b".repeat(300));
        second.close();
        segment.close();

        new UdpSegmentEmitter(ADDRESS, socket, 700).emit(segment);

        const sent = payloads(send);
        expect(sent).toHaveLength(3);
        expect(sent[0]).toEqual(first.toStreamDocument());
        expect(sent[1]).toEqual(second.toStreamDocument());
        const { subsegments: _children, ...head } = segment.toDocument();
        expect(sent[2]).toEqual(head);
    });

    it("streams a tree that fits the document ceiling but not one datagram", () => {
        const { socket, send } = makeSocket();
        const segment = new Segment("GetRoles", { traceId: TRACE_ID, clock: () => 1_700_000_000 });
        const first = segment.addNewSubsegment("first");
        const second = segment.addNewSubsegment("second");
        first.addMetadata("blob", "a".repeat(32_000));
        second.addMetadata("blob", "");
        const framedSize = () => Buffer.byteLength(`${HEADER}${segment.serialize()}`, "utf8");
        const target = MAX_PACKET_BYTES + 13;
        // Closing swaps "in_progress":true for "end_time":1700000000 on each of the three entities.
        expect(second.addMetadata("blob", "b".repeat(target - 9 - framedSize())).kind).toBe("added");
        first.close();
        second.close();
        segment.close();

        expect(framedSize()).toBe(target);
        expect(segment.serializedSize()).toBeLessThanOrEqual(MAX_SEGMENT_DOCUMENT_BYTES);

        new UdpSegmentEmitter(ADDRESS, socket).emit(segment);

        const sent = payloads(send);
        expect(sent).toHaveLength(3);
        expect(send.mock.calls.every(([msg]) => Buffer.byteLength(msg, "utf8") <= MAX_PACKET_BYTES)).toBe(true);
        expect(sent[0]).toEqual(first.toStreamDocument());
        expect(sent[1]).toEqual(second.toStreamDocument());
    });

    it("drops a child that alone exceeds the packet budget", () => {
        const { socket, send } = makeSocket();
        const segment = new Segment("GetRoles", { traceId: TRACE_ID });
        const huge = segment.addNewSubsegment("huge");
        huge.addMetadata("blob", "c".repeat(1000));
        huge.close();
        segment.close();

        new UdpSegmentEmitter(ADDRESS, socket, 700).emit(segment);

        expect(payloads(send)).toHaveLength(1);
        expect(errorSpy).toHaveBeenCalledWith('Dropping subsegment "huge" of segment "GetRoles": exceeds 700 bytes');
    });

    it("logs send failures instead of throwing", () => {
        const { socket } = makeSocket(vi.fn<SendFn>((_msg, _port, _host, cb) => {
            cb(new Error("ECONNREFUSED"));
        }));
        expect(() => new UdpSegmentEmitter(ADDRESS, socket).emit(closedSegment())).not.toThrow();
        expect(errorSpy).toHaveBeenCalledWith("Failed to send segment to daemon:", "ECONNREFUSED");
    });

    it("logs a socket that throws synchronously", () => {
        const { socket } = makeSocket(vi.fn<SendFn>(() => { throw new Error("Not running"); }));
        expect(() => new UdpSegmentEmitter(ADDRESS, socket).emit(closedSegment())).not.toThrow();
        expect(errorSpy).toHaveBeenCalledWith('Failed to emit segment "GetRoles":', "Not running");
    });
});
