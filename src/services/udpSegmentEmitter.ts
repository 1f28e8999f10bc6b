import dgram from "dgram";
import type { Socket } from "dgram";
import type { ISegmentEmitter } from "../interfaces/ISegmentEmitter";
import type { Segment, EntityDocument } from "../tracing/segment";
import type { SocketAddress } from "../tracing/daemonAddress";

export type { ISegmentEmitter };

const PROTOCOL_HEADER = JSON.stringify({ format: "json", version: 1 });

/** Largest UDP payload over IPv4 (65535 minus the IP and UDP headers). */
export const MAX_PACKET_BYTES = 65_507;

function frame(doc: EntityDocument): string {
    return `${PROTOCOL_HEADER}\n${JSON.stringify(doc)}`;
}

/**
 * Sends closed, sampled segments to the local daemon over UDP.
 * Emission is fire-and-forget: failures are logged and never reach the caller.
 */
export class UdpSegmentEmitter implements ISegmentEmitter {
    private socket: Socket | undefined;

    constructor(
        private readonly address: SocketAddress,
        socket?: Socket,
        private readonly maxPacketBytes: number = MAX_PACKET_BYTES,
    ) {
        this.socket = socket;
    }

    emit(segment: Segment): void {
        if (!segment.sampled || !segment.isClosed) return;
        try {
            for (const packet of this.packetsFor(segment)) {
                this.send(packet);
            }
        } catch (error) {
            console.error(`Failed to emit segment "${segment.name}":`, error instanceof Error ? error.message : String(error));
        }
    }

    /** Releases the socket; a later emit opens a new one. */
    close(): void {
        this.socket?.close();
        this.socket = undefined;
    }

    private packetsFor(segment: Segment): string[] {
        const whole = frame(segment.toDocument());
        if (Buffer.byteLength(whole, "utf8") <= this.maxPacketBytes) return [whole];

        // Too large for one datagram: stream each child, then the segment without them.
        const packets: string[] = [];
        for (const child of segment.subsegments) {
            const packet = frame(child.toStreamDocument());
            if (Buffer.byteLength(packet, "utf8") > this.maxPacketBytes) {
                console.error(`Dropping subsegment "${child.name}" of segment "${segment.name}": exceeds ${this.maxPacketBytes} bytes`);
                continue;
            }
            packets.push(packet);
        }
        const doc = segment.toDocument();
        delete doc.subsegments;
        const head = frame(doc);
        if (Buffer.byteLength(head, "utf8") > this.maxPacketBytes) {
            console.error(`Dropping segment "${segment.name}": exceeds ${this.maxPacketBytes} bytes`);
        } else {
            packets.push(head);
        }
        return packets;
    }

    private send(packet: string): void {
        const socket = this.socket ?? this.openSocket();
        socket.send(packet, this.address.port, this.address.host, (error) => {
            if (error) {
                console.error("Failed to send segment to daemon:", error.message);
            }
        });
    }

    private openSocket(): Socket {
        const socket = dgram.createSocket("udp4");
        // The socket must not keep the process alive.
        socket.unref();
        socket.on("error", (error) => {
            console.error("Daemon socket error:", error.message);
        });
        this.socket = socket;
        return socket;
    }
}
