export interface SocketAddress {
    host: string;
    port: number;
}

export interface DaemonAddress {
    /** Segment documents are sent here. */
    udp: SocketAddress;
    /** Sampling API calls are proxied through here. */
    tcp: SocketAddress;
}

export const DEFAULT_DAEMON_ADDRESS = "127.0.0.1:2000";

function parseSocketAddress(value: string, raw: string): SocketAddress {
    const sep = value.lastIndexOf(":");
    const host = value.slice(0, sep);
    const port = Number(value.slice(sep + 1));
    if (sep <= 0 || !host || !Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new Error(`Invalid daemon address: ${raw}`);
    }
    return { host, port };
}

/**
 * Parses a daemon address. Accepts "host:port", used for both transports, or
 * "tcp:host:port udp:host:port" with the two parts in either order.
 */
export function parseDaemonAddress(raw: string = DEFAULT_DAEMON_ADDRESS): DaemonAddress {
    const value = raw.trim();
    const parts = value.split(/\s+/);

    if (parts.length === 1 && !/^(udp|tcp):/i.test(value)) {
        const address = parseSocketAddress(parts[0], raw);
        return { udp: address, tcp: { ...address } };
    }

    if (parts.length === 2) {
        let udp: SocketAddress | undefined;
        let tcp: SocketAddress | undefined;
        for (const part of parts) {
            const lower = part.toLowerCase();
            if (lower.startsWith("udp:") && !udp) {
                udp = parseSocketAddress(part.slice(4), raw);
            } else if (lower.startsWith("tcp:") && !tcp) {
                tcp = parseSocketAddress(part.slice(4), raw);
            }
        }
        if (udp && tcp) return { udp, tcp };
    }

    throw new Error(`Invalid daemon address: ${raw}`);
}
