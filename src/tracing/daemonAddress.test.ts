import { describe, it, expect } from "vitest";
import { parseDaemonAddress } from "./daemonAddress";

describe("parseDaemonAddress", () => {
    it("defaults to 127.0.0.1:2000 for both transports", () => {
        expect(parseDaemonAddress()).toEqual({
            udp: { host: "127.0.0.1", port: 2000 },
            tcp: { host: "127.0.0.1", port: 2000 },
        });
    });

    it("uses a single address for both transports", () => {
        expect(parseDaemonAddress("xray-daemon:3000")).toEqual({
            udp: { host: "xray-daemon", port: 3000 },
            tcp: { host: "xray-daemon", port: 3000 },
        });
    });

    it("accepts separate tcp and udp addresses in either order", () => {
        const expected = {
            udp: { host: "127.0.0.1", port: 2001 },
            tcp: { host: "127.0.0.2", port: 2002 },
        };
        expect(parseDaemonAddress("tcp:127.0.0.2:2002 udp:127.0.0.1:2001")).toEqual(expected);
        expect(parseDaemonAddress("udp:127.0.0.1:2001 tcp:127.0.0.2:2002")).toEqual(expected);
    });

    it.each([
        ["localhost"],
        [":2000"],
        ["localhost:0"],
        ["localhost:70000"],
        ["localhost:abc"],
        ["udp:127.0.0.1:2001"],
        ["udp:127.0.0.1:2001 udp:127.0.0.1:2002"],
        ["tcp:a:1 udp:b:2 udp:c:3"],
    ])("rejects %s", (raw) => {
        expect(() => parseDaemonAddress(raw)).toThrow(`Invalid daemon address: ${raw}`);
    });
});
