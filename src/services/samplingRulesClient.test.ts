import { describe, it, expect, vi, afterEach } from "vitest";
import type { Mock } from "vitest";
import { DaemonSamplingRulesClient, refreshSamplingRules, toLocalRules } from "./samplingRulesClient";
import { LocalSampler, DEFAULT_SAMPLING_RULES } from "./localSampler";
import type { HttpClient } from "../utils/http";

const ADDRESS = { host: "127.0.0.1", port: 2000 };

function rule(name: string, priority: number, overrides: Record<string, unknown> = {}) {
    return {
        SamplingRule: {
            RuleName: name,
            Priority: priority,
            FixedRate: 0.1,
            ReservoirSize: 2,
            ServiceName: "*",
            Host: "*",
            HTTPMethod: "*",
            URLPath: "*",
            ResourceARN: "*",
            Version: 1,
            ...overrides,
        },
    };
}

describe("toLocalRules", () => {
    it("orders by priority then name and lifts the Default rule", () => {
        const rules = toLocalRules([
            { RuleName: "b", Priority: 5, FixedRate: 0.5, ReservoirSize: 1, ServiceName: "*", Host: "*", HTTPMethod: "*", URLPath: "/b" },
            { RuleName: "Default", Priority: 10000, FixedRate: 0.05, ReservoirSize: 1, ServiceName: "*", Host: "*", HTTPMethod: "*", URLPath: "*" },
            { RuleName: "a", Priority: 5, FixedRate: 1, ReservoirSize: 0, ServiceName: "GetRoles", Host: "*", HTTPMethod: "GET", URLPath: "/a" },
        ]);
        expect(rules.rules.map((r) => r.description)).toEqual(["a", "b"]);
        expect(rules.rules[0]).toEqual({
            description: "a",
            service_name: "GetRoles",
            host: "*",
            http_method: "GET",
            url_path: "/a",
            fixed_target: 0,
            rate: 1,
        });
        expect(rules.default).toEqual({ fixed_target: 1, rate: 0.05 });
    });

    it("keeps the built-in default when no Default rule is present", () => {
        expect(toLocalRules([]).default).toEqual(DEFAULT_SAMPLING_RULES.default);
    });
});

describe("DaemonSamplingRulesClient", () => {
    let httpClient: Mock<HttpClient>;

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("posts to the daemon proxy and follows pagination", async () => {
        httpClient = vi.fn<HttpClient>()
            .mockResolvedValueOnce({ status: 200, body: { SamplingRuleRecords: [rule("roles", 1, { URLPath: "/roles" })], NextToken: "page-2" } })
            .mockResolvedValueOnce({ status: 200, body: { SamplingRuleRecords: [rule("Default", 10000)] } });

        const rules = await new DaemonSamplingRulesClient(ADDRESS, httpClient).getSamplingRules();

        expect(httpClient).toHaveBeenNthCalledWith(1, "http://127.0.0.1:2000/GetSamplingRules", { method: "POST", body: {} });
        expect(httpClient).toHaveBeenNthCalledWith(2, "http://127.0.0.1:2000/GetSamplingRules", { method: "POST", body: { NextToken: "page-2" } });
        expect(rules.rules).toHaveLength(1);
        expect(rules.rules[0].url_path).toBe("/roles");
        expect(rules.default).toEqual({ fixed_target: 2, rate: 0.1 });
    });

    it("rejects a malformed response", async () => {
        httpClient = vi.fn<HttpClient>().mockResolvedValue({ status: 200, body: { SamplingRuleRecords: [{ SamplingRule: { RuleName: 1 } }] } });
        await expect(new DaemonSamplingRulesClient(ADDRESS, httpClient).getSamplingRules())
            .rejects.toThrow("Unexpected GetSamplingRules response");
    });

    it("refresh replaces the sampler rules", async () => {
        httpClient = vi.fn<HttpClient>().mockResolvedValue({ status: 200, body: { SamplingRuleRecords: [rule("Default", 10000)] } });
        const sampler = new LocalSampler();

        await expect(refreshSamplingRules(new DaemonSamplingRulesClient(ADDRESS, httpClient), sampler)).resolves.toBe(true);
        expect(sampler.currentRules.default).toEqual({ fixed_target: 2, rate: 0.1 });
    });

    it("refresh keeps the previous rules when the daemon is unreachable", async () => {
        const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
        httpClient = vi.fn<HttpClient>().mockRejectedValue(new Error("connect ECONNREFUSED 127.0.0.1:2000"));
        const sampler = new LocalSampler();

        await expect(refreshSamplingRules(new DaemonSamplingRulesClient(ADDRESS, httpClient), sampler)).resolves.toBe(false);
        expect(sampler.currentRules).toBe(DEFAULT_SAMPLING_RULES);
        expect(errorSpy).toHaveBeenCalledWith(
            "Failed to refresh sampling rules; keeping current rules:",
            "connect ECONNREFUSED 127.0.0.1:2000",
        );
    });
});
