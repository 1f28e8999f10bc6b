import { z } from "zod";
import type { HttpClient } from "../utils/http";
import type { SocketAddress } from "../tracing/daemonAddress";
import type { LocalSampler, SamplingRule, SamplingRules } from "./localSampler";
import { DEFAULT_SAMPLING_RULES } from "./localSampler";

const DEFAULT_RULE_NAME = "Default";
const MAX_PAGES = 10;

const centralizedRuleSchema = z.object({
    RuleName: z.string(),
    Priority: z.number().int(),
    FixedRate: z.number().min(0).max(1),
    ReservoirSize: z.number().int().nonnegative(),
    ServiceName: z.string().default("*"),
    Host: z.string().default("*"),
    HTTPMethod: z.string().default("*"),
    URLPath: z.string().default("*"),
});

const getSamplingRulesResponseSchema = z.object({
    SamplingRuleRecords: z.array(z.object({ SamplingRule: centralizedRuleSchema })).default([]),
    NextToken: z.string().nullish(),
});

export type CentralizedSamplingRule = z.infer<typeof centralizedRuleSchema>;

/** Converts centralized rules to local ones, ordered by priority then name. */
export function toLocalRules(centralized: CentralizedSamplingRule[]): SamplingRules {
    const ordered = [...centralized].sort(
        (a, b) => a.Priority - b.Priority || a.RuleName.localeCompare(b.RuleName),
    );
    const fallback = ordered.find((r) => r.RuleName === DEFAULT_RULE_NAME);
    const rules: SamplingRule[] = ordered
        .filter((r) => r.RuleName !== DEFAULT_RULE_NAME)
        .map((r) => ({
            description: r.RuleName,
            service_name: r.ServiceName,
            host: r.Host,
            http_method: r.HTTPMethod,
            url_path: r.URLPath,
            fixed_target: r.ReservoirSize,
            rate: r.FixedRate,
        }));
    return {
        version: 2,
        rules,
        default: fallback
            ? { fixed_target: fallback.ReservoirSize, rate: fallback.FixedRate }
            : DEFAULT_SAMPLING_RULES.default,
    };
}

/** Fetches centralized sampling rules through the daemon's TCP proxy. */
export class DaemonSamplingRulesClient {
    constructor(
        private readonly address: SocketAddress,
        private readonly httpClient: HttpClient,
    ) {}

    async getSamplingRules(): Promise<SamplingRules> {
        const url = `http://${this.address.host}:${this.address.port}/GetSamplingRules`;
        const collected: CentralizedSamplingRule[] = [];
        let nextToken: string | undefined;

        for (let page = 0; page < MAX_PAGES; page++) {
            const { body } = await this.httpClient(url, {
                method: "POST",
                body: nextToken ? { NextToken: nextToken } : {},
            });
            const result = getSamplingRulesResponseSchema.safeParse(body);
            if (!result.success) {
                throw new Error(`Unexpected GetSamplingRules response: ${result.error.message}`);
            }
            collected.push(...result.data.SamplingRuleRecords.map((record) => record.SamplingRule));
            nextToken = result.data.NextToken ?? undefined;
            if (!nextToken) break;
        }
        return toLocalRules(collected);
    }
}

/**
 * Replaces the sampler's rules with the daemon's current rules.
 * On failure the previous rules stay in effect and false is returned.
 */
export async function refreshSamplingRules(client: DaemonSamplingRulesClient, sampler: LocalSampler): Promise<boolean> {
    try {
        sampler.replaceRules(await client.getSamplingRules());
        return true;
    } catch (error) {
        console.error("Failed to refresh sampling rules; keeping current rules:", error instanceof Error ? error.message : String(error));
        return false;
    }
}
