import { readFile } from "fs/promises";
import { z } from "zod";
import type { ISampler, SamplingRequest } from "../interfaces/ISampler";
import { systemClock } from "../tracing/segment";
import type { Clock } from "../tracing/segment";

export type { ISampler, SamplingRequest };

// ── Schema ───────────────────────────────────────────────────────────────────

const defaultRuleSchema = z.object({
    fixed_target: z.number().int().nonnegative(),
    rate: z.number().min(0).max(1),
});

const ruleSchema = defaultRuleSchema.extend({
    description: z.string().optional(),
    service_name: z.string().default("*"),
    host: z.string().default("*"),
    http_method: z.string().default("*"),
    url_path: z.string().default("*"),
});

const rulesDocumentSchema = z.object({
    version: z.literal(2),
    rules: z.array(ruleSchema).default([]),
    default: defaultRuleSchema,
});

export type DefaultSamplingRule = z.infer<typeof defaultRuleSchema>;
export type SamplingRule = z.infer<typeof ruleSchema>;
export type SamplingRules = z.infer<typeof rulesDocumentSchema>;

/** One trace per second, then 5% of the remaining requests. */
export const DEFAULT_SAMPLING_RULES: SamplingRules = {
    version: 2,
    rules: [],
    default: { fixed_target: 1, rate: 0.05 },
};

export function loadSamplingRules(json: unknown): SamplingRules {
    const result = rulesDocumentSchema.safeParse(json);
    if (!result.success) {
        throw new Error(`Invalid sampling rules: ${result.error.message}`);
    }
    return result.data;
}

export async function readSamplingRulesFile(path: string): Promise<SamplingRules> {
    const raw = await readFile(path, "utf8");
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new Error(`Sampling rules file ${path} is not valid JSON`, { cause: error });
    }
    return loadSamplingRules(json);
}

// ── Matching ─────────────────────────────────────────────────────────────────

/** Matches `value` against a pattern where `*` is any run of characters and `?` one character. */
export function wildcardMatch(pattern: string, value: string | undefined): boolean {
    if (pattern === "*") return true;
    if (value === undefined) return false;
    const source = pattern
        .split("")
        .map((ch) => (ch === "*" ? ".*" : ch === "?" ? "." : ch.replace(/[.+^${}()|[\]\\]/g, "\\$&")))
        .join("");
    return new RegExp(`^${source}$`, "i").test(value);
}

function matches(rule: SamplingRule, request: SamplingRequest): boolean {
    return wildcardMatch(rule.service_name, request.serviceName)
        && wildcardMatch(rule.host, request.host)
        && wildcardMatch(rule.http_method, request.method)
        && wildcardMatch(rule.url_path, request.path);
}

interface Reservoir {
    second: number;
    used: number;
}

/**
 * Reservoir + fixed-rate sampler: each rule samples up to `fixed_target`
 * requests per second, then `rate` of the rest. The first matching rule wins.
 */
export class LocalSampler implements ISampler {
    private rules: SamplingRules;
    private reservoirs = new Map<DefaultSamplingRule, Reservoir>();

    constructor(
        rules: SamplingRules = DEFAULT_SAMPLING_RULES,
        private readonly clock: Clock = systemClock,
        private readonly random: () => number = Math.random,
    ) {
        this.rules = rules;
    }

    get currentRules(): SamplingRules {
        return this.rules;
    }

    replaceRules(rules: SamplingRules): void {
        this.rules = rules;
        this.reservoirs = new Map();
    }

    shouldSample(request: SamplingRequest): boolean {
        const rule = this.rules.rules.find((r) => matches(r, request)) ?? this.rules.default;

        const second = Math.floor(this.clock());
        let reservoir = this.reservoirs.get(rule);
        if (!reservoir || reservoir.second !== second) {
            reservoir = { second, used: 0 };
            this.reservoirs.set(rule, reservoir);
        }
        if (reservoir.used < rule.fixed_target) {
            reservoir.used += 1;
            return true;
        }
        return this.random() < rule.rate;
    }
}
