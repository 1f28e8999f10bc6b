import { z } from "zod";
import { DEFAULT_DAEMON_ADDRESS } from "./tracing/daemonAddress";

// ── Schema ───────────────────────────────────────────────────────────────────

const configSchema = z.object({
    rolesTable: z.string().min(1).optional(),
    permissionsApiUrl: z.string().url().optional(),
    permissionsApiTimeoutMs: z.coerce.number().int().positive().default(3_000),
    region: z.string().min(1).optional(),
    daemonAddress: z.string().min(1).default(DEFAULT_DAEMON_ADDRESS),
    tracingName: z.string().min(1).optional(),
    contextMissing: z.enum(["LOG_ERROR", "IGNORE_ERROR"]).default("IGNORE_ERROR"),
    samplingRulesFile: z.string().min(1).optional(),
    centralizedSampling: z.enum(["true", "false"]).default("false").transform((v) => v === "true"),
    segmentOrigin: z.string().min(1).optional(),
    serviceVersion: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Reads and validates service configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const raw = {
        rolesTable: env.ROLES_TABLE,
        permissionsApiUrl: env.PERMISSIONS_API_URL,
        permissionsApiTimeoutMs: env.PERMISSIONS_API_TIMEOUT_MS,
        region: env.AWS_REGION,
        daemonAddress: env.AWS_XRAY_DAEMON_ADDRESS,
        tracingName: env.AWS_XRAY_TRACING_NAME,
        contextMissing: env.AWS_XRAY_CONTEXT_MISSING,
        samplingRulesFile: env.XRAY_SAMPLING_RULES,
        centralizedSampling: env.XRAY_CENTRALIZED_SAMPLING,
        segmentOrigin: env.XRAY_SEGMENT_ORIGIN,
        serviceVersion: env.SERVICE_VERSION,
    };

    // Strip unset and empty values so defaults apply
    const cleaned = Object.fromEntries(
        Object.entries(raw).filter(([, v]) => v !== undefined && v !== ""),
    );

    const result = configSchema.safeParse(cleaned);
    if (!result.success) {
        throw new Error(`Config error: ${result.error.message}`);
    }
    return result.data;
}
