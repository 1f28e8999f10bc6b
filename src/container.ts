import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { AppConfig } from "./config";
import { parseDaemonAddress } from "./tracing/daemonAddress";
import { createJsonHttpClient } from "./utils/http";
import { SegmentTracingService } from "./services/segmentTracingService";
import { captureHttpClient } from "./services/tracedHttpClient";
import { TracingMiddleware } from "./services/tracingMiddleware";
import { UdpSegmentEmitter } from "./services/udpSegmentEmitter";
import { LocalSampler, readSamplingRulesFile } from "./services/localSampler";
import { DaemonSamplingRulesClient, refreshSamplingRules } from "./services/samplingRulesClient";
import { DynamoDBRoleRepository } from "./services/roleRepository";
import { HttpPermissionService } from "./services/permissionService";
import { RolesService } from "./services/rolesService";
import { RolesRouter } from "./services/rolesRouter";

// Clients are created once at module load to reuse connections across invocations.
const ddb = DynamoDBDocumentClient.from(
    new DynamoDBClient({}), { marshallOptions: { removeUndefinedValues: true } },
);

const SAMPLING_API_TIMEOUT_MS = 2_000;

export interface RolesApp {
    router: RolesRouter;
    sampler: LocalSampler;
    /** Settles once sampling rules are loaded; never rejects. */
    ready: Promise<void>;
}

async function prepareSampling(
    config: AppConfig,
    sampler: LocalSampler,
    rulesClient: DaemonSamplingRulesClient,
): Promise<void> {
    if (config.samplingRulesFile) {
        try {
            sampler.replaceRules(await readSamplingRulesFile(config.samplingRulesFile));
        } catch (error) {
            console.error("Failed to load sampling rules; using defaults:", error instanceof Error ? error.message : String(error));
        }
    }
    if (config.centralizedSampling) {
        await refreshSamplingRules(rulesClient, sampler);
    }
}

/**
 * Wires up all concrete implementations and returns a ready-to-use router.
 * This is the single place where the dependency graph is assembled.
 */
export function createRolesApp(config: AppConfig, client: DynamoDBDocumentClient = ddb): RolesApp {
    if (!config.rolesTable) {
        throw new Error("Missing env: ROLES_TABLE");
    }
    if (!config.permissionsApiUrl) {
        throw new Error("Missing env: PERMISSIONS_API_URL");
    }
    const daemon = parseDaemonAddress(config.daemonAddress);

    const tracer = new SegmentTracingService(config.contextMissing);
    const sampler = new LocalSampler();
    const rulesClient = new DaemonSamplingRulesClient(
        daemon.tcp,
        createJsonHttpClient({ timeoutMs: SAMPLING_API_TIMEOUT_MS }),
    );
    const tracing = new TracingMiddleware({
        emitter: new UdpSegmentEmitter(daemon.udp),
        sampler,
        tracingName: config.tracingName,
        origin: config.segmentOrigin,
        serviceVersion: config.serviceVersion,
    });

    const permissionsClient = captureHttpClient(
        tracer,
        "PermissionsAPI",
        createJsonHttpClient({ timeoutMs: config.permissionsApiTimeoutMs }),
    );
    const service = new RolesService(
        new DynamoDBRoleRepository(client, tracer, config.rolesTable, config.region),
        new HttpPermissionService(permissionsClient, config.permissionsApiUrl),
        tracer,
    );

    return {
        router: new RolesRouter(service, tracing),
        sampler,
        ready: prepareSampling(config, sampler, rulesClient),
    };
}
