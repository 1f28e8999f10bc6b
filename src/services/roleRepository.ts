import { DynamoDBDocumentClient, ScanCommand } from "@aws-sdk/lib-dynamodb";
import type { ScanCommandInput } from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import type { Role } from "../types";
import type { IRoleRepository } from "../interfaces/IRoleRepository";
import type { ITracingService } from "../interfaces/ITracingService";
import type { TraceContext } from "../tracing/traceContext";
import { captureAwsCall, traceHeaderMiddleware, TRACE_HEADER_MIDDLEWARE_NAME } from "../utils/awsTracing";

export type { IRoleRepository };

const roleItemSchema = z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    permissions: z.array(z.string()).optional(),
});

/** DynamoDB-backed role store. Every Scan page is traced as its own "DynamoDB" subsegment. */
export class DynamoDBRoleRepository implements IRoleRepository {
    constructor(
        private readonly ddb: DynamoDBDocumentClient,
        private readonly tracer: ITracingService,
        private readonly tableName: string,
        private readonly region?: string,
    ) {}

    async listRoles(ctx: TraceContext): Promise<Role[]> {
        const roles: Role[] = [];
        let startKey: ScanCommandInput["ExclusiveStartKey"];

        do {
            const exclusiveStartKey = startKey;
            const output = await captureAwsCall(this.tracer, ctx, {
                service: "DynamoDB",
                operation: "Scan",
                tableName: this.tableName,
                region: this.region,
            }, (traceHeader) => {
                const command = new ScanCommand({ TableName: this.tableName, ExclusiveStartKey: exclusiveStartKey });
                if (traceHeader) {
                    command.middlewareStack.add(traceHeaderMiddleware(traceHeader), {
                        step: "build",
                        name: TRACE_HEADER_MIDDLEWARE_NAME,
                    });
                }
                return this.ddb.send(command);
            });

            for (const item of output.Items ?? []) {
                const parsed = roleItemSchema.safeParse(item);
                if (parsed.success) {
                    roles.push(parsed.data);
                } else {
                    console.warn(`Skipping malformed role item in ${this.tableName}:`, parsed.error.message);
                }
            }
            startKey = output.LastEvaluatedKey;
        } while (startKey);

        return roles;
    }
}
