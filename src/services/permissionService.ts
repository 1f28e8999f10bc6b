import { z } from "zod";
import type { IPermissionService } from "../interfaces/IPermissionService";
import type { TraceContext } from "../tracing/traceContext";
import type { TracedHttpClient } from "./tracedHttpClient";

export type { IPermissionService };

const permissionsResponseSchema = z.object({
    permissions: z.array(z.string()),
});

/** Reads role permissions from the downstream permissions API. */
export class HttpPermissionService implements IPermissionService {
    private readonly baseUrl: string;

    constructor(private readonly httpClient: TracedHttpClient, baseUrl: string) {
        this.baseUrl = baseUrl.replace(/\/+$/, "");
    }

    async getPermissions(ctx: TraceContext, roleName: string): Promise<string[]> {
        const url = `${this.baseUrl}/roles/${encodeURIComponent(roleName)}/permissions`;
        const { body } = await this.httpClient(ctx, url);
        const parsed = permissionsResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new Error(`Unexpected permissions response for role ${roleName}: ${parsed.error.message}`);
        }
        return parsed.data.permissions;
    }
}
