import type { TraceContext } from "../tracing/traceContext";

export interface IPermissionService {
    getPermissions(ctx: TraceContext, roleName: string): Promise<string[]>;
}
