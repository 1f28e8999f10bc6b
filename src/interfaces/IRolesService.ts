import type { GetRolesOutcome, GetRolePermissionsOutcome } from "../types";
import type { TraceContext } from "../tracing/traceContext";

export type { GetRolesOutcome, GetRolePermissionsOutcome };

export interface IRolesService {
    getRoles(ctx: TraceContext): Promise<GetRolesOutcome>;
    getRolePermissions(ctx: TraceContext, roleName: string): Promise<GetRolePermissionsOutcome>;
}
