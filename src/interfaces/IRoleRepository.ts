import type { Role } from "../types";
import type { TraceContext } from "../tracing/traceContext";

export interface IRoleRepository {
    listRoles(ctx: TraceContext): Promise<Role[]>;
}
