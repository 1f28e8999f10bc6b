import type { Role, RoleDetail } from "../types";
import type { IRolesService, GetRolesOutcome, GetRolePermissionsOutcome } from "../interfaces/IRolesService";
import type { IRoleRepository } from "../interfaces/IRoleRepository";
import type { IPermissionService } from "../interfaces/IPermissionService";
import type { ITracingService } from "../interfaces/ITracingService";
import type { TraceContext } from "../tracing/traceContext";
import { addMetadata } from "./segmentTracingService";
import { HttpStatusError } from "../utils/http";

export type { IRolesService, GetRolesOutcome, GetRolePermissionsOutcome };

export const BUILD_ROLES_DETAIL = "BuildRolesDetail";
export const ROLES_BUILT_METADATA_KEY = "No. roles built";

export function buildRoleDetail(role: Role): RoleDetail {
    const description = (role.description ?? "").trim();
    const permissionCount = role.permissions?.length ?? 0;
    return {
        name: role.name,
        description,
        permissionCount,
        summary: `${role.name} (${permissionCount} permission${permissionCount === 1 ? "" : "s"})`,
    };
}

/**
 * Role use cases.
 * Depends only on interfaces so all external I/O can be replaced with test doubles.
 */
export class RolesService implements IRolesService {
    constructor(
        private readonly repository: IRoleRepository,
        private readonly permissions: IPermissionService,
        private readonly tracer: ITracingService,
        private readonly buildDetail: (role: Role) => RoleDetail = buildRoleDetail,
    ) {}

    async getRoles(ctx: TraceContext): Promise<GetRolesOutcome> {
        const roles = await this.repository.listRoles(ctx);

        const details = await this.tracer.withSubsegment(ctx, BUILD_ROLES_DETAIL, async (buildCtx) => {
            const built = roles.map((role) => this.buildDetail(role));
            const outcome = addMetadata(buildCtx, ROLES_BUILT_METADATA_KEY, built.length);
            if (outcome.kind === "rejected") {
                console.warn(`Could not record "${ROLES_BUILT_METADATA_KEY}":`, outcome.error.message);
            }
            return built;
        });

        return { kind: "ok", roles: details };
    }

    async getRolePermissions(ctx: TraceContext, roleName: string): Promise<GetRolePermissionsOutcome> {
        try {
            const permissions = await this.permissions.getPermissions(ctx, roleName);
            return { kind: "found", role: roleName, permissions };
        } catch (e) {
            if (e instanceof HttpStatusError && e.status === 404) {
                return { kind: "not_found", role: roleName };
            }
            throw e;
        }
    }
}
