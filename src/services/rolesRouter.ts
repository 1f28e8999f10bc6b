import type { IHttpRequest } from "../interfaces/IHttpRequest";
import type { IRolesService } from "../interfaces/IRolesService";
import type { HttpResponse } from "../types";
import type { TraceContext } from "../tracing/traceContext";
import { HTTP_STATUS } from "../utils/httpStatus";
import type { RequestHandler, TracingMiddleware } from "./tracingMiddleware";

function jsonResponse(statusCode: number, body: object): HttpResponse {
    return { statusCode, body: JSON.stringify(body) };
}

function errorResponse(e: unknown): HttpResponse {
    return jsonResponse(HTTP_STATUS.INTERNAL_SERVER_ERROR, { ok: false, error: e instanceof Error ? e.message : String(e) });
}

/**
 * Framework-agnostic request dispatcher.
 * Each route is traced under its own segment name; unmatched requests are not traced.
 */
export class RolesRouter {
    private readonly getRolesRoute: RequestHandler;
    private readonly getRolePermissionsRoute: RequestHandler;

    constructor(private readonly service: IRolesService, tracing: TracingMiddleware) {
        this.getRolesRoute = tracing.named("GetRoles", (_request, ctx) => this.getRoles(ctx));
        this.getRolePermissionsRoute = tracing.named("GetRolePermissions", (request, ctx) => this.getRolePermissions(request, ctx));
    }

    async handle(request: IHttpRequest, ctx?: TraceContext): Promise<HttpResponse> {
        const path = request.getRawPath().replace(/\/+$/, "");
        const isRoles = path === "/roles";
        const roleParam = request.getRoleParam();

        if (!isRoles && !roleParam) {
            return jsonResponse(HTTP_STATUS.NOT_FOUND, { ok: false, error: "not_found" });
        }
        if (request.getMethod().toUpperCase() !== "GET") {
            return jsonResponse(HTTP_STATUS.METHOD_NOT_ALLOWED, { ok: false, error: "method_not_allowed" });
        }

        // GET /roles
        if (isRoles) {
            return this.getRolesRoute(request, ctx);
        }
        // GET /roles/{name}/permissions
        return this.getRolePermissionsRoute(request, ctx);
    }

    private async getRoles(ctx: TraceContext): Promise<HttpResponse> {
        try {
            const outcome = await this.service.getRoles(ctx);
            return jsonResponse(HTTP_STATUS.OK, { ok: true, count: outcome.roles.length, roles: outcome.roles });
        } catch (e) {
            return errorResponse(e);
        }
    }

    private async getRolePermissions(request: IHttpRequest, ctx: TraceContext): Promise<HttpResponse> {
        const roleName = request.getRoleParam();
        if (!roleName) {
            return jsonResponse(HTTP_STATUS.NOT_FOUND, { ok: false, error: "not_found" });
        }
        try {
            const outcome = await this.service.getRolePermissions(ctx, roleName);
            if (outcome.kind === "not_found") {
                return jsonResponse(HTTP_STATUS.NOT_FOUND, { ok: false, error: "role_not_found", role: outcome.role });
            }
            return jsonResponse(HTTP_STATUS.OK, { ok: true, role: outcome.role, permissions: outcome.permissions });
        } catch (e) {
            return errorResponse(e);
        }
    }
}
