export interface Role {
    name: string;
    description?: string;
    permissions?: string[];
}

export interface RoleDetail {
    name: string;
    description: string;
    permissionCount: number;
    summary: string;
}

export type GetRolesOutcome = { kind: "ok"; roles: RoleDetail[] };

export type GetRolePermissionsOutcome =
    | { kind: "found"; role: string; permissions: string[] }
    | { kind: "not_found"; role: string };

/** Framework-agnostic HTTP response returned by RolesRouter. */
export interface HttpResponse {
    statusCode: number;
    headers?: Record<string, string>;
    body: string;
}

export interface HttpRequestOptions {
    method?: string;
    headers?: Record<string, string>;
    body?: unknown;
}

export interface HttpClientResponse {
    status: number;
    body: unknown;
}
