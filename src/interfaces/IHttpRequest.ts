export interface IHttpRequest {
    /** Returns the HTTP method (e.g. "GET", "POST"). */
    getMethod(): string;
    /** Returns the raw request path (e.g. "/roles/admin/permissions"). */
    getRawPath(): string;
    /** Returns a request header by case-insensitive name. */
    getHeader(name: string): string | undefined;
    /** Returns the address of the calling client, when known. */
    getSourceIp(): string | undefined;
    /**
     * Extracts the role name from paths matching /roles/{name}/permissions.
     * Returns null when the path does not match.
     */
    getRoleParam(): string | null;
}
