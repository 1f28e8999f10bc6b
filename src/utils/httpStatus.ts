/** Named HTTP status code constants. */
export const HTTP_STATUS = {
    OK: 200,
    NOT_FOUND: 404,
    METHOD_NOT_ALLOWED: 405,
    INTERNAL_SERVER_ERROR: 500,
} as const;
