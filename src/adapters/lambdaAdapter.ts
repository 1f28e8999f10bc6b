import type { APIGatewayProxyEventV2, APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda";
import type { HttpResponse } from "../types";
import type { IHttpRequest } from "../interfaces/IHttpRequest";

type ApiGatewayEvent = APIGatewayProxyEventV2 | APIGatewayProxyEvent;

/** Converts a framework-agnostic HttpResponse to an API Gateway result. */
export function toLambdaResult(response: HttpResponse): APIGatewayProxyResult {
    const { headers } = response;
    return {
        statusCode: response.statusCode,
        ...(headers && Object.keys(headers).length > 0 ? { headers: { ...headers } } : {}),
        body: response.body,
    };
}

/** Adapts an APIGateway event to the framework-agnostic IHttpRequest interface. */
export class LambdaHttpRequest implements IHttpRequest {
    constructor(private readonly event: ApiGatewayEvent) {}

    getMethod(): string {
        if ("httpMethod" in this.event) {
            return this.event.httpMethod;
        }
        return this.event.requestContext.http.method;
    }

    getRawPath(): string {
        if ("httpMethod" in this.event) {
            return this.event.path;
        }
        return this.event.rawPath;
    }

    getHeader(name: string): string | undefined {
        const wanted = name.toLowerCase();
        for (const [key, value] of Object.entries(this.event.headers ?? {})) {
            if (key.toLowerCase() === wanted && value !== undefined) {
                return value;
            }
        }
        return undefined;
    }

    getSourceIp(): string | undefined {
        if ("httpMethod" in this.event) {
            return this.event.requestContext?.identity?.sourceIp || undefined;
        }
        return this.event.requestContext.http.sourceIp || undefined;
    }

    getRoleParam(): string | null {
        const match = this.getRawPath().match(/^\/roles\/([^/]+)\/permissions\/?$/);
        if (!match) return null;
        try {
            return decodeURIComponent(match[1]);
        } catch {
            return null;
        }
    }
}
