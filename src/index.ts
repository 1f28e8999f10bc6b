import type { APIGatewayProxyEventV2, APIGatewayProxyEvent, APIGatewayProxyResult, Context } from "aws-lambda";
import { loadConfig } from "./config";
import { createRolesApp } from "./container";
import { LambdaHttpRequest, toLambdaResult } from "./adapters/lambdaAdapter";

/** Time kept back from the Lambda deadline so open subsegments can still be closed. */
const DEADLINE_MARGIN_MS = 500;

const app = createRolesApp(loadConfig(process.env));

export const handler = async (
    event: APIGatewayProxyEventV2 | APIGatewayProxyEvent,
    context: Context,
): Promise<APIGatewayProxyResult> => {
    await app.ready;
    const signal = AbortSignal.timeout(Math.max(context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS, 1));
    const response = await app.router.handle(new LambdaHttpRequest(event), { signal });
    return toLambdaResult(response);
};
