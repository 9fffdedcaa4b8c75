import type { APIGatewayProxyEventV2, APIGatewayProxyHandlerV2 } from "aws-lambda";
import { BridgeApp, createBridgeApp } from "./app";
import { WebhookRequest } from "./webhook/handler";

// Kept for the lifetime of a warm container; a cold start hydrates before the first batch
let app: BridgeApp | undefined;

export function toWebhookRequest(event: APIGatewayProxyEventV2): WebhookRequest {
  const body =
    event.body !== undefined && event.isBase64Encoded ? Buffer.from(event.body, "base64").toString("utf8") : event.body;

  return {
    method: event.requestContext.http.method,
    path: event.rawPath,
    headers: event.headers ?? {},
    body,
    sourceIp: event.requestContext.http.sourceIp,
  };
}

export const handler: APIGatewayProxyHandlerV2 = async (event) => {
  try {
    app = app ?? createBridgeApp();
    await app.ready;

    const response = await app.handler.handle(toWebhookRequest(event));
    return { statusCode: response.statusCode, body: response.body, headers: response.headers };
  } catch (err) {
    console.error("webhook error", err);
    return { statusCode: 500, body: "error" };
  }
};

// For tests
export function resetApp() {
  app = undefined;
}

export default handler;
