import { createHash, timingSafeEqual } from "crypto";
import { AuthenticationError, MalformedPayloadError, errorMessage } from "../errors";
import { WebhookMetrics } from "../metrics";
import { parseNotificationBody } from "../normalizer";
import { AlertProcessor } from "../processor";

// Transport-neutral request, built by the HTTP server or the Lambda entry
export interface WebhookRequest {
  method: string;
  path: string;
  headers: Record<string, string | string[] | undefined>;
  body?: string;
  sourceIp?: string;
}

export interface WebhookResponse {
  statusCode: number;
  body: string;
  headers?: Record<string, string>;
}

export interface BasicCredentials {
  username?: string;
  password?: string;
}

export const SERVICE_NAME = "status-bridge";
const REDACTED_HEADERS = new Set(["authorization", "cookie"]);

function digest(input: string): Buffer {
  return createHash("sha256").update(input, "utf8").digest();
}

// Both digests are 32 bytes, so timingSafeEqual never throws
function safeEquals(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

export function normalizeHeaders(headers: WebhookRequest["headers"]): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers)
      .filter((entry): entry is [string, string | string[]] => entry[1] !== undefined)
      .map(([k, v]) => [k.toLowerCase(), Array.isArray(v) ? v.join(", ") : v]),
  );
}

export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).map(([k, v]) => [k, REDACTED_HEADERS.has(k) ? "[redacted]" : v]),
  );
}

export class WebhookHandler {
  constructor(
    private readonly processor: AlertProcessor,
    private readonly credentials: BasicCredentials,
    private readonly createMetrics: () => WebhookMetrics = () => new WebhookMetrics(),
  ) {}

  async handle(request: WebhookRequest): Promise<WebhookResponse> {
    const path = request.path.replace(/\/+$/, "") || "/";

    if (request.method === "GET" && path === "/health") {
      return {
        statusCode: 200,
        body: JSON.stringify({ status: "healthy", service: SERVICE_NAME }),
        headers: { "content-type": "application/json" },
      };
    }
    if (request.method === "POST" && path === "/webhook") {
      return this.handleWebhook(request);
    }
    return { statusCode: 404, body: "not found" };
  }

  private async handleWebhook(request: WebhookRequest): Promise<WebhookResponse> {
    const metrics = this.createMetrics();
    metrics.request();
    const headers = normalizeHeaders(request.headers);

    try {
      // Rejected before the body is even looked at
      this.authenticate(headers.authorization);

      console.log("Received webhook request", {
        source: request.sourceIp,
        headers: redactHeaders(headers),
        body: request.body,
      });

      const batch = parseNotificationBody(request.body);
      await this.processor.processBatch(batch, metrics);
      return { statusCode: 200, body: "ok" };
    } catch (error) {
      if (error instanceof AuthenticationError) {
        console.warn("Rejected unauthenticated webhook request", { source: request.sourceIp });
        return { statusCode: 401, body: "unauthorized", headers: { "www-authenticate": 'Basic realm="webhook"' } };
      }
      if (error instanceof MalformedPayloadError) {
        console.warn("Rejected malformed webhook payload", { source: request.sourceIp, error: error.message });
        return { statusCode: 400, body: error.message };
      }
      console.error("webhook error", { error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined });
      return { statusCode: 500, body: "error" };
    } finally {
      await this.flushMetrics(metrics);
    }
  }

  private authenticate(authorization: string | undefined): void {
    const { username, password } = this.credentials;
    if (!username || !password) {
      console.error("WEBHOOK_USERNAME or WEBHOOK_PASSWORD not set, rejecting all webhook requests");
      throw new AuthenticationError();
    }

    const match = /^Basic\s+(\S+)$/i.exec(authorization ?? "");
    if (!match) throw new AuthenticationError();

    const decoded = Buffer.from(match[1], "base64").toString("utf8");
    const separator = decoded.indexOf(":");
    if (separator < 0) throw new AuthenticationError();

    // Compare both halves every time
    const userOk = safeEquals(decoded.slice(0, separator), username);
    const passwordOk = safeEquals(decoded.slice(separator + 1), password);
    if (!(userOk && passwordOk)) throw new AuthenticationError();
  }

  private async flushMetrics(metrics: WebhookMetrics): Promise<void> {
    try {
      await metrics.sendMetrics();
    } catch (error) {
      console.error("Failed to send metrics", { error: errorMessage(error) });
    }
  }
}
