import "dotenv/config";
import { createServer, IncomingMessage, Server, ServerResponse } from "http";
import { Readable } from "stream";
import { BridgeApp, createBridgeApp } from "./app";
import { Config } from "./config";
import { errorMessage, MalformedPayloadError } from "./errors";
import { WebhookHandler } from "./webhook/handler";

// Bodies above this are not alert batches
const MAX_BODY_BYTES = 5 * 1024 * 1024;

// An oversized body is drained and dropped so the 413 still reaches the sender
export function readBody(req: Readable, maxBytes = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > maxBytes) {
        chunks.length = 0;
        reject(new MalformedPayloadError("Request body too large"));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

export function createHttpServer(handler: WebhookHandler): Server {
  return createServer((req: IncomingMessage, res: ServerResponse) => {
    const respond = async () => {
      const body = req.method === "POST" ? await readBody(req) : undefined;
      const response = await handler.handle({
        method: req.method ?? "GET",
        path: new URL(req.url ?? "/", "http://localhost").pathname,
        headers: req.headers,
        body,
        sourceIp: req.socket.remoteAddress,
      });
      res.writeHead(response.statusCode, { "content-type": "text/plain; charset=utf-8", ...response.headers });
      res.end(response.body);
    };

    respond().catch((error: unknown) => {
      if (error instanceof MalformedPayloadError) {
        console.warn("Rejected request", { error: error.message, url: req.url });
        if (!res.headersSent) {
          res.writeHead(413, { "content-type": "text/plain; charset=utf-8", connection: "close" });
        }
        res.end(error.message);
        return;
      }
      console.error("Failed to handle request", { error: errorMessage(error), url: req.url });
      if (!res.headersSent) {
        res.writeHead(500, { "content-type": "text/plain; charset=utf-8" });
      }
      res.end("error");
    });
  });
}

async function main(): Promise<void> {
  const config = Config.Instance;
  const app: BridgeApp = createBridgeApp();
  await app.ready;

  const server = createHttpServer(app.handler);
  server.listen(config.port, () => {
    console.log(`status-bridge listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    // Stops accepting connections; in-flight requests finish first
    server.close((error) => {
      if (error) {
        console.error("Error while closing server", { error: error.message });
        process.exit(1);
      }
      console.log("Server closed");
      process.exit(0);
    });
    server.closeIdleConnections();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Failed to start status-bridge", { error: errorMessage(error) });
    process.exit(1);
  });
}
