/**
 * HTTP server for the site diary API.
 *
 *   GET /health   — simple health check
 *   /api/*        — see ApiRouter
 *   /uploads/*    — stored photos
 *
 * Bodies are read here: JSON for application/json requests, busboy for
 * multipart uploads. The router only sees parsed values.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import { sendJson, type ApiRequest, type ApiRouter } from "../api/router.js";
import { readMultipart } from "../uploads/multipart.js";
import { PayloadTooLargeError, ValidationError } from "../util/errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("http");

/** Upper bound for JSON request bodies. */
export const MAX_JSON_BODY = 1024 * 1024;

export interface HttpServerConfig {
  port: number;
  bind?: string;
  /** Upload limit in bytes */
  maxFileSize: number;
}

export class HttpServer {
  private server: Server | null = null;

  constructor(
    private config: HttpServerConfig,
    private router: ApiRouter,
  ) {}

  async start(): Promise<void> {
    this.server = createServer((req, res) => {
      res.setHeader("Access-Control-Allow-Origin", "*");
      res.setHeader("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type");

      if (req.method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      this.handleRequest(req, res).catch((e) => {
        log.error({ err: e }, "unhandled request error");
        if (!res.headersSent) {
          sendJson(res, 500, { success: false, error: "Internal server error" });
        } else {
          res.end();
        }
      });
    });

    const server = this.server;
    const bind = this.config.bind ?? "127.0.0.1";
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, bind, () => {
        server.off("error", reject);
        log.info({ port: this.port(), bind }, "http server listening");
        resolve();
      });
    });
  }

  /** Port actually bound (useful when configured with port 0). */
  port(): number {
    const addr = this.server?.address();
    if (!addr || typeof addr === "string") return this.config.port;
    return addr.port;
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((e) => (e ? reject(e) : resolve()));
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = req.url ?? "/";
    const method = req.method ?? "GET";

    if (url === "/health" && method === "GET") {
      sendJson(res, 200, { status: "ok", uptime: process.uptime() });
      return;
    }

    const apiReq: ApiRequest = { method, url };
    const contentType = req.headers["content-type"] ?? "";

    if (method === "POST" || method === "PUT") {
      try {
        if (contentType.startsWith("multipart/form-data")) {
          apiReq.form = await readMultipart(req, { maxFileSize: this.config.maxFileSize });
        } else {
          apiReq.body = await readJsonBody(req, MAX_JSON_BODY);
        }
      } catch (e) {
        if (e instanceof PayloadTooLargeError) {
          sendJson(res, 413, { success: false, error: e.message });
        } else if (e instanceof ValidationError) {
          sendJson(res, 400, { success: false, error: e.message });
        } else {
          log.warn({ err: e, method, url }, "could not read request body");
          sendJson(res, 400, { success: false, error: "Invalid request body" });
        }
        return;
      }
    }

    const handled = await this.router.handle(apiReq, res);
    if (!handled) {
      sendJson(res, 404, { success: false, error: "Not found" });
    }
  }
}

function readJsonBody(req: IncomingMessage, limit: number): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      // Past the limit the rest is drained and dropped
      if (size <= limit) chunks.push(chunk);
    });
    req.on("end", () => {
      if (size > limit) {
        reject(new PayloadTooLargeError(limit));
        return;
      }
      const text = Buffer.concat(chunks).toString("utf-8");
      if (text.trim() === "") {
        resolve({});
        return;
      }
      try {
        const parsed: unknown = JSON.parse(text);
        if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
          reject(new ValidationError("JSON body must be an object"));
          return;
        }
        resolve({ ...parsed });
      } catch {
        reject(new ValidationError("Invalid JSON body"));
      }
    });
    req.on("error", reject);
  });
}
