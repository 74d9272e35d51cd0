import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import http from "node:http";
import { mkdtempSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type Database from "better-sqlite3";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

import { HttpServer } from "./http.js";
import { ApiRouter } from "../api/router.js";
import { ReportRenderer } from "../report/renderer.js";
import { createStores, openDatabase, type Stores } from "../store/index.js";
import { PhotoLibrary } from "../uploads/files.js";

const BOUNDARY = "----sitelogtestboundary";
const NOW = () => new Date(2024, 0, 10, 12, 0);

interface Reply {
  status: number;
  headers: http.IncomingHttpHeaders;
  raw: Buffer;
  json: () => unknown;
}

/** Send an HTTP request and collect the whole response. */
function req(
  port: number,
  method: string,
  path: string,
  payload?: string | Buffer,
  headers: Record<string, string> = {},
): Promise<Reply> {
  return new Promise((resolve, reject) => {
    const opts: http.RequestOptions = {
      hostname: "127.0.0.1",
      port,
      path,
      method,
      headers: {
        ...(payload !== undefined ? { "Content-Length": String(Buffer.byteLength(payload)) } : {}),
        ...headers,
      },
    };
    const r = http.request(opts, (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (c: Buffer) => chunks.push(c));
      res.on("end", () => {
        const raw = Buffer.concat(chunks);
        resolve({
          status: res.statusCode ?? 0,
          headers: res.headers,
          raw,
          json: () => JSON.parse(raw.toString("utf-8")),
        });
      });
    });
    r.on("error", reject);
    if (payload !== undefined) r.write(payload);
    r.end();
  });
}

function postJson(port: number, path: string, body: unknown): Promise<Reply> {
  return req(port, "POST", path, JSON.stringify(body), { "Content-Type": "application/json" });
}

function multipart(fields: Record<string, string>, file?: { name: string; data: Buffer }): Buffer {
  const parts: Buffer[] = [];
  for (const [name, value] of Object.entries(fields)) {
    parts.push(
      Buffer.from(`--${BOUNDARY}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`),
    );
  }
  if (file) {
    parts.push(
      Buffer.from(
        `--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="${file.name}"\r\n` +
          "Content-Type: application/octet-stream\r\n\r\n",
      ),
      file.data,
      Buffer.from("\r\n"),
    );
  }
  parts.push(Buffer.from(`--${BOUNDARY}--\r\n`));
  return Buffer.concat(parts);
}

function upload(port: number, body: Buffer): Promise<Reply> {
  return req(port, "POST", "/api/photos", body, {
    "Content-Type": `multipart/form-data; boundary=${BOUNDARY}`,
  });
}

let db: Database.Database;
let stores: Stores;
let dir: string;
let srv: HttpServer;
let port: number;
let projectId: number;

beforeEach(async () => {
  dir = mkdtempSync(join(tmpdir(), "sitelog-http-"));
  db = openDatabase(":memory:");
  stores = createStores(db);
  const photos = new PhotoLibrary(stores.photos, stores.projects, dir);
  projectId = stores.projects.create({
    name: "Harbour Street 4",
    builder_name: "Test Builder",
    start_date: "2024-01-01",
    status: "In progress",
  }).id;
  const renderer = new ReportRenderer(stores, (f) => photos.resolvePath(f), { currency: "€", now: NOW });
  const router = new ApiRouter({ stores, photos, renderer, projectId, now: NOW });

  srv = new HttpServer({ port: 0, maxFileSize: 1024 }, router);
  await srv.start();
  port = srv.port();
});

afterEach(async () => {
  await srv.stop();
  db.close();
  rmSync(dir, { recursive: true, force: true });
});

describe("HttpServer — basics", () => {
  it("answers the health check", async () => {
    const r = await req(port, "GET", "/health");

    expect(r.status).toBe(200);
    expect(r.json()).toMatchObject({ status: "ok" });
  });

  it("answers CORS preflight with 204", async () => {
    const r = await req(port, "OPTIONS", "/api/entries");

    expect(r.status).toBe(204);
    expect(r.headers["access-control-allow-origin"]).toBe("*");
  });

  it("returns 404 JSON for unknown routes", async () => {
    const r = await req(port, "GET", "/nope");

    expect(r.status).toBe(404);
    expect(r.json()).toEqual({ success: false, error: "Not found" });
  });

  it("binds to an ephemeral port when configured with 0", () => {
    expect(port).toBeGreaterThan(0);
  });
});

describe("HttpServer — JSON bodies", () => {
  it("creates an entry from a JSON body", async () => {
    const r = await postJson(port, "/api/entries", { date: "2024-01-05", content: "Poured slab" });

    expect(r.status).toBe(201);
    expect(r.json()).toEqual({ success: true, message: "Entry created", entry_id: 1 });
  });

  it("rejects malformed JSON", async () => {
    const r = await req(port, "POST", "/api/entries", "{nope", { "Content-Type": "application/json" });

    expect(r.status).toBe(400);
    expect(r.json()).toEqual({ success: false, error: "Invalid JSON body" });
  });

  it("rejects a JSON array", async () => {
    const r = await postJson(port, "/api/entries", [1, 2]);

    expect(r.status).toBe(400);
    expect(r.json()).toEqual({ success: false, error: "JSON body must be an object" });
  });

  it("treats an empty body as an empty object", async () => {
    const r = await req(port, "POST", "/api/entries", "", { "Content-Type": "application/json" });

    expect(r.status).toBe(400);
    expect(r.json()).toEqual({ success: false, error: "Missing required 'date' field" });
  });
});

describe("HttpServer — uploads", () => {
  it("stores a multipart upload", async () => {
    const body = multipart(
      { description: "North wall", date_taken: "2024-01-04" },
      { name: "wall.jpg", data: Buffer.from("jpeg-bytes") },
    );

    const r = await upload(port, body);

    expect(r.status).toBe(201);
    expect(r.json()).toMatchObject({
      success: true,
      photo: { original_filename: "wall.jpg", description: "North wall", date_taken: "2024-01-04", file_size: 10 },
    });
    expect(readdirSync(dir)).toHaveLength(1);
  });

  it("rejects a form without a file", async () => {
    const r = await upload(port, multipart({ description: "no file" }));

    expect(r.status).toBe(400);
    expect(r.json()).toEqual({ success: false, error: "No file selected" });
  });

  it("rejects files over the limit with 413 and stores nothing", async () => {
    const r = await upload(port, multipart({}, { name: "big.jpg", data: Buffer.alloc(2048, 1) }));

    expect(r.status).toBe(413);
    expect(r.json()).toEqual({ success: false, error: "File exceeds the upload limit of 1024 bytes" });
    expect(readdirSync(dir)).toEqual([]);
    expect(stores.photos.countByProject(projectId)).toBe(0);
  });
});

describe("HttpServer — downloads", () => {
  it("sends the full report as a PDF attachment", async () => {
    const r = await req(port, "GET", "/api/report");

    expect(r.status).toBe(200);
    expect(r.headers["content-type"]).toBe("application/pdf");
    expect(r.headers["content-disposition"]).toBe(
      'attachment; filename="Site_Diary_Harbour_Street_4_20240110.pdf"',
    );
    expect(r.raw.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });
});
