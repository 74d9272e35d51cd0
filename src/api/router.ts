/**
 * REST API Router for the site diary.
 *
 * Handles /api/* and /uploads/* routes. Decoupled from the HTTP server so it
 * can be tested and extended independently. Every route works on the active
 * project chosen at startup.
 *
 * Endpoints:
 *   GET    /api/project              — active project
 *   PUT    /api/project              — update project fields
 *   DELETE /api/project              — delete project, entries, photos and files
 *   GET    /api/entries              — entries, newest first
 *   GET    /api/entries/:id          — single entry
 *   POST   /api/entries              — create an entry
 *   DELETE /api/entries/:id          — delete an entry
 *   GET    /api/entries/:id/report   — PDF of a single entry
 *   GET    /api/photos               — photos, newest first
 *   POST   /api/photos               — upload a photo (multipart/form-data)
 *   DELETE /api/photos/:id           — delete a photo and its file
 *   GET    /api/stats                — summary statistics
 *   GET    /api/export               — JSON export
 *   GET    /api/report               — full PDF report
 *   GET    /uploads/:filename        — stored image
 */

import { readFile } from "node:fs/promises";
import type { ServerResponse } from "node:http";
import { exportProject } from "../export/json.js";
import type { ReportDocument, ReportRenderer } from "../report/renderer.js";
import { computeStatistics } from "../stats/aggregator.js";
import type { Stores } from "../store/index.js";
import type { ProjectDeletion } from "../store/projects.js";
import type { Entry, Photo, Project } from "../store/types.js";
import { parseEntryInput, parsePhotoFields, parseProjectUpdate } from "../store/validation.js";
import { fileExtension, type PhotoLibrary } from "../uploads/files.js";
import type { MultipartBody } from "../uploads/multipart.js";
import { toIsoDate } from "../util/dates.js";
import {
  NotFoundError,
  PayloadTooLargeError,
  ValidationError,
  errorMessage,
} from "../util/errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("api-router");

const IMAGE_TYPES: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
};

export interface ApiRequest {
  method: string;
  url: string;
  /** Parsed JSON body, when the request had one */
  body?: Record<string, unknown>;
  /** Parsed multipart form, when the request had one */
  form?: MultipartBody;
}

export interface ApiRouterDeps {
  stores: Stores;
  photos: PhotoLibrary;
  renderer: ReportRenderer;
  /** Active project all routes operate on */
  projectId: number;
  /**
   * Picks the next active project after the current one is deleted. Without
   * it, project routes answer 404 once the project is gone.
   */
  resolveProject?: () => Project;
  /** Clock used for "today"; defaults to the system clock */
  now?: () => Date;
}

export class ApiRouter {
  private readonly now: () => Date;
  private projectId: number;

  constructor(private deps: ApiRouterDeps) {
    this.now = deps.now ?? (() => new Date());
    this.projectId = deps.projectId;
  }

  /** Id of the project requests currently operate on. */
  activeProjectId(): number {
    return this.projectId;
  }

  /**
   * Handle a request. Returns true if the route matched (response was sent),
   * false if no route matched (caller should send 404).
   */
  async handle(req: ApiRequest, res: ServerResponse): Promise<boolean> {
    const [path] = req.url.split("?", 1);

    try {
      return await this.route(req, path, res);
    } catch (e) {
      this.sendError(res, e);
      return true;
    }
  }

  private async route(req: ApiRequest, path: string, res: ServerResponse): Promise<boolean> {
    const { method } = req;

    if (path === "/api/project") {
      if (method === "GET") {
        this.handleGetProject(res);
        return true;
      }
      if (method === "PUT") {
        this.handleUpdateProject(req.body, res);
        return true;
      }
      if (method === "DELETE") {
        await this.handleDeleteProject(res);
        return true;
      }
      return false;
    }

    if (path === "/api/entries") {
      if (method === "GET") {
        this.handleListEntries(res);
        return true;
      }
      if (method === "POST") {
        this.handleCreateEntry(req.body, res);
        return true;
      }
      return false;
    }

    // GET /api/entries/:id/report: must match BEFORE /api/entries/:id
    const entryReportMatch = path.match(/^\/api\/entries\/([^/]+)\/report$/);
    if (entryReportMatch && method === "GET") {
      const id = parseId(entryReportMatch[1], "entry");
      this.ownEntry(id);
      sendDocument(res, await this.deps.renderer.renderEntryReport(id));
      return true;
    }

    const entryMatch = path.match(/^\/api\/entries\/([^/]+)$/);
    if (entryMatch) {
      const id = parseId(entryMatch[1], "entry");
      if (method === "GET") {
        this.handleGetEntry(id, res);
        return true;
      }
      if (method === "DELETE") {
        this.handleDeleteEntry(id, res);
        return true;
      }
      return false;
    }

    if (path === "/api/photos") {
      if (method === "GET") {
        this.handleListPhotos(res);
        return true;
      }
      if (method === "POST") {
        await this.handleUploadPhoto(req.form, res);
        return true;
      }
      return false;
    }

    const photoMatch = path.match(/^\/api\/photos\/([^/]+)$/);
    if (photoMatch && method === "DELETE") {
      await this.handleDeletePhoto(parseId(photoMatch[1], "photo"), res);
      return true;
    }

    if (method !== "GET") return false;

    switch (path) {
      case "/api/stats":
        this.handleStats(res);
        return true;
      case "/api/export":
        sendJson(res, 200, exportProject(this.deps.stores, this.projectId));
        return true;
      case "/api/report":
        sendDocument(res, await this.deps.renderer.renderFullReport(this.projectId));
        return true;
    }

    const uploadMatch = path.match(/^\/uploads\/([^/]+)$/);
    if (uploadMatch) {
      await this.handleServeUpload(decodeFilename(uploadMatch[1]), res);
      return true;
    }

    return false;
  }

  // ── Project ─────────────────────────────────────────────────────────

  private activeProject(): Project {
    const project = this.deps.stores.projects.get(this.projectId);
    if (!project) throw new NotFoundError("project", this.projectId);
    return project;
  }

  private handleGetProject(res: ServerResponse): void {
    sendJson(res, 200, this.activeProject());
  }

  private handleUpdateProject(body: Record<string, unknown> | undefined, res: ServerResponse): void {
    if (!body) throw new ValidationError("Missing JSON body");
    const update = parseProjectUpdate(body);
    const project = this.deps.stores.projects.update(this.projectId, update);
    if (!project) throw new NotFoundError("project", this.projectId);
    sendJson(res, 200, { success: true, message: "Project updated", project });
  }

  private async handleDeleteProject(res: ServerResponse): Promise<void> {
    const projectId = this.projectId;
    let deletion: ProjectDeletion | undefined;
    try {
      deletion = await this.deps.photos.deleteProject(projectId);
    } finally {
      // Runs even when a file could not be removed: the rows are gone by then
      this.replaceDeletedProject();
    }
    if (!deletion) throw new NotFoundError("project", projectId);
    log.warn({ projectId }, "active project deleted via API");
    sendJson(res, 200, {
      success: true,
      message: "Project deleted",
      entries_removed: deletion.entriesRemoved,
      photos_removed: deletion.photosRemoved.length,
    });
  }

  private replaceDeletedProject(): void {
    if (!this.deps.resolveProject || this.deps.stores.projects.get(this.projectId)) return;
    const next = this.deps.resolveProject();
    log.info({ previous: this.projectId, projectId: next.id, name: next.name }, "active project replaced");
    this.projectId = next.id;
  }

  // ── Entries ─────────────────────────────────────────────────────────

  private handleListEntries(res: ServerResponse): void {
    this.activeProject();
    sendJson(res, 200, this.deps.stores.entries.listByProject(this.projectId, "desc"));
  }

  /** The entry, if it belongs to the active project. */
  private ownEntry(id: number): Entry {
    const entry = this.deps.stores.entries.get(id);
    if (!entry || entry.project_id !== this.projectId) throw new NotFoundError("entry", id);
    return entry;
  }

  private handleGetEntry(id: number, res: ServerResponse): void {
    sendJson(res, 200, this.ownEntry(id));
  }

  private handleCreateEntry(body: Record<string, unknown> | undefined, res: ServerResponse): void {
    if (!body) throw new ValidationError("Missing JSON body");
    this.activeProject();
    const input = parseEntryInput(body);
    const entry = this.deps.stores.entries.create(this.projectId, input);
    sendJson(res, 201, { success: true, message: "Entry created", entry_id: entry.id });
  }

  private handleDeleteEntry(id: number, res: ServerResponse): void {
    this.ownEntry(id);
    this.deps.stores.entries.delete(id);
    sendJson(res, 200, { success: true, message: "Entry deleted" });
  }

  // ── Photos ──────────────────────────────────────────────────────────

  private handleListPhotos(res: ServerResponse): void {
    this.activeProject();
    const photos = this.deps.stores.photos.listByProject(this.projectId, "desc");
    sendJson(res, 200, photos.map(withUrl));
  }

  private async handleUploadPhoto(form: MultipartBody | undefined, res: ServerResponse): Promise<void> {
    if (!form || !form.file) throw new ValidationError("No file selected", "file");
    this.activeProject();

    const meta = parsePhotoFields(form.fields, toIsoDate(this.now()));
    const photo = await this.deps.photos.save(this.projectId, form.file, meta);
    sendJson(res, 201, { success: true, message: "Photo uploaded", photo: withUrl(photo) });
  }

  private async handleDeletePhoto(id: number, res: ServerResponse): Promise<void> {
    const photo = this.deps.stores.photos.get(id);
    if (!photo || photo.project_id !== this.projectId) throw new NotFoundError("photo", id);
    await this.deps.photos.delete(id);
    sendJson(res, 200, { success: true, message: "Photo deleted" });
  }

  private async handleServeUpload(filename: string, res: ServerResponse): Promise<void> {
    const contentType = IMAGE_TYPES[fileExtension(filename) ?? ""];
    if (!contentType) throw new NotFoundError("photo", filename);

    let data: Buffer;
    try {
      data = await readFile(this.deps.photos.resolvePath(filename));
    } catch (e) {
      log.debug({ filename, err: e }, "upload not readable");
      throw new NotFoundError("photo", filename);
    }
    res.writeHead(200, {
      "Content-Type": contentType,
      "Content-Length": String(data.length),
      "Cache-Control": "public, max-age=86400",
    });
    res.end(data);
  }

  // ── Stats ───────────────────────────────────────────────────────────

  private handleStats(res: ServerResponse): void {
    const project = this.activeProject();
    const { entries, photos } = this.deps.stores;
    sendJson(
      res,
      200,
      computeStatistics({
        startDate: project.start_date,
        entries: entries.listByProject(project.id),
        photoCount: photos.countByProject(project.id),
        today: toIsoDate(this.now()),
      }),
    );
  }

  // ── Errors ──────────────────────────────────────────────────────────

  private sendError(res: ServerResponse, e: unknown): void {
    if (e instanceof ValidationError) {
      sendJson(res, 400, { success: false, error: e.message });
    } else if (e instanceof NotFoundError) {
      sendJson(res, 404, { success: false, error: e.message });
    } else if (e instanceof PayloadTooLargeError) {
      sendJson(res, 413, { success: false, error: e.message });
    } else {
      log.error({ err: e }, "request failed");
      sendJson(res, 500, { success: false, error: errorMessage(e) });
    }
  }
}

function parseId(raw: string, resource: "entry" | "photo"): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id < 1) throw new NotFoundError(resource, raw);
  return id;
}

function decodeFilename(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (e) {
    if (e instanceof URIError) throw new NotFoundError("photo", raw);
    throw e;
  }
}

function withUrl(photo: Photo): Photo & { url: string } {
  return { ...photo, url: `/uploads/${photo.filename}` };
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendDocument(res: ServerResponse, doc: ReportDocument): void {
  res.writeHead(200, {
    "Content-Type": "application/pdf",
    "Content-Disposition": `attachment; filename="${doc.filename}"`,
    "Content-Length": String(doc.data.length),
  });
  res.end(Buffer.from(doc.data));
}
