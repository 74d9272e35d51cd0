/**
 * Wiring: database, stores, photo library, renderer, router and HTTP server
 * built from one config. The active project is resolved here, once.
 */

import type Database from "better-sqlite3";
import { ApiRouter } from "./api/router.js";
import { parseSize, type ProjectConfig, type SitelogConfig } from "./config.js";
import { ReportRenderer } from "./report/renderer.js";
import { HttpServer } from "./server/http.js";
import { createStores, openDatabase, type Stores } from "./store/index.js";
import type { ProjectStore } from "./store/projects.js";
import type { Project } from "./store/types.js";
import { PhotoLibrary } from "./uploads/files.js";
import { toIsoDate } from "./util/dates.js";
import { getLogger } from "./util/logger.js";

const log = getLogger("app");

/**
 * Pick the project every request works on:
 *   - `project.id` configured → that project, which must exist
 *   - otherwise the first stored project, or a new one from the defaults
 */
export function resolveActiveProject(
  projects: ProjectStore,
  config: ProjectConfig,
  today: string,
): Project {
  if (config.id !== undefined) {
    const project = projects.get(config.id);
    if (!project) {
      throw new Error(`Configured project ${config.id} does not exist`);
    }
    return project;
  }

  const existing = projects.first();
  if (existing) return existing;

  log.info({ name: config.defaults.name }, "no project found, creating default project");
  return projects.create({
    name: config.defaults.name,
    builder_name: config.defaults.builder_name,
    start_date: today,
    status: config.defaults.status,
    description: config.defaults.description ?? null,
  });
}

export interface App {
  db: Database.Database;
  stores: Stores;
  photos: PhotoLibrary;
  renderer: ReportRenderer;
  project: Project;
  router: ApiRouter;
  server: HttpServer;
  close(): Promise<void>;
}

export interface AppOptions {
  /** Clock for "today"; defaults to the system clock */
  now?: () => Date;
}

export async function createApp(config: SitelogConfig, options: AppOptions = {}): Promise<App> {
  const now = options.now ?? (() => new Date());

  const db = openDatabase(config.storage.databasePath);
  const stores = createStores(db);
  const photos = new PhotoLibrary(stores.photos, stores.projects, config.storage.uploadDir);
  await photos.ensureDir();
  log.info({ uploadDir: photos.getUploadDir() }, "upload directory ready");

  const project = resolveActiveProject(stores.projects, config.project, toIsoDate(now()));
  log.info({ projectId: project.id, name: project.name }, "active project");

  const renderer = new ReportRenderer(stores, (filename) => photos.resolvePath(filename), {
    currency: config.report.currency,
    now,
  });
  // A configured project is never replaced; otherwise a deleted project is
  // followed by the next stored one, or a fresh default
  const resolveProject =
    config.project.id === undefined
      ? () => resolveActiveProject(stores.projects, config.project, toIsoDate(now()))
      : undefined;
  const router = new ApiRouter({ stores, photos, renderer, projectId: project.id, resolveProject, now });
  const server = new HttpServer(
    {
      port: config.server.port,
      bind: config.server.bind,
      maxFileSize: parseSize(config.uploads.maxFileSize),
    },
    router,
  );

  return {
    db,
    stores,
    photos,
    renderer,
    project,
    router,
    server,
    async close() {
      await server.stop();
      db.close();
    },
  };
}
