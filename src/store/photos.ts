/**
 * PhotoStore -- photo metadata rows. The image files themselves are handled
 * by the upload handler, which keeps rows and files in step.
 */

import type Database from "better-sqlite3";
import type { CreatePhotoInput, Photo, SortOrder } from "./types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("photo-store");

export class PhotoStore {
  constructor(private db: Database.Database) {}

  get(id: number): Photo | undefined {
    return this.db.prepare<[number], Photo>("SELECT * FROM photos WHERE id = ?").get(id);
  }

  listByProject(projectId: number, order: SortOrder = "asc"): Photo[] {
    const dir = order === "asc" ? "ASC" : "DESC";
    return this.db
      .prepare<[number], Photo>(
        `SELECT * FROM photos WHERE project_id = ? ORDER BY date_taken ${dir}, id ${dir}`,
      )
      .all(projectId);
  }

  countByProject(projectId: number): number {
    const row = this.db
      .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM photos WHERE project_id = ?")
      .get(projectId);
    return row?.n ?? 0;
  }

  create(projectId: number, input: CreatePhotoInput): Photo {
    const result = this.db
      .prepare(
        `INSERT INTO photos
           (project_id, filename, original_filename, description, date_taken, file_size)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        projectId,
        input.filename,
        input.original_filename,
        input.description ?? null,
        input.date_taken,
        input.file_size,
      );
    const id = Number(result.lastInsertRowid);
    log.info({ id, projectId, filename: input.filename }, "photo created");

    const photo = this.get(id);
    if (!photo) throw new Error(`Photo ${id} vanished after insert`);
    return photo;
  }

  delete(id: number): boolean {
    const result = this.db.prepare("DELETE FROM photos WHERE id = ?").run(id);
    if (result.changes > 0) {
      log.info({ id }, "photo deleted");
      return true;
    }
    return false;
  }
}
