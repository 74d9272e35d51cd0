/**
 * ProjectStore -- SQLite-backed CRUD for projects.
 *
 * Deleting a project cascades explicitly (photos, entries, then the project)
 * inside one transaction; the schema carries no ON DELETE rules.
 */

import type Database from "better-sqlite3";
import type { CreateProjectInput, Photo, Project, UpdateProjectInput } from "./types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("project-store");

export interface ProjectDeletion {
  project: Project;
  entriesRemoved: number;
  /** Photo rows that were removed; their files still exist on disk. */
  photosRemoved: Photo[];
}

export class ProjectStore {
  constructor(private db: Database.Database) {}

  list(): Project[] {
    return this.db.prepare<[], Project>("SELECT * FROM projects ORDER BY id ASC").all();
  }

  get(id: number): Project | undefined {
    return this.db.prepare<[number], Project>("SELECT * FROM projects WHERE id = ?").get(id);
  }

  /** The project with the lowest id, if any. */
  first(): Project | undefined {
    return this.db.prepare<[], Project>("SELECT * FROM projects ORDER BY id ASC LIMIT 1").get();
  }

  create(input: CreateProjectInput): Project {
    const result = this.db
      .prepare(
        `INSERT INTO projects (name, builder_name, start_date, status, description)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        input.name,
        input.builder_name,
        input.start_date,
        input.status,
        input.description ?? null,
      );
    const id = Number(result.lastInsertRowid);
    log.info({ id, name: input.name }, "project created");
    return this.mustGet(id);
  }

  update(id: number, input: UpdateProjectInput): Project | undefined {
    const existing = this.get(id);
    if (!existing) return undefined;

    const fields: string[] = [];
    const values: unknown[] = [];

    if (input.name !== undefined) {
      fields.push("name = ?");
      values.push(input.name);
    }
    if (input.builder_name !== undefined) {
      fields.push("builder_name = ?");
      values.push(input.builder_name);
    }
    if (input.start_date !== undefined) {
      fields.push("start_date = ?");
      values.push(input.start_date);
    }
    if (input.status !== undefined) {
      fields.push("status = ?");
      values.push(input.status);
    }
    if (input.description !== undefined) {
      fields.push("description = ?");
      values.push(input.description);
    }

    if (fields.length === 0) return existing;

    values.push(id);
    this.db.prepare(`UPDATE projects SET ${fields.join(", ")} WHERE id = ?`).run(...values);
    log.info({ id, fields: fields.length }, "project updated");
    return this.get(id);
  }

  /**
   * Delete a project with all its entries and photo rows. Returns undefined
   * when the project does not exist. The caller owns removing photo files.
   */
  delete(id: number): ProjectDeletion | undefined {
    const cascade = this.db.transaction((projectId: number): ProjectDeletion | undefined => {
      const project = this.get(projectId);
      if (!project) return undefined;

      const photos = this.db
        .prepare<[number], Photo>("SELECT * FROM photos WHERE project_id = ? ORDER BY id ASC")
        .all(projectId);
      this.db.prepare("DELETE FROM photos WHERE project_id = ?").run(projectId);
      const entries = this.db.prepare("DELETE FROM entries WHERE project_id = ?").run(projectId);
      this.db.prepare("DELETE FROM projects WHERE id = ?").run(projectId);

      return { project, entriesRemoved: entries.changes, photosRemoved: photos };
    });

    const deletion = cascade(id);
    if (deletion) {
      log.info(
        { id, entries: deletion.entriesRemoved, photos: deletion.photosRemoved.length },
        "project deleted",
      );
    }
    return deletion;
  }

  private mustGet(id: number): Project {
    const project = this.get(id);
    if (!project) throw new Error(`Project ${id} vanished after insert`);
    return project;
  }
}
