/**
 * EntryStore -- daily diary entries. Entries are created and deleted, never
 * edited.
 */

import type Database from "better-sqlite3";
import type { CreateEntryInput, Entry, SortOrder } from "./types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("entry-store");

export class EntryStore {
  constructor(private db: Database.Database) {}

  get(id: number): Entry | undefined {
    return this.db.prepare<[number], Entry>("SELECT * FROM entries WHERE id = ?").get(id);
  }

  /** Entries of a project by date; same-day entries keep insertion order. */
  listByProject(projectId: number, order: SortOrder = "asc"): Entry[] {
    const dir = order === "asc" ? "ASC" : "DESC";
    return this.db
      .prepare<[number], Entry>(
        `SELECT * FROM entries WHERE project_id = ? ORDER BY date ${dir}, id ${dir}`,
      )
      .all(projectId);
  }

  countByProject(projectId: number): number {
    const row = this.db
      .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM entries WHERE project_id = ?")
      .get(projectId);
    return row?.n ?? 0;
  }

  create(projectId: number, input: CreateEntryInput): Entry {
    const result = this.db
      .prepare(
        `INSERT INTO entries
           (project_id, date, weather, temperature, content, workers_count,
            materials, work_hours, costs, notes)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        projectId,
        input.date,
        input.weather ?? null,
        input.temperature ?? null,
        input.content,
        input.workers_count ?? null,
        input.materials ?? null,
        input.work_hours ?? null,
        input.costs ?? null,
        input.notes ?? null,
      );
    const id = Number(result.lastInsertRowid);
    log.info({ id, projectId, date: input.date }, "entry created");

    const entry = this.get(id);
    if (!entry) throw new Error(`Entry ${id} vanished after insert`);
    return entry;
  }

  delete(id: number): boolean {
    const result = this.db.prepare("DELETE FROM entries WHERE id = ?").run(id);
    if (result.changes > 0) {
      log.info({ id }, "entry deleted");
      return true;
    }
    return false;
  }
}
