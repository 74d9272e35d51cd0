import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type Database from "better-sqlite3";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

import { createStores, openDatabase, type Stores } from "./index.js";

let db: Database.Database;
let stores: Stores;
let projectId: number;

beforeEach(() => {
  db = openDatabase(":memory:");
  stores = createStores(db);
  projectId = stores.projects.create({
    name: "Harbour Street 4",
    builder_name: "Test Builder",
    start_date: "2024-01-01",
    status: "In progress",
  }).id;
});

afterEach(() => {
  db.close();
});

describe("EntryStore", () => {
  it("stores optional fields as null", () => {
    const entry = stores.entries.create(projectId, { date: "2024-01-05", content: "Poured slab" });

    expect(entry).toMatchObject({
      project_id: projectId,
      date: "2024-01-05",
      content: "Poured slab",
      weather: null,
      temperature: null,
      workers_count: null,
      work_hours: null,
      costs: null,
    });
  });

  it("keeps zero as a value", () => {
    const entry = stores.entries.create(projectId, {
      date: "2024-01-05",
      content: "Frost day",
      temperature: 0,
      costs: 0,
    });

    expect(entry.temperature).toBe(0);
    expect(entry.costs).toBe(0);
  });

  it("lists by date, same-day entries in insertion order", () => {
    stores.entries.create(projectId, { date: "2024-01-07", content: "c" });
    stores.entries.create(projectId, { date: "2024-01-05", content: "a" });
    stores.entries.create(projectId, { date: "2024-01-05", content: "b" });

    expect(stores.entries.listByProject(projectId).map((e) => e.content)).toEqual(["a", "b", "c"]);
    expect(stores.entries.listByProject(projectId, "desc").map((e) => e.content)).toEqual(["c", "b", "a"]);
  });

  it("only lists entries of the given project", () => {
    const other = stores.projects.create({
      name: "Other",
      builder_name: "B",
      start_date: "2024-01-01",
      status: "Planned",
    });
    stores.entries.create(projectId, { date: "2024-01-05", content: "mine" });
    stores.entries.create(other.id, { date: "2024-01-05", content: "theirs" });

    expect(stores.entries.listByProject(projectId).map((e) => e.content)).toEqual(["mine"]);
    expect(stores.entries.countByProject(other.id)).toBe(1);
  });

  it("delete reports whether a row was removed", () => {
    const entry = stores.entries.create(projectId, { date: "2024-01-05", content: "x" });

    expect(stores.entries.delete(entry.id)).toBe(true);
    expect(stores.entries.get(entry.id)).toBeUndefined();
    expect(stores.entries.delete(entry.id)).toBe(false);
  });

  it("rejects entries for a project that does not exist", () => {
    expect(() => stores.entries.create(999, { date: "2024-01-05", content: "x" })).toThrow();
  });
});

describe("PhotoStore", () => {
  it("lists by date taken and counts per project", () => {
    stores.photos.create(projectId, {
      filename: "b.jpg",
      original_filename: "later.jpg",
      date_taken: "2024-01-09",
      file_size: 20,
    });
    stores.photos.create(projectId, {
      filename: "a.jpg",
      original_filename: "earlier.jpg",
      description: "Rebar",
      date_taken: "2024-01-02",
      file_size: 10,
    });

    expect(stores.photos.listByProject(projectId).map((p) => p.original_filename)).toEqual([
      "earlier.jpg",
      "later.jpg",
    ]);
    expect(stores.photos.countByProject(projectId)).toBe(2);
  });

  it("refuses a duplicate stored filename", () => {
    const input = { filename: "same.jpg", original_filename: "x.jpg", date_taken: "2024-01-02", file_size: 1 };
    stores.photos.create(projectId, input);

    expect(() => stores.photos.create(projectId, input)).toThrow(/UNIQUE/);
  });
});
