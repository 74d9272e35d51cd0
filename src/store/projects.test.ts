import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type Database from "better-sqlite3";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

import { createStores, openDatabase, type Stores } from "./index.js";

let db: Database.Database;
let stores: Stores;

beforeEach(() => {
  db = openDatabase(":memory:");
  stores = createStores(db);
});

afterEach(() => {
  db.close();
});

function makeProject(name = "Harbour Street 4") {
  return stores.projects.create({
    name,
    builder_name: "Test Builder",
    start_date: "2024-01-01",
    status: "In progress",
  });
}

describe("ProjectStore", () => {
  it("creates a project and returns the stored row", () => {
    const project = makeProject();

    expect(project.id).toBe(1);
    expect(project.name).toBe("Harbour Street 4");
    expect(project.description).toBeNull();
    expect(stores.projects.get(project.id)).toEqual(project);
  });

  it("first() returns the project with the lowest id", () => {
    expect(stores.projects.first()).toBeUndefined();
    const a = makeProject("A");
    makeProject("B");

    expect(stores.projects.first()?.id).toBe(a.id);
    expect(stores.projects.list().map((p) => p.name)).toEqual(["A", "B"]);
  });

  it("updates only the given fields", () => {
    const project = makeProject();

    const updated = stores.projects.update(project.id, { status: "Finished", description: "Roof done" });

    expect(updated?.status).toBe("Finished");
    expect(updated?.description).toBe("Roof done");
    expect(updated?.name).toBe("Harbour Street 4");
    expect(updated?.start_date).toBe("2024-01-01");
  });

  it("update with no fields returns the project unchanged", () => {
    const project = makeProject();
    expect(stores.projects.update(project.id, {})).toEqual(project);
  });

  it("update of a missing project returns undefined", () => {
    expect(stores.projects.update(42, { name: "X" })).toBeUndefined();
  });

  describe("delete", () => {
    it("removes the project with its entries and photo rows", () => {
      const doomed = makeProject("Doomed");
      const kept = makeProject("Kept");
      stores.entries.create(doomed.id, { date: "2024-01-02", content: "Excavation" });
      stores.entries.create(doomed.id, { date: "2024-01-03", content: "Formwork" });
      stores.entries.create(kept.id, { date: "2024-01-02", content: "Survey" });
      stores.photos.create(doomed.id, {
        filename: "aaa.jpg",
        original_filename: "pit.jpg",
        date_taken: "2024-01-02",
        file_size: 10,
      });

      const deletion = stores.projects.delete(doomed.id);

      expect(deletion?.project.name).toBe("Doomed");
      expect(deletion?.entriesRemoved).toBe(2);
      expect(deletion?.photosRemoved.map((p) => p.filename)).toEqual(["aaa.jpg"]);
      expect(stores.projects.get(doomed.id)).toBeUndefined();
      expect(stores.entries.countByProject(doomed.id)).toBe(0);
      expect(stores.photos.countByProject(doomed.id)).toBe(0);
      expect(stores.entries.countByProject(kept.id)).toBe(1);
    });

    it("returns undefined for a missing project", () => {
      expect(stores.projects.delete(99)).toBeUndefined();
    });
  });
});
