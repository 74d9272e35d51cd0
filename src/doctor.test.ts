import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

vi.mock("./util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

import { checkDatabase, checkUploadDir } from "./doctor.js";
import { createStores, openDatabase } from "./store/index.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "sitelog-doctor-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function seedDatabase(path: string): number {
  const db = openDatabase(path);
  const id = createStores(db).projects.create({
    name: "Harbour Street 4",
    builder_name: "Test Builder",
    start_date: "2024-01-01",
    status: "In progress",
  }).id;
  db.close();
  return id;
}

describe("checkDatabase", () => {
  it("warns when the database has not been created yet", () => {
    expect(checkDatabase(join(dir, "none.db"))).toEqual({
      name: "Database",
      status: "warn",
      message: "Not created yet (created on first start)",
    });
  });

  it("passes for a healthy database", () => {
    const path = join(dir, "sitelog.db");
    const id = seedDatabase(path);

    const result = checkDatabase(path, id);

    expect(result.status).toBe("pass");
    expect(result.message).toMatch(/MB, integrity OK$/);
  });

  it("fails when the configured project is missing", () => {
    const path = join(dir, "sitelog.db");
    seedDatabase(path);

    expect(checkDatabase(path, 5)).toEqual({
      name: "Database",
      status: "fail",
      message: "Configured project 5 does not exist",
    });
  });

  it("fails for a file that is not a database", () => {
    const path = join(dir, "garbage.db");
    writeFileSync(path, "x".repeat(512));

    expect(checkDatabase(path).status).toBe("fail");
  });
});

describe("checkUploadDir", () => {
  it("passes for a writable directory and counts files", () => {
    writeFileSync(join(dir, "a.jpg"), "x");

    expect(checkUploadDir(dir)).toEqual({
      name: "Upload directory",
      status: "pass",
      message: `${dir} (1 files)`,
    });
  });

  it("warns when the directory does not exist yet", () => {
    expect(checkUploadDir(join(dir, "uploads")).status).toBe("warn");
  });
});
