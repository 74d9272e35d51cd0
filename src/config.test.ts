import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("node:fs", () => ({
  readFileSync: vi.fn(),
  existsSync: vi.fn(),
}));

vi.mock("node:os", () => ({
  homedir: vi.fn(() => "/mock/home"),
}));

import { readFileSync, existsSync } from "node:fs";
import { parseSize, loadConfig, getConfigDir, configExists, defaultConfig } from "./config.js";

const mockedExistsSync = vi.mocked(existsSync);
const mockedReadFileSync = vi.mocked(readFileSync);

function givenConfigFile(content: unknown): void {
  mockedExistsSync.mockReturnValue(true);
  mockedReadFileSync.mockReturnValue(typeof content === "string" ? content : JSON.stringify(content));
}

beforeEach(() => {
  vi.resetAllMocks();
});

// ---------------------------------------------------------------------------
// parseSize
// ---------------------------------------------------------------------------
describe("parseSize", () => {
  it("parses bytes", () => {
    expect(parseSize("100B")).toBe(100);
  });

  it("parses kilobytes", () => {
    expect(parseSize("512KB")).toBe(524_288);
  });

  it("parses megabytes", () => {
    expect(parseSize("16MB")).toBe(16_777_216);
  });

  it("parses gigabytes", () => {
    expect(parseSize("1GB")).toBe(1_073_741_824);
  });

  it("accepts lower-case units", () => {
    expect(parseSize("2mb")).toBe(2_097_152);
  });

  it("allows optional whitespace between number and unit", () => {
    expect(parseSize("16 MB")).toBe(16_777_216);
  });

  it("throws on bare number without unit", () => {
    expect(() => parseSize("16")).toThrow("Invalid size");
  });

  it("throws on bare unit without number", () => {
    expect(() => parseSize("MB")).toThrow("Invalid size");
  });

  it("throws on decimal and negative values", () => {
    expect(() => parseSize("1.5MB")).toThrow("Invalid size");
    expect(() => parseSize("-1MB")).toThrow("Invalid size");
  });

  it("includes the offending value in the error message", () => {
    expect(() => parseSize("lots")).toThrow("lots");
  });
});

// ---------------------------------------------------------------------------
// getConfigDir / configExists
// ---------------------------------------------------------------------------
describe("getConfigDir", () => {
  it("returns ~/.sitelog based on mocked homedir", () => {
    expect(getConfigDir()).toBe("/mock/home/.sitelog");
  });
});

describe("configExists", () => {
  it("checks the default config path", () => {
    mockedExistsSync.mockReturnValue(true);
    expect(configExists()).toBe(true);
    expect(mockedExistsSync).toHaveBeenCalledWith("/mock/home/.sitelog/config.json");
  });

  it("returns false when the file is missing", () => {
    mockedExistsSync.mockReturnValue(false);
    expect(configExists("/tmp/none.json")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// defaultConfig
// ---------------------------------------------------------------------------
describe("defaultConfig", () => {
  it("stores data under the config directory", () => {
    const cfg = defaultConfig();
    expect(cfg.storage.databasePath).toBe("/mock/home/.sitelog/sitelog.db");
    expect(cfg.storage.uploadDir).toBe("/mock/home/.sitelog/uploads");
  });

  it("has no fixed project id", () => {
    expect(defaultConfig().project.id).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------
describe("loadConfig", () => {
  describe("valid configs", () => {
    it("fills every section from the defaults for an empty object", () => {
      givenConfigFile({});

      const result = loadConfig("/tmp/test-config.json");

      expect(result.server).toEqual({ port: 5000, bind: "127.0.0.1" });
      expect(result.uploads.maxFileSize).toBe("16MB");
      expect(result.project.defaults).toEqual({
        name: "My Construction Project",
        builder_name: "Unknown Builder",
        status: "In progress",
      });
      expect(result.report.currency).toBe("€");
      expect(result.log.level).toBe("info");
    });

    it("uses the default config path when none is provided", () => {
      givenConfigFile({});

      loadConfig();

      expect(mockedExistsSync).toHaveBeenCalledWith("/mock/home/.sitelog/config.json");
      expect(mockedReadFileSync).toHaveBeenCalledWith("/mock/home/.sitelog/config.json", "utf-8");
    });

    it("user values override defaults (deep merge)", () => {
      givenConfigFile({
        server: { port: 8080 },
        project: { defaults: { name: "Harbour Street 4" } },
      });

      const result = loadConfig("/tmp/test-config.json");

      expect(result.server.port).toBe(8080);
      expect(result.server.bind).toBe("127.0.0.1");
      expect(result.project.defaults.name).toBe("Harbour Street 4");
      expect(result.project.defaults.builder_name).toBe("Unknown Builder");
    });

    it("keeps a configured project id", () => {
      givenConfigFile({ project: { id: 3 } });

      expect(loadConfig("/tmp/test-config.json").project.id).toBe(3);
    });

    it("accepts an empty currency", () => {
      givenConfigFile({ report: { currency: "" } });

      expect(loadConfig("/tmp/test-config.json").report.currency).toBe("");
    });
  });

  describe("missing config file", () => {
    it("throws with the path and a hint to run init", () => {
      mockedExistsSync.mockReturnValue(false);

      expect(() => loadConfig("/some/path.json")).toThrow(
        "Config file not found at /some/path.json\nRun 'sitelog init' to create one.",
      );
    });
  });

  describe("invalid JSON", () => {
    it("throws on malformed JSON", () => {
      givenConfigFile("{not valid json");

      expect(() => loadConfig("/tmp/bad.json")).toThrow("Failed to parse config at /tmp/bad.json");
    });

    it("rejects a top-level array", () => {
      givenConfigFile([]);

      expect(() => loadConfig("/tmp/bad.json")).toThrow("Config at /tmp/bad.json must be a JSON object");
    });
  });

  describe("validation errors", () => {
    it("rejects an out-of-range port", () => {
      givenConfigFile({ server: { port: 70000 } });

      expect(() => loadConfig("/tmp/c.json")).toThrow(
        "Config 'server.port' must be an integer between 0 and 65535",
      );
    });

    it("rejects a section that is not an object", () => {
      givenConfigFile({ server: "bad" });

      expect(() => loadConfig("/tmp/c.json")).toThrow("Config section 'server' must be an object");
    });

    it("rejects an unparseable upload limit", () => {
      givenConfigFile({ uploads: { maxFileSize: "lots" } });

      expect(() => loadConfig("/tmp/c.json")).toThrow("Invalid size: lots");
    });

    it("rejects a non-positive project id", () => {
      givenConfigFile({ project: { id: 0 } });

      expect(() => loadConfig("/tmp/c.json")).toThrow("Config 'project.id' must be a positive integer");
    });

    it("rejects an empty default project name", () => {
      givenConfigFile({ project: { defaults: { name: "" } } });

      expect(() => loadConfig("/tmp/c.json")).toThrow(
        "Config missing required 'project.defaults.name' (non-empty string)",
      );
    });

    it("rejects a non-string currency", () => {
      givenConfigFile({ report: { currency: 5 } });

      expect(() => loadConfig("/tmp/c.json")).toThrow("Config 'report.currency' must be a string");
    });
  });
});
