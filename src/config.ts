import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

export interface ServerConfig {
  /** Port to listen on */
  port: number;
  /** Bind address (default: "127.0.0.1") */
  bind?: string;
}

export interface StorageConfig {
  /** SQLite database file */
  databasePath: string;
  /** Directory holding uploaded photos */
  uploadDir: string;
}

export interface UploadConfig {
  /** Size string like "16MB" or "512KB" */
  maxFileSize: string;
}

export interface ProjectDefaults {
  name: string;
  builder_name: string;
  status: string;
  description?: string;
}

export interface ProjectConfig {
  /** Active project id. When absent the first stored project is used (or one is created). */
  id?: number;
  defaults: ProjectDefaults;
}

export interface ReportConfig {
  /** Suffix printed after money amounts */
  currency: string;
}

export interface LogConfig {
  level: string;
}

export interface SitelogConfig {
  server: ServerConfig;
  storage: StorageConfig;
  uploads: UploadConfig;
  project: ProjectConfig;
  report: ReportConfig;
  log: LogConfig;
}

const CONFIG_DIR = join(homedir(), ".sitelog");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

export function defaultConfig(): SitelogConfig {
  return {
    server: {
      port: 5000,
      bind: "127.0.0.1",
    },
    storage: {
      databasePath: join(CONFIG_DIR, "sitelog.db"),
      uploadDir: join(CONFIG_DIR, "uploads"),
    },
    uploads: {
      maxFileSize: "16MB",
    },
    project: {
      defaults: {
        name: "My Construction Project",
        builder_name: "Unknown Builder",
        status: "In progress",
      },
    },
    report: {
      currency: "€",
    },
    log: {
      level: "info",
    },
  };
}

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}

export function configExists(path?: string): boolean {
  return existsSync(path ?? CONFIG_PATH);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(target: object, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      result[key] = sourceVal;
    }
  }
  return result;
}

function section(config: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = config[name];
  if (!isPlainObject(value)) {
    throw new Error(`Config section '${name}' must be an object`);
  }
  return value;
}

function requireString(obj: Record<string, unknown>, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`Config missing required '${path}' (non-empty string)`);
  }
  return value;
}

/** Check the merged object field by field and return it typed. */
function validate(merged: Record<string, unknown>): SitelogConfig {
  const server = section(merged, "server");
  const port = server.port;
  if (typeof port !== "number" || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error("Config 'server.port' must be an integer between 0 and 65535");
  }
  const bind = server.bind === undefined ? undefined : requireString(server, "bind", "server.bind");

  const storage = section(merged, "storage");
  const uploads = section(merged, "uploads");
  const maxFileSize = requireString(uploads, "maxFileSize", "uploads.maxFileSize");
  parseSize(maxFileSize);

  const project = section(merged, "project");
  const id = project.id;
  if (id !== undefined && (typeof id !== "number" || !Number.isInteger(id) || id < 1)) {
    throw new Error("Config 'project.id' must be a positive integer");
  }
  const defaults = section(project, "defaults");
  const description = defaults.description;
  if (description !== undefined && typeof description !== "string") {
    throw new Error("Config 'project.defaults.description' must be a string");
  }

  const report = section(merged, "report");
  const currency = report.currency;
  if (typeof currency !== "string") {
    throw new Error("Config 'report.currency' must be a string");
  }
  const log = section(merged, "log");

  return {
    server: { port, ...(bind !== undefined && { bind }) },
    storage: {
      databasePath: requireString(storage, "databasePath", "storage.databasePath"),
      uploadDir: requireString(storage, "uploadDir", "storage.uploadDir"),
    },
    uploads: { maxFileSize },
    project: {
      ...(id !== undefined && { id }),
      defaults: {
        name: requireString(defaults, "name", "project.defaults.name"),
        builder_name: requireString(defaults, "builder_name", "project.defaults.builder_name"),
        status: requireString(defaults, "status", "project.defaults.status"),
        ...(description !== undefined && { description }),
      },
    },
    report: {
      currency,
    },
    log: { level: requireString(log, "level", "log.level") },
  };
}

/**
 * Load the config file and merge it over the defaults. A missing file is an
 * error; run `sitelog init` to write one.
 */
export function loadConfig(path?: string): SitelogConfig {
  const configPath = path ?? CONFIG_PATH;

  if (!existsSync(configPath)) {
    throw new Error(
      `Config file not found at ${configPath}\nRun 'sitelog init' to create one.`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    throw new Error(
      `Failed to parse config at ${configPath}: ${e instanceof Error ? e.message : e}`,
    );
  }

  if (!isPlainObject(raw)) {
    throw new Error(`Config at ${configPath} must be a JSON object`);
  }

  return validate(deepMerge(defaultConfig(), raw));
}

/** Parse size string like "16MB", "512KB", "100B" to bytes */
export function parseSize(size: string): number {
  const match = size.match(/^(\d+)\s*(B|KB|MB|GB)$/i);
  if (!match) {
    throw new Error(
      `Invalid size: ${size}. Use format like "16MB", "512KB"`,
    );
  }
  const value = parseInt(match[1], 10);
  const unit = match[2].toUpperCase();
  const multipliers: Record<string, number> = {
    B: 1,
    KB: 1024,
    MB: 1024 * 1024,
    GB: 1024 * 1024 * 1024,
  };
  return value * multipliers[unit];
}
