import Database from "better-sqlite3";
import { accessSync, constants, existsSync, readdirSync, statSync } from "node:fs";
import { spawnSync } from "node:child_process";
import { homedir } from "node:os";
import { join } from "node:path";
import { loadConfig, getConfigPath, getConfigDir, configExists, type SitelogConfig } from "./config.js";

export interface CheckResult {
  name: string;
  status: "pass" | "warn" | "fail";
  message: string;
}

const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";

function icon(status: CheckResult["status"]): string {
  switch (status) {
    case "pass":
      return `${GREEN}✓${RESET}`;
    case "warn":
      return `${YELLOW}⚠${RESET}`;
    case "fail":
      return `${RED}✗${RESET}`;
  }
}

function checkConfig(configPath: string): { result: CheckResult; config: SitelogConfig | null } {
  if (!configExists(configPath)) {
    return {
      result: {
        name: "Config file",
        status: "fail",
        message: `Not found at ${configPath}. Run 'sitelog init'.`,
      },
      config: null,
    };
  }
  try {
    const config = loadConfig(configPath);
    return { result: { name: "Config file", status: "pass", message: configPath }, config };
  } catch (e) {
    return {
      result: {
        name: "Config file",
        status: "fail",
        message: e instanceof Error ? e.message : String(e),
      },
      config: null,
    };
  }
}

/** Integrity check plus the configured project, if any. */
export function checkDatabase(dbPath: string, projectId?: number): CheckResult {
  if (!existsSync(dbPath)) {
    return {
      name: "Database",
      status: "warn",
      message: "Not created yet (created on first start)",
    };
  }
  const sizeMB = (statSync(dbPath).size / 1024 / 1024).toFixed(1);

  let db: Database.Database | null = null;
  try {
    db = new Database(dbPath, { fileMustExist: true });
    const integrity = db.pragma("integrity_check", { simple: true });
    if (integrity !== "ok") {
      return {
        name: "Database",
        status: "fail",
        message: `Integrity check failed: ${String(integrity).slice(0, 200)}`,
      };
    }

    if (projectId !== undefined) {
      const row = db.prepare<[number], { id: number }>("SELECT id FROM projects WHERE id = ?").get(projectId);
      if (!row) {
        return {
          name: "Database",
          status: "fail",
          message: `Configured project ${projectId} does not exist`,
        };
      }
    }

    return { name: "Database", status: "pass", message: `${sizeMB} MB, integrity OK` };
  } catch (e) {
    return {
      name: "Database",
      status: "fail",
      message: `Could not open: ${e instanceof Error ? e.message : e}`,
    };
  } finally {
    db?.close();
  }
}

export function checkUploadDir(dir: string): CheckResult {
  if (!existsSync(dir)) {
    return { name: "Upload directory", status: "warn", message: `${dir} (created on first start)` };
  }
  try {
    accessSync(dir, constants.W_OK);
  } catch {
    return { name: "Upload directory", status: "fail", message: `${dir} is not writable` };
  }
  const files = readdirSync(dir).length;
  return { name: "Upload directory", status: "pass", message: `${dir} (${files} files)` };
}

function checkSystemd(): CheckResult {
  const result = spawnSync("systemctl", ["--user", "is-active", "sitelog"], { timeout: 5_000 });
  if (result.error) {
    return { name: "systemd service", status: "warn", message: "systemctl not available" };
  }
  const status = result.stdout?.toString().trim();
  if (status === "active") {
    return { name: "systemd service", status: "pass", message: "Running" };
  }
  if (status === "inactive") {
    return { name: "systemd service", status: "warn", message: "Installed but not running" };
  }
  // Service not installed
  const serviceFile = join(homedir(), ".config", "systemd", "user", "sitelog.service");
  if (!existsSync(serviceFile)) {
    return {
      name: "systemd service",
      status: "warn",
      message: "Not installed. Run 'sitelog install-service'.",
    };
  }
  return { name: "systemd service", status: "warn", message: `Status: ${status}` };
}

function checkDiskSpace(dir: string): CheckResult {
  const result = spawnSync("df", ["-h", dir], { timeout: 5_000 });
  if (result.error) {
    return { name: "Disk space", status: "warn", message: "Could not check" };
  }
  const lines = result.stdout?.toString().trim().split("\n") ?? [];
  if (lines.length < 2) {
    return { name: "Disk space", status: "warn", message: "Could not parse df output" };
  }
  const parts = lines[1].split(/\s+/);
  const available = parts[3] ?? "?";
  const usePercent = parseInt(parts[4] ?? "0");
  if (usePercent > 95) {
    return {
      name: "Disk space",
      status: "fail",
      message: `${available} free (${usePercent}% used), photos need room`,
    };
  }
  if (usePercent > 85) {
    return {
      name: "Disk space",
      status: "warn",
      message: `${available} free (${usePercent}% used)`,
    };
  }
  return { name: "Disk space", status: "pass", message: `${available} free (${usePercent}% used)` };
}

/** Print every check. Returns false when any check failed. */
export function runDoctor(configPath?: string): boolean {
  console.log(`\n${BOLD}sitelog doctor${RESET}\n`);

  const { result: configCheck, config } = checkConfig(configPath ?? getConfigPath());
  const checks = [configCheck];
  if (config) {
    checks.push(
      checkDatabase(config.storage.databasePath, config.project.id),
      checkUploadDir(config.storage.uploadDir),
    );
  }
  checks.push(checkSystemd());
  const dataDir = config?.storage.uploadDir ?? getConfigDir();
  checks.push(checkDiskSpace(existsSync(dataDir) ? dataDir : homedir()));

  const maxNameLen = Math.max(...checks.map((c) => c.name.length));

  for (const check of checks) {
    const pad = " ".repeat(maxNameLen - check.name.length);
    console.log(`  ${icon(check.status)} ${check.name}${pad}  ${check.message}`);
  }

  const pass = checks.filter((c) => c.status === "pass").length;
  const warn = checks.filter((c) => c.status === "warn").length;
  const fail = checks.filter((c) => c.status === "fail").length;

  console.log(`\n  ${pass} passed, ${warn} warnings, ${fail} failures\n`);

  return fail === 0;
}
