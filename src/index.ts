#!/usr/bin/env node

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { homedir } from "node:os";
import { fileURLToPath } from "node:url";
import {
  loadConfig,
  defaultConfig,
  getConfigDir,
  getConfigPath,
  configExists,
} from "./config.js";
import { initLogger, getLogger } from "./util/logger.js";
import { createApp } from "./app.js";
import { exportProject } from "./export/json.js";
import { runDoctor } from "./doctor.js";

const __filename = fileURLToPath(import.meta.url);

function printUsage(): void {
  console.log(`
sitelog — Construction site diary

Usage:
  sitelog start                 Start the HTTP API
  sitelog init                  Write a default config file
  sitelog report [--out <file>] Render the full PDF report
  sitelog export [--out <file>] Export project data as JSON
  sitelog doctor                Check config, database and upload directory
  sitelog install-service       Install systemd user service
  sitelog help                  Show this help

Options:
  --config <path>   Path to config file (default: ~/.sitelog/config.json)
`);
}

function optionValue(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function cmdInit(configPath?: string): void {
  const path = configPath ?? getConfigPath();
  mkdirSync(configPath ? dirname(resolve(path)) : getConfigDir(), { recursive: true });

  if (configExists(path)) {
    console.log(`Config already exists at ${path}`);
    return;
  }

  writeFileSync(path, JSON.stringify(defaultConfig(), null, 2) + "\n");
  console.log(`Created config at ${path}`);
  console.log("\nNext steps:");
  console.log(`1. Edit ${path} (project defaults, port, storage paths)`);
  console.log("2. Run 'sitelog start' to start the API");
}

async function cmdReport(configPath: string | undefined, outPath: string | undefined): Promise<void> {
  const config = loadConfig(configPath);
  initLogger(config.log.level);

  const app = await createApp(config);
  try {
    const doc = await app.renderer.renderFullReport(app.project.id);
    const target = resolve(outPath ?? doc.filename);
    writeFileSync(target, doc.data);
    console.log(`Report written to ${target} (${doc.data.length} bytes)`);
  } finally {
    await app.close();
  }
}

async function cmdExport(configPath: string | undefined, outPath: string | undefined): Promise<void> {
  const config = loadConfig(configPath);
  initLogger(config.log.level);

  const app = await createApp(config);
  try {
    const json = JSON.stringify(exportProject(app.stores, app.project.id), null, 2) + "\n";
    if (outPath) {
      writeFileSync(resolve(outPath), json);
      console.log(`Export written to ${resolve(outPath)}`);
    } else {
      process.stdout.write(json);
    }
  } finally {
    await app.close();
  }
}

function cmdInstallService(configPath?: string): void {
  const path = process.env.PATH ?? "/usr/local/bin:/usr/bin:/bin";
  const configArg = configPath ? ` --config ${resolve(configPath)}` : "";

  const serviceContent = `[Unit]
Description=sitelog — Construction Site Diary
After=network-online.target
Wants=network-online.target

[Service]
Type=simple
ExecStart=${process.execPath} ${__filename} start${configArg}
Restart=always
RestartSec=10
Environment=HOME=${homedir()}
Environment=NODE_ENV=production
Environment=PATH=${path}

[Install]
WantedBy=default.target
`;

  const serviceDir = join(homedir(), ".config", "systemd", "user");
  mkdirSync(serviceDir, { recursive: true });
  const servicePath = join(serviceDir, "sitelog.service");
  writeFileSync(servicePath, serviceContent);
  console.log(`Service file written to ${servicePath}`);
  console.log("\nTo enable and start:");
  console.log("  systemctl --user daemon-reload");
  console.log("  systemctl --user enable sitelog");
  console.log("  systemctl --user start sitelog");
  console.log("\nTo check status:");
  console.log("  systemctl --user status sitelog");
  console.log("  journalctl --user -u sitelog -f");
}

async function cmdStart(configPath?: string): Promise<void> {
  const config = loadConfig(configPath);
  initLogger(config.log.level);
  const log = getLogger("main");

  log.info("starting sitelog");
  const app = await createApp(config);
  await app.server.start();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, "shutting down");
    await app.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((e) => {
      log.error({ err: e }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  log.info({ port: app.server.port(), projectId: app.project.id }, "sitelog is running");
}

function fail(e: unknown): never {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
}

// CLI entry point
const args = process.argv.slice(2);
const command = args[0];
const configPath = optionValue(args, "--config");

switch (command) {
  case "start":
  case undefined:
    cmdStart(configPath).catch((e) => {
      console.error("Fatal:", e instanceof Error ? e.message : e);
      process.exit(1);
    });
    break;

  case "init":
    try {
      cmdInit(configPath);
    } catch (e) {
      fail(e);
    }
    break;

  case "report":
    cmdReport(configPath, optionValue(args, "--out")).catch(fail);
    break;

  case "export":
    cmdExport(configPath, optionValue(args, "--out")).catch(fail);
    break;

  case "doctor":
    process.exitCode = runDoctor(configPath) ? 0 : 1;
    break;

  case "install-service":
    cmdInstallService(configPath);
    break;

  case "help":
  case "--help":
  case "-h":
    printUsage();
    break;

  default:
    console.error(`Unknown command: ${command}`);
    printUsage();
    process.exit(1);
}
