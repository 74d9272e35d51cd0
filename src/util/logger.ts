import pino from "pino";

let logger: pino.Logger = pino({ name: "sitelog", level: "info" });

export function initLogger(level: string): void {
  logger = pino({
    name: "sitelog",
    level,
    transport:
      process.stdout.isTTY
        ? { target: "pino/file", options: { destination: 1 } }
        : undefined,
  });
}

export function getLogger(component?: string): pino.Logger {
  return component ? logger.child({ component }) : logger;
}

