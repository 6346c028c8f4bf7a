import pino, { type LevelWithSilent, type Logger } from "pino";

type LogFields = Record<string, unknown>;

const DEFAULT_LOG_LEVEL: LevelWithSilent = "info";
const VALID_LOG_LEVELS = new Set<string>(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);
const STDERR_FD = 2;

let instance: Logger | undefined;

function isLogLevel(value: string): value is LevelWithSilent {
  return VALID_LOG_LEVELS.has(value);
}

function readLogLevel(): LevelWithSilent {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return DEFAULT_LOG_LEVEL;
  if (raw === "warning") return "warn";
  return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

// stdout carries the MCP stdio transport, so every record goes to stderr
function createLogger(): Logger {
  return pino(
    {
      level: readLogLevel(),
      base: { service: process.env.APP_NAME?.trim() || "iam" },
      timestamp: () => `,"ts":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => ({ level: label }),
      },
      messageKey: "message",
    },
    pino.destination({ dest: STDERR_FD, sync: true }),
  );
}

function getLogger(): Logger {
  if (!instance) {
    instance = createLogger();
  }
  return instance;
}

export function debug(message: string, fields?: LogFields): void {
  getLogger().debug(fields ?? {}, message);
}

export function info(message: string, fields?: LogFields): void {
  getLogger().info(fields ?? {}, message);
}

export function warn(message: string, fields?: LogFields): void {
  getLogger().warn(fields ?? {}, message);
}

export function error(message: string, fields?: LogFields): void {
  getLogger().error(fields ?? {}, message);
}
