import { getActorId, getRequestId } from "./request-context";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? "INFO").toUpperCase();
  if (configured === "SILENT") return Number.POSITIVE_INFINITY;
  return isLogLevel(configured) ? LEVEL_RANK[configured] : LEVEL_RANK.INFO;
}

export function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
) {
  if (LEVEL_RANK[level] < threshold()) return;

  const entry = {
    level,
    message,
    ts: Date.now(),
    requestId: getRequestId() ?? null,
    actorId: getActorId() ?? null,
    ...meta,
  };

  // JSON-only output (log aggregation safe)
  console.log(JSON.stringify(entry));
}

export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}
