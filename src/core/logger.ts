/**
 * JSON-lines logger. Entries carry the session, message, call and response
 * they concern so a whole tool-call chain can be followed with one filter.
 */

export interface LogContext {
  sessionId?: string;
  messageId?: string;
  callId?: string;
  responseId?: string;
}

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVELS: LogLevel[] = ["DEBUG", "INFO", "WARN", "ERROR"];
const LEVEL_RANK: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

// Screenshots and tool outputs can be megabytes; keep log lines readable.
const MAX_FIELD_CHARS = 512;

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? "").toUpperCase();
  const level = LEVELS.find((name) => name === configured);
  return LEVEL_RANK[level ?? "INFO"];
}

function clip(extra: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!extra) {
    return {};
  }
  const clipped: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(extra)) {
    clipped[key] = typeof value === "string" && value.length > MAX_FIELD_CHARS
      ? `${value.slice(0, MAX_FIELD_CHARS)}…(${value.length} chars)`
      : value;
  }
  return clipped;
}

function write(level: LogLevel, message: string, ctx: LogContext, extra?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < threshold()) {
    return;
  }

  const line = JSON.stringify({
    level,
    message,
    ...ctx,
    ...clip(extra),
    ts: new Date().toISOString(),
  });

  switch (level) {
    case "ERROR":
      console.error(line);
      break;
    case "WARN":
      console.warn(line);
      break;
    case "DEBUG":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

export const logger = {
  debug(message: string, ctx: LogContext = {}, extra?: Record<string, unknown>): void {
    write("DEBUG", message, ctx, extra);
  },
  info(message: string, ctx: LogContext = {}, extra?: Record<string, unknown>): void {
    write("INFO", message, ctx, extra);
  },
  warn(message: string, ctx: LogContext = {}, extra?: Record<string, unknown>): void {
    write("WARN", message, ctx, extra);
  },
  error(message: string, ctx: LogContext = {}, extra?: Record<string, unknown>): void {
    write("ERROR", message, ctx, extra);
  },
};
