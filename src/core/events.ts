import crypto from "node:crypto";
import { EventEnvelope, FunctionToolSpec } from "./types";

export interface ParseResult {
  event?: EventEnvelope;
  error?: string;
}

export type ClientCommand =
  | { type: "session.start"; tools: FunctionToolSpec[] }
  | { type: "user.message"; text: string }
  | { type: "turn.cancel" }
  | { type: "approval.approve" }
  | { type: "approval.deny" }
  | { type: "connector.approval.respond"; approvalRequestId: string; approve: boolean; reason?: string }
  | { type: "message.delete"; messageId: string }
  | { type: "conversation.clear" }
  | {
    type: "tool.result";
    callId: string;
    output?: string;
    error?: string;
    screenshot?: string;
    currentUrl?: string;
  };

export interface CommandResult {
  command?: ClientCommand;
  error?: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function parseIncomingEvent(raw: string, maxBytes: number): ParseResult {
  const size = Buffer.byteLength(raw, "utf8");
  if (size > maxBytes) {
    return { error: `event_too_large:${size}` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { error: "invalid_json" };
  }

  if (!isRecord(parsed)) {
    return { error: "invalid_event_envelope" };
  }

  const { id, type, timestamp, sessionId, payload } = parsed;

  if (typeof id !== "string" || !id.trim()) {
    return { error: "missing_id" };
  }
  if (typeof type !== "string" || !type.trim()) {
    return { error: "missing_type" };
  }
  if (typeof timestamp !== "string" || !timestamp.trim()) {
    return { error: "missing_timestamp" };
  }
  if (typeof sessionId !== "string" || !sessionId.trim()) {
    return { error: "missing_session_id" };
  }
  if (!isRecord(payload)) {
    return { error: "missing_payload" };
  }

  return {
    event: { id, type, timestamp, sessionId, payload },
  };
}

function parseToolSpecs(value: unknown): FunctionToolSpec[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const specs: FunctionToolSpec[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    const name = asString(entry.name)?.trim();
    if (!name) continue;
    specs.push({
      name,
      description: asString(entry.description) ?? "",
      parameters: isRecord(entry.parameters) ? entry.parameters : { type: "object", properties: {} },
    });
  }
  return specs;
}

/** Maps a validated envelope onto the command it carries. */
export function toCommand(event: EventEnvelope): CommandResult {
  const { payload } = event;

  switch (event.type) {
    case "session.start":
      return { command: { type: "session.start", tools: parseToolSpecs(payload.tools) } };
    case "user.message": {
      const text = asString(payload.text)?.trim();
      return text ? { command: { type: "user.message", text } } : { error: "missing_text" };
    }
    case "turn.cancel":
      return { command: { type: "turn.cancel" } };
    case "approval.approve":
      return { command: { type: "approval.approve" } };
    case "approval.deny":
      return { command: { type: "approval.deny" } };
    case "conversation.clear":
      return { command: { type: "conversation.clear" } };
    case "connector.approval.respond": {
      const approvalRequestId = asString(payload.approvalRequestId);
      if (!approvalRequestId || typeof payload.approve !== "boolean") {
        return { error: "invalid_connector_approval" };
      }
      return {
        command: {
          type: "connector.approval.respond",
          approvalRequestId,
          approve: payload.approve,
          reason: asString(payload.reason),
        },
      };
    }
    case "message.delete": {
      const messageId = asString(payload.messageId);
      return messageId ? { command: { type: "message.delete", messageId } } : { error: "missing_message_id" };
    }
    case "tool.result": {
      const callId = asString(payload.callId);
      if (!callId) {
        return { error: "missing_call_id" };
      }
      return {
        command: {
          type: "tool.result",
          callId,
          output: asString(payload.output),
          error: asString(payload.error),
          screenshot: asString(payload.screenshot),
          currentUrl: asString(payload.currentUrl),
        },
      };
    }
    default:
      return { error: `unsupported_event_type:${event.type}` };
  }
}

export function makeEvent(
  type: string,
  sessionId: string,
  payload: Record<string, unknown>,
  id: string = crypto.randomUUID(),
  timestamp: string = new Date().toISOString(),
): EventEnvelope {
  return {
    id,
    type,
    timestamp,
    sessionId,
    payload,
  };
}
