import type { ResponseInputItem } from "openai/resources/responses/responses";
import { asString, isRecord } from "../core/events";
import {
  ContinuationInput,
  ControlAction,
  ModelResponse,
  OutputItem,
  ReasoningItem,
  SafetyCheck,
  ServiceErrorDetail,
  StreamChunk,
} from "../core/types";

function str(value: unknown, fallback = ""): string {
  return asString(value) ?? fallback;
}

function parseSafetyChecks(value: unknown): SafetyCheck[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRecord).map((check) => ({
    id: str(check.id),
    code: str(check.code),
    message: str(check.message),
  }));
}

function parseAction(value: unknown): ControlAction | null {
  if (!isRecord(value)) {
    return null;
  }
  const type = asString(value.type);
  return type ? { ...value, type } : null;
}

function parseError(value: unknown): ServiceErrorDetail | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  return {
    code: asString(value.code),
    message: str(value.message, "Unknown error"),
  };
}

function messageText(content: unknown): string {
  if (!Array.isArray(content)) {
    return "";
  }
  return content
    .filter(isRecord)
    .filter((part) => part.type === "output_text")
    .map((part) => str(part.text))
    .join("");
}

export function parseOutputItem(value: unknown): OutputItem | null {
  if (!isRecord(value)) {
    return null;
  }

  const type = str(value.type);
  const id = str(value.id);
  const status = asString(value.status);

  switch (type) {
    case "function_call":
      return {
        type: "function_call",
        id,
        callId: str(value.call_id),
        name: str(value.name),
        arguments: str(value.arguments, "{}"),
        status,
      };
    case "computer_call":
      return {
        type: "computer_call",
        id,
        callId: str(value.call_id),
        action: parseAction(value.action),
        pendingSafetyChecks: parseSafetyChecks(value.pending_safety_checks),
        status,
      };
    case "reasoning":
      return {
        type: "reasoning",
        id,
        summary: Array.isArray(value.summary)
          ? value.summary.filter(isRecord).map((part) => str(part.text))
          : null,
        encryptedContent: asString(value.encrypted_content),
      };
    case "message":
      return { type: "message", id, text: messageText(value.content) };
    case "mcp_call":
      return {
        type: "mcp_call",
        id,
        name: str(value.name),
        serverLabel: str(value.server_label),
        status,
        error: asString(value.error),
      };
    case "mcp_approval_request":
      return {
        type: "mcp_approval_request",
        id,
        name: str(value.name),
        serverLabel: str(value.server_label),
        arguments: str(value.arguments, "{}"),
      };
    case "image_generation_call":
      return { type: "image_generation_call", id, result: asString(value.result), status };
    default:
      return { type: "unknown", id, kind: type };
  }
}

export function parseResponse(value: unknown): ModelResponse {
  const record: Record<string, unknown> = isRecord(value) ? value : {};
  const output = Array.isArray(record.output)
    ? record.output.map(parseOutputItem).filter((item): item is OutputItem => item !== null)
    : [];

  const outputText = asString(record.output_text)
    ?? output.map((item) => (item.type === "message" ? item.text : "")).join("");

  return {
    id: str(record.id),
    status: str(record.status, "completed"),
    output,
    outputText,
    error: parseError(record.error),
  };
}

export function parseStreamEvent(value: unknown): StreamChunk {
  const record: Record<string, unknown> = isRecord(value) ? value : {};
  const kind = str(record.type, "unknown");
  const chunk: StreamChunk = { kind };

  if (isRecord(record.response)) {
    chunk.response = parseResponse(record.response);
    chunk.responseId = chunk.response.id || undefined;
  }

  const item = parseOutputItem(record.item);
  if (item) {
    chunk.item = item;
  }

  const delta = asString(record.delta);
  if (delta !== undefined) {
    chunk.delta = delta;
  }

  if (kind === "error") {
    chunk.error = {
      code: asString(record.code),
      message: str(record.message, "Stream error"),
    };
  } else if (kind === "response.failed") {
    chunk.error = chunk.response?.error ?? { message: "The response failed." };
  }

  return chunk;
}

/** Item-level stream events carry no response id; stamp the one last seen. */
export async function* stampResponseIds(events: AsyncIterable<unknown>): AsyncGenerator<StreamChunk> {
  let responseId: string | undefined;
  for await (const event of events) {
    const chunk = parseStreamEvent(event);
    if (chunk.responseId) {
      responseId = chunk.responseId;
    } else if (responseId) {
      chunk.responseId = responseId;
    }
    yield chunk;
  }
}

function imageUrl(screenshot: string): string {
  return screenshot.startsWith("data:") ? screenshot : `data:image/png;base64,${screenshot}`;
}

export function toInputItems(outputs: ContinuationInput[], reasoning: ReasoningItem[] | null): ResponseInputItem[] {
  const items: ResponseInputItem[] = [];

  for (const item of reasoning ?? []) {
    items.push({
      type: "reasoning",
      id: item.id,
      summary: (item.summary ?? []).map((text) => ({ type: "summary_text" as const, text })),
      ...(item.encryptedContent ? { encrypted_content: item.encryptedContent } : {}),
    });
  }

  for (const output of outputs) {
    switch (output.type) {
      case "function_call_output":
        items.push({ type: "function_call_output", call_id: output.callId, output: output.output });
        break;
      case "computer_call_output": {
        const screenshot = {
          type: "computer_screenshot" as const,
          image_url: imageUrl(output.screenshot),
          ...(output.currentUrl ? { current_url: output.currentUrl } : {}),
        };
        items.push({
          type: "computer_call_output",
          call_id: output.callId,
          output: screenshot,
          acknowledged_safety_checks: output.acknowledgedSafetyChecks.map((check) => ({
            id: check.id,
            code: check.code,
            message: check.message,
          })),
        });
        break;
      }
      case "mcp_approval_response":
        items.push({
          type: "mcp_approval_response",
          approval_request_id: output.approvalRequestId,
          approve: output.approve,
          ...(output.reason ? { reason: output.reason } : {}),
        });
        break;
    }
  }

  return items;
}
