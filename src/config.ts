import "dotenv/config";

import { EngineOptions } from "./core/conversationEngine";
import { ComputerEnvironment } from "./providers/openaiResponsesTransport";
import { TransportConfig } from "./providers";

const ENVIRONMENTS: ComputerEnvironment[] = ["browser", "mac", "windows", "linux", "ubuntu"];

export interface ServerConfig {
  port: number;
  host: string;
  maxEventBytes: number;
  clientToolTimeoutMs: number;
  conversationsTable?: string;
  transport: TransportConfig;
  engine: Partial<EngineOptions>;
}

export function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}

export function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || !raw.trim()) {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function parseEnvironment(raw: string | undefined): ComputerEnvironment {
  const value = (raw ?? "").trim().toLowerCase();
  return ENVIRONMENTS.find((environment) => environment === value) ?? "browser";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const replaysReasoning = parseFlag(env.MODEL_REPLAYS_REASONING, false);
  const computerUse = parseFlag(env.COMPUTER_USE, false);
  const mcpServerLabel = env.MCP_SERVER_LABEL?.trim() || undefined;
  const mcpServerUrl = env.MCP_SERVER_URL?.trim() || undefined;

  return {
    port: parseInteger(env.PORT, 8080),
    host: env.HOST ?? "0.0.0.0",
    maxEventBytes: parseInteger(env.MAX_EVENT_BYTES, 5_242_880),
    clientToolTimeoutMs: parseInteger(env.CLIENT_TOOL_TIMEOUT_MS, 30_000),
    conversationsTable: env.CONVERSATIONS_TABLE?.trim() || undefined,
    transport: {
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL || undefined,
      model: env.MODEL ?? (computerUse ? "computer-use-preview" : "gpt-4.1"),
      replaysReasoning,
      computerUse,
      displayWidth: parseInteger(env.COMPUTER_DISPLAY_WIDTH, 1280),
      displayHeight: parseInteger(env.COMPUTER_DISPLAY_HEIGHT, 800),
      environment: parseEnvironment(env.COMPUTER_ENVIRONMENT),
      mcpServerLabel,
      mcpServerUrl,
      mcpRequireApproval: env.MCP_REQUIRE_APPROVAL?.trim().toLowerCase() === "never" ? "never" : "always",
    },
    engine: {
      streaming: parseFlag(env.STREAMING, true),
      replaysReasoning,
      computerUse,
      strictMode: parseFlag(env.ULTRA_STRICT, false),
      connectorConfigured: Boolean(mcpServerLabel && mcpServerUrl),
    },
  };
}
