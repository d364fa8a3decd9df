import { FunctionToolSpec, ModelTransport } from "../core/types";
import { ComputerEnvironment, OpenAIResponsesTransport } from "./openaiResponsesTransport";

export interface TransportConfig {
  apiKey?: string;
  baseURL?: string;
  model: string;
  replaysReasoning: boolean;
  computerUse: boolean;
  displayWidth: number;
  displayHeight: number;
  environment: ComputerEnvironment;
  mcpServerLabel?: string;
  mcpServerUrl?: string;
  mcpRequireApproval: "always" | "never";
}

export function buildTransport(config: TransportConfig, functions: FunctionToolSpec[]): ModelTransport {
  if (!config.apiKey) {
    throw new Error("OPENAI_API_KEY is required");
  }

  return new OpenAIResponsesTransport({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    model: config.model,
    includeReasoning: config.replaysReasoning,
    functions,
    computer: config.computerUse
      ? {
        displayWidth: config.displayWidth,
        displayHeight: config.displayHeight,
        environment: config.environment,
      }
      : undefined,
    connector: config.mcpServerLabel && config.mcpServerUrl
      ? {
        serverLabel: config.mcpServerLabel,
        serverUrl: config.mcpServerUrl,
        requireApproval: config.mcpRequireApproval,
      }
      : undefined,
  });
}
