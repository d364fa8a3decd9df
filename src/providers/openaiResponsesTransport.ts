import OpenAI, { APIError, APIUserAbortError } from "openai";
import type {
  ResponseCreateParamsNonStreaming,
  ResponseInput,
  Tool,
} from "openai/resources/responses/responses";
import { CancellationError, errorMessage, ModelServiceError } from "../core/errors";
import {
  ContinuationInput,
  FunctionToolSpec,
  ModelResponse,
  ModelTransport,
  ReasoningItem,
  StreamChunk,
  TurnInput,
} from "../core/types";
import { parseResponse, stampResponseIds, toInputItems } from "./wire";

export type ComputerEnvironment = "browser" | "mac" | "windows" | "linux" | "ubuntu";

export interface OpenAIResponsesConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  instructions?: string;
  includeReasoning: boolean;
  functions: FunctionToolSpec[];
  computer?: {
    displayWidth: number;
    displayHeight: number;
    environment: ComputerEnvironment;
  };
  connector?: {
    serverLabel: string;
    serverUrl: string;
    requireApproval: "always" | "never";
  };
}

export function toServiceError(error: unknown): Error {
  if (error instanceof APIUserAbortError || (error instanceof Error && error.name === "AbortError")) {
    return new CancellationError();
  }
  if (error instanceof APIError) {
    return new ModelServiceError(error.message, {
      status: error.status,
      code: typeof error.code === "string" ? error.code : undefined,
    });
  }
  if (error instanceof ModelServiceError || error instanceof CancellationError) {
    return error;
  }
  return new ModelServiceError(errorMessage(error));
}

/** Model transport over the OpenAI Responses API, chained by `previous_response_id`. */
export class OpenAIResponsesTransport implements ModelTransport {
  readonly name = "openai-responses";
  private readonly client: OpenAI;
  private readonly tools: Tool[];

  constructor(private readonly config: OpenAIResponsesConfig, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
    this.tools = this.buildTools();
  }

  streamTurn(input: TurnInput, continuationId: string | null, signal: AbortSignal): AsyncIterable<StreamChunk> {
    return this.stream(this.body([{ role: "user", content: input.text }], continuationId), signal);
  }

  sendOneShot(input: TurnInput, continuationId: string | null, signal: AbortSignal): Promise<ModelResponse> {
    return this.create(this.body([{ role: "user", content: input.text }], continuationId), signal);
  }

  resumeStream(
    outputs: ContinuationInput[],
    continuationId: string | null,
    reasoning: ReasoningItem[] | null,
    signal: AbortSignal,
  ): AsyncIterable<StreamChunk> {
    return this.stream(this.body(toInputItems(outputs, reasoning), continuationId), signal);
  }

  resume(
    outputs: ContinuationInput[],
    continuationId: string | null,
    reasoning: ReasoningItem[] | null,
    signal: AbortSignal,
  ): Promise<ModelResponse> {
    return this.create(this.body(toInputItems(outputs, reasoning), continuationId), signal);
  }

  async fetchFullResponse(continuationId: string): Promise<ModelResponse> {
    try {
      return parseResponse(await this.client.responses.retrieve(continuationId));
    } catch (error) {
      throw toServiceError(error);
    }
  }

  private body(input: ResponseInput, continuationId: string | null): ResponseCreateParamsNonStreaming {
    const { model, instructions, includeReasoning, computer } = this.config;
    return {
      model,
      input,
      store: true,
      ...(this.tools.length ? { tools: this.tools } : {}),
      ...(continuationId ? { previous_response_id: continuationId } : {}),
      ...(instructions ? { instructions } : {}),
      ...(includeReasoning ? { include: ["reasoning.encrypted_content" as const] } : {}),
      ...(computer ? { truncation: "auto" as const } : {}),
    };
  }

  private async create(body: ResponseCreateParamsNonStreaming, signal: AbortSignal): Promise<ModelResponse> {
    try {
      return parseResponse(await this.client.responses.create(body, { signal }));
    } catch (error) {
      throw toServiceError(error);
    }
  }

  private async *stream(body: ResponseCreateParamsNonStreaming, signal: AbortSignal): AsyncGenerator<StreamChunk> {
    let events: AsyncIterable<unknown>;
    try {
      events = await this.client.responses.create({ ...body, stream: true }, { signal });
    } catch (error) {
      throw toServiceError(error);
    }

    try {
      yield* stampResponseIds(events);
    } catch (error) {
      throw toServiceError(error);
    }
  }

  private buildTools(): Tool[] {
    const { functions, computer, connector } = this.config;
    const tools: Tool[] = functions.map((spec): Tool => ({
      type: "function",
      name: spec.name,
      description: spec.description,
      parameters: spec.parameters,
      strict: false,
    }));

    if (computer) {
      tools.push({
        type: "computer_use_preview",
        display_width: computer.displayWidth,
        display_height: computer.displayHeight,
        environment: computer.environment,
      });
    }

    if (connector) {
      tools.push({
        type: "mcp",
        server_label: connector.serverLabel,
        server_url: connector.serverUrl,
        require_approval: connector.requireApproval,
      });
    }
    return tools;
  }
}
