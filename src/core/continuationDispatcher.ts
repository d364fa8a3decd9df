import { ContinuationContext } from "./continuationContext";
import {
  CancellationError,
  errorMessage,
  isCancellation,
  isNotFound,
  isStaleContinuation,
  ModelServiceError,
} from "./errors";
import { logger } from "./logger";
import { Scheduler, sleep } from "./scheduler";
import {
  ContinuationInput,
  ModelResponse,
  ModelTransport,
  OutputItem,
  ReasoningItem,
  StreamChunk,
  TurnInput,
} from "./types";

export type DispatchMode = "stream" | "oneshot";

export type DispatchPhase = "idle" | "sending" | "streaming" | "completed" | "failed";

export type DispatchResult =
  | { ok: true; responseId: string | null }
  | { ok: false; error: unknown; cancelled: boolean };

/** Receives model output as it arrives and folds it into the conversation. */
export interface DispatchSink {
  applyChunk(chunk: StreamChunk, messageId: string): void;
  applyResponse(response: ModelResponse, messageId: string): void;
}

export interface DispatcherOptions {
  streaming: boolean;
  replaysReasoning: boolean;
  reasoningPollAttempts: number;
  reasoningPollIntervalMs: number;
}

export interface DispatcherDeps {
  sessionId: string;
  transport: ModelTransport;
  context: ContinuationContext;
  scheduler: Scheduler;
  sink: DispatchSink;
}

export interface ResumeRequest {
  messageId: string;
  signal: AbortSignal;
  mode?: DispatchMode;
}

type Sender = {
  stream: (continuationId: string | null, reasoning: ReasoningItem[] | null) => AsyncIterable<StreamChunk>;
  oneShot: (continuationId: string | null, reasoning: ReasoningItem[] | null) => Promise<ModelResponse>;
};

const STREAM_FAILURE_KINDS = new Set(["error", "response.failed"]);

function isReasoning(item: OutputItem): item is ReasoningItem {
  return item.type === "reasoning";
}

function needsRefresh(items: ReasoningItem[]): boolean {
  return items.some((item) => item.summary === null);
}

export class ContinuationDispatcher {
  private phaseValue: DispatchPhase = "idle";

  constructor(
    private readonly deps: DispatcherDeps,
    private readonly options: DispatcherOptions,
  ) {}

  get phase(): DispatchPhase {
    return this.phaseValue;
  }

  get defaultMode(): DispatchMode {
    return this.options.streaming ? "stream" : "oneshot";
  }

  /** Sends a user turn against `continuationId`. */
  startTurn(
    input: TurnInput,
    continuationId: string | null,
    request: ResumeRequest,
  ): Promise<DispatchResult> {
    const { transport } = this.deps;
    return this.dispatch(continuationId, null, request, {
      stream: (id) => transport.streamTurn(input, id, request.signal),
      oneShot: (id) => transport.sendOneShot(input, id, request.signal),
    });
  }

  /** Returns tool outputs to the model and folds the reply into the owning message. */
  async resume(
    outputs: ContinuationInput[],
    continuationId: string | null,
    request: ResumeRequest,
  ): Promise<DispatchResult> {
    const { transport } = this.deps;
    let previousId = continuationId;
    let reasoning: ReasoningItem[] | null = null;

    if (this.options.replaysReasoning && previousId) {
      try {
        reasoning = await this.loadReasoning(previousId, request);
      } catch (error) {
        if (isCancellation(error)) {
          this.phaseValue = "failed";
          return { ok: false, error, cancelled: true };
        }
        if (isNotFound(error)) {
          logger.warn("Prior response not found, resuming without it", this.ctx(request, previousId));
          this.deps.context.forgetReasoning(previousId);
          previousId = null;
        } else {
          logger.warn("Reasoning refresh failed", this.ctx(request, previousId), { error: errorMessage(error) });
        }
      }
    }

    return this.dispatch(previousId, reasoning, request, {
      stream: (id, attached) => transport.resumeStream(outputs, id, attached, request.signal),
      oneShot: (id, attached) => transport.resume(outputs, id, attached, request.signal),
    });
  }

  private async dispatch(
    continuationId: string | null,
    reasoning: ReasoningItem[] | null,
    request: ResumeRequest,
    sender: Sender,
  ): Promise<DispatchResult> {
    const mode = request.mode ?? this.defaultMode;
    let attemptId = continuationId;
    let attached: ReasoningItem[] | null = reasoning?.length ? reasoning : null;
    let staleCredits = attemptId ? 1 : 0;

    for (;;) {
      this.phaseValue = "sending";
      try {
        let responseId: string | null;
        if (mode === "stream") {
          responseId = await this.consume(sender.stream(attemptId, attached), request);
        } else {
          const response = await sender.oneShot(attemptId, attached);
          if (request.signal.aborted) {
            throw new CancellationError();
          }
          this.deps.sink.applyResponse(response, request.messageId);
          responseId = response.id;
        }
        this.phaseValue = "completed";
        return { ok: true, responseId };
      } catch (error) {
        this.phaseValue = "failed";

        if (request.signal.aborted || isCancellation(error)) {
          logger.info("Dispatch cancelled", this.ctx(request, attemptId));
          return { ok: false, error: new CancellationError(), cancelled: true };
        }

        if (attemptId && staleCredits > 0 && isStaleContinuation(error)) {
          staleCredits -= 1;
          logger.warn("Continuation id rejected as stale, retrying without it", this.ctx(request, attemptId), {
            error: errorMessage(error),
          });
          this.deps.context.forgetReasoning(attemptId);
          this.deps.context.clear("stale_continuation", { messageId: request.messageId });
          // Reasoning belongs to the rejected chain; the fresh context starts without it.
          attached = null;
          attemptId = null;
          continue;
        }

        logger.warn("Dispatch failed", this.ctx(request, attemptId), { error: errorMessage(error) });
        return { ok: false, error, cancelled: false };
      }
    }
  }

  private async consume(chunks: AsyncIterable<StreamChunk>, request: ResumeRequest): Promise<string | null> {
    let responseId: string | null = null;

    for await (const chunk of chunks) {
      if (request.signal.aborted) {
        throw new CancellationError();
      }
      this.phaseValue = "streaming";

      if (STREAM_FAILURE_KINDS.has(chunk.kind)) {
        throw new ModelServiceError(chunk.error?.message ?? "The response stream failed.", {
          code: chunk.error?.code,
        });
      }
      if (chunk.responseId) {
        responseId = chunk.responseId;
      }
      this.deps.sink.applyChunk(chunk, request.messageId);
    }

    if (request.signal.aborted) {
      throw new CancellationError();
    }
    return responseId;
  }

  /**
   * Waits for reasoning streamed under `responseId` to land in the cache,
   * then falls back to fetching the full response.
   */
  private async loadReasoning(responseId: string, request: ResumeRequest): Promise<ReasoningItem[]> {
    const { context, scheduler, transport } = this.deps;
    let cached = context.reasoningFor(responseId);

    for (let attempt = 0; attempt < this.options.reasoningPollAttempts; attempt++) {
      if (cached && !needsRefresh(cached)) {
        return cached;
      }
      await sleep(scheduler, this.options.reasoningPollIntervalMs, request.signal);
      cached = context.reasoningFor(responseId);
    }

    if (cached && !needsRefresh(cached)) {
      return cached;
    }

    logger.debug("Refreshing reasoning from the full response", this.ctx(request, responseId));
    const full = await transport.fetchFullResponse(responseId);
    const refreshed = full.output.filter(isReasoning);
    context.rememberReasoning(responseId, refreshed);
    return refreshed;
  }

  private ctx(request: ResumeRequest, responseId: string | null) {
    return {
      sessionId: this.deps.sessionId,
      messageId: request.messageId,
      responseId: responseId ?? undefined,
    };
  }
}
