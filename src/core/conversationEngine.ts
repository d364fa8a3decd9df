import crypto from "node:crypto";
import { ActivityFeed } from "./activityFeed";
import { BatchPayload, CallRegistry, SubmitOutcome } from "./callRegistry";
import { ComputerUseLoop, ResolveOutcome } from "./computerUseLoop";
import { ContinuationContext } from "./continuationContext";
import { ContinuationDispatcher, DispatchResult } from "./continuationDispatcher";
import {
  errorMessage,
  isCancellation,
  isTransientServerError,
  shouldSurface,
  userFacingMessage,
} from "./errors";
import { logger } from "./logger";
import { RetryManager } from "./retryManager";
import { SafetyApprovalGate } from "./safetyGate";
import { Scheduler, systemScheduler, TimerGroup } from "./scheduler";
import {
  ActionExecutor,
  ChatMessage,
  ConnectorApprovalItem,
  ConnectorApprovalRequest,
  EngineEvent,
  EngineListener,
  EngineStatus,
  FunctionCallItem,
  FunctionExecutor,
  ModelResponse,
  ModelTransport,
  OutputItem,
  ReasoningItem,
  Role,
  SafetyApprovalRequest,
  StreamChunk,
  TurnInput,
} from "./types";

export const BUSY_NOTICE = "Please wait: the assistant is completing a computer step.";
export const DENIED_NOTICE = "Action canceled. Safety checks were not approved, so this step was skipped.";
export const CANCELLED_MARKER = "\n\n[Streaming cancelled by user]";

const HEARTBEAT_LINES = [
  "Generating image...",
  "Still rendering the image...",
  "Adding detail to the image...",
  "Almost done with the image...",
];

const FLUSH_NOW = /[.!?\n]\s*$/;
const FLUSH_THRESHOLD = 64;
const CONNECTOR_FRESHNESS_MS = 24 * 60 * 60 * 1000;

interface LiveResponse {
  messageId: string;
  done: Promise<void>;
  release: () => void;
}

function sameStatus(a: EngineStatus, b: EngineStatus): boolean {
  if (a.kind === "running-tool" && b.kind === "running-tool") {
    return a.name === b.name;
  }
  return a.kind === b.kind;
}

export interface EngineOptions {
  streaming: boolean;
  replaysReasoning: boolean;
  computerUse: boolean;
  strictMode: boolean;
  connectorConfigured: boolean;
  batchWaitMs: number;
  batchRetryDelayMs: number;
  maxBatchSubmitAttempts: number;
  reasoningPollAttempts: number;
  reasoningPollIntervalMs: number;
  maxLoopIterations: number;
  maxConsecutiveWaits: number;
  lowLevelThreshold: number;
  blankThreshold: number;
  retryBackoffMs: number;
  activityCapacity: number;
  cacheCapacity: number;
  heartbeatIntervalMs: number;
  deltaFlushMs: number;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  streaming: true,
  replaysReasoning: false,
  computerUse: false,
  strictMode: false,
  connectorConfigured: false,
  batchWaitMs: 5_000,
  batchRetryDelayMs: 1_000,
  maxBatchSubmitAttempts: 5,
  reasoningPollAttempts: 20,
  reasoningPollIntervalMs: 150,
  maxLoopIterations: 5,
  maxConsecutiveWaits: 3,
  lowLevelThreshold: 3,
  blankThreshold: 2,
  retryBackoffMs: 800,
  activityCapacity: 12,
  cacheCapacity: 20,
  heartbeatIntervalMs: 4_000,
  deltaFlushMs: 60,
};

export interface EngineDeps {
  sessionId: string;
  transport: ModelTransport;
  functions: FunctionExecutor;
  actions?: ActionExecutor;
  scheduler?: Scheduler;
  now?: () => number;
  newId?: () => string;
}

export interface EngineSnapshot {
  messages: ChatMessage[];
  status: EngineStatus;
  activity: string[];
  continuationId: string | null;
  pendingApproval: SafetyApprovalRequest | null;
  pendingConnectorApproval: ConnectorApprovalRequest | null;
}

/**
 * One conversation's continuation engine. Every mutation of shared state
 * happens on the event loop between awaits; network calls and executors
 * run as independent promises that report back through the methods here.
 */
export class ConversationEngine {
  readonly context: ContinuationContext;
  readonly registry: CallRegistry;
  readonly dispatcher: ContinuationDispatcher;
  readonly gate: SafetyApprovalGate;
  readonly retry: RetryManager;
  readonly loop: ComputerUseLoop | null;

  private readonly options: EngineOptions;
  private readonly scheduler: Scheduler;
  private readonly now: () => number;
  private readonly newId: () => string;
  private readonly activity: ActivityFeed;
  private readonly timers: TimerGroup;
  private readonly listeners = new Set<EngineListener>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly deltaBuffers = new Map<string, string>();
  private readonly awaitingComputer = new Set<string>();
  private readonly liveResponses = new Map<string, LiveResponse>();
  private messages: ChatMessage[] = [];
  private statusValue: EngineStatus = { kind: "idle" };
  private activeMessageId: string | null = null;
  private connectorApproval: ConnectorApprovalRequest | null = null;
  private connectorValidatedAt: number | null = null;
  private heartbeatTicks = 0;

  constructor(private readonly deps: EngineDeps, options: Partial<EngineOptions> = {}) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
    this.scheduler = deps.scheduler ?? systemScheduler;
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? (() => crypto.randomUUID());
    this.activity = new ActivityFeed(this.options.activityCapacity);
    this.timers = new TimerGroup(this.scheduler);
    this.context = new ContinuationContext(deps.sessionId, this.options.cacheCapacity);

    this.registry = new CallRegistry(
      {
        sessionId: deps.sessionId,
        scheduler: this.scheduler,
        submit: (turnId, messageId, payloads) => this.submitOutputs(turnId, messageId, payloads),
        // The model only accepts outputs once the response that asked for them has finished.
        awaitTurn: (turnId) => this.liveResponses.get(turnId)?.done ?? Promise.resolve(),
        onAbandon: (_turnId, messageId, error) => this.failTurn(messageId, error),
        onSubmitted: (_turnId, messageId) => {
          this.continueAfterResponse(messageId).catch((error: unknown) => {
            logger.error("Post-submission handling threw", this.ctx(messageId), { error: errorMessage(error) });
          });
        },
      },
      {
        batchWaitMs: this.options.batchWaitMs,
        retryDelayMs: this.options.batchRetryDelayMs,
        maxSubmitAttempts: this.options.maxBatchSubmitAttempts,
      },
    );

    this.dispatcher = new ContinuationDispatcher(
      {
        sessionId: deps.sessionId,
        transport: deps.transport,
        context: this.context,
        scheduler: this.scheduler,
        sink: {
          applyChunk: (chunk, messageId) => this.applyChunk(chunk, messageId),
          applyResponse: (response, messageId) => this.applyResponse(response, messageId),
        },
      },
      {
        streaming: this.options.streaming,
        replaysReasoning: this.options.replaysReasoning,
        reasoningPollAttempts: this.options.reasoningPollAttempts,
        reasoningPollIntervalMs: this.options.reasoningPollIntervalMs,
      },
    );

    this.gate = new SafetyApprovalGate(deps.sessionId);
    this.gate.bind({
      approve: (request) => this.runApproved(request),
      deny: (request) => this.onDenied(request),
    });

    this.retry = new RetryManager({
      sessionId: deps.sessionId,
      scheduler: this.scheduler,
      backoffMs: this.options.retryBackoffMs,
      hasStreamedText: (messageId) => {
        this.flush(messageId);
        return Boolean(this.findMessage(messageId)?.text);
      },
      preconditionFresh: () => this.connectorFresh(),
      cancelInFlight: (messageId) => {
        this.controllers.get(messageId)?.abort();
        this.controllers.set(messageId, new AbortController());
        this.setStatus({ kind: "connecting" });
      },
      replay: (messageId, retry) => this.runTurn(messageId, retry.input, retry.baseContinuationId),
    });

    this.loop = this.options.computerUse && deps.actions
      ? new ComputerUseLoop(
        {
          sessionId: deps.sessionId,
          transport: deps.transport,
          dispatcher: this.dispatcher,
          context: this.context,
          executor: deps.actions,
          gate: this.gate,
          host: {
            messageImages: (messageId) => this.findMessage(messageId)?.images ?? [],
            attachVisual: (messageId, image) => this.attachImage(messageId, image),
            notice: (text) => this.appendMessage("system", text),
            fail: (messageId, error) => this.failTurn(messageId, error),
            setStatus: (status) => this.setStatus(status),
            activity: (line) => this.pushActivity(line),
          },
        },
        {
          maxIterations: this.options.maxLoopIterations,
          maxConsecutiveWaits: this.options.maxConsecutiveWaits,
          lowLevelThreshold: this.options.lowLevelThreshold,
          blankThreshold: this.options.blankThreshold,
          strict: this.options.strictMode,
        },
      )
      : null;
  }

  // ─── Observation ──────────────────────────────────────────────────────────

  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get status(): EngineStatus {
    return this.statusValue;
  }

  snapshot(): EngineSnapshot {
    return {
      messages: this.messages.map((message) => ({ ...message, images: [...message.images], toolsUsed: [...message.toolsUsed] })),
      status: this.statusValue,
      activity: this.activity.snapshot(),
      continuationId: this.context.continuationId,
      pendingApproval: this.gate.pending,
      pendingConnectorApproval: this.connectorApproval,
    };
  }

  restore(messages: ChatMessage[], continuationId: string | null): void {
    this.messages = messages.map((message) => ({ ...message }));
    this.context.restore(continuationId);
  }

  // ─── Lifecycle entry points ───────────────────────────────────────────────

  async sendUserMessage(text: string): Promise<boolean> {
    const trimmed = text.trim();
    if (!trimmed) {
      return false;
    }

    if (this.loop?.isRunning || this.gate.pending) {
      this.appendMessage("system", BUSY_NOTICE);
      return false;
    }
    if (this.activeMessageId) {
      logger.warn("Turn rejected while another is in flight", this.ctx(this.activeMessageId));
      return false;
    }

    const previous = this.lastAssistantId();
    if (previous) {
      if (!(await this.settleDanglingChain(previous))) {
        return false;
      }
      this.purgeTurnState(previous);
    }

    this.appendMessage("user", trimmed);
    const assistant = this.appendMessage("assistant", "");
    this.activeMessageId = assistant.id;

    const input: TurnInput = { text: trimmed };
    const base = this.context.continuationId;
    if (this.dispatcher.defaultMode === "stream") {
      this.retry.begin(assistant.id, base, input);
    }

    this.setStatus({ kind: "connecting" });
    await this.runTurn(assistant.id, input, base);
    return true;
  }

  cancel(): boolean {
    const messageId = this.activeMessageId;
    if (!messageId) {
      return false;
    }

    this.controllers.get(messageId)?.abort();
    this.controllers.delete(messageId);
    this.releaseResponses(messageId);
    this.flush(messageId);
    this.stopHeartbeat(messageId);
    this.retry.purge(messageId);

    const outstanding = this.context.isChainOpen || this.registry.hasOutstanding(messageId)
      || Boolean(this.loop?.isRunning) || this.gate.pending !== null || this.connectorApproval !== null;
    this.registry.purgeMessage(messageId);
    this.awaitingComputer.delete(messageId);
    this.dropApprovals(messageId);
    if (outstanding) {
      this.context.clear("cancelled_with_outstanding_call", { messageId });
    }

    const message = this.findMessage(messageId);
    if (message && !message.text && message.images.length === 0) {
      this.removeMessage(messageId);
    } else if (message) {
      message.text += CANCELLED_MARKER;
      this.emit({ type: "message.updated", message });
    }

    logger.info("Turn cancelled", this.ctx(messageId), { outstanding });
    this.finishTurn(messageId, "idle");
    return true;
  }

  approve(): Promise<boolean> {
    return this.gate.approve();
  }

  deny(): boolean {
    return this.gate.deny();
  }

  async respondToConnectorApproval(approvalRequestId: string, approve: boolean, reason?: string): Promise<boolean> {
    const request = this.connectorApproval;
    if (!request || request.approvalRequestId !== approvalRequestId) {
      return false;
    }
    this.connectorApproval = null;

    const signal = this.controllerFor(request.messageId).signal;
    this.setStatus({ kind: "running-tool", name: `MCP: ${request.name}` });
    const result = await this.dispatcher.resume(
      [{
        type: "mcp_approval_response",
        approvalRequestId,
        approve,
        ...(approve || !reason ? {} : { reason }),
      }],
      request.continuationId,
      { messageId: request.messageId, signal },
    );
    await this.afterDispatch(request.messageId, result, false);
    return true;
  }

  deleteMessage(messageId: string): boolean {
    if (!this.findMessage(messageId)) {
      return false;
    }

    const owned = messageId === this.activeMessageId || this.registry.hasOutstanding(messageId)
      || this.gate.pending?.messageId === messageId || this.connectorApproval?.messageId === messageId;

    this.controllers.get(messageId)?.abort();
    this.controllers.delete(messageId);
    this.releaseResponses(messageId);
    this.purgeTurnState(messageId);
    this.dropApprovals(messageId);
    this.removeMessage(messageId);

    if (owned) {
      this.context.clear("message_deleted", { messageId });
    }
    if (messageId === this.activeMessageId) {
      this.finishTurn(messageId, "idle");
    }
    return true;
  }

  clearConversation(): void {
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    this.controllers.clear();
    this.releaseResponses();
    this.timers.cancelAll();
    this.deltaBuffers.clear();
    this.awaitingComputer.clear();
    this.registry.clear();
    this.retry.clear();
    this.gate.clear();
    this.loop?.reset();
    this.connectorApproval = null;
    this.context.reset();
    this.activity.clear();
    this.messages = [];
    this.activeMessageId = null;

    logger.info("Conversation cleared", { sessionId: this.deps.sessionId });
    this.setStatus({ kind: "idle" });
    this.emit({ type: "activity", lines: [] });
  }

  // ─── Turn flow ────────────────────────────────────────────────────────────

  private async runTurn(messageId: string, input: TurnInput, continuationId: string | null): Promise<void> {
    const controller = this.controllerFor(messageId);
    const result = await this.dispatcher.startTurn(input, continuationId, { messageId, signal: controller.signal });

    if (this.controllers.get(messageId) !== controller) {
      this.releaseResponses(messageId);
      return;
    }
    await this.afterDispatch(messageId, result, true);
  }

  private async afterDispatch(messageId: string, result: DispatchResult, retryable: boolean): Promise<void> {
    this.releaseResponses(messageId);
    if (result.ok) {
      await this.continueAfterResponse(messageId);
      return;
    }
    if (result.cancelled) {
      return;
    }
    if (retryable && isTransientServerError(result.error)
      && this.retry.attemptRetry(messageId, errorMessage(result.error))) {
      return;
    }
    this.failTurn(messageId, result.error);
  }

  private async continueAfterResponse(messageId: string): Promise<void> {
    this.flush(messageId);

    if (this.awaitingComputer.has(messageId)) {
      this.awaitingComputer.delete(messageId);
      await this.resolveComputerCalls(messageId);
    }
    this.settleIfIdle(messageId);
  }

  private async resolveComputerCalls(messageId: string): Promise<ResolveOutcome | null> {
    if (!this.loop) {
      logger.warn("Computer call received without an action executor", this.ctx(messageId));
      this.context.clear("computer_use_unavailable", { messageId });
      return null;
    }

    const outcome = await this.loop.resolvePending(messageId, this.controllerFor(messageId).signal);
    this.announceSuspension(outcome);
    return outcome;
  }

  /** Returns false when the previous chain is waiting on the user. */
  private async settleDanglingChain(previousId: string): Promise<boolean> {
    if (!this.context.isChainOpen) {
      return true;
    }

    if (this.loop && this.context.continuationId) {
      const outcome = await this.loop.resolvePending(previousId, this.controllerFor(previousId).signal);
      this.announceSuspension(outcome);
      if (outcome.suspended) {
        this.appendMessage("system", BUSY_NOTICE);
        return false;
      }
    }

    if (this.context.isChainOpen) {
      this.context.clear("dangling_chain", { messageId: previousId });
    }
    return true;
  }

  private announceSuspension(outcome: ResolveOutcome): void {
    const request = this.gate.pending;
    if (outcome.suspended && request) {
      this.emit({ type: "approval.requested", request });
    }
  }

  private async submitOutputs(turnId: string, messageId: string, payloads: BatchPayload[]): Promise<SubmitOutcome> {
    const signal = this.controllerFor(messageId).signal;
    this.setStatus({ kind: "connecting" });

    const result = await this.dispatcher.resume(
      payloads.map((payload) => ({ type: "function_call_output", callId: payload.callId, output: payload.output })),
      turnId,
      { messageId, signal },
    );

    return result.ok ? { ok: true } : { ok: false, error: result.error };
  }

  private async runApproved(request: SafetyApprovalRequest): Promise<void> {
    this.emit({ type: "approval.cleared" });
    if (!this.loop) {
      return;
    }

    const outcome = await this.loop.approve(request, this.controllerFor(request.messageId).signal);
    this.announceSuspension(outcome);
    this.settleIfIdle(request.messageId);
  }

  private onDenied(request: SafetyApprovalRequest): void {
    this.context.clear("approval_denied", { messageId: request.messageId, callId: request.callId });
    this.appendMessage("system", DENIED_NOTICE);
    this.emit({ type: "approval.cleared" });
    this.finishTurn(request.messageId, "idle");
  }

  private settleIfIdle(messageId: string): void {
    const busy = this.registry.hasOutstanding(messageId)
      || this.awaitingComputer.has(messageId)
      || Boolean(this.loop?.isRunning)
      || this.gate.pending !== null
      || this.connectorApproval !== null;
    if (busy || !this.controllers.has(messageId)) {
      return;
    }

    this.context.closeChain();
    this.finishTurn(messageId, "done");
  }

  private finishTurn(messageId: string, final: "done" | "idle"): void {
    this.flush(messageId);
    this.stopHeartbeat(messageId);
    this.retry.complete(messageId);
    this.controllers.delete(messageId);
    if (this.activeMessageId === messageId) {
      this.activeMessageId = null;
    }

    if (final === "done") {
      this.setStatus({ kind: "done" });
    }
    this.setStatus({ kind: "idle" });
    this.emit({ type: "turn.settled", continuationId: this.context.continuationId });
  }

  private failTurn(messageId: string, error: unknown): void {
    if (isCancellation(error)) {
      return;
    }

    this.controllers.get(messageId)?.abort();
    this.flush(messageId);
    this.context.clear("turn_failed", { messageId });
    this.registry.purgeMessage(messageId);
    this.awaitingComputer.delete(messageId);

    const message = this.findMessage(messageId);
    if (message && message.role === "assistant" && !message.text && message.images.length === 0) {
      this.removeMessage(messageId);
    }

    if (shouldSurface(error)) {
      logger.error("Turn failed", this.ctx(messageId), { error: errorMessage(error) });
      this.appendMessage("system", userFacingMessage(error));
    } else {
      logger.warn("Transient error suppressed", this.ctx(messageId), { error: errorMessage(error) });
    }

    this.finishTurn(messageId, "idle");
  }

  private purgeTurnState(messageId: string): void {
    this.timers.cancel(`flush:${messageId}`);
    this.deltaBuffers.delete(messageId);
    this.stopHeartbeat(messageId);
    this.registry.purgeMessage(messageId);
    this.retry.purge(messageId);
    this.awaitingComputer.delete(messageId);
  }

  private dropApprovals(messageId: string): void {
    if (this.gate.pending?.messageId === messageId) {
      this.gate.clear();
      this.emit({ type: "approval.cleared" });
    }
    if (this.connectorApproval?.messageId === messageId) {
      this.connectorApproval = null;
    }
  }

  // ─── Model output ─────────────────────────────────────────────────────────

  private applyChunk(chunk: StreamChunk, messageId: string): void {
    if (chunk.responseId) {
      this.context.advance(chunk.responseId);
    }

    switch (chunk.kind) {
      case "response.created":
        if (chunk.responseId) {
          this.trackResponse(chunk.responseId, messageId);
        }
        this.setStatus({ kind: "connecting" });
        break;
      case "response.in_progress":
        this.setStatus({ kind: "thinking" });
        break;
      case "response.output_text.delta":
        if (chunk.delta) {
          this.bufferDelta(messageId, chunk.delta);
          this.setStatus({ kind: "streaming-text" });
        }
        break;
      case "response.output_item.added":
        if (chunk.item) {
          this.onItemStarted(chunk.item, messageId);
        }
        break;
      case "response.output_item.done":
        if (chunk.item) {
          this.onItemDone(chunk.item, messageId, chunk.responseId ?? this.context.continuationId);
        }
        break;
      case "response.image_generation_call.in_progress":
      case "response.image_generation_call.generating":
        this.startHeartbeat(messageId);
        break;
      case "response.mcp_list_tools.completed":
        this.connectorValidatedAt = this.now();
        this.pushActivity("Connector tools listed");
        break;
      case "response.mcp_list_tools.failed":
        this.connectorValidatedAt = null;
        this.pushActivity("Connector tool listing failed");
        break;
      case "response.completed":
        if (chunk.response) {
          this.onResponseCompleted(chunk.response, messageId);
        }
        if (chunk.responseId) {
          this.liveResponses.get(chunk.responseId)?.release();
          this.liveResponses.delete(chunk.responseId);
        }
        this.setStatus(this.connectorApproval ? { kind: "awaiting-approval" } : { kind: "done" });
        break;
      default:
        if (chunk.kind.startsWith("response.computer_call")) {
          this.setStatus({ kind: "using-control-action" });
        } else if (chunk.kind.startsWith("response.mcp_call")) {
          this.setStatus({ kind: "running-tool", name: "MCP" });
        }
    }
  }

  private applyResponse(response: ModelResponse, messageId: string): void {
    this.context.advance(response.id);

    if (response.outputText) {
      const message = this.findMessage(messageId);
      if (message) {
        message.text = message.text ? `${message.text}\n\n${response.outputText}` : response.outputText;
        this.emit({ type: "message.updated", message });
      }
    }

    for (const item of response.output) {
      this.onItemDone(item, messageId, response.id);
    }
    this.onResponseCompleted(response, messageId);
  }

  private onItemStarted(item: OutputItem, messageId: string): void {
    switch (item.type) {
      case "function_call":
        this.setStatus({ kind: "running-tool", name: item.name || "function" });
        break;
      case "reasoning":
        this.setStatus({ kind: "thinking" });
        break;
      case "computer_call":
        this.setStatus({ kind: "using-control-action" });
        break;
      case "image_generation_call":
        this.startHeartbeat(messageId);
        break;
      case "mcp_call":
        this.setStatus({ kind: "running-tool", name: `MCP: ${item.name}` });
        break;
      default:
        break;
    }
  }

  private onItemDone(item: OutputItem, messageId: string, responseId: string | null): void {
    switch (item.type) {
      case "function_call":
        if (item.status !== "in_progress") {
          this.handleFunctionCall(item, messageId, responseId);
        }
        break;
      case "computer_call":
        this.context.openChain();
        if (!this.loop?.isRunning) {
          this.awaitingComputer.add(messageId);
        }
        break;
      case "reasoning":
        if (responseId) {
          this.context.addReasoning(responseId, item);
        }
        break;
      case "image_generation_call":
        this.stopHeartbeat(messageId);
        if (item.result) {
          this.attachImage(messageId, item.result);
        }
        break;
      case "mcp_approval_request":
        this.requestConnectorApproval(item, messageId, responseId);
        break;
      case "mcp_call":
        this.markToolUsed(messageId, `${item.serverLabel}.${item.name}`);
        this.pushActivity(item.error ? `${item.serverLabel}: ${item.name} failed` : `${item.serverLabel}: ${item.name}`);
        break;
      default:
        break;
    }
  }

  private onResponseCompleted(response: ModelResponse, messageId: string): void {
    this.flush(messageId);
    if (this.options.replaysReasoning) {
      const reasoning = response.output.filter((item): item is ReasoningItem => item.type === "reasoning");
      this.context.rememberReasoning(response.id, reasoning);
    }
  }

  private handleFunctionCall(item: FunctionCallItem, messageId: string, turnId: string | null): void {
    if (!turnId) {
      logger.warn("Function call without a response id dropped", this.ctx(messageId), { name: item.name });
      return;
    }

    this.context.openChain();
    const registration = this.registry.register(item, turnId, messageId);
    if (!registration.shouldExecute) {
      return;
    }

    const { call } = registration;
    this.executeFunction(call.name, call.arguments, messageId)
      .then((output) => this.registry.recordOutput(call.canonicalId, output, call.turnId))
      .catch((error: unknown) => {
        logger.error("Recording function output threw", this.ctx(messageId), { error: errorMessage(error) });
      });
  }

  private async executeFunction(name: string, argsJSON: string, messageId: string): Promise<string> {
    if (!name) {
      return "Error: Unknown function";
    }

    this.setStatus({ kind: "running-tool", name });
    this.pushActivity(`Running ${name}`);
    this.markToolUsed(messageId, name);

    try {
      return await this.deps.functions.executeNamedFunction(name, argsJSON);
    } catch (error) {
      logger.warn("Function execution failed", this.ctx(messageId), { name, error: errorMessage(error) });
      return `Error: ${errorMessage(error)}`;
    }
  }

  private requestConnectorApproval(item: ConnectorApprovalItem, messageId: string, responseId: string | null): void {
    const continuationId = responseId ?? this.context.continuationId;
    if (!continuationId) {
      logger.warn("Connector approval request without a response id dropped", this.ctx(messageId));
      return;
    }

    this.context.openChain();
    this.connectorApproval = {
      approvalRequestId: item.id,
      name: item.name,
      serverLabel: item.serverLabel,
      arguments: item.arguments,
      messageId,
      continuationId,
    };
    this.setStatus({ kind: "awaiting-approval" });
    this.emit({ type: "connector.approval.requested", request: this.connectorApproval });
  }

  // ─── Message state ────────────────────────────────────────────────────────

  private bufferDelta(messageId: string, delta: string): void {
    const buffered = (this.deltaBuffers.get(messageId) ?? "") + delta;
    this.deltaBuffers.set(messageId, buffered);

    if (FLUSH_NOW.test(delta) || buffered.length >= FLUSH_THRESHOLD) {
      this.flush(messageId);
      return;
    }
    if (!this.timers.has(`flush:${messageId}`)) {
      this.timers.set(`flush:${messageId}`, this.options.deltaFlushMs, () => this.flush(messageId));
    }
  }

  private flush(messageId: string): void {
    this.timers.cancel(`flush:${messageId}`);
    const buffered = this.deltaBuffers.get(messageId);
    this.deltaBuffers.delete(messageId);
    if (!buffered) {
      return;
    }

    const message = this.findMessage(messageId);
    if (message) {
      message.text += buffered;
      this.emit({ type: "message.updated", message });
    }
  }

  private startHeartbeat(messageId: string): void {
    this.setStatus({ kind: "generating-image" });
    const key = `heartbeat:${messageId}`;
    if (this.timers.has(key)) {
      return;
    }

    const tick = (): void => {
      this.pushActivity(HEARTBEAT_LINES[this.heartbeatTicks % HEARTBEAT_LINES.length]);
      this.heartbeatTicks += 1;
      this.timers.set(key, this.options.heartbeatIntervalMs, tick);
    };
    this.timers.set(key, this.options.heartbeatIntervalMs, tick);
  }

  private stopHeartbeat(messageId: string): void {
    this.timers.cancel(`heartbeat:${messageId}`);
  }

  private appendMessage(role: Role, text: string): ChatMessage {
    const message: ChatMessage = {
      id: this.newId(),
      role,
      text,
      images: [],
      toolsUsed: [],
      createdAt: new Date(this.now()).toISOString(),
    };
    this.messages.push(message);
    this.emit({ type: "message.appended", message });
    return message;
  }

  private removeMessage(messageId: string): void {
    this.messages = this.messages.filter((message) => message.id !== messageId);
    this.emit({ type: "message.removed", messageId });
  }

  private attachImage(messageId: string, image: string): void {
    const message = this.findMessage(messageId);
    if (!message || message.images.includes(image)) {
      return;
    }
    message.images.push(image);
    this.emit({ type: "message.updated", message });
  }

  private markToolUsed(messageId: string, name: string): void {
    const message = this.findMessage(messageId);
    if (message && !message.toolsUsed.includes(name)) {
      message.toolsUsed.push(name);
    }
  }

  private findMessage(messageId: string): ChatMessage | undefined {
    return this.messages.find((message) => message.id === messageId);
  }

  private lastAssistantId(): string | null {
    for (let index = this.messages.length - 1; index >= 0; index--) {
      if (this.messages[index].role === "assistant") {
        return this.messages[index].id;
      }
    }
    return null;
  }

  private trackResponse(responseId: string, messageId: string): void {
    if (this.liveResponses.has(responseId)) {
      return;
    }
    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.liveResponses.set(responseId, { messageId, done, release });
  }

  private releaseResponses(messageId?: string): void {
    for (const [responseId, live] of [...this.liveResponses]) {
      if (!messageId || live.messageId === messageId) {
        live.release();
        this.liveResponses.delete(responseId);
      }
    }
  }

  private controllerFor(messageId: string): AbortController {
    const existing = this.controllers.get(messageId);
    if (existing) {
      return existing;
    }
    const controller = new AbortController();
    this.controllers.set(messageId, controller);
    return controller;
  }

  private connectorFresh(): boolean {
    if (!this.options.connectorConfigured) {
      return true;
    }
    return this.connectorValidatedAt !== null && this.now() - this.connectorValidatedAt < CONNECTOR_FRESHNESS_MS;
  }

  private pushActivity(line: string): void {
    if (this.activity.append(line)) {
      this.emit({ type: "activity", lines: this.activity.snapshot() });
    }
  }

  private setStatus(status: EngineStatus): void {
    if (sameStatus(this.statusValue, status)) {
      return;
    }
    this.statusValue = status;
    this.emit({ type: "status", status });
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error("Engine listener threw", { sessionId: this.deps.sessionId }, { event: event.type, error: errorMessage(error) });
      }
    }
  }

  private ctx(messageId: string) {
    return { sessionId: this.deps.sessionId, messageId };
  }
}
