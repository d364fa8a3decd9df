import { ContinuationContext } from "./continuationContext";
import { ContinuationDispatcher } from "./continuationDispatcher";
import { errorMessage, ExecutionError } from "./errors";
import { logger } from "./logger";
import { SafetyApprovalGate } from "./safetyGate";
import {
  ActionExecutor,
  ComputerCallItem,
  ControlAction,
  EngineStatus,
  ModelTransport,
  OutputItem,
  SafetyApprovalRequest,
  SafetyCheck,
} from "./types";

export const APPROVAL_REQUIRED_NOTICE = "Action requires approval before proceeding.";
export const WAIT_LIMIT_NOTICE =
  "Computer use interrupted: too many consecutive wait actions. The last screenshot was sent and the step was stopped.";
export const APPROVED_STEP_FAILED_NOTICE =
  "Couldn't continue the approved computer-use step. The next message will start fresh.";

const LOW_LEVEL_ACTIONS = new Set(["click", "double_click", "type"]);
const BLANK_LOCATIONS = new Set(["about:blank", ""]);

export type HaltReason =
  | "fetch_failed"
  | "redundant_capture"
  | "low_level_repeat"
  | "blank_state"
  | "malformed_call"
  | "execution_failed"
  | "no_visual"
  | "dispatch_failed"
  | "wait_limit"
  | "cancelled"
  | "iteration_limit";

export interface ResolveOutcome {
  resolvedAny: boolean;
  alreadyRunning: boolean;
  suspended: boolean;
  halt?: HaltReason;
}

/** What the loop needs from the conversation that owns it. */
export interface LoopHost {
  messageImages(messageId: string): string[];
  attachVisual(messageId: string, image: string): void;
  notice(text: string): void;
  fail(messageId: string, error: unknown): void;
  setStatus(status: EngineStatus): void;
  activity(line: string): void;
}

export interface LoopOptions {
  maxIterations: number;
  maxConsecutiveWaits: number;
  lowLevelThreshold: number;
  blankThreshold: number;
  /** Disables the loop-breaking heuristics. */
  strict: boolean;
}

export interface LoopDeps {
  sessionId: string;
  transport: ModelTransport;
  dispatcher: ContinuationDispatcher;
  context: ContinuationContext;
  executor: ActionExecutor;
  gate: SafetyApprovalGate;
  host: LoopHost;
}

type StepResult =
  | { kind: "sent" }
  | { kind: "terminated" }
  | { kind: "halted"; reason: HaltReason; error?: unknown };

function latestComputerCall(output: OutputItem[]): ComputerCallItem | undefined {
  for (let index = output.length - 1; index >= 0; index--) {
    const item = output[index];
    if (item.type === "computer_call") {
      return item;
    }
  }
  return undefined;
}

export function describeAction(action: ControlAction): string {
  const { x, y, text, url } = action;
  if (typeof x === "number" && typeof y === "number") {
    return `Computer: ${action.type} at (${x}, ${y})`;
  }
  if (typeof text === "string") {
    return `Computer: ${action.type} "${text.slice(0, 40)}"`;
  }
  if (typeof url === "string") {
    return `Computer: ${action.type} ${url}`;
  }
  return `Computer: ${action.type}`;
}

/**
 * Drives chained computer-use actions: fetch the latest response, run its
 * pending action, send the screenshot back, repeat. Only one run at a time.
 */
export class ComputerUseLoop {
  private running = false;
  private consecutiveWaits = 0;
  private lastLocation: string | null = null;

  constructor(
    private readonly deps: LoopDeps,
    private readonly options: LoopOptions,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async resolvePending(messageId: string, signal: AbortSignal): Promise<ResolveOutcome> {
    if (this.running) {
      return { resolvedAny: false, alreadyRunning: true, suspended: false };
    }

    this.running = true;
    try {
      return await this.run(messageId, signal, false);
    } finally {
      this.running = false;
      this.consecutiveWaits = 0;
    }
  }

  /** Performs an approved action and then keeps resolving. */
  async approve(request: SafetyApprovalRequest, signal: AbortSignal): Promise<ResolveOutcome> {
    if (this.running) {
      return { resolvedAny: false, alreadyRunning: true, suspended: false };
    }

    this.running = true;
    try {
      const step = await this.perform(request.action, request.callId, request.continuationId, request.checks, request.messageId, signal);
      if (step.kind === "halted") {
        this.deps.context.clear(`approved_${step.reason}`, { messageId: request.messageId });
        if (step.reason !== "cancelled") {
          this.deps.host.notice(APPROVED_STEP_FAILED_NOTICE);
        }
        return { resolvedAny: false, alreadyRunning: false, suspended: false, halt: step.reason };
      }
      if (step.kind === "terminated") {
        return { resolvedAny: true, alreadyRunning: false, suspended: false, halt: "wait_limit" };
      }

      const rest = await this.run(request.messageId, signal, true);
      return { ...rest, resolvedAny: true };
    } finally {
      this.running = false;
      this.consecutiveWaits = 0;
    }
  }

  reset(): void {
    this.consecutiveWaits = 0;
    this.lastLocation = null;
  }

  private async run(messageId: string, signal: AbortSignal, resolvedBefore: boolean): Promise<ResolveOutcome> {
    const { context, transport, gate, host } = this.deps;
    let resolvedAny = resolvedBefore;

    for (let iteration = 0; iteration < this.options.maxIterations; iteration++) {
      const continuationId = context.continuationId;
      if (!continuationId || signal.aborted) {
        return { resolvedAny, alreadyRunning: false, suspended: false };
      }

      let call: ComputerCallItem | undefined;
      try {
        const response = await transport.fetchFullResponse(continuationId);
        call = latestComputerCall(response.output);
      } catch (error) {
        return this.halt("fetch_failed", messageId, resolvedAny, { error: errorMessage(error) });
      }

      if (!call) {
        return { resolvedAny, alreadyRunning: false, suspended: false };
      }
      if (!call.action || !call.callId.trim()) {
        return this.halt("malformed_call", messageId, resolvedAny);
      }

      const heuristic = this.checkHeuristics(call.action, iteration + 1, messageId);
      if (heuristic) {
        return this.halt(heuristic, messageId, resolvedAny, { action: call.action.type, pass: iteration + 1 });
      }

      if (call.pendingSafetyChecks.length > 0) {
        gate.suspend({
          action: call.action,
          callId: call.callId,
          continuationId,
          messageId,
          checks: call.pendingSafetyChecks,
        });
        host.notice(APPROVAL_REQUIRED_NOTICE);
        host.setStatus({ kind: "awaiting-approval" });
        return { resolvedAny, alreadyRunning: false, suspended: true };
      }

      const step = await this.perform(call.action, call.callId, continuationId, [], messageId, signal);
      if (step.kind === "halted") {
        const outcome = this.halt(step.reason, messageId, resolvedAny);
        if (step.error !== undefined) {
          host.fail(messageId, step.error);
        }
        return outcome;
      }

      resolvedAny = true;
      if (step.kind === "terminated") {
        return { resolvedAny, alreadyRunning: false, suspended: false, halt: "wait_limit" };
      }
    }

    return this.halt("iteration_limit", messageId, resolvedAny);
  }

  /** `pass` counts this run's fetches from 1. */
  private checkHeuristics(action: ControlAction, pass: number, messageId: string): HaltReason | null {
    if (this.options.strict) {
      return null;
    }

    const hasVisual = this.deps.host.messageImages(messageId).length > 0;
    const lowLevel = LOW_LEVEL_ACTIONS.has(action.type);

    if (hasVisual && action.type === "screenshot") {
      return "redundant_capture";
    }
    if (hasVisual && lowLevel && pass >= this.options.lowLevelThreshold) {
      return "low_level_repeat";
    }
    if (lowLevel && pass >= this.options.blankThreshold && this.onBlankState()) {
      return "blank_state";
    }
    return null;
  }

  private onBlankState(): boolean {
    return this.lastLocation !== null && BLANK_LOCATIONS.has(this.lastLocation);
  }

  private async perform(
    action: ControlAction,
    callId: string,
    continuationId: string,
    acknowledged: SafetyCheck[],
    messageId: string,
    signal: AbortSignal,
  ): Promise<StepResult> {
    const { dispatcher, executor, host, context } = this.deps;

    host.setStatus({ kind: "using-control-action" });
    host.activity(describeAction(action));

    this.consecutiveWaits = action.type === "wait" ? this.consecutiveWaits + 1 : 0;
    const terminateAfterSend = this.consecutiveWaits >= this.options.maxConsecutiveWaits;

    let visual: string | undefined;
    let location: string | undefined;
    try {
      const result = await executor.executeAction(action);
      if (result.currentLocation !== undefined) {
        this.lastLocation = result.currentLocation;
      }
      visual = result.visualArtifact;
      location = result.currentLocation;
    } catch (error) {
      return {
        kind: "halted",
        reason: "execution_failed",
        error: new ExecutionError(`Computer action "${action.type}" failed: ${errorMessage(error)}`),
      };
    }

    if (signal.aborted) {
      return { kind: "halted", reason: "cancelled" };
    }
    if (!visual) {
      return { kind: "halted", reason: "no_visual" };
    }
    if (!host.messageImages(messageId).includes(visual)) {
      host.attachVisual(messageId, visual);
    }

    const result = await dispatcher.resume(
      [{
        type: "computer_call_output",
        callId,
        screenshot: visual,
        acknowledgedSafetyChecks: acknowledged,
        ...(location ? { currentUrl: location } : {}),
      }],
      continuationId,
      { messageId, signal, mode: "oneshot" },
    );

    if (!result.ok) {
      if (result.cancelled) {
        return { kind: "halted", reason: "cancelled" };
      }
      return { kind: "halted", reason: "dispatch_failed", error: result.error };
    }

    if (terminateAfterSend) {
      this.consecutiveWaits = 0;
      context.clear("wait_limit", { messageId });
      host.notice(WAIT_LIMIT_NOTICE);
      logger.warn("Computer-use chain stopped after repeated waits", {
        sessionId: this.deps.sessionId,
        messageId,
        callId,
      });
      return { kind: "terminated" };
    }
    return { kind: "sent" };
  }

  private halt(
    reason: HaltReason,
    messageId: string,
    resolvedAny: boolean,
    extra?: Record<string, unknown>,
  ): ResolveOutcome {
    const ctx = { sessionId: this.deps.sessionId, messageId, responseId: this.deps.context.continuationId ?? undefined };
    if (reason === "blank_state") {
      logger.error("Computer-use loop halted on a blank page", ctx, extra);
    } else {
      logger.warn("Computer-use loop halted", ctx, { reason, ...extra });
    }
    this.deps.context.clear(`loop_${reason}`, { messageId });
    return { resolvedAny, alreadyRunning: false, suspended: false, halt: reason };
  }
}
