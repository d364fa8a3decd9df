import crypto from "node:crypto";
import { ExecutionError } from "../core/errors";
import { makeEvent } from "../core/events";
import { logger } from "../core/logger";
import { Scheduler, systemScheduler, TimerHandle } from "../core/scheduler";
import { ActionExecutor, ActionResult, ControlAction, EventEnvelope, FunctionExecutor } from "../core/types";

export const COMPUTER_ACTION_TOOL = "computer.action";

export interface ToolResult {
  callId: string;
  output?: string;
  error?: string;
  screenshot?: string;
  currentUrl?: string;
}

interface PendingToolCall {
  toolName: string;
  emittedAt: string;
  timer: TimerHandle;
  resolve: (result: ToolResult) => void;
  reject: (error: Error) => void;
}

export interface ClientBridgeOptions {
  timeoutMs: number;
  scheduler?: Scheduler;
  newId?: () => string;
}

/**
 * Runs tools on the connected client: emits `tool.call` and waits for the
 * matching `tool.result`.
 */
export class ClientBridge implements ActionExecutor, FunctionExecutor {
  private readonly pendingToolCalls = new Map<string, PendingToolCall>();
  private readonly scheduler: Scheduler;
  private readonly newId: () => string;

  constructor(
    private readonly sessionId: string,
    private emit: (event: EventEnvelope) => void,
    private readonly options: ClientBridgeOptions,
  ) {
    this.scheduler = options.scheduler ?? systemScheduler;
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  /** Points the bridge at a new socket after a reconnect. */
  rebind(emit: (event: EventEnvelope) => void): void {
    this.emit = emit;
  }

  get pendingCount(): number {
    return this.pendingToolCalls.size;
  }

  async executeNamedFunction(name: string, argsJSON: string): Promise<string> {
    const result = await this.call(name, argsJSON);
    if (result.error) {
      throw new ExecutionError(result.error);
    }
    return result.output ?? "";
  }

  async executeAction(action: ControlAction): Promise<ActionResult> {
    const result = await this.call(COMPUTER_ACTION_TOOL, JSON.stringify(action));
    if (result.error) {
      throw new ExecutionError(result.error);
    }
    return {
      visualArtifact: result.screenshot,
      currentLocation: result.currentUrl,
    };
  }

  /** Returns false when no call is waiting on this id. */
  handleResult(result: ToolResult): boolean {
    const pending = this.pendingToolCalls.get(result.callId);
    if (!pending) {
      logger.warn("tool.result for unknown call", { sessionId: this.sessionId, callId: result.callId });
      return false;
    }

    this.pendingToolCalls.delete(result.callId);
    pending.timer.cancel();
    logger.info(result.error ? `tool.result error: ${result.error}` : "tool.result ok", {
      sessionId: this.sessionId,
      callId: result.callId,
    }, { tool: pending.toolName, emittedAt: pending.emittedAt });
    pending.resolve(result);
    return true;
  }

  /** Rejects every waiting call, e.g. when the socket closes. */
  rejectAll(reason: string): void {
    for (const [callId, pending] of [...this.pendingToolCalls]) {
      this.pendingToolCalls.delete(callId);
      pending.timer.cancel();
      pending.reject(new ExecutionError(reason));
    }
  }

  private call(toolName: string, argsJSON: string): Promise<ToolResult> {
    const callId = this.newId();
    const envelope = makeEvent("tool.call", this.sessionId, {
      callId,
      name: toolName,
      arguments: argsJSON,
    });

    return new Promise<ToolResult>((resolve, reject) => {
      const timer = this.scheduler.schedule(this.options.timeoutMs, () => {
        if (this.pendingToolCalls.delete(callId)) {
          logger.warn("tool.call timed out", { sessionId: this.sessionId, callId }, { tool: toolName });
          reject(new ExecutionError(`Tool ${toolName} timed out after ${this.options.timeoutMs}ms`));
        }
      });

      this.pendingToolCalls.set(callId, {
        toolName,
        emittedAt: envelope.timestamp,
        timer,
        resolve,
        reject,
      });
      this.emit(envelope);
    });
  }
}
