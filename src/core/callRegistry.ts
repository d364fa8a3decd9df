import { errorMessage, isCancellation } from "./errors";
import { IdentifierResolver } from "./identifierResolver";
import { logger } from "./logger";
import { Scheduler, TimerGroup } from "./scheduler";
import { FunctionCallItem } from "./types";

export interface PendingCall {
  canonicalId: string;
  turnId: string;
  messageId: string;
  name: string;
  arguments: string;
  callId: string;
  itemId: string;
}

export interface BatchPayload {
  callId: string;
  output: string;
  functionName: string;
}

export type SubmitOutcome = { ok: true } | { ok: false; error: unknown };

export type BatchSubmitter = (turnId: string, messageId: string, payloads: BatchPayload[]) => Promise<SubmitOutcome>;

export type Registration =
  | { shouldExecute: true; call: PendingCall }
  | { shouldExecute: false; reason: "unroutable" | "completed" | "pending" | "closed" };

export interface CallRegistryOptions {
  batchWaitMs: number;
  retryDelayMs: number;
  maxSubmitAttempts: number;
}

export interface CallRegistryDeps {
  sessionId: string;
  scheduler: Scheduler;
  submit: BatchSubmitter;
  /** Called once a batch has failed `maxSubmitAttempts` times and was dropped. */
  onAbandon: (turnId: string, messageId: string, error: unknown) => void;
  onSubmitted?: (turnId: string, messageId: string) => void;
  /** Resolves once the response that issued `turnId`'s calls has finished. */
  awaitTurn?: (turnId: string) => Promise<void>;
}

export interface BatchView {
  turnId: string;
  open: boolean;
  callIds: string[];
  outputs: Record<string, string>;
}

interface CallBatch {
  turnId: string;
  messageId: string;
  calls: PendingCall[];
  outputs: Map<string, string>;
  submitted: string[];
  open: boolean;
  submitting: boolean;
  /** Set when the wait or retry timer fired; submits whatever outputs exist. */
  deadlinePassed: boolean;
  attempts: number;
}

export const DEFAULT_REGISTRY_OPTIONS: CallRegistryOptions = {
  batchWaitMs: 5_000,
  retryDelayMs: 1_000,
  maxSubmitAttempts: 5,
};

/**
 * Tracks function calls per model turn and returns their outputs to the
 * model in one batch per turn.
 */
export class CallRegistry {
  readonly resolver: IdentifierResolver;
  private readonly pending = new Set<string>();
  private readonly completed = new Set<string>();
  private readonly batches = new Map<string, CallBatch>();
  private readonly timers: TimerGroup;

  constructor(
    private readonly deps: CallRegistryDeps,
    private readonly options: CallRegistryOptions = DEFAULT_REGISTRY_OPTIONS,
  ) {
    this.resolver = new IdentifierResolver((previous, canonical) => this.migrate(previous, canonical));
    this.timers = new TimerGroup(deps.scheduler);
  }

  register(item: FunctionCallItem, turnId: string, messageId: string): Registration {
    const ctx = { sessionId: this.deps.sessionId, messageId, responseId: turnId };
    const canonicalId = this.resolver.canonicalize(item.callId, item.id);

    if (!canonicalId) {
      logger.warn("Dropping function call without identifiers", ctx, { name: item.name });
      return { shouldExecute: false, reason: "unroutable" };
    }
    if (this.completed.has(canonicalId)) {
      logger.debug("Function call already completed", { ...ctx, callId: canonicalId });
      return { shouldExecute: false, reason: "completed" };
    }
    if (this.pending.has(canonicalId)) {
      logger.debug("Function call already pending", { ...ctx, callId: canonicalId });
      return { shouldExecute: false, reason: "pending" };
    }

    let batch = this.batches.get(turnId);
    if (batch && !batch.open) {
      logger.warn("Late function call for a submitted turn dropped", { ...ctx, callId: canonicalId });
      return { shouldExecute: false, reason: "closed" };
    }
    if (!batch) {
      batch = {
        turnId,
        messageId,
        calls: [],
        outputs: new Map(),
        submitted: [],
        open: true,
        submitting: false,
        deadlinePassed: false,
        attempts: 0,
      };
      this.batches.set(turnId, batch);
    }

    const call: PendingCall = {
      canonicalId,
      turnId,
      messageId,
      name: item.name,
      arguments: item.arguments,
      callId: item.callId,
      itemId: item.id,
    };

    this.pending.add(canonicalId);
    batch.calls.push(call);
    this.armWaitTimer(batch);

    logger.info("Function call registered", { ...ctx, callId: canonicalId }, {
      name: item.name || null,
      batchSize: batch.calls.length,
    });
    return { shouldExecute: true, call };
  }

  async recordOutput(canonicalId: string, output: string, turnId: string): Promise<void> {
    const canonical = this.resolver.resolve(canonicalId) ?? canonicalId;
    const batch = this.batches.get(turnId);

    if (!batch || !batch.open) {
      logger.warn("Output for a closed or unknown batch dropped", {
        sessionId: this.deps.sessionId,
        callId: canonical,
        responseId: turnId,
      });
      this.pending.delete(canonical);
      return;
    }

    batch.outputs.set(canonical, output);

    if (batch.outputs.size >= batch.calls.length) {
      await this.submitBatch(turnId);
    }
  }

  /**
   * Sends the batch once its issuing response has finished. Without `force`
   * it waits until every registered call has an output.
   */
  async submitBatch(turnId: string, force = false): Promise<void> {
    const batch = this.batches.get(turnId);
    if (!batch || !batch.open) {
      return;
    }
    if (force) {
      batch.deadlinePassed = true;
    }
    if (batch.submitting) {
      return;
    }

    batch.submitting = true;
    await this.deps.awaitTurn?.(turnId);
    batch.submitting = false;

    // Calls streamed in while waiting belong to this batch too.
    if (this.batches.get(turnId) !== batch || !batch.open) {
      return;
    }
    if (!batch.deadlinePassed && batch.outputs.size < batch.calls.length) {
      return;
    }
    this.timers.cancel(turnId);
    batch.deadlinePassed = false;

    const ctx = { sessionId: this.deps.sessionId, messageId: batch.messageId, responseId: turnId };
    const seen = new Set<string>();
    const payloads: BatchPayload[] = [];

    for (const call of batch.calls) {
      const canonical = this.resolver.canonicalize(call.callId, call.itemId) ?? call.canonicalId;
      if (seen.has(canonical)) {
        continue;
      }
      seen.add(canonical);

      const output = batch.outputs.get(canonical);
      if (output !== undefined) {
        payloads.push({ callId: canonical, output, functionName: call.name });
      }
    }

    if (payloads.length === 0) {
      logger.debug("Batch has no outputs yet", ctx, { calls: batch.calls.length });
      this.armWaitTimer(batch);
      return;
    }

    const submitted = payloads.map((payload) => payload.callId);
    batch.submitting = true;
    batch.attempts += 1;
    for (const id of submitted) {
      this.completed.add(id);
      this.pending.delete(id);
    }

    let outcome: SubmitOutcome;
    try {
      outcome = await this.deps.submit(turnId, batch.messageId, payloads);
    } catch (error) {
      outcome = { ok: false, error };
    }
    batch.submitting = false;

    if (this.batches.get(turnId) !== batch) {
      // Purged while the submission was in flight.
      return;
    }

    if (outcome.ok) {
      const dropped = batch.calls.filter((call) => !submitted.includes(call.canonicalId));
      for (const call of dropped) {
        this.pending.delete(call.canonicalId);
      }
      if (dropped.length) {
        logger.warn("Batch submitted without late outputs", ctx, {
          missing: dropped.map((call) => call.canonicalId),
        });
      }
      batch.submitted.push(...submitted);
      batch.open = false;
      batch.calls = [];
      batch.outputs.clear();
      logger.info("Batch submitted", ctx, { outputs: submitted.length, attempts: batch.attempts });
      this.deps.onSubmitted?.(turnId, batch.messageId);
      return;
    }

    for (const id of submitted) {
      this.completed.delete(id);
      this.pending.add(id);
    }

    if (isCancellation(outcome.error)) {
      logger.info("Batch submission cancelled", ctx);
      return;
    }

    if (batch.attempts >= this.options.maxSubmitAttempts) {
      logger.error("Batch submission abandoned", ctx, {
        attempts: batch.attempts,
        error: errorMessage(outcome.error),
      });
      this.discard(batch);
      this.deps.onAbandon(turnId, batch.messageId, outcome.error);
      return;
    }

    logger.warn("Batch submission failed, retrying", ctx, {
      attempts: batch.attempts,
      error: errorMessage(outcome.error),
    });
    this.timers.set(turnId, this.options.retryDelayMs, () => this.fireSubmission(turnId));
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  isPending(id: string): boolean {
    return this.pending.has(this.resolver.resolve(id) ?? id);
  }

  isCompleted(id: string): boolean {
    return this.completed.has(this.resolver.resolve(id) ?? id);
  }

  outputFor(id: string, turnId: string): string | undefined {
    return this.batches.get(turnId)?.outputs.get(this.resolver.resolve(id) ?? id);
  }

  describeBatch(turnId: string): BatchView | undefined {
    const batch = this.batches.get(turnId);
    if (!batch) {
      return undefined;
    }
    return {
      turnId,
      open: batch.open,
      callIds: batch.calls.map((call) => call.canonicalId),
      outputs: Object.fromEntries(batch.outputs),
    };
  }

  /** True while any open batch still owes the model an output. */
  hasOutstanding(messageId?: string): boolean {
    for (const batch of this.batches.values()) {
      if (batch.open && batch.calls.length > 0 && (!messageId || batch.messageId === messageId)) {
        return true;
      }
    }
    return false;
  }

  // ─── Lifecycle ────────────────────────────────────────────────────────────

  purgeMessage(messageId: string): void {
    for (const batch of [...this.batches.values()]) {
      if (batch.messageId === messageId) {
        this.discard(batch);
        this.forgetSubmitted(batch);
        this.batches.delete(batch.turnId);
      }
    }
  }

  clear(): void {
    this.timers.cancelAll();
    this.batches.clear();
    this.pending.clear();
    this.completed.clear();
    this.resolver.clear();
  }

  private discard(batch: CallBatch): void {
    this.timers.cancel(batch.turnId);
    const ids = batch.calls.map((call) => call.canonicalId);
    for (const id of ids) {
      this.pending.delete(id);
    }
    this.resolver.forget(ids);
    batch.open = false;
    batch.calls = [];
    batch.outputs.clear();
  }

  private forgetSubmitted(batch: CallBatch): void {
    for (const id of batch.submitted) {
      this.completed.delete(id);
    }
    this.resolver.forget(batch.submitted);
    batch.submitted = [];
  }

  private armWaitTimer(batch: CallBatch): void {
    if (batch.outputs.size >= batch.calls.length) {
      return;
    }
    this.timers.set(batch.turnId, this.options.batchWaitMs, () => this.fireSubmission(batch.turnId));
  }

  private fireSubmission(turnId: string): void {
    this.submitBatch(turnId, true).catch((error: unknown) => {
      logger.error("Batch submission threw", { sessionId: this.deps.sessionId, responseId: turnId }, {
        error: errorMessage(error),
      });
    });
  }

  private migrate(previous: string, canonical: string): void {
    if (!previous || !canonical || previous === canonical) {
      return;
    }

    if (this.pending.delete(previous)) {
      this.pending.add(canonical);
    }
    if (this.completed.delete(previous)) {
      this.completed.add(canonical);
    }

    for (const batch of this.batches.values()) {
      const output = batch.outputs.get(previous);
      if (output !== undefined) {
        batch.outputs.delete(previous);
        batch.outputs.set(canonical, output);
      }
      const seen = new Set<string>();
      batch.calls = batch.calls.filter((call) => {
        if (call.canonicalId === previous) {
          call.canonicalId = canonical;
        }
        if (seen.has(call.canonicalId)) {
          return false;
        }
        seen.add(call.canonicalId);
        return true;
      });
    }

    logger.info("Call state migrated", { sessionId: this.deps.sessionId, callId: canonical }, { previous });
  }
}
