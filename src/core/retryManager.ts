import { errorMessage } from "./errors";
import { logger } from "./logger";
import { Scheduler, TimerGroup } from "./scheduler";
import { TurnInput } from "./types";

export interface RetryContext {
  remainingAttempts: number;
  /** Continuation id active before the turn began streaming. */
  baseContinuationId: string | null;
  input: TurnInput;
  retryScheduled: boolean;
}

export interface RetryManagerDeps {
  sessionId: string;
  scheduler: Scheduler;
  backoffMs: number;
  hasStreamedText(messageId: string): boolean;
  preconditionFresh(): boolean;
  cancelInFlight(messageId: string): void;
  replay(messageId: string, context: RetryContext): Promise<void>;
}

export class RetryManager {
  private readonly contexts = new Map<string, RetryContext>();
  private readonly timers: TimerGroup;

  constructor(private readonly deps: RetryManagerDeps) {
    this.timers = new TimerGroup(deps.scheduler);
  }

  begin(messageId: string, baseContinuationId: string | null, input: TurnInput): void {
    this.contexts.set(messageId, {
      remainingAttempts: 1,
      baseContinuationId,
      input,
      retryScheduled: false,
    });
  }

  contextFor(messageId: string): RetryContext | undefined {
    return this.contexts.get(messageId);
  }

  attemptRetry(messageId: string, reason: string): boolean {
    const ctx = { sessionId: this.deps.sessionId, messageId };
    const retry = this.contexts.get(messageId);

    if (!retry || retry.remainingAttempts <= 0 || retry.retryScheduled) {
      return false;
    }
    if (this.deps.hasStreamedText(messageId)) {
      logger.info("Retry skipped after partial output", ctx, { reason });
      return false;
    }
    if (!this.deps.preconditionFresh()) {
      logger.info("Retry skipped, connector not validated", ctx, { reason });
      return false;
    }

    retry.remainingAttempts -= 1;
    retry.retryScheduled = true;
    this.deps.cancelInFlight(messageId);

    logger.warn("Retrying turn after transient failure", ctx, {
      reason,
      backoffMs: this.deps.backoffMs,
      responseId: retry.baseContinuationId,
    });

    this.timers.set(messageId, this.deps.backoffMs, () => {
      retry.retryScheduled = false;
      this.deps.replay(messageId, retry).catch((error: unknown) => {
        logger.error("Turn replay threw", ctx, { error: errorMessage(error) });
      });
    });
    return true;
  }

  complete(messageId: string): void {
    this.purge(messageId);
  }

  purge(messageId: string): void {
    this.timers.cancel(messageId);
    this.contexts.delete(messageId);
  }

  clear(): void {
    this.timers.cancelAll();
    this.contexts.clear();
  }
}
