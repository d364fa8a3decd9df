import { BoundedCache } from "./boundedCache";
import { logger, LogContext } from "./logger";
import { ReasoningItem } from "./types";

/**
 * Per-conversation continuation state: the response id to resume from,
 * whether the model is still owed a tool result, and reasoning items
 * cached by response id.
 */
export class ContinuationContext {
  private current: string | null = null;
  private chainOpen = false;
  private readonly reasoning: BoundedCache<string, ReasoningItem[]>;

  constructor(private readonly sessionId: string, reasoningCapacity = 20) {
    this.reasoning = new BoundedCache(reasoningCapacity);
  }

  get continuationId(): string | null {
    return this.current;
  }

  get isChainOpen(): boolean {
    return this.chainOpen;
  }

  advance(responseId: string): void {
    if (responseId && responseId !== this.current) {
      logger.debug("Continuation advanced", { sessionId: this.sessionId, responseId });
      this.current = responseId;
    }
  }

  openChain(): void {
    this.chainOpen = true;
  }

  closeChain(): void {
    this.chainOpen = false;
  }

  clear(reason: string, ctx: LogContext = {}): void {
    if (this.current !== null || this.chainOpen) {
      logger.info("Continuation cleared", { sessionId: this.sessionId, responseId: this.current ?? undefined, ...ctx }, { reason });
    }
    this.current = null;
    this.chainOpen = false;
  }

  restore(continuationId: string | null): void {
    this.current = continuationId;
    this.chainOpen = false;
  }

  // ─── Reasoning cache ──────────────────────────────────────────────────────

  reasoningFor(responseId: string): ReasoningItem[] | undefined {
    return this.reasoning.get(responseId);
  }

  rememberReasoning(responseId: string, items: ReasoningItem[]): void {
    this.reasoning.set(responseId, items);
  }

  addReasoning(responseId: string, item: ReasoningItem): void {
    const existing = (this.reasoning.get(responseId) ?? []).filter((entry) => entry.id !== item.id);
    this.reasoning.set(responseId, [...existing, item]);
  }

  forgetReasoning(responseId: string): void {
    this.reasoning.delete(responseId);
  }

  reset(): void {
    this.current = null;
    this.chainOpen = false;
    this.reasoning.clear();
  }
}
