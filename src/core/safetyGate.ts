import { logger } from "./logger";
import { SafetyApprovalRequest } from "./types";

export interface SafetyGateHandlers {
  approve(request: SafetyApprovalRequest): Promise<void>;
  deny(request: SafetyApprovalRequest): void;
}

/** Holds at most one computer-use action waiting on the user's decision. */
export class SafetyApprovalGate {
  private pendingRequest: SafetyApprovalRequest | null = null;
  private handlers: SafetyGateHandlers | null = null;

  constructor(private readonly sessionId: string) {}

  bind(handlers: SafetyGateHandlers): void {
    this.handlers = handlers;
  }

  get pending(): SafetyApprovalRequest | null {
    return this.pendingRequest;
  }

  suspend(request: SafetyApprovalRequest): void {
    this.pendingRequest = request;
    logger.info("Action suspended for approval", {
      sessionId: this.sessionId,
      messageId: request.messageId,
      callId: request.callId,
    }, { checks: request.checks.map((check) => check.code) });
  }

  async approve(): Promise<boolean> {
    const request = this.take();
    if (!request) {
      return false;
    }
    logger.info("Action approved", { sessionId: this.sessionId, callId: request.callId });
    await this.handlers?.approve(request);
    return true;
  }

  deny(): boolean {
    const request = this.take();
    if (!request) {
      return false;
    }
    logger.info("Action denied", { sessionId: this.sessionId, callId: request.callId });
    this.handlers?.deny(request);
    return true;
  }

  clear(): void {
    this.pendingRequest = null;
  }

  private take(): SafetyApprovalRequest | null {
    const request = this.pendingRequest;
    this.pendingRequest = null;
    return request;
  }
}
