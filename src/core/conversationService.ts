import { ClientBridge } from "../tools/clientBridge";
import { ConversationStore } from "../services/conversationStore";
import { ConversationEngine, EngineOptions } from "./conversationEngine";
import { errorMessage } from "./errors";
import { ClientCommand, makeEvent, toCommand } from "./events";
import { logger } from "./logger";
import { Scheduler } from "./scheduler";
import { Session, SessionStore } from "./sessionStore";
import { EngineEvent, EventEnvelope, FunctionToolSpec, ModelTransport } from "./types";

export type Emit = (event: EventEnvelope) => void;

export interface ConversationServiceConfig {
  store: ConversationStore;
  createTransport: (tools: FunctionToolSpec[]) => ModelTransport;
  engine: Partial<EngineOptions>;
  clientToolTimeoutMs: number;
  scheduler?: Scheduler;
}

function eventPayload(event: EngineEvent): Record<string, unknown> {
  switch (event.type) {
    case "message.appended":
    case "message.updated":
      return { message: event.message };
    case "message.removed":
      return { messageId: event.messageId };
    case "status":
      return { status: event.status };
    case "activity":
      return { lines: event.lines };
    case "approval.requested":
    case "connector.approval.requested":
      return { request: event.request };
    case "approval.cleared":
      return {};
    case "turn.settled":
      return { continuationId: event.continuationId };
  }
}

/**
 * Routes client commands to per-session conversation engines and keeps
 * their transcripts persisted.
 */
export class ConversationService {
  private readonly sessions = new SessionStore();

  constructor(private readonly config: ConversationServiceConfig) {}

  get sessionCount(): number {
    return this.sessions.size;
  }

  async handleEvent(event: EventEnvelope, emit: Emit): Promise<void> {
    const parsed = toCommand(event);
    if (!parsed.command) {
      emit(makeEvent("error", event.sessionId, {
        code: "invalid_command",
        message: parsed.error ?? "Invalid command",
      }));
      return;
    }

    const { command } = parsed;
    if (command.type === "session.start") {
      await this.startSession(event.sessionId, command.tools, emit);
      return;
    }

    const session = this.sessions.get(event.sessionId);
    if (!session) {
      emit(makeEvent("error", event.sessionId, {
        code: "session_not_started",
        message: "Send session.start before other events.",
      }));
      return;
    }

    await this.dispatch(session, command, emit);
  }

  /** Stops the session's work; the stored transcript stays. */
  endSession(sessionId: string): void {
    if (this.sessions.close(sessionId, "Client disconnected")) {
      logger.info("session ended", { sessionId });
    }
  }

  shutdown(): void {
    this.sessions.closeAll("Server shutting down");
  }

  private async startSession(sessionId: string, tools: FunctionToolSpec[], emit: Emit): Promise<void> {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.bridge.rebind(emit);
      emit(makeEvent("session.started", sessionId, { sessionId, restoredMessages: existing.engine.snapshot().messages.length }));
      return;
    }

    const bridge = new ClientBridge(sessionId, emit, {
      timeoutMs: this.config.clientToolTimeoutMs,
      scheduler: this.config.scheduler,
    });
    const engine = new ConversationEngine(
      {
        sessionId,
        transport: this.config.createTransport(tools),
        functions: bridge,
        actions: bridge,
        scheduler: this.config.scheduler,
      },
      this.config.engine,
    );

    let restoredMessages = 0;
    try {
      const stored = await this.config.store.load(sessionId);
      if (stored) {
        engine.restore(stored.messages, stored.continuationId);
        restoredMessages = stored.messages.length;
      }
    } catch (error) {
      logger.warn(`conversation load failed: ${errorMessage(error)}`, { sessionId });
    }

    const session: Session = {
      sessionId,
      engine,
      bridge,
      unsubscribe: () => undefined,
    };
    session.unsubscribe = engine.subscribe((engineEvent) => {
      emit(makeEvent(engineEvent.type, sessionId, eventPayload(engineEvent)));
      if (engineEvent.type === "turn.settled") {
        this.persist(session);
      }
    });
    this.sessions.add(session);

    logger.info("session started", { sessionId }, { tools: tools.length, restoredMessages });
    emit(makeEvent("session.started", sessionId, { sessionId, restoredMessages }));
  }

  private async dispatch(session: Session, command: ClientCommand, emit: Emit): Promise<void> {
    const { engine, sessionId } = session;

    switch (command.type) {
      case "user.message": {
        const accepted = await engine.sendUserMessage(command.text);
        if (!accepted) {
          emit(makeEvent("error", sessionId, {
            code: "turn_rejected",
            message: "A turn is already in progress.",
          }));
        }
        return;
      }
      case "turn.cancel":
        engine.cancel();
        return;
      case "approval.approve":
        await engine.approve();
        return;
      case "approval.deny":
        engine.deny();
        return;
      case "connector.approval.respond": {
        const handled = await engine.respondToConnectorApproval(command.approvalRequestId, command.approve, command.reason);
        if (!handled) {
          emit(makeEvent("error", sessionId, {
            code: "unknown_approval_request",
            message: `No pending connector approval ${command.approvalRequestId}`,
          }));
        }
        return;
      }
      case "message.delete":
        if (engine.deleteMessage(command.messageId)) {
          this.persist(session);
        } else {
          emit(makeEvent("error", sessionId, {
            code: "unknown_message",
            message: `No message ${command.messageId}`,
          }));
        }
        return;
      case "conversation.clear":
        engine.clearConversation();
        try {
          await this.config.store.delete(sessionId);
        } catch (error) {
          logger.warn(`conversation delete failed: ${errorMessage(error)}`, { sessionId });
        }
        return;
      case "tool.result":
        session.bridge.handleResult(command);
        return;
      case "session.start":
        return;
    }
  }

  private persist(session: Session): void {
    const { messages, continuationId } = session.engine.snapshot();
    this.config.store.save(session.sessionId, { messages, continuationId }).catch((error: unknown) => {
      logger.warn(`conversation save failed: ${errorMessage(error)}`, { sessionId: session.sessionId });
    });
  }
}
