import { ClientBridge } from "../tools/clientBridge";
import { ConversationEngine } from "./conversationEngine";

export interface Session {
  sessionId: string;
  engine: ConversationEngine;
  bridge: ClientBridge;
  unsubscribe: () => void;
}

/** Live sessions, one engine and one client bridge each. */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  add(session: Session): void {
    this.sessions.set(session.sessionId, session);
  }

  /** Stops the session's work and forgets it. Returns false when unknown. */
  close(sessionId: string, reason: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }

    this.sessions.delete(sessionId);
    session.engine.cancel();
    session.bridge.rejectAll(reason);
    session.unsubscribe();
    return true;
  }

  closeAll(reason: string): void {
    for (const sessionId of [...this.sessions.keys()]) {
      this.close(sessionId, reason);
    }
  }

  get size(): number {
    return this.sessions.size;
  }
}
