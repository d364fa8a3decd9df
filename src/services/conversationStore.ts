import { asString, isRecord } from "../core/events";
import { ChatMessage, Role } from "../core/types";

export const MAX_STORED_MESSAGES = 100;

export interface StoredConversation {
  messages: ChatMessage[];
  continuationId: string | null;
}

export interface ConversationStore {
  load(sessionId: string): Promise<StoredConversation | null>;
  save(sessionId: string, conversation: StoredConversation): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

const ROLES: Role[] = ["user", "assistant", "system"];

function parseStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : [];
}

function parseMessage(value: unknown): ChatMessage | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = asString(value.id);
  const role = ROLES.find((candidate) => candidate === value.role);
  if (!id || !role) {
    return null;
  }
  return {
    id,
    role,
    text: asString(value.text) ?? "",
    images: parseStrings(value.images),
    toolsUsed: parseStrings(value.toolsUsed),
    createdAt: asString(value.createdAt) ?? new Date(0).toISOString(),
  };
}

/** Validates a stored record; malformed messages are skipped. */
export function parseConversation(value: unknown): StoredConversation | null {
  if (!isRecord(value) || !Array.isArray(value.messages)) {
    return null;
  }
  return {
    messages: value.messages.map(parseMessage).filter((message): message is ChatMessage => message !== null),
    continuationId: asString(value.continuationId) ?? null,
  };
}

export function boundConversation(conversation: StoredConversation): StoredConversation {
  const { messages } = conversation;
  return {
    messages: messages.length > MAX_STORED_MESSAGES ? messages.slice(messages.length - MAX_STORED_MESSAGES) : messages,
    continuationId: conversation.continuationId,
  };
}

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, StoredConversation>();

  async load(sessionId: string): Promise<StoredConversation | null> {
    const stored = this.conversations.get(sessionId);
    return stored ? { messages: stored.messages.map((message) => ({ ...message })), continuationId: stored.continuationId } : null;
  }

  async save(sessionId: string, conversation: StoredConversation): Promise<void> {
    const bounded = boundConversation(conversation);
    this.conversations.set(sessionId, {
      messages: bounded.messages.map((message) => ({ ...message })),
      continuationId: bounded.continuationId,
    });
  }

  async delete(sessionId: string): Promise<void> {
    this.conversations.delete(sessionId);
  }
}
