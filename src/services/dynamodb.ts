/**
 * DynamoDB persistence for conversations, keyed by session id.
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
} from "@aws-sdk/lib-dynamodb";
import { logger } from "../core/logger";
import {
  boundConversation,
  ConversationStore,
  parseConversation,
  StoredConversation,
} from "./conversationStore";

export class DynamoConversationStore implements ConversationStore {
  private readonly docClient: DynamoDBDocumentClient;

  constructor(private readonly tableName: string, region?: string) {
    this.docClient = DynamoDBDocumentClient.from(new DynamoDBClient(region ? { region } : {}), {
      marshallOptions: { removeUndefinedValues: true },
    });
  }

  async load(sessionId: string): Promise<StoredConversation | null> {
    const result = await this.docClient.send(new GetCommand({
      TableName: this.tableName,
      Key: { sessionId },
    }));

    const conversation = parseConversation(result.Item);
    logger.debug("Conversation loaded", { sessionId }, {
      found: conversation !== null,
      messageCount: conversation?.messages.length ?? 0,
    });
    return conversation;
  }

  async save(sessionId: string, conversation: StoredConversation): Promise<void> {
    const bounded = boundConversation(conversation);
    await this.docClient.send(new PutCommand({
      TableName: this.tableName,
      Item: {
        sessionId,
        messages: bounded.messages,
        continuationId: bounded.continuationId,
        updatedAt: new Date().toISOString(),
      },
    }));

    logger.debug("Conversation saved", { sessionId }, { messageCount: bounded.messages.length });
  }

  async delete(sessionId: string): Promise<void> {
    await this.docClient.send(new DeleteCommand({
      TableName: this.tableName,
      Key: { sessionId },
    }));
    logger.info("Conversation deleted", { sessionId });
  }
}
