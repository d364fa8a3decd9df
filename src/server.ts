import http from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import { loadConfig } from "./config";
import { ConversationService } from "./core/conversationService";
import { makeEvent, parseIncomingEvent } from "./core/events";
import { logger } from "./core/logger";
import { buildTransport } from "./providers";
import { ConversationStore, InMemoryConversationStore } from "./services/conversationStore";
import { DynamoConversationStore } from "./services/dynamodb";

const config = loadConfig();

const store: ConversationStore = config.conversationsTable
  ? new DynamoConversationStore(config.conversationsTable)
  : new InMemoryConversationStore();

const service = new ConversationService({
  store,
  createTransport: (tools) => buildTransport(config.transport, tools),
  engine: config.engine,
  clientToolTimeoutMs: config.clientToolTimeoutMs,
});

const httpServer = http.createServer((req, res) => {
  if (req.method === "GET" && req.url === "/healthz") {
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ status: "ok", sessions: service.sessionCount }));
    return;
  }
  res.writeHead(404, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ error: "not_found" }));
});

const wss = new WebSocketServer({
  server: httpServer,
  path: "/ws",
  maxPayload: config.maxEventBytes,
});

httpServer.listen(config.port, config.host, () => {
  logger.info(`continuation server listening on ${config.host}:${config.port}`, {}, {
    model: config.transport.model,
    computerUse: config.transport.computerUse,
    persistence: config.conversationsTable ? "dynamodb" : "memory",
  });
});

wss.on("connection", (socket, request) => {
  let connectionSessionId: string | null = null;

  logger.info("client connected", {}, { remote: request.socket.remoteAddress ?? "unknown" });

  socket.on("message", async (raw) => {
    const text = Buffer.isBuffer(raw) ? raw.toString("utf8") : String(raw);

    const parsed = parseIncomingEvent(text, config.maxEventBytes);
    if (!parsed.event) {
      safeSend(socket, makeEvent("error", connectionSessionId ?? "unknown", {
        code: "invalid_event",
        message: parsed.error ?? "Invalid event envelope",
      }));
      return;
    }

    const event = parsed.event;

    if (connectionSessionId && connectionSessionId !== event.sessionId) {
      safeSend(socket, makeEvent("error", connectionSessionId, {
        code: "session_mismatch",
        message: "Each connection may only use one sessionId.",
      }));
      return;
    }
    connectionSessionId = event.sessionId;

    logger.debug(`inbound ${event.type}`, { sessionId: event.sessionId }, { eventId: event.id });

    try {
      await service.handleEvent(event, (outbound) => safeSend(socket, outbound));
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown";
      logger.error(`event handling failed: ${message}`, { sessionId: event.sessionId }, { type: event.type });
      safeSend(socket, makeEvent("error", event.sessionId, { code: "internal_error", message }));
    }
  });

  socket.on("close", () => {
    logger.info("client disconnected", { sessionId: connectionSessionId ?? undefined });
    if (connectionSessionId) {
      service.endSession(connectionSessionId);
    }
  });

  socket.on("error", (error) => {
    logger.warn(`socket error: ${error.message}`, { sessionId: connectionSessionId ?? undefined });
  });
});

function shutdown(): void {
  service.shutdown();
  wss.close();
  httpServer.close(() => process.exit(0));
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);

function safeSend(socket: WebSocket, event: object): void {
  if (socket.readyState !== WebSocket.OPEN) {
    return;
  }

  try {
    socket.send(JSON.stringify(event));
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown send error";
    logger.warn(`failed to send websocket event: ${message}`);
  }
}
