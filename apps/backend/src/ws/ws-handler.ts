import type { OrchestratorEvent, ServerEvent } from "@raci-swarm/protocol";
import { WebSocketServer, type RawData, WebSocket } from "ws";
import { describeError, OrchestrationError } from "../swarm/errors.js";
import type { Orchestrator } from "../swarm/orchestrator.js";
import { extractRequestId, parseClientCommand } from "./ws-command-parser.js";
import { handleConversationCommand } from "./routes/conversation-routes.js";

/** Subscribed to every conversation. */
const ALL_CONVERSATIONS = null;

export class WsHandler {
  private readonly orchestrator: Orchestrator;
  private readonly debug: boolean;

  private wss: WebSocketServer | null = null;
  private readonly subscriptions = new Map<WebSocket, string | typeof ALL_CONVERSATIONS>();

  constructor(options: { orchestrator: Orchestrator; debug: boolean }) {
    this.orchestrator = options.orchestrator;
    this.debug = options.debug;
  }

  attach(server: WebSocketServer): void {
    this.wss = server;

    server.on("connection", (socket) => {
      socket.on("message", (raw) => {
        void this.handleSocketMessage(socket, raw);
      });

      socket.on("close", () => {
        this.subscriptions.delete(socket);
      });

      socket.on("error", () => {
        this.subscriptions.delete(socket);
      });
    });
  }

  reset(): void {
    this.wss = null;
    this.subscriptions.clear();
  }

  broadcastToSubscribed(event: OrchestratorEvent): void {
    if (!this.wss) {
      return;
    }

    const conversationId = event.type === "state_transition" ? event.conversation_id : event.conversationId;

    for (const client of this.wss.clients) {
      if (client.readyState !== WebSocket.OPEN || !this.subscriptions.has(client)) {
        continue;
      }

      const subscribed = this.subscriptions.get(client);
      if (subscribed !== ALL_CONVERSATIONS && subscribed !== conversationId) {
        continue;
      }

      this.send(client, event);
    }
  }

  private async handleSocketMessage(socket: WebSocket, raw: RawData): Promise<void> {
    const parsed = parseClientCommand(raw);
    if (!parsed.ok) {
      this.logDebug("command:invalid", {
        message: parsed.error
      });
      this.send(socket, {
        type: "error",
        code: "INVALID_COMMAND",
        message: parsed.error
      });
      return;
    }

    const command = parsed.command;
    this.logDebug("command:received", {
      type: command.type,
      requestId: extractRequestId(command)
    });

    if (command.type === "ping") {
      this.send(socket, { type: "pong", serverTime: new Date().toISOString() });
      return;
    }

    if (command.type === "subscribe") {
      this.handleSubscribe(socket, command.conversationId);
      return;
    }

    if (!this.subscriptions.has(socket)) {
      this.logDebug("command:rejected:not_subscribed", {
        type: command.type
      });
      this.send(socket, {
        type: "error",
        code: "NOT_SUBSCRIBED",
        message: `Send subscribe before ${command.type}.`,
        requestId: extractRequestId(command)
      });
      return;
    }

    try {
      const handled = await handleConversationCommand({
        command,
        socket,
        orchestrator: this.orchestrator,
        send: (targetSocket, event) => this.send(targetSocket, event),
        followConversation: (targetSocket, conversationId) => this.followConversation(targetSocket, conversationId),
        logDebug: (message, details) => this.logDebug(message, details)
      });
      if (handled) {
        return;
      }

      this.send(socket, {
        type: "error",
        code: "UNKNOWN_COMMAND",
        message: `Unsupported command type ${command.type}`,
        requestId: extractRequestId(command)
      });
    } catch (error) {
      this.logDebug("command:failed", { type: command.type, message: describeError(error) });
      this.send(socket, {
        type: "error",
        code: error instanceof OrchestrationError ? error.code : "COMMAND_FAILED",
        message: describeError(error),
        requestId: extractRequestId(command)
      });
    }
  }

  private handleSubscribe(socket: WebSocket, conversationId?: string): void {
    if (conversationId === undefined) {
      this.subscriptions.set(socket, ALL_CONVERSATIONS);
      this.send(socket, { type: "ready", serverTime: new Date().toISOString(), subscribedConversationId: null });
      return;
    }

    const conversation = this.orchestrator.getConversation(conversationId);
    if (!conversation) {
      this.send(socket, {
        type: "error",
        code: "UNKNOWN_CONVERSATION",
        message: `Conversation ${conversationId} does not exist.`
      });
      return;
    }

    this.subscriptions.set(socket, conversationId);
    this.send(socket, {
      type: "ready",
      serverTime: new Date().toISOString(),
      subscribedConversationId: conversationId
    });
    this.send(socket, { type: "conversation_snapshot", conversation });
  }

  private followConversation(socket: WebSocket, conversationId: string): boolean {
    if (this.subscriptions.get(socket) === ALL_CONVERSATIONS) {
      return false;
    }

    this.subscriptions.set(socket, conversationId);
    return true;
  }

  private logDebug(message: string, details?: unknown): void {
    if (!this.debug) {
      return;
    }

    const prefix = `[raci][${new Date().toISOString()}] ws:${message}`;
    if (details === undefined) {
      console.log(prefix);
      return;
    }

    console.log(prefix, details);
  }

  private send(socket: WebSocket, event: ServerEvent): void {
    if (socket.readyState !== WebSocket.OPEN) {
      return;
    }

    socket.send(JSON.stringify(event));
  }
}
