import type { ClientCommand, ServerEvent } from "@raci-swarm/protocol";
import { Type } from "@sinclair/typebox";
import type { WebSocket } from "ws";
import { UnknownConversationError } from "../../swarm/errors.js";
import type { Orchestrator } from "../../swarm/orchestrator.js";
import { previewForLog } from "../../swarm/runtime-utils.js";
import { decodePathSegment, readJsonBody, sendJson } from "../http-utils.js";
import { acceptMethod, parseBody, type HttpRoute } from "./http-route.js";

const REQUESTS_ENDPOINT_PATH = "/api/requests";
const CONVERSATIONS_ENDPOINT_PATH = "/api/conversations";
const CONVERSATION_ENDPOINT_PATTERN = /^\/api\/conversations\/([^/]+)$/;
const CONVERSATION_REPLY_ENDPOINT_PATTERN = /^\/api\/conversations\/([^/]+)\/reply$/;

const REQUESTS_METHODS = "POST, OPTIONS";
const CONVERSATIONS_METHODS = "GET, OPTIONS";
const CONVERSATION_METHODS = "GET, DELETE, OPTIONS";
const CONVERSATION_REPLY_METHODS = "POST, OPTIONS";

const submitRequestBodySchema = Type.Object({
  capability: Type.String({ minLength: 1 }),
  userId: Type.String({ minLength: 1 }),
  text: Type.String(),
  /** Hold the response until the turn completes. */
  wait: Type.Optional(Type.Boolean())
});

const replyBodySchema = Type.Object({
  userId: Type.String({ minLength: 1 }),
  text: Type.String(),
  wait: Type.Optional(Type.Boolean())
});

const closeBodySchema = Type.Object({
  reason: Type.Optional(Type.String({ minLength: 1 }))
});

export function createConversationRoutes(options: { orchestrator: Orchestrator }): HttpRoute[] {
  const { orchestrator } = options;

  return [
    {
      methods: REQUESTS_METHODS,
      matches: (pathname) => pathname === REQUESTS_ENDPOINT_PATH,
      handle: async (request, response) => {
        if (!acceptMethod(request, response, REQUESTS_METHODS, ["POST"])) {
          return;
        }

        const body = parseBody(submitRequestBodySchema, await readJsonBody(request), "request");
        const result = orchestrator.submitRequest(body.capability, body.userId, body.text);
        if (result.status === "unsupported") {
          sendJson(response, 422, {
            error: result.message,
            code: result.code,
            response: { conversationId: null, outcome: "unsupported", content: result.message, state: null, sequenceNo: null }
          });
          return;
        }

        if (body.wait) {
          const finalResponse = await orchestrator.waitForTurn(result.conversationId);
          sendJson(response, 200, { conversationId: result.conversationId, swarmName: result.swarmName, response: finalResponse });
          return;
        }

        sendJson(response, 202, { conversationId: result.conversationId, swarmName: result.swarmName });
      }
    },
    {
      methods: CONVERSATIONS_METHODS,
      matches: (pathname) => pathname === CONVERSATIONS_ENDPOINT_PATH,
      handle: async (request, response) => {
        if (!acceptMethod(request, response, CONVERSATIONS_METHODS, ["GET"])) {
          return;
        }

        const conversations = orchestrator.listConversations().map(({ envelopes, ...summary }) => ({
          ...summary,
          envelopeCount: envelopes.length
        }));
        sendJson(response, 200, { conversations });
      }
    },
    {
      methods: CONVERSATION_METHODS,
      matches: (pathname) => CONVERSATION_ENDPOINT_PATTERN.test(pathname),
      handle: async (request, response, requestUrl) => {
        if (!acceptMethod(request, response, CONVERSATION_METHODS, ["GET", "DELETE"])) {
          return;
        }

        const conversationId = resolveConversationId(requestUrl.pathname, CONVERSATION_ENDPOINT_PATTERN);

        if (request.method === "DELETE") {
          const body = parseBody(closeBodySchema, await readJsonBody(request), "close");
          await orchestrator.close(conversationId, body.reason);
          sendJson(response, 200, { ok: true, conversationId });
          return;
        }

        const live = orchestrator.getConversation(conversationId);
        if (live) {
          sendJson(response, 200, { conversation: live, archived: false });
          return;
        }

        const archived = await orchestrator.loadArchivedConversation(conversationId);
        if (!archived) {
          throw new UnknownConversationError(conversationId);
        }

        sendJson(response, 200, { conversation: archived, archived: true });
      }
    },
    {
      methods: CONVERSATION_REPLY_METHODS,
      matches: (pathname) => CONVERSATION_REPLY_ENDPOINT_PATTERN.test(pathname),
      handle: async (request, response, requestUrl) => {
        if (!acceptMethod(request, response, CONVERSATION_REPLY_METHODS, ["POST"])) {
          return;
        }

        const conversationId = resolveConversationId(requestUrl.pathname, CONVERSATION_REPLY_ENDPOINT_PATTERN);
        const body = parseBody(replyBodySchema, await readJsonBody(request), "reply");
        const receipt = orchestrator.reply(conversationId, body.userId, body.text);

        if (body.wait) {
          sendJson(response, 200, { ...receipt, response: await orchestrator.waitForTurn(conversationId) });
          return;
        }

        sendJson(response, 202, { ...receipt });
      }
    }
  ];
}

function resolveConversationId(pathname: string, pattern: RegExp): string {
  const conversationId = decodePathSegment(pathname.match(pattern)?.[1]);
  if (!conversationId) {
    throw new Error("Missing conversation id");
  }
  return conversationId;
}

export interface ConversationCommandRouteContext {
  command: ClientCommand;
  socket: WebSocket;
  orchestrator: Orchestrator;
  send: (socket: WebSocket, event: ServerEvent) => void;
  /**
   * Points the socket at a conversation it just started, unless it follows
   * every conversation. Returns true when the subscription was narrowed.
   */
  followConversation: (socket: WebSocket, conversationId: string) => boolean;
  logDebug: (message: string, details?: unknown) => void;
}

export async function handleConversationCommand(context: ConversationCommandRouteContext): Promise<boolean> {
  const { command, socket, orchestrator, send, followConversation, logDebug } = context;

  switch (command.type) {
    case "submit_request": {
      logDebug("submit_request:received", {
        capability: command.capability,
        userId: command.userId,
        textPreview: previewForLog(command.text)
      });

      const result = orchestrator.submitRequest(command.capability, command.userId, command.text);
      if (result.status === "unsupported") {
        send(socket, {
          type: "error",
          code: result.code,
          message: result.message,
          requestId: command.requestId
        });
        return true;
      }

      const narrowed = followConversation(socket, result.conversationId);
      send(socket, {
        type: "request_accepted",
        conversationId: result.conversationId,
        swarmName: result.swarmName,
        requestId: command.requestId
      });

      // The opening envelope was emitted before the socket followed this conversation.
      const conversation = narrowed ? orchestrator.getConversation(result.conversationId) : undefined;
      if (conversation) {
        send(socket, { type: "conversation_snapshot", conversation, requestId: command.requestId });
      }
      return true;
    }

    case "reply": {
      logDebug("reply:received", {
        conversationId: command.conversationId,
        textPreview: previewForLog(command.text)
      });
      orchestrator.reply(command.conversationId, command.userId, command.text);
      return true;
    }

    case "close_conversation": {
      await orchestrator.close(command.conversationId, command.reason);
      return true;
    }

    case "get_conversation": {
      const conversation = orchestrator.getConversation(command.conversationId);
      if (!conversation) {
        throw new UnknownConversationError(command.conversationId);
      }

      send(socket, { type: "conversation_snapshot", conversation, requestId: command.requestId });
      return true;
    }

    default:
      return false;
  }
}
