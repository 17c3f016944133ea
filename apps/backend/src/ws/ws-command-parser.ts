import type { ClientCommand } from "@raci-swarm/protocol";
import { Type, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { type RawData } from "ws";

export type ParsedClientCommand =
  | { ok: true; command: ClientCommand }
  | { ok: false; error: string };

const nonEmptyString = () => Type.String({ minLength: 1 });
const requestId = () => Type.Optional(Type.String());

const subscribeCommandSchema = Type.Object({
  type: Type.Literal("subscribe"),
  conversationId: Type.Optional(nonEmptyString())
});

const pingCommandSchema = Type.Object({
  type: Type.Literal("ping")
});

const submitRequestCommandSchema = Type.Object({
  type: Type.Literal("submit_request"),
  capability: nonEmptyString(),
  userId: nonEmptyString(),
  text: Type.String(),
  requestId: requestId()
});

const replyCommandSchema = Type.Object({
  type: Type.Literal("reply"),
  conversationId: nonEmptyString(),
  userId: nonEmptyString(),
  text: Type.String(),
  requestId: requestId()
});

const closeConversationCommandSchema = Type.Object({
  type: Type.Literal("close_conversation"),
  conversationId: nonEmptyString(),
  reason: Type.Optional(nonEmptyString()),
  requestId: requestId()
});

const getConversationCommandSchema = Type.Object({
  type: Type.Literal("get_conversation"),
  conversationId: nonEmptyString(),
  requestId: requestId()
});

const clientCommandSchema = Type.Union([
  subscribeCommandSchema,
  pingCommandSchema,
  submitRequestCommandSchema,
  replyCommandSchema,
  closeConversationCommandSchema,
  getConversationCommandSchema
]);

const COMMAND_SCHEMAS: Record<ClientCommand["type"], TSchema> = {
  subscribe: subscribeCommandSchema,
  ping: pingCommandSchema,
  submit_request: submitRequestCommandSchema,
  reply: replyCommandSchema,
  close_conversation: closeConversationCommandSchema,
  get_conversation: getConversationCommandSchema
};

export function parseClientCommand(raw: RawData | string): ParsedClientCommand {
  const text = typeof raw === "string" ? raw : raw.toString("utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, error: "Command must be valid JSON" };
  }

  if (!parsed || typeof parsed !== "object" || !("type" in parsed)) {
    return { ok: false, error: "Command must be a JSON object with a type" };
  }

  const type = parsed.type;
  if (!isCommandType(type)) {
    return { ok: false, error: `Unknown command type ${String(type)}` };
  }

  if (Value.Check(clientCommandSchema, parsed)) {
    return { ok: true, command: parsed };
  }

  const firstError = Value.Errors(COMMAND_SCHEMAS[type], parsed).First();
  const field = firstError ? firstError.path.replace(/^\//, "").replace(/\//g, ".") : "";
  return {
    ok: false,
    error: firstError ? `${type}.${field} ${firstError.message}` : `${type} command is malformed`
  };
}

export function extractRequestId(command: ClientCommand): string | undefined {
  switch (command.type) {
    case "submit_request":
    case "reply":
    case "close_conversation":
    case "get_conversation":
      return command.requestId;

    case "subscribe":
    case "ping":
      return undefined;
  }
}

function isCommandType(value: unknown): value is ClientCommand["type"] {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(COMMAND_SCHEMAS, value);
}
