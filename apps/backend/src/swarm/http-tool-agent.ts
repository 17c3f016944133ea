import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { AgentRespondOptions, RaciAgent } from "./agent.js";
import { toEnvelopeRecord } from "./envelope.js";
import { describeError } from "./errors.js";
import type { AgentReply, ContextSlice, RaciRole } from "./types.js";

export const raciRoleSchema = Type.Union([
  Type.Literal("responsible"),
  Type.Literal("accountable"),
  Type.Literal("consulted"),
  Type.Literal("informed")
]);

export const toolReplySchema = Type.Object({
  content: Type.String(),
  payload: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  delegate: Type.Optional(
    Type.Object({
      agent_id: Type.Optional(Type.String({ minLength: 1 })),
      role: Type.Optional(raciRoleSchema),
      goal: Type.String({ minLength: 1 })
    })
  )
});

export type ToolReply = Static<typeof toolReplySchema>;

export interface HttpToolAgentOptions {
  id: string;
  role: RaciRole;
  endpoint: string;
  capabilities?: string[];
  description?: string;
  headers?: Record<string, string>;
}

/**
 * Agent backed by a tool microservice. The service receives the goal and the
 * agent's context slice as JSON and answers with `{ content, delegate? }`.
 * Service failures come back as ordinary answers so the accountable agent can
 * decide what to do; only an abort propagates.
 */
export class HttpToolAgent implements RaciAgent {
  readonly id: string;
  readonly role: RaciRole;
  readonly capabilities: readonly string[];
  readonly description?: string;
  readonly endpoint: string;
  private readonly headers: Record<string, string>;

  constructor(options: HttpToolAgentOptions) {
    this.id = options.id;
    this.role = options.role;
    this.endpoint = options.endpoint;
    this.capabilities = Object.freeze([...(options.capabilities ?? [])]);
    this.description = options.description;
    this.headers = { ...(options.headers ?? {}) };
  }

  async respond(context: ContextSlice, goal: string, options: AgentRespondOptions): Promise<AgentReply> {
    const { signal } = options;
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: { ...this.headers, "content-type": "application/json" },
        body: JSON.stringify({
          conversation_id: context.conversationId,
          agent_id: this.id,
          role: this.role,
          goal,
          envelope: toEnvelopeRecord(options.envelope),
          context: context.fragments.map((fragment) => ({
            kind: fragment.kind,
            sequence_nos: [...fragment.sequenceNos],
            sender_id: fragment.senderId,
            recipient_id: fragment.recipientId,
            content: fragment.content
          }))
        }),
        signal
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      return toolFailure(`Tool service ${this.endpoint} is unreachable: ${describeError(error)}`);
    }

    if (!response.ok) {
      return toolFailure(`Tool service ${this.endpoint} responded with status ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      return toolFailure(`Tool service ${this.endpoint} returned invalid JSON`);
    }

    if (!Value.Check(toolReplySchema, body)) {
      const firstError = Value.Errors(toolReplySchema, body).First();
      const detail = firstError ? `${firstError.path || "/"} ${firstError.message}` : "unexpected shape";
      return toolFailure(`Tool service ${this.endpoint} returned an invalid reply: ${detail}`);
    }

    return toAgentReply(body);
  }
}

export function toAgentReply(reply: ToolReply): AgentReply {
  const payload = reply.payload ? { payload: reply.payload } : {};
  const delegate = reply.delegate;
  if (!delegate) {
    return { kind: "answer", content: reply.content, ...payload };
  }

  if (delegate.agent_id) {
    return {
      kind: "delegation",
      target: { kind: "agent", agentId: delegate.agent_id },
      goal: delegate.goal,
      content: reply.content,
      ...payload
    };
  }

  if (delegate.role) {
    return {
      kind: "delegation",
      target: { kind: "role", role: delegate.role },
      goal: delegate.goal,
      content: reply.content,
      ...payload
    };
  }

  return toolFailure("Tool service asked to delegate without naming an agent or a role");
}

function toolFailure(reason: string): AgentReply {
  return {
    kind: "answer",
    content: `Tool call failed: ${reason}`,
    payload: { toolError: reason }
  };
}
