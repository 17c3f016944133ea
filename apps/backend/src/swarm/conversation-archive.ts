import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const participantRoleSchema = Type.Union([
  Type.Literal("responsible"),
  Type.Literal("accountable"),
  Type.Literal("consulted"),
  Type.Literal("informed"),
  Type.Literal("user"),
  Type.Literal("orchestrator")
]);

const envelopeRecordSchema = Type.Object({
  conversation_id: Type.String(),
  sequence_no: Type.Integer({ minimum: 1 }),
  turn: Type.Integer({ minimum: 1 }),
  hop: Type.Integer({ minimum: 0 }),
  sender_id: Type.String(),
  sender_role: participantRoleSchema,
  recipient_id: Type.String(),
  recipient_role: participantRoleSchema,
  kind: Type.Union([
    Type.Literal("user_request"),
    Type.Literal("delegation"),
    Type.Literal("answer"),
    Type.Literal("failure"),
    Type.Literal("fallback")
  ]),
  goal: Type.String(),
  content: Type.String(),
  payload: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  failure: Type.Optional(
    Type.Object({
      code: Type.Union([
        Type.Literal("AGENT_TIMEOUT"),
        Type.Literal("AGENT_FAILURE"),
        Type.Literal("ROLE_VIOLATION"),
        Type.Literal("DELEGATION_DEPTH_EXCEEDED")
      ]),
      reason: Type.String(),
      attempts: Type.Optional(Type.Integer())
    })
  ),
  pending_user_reply: Type.Union([Type.Boolean(), Type.Null()]),
  created_at: Type.String()
});

const archivedFragmentSchema = Type.Object({
  kind: Type.Union([Type.Literal("envelope"), Type.Literal("summary")]),
  sequenceNos: Type.Array(Type.Integer()),
  senderId: Type.String(),
  recipientId: Type.String(),
  content: Type.String(),
  tokens: Type.Integer({ minimum: 0 }),
  pinned: Type.Boolean()
});

export const archivedConversationSchema = Type.Object({
  conversationId: Type.String({ minLength: 1 }),
  userId: Type.String(),
  capability: Type.String(),
  swarmName: Type.String(),
  state: Type.Union([
    Type.Literal("OPEN"),
    Type.Literal("DELEGATING"),
    Type.Literal("AWAITING_USER"),
    Type.Literal("CLOSED")
  ]),
  turn: Type.Integer({ minimum: 1 }),
  createdAt: Type.String(),
  closedAt: Type.String(),
  closedReason: Type.String(),
  closedAfterSequenceNo: Type.Integer({ minimum: 0 }),
  envelopes: Type.Array(envelopeRecordSchema),
  memory: Type.Union([
    Type.Object({
      budgetTokens: Type.Integer(),
      tokens: Type.Integer(),
      compactions: Type.Integer(),
      fragments: Type.Array(archivedFragmentSchema)
    }),
    Type.Null()
  ])
});

export type ArchivedConversation = Static<typeof archivedConversationSchema>;

export interface ConversationArchive {
  save(conversation: ArchivedConversation): Promise<void>;
  load(conversationId: string): Promise<ArchivedConversation | undefined>;
}

export class InMemoryConversationArchive implements ConversationArchive {
  private readonly records = new Map<string, ArchivedConversation>();

  async save(conversation: ArchivedConversation): Promise<void> {
    this.records.set(conversation.conversationId, structuredClone(conversation));
  }

  async load(conversationId: string): Promise<ArchivedConversation | undefined> {
    const record = this.records.get(conversationId);
    return record ? structuredClone(record) : undefined;
  }
}

/**
 * One JSON file per conversation, written through a uniquely named temp file
 * and renamed into place. Saves for the same conversation land in call order.
 */
export class FileConversationArchive implements ConversationArchive {
  private readonly writes = new Map<string, Promise<void>>();

  constructor(private readonly directory: string) {}

  async save(conversation: ArchivedConversation): Promise<void> {
    const conversationId = conversation.conversationId;
    const write = () => this.write(conversation);
    const next = (this.writes.get(conversationId) ?? Promise.resolve()).then(write, write);
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.writes.set(conversationId, settled);

    try {
      await next;
    } finally {
      if (this.writes.get(conversationId) === settled) {
        this.writes.delete(conversationId);
      }
    }
  }

  async load(conversationId: string): Promise<ArchivedConversation | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(conversationId), "utf8");
    } catch (error) {
      if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!Value.Check(archivedConversationSchema, parsed)) {
      const firstError = Value.Errors(archivedConversationSchema, parsed).First();
      throw new Error(
        `Archived conversation ${conversationId} is invalid: ${firstError ? `${firstError.path} ${firstError.message}` : "unexpected shape"}`
      );
    }

    return parsed;
  }

  private async write(conversation: ArchivedConversation): Promise<void> {
    const target = this.pathFor(conversation.conversationId);
    const tmp = `${target}.${randomUUID()}.tmp`;
    await mkdir(this.directory, { recursive: true });
    await writeFile(tmp, `${JSON.stringify(conversation, null, 2)}\n`, "utf8");
    await rename(tmp, target);
  }

  private pathFor(conversationId: string): string {
    return join(this.directory, `${encodeURIComponent(conversationId)}.json`);
  }
}
