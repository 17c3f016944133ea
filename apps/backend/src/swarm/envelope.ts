import type { EnvelopeRecord } from "@raci-swarm/protocol";
import type { Envelope, EnvelopeFailure, EnvelopeKind, ParticipantRole, PendingUserReply } from "./types.js";

export const ORCHESTRATOR_SENDER_ID = "orchestrator";

/** An outbound message before the orchestrator stamps it. */
export interface EnvelopeDraft {
  senderId: string;
  senderRole: ParticipantRole;
  recipientId: string;
  recipientRole: ParticipantRole;
  kind: EnvelopeKind;
  goal: string;
  content: string;
  payload?: Record<string, unknown>;
  failure?: EnvelopeFailure;
}

export interface EnvelopeStamp {
  conversationId: string;
  sequenceNo: number;
  turn: number;
  hop: number;
  pendingUserReply: PendingUserReply;
  createdAt: string;
}

export function createEnvelope(draft: EnvelopeDraft, stamp: EnvelopeStamp): Envelope {
  const envelope: Envelope = {
    conversationId: stamp.conversationId,
    sequenceNo: stamp.sequenceNo,
    turn: stamp.turn,
    hop: stamp.hop,
    senderId: draft.senderId,
    senderRole: draft.senderRole,
    recipientId: draft.recipientId,
    recipientRole: draft.recipientRole,
    kind: draft.kind,
    goal: draft.goal,
    content: draft.content,
    ...(draft.payload ? { payload: Object.freeze({ ...draft.payload }) } : {}),
    ...(draft.failure ? { failure: Object.freeze({ ...draft.failure }) } : {}),
    pendingUserReply: stamp.pendingUserReply,
    createdAt: stamp.createdAt
  };

  return Object.freeze(envelope);
}

export function toEnvelopeRecord(envelope: Envelope): EnvelopeRecord {
  return {
    conversation_id: envelope.conversationId,
    sequence_no: envelope.sequenceNo,
    turn: envelope.turn,
    hop: envelope.hop,
    sender_id: envelope.senderId,
    sender_role: envelope.senderRole,
    recipient_id: envelope.recipientId,
    recipient_role: envelope.recipientRole,
    kind: envelope.kind,
    goal: envelope.goal,
    content: envelope.content,
    ...(envelope.payload ? { payload: { ...envelope.payload } } : {}),
    ...(envelope.failure ? { failure: { ...envelope.failure } } : {}),
    pending_user_reply: envelope.pendingUserReply,
    created_at: envelope.createdAt
  };
}

export function describeEnvelope(envelope: Envelope): string {
  return `#${envelope.sequenceNo} ${envelope.kind} ${envelope.senderId} -> ${envelope.recipientId}`;
}
