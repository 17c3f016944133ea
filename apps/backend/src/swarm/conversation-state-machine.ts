import { ConversationStateError } from "./errors.js";
import type { ConversationState, Envelope, EnvelopeKind, ParticipantRole, PendingUserReply } from "./types.js";

export const CONVERSATION_STATE_TRANSITIONS: Readonly<Record<ConversationState, readonly ConversationState[]>> = {
  OPEN: ["DELEGATING", "AWAITING_USER", "CLOSED"],
  DELEGATING: ["AWAITING_USER", "CLOSED"],
  AWAITING_USER: ["OPEN", "CLOSED"],
  CLOSED: []
};

export interface EnvelopeTransition {
  conversationId: string;
  fromState: ConversationState | null;
  toState: ConversationState;
  sequenceNo: number;
}

export type ReplayableEnvelope = Pick<Envelope, "conversationId" | "sequenceNo" | "pendingUserReply">;

export function transitionConversationState(
  current: ConversationState,
  target: ConversationState
): ConversationState {
  if (current === target) {
    return current;
  }

  const allowedTargets = CONVERSATION_STATE_TRANSITIONS[current];
  if (!allowedTargets.includes(target)) {
    throw new ConversationStateError(`Invalid conversation state transition: ${current} -> ${target}`);
  }

  return target;
}

export function targetStateForEnvelope(pendingUserReply: PendingUserReply): ConversationState {
  if (pendingUserReply === null) {
    return "OPEN";
  }

  return pendingUserReply ? "AWAITING_USER" : "DELEGATING";
}

/**
 * Folds one envelope into the conversation state. `current` is null for a
 * conversation that has not received its first envelope yet.
 */
export function applyEnvelope(current: ConversationState | null, envelope: ReplayableEnvelope): EnvelopeTransition {
  const { conversationId, sequenceNo } = envelope;

  if (current === "CLOSED") {
    return { conversationId, fromState: "CLOSED", toState: "CLOSED", sequenceNo };
  }

  const target = targetStateForEnvelope(envelope.pendingUserReply);

  if (current === null) {
    if (target !== "OPEN") {
      throw new ConversationStateError(`Conversation ${conversationId} must start with a user envelope`);
    }

    return { conversationId, fromState: null, toState: "OPEN", sequenceNo };
  }

  if (target === "OPEN" && current !== "AWAITING_USER") {
    throw new ConversationStateError(
      `User envelope #${sequenceNo} arrived while conversation ${conversationId} is ${current}`
    );
  }

  return {
    conversationId,
    fromState: current,
    toState: transitionConversationState(current, target),
    sequenceNo
  };
}

export function closeConversationState(current: ConversationState | null): ConversationState {
  return current === null ? "CLOSED" : transitionConversationState(current, "CLOSED");
}

export interface ReplayResult {
  state: ConversationState | null;
  /** Only entries that changed the state. */
  transitions: EnvelopeTransition[];
}

export function replayEnvelopes(
  envelopes: readonly ReplayableEnvelope[],
  options: { closedAfterSequenceNo?: number } = {}
): ReplayResult {
  const ordered = envelopes.slice().sort((left, right) => left.sequenceNo - right.sequenceNo);
  const transitions: EnvelopeTransition[] = [];
  let state: ConversationState | null = null;
  let closed = false;

  for (let index = 0; index < ordered.length; index += 1) {
    const envelope = ordered[index];
    if (index > 0 && ordered[index - 1].sequenceNo === envelope.sequenceNo) {
      throw new ConversationStateError(
        `Duplicate sequence number ${envelope.sequenceNo} in conversation ${envelope.conversationId}`
      );
    }

    if (
      !closed &&
      options.closedAfterSequenceNo !== undefined &&
      envelope.sequenceNo > options.closedAfterSequenceNo
    ) {
      transitions.push({
        conversationId: envelope.conversationId,
        fromState: state,
        toState: "CLOSED",
        sequenceNo: options.closedAfterSequenceNo
      });
      state = closeConversationState(state);
      closed = true;
    }

    const transition = applyEnvelope(state, envelope);
    if (transition.fromState !== transition.toState) {
      transitions.push(transition);
    }
    state = transition.toState;
  }

  if (!closed && options.closedAfterSequenceNo !== undefined && ordered.length > 0) {
    const last = ordered[ordered.length - 1];
    transitions.push({
      conversationId: last.conversationId,
      fromState: state,
      toState: "CLOSED",
      sequenceNo: options.closedAfterSequenceNo
    });
    state = closeConversationState(state);
  }

  return { state, transitions };
}

export interface PendingUserReplyInput {
  senderRole: ParticipantRole;
  recipientId: string;
  initializerId: string;
  kind: EnvelopeKind;
  openDelegations: number;
}

/** The only place the terminal flag is decided. */
export function derivePendingUserReply(input: PendingUserReplyInput): PendingUserReply {
  if (input.senderRole === "user") {
    return null;
  }

  return input.recipientId === input.initializerId && input.kind !== "delegation" && input.openDelegations === 0;
}
