import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type {
  ConversationClosedEvent,
  ConversationSummary,
  EnvelopeEvent,
  StateTransitionEvent,
  TurnCompletedEvent
} from "@raci-swarm/protocol";
import type { RaciAgent } from "./agent.js";
import { invokeAgent, type HopOutcome } from "./agent-invoker.js";
import type { ArchivedConversation, ConversationArchive } from "./conversation-archive.js";
import {
  applyEnvelope,
  closeConversationState,
  derivePendingUserReply
} from "./conversation-state-machine.js";
import {
  createEnvelope,
  describeEnvelope,
  ORCHESTRATOR_SENDER_ID,
  toEnvelopeRecord,
  type EnvelopeDraft
} from "./envelope.js";
import {
  ConversationStateError,
  DelegationDepthExceededError,
  describeError,
  NoMatchingSwarmError,
  RoleViolationError,
  UnknownConversationError
} from "./errors.js";
import type { MemoryManager } from "./memory-manager.js";
import { resolveDelegationRecipients } from "./role-policy.js";
import { previewForLog } from "./runtime-utils.js";
import type { ResolvedSwarm, SwarmRouter } from "./swarm-router.js";
import type {
  AgentIdentity,
  ConversationState,
  Envelope,
  EnvelopeFailure,
  FinalResponse,
  OrchestrationSettings,
  RaciRole
} from "./types.js";

export const DEGRADED_RESPONSE = "The request could not be completed right now. Please try again later.";
export const PARTIAL_RESPONSE_PREFIX = "The request could not be completed within the delegation limit.";
export const DEADLINE_RESPONSE_PREFIX = "The request could not be completed before the turn deadline.";
export const CLOSED_RESPONSE = "The conversation was closed.";

export interface UserRequest {
  capability: string;
  userId: string;
  text: string;
}

export type SubmitRequestResult =
  | { status: "accepted"; conversationId: string; swarmName: string }
  | { status: "unsupported"; code: "NO_MATCHING_SWARM"; message: string };

export interface ReplyReceipt {
  conversationId: string;
  turn: number;
  sequenceNo: number;
}

export interface OrchestratorOptions {
  router: SwarmRouter;
  memory: MemoryManager;
  settings: OrchestrationSettings;
  archive?: ConversationArchive;
  debug?: boolean;
  /** Closed conversations kept in process before only the archive has them. */
  closedConversationLimit?: number;
  now?: () => number;
  createConversationId?: (userId: string) => string;
}

interface DelegationFrame {
  delegatorId: string;
  delegatorRole: RaciRole;
  /** Goal the delegator resumes with once every recipient has answered. */
  goal: string;
  subGoal: string;
  content: string;
  payload?: Record<string, unknown>;
  /** Fan-out recipients not addressed yet. */
  queue: AgentIdentity[];
}

interface ConversationRecord {
  id: string;
  userId: string;
  capability: string;
  resolved: ResolvedSwarm;
  state: ConversationState | null;
  envelopes: Envelope[];
  nextSequenceNo: number;
  turn: number;
  hop: number;
  turnStartedAt: number;
  turnStartSequenceNo: number;
  stack: DelegationFrame[];
  createdAt: number;
  lastActivityAt: number;
  closedAt?: number;
  closedReason?: string;
  closedAfterSequenceNo?: number;
  activeTurn: Promise<FinalResponse> | null;
  abortController: AbortController | null;
  lastResponse: FinalResponse | null;
}

type RoutedBody = {
  kind: "answer" | "failure";
  content: string;
  payload?: Record<string, unknown>;
  failure?: EnvelopeFailure;
};

/**
 * Drives conversations through their swarm: delivers each envelope to its
 * recipient, turns the reply into the next envelope and stops once control
 * returns to the user. One turn runs at a time per conversation.
 */
export class Orchestrator extends EventEmitter {
  private readonly router: SwarmRouter;
  private readonly memory: MemoryManager;
  private readonly settings: OrchestrationSettings;
  private readonly archive: ConversationArchive | null;
  private readonly debug: boolean;
  private readonly closedConversationLimit: number;
  private readonly now: () => number;
  private readonly createConversationId: (userId: string) => string;

  private readonly conversations = new Map<string, ConversationRecord>();
  private readonly closedOrder: string[] = [];
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: OrchestratorOptions) {
    super();
    this.router = options.router;
    this.memory = options.memory;
    this.settings = options.settings;
    this.archive = options.archive ?? null;
    this.debug = options.debug ?? false;
    this.closedConversationLimit = options.closedConversationLimit ?? 100;
    this.now = options.now ?? (() => Date.now());
    this.createConversationId = options.createConversationId ?? ((userId) => `${userId}_${randomUUID()}`);
  }

  submitRequest(capability: string, userId: string, text: string): SubmitRequestResult {
    const normalizedUserId = userId.trim();
    if (!normalizedUserId) {
      throw new Error("userId must be a non-empty string");
    }

    let resolved: ResolvedSwarm;
    try {
      resolved = this.router.resolve(capability);
    } catch (error) {
      if (error instanceof NoMatchingSwarmError) {
        this.logDebug("request:unsupported", { capability, userId: normalizedUserId });
        return { status: "unsupported", code: "NO_MATCHING_SWARM", message: error.message };
      }
      throw error;
    }

    const now = this.now();
    const record: ConversationRecord = {
      id: this.createConversationId(normalizedUserId),
      userId: normalizedUserId,
      capability,
      resolved,
      state: null,
      envelopes: [],
      nextSequenceNo: 1,
      turn: 1,
      hop: 0,
      turnStartedAt: now,
      turnStartSequenceNo: 1,
      stack: [],
      createdAt: now,
      lastActivityAt: now,
      activeTurn: null,
      abortController: null,
      lastResponse: null
    };

    const first = this.dispatch(record, this.userDraft(record, text));
    this.conversations.set(record.id, record);
    this.logDebug("request:accepted", {
      conversationId: record.id,
      swarm: resolved.swarm.name,
      capability
    });

    this.startTurn(record, first);
    return { status: "accepted", conversationId: record.id, swarmName: resolved.swarm.name };
  }

  async handle(request: UserRequest): Promise<FinalResponse> {
    const result = this.submitRequest(request.capability, request.userId, request.text);
    if (result.status === "unsupported") {
      return {
        conversationId: null,
        outcome: "unsupported",
        content: result.message,
        state: null,
        sequenceNo: null
      };
    }

    return await this.waitForTurn(result.conversationId);
  }

  reply(conversationId: string, userId: string, text: string): ReplyReceipt {
    const record = this.requireConversation(conversationId);
    if (record.userId !== userId.trim()) {
      throw new ConversationStateError(`Conversation ${conversationId} belongs to another user`);
    }

    if (record.state !== "AWAITING_USER" || record.activeTurn) {
      throw new ConversationStateError(
        `Conversation ${conversationId} is ${record.state ?? "starting"}; replies are accepted only while awaiting the user`
      );
    }

    record.turn += 1;
    record.hop = 0;
    record.stack = [];
    record.turnStartedAt = this.now();
    record.turnStartSequenceNo = record.nextSequenceNo;

    const envelope = this.dispatch(record, this.userDraft(record, text));
    this.startTurn(record, envelope);
    return { conversationId, turn: record.turn, sequenceNo: envelope.sequenceNo };
  }

  async handleReply(conversationId: string, userId: string, text: string): Promise<FinalResponse> {
    this.reply(conversationId, userId, text);
    return await this.waitForTurn(conversationId);
  }

  async waitForTurn(conversationId: string): Promise<FinalResponse> {
    const record = this.requireConversation(conversationId);
    if (record.activeTurn) {
      return await record.activeTurn;
    }

    if (record.lastResponse) {
      return record.lastResponse;
    }

    throw new ConversationStateError(`Conversation ${conversationId} has no completed turn`);
  }

  getConversation(conversationId: string): ConversationSummary | undefined {
    const record = this.conversations.get(conversationId);
    return record ? this.toSummary(record) : undefined;
  }

  listConversations(): ConversationSummary[] {
    return Array.from(this.conversations.values(), (record) => this.toSummary(record));
  }

  async loadArchivedConversation(conversationId: string): Promise<ArchivedConversation | undefined> {
    return (await this.archive?.load(conversationId)) ?? undefined;
  }

  async close(conversationId: string, reason = "closed_by_user"): Promise<void> {
    const record = this.requireConversation(conversationId);
    if (record.state === "CLOSED") {
      return;
    }

    const fromState = record.state;
    record.state = closeConversationState(record.state);
    record.closedAt = this.now();
    record.closedReason = reason;
    record.closedAfterSequenceNo = record.nextSequenceNo - 1;
    this.emitStateTransition(record.id, fromState, "CLOSED", record.closedAfterSequenceNo);

    record.abortController?.abort(new ConversationStateError(`Conversation ${conversationId} was closed`));
    this.memory.release(record.id);
    await this.persist(record);

    this.emit("conversation_closed", {
      type: "conversation_closed",
      conversationId,
      reason,
      timestamp: new Date(record.closedAt).toISOString()
    } satisfies ConversationClosedEvent);

    this.closedOrder.push(conversationId);
    this.trimClosedConversations();
  }

  async sweepInactiveConversations(): Promise<string[]> {
    const cutoff = this.now() - this.settings.inactivityTimeoutMs;
    const expired = Array.from(this.conversations.values())
      .filter((record) => record.state === "AWAITING_USER" && !record.activeTurn && record.lastActivityAt <= cutoff)
      .map((record) => record.id);

    for (const conversationId of expired) {
      await this.close(conversationId, "inactivity_timeout");
    }

    if (expired.length > 0) {
      this.logDebug("sweep:closed", { conversationIds: expired });
    }

    return expired;
  }

  startInactivitySweep(): void {
    if (this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      void this.sweepInactiveConversations().catch((error) => {
        console.error(`[raci] Inactivity sweep failed: ${describeError(error)}`);
      });
    }, this.settings.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private startTurn(record: ConversationRecord, first: Envelope): void {
    const controller = new AbortController();
    record.abortController = controller;

    record.activeTurn = this.runTurn(record, first, controller.signal)
      .catch((error: unknown) => this.recoverFromFatalError(record, error))
      .then((response) => {
        record.activeTurn = null;
        record.abortController = null;
        record.lastResponse = response;
        if (record.state === "CLOSED") {
          this.trimClosedConversations();
        }

        this.emit("turn_completed", {
          type: "turn_completed",
          conversationId: record.id,
          turn: record.turn,
          outcome: response.outcome,
          content: response.content,
          sequenceNo: response.sequenceNo
        } satisfies TurnCompletedEvent);

        return response;
      });
  }

  private async runTurn(record: ConversationRecord, first: Envelope, signal: AbortSignal): Promise<FinalResponse> {
    let current = first;

    for (;;) {
      if (record.state === "CLOSED") {
        return this.closedResponse(record);
      }

      if (current.pendingUserReply === true) {
        return this.responseFromTerminal(record, current);
      }

      if (this.now() - record.turnStartedAt >= this.settings.turnTimeoutMs) {
        current = this.dispatchFallback(
          record,
          `turn deadline of ${this.settings.turnTimeoutMs}ms passed`,
          DEADLINE_RESPONSE_PREFIX
        );
        continue;
      }

      const agent = record.resolved.members.find((member) => member.id === current.recipientId);
      if (!agent) {
        throw new Error(`Envelope ${describeEnvelope(current)} is addressed to an agent outside swarm ${record.resolved.swarm.name}`);
      }

      const outcome = await invokeAgent(agent, {
        context: this.memory.project(record.id, agent.role, agent.id),
        goal: current.goal,
        envelope: current,
        timeoutMs: this.settings.agentTimeoutMs,
        retryLimit: this.settings.agentRetryLimit,
        retryBackoffMs: this.settings.agentRetryBackoffMs,
        signal,
        onAttemptFailed: (details) => {
          this.logDebug("agent:attempt_failed", {
            conversationId: record.id,
            agentId: details.agentId,
            attempt: details.attempt,
            willRetry: details.willRetry,
            message: describeError(details.error)
          });
        },
        onLateSettle: (details) => {
          this.logDebug("agent:late_settle_discarded", {
            conversationId: record.id,
            agentId: details.agentId,
            attempt: details.attempt
          });
        }
      });

      if (record.state === "CLOSED") {
        await this.archiveLateResponse(record, agent, current, outcome);
        return this.closedResponse(record);
      }

      current = this.dispatchRouted(record, this.route(record, agent, current, outcome));
    }
  }

  private route(record: ConversationRecord, agent: RaciAgent, delivered: Envelope, outcome: HopOutcome): EnvelopeDraft[] {
    if (!outcome.ok) {
      return this.routeFailure(record, agent, delivered, outcome.failure);
    }

    const reply = outcome.reply;
    if (reply.kind === "answer") {
      return this.routeAnswer(record, agent, delivered, {
        kind: "answer",
        content: reply.content,
        ...(reply.payload ? { payload: reply.payload } : {})
      });
    }

    let recipients: AgentIdentity[];
    try {
      recipients = resolveDelegationRecipients(agent, reply.target, record.resolved.members);
    } catch (error) {
      if (error instanceof RoleViolationError) {
        this.logDebug("route:role_violation", { conversationId: record.id, agentId: agent.id, message: error.message });
        return this.routeFailure(record, agent, delivered, {
          code: "ROLE_VIOLATION",
          reason: error.message,
          attempts: outcome.attempts
        });
      }
      throw error;
    }

    const [firstRecipient, ...queue] = recipients;
    const frame: DelegationFrame = {
      delegatorId: agent.id,
      delegatorRole: agent.role,
      goal: delivered.goal,
      subGoal: reply.goal,
      content: reply.content ?? reply.goal,
      ...(reply.payload ? { payload: reply.payload } : {}),
      queue
    };
    record.stack.push(frame);

    return [this.delegationDraft(frame, firstRecipient)];
  }

  private routeAnswer(
    record: ConversationRecord,
    agent: RaciAgent,
    delivered: Envelope,
    body: RoutedBody
  ): EnvelopeDraft[] {
    const frame = record.stack[record.stack.length - 1];
    if (!frame) {
      return [
        {
          senderId: agent.id,
          senderRole: agent.role,
          recipientId: record.resolved.swarm.initializerId,
          recipientRole: "responsible",
          goal: delivered.goal,
          ...body
        }
      ];
    }

    const answer: EnvelopeDraft = {
      senderId: agent.id,
      senderRole: agent.role,
      recipientId: frame.delegatorId,
      recipientRole: frame.delegatorRole,
      goal: frame.goal,
      ...body
    };

    const next = frame.queue.shift();
    if (next) {
      return [answer, this.delegationDraft(frame, next)];
    }

    record.stack.pop();
    return [answer];
  }

  private routeFailure(
    record: ConversationRecord,
    agent: RaciAgent,
    delivered: Envelope,
    failure: EnvelopeFailure
  ): EnvelopeDraft[] {
    this.logDebug("route:failure", {
      conversationId: record.id,
      agentId: agent.id,
      code: failure.code,
      reason: failure.reason
    });

    if (agent.role === "consulted" || agent.role === "informed") {
      const adminId = record.resolved.swarm.adminId;
      while (record.stack.length > 0 && record.stack[record.stack.length - 1].delegatorId !== adminId) {
        record.stack.pop();
      }

      if (record.stack.length > 0) {
        return this.routeAnswer(record, agent, delivered, { kind: "failure", content: failure.reason, failure });
      }
    }

    record.stack = [];
    return [
      {
        senderId: agent.id,
        senderRole: agent.role,
        recipientId: record.resolved.swarm.initializerId,
        recipientRole: "responsible",
        kind: "failure",
        goal: delivered.goal,
        content: DEGRADED_RESPONSE,
        failure
      }
    ];
  }

  private delegationDraft(frame: DelegationFrame, recipient: AgentIdentity): EnvelopeDraft {
    return {
      senderId: frame.delegatorId,
      senderRole: frame.delegatorRole,
      recipientId: recipient.id,
      recipientRole: recipient.role,
      kind: "delegation",
      goal: frame.subGoal,
      content: frame.content,
      ...(frame.payload ? { payload: frame.payload } : {})
    };
  }

  /** Dispatches drafts in order; the last one is delivered next unless a terminal one comes first. */
  private dispatchRouted(record: ConversationRecord, drafts: EnvelopeDraft[]): Envelope {
    let last: Envelope | null = null;

    for (const draft of drafts) {
      last = this.dispatchHop(record, draft);
      if (last.pendingUserReply === true) {
        break;
      }
    }

    if (!last) {
      throw new Error(`Routing produced no envelope for conversation ${record.id}`);
    }

    return last;
  }

  private dispatchHop(record: ConversationRecord, draft: EnvelopeDraft): Envelope {
    const hop = record.hop + 1;
    const pendingUserReply = derivePendingUserReply({
      senderRole: draft.senderRole,
      recipientId: draft.recipientId,
      initializerId: record.resolved.swarm.initializerId,
      kind: draft.kind,
      openDelegations: record.stack.length
    });

    if (pendingUserReply !== true && hop >= this.settings.hopCeiling) {
      return this.dispatchFallback(record, `hop ceiling of ${this.settings.hopCeiling} reached`, PARTIAL_RESPONSE_PREFIX);
    }

    record.hop = hop;
    return this.dispatch(record, draft);
  }

  private dispatchFallback(record: ConversationRecord, reason: string, prefix: string): Envelope {
    const hop = record.hop + 1;
    const error = new DelegationDepthExceededError(record.id, hop, reason);
    this.logDebug("route:delegation_depth_exceeded", { conversationId: record.id, hop, message: error.message });

    record.stack = [];
    record.hop = hop;
    return this.dispatch(record, {
      senderId: ORCHESTRATOR_SENDER_ID,
      senderRole: "orchestrator",
      recipientId: record.resolved.swarm.initializerId,
      recipientRole: "responsible",
      kind: "fallback",
      goal: this.turnGoal(record),
      content: this.summarizePartialProgress(record, prefix),
      failure: { code: "DELEGATION_DEPTH_EXCEEDED", reason }
    });
  }

  private dispatch(record: ConversationRecord, draft: EnvelopeDraft, options: { late?: boolean } = {}): Envelope {
    const pendingUserReply = options.late
      ? false
      : derivePendingUserReply({
          senderRole: draft.senderRole,
          recipientId: draft.recipientId,
          initializerId: record.resolved.swarm.initializerId,
          kind: draft.kind,
          openDelegations: record.stack.length
        });

    const now = this.now();
    const envelope = createEnvelope(draft, {
      conversationId: record.id,
      sequenceNo: record.nextSequenceNo,
      turn: record.turn,
      hop: draft.senderRole === "user" ? 0 : record.hop,
      pendingUserReply,
      createdAt: new Date(now).toISOString()
    });

    const transition = applyEnvelope(record.state, envelope);
    record.nextSequenceNo += 1;
    record.state = transition.toState;
    record.envelopes.push(envelope);
    record.lastActivityAt = now;
    this.memory.admit(envelope);

    this.logDebug("envelope:dispatched", {
      conversationId: record.id,
      envelope: describeEnvelope(envelope),
      pendingUserReply,
      content: previewForLog(envelope.content)
    });

    this.emit("envelope", {
      type: "envelope",
      conversationId: record.id,
      envelope: toEnvelopeRecord(envelope)
    } satisfies EnvelopeEvent);

    if (transition.fromState !== transition.toState) {
      this.emitStateTransition(record.id, transition.fromState, transition.toState, envelope.sequenceNo);
    }

    return envelope;
  }

  private async archiveLateResponse(
    record: ConversationRecord,
    agent: RaciAgent,
    delivered: Envelope,
    outcome: HopOutcome
  ): Promise<void> {
    if (!outcome.ok) {
      return;
    }

    const reply = outcome.reply;
    const frame = record.stack[record.stack.length - 1];
    this.dispatch(
      record,
      {
        senderId: agent.id,
        senderRole: agent.role,
        recipientId: frame ? frame.delegatorId : record.resolved.swarm.initializerId,
        recipientRole: frame ? frame.delegatorRole : "responsible",
        kind: reply.kind === "answer" ? "answer" : "delegation",
        goal: reply.kind === "answer" ? delivered.goal : reply.goal,
        content: reply.content ?? "",
        ...(reply.payload ? { payload: reply.payload } : {})
      },
      { late: true }
    );

    this.logDebug("envelope:archived_after_close", { conversationId: record.id, agentId: agent.id });
    await this.persist(record);
  }

  private recoverFromFatalError(record: ConversationRecord, error: unknown): FinalResponse {
    console.error(`[raci] Conversation ${record.id} failed: ${describeError(error)}`);

    if (record.state === "CLOSED") {
      return this.closedResponse(record);
    }

    try {
      record.stack = [];
      record.hop += 1;
      const envelope = this.dispatch(record, {
        senderId: ORCHESTRATOR_SENDER_ID,
        senderRole: "orchestrator",
        recipientId: record.resolved.swarm.initializerId,
        recipientRole: "responsible",
        kind: "failure",
        goal: this.turnGoal(record),
        content: DEGRADED_RESPONSE,
        failure: { code: "AGENT_FAILURE", reason: describeError(error) }
      });
      return this.responseFromTerminal(record, envelope);
    } catch (secondaryError) {
      console.error(`[raci] Conversation ${record.id} cannot reach AWAITING_USER: ${describeError(secondaryError)}`);
      return {
        conversationId: record.id,
        outcome: "degraded",
        content: DEGRADED_RESPONSE,
        state: record.state,
        sequenceNo: null
      };
    }
  }

  private responseFromTerminal(record: ConversationRecord, envelope: Envelope): FinalResponse {
    return {
      conversationId: record.id,
      outcome: envelope.kind === "fallback" ? "partial" : envelope.kind === "failure" ? "degraded" : "completed",
      content: envelope.content,
      state: record.state,
      sequenceNo: envelope.sequenceNo
    };
  }

  private closedResponse(record: ConversationRecord): FinalResponse {
    return {
      conversationId: record.id,
      outcome: "closed",
      content: CLOSED_RESPONSE,
      state: "CLOSED",
      sequenceNo: null
    };
  }

  private summarizePartialProgress(record: ConversationRecord, prefix: string): string {
    const progress = this.memory
      .project(record.id, "accountable")
      .fragments.filter(
        (fragment) =>
          fragment.sequenceNo >= record.turnStartSequenceNo &&
          (fragment.kind === "summary" || fragment.envelopeKind === "answer")
      )
      .slice(-3)
      .map((fragment) => `${fragment.senderId}: ${previewForLog(fragment.content, 120)}`);

    return progress.length > 0
      ? `${prefix} Progress so far: ${progress.join(" | ")}`
      : `${prefix} No partial results were produced.`;
  }

  private turnGoal(record: ConversationRecord): string {
    const opening = record.envelopes.find((envelope) => envelope.sequenceNo === record.turnStartSequenceNo);
    return opening?.goal ?? "";
  }

  private userDraft(record: ConversationRecord, text: string): EnvelopeDraft {
    return {
      senderId: record.userId,
      senderRole: "user",
      recipientId: record.resolved.swarm.initializerId,
      recipientRole: "responsible",
      kind: "user_request",
      goal: text,
      content: text
    };
  }

  private async persist(record: ConversationRecord): Promise<void> {
    if (!this.archive) {
      return;
    }

    const snapshot = this.memory.snapshot(record.id);
    try {
      await this.archive.save({
        conversationId: record.id,
        userId: record.userId,
        capability: record.capability,
        swarmName: record.resolved.swarm.name,
        state: record.state ?? "CLOSED",
        turn: record.turn,
        createdAt: new Date(record.createdAt).toISOString(),
        closedAt: new Date(record.closedAt ?? this.now()).toISOString(),
        closedReason: record.closedReason ?? "",
        closedAfterSequenceNo: record.closedAfterSequenceNo ?? record.nextSequenceNo - 1,
        envelopes: record.envelopes.map(toEnvelopeRecord),
        memory: snapshot
          ? {
              budgetTokens: snapshot.budgetTokens,
              tokens: snapshot.tokens,
              compactions: snapshot.compactions,
              fragments: snapshot.fragments.map((fragment) => ({
                kind: fragment.kind,
                sequenceNos: [...fragment.sequenceNos],
                senderId: fragment.senderId,
                recipientId: fragment.recipientId,
                content: fragment.content,
                tokens: fragment.tokens,
                pinned: fragment.pinned
              }))
            }
          : null
      });
    } catch (error) {
      console.error(`[raci] Failed to archive conversation ${record.id}: ${describeError(error)}`);
    }
  }

  /** Evicts the oldest closed conversations; one still finishing a turn stays queued until it settles. */
  private trimClosedConversations(): void {
    let index = 0;
    while (this.closedOrder.length > this.closedConversationLimit && index < this.closedOrder.length) {
      const conversationId = this.closedOrder[index];
      const record = this.conversations.get(conversationId);
      if (record?.activeTurn) {
        index += 1;
        continue;
      }

      this.closedOrder.splice(index, 1);
      this.conversations.delete(conversationId);
      this.memory.forget(conversationId);
    }
  }

  private requireConversation(conversationId: string): ConversationRecord {
    const record = this.conversations.get(conversationId);
    if (!record) {
      throw new UnknownConversationError(conversationId);
    }
    return record;
  }

  private toSummary(record: ConversationRecord): ConversationSummary {
    return {
      conversationId: record.id,
      userId: record.userId,
      capability: record.capability,
      swarmName: record.resolved.swarm.name,
      state: record.state ?? "OPEN",
      turn: record.turn,
      createdAt: new Date(record.createdAt).toISOString(),
      lastActivityAt: new Date(record.lastActivityAt).toISOString(),
      ...(record.closedReason ? { closedReason: record.closedReason } : {}),
      envelopes: record.envelopes.map(toEnvelopeRecord)
    };
  }

  private emitStateTransition(
    conversationId: string,
    fromState: ConversationState | null,
    toState: ConversationState,
    sequenceNo: number
  ): void {
    this.logDebug("state:transition", { conversationId, fromState, toState, sequenceNo });
    this.emit("state_transition", {
      type: "state_transition",
      conversation_id: conversationId,
      from_state: fromState,
      to_state: toState,
      sequence_no: sequenceNo,
      timestamp: new Date(this.now()).toISOString()
    } satisfies StateTransitionEvent);
  }

  private logDebug(message: string, details?: unknown): void {
    if (!this.debug) {
      return;
    }

    const prefix = `[raci][${new Date().toISOString()}] ${message}`;
    if (details === undefined) {
      console.log(prefix);
      return;
    }

    console.log(prefix, details);
  }
}
