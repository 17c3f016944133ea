import type {
  ConversationState,
  EnvelopeKind,
  FailureCode,
  ParticipantRole,
  RaciRole,
  TurnOutcome
} from "@raci-swarm/protocol";

export type {
  ConversationState,
  EnvelopeKind,
  FailureCode,
  ParticipantRole,
  RaciRole,
  TurnOutcome
} from "@raci-swarm/protocol";

export type PendingUserReply = boolean | null;

export interface EnvelopeFailure {
  readonly code: FailureCode;
  readonly reason: string;
  readonly attempts?: number;
}

export interface Envelope {
  readonly conversationId: string;
  readonly sequenceNo: number;
  readonly turn: number;
  /** Position of the envelope within its turn. User envelopes are hop 0. */
  readonly hop: number;
  readonly senderId: string;
  readonly senderRole: ParticipantRole;
  readonly recipientId: string;
  readonly recipientRole: ParticipantRole;
  readonly kind: EnvelopeKind;
  readonly goal: string;
  readonly content: string;
  readonly payload?: Readonly<Record<string, unknown>>;
  readonly failure?: EnvelopeFailure;
  readonly pendingUserReply: PendingUserReply;
  readonly createdAt: string;
}

export interface AgentIdentity {
  readonly id: string;
  readonly role: RaciRole;
  readonly capabilities: readonly string[];
  readonly description?: string;
}

export type DelegationTarget =
  | { kind: "agent"; agentId: string }
  | { kind: "role"; role: RaciRole };

export type AgentReply =
  | {
      kind: "answer";
      content: string;
      payload?: Record<string, unknown>;
    }
  | {
      kind: "delegation";
      target: DelegationTarget;
      goal: string;
      content?: string;
      payload?: Record<string, unknown>;
    };

export type MemoryFragmentKind = "envelope" | "summary";

/** One merged envelope inside a summary, kept so each consumer sees only its own lines. */
export interface SummaryEntry {
  readonly sequenceNo: number;
  readonly senderId: string;
  readonly senderRole: ParticipantRole;
  readonly recipientId: string;
  readonly recipientRole: ParticipantRole;
  readonly terminal: boolean;
  readonly line: string;
}

export interface MemoryFragment {
  readonly kind: MemoryFragmentKind;
  /** First sequence number covered. Equals `sequenceNos[0]`. */
  readonly sequenceNo: number;
  readonly sequenceNos: readonly number[];
  readonly envelopeKind?: EnvelopeKind;
  readonly senderId: string;
  readonly senderRole: ParticipantRole;
  readonly recipientId: string;
  readonly recipientRole: ParticipantRole;
  readonly content: string;
  readonly tokens: number;
  readonly pinned: boolean;
  readonly terminal: boolean;
  /** Roles that see at least part of the fragment. */
  readonly audience: readonly ParticipantRole[];
  readonly entries?: readonly SummaryEntry[];
}

export interface ContextSlice {
  readonly conversationId: string;
  readonly consumerRole: RaciRole;
  readonly consumerId?: string;
  readonly fragments: readonly MemoryFragment[];
  readonly tokens: number;
}

export interface SwarmDefinition {
  name: string;
  description?: string;
  capabilities?: string[];
  memberIds: string[];
  createdBy?: string;
}

export interface Swarm {
  readonly name: string;
  readonly description?: string;
  readonly capabilities: readonly string[];
  readonly memberIds: readonly string[];
  readonly initializerId: string;
  readonly adminId: string;
  readonly createdBy: string;
  readonly registeredAt: string;
}

export interface FinalResponse {
  conversationId: string | null;
  outcome: TurnOutcome;
  content: string;
  state: ConversationState | null;
  sequenceNo: number | null;
}

export interface SwarmPaths {
  rootDir: string;
  dataDir: string;
  swarmsDir: string;
  archiveDir: string;
}

export interface OrchestrationSettings {
  hopCeiling: number;
  agentTimeoutMs: number;
  agentRetryLimit: number;
  agentRetryBackoffMs: number;
  turnTimeoutMs: number;
  inactivityTimeoutMs: number;
  sweepIntervalMs: number;
}

export interface MemorySettings {
  budgetTokens: number;
  pinUserRequests: boolean;
  archivedConversationLimit: number;
}

export interface SwarmConfig {
  host: string;
  port: number;
  debug: boolean;
  orchestration: OrchestrationSettings;
  memory: MemorySettings;
  paths: SwarmPaths;
}
