export const RACI_ROLES = ['responsible', 'accountable', 'consulted', 'informed'] as const
export type RaciRole = (typeof RACI_ROLES)[number]

export type ParticipantRole = RaciRole | 'user' | 'orchestrator'

export const CONVERSATION_STATES = ['OPEN', 'DELEGATING', 'AWAITING_USER', 'CLOSED'] as const
export type ConversationState = (typeof CONVERSATION_STATES)[number]

export type EnvelopeKind = 'user_request' | 'delegation' | 'answer' | 'failure' | 'fallback'

export type FailureCode =
  | 'AGENT_TIMEOUT'
  | 'AGENT_FAILURE'
  | 'ROLE_VIOLATION'
  | 'DELEGATION_DEPTH_EXCEEDED'

export interface EnvelopeFailureRecord {
  code: FailureCode
  reason: string
  attempts?: number
}

export interface EnvelopeRecord {
  conversation_id: string
  sequence_no: number
  turn: number
  hop: number
  sender_id: string
  sender_role: ParticipantRole
  recipient_id: string
  recipient_role: ParticipantRole
  kind: EnvelopeKind
  goal: string
  content: string
  payload?: Record<string, unknown>
  failure?: EnvelopeFailureRecord
  pending_user_reply: boolean | null
  created_at: string
}

export interface SwarmMemberSummary {
  id: string
  role: RaciRole
  capabilities: string[]
}

export interface AgentSummary extends SwarmMemberSummary {
  description?: string
  /** Swarms the agent is a member of, in registration order. */
  swarms: string[]
}

export interface SwarmSummary {
  name: string
  description?: string
  capabilities: string[]
  initializerId: string
  adminId: string
  createdBy: string
  registeredAt: string
  members: SwarmMemberSummary[]
}

export type TurnOutcome = 'completed' | 'partial' | 'degraded' | 'unsupported' | 'closed'

export interface ConversationSummary {
  conversationId: string
  userId: string
  capability: string
  swarmName: string
  state: ConversationState
  turn: number
  createdAt: string
  lastActivityAt: string
  closedReason?: string
  envelopes: EnvelopeRecord[]
}
