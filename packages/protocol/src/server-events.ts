import type {
  ConversationState,
  ConversationSummary,
  EnvelopeRecord,
  TurnOutcome,
} from './shared-types.js'

export interface ReadyEvent {
  type: 'ready'
  serverTime: string
  subscribedConversationId: string | null
}

export interface StateTransitionEvent {
  type: 'state_transition'
  conversation_id: string
  from_state: ConversationState | null
  to_state: ConversationState
  sequence_no: number
  timestamp: string
}

export interface EnvelopeEvent {
  type: 'envelope'
  conversationId: string
  envelope: EnvelopeRecord
}

export interface TurnCompletedEvent {
  type: 'turn_completed'
  conversationId: string
  turn: number
  outcome: TurnOutcome
  content: string
  sequenceNo: number | null
}

export interface ConversationClosedEvent {
  type: 'conversation_closed'
  conversationId: string
  reason: string
  timestamp: string
}

export interface RequestAcceptedEvent {
  type: 'request_accepted'
  conversationId: string
  swarmName: string
  requestId?: string
}

export interface ConversationSnapshotEvent {
  type: 'conversation_snapshot'
  conversation: ConversationSummary
  requestId?: string
}

export interface PongEvent {
  type: 'pong'
  serverTime: string
}

export interface ErrorEvent {
  type: 'error'
  code: string
  message: string
  requestId?: string
}

export type OrchestratorEvent =
  | StateTransitionEvent
  | EnvelopeEvent
  | TurnCompletedEvent
  | ConversationClosedEvent

export type ServerEvent =
  | ReadyEvent
  | OrchestratorEvent
  | RequestAcceptedEvent
  | ConversationSnapshotEvent
  | PongEvent
  | ErrorEvent
