export type OrchestrationErrorCode =
  | "NO_MATCHING_SWARM"
  | "AGENT_TIMEOUT"
  | "AGENT_FAILURE"
  | "DELEGATION_DEPTH_EXCEEDED"
  | "MEMORY_BUDGET_EXCEEDED"
  | "ROLE_VIOLATION"
  | "CONVERSATION_STATE"
  | "UNKNOWN_CONVERSATION"
  | "UNKNOWN_SWARM"
  | "UNKNOWN_AGENT"
  | "INVALID_SWARM";

export class OrchestrationError extends Error {
  constructor(
    message: string,
    public readonly code: OrchestrationErrorCode,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = "OrchestrationError";
  }
}

export class NoMatchingSwarmError extends OrchestrationError {
  constructor(public readonly capability: string) {
    super(`No swarm supports capability "${capability}".`, "NO_MATCHING_SWARM", 422);
    this.name = "NoMatchingSwarmError";
  }
}

export class AgentTimeoutError extends OrchestrationError {
  constructor(
    public readonly agentId: string,
    public readonly timeoutMs: number
  ) {
    super(`Agent ${agentId} did not respond within ${timeoutMs}ms.`, "AGENT_TIMEOUT", 504);
    this.name = "AgentTimeoutError";
  }
}

export class DelegationDepthExceededError extends OrchestrationError {
  constructor(
    public readonly conversationId: string,
    public readonly hop: number,
    reason: string
  ) {
    super(`Conversation ${conversationId} stopped at hop ${hop}: ${reason}`, "DELEGATION_DEPTH_EXCEEDED");
    this.name = "DelegationDepthExceededError";
  }
}

export class RoleViolationError extends OrchestrationError {
  constructor(message: string, public readonly agentId: string) {
    super(message, "ROLE_VIOLATION", 400);
    this.name = "RoleViolationError";
  }
}

export class ConversationStateError extends OrchestrationError {
  constructor(message: string) {
    super(message, "CONVERSATION_STATE", 409);
    this.name = "ConversationStateError";
  }
}

export class UnknownConversationError extends OrchestrationError {
  constructor(public readonly conversationId: string) {
    super(`Unknown conversation: ${conversationId}`, "UNKNOWN_CONVERSATION", 404);
    this.name = "UnknownConversationError";
  }
}

export class UnknownSwarmError extends OrchestrationError {
  constructor(public readonly swarmName: string) {
    super(`Unknown swarm: ${swarmName}`, "UNKNOWN_SWARM", 404);
    this.name = "UnknownSwarmError";
  }
}

export class UnknownAgentError extends OrchestrationError {
  constructor(public readonly agentId: string) {
    super(`Unknown agent: ${agentId}`, "UNKNOWN_AGENT", 404);
    this.name = "UnknownAgentError";
  }
}

export class InvalidSwarmError extends OrchestrationError {
  constructor(message: string) {
    super(message, "INVALID_SWARM", 400);
    this.name = "InvalidSwarmError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
