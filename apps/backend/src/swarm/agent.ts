import type { AgentIdentity, AgentReply, ContextSlice, Envelope, RaciRole } from "./types.js";

export interface AgentRespondOptions {
  /** Latest envelope addressed to the agent. */
  envelope: Envelope;
  signal: AbortSignal;
}

/**
 * A swarm participant. Agents never touch conversation state: they read the
 * context slice they are handed and return a reply the orchestrator routes.
 */
export interface RaciAgent extends AgentIdentity {
  respond(context: ContextSlice, goal: string, options: AgentRespondOptions): Promise<AgentReply>;
}

export type AgentHandler = (
  context: ContextSlice,
  goal: string,
  options: AgentRespondOptions
) => AgentReply | Promise<AgentReply>;

export interface FunctionAgentOptions {
  id: string;
  role: RaciRole;
  capabilities?: string[];
  description?: string;
  handler: AgentHandler;
}

/** Adapts a plain function to the agent contract, for in-process agents. */
export class FunctionAgent implements RaciAgent {
  readonly id: string;
  readonly role: RaciRole;
  readonly capabilities: readonly string[];
  readonly description?: string;
  private readonly handler: AgentHandler;

  constructor(options: FunctionAgentOptions) {
    this.id = options.id;
    this.role = options.role;
    this.capabilities = Object.freeze([...(options.capabilities ?? [])]);
    this.description = options.description;
    this.handler = options.handler;
  }

  async respond(context: ContextSlice, goal: string, options: AgentRespondOptions): Promise<AgentReply> {
    return await this.handler(context, goal, options);
  }
}
