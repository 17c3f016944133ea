import type { AgentSummary, SwarmSummary } from "@raci-swarm/protocol";
import type { RaciAgent } from "./agent.js";
import { InvalidSwarmError, NoMatchingSwarmError } from "./errors.js";
import type { Swarm, SwarmDefinition } from "./types.js";

export interface ResolvedSwarm {
  swarm: Swarm;
  /** Members in declaration order. Shared references, never copies. */
  members: readonly RaciAgent[];
}

export function normalizeCapabilityTag(tag: string): string {
  return tag.trim().toLowerCase();
}

/**
 * Agent and swarm registries. Writes swap in new maps so a resolution in
 * flight always reads one consistent snapshot.
 */
export class SwarmRouter {
  private agents: ReadonlyMap<string, RaciAgent> = new Map();
  private swarms: ReadonlyMap<string, Swarm> = new Map();
  private readonly now: () => string;

  constructor(options: { now?: () => string } = {}) {
    this.now = options.now ?? (() => new Date().toISOString());
  }

  registerAgent(agent: RaciAgent): void {
    const id = agent.id.trim();
    if (!id) {
      throw new InvalidSwarmError("Agent id must be a non-empty string");
    }

    if (this.agents.has(id)) {
      throw new InvalidSwarmError(`Agent ${id} is already registered`);
    }

    this.agents = new Map(this.agents).set(id, agent);
  }

  getAgent(agentId: string): RaciAgent | undefined {
    return this.agents.get(agentId);
  }

  listAgents(): RaciAgent[] {
    return Array.from(this.agents.values());
  }

  registerSwarm(definition: SwarmDefinition): Swarm {
    const name = definition.name.trim();
    if (!name) {
      throw new InvalidSwarmError("Swarm name must be a non-empty string");
    }

    if (this.swarms.has(name)) {
      throw new InvalidSwarmError(`Swarm ${name} is already registered`);
    }

    const memberIds = Array.from(new Set(definition.memberIds.map((memberId) => memberId.trim())));
    const members: RaciAgent[] = [];
    for (const memberId of memberIds) {
      const agent = this.agents.get(memberId);
      if (!agent) {
        throw new InvalidSwarmError(`Swarm ${name} references unknown agent ${memberId}`);
      }
      members.push(agent);
    }

    const initializers = members.filter((member) => member.role === "responsible");
    const admins = members.filter((member) => member.role === "accountable");
    if (initializers.length !== 1 || admins.length !== 1) {
      throw new InvalidSwarmError(
        `Swarm ${name} must have exactly one responsible and one accountable agent ` +
          `(found ${initializers.length} responsible, ${admins.length} accountable)`
      );
    }

    const declared = (definition.capabilities ?? []).map(normalizeCapabilityTag).filter((tag) => tag.length > 0);
    const capabilities =
      declared.length > 0
        ? declared
        : members.flatMap((member) => member.capabilities.map(normalizeCapabilityTag));

    const swarm: Swarm = Object.freeze({
      name,
      ...(definition.description ? { description: definition.description } : {}),
      capabilities: Object.freeze(Array.from(new Set(capabilities))),
      memberIds: Object.freeze(memberIds),
      initializerId: initializers[0].id,
      adminId: admins[0].id,
      createdBy: definition.createdBy?.trim() || "system",
      registeredAt: this.now()
    });

    this.swarms = new Map(this.swarms).set(name, swarm);
    return swarm;
  }

  unregisterSwarm(name: string): boolean {
    if (!this.swarms.has(name)) {
      return false;
    }

    const next = new Map(this.swarms);
    next.delete(name);
    this.swarms = next;
    return true;
  }

  getSwarm(name: string): Swarm | undefined {
    return this.swarms.get(name);
  }

  listSwarms(): Swarm[] {
    return Array.from(this.swarms.values());
  }

  /** First registered swarm declaring the tag wins. */
  resolve(capabilityTag: string): ResolvedSwarm {
    const tag = normalizeCapabilityTag(capabilityTag);
    const agents = this.agents;

    for (const swarm of this.swarms.values()) {
      if (!tag || !swarm.capabilities.includes(tag)) {
        continue;
      }

      const members: RaciAgent[] = [];
      for (const memberId of swarm.memberIds) {
        const agent = agents.get(memberId);
        if (agent) {
          members.push(agent);
        }
      }

      return { swarm, members };
    }

    throw new NoMatchingSwarmError(capabilityTag);
  }

  describeSwarms(): SwarmSummary[] {
    return this.listSwarms().map((swarm) => this.toSwarmSummary(swarm));
  }

  describeSwarm(name: string): SwarmSummary | undefined {
    const swarm = this.getSwarm(name);
    return swarm ? this.toSwarmSummary(swarm) : undefined;
  }

  describeAgents(): AgentSummary[] {
    return this.listAgents().map((agent) => this.toAgentSummary(agent));
  }

  describeAgent(agentId: string): AgentSummary | undefined {
    const agent = this.getAgent(agentId);
    return agent ? this.toAgentSummary(agent) : undefined;
  }

  private toAgentSummary(agent: RaciAgent): AgentSummary {
    return {
      id: agent.id,
      role: agent.role,
      capabilities: [...agent.capabilities],
      ...(agent.description ? { description: agent.description } : {}),
      swarms: this.listSwarms()
        .filter((swarm) => swarm.memberIds.includes(agent.id))
        .map((swarm) => swarm.name)
    };
  }

  private toSwarmSummary(swarm: Swarm): SwarmSummary {
    return {
      name: swarm.name,
      ...(swarm.description ? { description: swarm.description } : {}),
      capabilities: [...swarm.capabilities],
      initializerId: swarm.initializerId,
      adminId: swarm.adminId,
      createdBy: swarm.createdBy,
      registeredAt: swarm.registeredAt,
      members: swarm.memberIds.flatMap((memberId) => {
        const agent = this.agents.get(memberId);
        return agent ? [{ id: agent.id, role: agent.role, capabilities: [...agent.capabilities] }] : [];
      })
    };
  }
}
