import { RoleViolationError } from "./errors.js";
import type { AgentIdentity, DelegationTarget, RaciRole } from "./types.js";

export const RACI_DELEGATION_TARGETS: Readonly<Record<RaciRole, readonly RaciRole[]>> = {
  responsible: ["accountable"],
  accountable: ["consulted", "informed"],
  consulted: ["consulted", "informed"],
  informed: []
};

export function canDelegate(from: RaciRole, to: RaciRole): boolean {
  return RACI_DELEGATION_TARGETS[from].includes(to);
}

/**
 * Resolves a delegation target to concrete swarm members, in membership order.
 * Addressing a role fans out to every member holding it, minus the sender.
 */
export function resolveDelegationRecipients(
  sender: AgentIdentity,
  target: DelegationTarget,
  members: readonly AgentIdentity[]
): AgentIdentity[] {
  if (target.kind === "agent") {
    const recipient = members.find((member) => member.id === target.agentId);
    if (!recipient) {
      throw new RoleViolationError(`${sender.id} delegated to ${target.agentId}, which is not a swarm member`, sender.id);
    }

    if (recipient.id === sender.id) {
      throw new RoleViolationError(`${sender.id} cannot delegate to itself`, sender.id);
    }

    assertCanDelegate(sender, recipient.role);
    return [recipient];
  }

  assertCanDelegate(sender, target.role);
  const recipients = members.filter((member) => member.role === target.role && member.id !== sender.id);
  if (recipients.length === 0) {
    throw new RoleViolationError(`${sender.id} delegated to role ${target.role}, which has no other members`, sender.id);
  }

  return recipients;
}

function assertCanDelegate(sender: AgentIdentity, targetRole: RaciRole): void {
  if (!canDelegate(sender.role, targetRole)) {
    throw new RoleViolationError(
      `${sender.role} agent ${sender.id} may not delegate to a ${targetRole} agent`,
      sender.id
    );
  }
}
