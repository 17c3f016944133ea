import type { ContextSlice, Envelope, MemoryFragment, RaciRole } from "./types.js";
import {
  audienceFor,
  buildSummaryContent,
  clipToTokens,
  estimateTokens,
  isEnvelopeVisibleTo,
  scoreFragment,
  summaryCapFor,
  summaryEntriesFor
} from "./memory-utils.js";

export interface MemoryCompactionEvent {
  code: "MEMORY_BUDGET_EXCEEDED";
  conversationId: string;
  mergedSequenceNos: number[];
  freedTokens: number;
  retainedTokens: number;
}

export interface MemoryManagerOptions {
  budgetTokens: number;
  pinUserRequests?: boolean;
  archivedConversationLimit?: number;
  onCompaction?: (event: MemoryCompactionEvent) => void;
}

export interface MemorySnapshot {
  conversationId: string;
  archived: boolean;
  budgetTokens: number;
  tokens: number;
  compactions: number;
  fragments: MemoryFragment[];
}

export interface MemoryStats {
  fragments: number;
  summaries: number;
  pinned: number;
  tokens: number;
  budgetTokens: number;
  compactions: number;
  archived: boolean;
}

interface ConversationMemory {
  fragments: MemoryFragment[];
  archived: boolean;
  compactions: number;
}

/**
 * Bounded shared memory per conversation. Every admitted envelope becomes a
 * fragment; once the token budget is exceeded the lowest scoring fragments are
 * merged into a summary fragment so the retained total never exceeds it.
 */
export class MemoryManager {
  readonly budgetTokens: number;
  private readonly summaryCapTokens: number;
  private readonly fragmentCapTokens: number;
  private readonly pinUserRequests: boolean;
  private readonly archivedConversationLimit: number;
  private readonly onCompaction: ((event: MemoryCompactionEvent) => void) | undefined;

  private readonly active = new Map<string, ConversationMemory>();
  private readonly archived = new Map<string, ConversationMemory>();

  constructor(options: MemoryManagerOptions) {
    if (!Number.isInteger(options.budgetTokens) || options.budgetTokens < 2) {
      throw new Error(`Memory budget must be an integer >= 2, received ${options.budgetTokens}`);
    }

    this.budgetTokens = options.budgetTokens;
    this.summaryCapTokens = summaryCapFor(options.budgetTokens);
    this.fragmentCapTokens = options.budgetTokens - this.summaryCapTokens;
    this.pinUserRequests = options.pinUserRequests ?? true;
    this.archivedConversationLimit = options.archivedConversationLimit ?? 100;
    this.onCompaction = options.onCompaction;
  }

  admit(envelope: Envelope): MemoryFragment {
    const memory = this.resolveMemory(envelope.conversationId) ?? this.createMemory(envelope.conversationId);
    const content = clipToTokens(envelope.content, this.fragmentCapTokens);
    const base = {
      senderId: envelope.senderId,
      senderRole: envelope.senderRole,
      recipientId: envelope.recipientId,
      recipientRole: envelope.recipientRole,
      terminal: envelope.pendingUserReply === true
    };

    const fragment: MemoryFragment = {
      kind: "envelope",
      sequenceNo: envelope.sequenceNo,
      sequenceNos: Object.freeze([envelope.sequenceNo]),
      envelopeKind: envelope.kind,
      ...base,
      content,
      tokens: estimateTokens(content),
      pinned: this.pinUserRequests && envelope.kind === "user_request",
      audience: Object.freeze(audienceFor(base))
    };

    memory.fragments.push(Object.freeze(fragment));
    this.enforceBudget(envelope.conversationId, memory);
    return fragment;
  }

  pin(conversationId: string, sequenceNo: number): boolean {
    const memory = this.resolveMemory(conversationId);
    if (!memory) {
      return false;
    }

    const index = memory.fragments.findIndex((fragment) => fragment.sequenceNos.includes(sequenceNo));
    if (index < 0) {
      return false;
    }

    memory.fragments[index] = Object.freeze({ ...memory.fragments[index], pinned: true });
    return true;
  }

  /** Pure read: the same inputs return equal slices until the next admit. */
  project(conversationId: string, consumerRole: RaciRole, consumerId?: string): ContextSlice {
    const memory = this.resolveMemory(conversationId);
    const fragments = (memory?.fragments ?? []).flatMap((fragment) => {
      if (fragment.kind === "summary") {
        const visible = this.summaryFor(fragment, consumerRole, consumerId);
        return visible ? [visible] : [];
      }

      return isEnvelopeVisibleTo(fragment, consumerRole, consumerId) ? [fragment] : [];
    });

    return {
      conversationId,
      consumerRole,
      ...(consumerId ? { consumerId } : {}),
      fragments,
      tokens: sumTokens(fragments)
    };
  }

  snapshot(conversationId: string): MemorySnapshot | undefined {
    const memory = this.resolveMemory(conversationId);
    if (!memory) {
      return undefined;
    }

    return {
      conversationId,
      archived: memory.archived,
      budgetTokens: this.budgetTokens,
      tokens: sumTokens(memory.fragments),
      compactions: memory.compactions,
      fragments: memory.fragments.slice()
    };
  }

  stats(conversationId: string): MemoryStats | undefined {
    const memory = this.resolveMemory(conversationId);
    if (!memory) {
      return undefined;
    }

    return {
      fragments: memory.fragments.length,
      summaries: memory.fragments.filter((fragment) => fragment.kind === "summary").length,
      pinned: memory.fragments.filter((fragment) => fragment.pinned).length,
      tokens: sumTokens(memory.fragments),
      budgetTokens: this.budgetTokens,
      compactions: memory.compactions,
      archived: memory.archived
    };
  }

  /** Moves the conversation to the bounded archive and returns its final snapshot. */
  release(conversationId: string): MemorySnapshot | undefined {
    const memory = this.active.get(conversationId);
    if (memory) {
      this.active.delete(conversationId);
      memory.archived = true;
      this.archived.set(conversationId, memory);

      while (this.archived.size > this.archivedConversationLimit) {
        const oldest = this.archived.keys().next();
        if (oldest.done) {
          break;
        }
        this.archived.delete(oldest.value);
      }
    }

    return this.snapshot(conversationId);
  }

  forget(conversationId: string): void {
    this.active.delete(conversationId);
    this.archived.delete(conversationId);
  }

  /** The part of a summary a consumer may read, or undefined when none of it is theirs. */
  private summaryFor(summary: MemoryFragment, consumerRole: RaciRole, consumerId?: string): MemoryFragment | undefined {
    if (consumerRole === "accountable") {
      return summary;
    }

    const entries = summary.entries ?? [];
    const visible = entries.filter((entry) => isEnvelopeVisibleTo(entry, consumerRole, consumerId));
    if (visible.length === 0) {
      return undefined;
    }

    if (visible.length === entries.length) {
      return summary;
    }

    const content = clipToTokens(buildSummaryContent(visible), this.summaryCapTokens);
    const sequenceNos = visible.map((entry) => entry.sequenceNo);
    return Object.freeze({
      ...summary,
      sequenceNo: sequenceNos[0],
      sequenceNos: Object.freeze(sequenceNos),
      content,
      tokens: estimateTokens(content),
      entries: Object.freeze(visible)
    });
  }

  private resolveMemory(conversationId: string): ConversationMemory | undefined {
    return this.active.get(conversationId) ?? this.archived.get(conversationId);
  }

  private createMemory(conversationId: string): ConversationMemory {
    const memory: ConversationMemory = { fragments: [], archived: false, compactions: 0 };
    this.active.set(conversationId, memory);
    return memory;
  }

  private enforceBudget(conversationId: string, memory: ConversationMemory): void {
    const total = sumTokens(memory.fragments);
    if (total <= this.budgetTokens) {
      return;
    }

    // The newest fragment always stays; it is clipped to leave room for a summary.
    const count = memory.fragments.length;
    const candidates = memory.fragments
      .slice(0, count - 1)
      .map((fragment, index) => ({ fragment, index, score: scoreFragment(fragment, index, count) }))
      .sort((left, right) => {
        if (left.fragment.pinned !== right.fragment.pinned) {
          return left.fragment.pinned ? 1 : -1;
        }

        return left.score - right.score || left.index - right.index;
      });

    const victimIndexes = new Set<number>();
    let freed = 0;
    for (const candidate of candidates) {
      if (total - freed + this.summaryCapTokens <= this.budgetTokens) {
        break;
      }

      victimIndexes.add(candidate.index);
      freed += candidate.fragment.tokens;
    }

    const victims = memory.fragments.filter((_, index) => victimIndexes.has(index));
    const firstVictimIndex = Math.min(...victimIndexes);
    const entries = summaryEntriesFor(victims);
    const content = clipToTokens(buildSummaryContent(entries), this.summaryCapTokens);
    const sequenceNos = victims.flatMap((victim) => victim.sequenceNos).sort((left, right) => left - right);
    const audience = Array.from(new Set(victims.flatMap((victim) => victim.audience)));

    const summary: MemoryFragment = {
      kind: "summary",
      sequenceNo: sequenceNos[0],
      sequenceNos: Object.freeze(sequenceNos),
      senderId: "memory",
      senderRole: "orchestrator",
      recipientId: conversationId,
      recipientRole: "orchestrator",
      content,
      tokens: estimateTokens(content),
      pinned: victims.some((victim) => victim.pinned),
      terminal: false,
      audience: Object.freeze(audience),
      entries: Object.freeze(entries)
    };
    Object.freeze(summary);

    const retained: MemoryFragment[] = [];
    memory.fragments.forEach((fragment, index) => {
      if (index === firstVictimIndex) {
        retained.push(summary);
      }

      if (!victimIndexes.has(index)) {
        retained.push(fragment);
      }
    });

    memory.fragments = retained;
    memory.compactions += 1;

    this.onCompaction?.({
      code: "MEMORY_BUDGET_EXCEEDED",
      conversationId,
      mergedSequenceNos: sequenceNos,
      freedTokens: freed - summary.tokens,
      retainedTokens: sumTokens(retained)
    });
  }
}

function sumTokens(fragments: readonly MemoryFragment[]): number {
  return fragments.reduce((sum, fragment) => sum + fragment.tokens, 0);
}
