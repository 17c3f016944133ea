import type { EnvelopeKind, MemoryFragment, ParticipantRole, RaciRole, SummaryEntry } from "./types.js";
import { previewForLog } from "./runtime-utils.js";

const CHARS_PER_TOKEN = 4;

const RELEVANCE_BY_KIND: Readonly<Record<EnvelopeKind | "summary", number>> = {
  user_request: 1,
  fallback: 1,
  failure: 0.6,
  answer: 0.5,
  delegation: 0.4,
  summary: 0.3
};

const RECENCY_WEIGHT = 0.6;
const RELEVANCE_WEIGHT = 0.4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function clipToTokens(text: string, maxTokens: number): string {
  if (estimateTokens(text) <= maxTokens) {
    return text;
  }

  const maxChars = Math.max(1, maxTokens) * CHARS_PER_TOKEN;
  return `${text.slice(0, maxChars - 3)}...`;
}

export function summaryCapFor(budgetTokens: number): number {
  return Math.max(1, Math.floor(budgetTokens * 0.25));
}

export function scoreFragment(fragment: MemoryFragment, index: number, count: number): number {
  const recency = count <= 1 ? 1 : index / (count - 1);
  const relevance = fragment.terminal
    ? 1
    : RELEVANCE_BY_KIND[fragment.kind === "summary" ? "summary" : (fragment.envelopeKind ?? "answer")];

  return RECENCY_WEIGHT * recency + RELEVANCE_WEIGHT * relevance;
}

type VisibilityInput = Pick<
  MemoryFragment,
  "senderId" | "senderRole" | "recipientId" | "recipientRole" | "terminal"
>;

export function isEnvelopeVisibleTo(fragment: VisibilityInput, role: RaciRole, consumerId?: string): boolean {
  if (role === "accountable" || fragment.senderRole === "user") {
    return true;
  }

  switch (role) {
    case "responsible":
      return fragment.terminal || fragment.senderRole === "responsible" || fragment.recipientRole === "responsible";
    case "consulted":
      return consumerId
        ? fragment.senderId === consumerId || fragment.recipientId === consumerId
        : fragment.senderRole === "consulted" || fragment.recipientRole === "consulted";
    case "informed":
      return (
        fragment.terminal ||
        (consumerId ? fragment.recipientId === consumerId : fragment.recipientRole === "informed")
      );
  }
}

export function audienceFor(fragment: VisibilityInput): ParticipantRole[] {
  const roles: RaciRole[] = ["responsible", "accountable", "consulted", "informed"];
  return roles.filter((role) => isEnvelopeVisibleTo(fragment, role));
}

/** Flattens merged fragments into summary entries; an earlier summary contributes its own entries. */
export function summaryEntriesFor(fragments: readonly MemoryFragment[]): SummaryEntry[] {
  return fragments.flatMap((fragment): SummaryEntry[] => {
    if (fragment.kind === "summary") {
      return fragment.entries ? [...fragment.entries] : [];
    }

    return [
      {
        sequenceNo: fragment.sequenceNo,
        senderId: fragment.senderId,
        senderRole: fragment.senderRole,
        recipientId: fragment.recipientId,
        recipientRole: fragment.recipientRole,
        terminal: fragment.terminal,
        line: `#${fragment.sequenceNo} ${fragment.senderId} -> ${fragment.recipientId}: ${previewForLog(fragment.content, 80)}`
      }
    ];
  });
}

export function buildSummaryContent(entries: readonly SummaryEntry[]): string {
  return `Summary: ${entries.map((entry) => entry.line).join(" | ")}`;
}
