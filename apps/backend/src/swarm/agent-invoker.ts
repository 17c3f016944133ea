import { setTimeout as delay } from "node:timers/promises";
import type { RaciAgent } from "./agent.js";
import { AgentTimeoutError, describeError } from "./errors.js";
import type { AgentReply, ContextSlice, Envelope, EnvelopeFailure } from "./types.js";

export type HopOutcome =
  | { ok: true; reply: AgentReply; attempts: number }
  | { ok: false; failure: EnvelopeFailure };

export interface InvokeAgentOptions {
  context: ContextSlice;
  goal: string;
  envelope: Envelope;
  timeoutMs: number;
  retryLimit: number;
  retryBackoffMs: number;
  /** Conversation-level signal, aborted when the conversation closes. */
  signal: AbortSignal;
  onAttemptFailed?: (details: { agentId: string; attempt: number; error: unknown; willRetry: boolean }) => void;
  onLateSettle?: (details: { agentId: string; attempt: number; error?: unknown }) => void;
}

/**
 * Runs one hop. Timeouts are retried up to `retryLimit` times with a linear
 * backoff; any other error fails the hop at once. Never rejects.
 */
export async function invokeAgent(agent: RaciAgent, options: InvokeAgentOptions): Promise<HopOutcome> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      const reply = await runAttempt(agent, options, attempt);
      return { ok: true, reply, attempts: attempt };
    } catch (error) {
      const timedOut = error instanceof AgentTimeoutError;
      const willRetry = timedOut && attempt <= options.retryLimit && !options.signal.aborted;
      options.onAttemptFailed?.({ agentId: agent.id, attempt, error, willRetry });

      if (willRetry) {
        if (options.retryBackoffMs > 0) {
          await delay(options.retryBackoffMs * attempt);
        }
        continue;
      }

      return {
        ok: false,
        failure: {
          code: timedOut ? "AGENT_TIMEOUT" : "AGENT_FAILURE",
          reason: describeError(error),
          attempts: attempt
        }
      };
    }
  }
}

async function runAttempt(agent: RaciAgent, options: InvokeAgentOptions, attempt: number): Promise<AgentReply> {
  const controller = new AbortController();
  const forwardAbort = (): void => {
    controller.abort(options.signal.reason);
  };

  if (options.signal.aborted) {
    forwardAbort();
  } else {
    options.signal.addEventListener("abort", forwardAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  let timedOut = false;

  const pending = Promise.resolve().then(() =>
    agent.respond(options.context, options.goal, { envelope: options.envelope, signal: controller.signal })
  );

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      const error = new AgentTimeoutError(agent.id, options.timeoutMs);
      controller.abort(error);
      reject(error);
    }, options.timeoutMs);
  });

  try {
    return await Promise.race([pending, timeout]);
  } finally {
    clearTimeout(timer);
    options.signal.removeEventListener("abort", forwardAbort);

    if (timedOut) {
      // The discarded attempt may still settle; report it instead of leaving it unhandled.
      void pending.then(
        () => options.onLateSettle?.({ agentId: agent.id, attempt }),
        (error: unknown) => options.onLateSettle?.({ agentId: agent.id, attempt, error })
      );
    }
  }
}
