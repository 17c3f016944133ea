import { describe, expect, it } from 'vitest'
import { FunctionAgent, type AgentHandler } from '../swarm/agent.js'
import { invokeAgent, type InvokeAgentOptions } from '../swarm/agent-invoker.js'
import { createEnvelope } from '../swarm/envelope.js'
import type { AgentReply } from '../swarm/types.js'

const envelope = createEnvelope(
  {
    senderId: 'admin',
    senderRole: 'accountable',
    recipientId: 'worker',
    recipientRole: 'consulted',
    kind: 'delegation',
    goal: 'count files',
    content: 'count files',
  },
  { conversationId: 'conv-1', sequenceNo: 3, turn: 1, hop: 2, pendingUserReply: false, createdAt: '2026-01-01T00:00:00.000Z' },
)

function options(overrides: Partial<InvokeAgentOptions> = {}): InvokeAgentOptions {
  return {
    context: { conversationId: 'conv-1', consumerRole: 'consulted', fragments: [], tokens: 0 },
    goal: 'count files',
    envelope,
    timeoutMs: 20,
    retryLimit: 1,
    retryBackoffMs: 0,
    signal: new AbortController().signal,
    ...overrides,
  }
}

function worker(handler: AgentHandler) {
  return new FunctionAgent({ id: 'worker', role: 'consulted', handler })
}

describe('invokeAgent', () => {
  it('returns the reply with the attempt count', async () => {
    const outcome = await invokeAgent(worker(() => ({ kind: 'answer', content: '12' })), options())
    expect(outcome).toEqual({ ok: true, reply: { kind: 'answer', content: '12' }, attempts: 1 })
  })

  it('retries a timed out attempt and succeeds on the next one', async () => {
    let calls = 0
    const lateSettles: number[] = []
    const agent = worker(() => {
      calls += 1
      if (calls === 1) {
        return new Promise<AgentReply>((resolve) => setTimeout(() => resolve({ kind: 'answer', content: 'slow' }), 60))
      }
      return { kind: 'answer', content: 'fast' }
    })

    const outcome = await invokeAgent(
      agent,
      options({ onLateSettle: (details) => lateSettles.push(details.attempt) }),
    )

    expect(outcome).toEqual({ ok: true, reply: { kind: 'answer', content: 'fast' }, attempts: 2 })
    await new Promise((resolve) => setTimeout(resolve, 80))
    expect(lateSettles).toEqual([1])
  })

  it('gives up after the retry limit with an AGENT_TIMEOUT failure', async () => {
    const failedAttempts: Array<[number, boolean]> = []
    const outcome = await invokeAgent(
      worker(() => new Promise<AgentReply>(() => undefined)),
      options({ onAttemptFailed: (details) => failedAttempts.push([details.attempt, details.willRetry]) }),
    )

    expect(outcome).toEqual({
      ok: false,
      failure: { code: 'AGENT_TIMEOUT', reason: 'Agent worker did not respond within 20ms.', attempts: 2 },
    })
    expect(failedAttempts).toEqual([
      [1, true],
      [2, false],
    ])
  })

  it('does not retry ordinary errors', async () => {
    let calls = 0
    const outcome = await invokeAgent(
      worker(() => {
        calls += 1
        throw new Error('bad input')
      }),
      options({ retryLimit: 3 }),
    )

    expect(calls).toBe(1)
    expect(outcome).toEqual({ ok: false, failure: { code: 'AGENT_FAILURE', reason: 'bad input', attempts: 1 } })
  })

  it('aborts the agent signal when the attempt times out', async () => {
    let observedReason: unknown
    await invokeAgent(
      worker(
        (_context, _goal, { signal }) =>
          new Promise<AgentReply>((_resolve, reject) => {
            signal.addEventListener('abort', () => {
              observedReason = signal.reason
              reject(signal.reason)
            })
          }),
      ),
      options({ retryLimit: 0 }),
    )

    expect(observedReason).toBeInstanceOf(Error)
    expect(observedReason).toMatchObject({ name: 'AgentTimeoutError', code: 'AGENT_TIMEOUT' })
  })
})
