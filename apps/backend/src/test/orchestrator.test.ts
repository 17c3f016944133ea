import { mkdtemp, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import type { StateTransitionEvent } from '@raci-swarm/protocol'
import { FunctionAgent, type AgentHandler } from '../swarm/agent.js'
import { FileConversationArchive, InMemoryConversationArchive } from '../swarm/conversation-archive.js'
import { replayEnvelopes } from '../swarm/conversation-state-machine.js'
import { ConversationStateError, UnknownConversationError } from '../swarm/errors.js'
import { MemoryManager } from '../swarm/memory-manager.js'
import {
  DEADLINE_RESPONSE_PREFIX,
  DEGRADED_RESPONSE,
  Orchestrator,
  PARTIAL_RESPONSE_PREFIX,
  type OrchestratorOptions,
} from '../swarm/orchestrator.js'
import { SwarmRouter } from '../swarm/swarm-router.js'
import type { AgentReply, OrchestrationSettings, RaciRole } from '../swarm/types.js'

const SETTINGS: OrchestrationSettings = {
  hopCeiling: 10,
  agentTimeoutMs: 1000,
  agentRetryLimit: 1,
  agentRetryBackoffMs: 0,
  turnTimeoutMs: 60_000,
  inactivityTimeoutMs: 60_000,
  sweepIntervalMs: 60_000,
}

interface AgentSetup {
  id: string
  role: RaciRole
  handler: AgentHandler
}

const delegateToAdmin: AgentHandler = (_context, goal) => ({
  kind: 'delegation',
  target: { kind: 'role', role: 'accountable' },
  goal: `plan: ${goal}`,
})

function createHarness(
  agents: AgentSetup[],
  options: Partial<Omit<OrchestratorOptions, 'router' | 'memory'>> & { budgetTokens?: number } = {},
) {
  const router = new SwarmRouter({ now: () => '2026-01-01T00:00:00.000Z' })
  const calls = new Map<string, number>()

  for (const setup of agents) {
    router.registerAgent(
      new FunctionAgent({
        id: setup.id,
        role: setup.role,
        handler: (context, goal, respondOptions) => {
          calls.set(setup.id, (calls.get(setup.id) ?? 0) + 1)
          return setup.handler(context, goal, respondOptions)
        },
      }),
    )
  }

  router.registerSwarm({
    name: 'quality-rules',
    capabilities: ['rule-inference'],
    memberIds: agents.map((agent) => agent.id),
  })

  const memory = new MemoryManager({ budgetTokens: options.budgetTokens ?? 4000 })
  const archive = options.archive ?? new InMemoryConversationArchive()
  let sequence = 0
  const orchestrator = new Orchestrator({
    router,
    memory,
    archive,
    settings: options.settings ?? SETTINGS,
    now: options.now,
    createConversationId: (userId) => {
      sequence += 1
      return `${userId}_conv-${sequence}`
    },
  })

  const transitions: StateTransitionEvent[] = []
  orchestrator.on('state_transition', (event: StateTransitionEvent) => {
    transitions.push(event)
  })

  return { orchestrator, memory, archive, calls, transitions }
}

function envelopesOf(orchestrator: Orchestrator, conversationId: string) {
  return orchestrator.getConversation(conversationId)?.envelopes ?? []
}

const tempDirs: string[] = []

afterEach(async () => {
  vi.restoreAllMocks()
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })))
})

async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'raci-orchestrator-'))
  tempDirs.push(dir)
  return dir
}

async function waitForCondition(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now()
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('Timed out waiting for condition')
    }
    await new Promise((resolve) => setTimeout(resolve, 5))
  }
}

describe('Orchestrator', () => {
  it('answers an unsupported capability without creating a conversation', async () => {
    const { orchestrator } = createHarness([
      { id: 'init', role: 'responsible', handler: delegateToAdmin },
      { id: 'admin', role: 'accountable', handler: () => ({ kind: 'answer', content: 'done' }) },
    ])

    const response = await orchestrator.handle({ capability: 'translate', userId: 'user-1', text: 'hola' })

    expect(response).toEqual({
      conversationId: null,
      outcome: 'unsupported',
      content: 'No swarm supports capability "translate".',
      state: null,
      sequenceNo: null,
    })
    expect(orchestrator.listConversations()).toEqual([])
  })

  it('routes initializer -> admin -> consulted -> admin -> initializer and hands control back', async () => {
    const { orchestrator, transitions } = createHarness([
      { id: 'init', role: 'responsible', handler: delegateToAdmin },
      {
        id: 'admin',
        role: 'accountable',
        handler: (_context, goal, { envelope }) =>
          envelope.kind === 'delegation'
            ? { kind: 'delegation', target: { kind: 'agent', agentId: 'reader' }, goal: `read files for ${goal}` }
            : { kind: 'answer', content: `rules derived from: ${envelope.content}` },
      },
      { id: 'reader', role: 'consulted', handler: () => ({ kind: 'answer', content: 'three config files' }) },
    ])

    const response = await orchestrator.handle({ capability: 'Rule-Inference', userId: 'user-1', text: 'infer lint rules' })

    expect(response).toEqual({
      conversationId: 'user-1_conv-1',
      outcome: 'completed',
      content: 'rules derived from: three config files',
      state: 'AWAITING_USER',
      sequenceNo: 5,
    })

    const envelopes = envelopesOf(orchestrator, 'user-1_conv-1')
    expect(envelopes.map((envelope) => [envelope.sender_id, envelope.recipient_id, envelope.pending_user_reply])).toEqual([
      ['user-1', 'init', null],
      ['init', 'admin', false],
      ['admin', 'reader', false],
      ['reader', 'admin', false],
      ['admin', 'init', true],
    ])
    expect(envelopes.map((envelope) => envelope.sequence_no)).toEqual([1, 2, 3, 4, 5])
    expect(envelopes[2].goal).toBe('read files for plan: infer lint rules')
    expect(envelopes[4].goal).toBe('infer lint rules')

    expect(transitions.map((event) => [event.from_state, event.to_state, event.sequence_no])).toEqual([
      [null, 'OPEN', 1],
      ['OPEN', 'DELEGATING', 2],
      ['DELEGATING', 'AWAITING_USER', 5],
    ])

    const replayed = replayEnvelopes(
      envelopes.map((envelope) => ({
        conversationId: envelope.conversation_id,
        sequenceNo: envelope.sequence_no,
        pendingUserReply: envelope.pending_user_reply,
      })),
    )
    expect(replayed.state).toBe('AWAITING_USER')
    expect(replayed.transitions.map((transition) => [transition.fromState, transition.toState, transition.sequenceNo])).toEqual(
      transitions.map((event) => [event.from_state, event.to_state, event.sequence_no]),
    )
  })

  it('sends a failure envelope to the admin after a consulted agent times out twice', async () => {
    const { orchestrator, calls } = createHarness(
      [
        { id: 'init', role: 'responsible', handler: delegateToAdmin },
        {
          id: 'admin',
          role: 'accountable',
          handler: (_context, goal, { envelope }) =>
            envelope.kind === 'delegation'
              ? { kind: 'delegation', target: { kind: 'role', role: 'consulted' }, goal }
              : { kind: 'answer', content: 'answered without the file reader' },
        },
        { id: 'reader', role: 'consulted', handler: () => new Promise<AgentReply>(() => undefined) },
      ],
      { settings: { ...SETTINGS, agentTimeoutMs: 20 } },
    )

    const response = await orchestrator.handle({ capability: 'rule-inference', userId: 'user-1', text: 'infer rules' })

    expect(calls.get('reader')).toBe(2)
    expect(response.outcome).toBe('completed')
    expect(response.content).toBe('answered without the file reader')
    expect(response.state).toBe('AWAITING_USER')

    const envelopes = envelopesOf(orchestrator, 'user-1_conv-1')
    expect(envelopes).toHaveLength(5)
    expect(envelopes[3]).toMatchObject({
      sender_id: 'reader',
      recipient_id: 'admin',
      kind: 'failure',
      pending_user_reply: false,
      content: 'Agent reader did not respond within 20ms.',
      failure: { code: 'AGENT_TIMEOUT', reason: 'Agent reader did not respond within 20ms.', attempts: 2 },
    })
    expect(envelopes[4]).toMatchObject({ sender_id: 'admin', recipient_id: 'init', pending_user_reply: true })
  })

  it('forces a fallback terminal envelope at the hop ceiling', async () => {
    let findings = 0
    const { orchestrator } = createHarness([
      { id: 'init', role: 'responsible', handler: delegateToAdmin },
      {
        id: 'admin',
        role: 'accountable',
        handler: (_context, goal) => ({ kind: 'delegation', target: { kind: 'agent', agentId: 'reader' }, goal }),
      },
      {
        id: 'reader',
        role: 'consulted',
        handler: () => {
          findings += 1
          return { kind: 'answer', content: `finding ${findings}` }
        },
      },
    ])

    const response = await orchestrator.handle({ capability: 'rule-inference', userId: 'user-1', text: 'loop forever' })

    expect(response).toEqual({
      conversationId: 'user-1_conv-1',
      outcome: 'partial',
      content: `${PARTIAL_RESPONSE_PREFIX} Progress so far: reader: finding 2 | reader: finding 3 | reader: finding 4`,
      state: 'AWAITING_USER',
      sequenceNo: 11,
    })

    const envelopes = envelopesOf(orchestrator, 'user-1_conv-1')
    const last = envelopes[envelopes.length - 1]
    expect(last).toMatchObject({
      hop: 10,
      kind: 'fallback',
      sender_id: 'orchestrator',
      recipient_id: 'init',
      pending_user_reply: true,
      failure: { code: 'DELEGATION_DEPTH_EXCEEDED', reason: 'hop ceiling of 10 reached' },
    })
    expect(envelopes.filter((envelope) => envelope.pending_user_reply === true)).toHaveLength(1)
    expect(envelopes.filter((envelope) => envelope.pending_user_reply === false)).toHaveLength(9)
  })

  it('ends the turn with a partial response once the turn deadline passes', async () => {
    let clock = 0
    const { orchestrator } = createHarness(
      [
        { id: 'init', role: 'responsible', handler: delegateToAdmin },
        {
          id: 'admin',
          role: 'accountable',
          handler: (_context, goal) => ({ kind: 'delegation', target: { kind: 'agent', agentId: 'reader' }, goal }),
        },
        {
          id: 'reader',
          role: 'consulted',
          handler: () => {
            clock += 1000
            return { kind: 'answer', content: 'finding 1' }
          },
        },
      ],
      { now: () => clock, settings: { ...SETTINGS, turnTimeoutMs: 1000 } },
    )

    const response = await orchestrator.handle({ capability: 'rule-inference', userId: 'user-1', text: 'slow rules' })

    expect(response).toEqual({
      conversationId: 'user-1_conv-1',
      outcome: 'partial',
      content: `${DEADLINE_RESPONSE_PREFIX} Progress so far: reader: finding 1`,
      state: 'AWAITING_USER',
      sequenceNo: 5,
    })

    const envelopes = envelopesOf(orchestrator, 'user-1_conv-1')
    expect(envelopes.map((envelope) => [envelope.sender_id, envelope.recipient_id, envelope.kind])).toEqual([
      ['user-1', 'init', 'user_request'],
      ['init', 'admin', 'delegation'],
      ['admin', 'reader', 'delegation'],
      ['reader', 'admin', 'answer'],
      ['orchestrator', 'init', 'fallback'],
    ])
    expect(envelopes[4]).toMatchObject({
      hop: 4,
      pending_user_reply: true,
      failure: { code: 'DELEGATION_DEPTH_EXCEEDED', reason: 'turn deadline of 1000ms passed' },
    })
  })

  it('fans a role delegation out to every member and resumes the delegator once', async () => {
    const { orchestrator, calls } = createHarness([
      { id: 'init', role: 'responsible', handler: delegateToAdmin },
      {
        id: 'admin',
        role: 'accountable',
        handler: (context, goal, { envelope }) =>
          envelope.kind === 'delegation'
            ? { kind: 'delegation', target: { kind: 'role', role: 'consulted' }, goal }
            : {
                kind: 'answer',
                content: context.fragments
                  .filter((fragment) => fragment.senderRole === 'consulted')
                  .map((fragment) => fragment.content)
                  .join(' + '),
              },
      },
      { id: 'reader', role: 'consulted', handler: () => ({ kind: 'answer', content: 'files read' }) },
      { id: 'coder', role: 'consulted', handler: () => ({ kind: 'answer', content: 'code drafted' }) },
    ])

    const response = await orchestrator.handle({ capability: 'rule-inference', userId: 'user-1', text: 'draft rules' })

    expect(response.content).toBe('files read + code drafted')
    expect(calls.get('admin')).toBe(2)
    expect(
      envelopesOf(orchestrator, 'user-1_conv-1').map((envelope) => `${envelope.sender_id}>${envelope.recipient_id}:${envelope.kind}`),
    ).toEqual([
      'user-1>init:user_request',
      'init>admin:delegation',
      'admin>reader:delegation',
      'reader>admin:answer',
      'admin>coder:delegation',
      'coder>admin:answer',
      'admin>init:answer',
    ])
  })

  it('turns a role violation by the initializer into a degraded terminal envelope', async () => {
    const { orchestrator, calls } = createHarness([
      {
        id: 'init',
        role: 'responsible',
        handler: (_context, goal) => ({ kind: 'delegation', target: { kind: 'agent', agentId: 'reader' }, goal }),
      },
      { id: 'admin', role: 'accountable', handler: () => ({ kind: 'answer', content: 'unused' }) },
      { id: 'reader', role: 'consulted', handler: () => ({ kind: 'answer', content: 'unused' }) },
    ])

    const response = await orchestrator.handle({ capability: 'rule-inference', userId: 'user-1', text: 'skip the admin' })

    expect(response.outcome).toBe('degraded')
    expect(response.content).toBe(DEGRADED_RESPONSE)
    expect(calls.get('reader')).toBeUndefined()
    expect(envelopesOf(orchestrator, 'user-1_conv-1')[1]).toMatchObject({
      sender_id: 'init',
      recipient_id: 'init',
      kind: 'failure',
      pending_user_reply: true,
      failure: { code: 'ROLE_VIOLATION', reason: 'responsible agent init may not delegate to a consulted agent' },
    })
  })

  it('reports a consulted agent error to the admin without retrying', async () => {
    const { orchestrator, calls } = createHarness([
      { id: 'init', role: 'responsible', handler: delegateToAdmin },
      {
        id: 'admin',
        role: 'accountable',
        handler: (_context, goal, { envelope }) =>
          envelope.kind === 'delegation'
            ? { kind: 'delegation', target: { kind: 'agent', agentId: 'reader' }, goal }
            : { kind: 'answer', content: `recovered from ${envelope.failure?.code ?? 'nothing'}` },
      },
      {
        id: 'reader',
        role: 'consulted',
        handler: () => {
          throw new Error('disk unavailable')
        },
      },
    ])

    const response = await orchestrator.handle({ capability: 'rule-inference', userId: 'user-1', text: 'read' })

    expect(calls.get('reader')).toBe(1)
    expect(response.content).toBe('recovered from AGENT_FAILURE')
  })

  it('keeps the conversation id across turns and rejects replies mid-turn', async () => {
    const { orchestrator } = createHarness([
      { id: 'init', role: 'responsible', handler: (_context, goal) => ({ kind: 'answer', content: `echo: ${goal}` }) },
      { id: 'admin', role: 'accountable', handler: () => ({ kind: 'answer', content: 'unused' }) },
    ])

    const first = orchestrator.submitRequest('rule-inference', 'user-1', 'first question')
    expect(first).toEqual({ status: 'accepted', conversationId: 'user-1_conv-1', swarmName: 'quality-rules' })
    expect(() => orchestrator.reply('user-1_conv-1', 'user-1', 'too early')).toThrow(ConversationStateError)

    expect(await orchestrator.waitForTurn('user-1_conv-1')).toMatchObject({ content: 'echo: first question', sequenceNo: 2 })
    expect(() => orchestrator.reply('user-1_conv-1', 'user-2', 'not mine')).toThrow(
      'Conversation user-1_conv-1 belongs to another user',
    )

    const second = await orchestrator.handleReply('user-1_conv-1', 'user-1', 'follow up')
    expect(second).toMatchObject({ conversationId: 'user-1_conv-1', content: 'echo: follow up', sequenceNo: 4 })

    const envelopes = envelopesOf(orchestrator, 'user-1_conv-1')
    expect(envelopes.map((envelope) => [envelope.turn, envelope.pending_user_reply])).toEqual([
      [1, null],
      [1, true],
      [2, null],
      [2, true],
    ])
    expect(orchestrator.getConversation('user-1_conv-1')?.turn).toBe(2)
    expect(() => orchestrator.reply('missing', 'user-1', 'hello')).toThrow(UnknownConversationError)
  })

  it('archives a response that arrives after the conversation closed without routing it', async () => {
    const gate: { release: (() => void) | null } = { release: null }
    const { orchestrator, memory, archive, calls } = createHarness([
      { id: 'init', role: 'responsible', handler: delegateToAdmin },
      {
        id: 'admin',
        role: 'accountable',
        handler: (_context, goal) => ({ kind: 'delegation', target: { kind: 'agent', agentId: 'reader' }, goal }),
      },
      {
        id: 'reader',
        role: 'consulted',
        handler: () =>
          new Promise<AgentReply>((resolve) => {
            gate.release = () => resolve({ kind: 'answer', content: 'late result' })
          }),
      },
    ])

    orchestrator.submitRequest('rule-inference', 'user-1', 'slow work')
    await waitForCondition(() => gate.release !== null)

    await orchestrator.close('user-1_conv-1', 'closed_by_user')
    expect(orchestrator.getConversation('user-1_conv-1')?.state).toBe('CLOSED')

    gate.release?.()
    const response = await orchestrator.waitForTurn('user-1_conv-1')

    expect(response.outcome).toBe('closed')
    expect(calls.get('admin')).toBe(1)

    const envelopes = envelopesOf(orchestrator, 'user-1_conv-1')
    expect(envelopes[envelopes.length - 1]).toMatchObject({
      sequence_no: 4,
      sender_id: 'reader',
      recipient_id: 'admin',
      content: 'late result',
      pending_user_reply: false,
    })
    expect(orchestrator.getConversation('user-1_conv-1')?.state).toBe('CLOSED')

    const archived = await archive.load('user-1_conv-1')
    expect(archived?.closedReason).toBe('closed_by_user')
    expect(archived?.closedAfterSequenceNo).toBe(3)
    expect(archived?.envelopes.map((envelope) => envelope.sequence_no)).toEqual([1, 2, 3, 4])
    expect(memory.snapshot('user-1_conv-1')).toMatchObject({ archived: true })
    expect(memory.snapshot('user-1_conv-1')?.fragments.map((fragment) => fragment.sequenceNo)).toEqual([1, 2, 3, 4])
  })

  it('writes the late envelope to the archive file when it lands during the close', async () => {
    const dir = await createTempDir()
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const gate = { started: false }
    const { orchestrator } = createHarness(
      [
        { id: 'init', role: 'responsible', handler: delegateToAdmin },
        {
          id: 'admin',
          role: 'accountable',
          handler: (_context, goal) => ({ kind: 'delegation', target: { kind: 'agent', agentId: 'reader' }, goal }),
        },
        {
          id: 'reader',
          role: 'consulted',
          handler: (_context, _goal, { signal }) =>
            new Promise<AgentReply>((resolve) => {
              gate.started = true
              signal.addEventListener('abort', () => resolve({ kind: 'answer', content: 'late result' }))
            }),
        },
      ],
      { archive: new FileConversationArchive(dir) },
    )

    orchestrator.submitRequest('rule-inference', 'user-1', 'slow work')
    await waitForCondition(() => gate.started)

    await orchestrator.close('user-1_conv-1')
    expect((await orchestrator.waitForTurn('user-1_conv-1')).outcome).toBe('closed')

    expect(errors).not.toHaveBeenCalled()
    expect(await readdir(dir)).toEqual(['user-1_conv-1.json'])

    const archived = await new FileConversationArchive(dir).load('user-1_conv-1')
    expect(archived?.closedAfterSequenceNo).toBe(3)
    expect(archived?.envelopes.map((envelope) => envelope.sequence_no)).toEqual([1, 2, 3, 4])
    expect(archived?.envelopes[3]).toMatchObject({ sender_id: 'reader', content: 'late result', pending_user_reply: false })
  })

  it('evicts a closed conversation once its last turn settles', async () => {
    const gate: { release: (() => void) | null } = { release: null }
    const { orchestrator, memory } = createHarness(
      [
        { id: 'init', role: 'responsible', handler: delegateToAdmin },
        {
          id: 'admin',
          role: 'accountable',
          handler: (_context, goal, { envelope }) =>
            goal.includes('slow') && envelope.kind === 'delegation'
              ? { kind: 'delegation', target: { kind: 'agent', agentId: 'reader' }, goal }
              : { kind: 'answer', content: 'done' },
        },
        {
          id: 'reader',
          role: 'consulted',
          handler: () =>
            new Promise<AgentReply>((resolve) => {
              gate.release = () => resolve({ kind: 'answer', content: 'late result' })
            }),
        },
      ],
      { closedConversationLimit: 1 },
    )

    orchestrator.submitRequest('rule-inference', 'user-1', 'slow work')
    await waitForCondition(() => gate.release !== null)
    await orchestrator.close('user-1_conv-1')

    await orchestrator.handle({ capability: 'rule-inference', userId: 'user-1', text: 'quick' })
    await orchestrator.close('user-1_conv-2')
    expect(orchestrator.getConversation('user-1_conv-1')?.state).toBe('CLOSED')
    expect(orchestrator.getConversation('user-1_conv-2')).toBeUndefined()

    gate.release?.()
    await orchestrator.waitForTurn('user-1_conv-1')

    await orchestrator.handle({ capability: 'rule-inference', userId: 'user-1', text: 'quick again' })
    await orchestrator.close('user-1_conv-3')
    expect(orchestrator.getConversation('user-1_conv-1')).toBeUndefined()
    expect(memory.snapshot('user-1_conv-1')).toBeUndefined()
    expect(orchestrator.listConversations().map((conversation) => conversation.conversationId)).toEqual(['user-1_conv-3'])
  })

  it('closes conversations left awaiting the user past the inactivity timeout', async () => {
    let clock = 1_000_000
    const { orchestrator, archive } = createHarness(
      [
        { id: 'init', role: 'responsible', handler: () => ({ kind: 'answer', content: 'ready' }) },
        { id: 'admin', role: 'accountable', handler: () => ({ kind: 'answer', content: 'unused' }) },
      ],
      { now: () => clock },
    )
    const closedReasons: string[] = []
    orchestrator.on('conversation_closed', (event: { reason: string }) => {
      closedReasons.push(event.reason)
    })

    await orchestrator.handle({ capability: 'rule-inference', userId: 'user-1', text: 'hello' })

    clock += 59_999
    expect(await orchestrator.sweepInactiveConversations()).toEqual([])

    clock += 1
    expect(await orchestrator.sweepInactiveConversations()).toEqual(['user-1_conv-1'])
    expect(orchestrator.getConversation('user-1_conv-1')?.state).toBe('CLOSED')
    expect(closedReasons).toEqual(['inactivity_timeout'])
    expect((await archive.load('user-1_conv-1'))?.state).toBe('CLOSED')
    await expect(orchestrator.handleReply('user-1_conv-1', 'user-1', 'too late')).rejects.toThrow(ConversationStateError)
  })
})
