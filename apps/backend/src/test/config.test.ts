import { homedir } from 'node:os'
import { resolve } from 'node:path'
import { describe, expect, it } from 'vitest'
import { createConfig } from '../config.js'

const MANAGED_ENV_KEYS = [
  'NODE_ENV',
  'RACI_ROOT_DIR',
  'RACI_DATA_DIR',
  'RACI_SWARMS_DIR',
  'RACI_HOST',
  'RACI_PORT',
  'RACI_DEBUG',
  'RACI_HOP_CEILING',
  'RACI_AGENT_TIMEOUT_MS',
  'RACI_AGENT_RETRY_LIMIT',
  'RACI_AGENT_RETRY_BACKOFF_MS',
  'RACI_TURN_TIMEOUT_MS',
  'RACI_INACTIVITY_TIMEOUT_MS',
  'RACI_SWEEP_INTERVAL_MS',
  'RACI_MEMORY_BUDGET_TOKENS',
  'RACI_MEMORY_PIN_USER_REQUESTS',
  'RACI_ARCHIVED_CONVERSATION_LIMIT',
] as const

async function withEnv(overrides: Partial<Record<(typeof MANAGED_ENV_KEYS)[number], string>>, run: () => Promise<void> | void) {
  const previous = new Map<string, string | undefined>()

  for (const key of MANAGED_ENV_KEYS) {
    previous.set(key, process.env[key])
    delete process.env[key]
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete process.env[key]
    } else {
      process.env[key] = value
    }
  }

  try {
    await run()
  } finally {
    for (const [key, value] of previous.entries()) {
      if (value === undefined) {
        delete process.env[key]
      } else {
        process.env[key] = value
      }
    }
  }
}

describe('createConfig', () => {
  it('uses fixed defaults when no RACI_* variables are set', async () => {
    await withEnv({ RACI_ROOT_DIR: '/tmp/raci-root' }, () => {
      const config = createConfig()

      expect(config.host).toBe('127.0.0.1')
      expect(config.port).toBe(47300)
      expect(config.debug).toBe(true)
      expect(config.orchestration).toEqual({
        hopCeiling: 10,
        agentTimeoutMs: 30_000,
        agentRetryLimit: 1,
        agentRetryBackoffMs: 500,
        turnTimeoutMs: 300_000,
        inactivityTimeoutMs: 1_800_000,
        sweepIntervalMs: 60_000,
      })
      expect(config.memory).toEqual({
        budgetTokens: 4000,
        pinUserRequests: true,
        archivedConversationLimit: 100,
      })

      expect(config.paths.rootDir).toBe('/tmp/raci-root')
      expect(config.paths.dataDir).toBe(resolve(homedir(), '.raci-swarm-dev'))
      expect(config.paths.archiveDir).toBe(resolve(homedir(), '.raci-swarm-dev', 'conversations'))
      expect(config.paths.swarmsDir).toBe('/tmp/raci-root/swarms')
    })
  })

  it('reads orchestration limits and paths from the environment', async () => {
    await withEnv(
      {
        NODE_ENV: 'production',
        RACI_ROOT_DIR: '/tmp/raci-root',
        RACI_DATA_DIR: 'state',
        RACI_SWARMS_DIR: '/srv/swarms',
        RACI_HOST: '0.0.0.0',
        RACI_PORT: '9999',
        RACI_DEBUG: 'off',
        RACI_HOP_CEILING: '6',
        RACI_AGENT_RETRY_LIMIT: '0',
        RACI_MEMORY_BUDGET_TOKENS: '64',
        RACI_MEMORY_PIN_USER_REQUESTS: 'no',
      },
      () => {
        const config = createConfig()

        expect(config.host).toBe('0.0.0.0')
        expect(config.port).toBe(9999)
        expect(config.debug).toBe(false)
        expect(config.orchestration.hopCeiling).toBe(6)
        expect(config.orchestration.agentRetryLimit).toBe(0)
        expect(config.memory.budgetTokens).toBe(64)
        expect(config.memory.pinUserRequests).toBe(false)
        expect(config.paths.dataDir).toBe('/tmp/raci-root/state')
        expect(config.paths.archiveDir).toBe('/tmp/raci-root/state/conversations')
        expect(config.paths.swarmsDir).toBe('/srv/swarms')
      }
    )
  })

  it('prefers explicit overrides over the environment', async () => {
    await withEnv({ RACI_HOST: '0.0.0.0', RACI_PORT: '9999' }, () => {
      const config = createConfig({ rootDir: '/tmp/other-root', dataDir: '/tmp/raci-data', host: 'localhost', port: 0 })

      expect(config.host).toBe('localhost')
      expect(config.port).toBe(0)
      expect(config.paths.rootDir).toBe('/tmp/other-root')
      expect(config.paths.dataDir).toBe('/tmp/raci-data')
    })
  })

  it('rejects malformed numeric settings', async () => {
    await withEnv({ RACI_HOP_CEILING: 'ten' }, () => {
      expect(() => createConfig()).toThrow('Invalid RACI_HOP_CEILING: expected an integer >= 2, received "ten"')
    })

    await withEnv({ RACI_MEMORY_BUDGET_TOKENS: '4' }, () => {
      expect(() => createConfig()).toThrow('Invalid RACI_MEMORY_BUDGET_TOKENS')
    })
  })
})
