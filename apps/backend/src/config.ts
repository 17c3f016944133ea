import { homedir } from "node:os";
import { dirname, isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { SwarmConfig } from "./swarm/types.js";

export interface ConfigOverrides {
  rootDir?: string;
  dataDir?: string;
  swarmsDir?: string;
  host?: string;
  port?: number;
}

const DEFAULT_PORT = 47300;
const MIN_MEMORY_BUDGET_TOKENS = 8;

export function detectRootDir(): string {
  const fromEnv = process.env.RACI_ROOT_DIR?.trim();
  if (fromEnv) {
    return resolve(fromEnv);
  }

  return resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "..");
}

export function createConfig(overrides: ConfigOverrides = {}): SwarmConfig {
  const rootDir = overrides.rootDir ? resolve(overrides.rootDir) : detectRootDir();

  const nodeEnv = process.env.NODE_ENV?.trim().toLowerCase();
  const defaultDataDir = resolve(homedir(), nodeEnv === "production" ? ".raci-swarm" : ".raci-swarm-dev");
  const dataDirEnv = process.env.RACI_DATA_DIR?.trim();
  const dataDir = overrides.dataDir
    ? resolvePathLike(rootDir, overrides.dataDir)
    : dataDirEnv
      ? resolvePathLike(rootDir, dataDirEnv)
      : defaultDataDir;

  const swarmsDirEnv = process.env.RACI_SWARMS_DIR?.trim();
  const swarmsDir = overrides.swarmsDir
    ? resolvePathLike(rootDir, overrides.swarmsDir)
    : resolvePathLike(rootDir, swarmsDirEnv || "swarms");

  const budgetTokens = parseIntegerEnv("RACI_MEMORY_BUDGET_TOKENS", 4000, MIN_MEMORY_BUDGET_TOKENS);

  return {
    host: overrides.host ?? (process.env.RACI_HOST?.trim() || "127.0.0.1"),
    port: overrides.port ?? parseIntegerEnv("RACI_PORT", DEFAULT_PORT, 0),
    debug: parseBooleanEnv("RACI_DEBUG", true),
    orchestration: {
      hopCeiling: parseIntegerEnv("RACI_HOP_CEILING", 10, 2),
      agentTimeoutMs: parseIntegerEnv("RACI_AGENT_TIMEOUT_MS", 30_000, 1),
      agentRetryLimit: parseIntegerEnv("RACI_AGENT_RETRY_LIMIT", 1, 0),
      agentRetryBackoffMs: parseIntegerEnv("RACI_AGENT_RETRY_BACKOFF_MS", 500, 0),
      turnTimeoutMs: parseIntegerEnv("RACI_TURN_TIMEOUT_MS", 300_000, 1),
      inactivityTimeoutMs: parseIntegerEnv("RACI_INACTIVITY_TIMEOUT_MS", 30 * 60_000, 1),
      sweepIntervalMs: parseIntegerEnv("RACI_SWEEP_INTERVAL_MS", 60_000, 1)
    },
    memory: {
      budgetTokens,
      pinUserRequests: parseBooleanEnv("RACI_MEMORY_PIN_USER_REQUESTS", true),
      archivedConversationLimit: parseIntegerEnv("RACI_ARCHIVED_CONVERSATION_LIMIT", 100, 1)
    },
    paths: {
      rootDir,
      dataDir,
      swarmsDir,
      archiveDir: resolve(dataDir, "conversations")
    }
  };
}

function parseBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }

  return !["0", "false", "off", "no"].includes(raw);
}

function parseIntegerEnv(name: string, fallback: number, min: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== raw || parsed < min) {
    throw new Error(`Invalid ${name}: expected an integer >= ${min}, received "${raw}"`);
  }

  return parsed;
}

function resolvePathLike(rootDir: string, rawPath: string): string {
  if (rawPath === "~") {
    return homedir();
  }

  if (rawPath.startsWith("~/")) {
    return resolve(homedir(), rawPath.slice(2));
  }

  if (isAbsolute(rawPath)) {
    return resolve(rawPath);
  }

  return resolve(rootDir, rawPath);
}
