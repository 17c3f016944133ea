import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { createConfig, detectRootDir, type ConfigOverrides } from "./config.js";
import type { RaciAgent } from "./swarm/agent.js";
import { FileConversationArchive } from "./swarm/conversation-archive.js";
import { describeError } from "./swarm/errors.js";
import { MemoryManager } from "./swarm/memory-manager.js";
import { Orchestrator } from "./swarm/orchestrator.js";
import { applySwarmDescriptors, loadSwarmDescriptors } from "./swarm/swarm-descriptor-loader.js";
import { SwarmRouter } from "./swarm/swarm-router.js";
import type { SwarmConfig, SwarmDefinition } from "./swarm/types.js";
import { RaciWebSocketServer } from "./ws/server.js";

export interface BootstrapOptions {
  rootDir?: string;
  dataDir?: string;
  swarmsDir?: string;
  envPath?: string | null;
  host?: string;
  port?: number;
  /** In-process agents registered before descriptor files are applied. */
  agents?: RaciAgent[];
  swarms?: SwarmDefinition[];
}

export interface BootstrapResult {
  config: SwarmConfig;
  host: string;
  port: number;
  wsUrl: string;
  httpUrl: string;
  router: SwarmRouter;
  orchestrator: Orchestrator;
  warnings: string[];
  stop: () => Promise<void>;
}

export async function startRaciBackend(options: BootstrapOptions = {}): Promise<BootstrapResult> {
  const resolvedRootDir = options.rootDir ? resolve(options.rootDir) : detectRootDir();
  loadBootstrapDotenv(resolvedRootDir, options.envPath);

  const configOverrides: ConfigOverrides = {
    rootDir: resolvedRootDir,
    dataDir: options.dataDir,
    swarmsDir: options.swarmsDir,
    host: options.host,
    port: options.port,
  };
  const config = createConfig(configOverrides);

  const router = new SwarmRouter();
  const warnings: string[] = [];
  for (const agent of options.agents ?? []) {
    router.registerAgent(agent);
  }

  const applied = applySwarmDescriptors(router, await loadSwarmDescriptors(config.paths.swarmsDir));
  warnings.push(...applied.warnings);

  for (const definition of options.swarms ?? []) {
    router.registerSwarm(definition);
  }

  for (const warning of warnings) {
    console.warn(`[raci] ${warning}`);
  }

  const memory = new MemoryManager({
    budgetTokens: config.memory.budgetTokens,
    pinUserRequests: config.memory.pinUserRequests,
    archivedConversationLimit: config.memory.archivedConversationLimit,
    onCompaction: (event) => {
      if (config.debug) {
        console.log(`[raci][${new Date().toISOString()}] memory:compacted`, event);
      }
    },
  });

  const orchestrator = new Orchestrator({
    router,
    memory,
    settings: config.orchestration,
    archive: new FileConversationArchive(config.paths.archiveDir),
    debug: config.debug,
  });

  let wsServer: RaciWebSocketServer | null = null;
  let boundHost = config.host;
  let boundPort = config.port;
  let stopped = false;

  const stop = async (): Promise<void> => {
    if (stopped) {
      return;
    }

    stopped = true;
    orchestrator.stop();
    const results = await Promise.allSettled([wsServer?.stop() ?? Promise.resolve()]);
    for (const result of results) {
      if (result.status === "rejected") {
        console.error(`[raci] Failed to stop server: ${describeError(result.reason)}`);
      }
    }
  };

  try {
    orchestrator.startInactivitySweep();

    wsServer = new RaciWebSocketServer({
      orchestrator,
      router,
      host: config.host,
      port: config.port,
      debug: config.debug,
    });
    const bound = await wsServer.start();
    boundHost = bound.host;
    boundPort = bound.port;
  } catch (error) {
    await stop();
    throw error;
  }

  return {
    config,
    host: boundHost,
    port: boundPort,
    wsUrl: `ws://${boundHost}:${boundPort}`,
    httpUrl: `http://${boundHost}:${boundPort}`,
    router,
    orchestrator,
    warnings,
    stop,
  };
}

function loadBootstrapDotenv(rootDir: string, envPath: string | null | undefined): void {
  if (envPath === null) {
    return;
  }

  const pathToLoad =
    typeof envPath === "string"
      ? resolve(envPath)
      : resolve(rootDir, ".env");

  if (!existsSync(pathToLoad)) {
    return;
  }

  loadDotenv({ path: pathToLoad, override: false });
}
