import { startRaciBackend } from "./bootstrap.js";
import { createConfig } from "./config.js";

async function main(): Promise<void> {
  const backend = await startRaciBackend();

  console.log(
    `RACI swarm backend listening on ${backend.httpUrl} (${backend.router.listSwarms().length} swarms, ` +
      `${backend.router.listAgents().length} agents)`
  );

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`Received ${signal}. Shutting down...`);
    await backend.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

void main().catch((error: unknown) => {
  if (error && typeof error === "object" && "code" in error && error.code === "EADDRINUSE") {
    const config = createConfig();
    console.error(
      `Failed to start backend: http://${config.host}:${config.port} is already in use. ` +
        `Stop the other process or run with RACI_PORT=<port>.`
    );
  } else {
    console.error(error);
  }
  process.exit(1);
});
