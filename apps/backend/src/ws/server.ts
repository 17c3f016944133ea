import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from "node:http";
import type { OrchestratorEvent } from "@raci-swarm/protocol";
import { WebSocketServer } from "ws";
import type { Orchestrator } from "../swarm/orchestrator.js";
import type { SwarmRouter } from "../swarm/swarm-router.js";
import { resolveRequestUrl, sendError } from "./http-utils.js";
import { createConversationRoutes } from "./routes/conversation-routes.js";
import { createHealthRoutes } from "./routes/health-routes.js";
import type { HttpRoute } from "./routes/http-route.js";
import { createRegistryRoutes } from "./routes/registry-routes.js";
import { WsHandler } from "./ws-handler.js";

const ORCHESTRATOR_EVENT_TYPES = ["state_transition", "envelope", "turn_completed", "conversation_closed"] as const;

export interface ListeningAddress {
  host: string;
  port: number;
}

export class RaciWebSocketServer {
  private readonly orchestrator: Orchestrator;
  private readonly host: string;
  private readonly port: number;
  private readonly routes: HttpRoute[];
  private readonly wsHandler: WsHandler;

  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;

  private readonly onOrchestratorEvent = (event: OrchestratorEvent): void => {
    this.wsHandler.broadcastToSubscribed(event);
  };

  constructor(options: {
    orchestrator: Orchestrator;
    router: SwarmRouter;
    host: string;
    port: number;
    debug?: boolean;
  }) {
    this.orchestrator = options.orchestrator;
    this.host = options.host;
    this.port = options.port;
    this.routes = [
      ...createHealthRoutes({ router: options.router, orchestrator: options.orchestrator }),
      ...createRegistryRoutes({ router: options.router }),
      ...createConversationRoutes({ orchestrator: options.orchestrator })
    ];
    this.wsHandler = new WsHandler({ orchestrator: options.orchestrator, debug: options.debug ?? false });
  }

  /** Resolves with the bound address; port 0 picks a free port. */
  async start(): Promise<ListeningAddress> {
    if (this.httpServer) {
      return this.resolveAddress(this.httpServer);
    }

    const httpServer = createServer((request, response) => {
      void this.handleHttpRequest(request, response);
    });
    const wss = new WebSocketServer({
      server: httpServer
    });

    this.httpServer = httpServer;
    this.wss = wss;
    this.wsHandler.attach(wss);

    await new Promise<void>((resolve, reject) => {
      const onListening = (): void => {
        cleanup();
        resolve();
      };

      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };

      const cleanup = (): void => {
        httpServer.off("listening", onListening);
        httpServer.off("error", onError);
      };

      httpServer.on("listening", onListening);
      httpServer.on("error", onError);
      httpServer.listen(this.port, this.host);
    });

    for (const eventType of ORCHESTRATOR_EVENT_TYPES) {
      this.orchestrator.on(eventType, this.onOrchestratorEvent);
    }

    return this.resolveAddress(httpServer);
  }

  async stop(): Promise<void> {
    for (const eventType of ORCHESTRATOR_EVENT_TYPES) {
      this.orchestrator.off(eventType, this.onOrchestratorEvent);
    }

    const currentWss = this.wss;
    const currentHttpServer = this.httpServer;

    this.wss = null;
    this.httpServer = null;
    this.wsHandler.reset();

    if (currentWss) {
      for (const client of currentWss.clients) {
        client.terminate();
      }
      await closeWebSocketServer(currentWss);
    }

    if (currentHttpServer) {
      currentHttpServer.closeAllConnections();
      await closeHttpServer(currentHttpServer);
    }
  }

  private async handleHttpRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const requestUrl = resolveRequestUrl(request, `${this.host}:${this.port}`);
    const route = this.routes.find((candidate) => candidate.matches(requestUrl.pathname));

    if (!route) {
      response.statusCode = 404;
      response.end("Not Found");
      return;
    }

    try {
      await route.handle(request, response, requestUrl);
    } catch (error) {
      if (response.writableEnded || response.headersSent) {
        return;
      }

      sendError(response, error);
    }
  }

  private resolveAddress(server: HttpServer): ListeningAddress {
    const address = server.address();
    if (!address || typeof address === "string") {
      return { host: this.host, port: this.port };
    }

    return { host: this.host, port: address.port };
  }
}

async function closeWebSocketServer(server: WebSocketServer): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}

async function closeHttpServer(server: HttpServer): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}
