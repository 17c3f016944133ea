import type { Orchestrator } from "../../swarm/orchestrator.js";
import type { SwarmRouter } from "../../swarm/swarm-router.js";
import { sendJson } from "../http-utils.js";
import { acceptMethod, type HttpRoute } from "./http-route.js";

const HEALTH_ENDPOINT_PATH = "/api/health";
const READ_METHODS = "GET, OPTIONS";

export function createHealthRoutes(options: { router: SwarmRouter; orchestrator: Orchestrator }): HttpRoute[] {
  const { router, orchestrator } = options;

  return [
    {
      methods: READ_METHODS,
      matches: (pathname) => pathname === HEALTH_ENDPOINT_PATH,
      handle: async (request, response) => {
        if (!acceptMethod(request, response, READ_METHODS, ["GET"])) {
          return;
        }

        const conversations = orchestrator.listConversations();
        sendJson(response, 200, {
          ok: true,
          swarms: router.listSwarms().length,
          agents: router.listAgents().length,
          openConversations: conversations.filter((conversation) => conversation.state !== "CLOSED").length
        });
      }
    }
  ];
}
