import { UnknownAgentError, UnknownSwarmError } from "../../swarm/errors.js";
import type { SwarmRouter } from "../../swarm/swarm-router.js";
import { decodePathSegment, sendJson } from "../http-utils.js";
import { acceptMethod, type HttpRoute } from "./http-route.js";

const SWARMS_ENDPOINT_PATH = "/api/swarms";
const SWARM_ENDPOINT_PATTERN = /^\/api\/swarms\/([^/]+)$/;
const AGENTS_ENDPOINT_PATH = "/api/agents";
const AGENT_ENDPOINT_PATTERN = /^\/api\/agents\/([^/]+)$/;
const READ_METHODS = "GET, OPTIONS";

export function createRegistryRoutes(options: { router: SwarmRouter }): HttpRoute[] {
  const { router } = options;

  return [
    {
      methods: READ_METHODS,
      matches: (pathname) => pathname === SWARMS_ENDPOINT_PATH,
      handle: async (request, response) => {
        if (!acceptMethod(request, response, READ_METHODS, ["GET"])) {
          return;
        }

        sendJson(response, 200, { swarms: router.describeSwarms() });
      }
    },
    {
      methods: READ_METHODS,
      matches: (pathname) => SWARM_ENDPOINT_PATTERN.test(pathname),
      handle: async (request, response, requestUrl) => {
        if (!acceptMethod(request, response, READ_METHODS, ["GET"])) {
          return;
        }

        const name = resolvePathParam(requestUrl.pathname, SWARM_ENDPOINT_PATTERN, "swarm name");
        const swarm = router.describeSwarm(name);
        if (!swarm) {
          throw new UnknownSwarmError(name);
        }

        sendJson(response, 200, { swarm });
      }
    },
    {
      methods: READ_METHODS,
      matches: (pathname) => pathname === AGENTS_ENDPOINT_PATH,
      handle: async (request, response) => {
        if (!acceptMethod(request, response, READ_METHODS, ["GET"])) {
          return;
        }

        sendJson(response, 200, { agents: router.describeAgents() });
      }
    },
    {
      methods: READ_METHODS,
      matches: (pathname) => AGENT_ENDPOINT_PATTERN.test(pathname),
      handle: async (request, response, requestUrl) => {
        if (!acceptMethod(request, response, READ_METHODS, ["GET"])) {
          return;
        }

        const agentId = resolvePathParam(requestUrl.pathname, AGENT_ENDPOINT_PATTERN, "agent id");
        const agent = router.describeAgent(agentId);
        if (!agent) {
          throw new UnknownAgentError(agentId);
        }

        sendJson(response, 200, { agent });
      }
    }
  ];
}

function resolvePathParam(pathname: string, pattern: RegExp, label: string): string {
  const value = decodePathSegment(pathname.match(pattern)?.[1]);
  if (!value) {
    throw new Error(`Missing ${label}`);
  }
  return value;
}
