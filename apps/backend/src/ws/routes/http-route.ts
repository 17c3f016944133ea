import type { IncomingMessage, ServerResponse } from "node:http";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { applyCorsHeaders, sendJson } from "../http-utils.js";

export interface HttpRoute {
  /** Methods advertised on preflight and `Allow` headers. */
  readonly methods: string;
  matches: (pathname: string) => boolean;
  handle: (request: IncomingMessage, response: ServerResponse, requestUrl: URL) => Promise<void>;
}

/**
 * Applies CORS headers and answers preflight and unsupported methods.
 * Returns false when the request was fully handled.
 */
export function acceptMethod(
  request: IncomingMessage,
  response: ServerResponse,
  methods: string,
  allowed: readonly string[]
): boolean {
  applyCorsHeaders(request, response, methods);

  if (request.method === "OPTIONS") {
    response.statusCode = 204;
    response.end();
    return false;
  }

  if (!request.method || !allowed.includes(request.method)) {
    response.setHeader("Allow", methods);
    sendJson(response, 405, { error: "Method Not Allowed" });
    return false;
  }

  return true;
}

export function parseBody<T extends TSchema>(schema: T, body: unknown, label: string): Static<T> {
  if (Value.Check(schema, body)) {
    return body;
  }

  const firstError = Value.Errors(schema, body).First();
  const detail = firstError ? `${firstError.path || "/"} ${firstError.message}` : "unexpected shape";
  throw new Error(`Invalid ${label} body: ${detail}`);
}
