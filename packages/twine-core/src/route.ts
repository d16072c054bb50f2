// Twirp routing: POST /twirp/(package.)?Service/Method
//
// Checks run in a fixed order and the first failure wins: path format,
// HTTP method, Content-Type, then the RPC name.

import { badRouteError, type TwirpError } from "@twine/wire";
import { codecForContentType, type Codec } from "./codec.ts";
import type { TwirpRequest } from "./request.ts";

export const INVALID_ROUTE_MESSAGE = "Invalid route. Expected format: POST {BaseURL}/twirp/(package.)?{Service}/{Method}";

export type RouteResult =
  | { ok: true; rpcName: string; codec: Codec }
  | { ok: false; error: TwirpError };

/**
 * Extract the RPC name from a path under a service's path prefix.
 *
 * @returns the RPC name, or undefined if the path does not have the form
 * `{pathPrefix}/{Method}`
 */
export function parseRoute(pathPrefix: string, path: string): string | undefined {
  if (!path.startsWith(`${pathPrefix}/`)) {
    return undefined;
  }
  const rpcName = path.slice(pathPrefix.length + 1);
  if (rpcName === "" || rpcName.includes("/")) {
    return undefined;
  }
  return rpcName;
}

/**
 * Route a request to an RPC of the service at `pathPrefix`.
 *
 * @param hasRpc - whether the service has an RPC with this exact name
 */
export function routeRequest(
  pathPrefix: string,
  request: Pick<TwirpRequest, "method" | "path" | "routePath" | "contentType">,
  hasRpc: (rpcName: string) => boolean,
): RouteResult {
  const fail = (msg: string): RouteResult => ({ ok: false, error: badRouteError(msg, request.method, request.path) });

  const rpcName = parseRoute(pathPrefix, request.routePath ?? request.path);
  if (rpcName === undefined) {
    return fail(INVALID_ROUTE_MESSAGE);
  }

  if (request.method !== "POST") {
    return fail("HTTP request method must be POST");
  }

  const codec = codecForContentType(request.contentType);
  if (codec === undefined) {
    return fail(
      `unexpected Content-Type: "${request.contentType ?? ""}". ` +
        `Content-Type header must be one of "application/json" or "application/protobuf"`,
    );
  }

  if (!hasRpc(rpcName)) {
    return fail(`rpc method not found: "${rpcName}"`);
  }

  return { ok: true, rpcName, codec };
}
