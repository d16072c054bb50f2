// Node.js HTTP adapter.
//
// Bridges node:http requests and responses to TwirpService.call, and routes
// each request to the service whose path prefix it falls under.

import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http";
import createDebug from "debug";
import { INVALID_ROUTE_MESSAGE, type TwirpRequest, type TwirpResponse, type TwirpService } from "@twine/core";
import { ContentType, badRouteError, encodeErrorEnvelope } from "@twine/wire";

const log = createDebug("twine:node");

/** The parts of an `IncomingMessage` the adapter reads. */
export interface NodeRequest extends AsyncIterable<Uint8Array> {
  method?: string | undefined;
  url?: string | undefined;
  headers: IncomingHttpHeaders;
}

/** The parts of a `ServerResponse` the adapter writes. */
export interface NodeResponse {
  writeHead(statusCode: number, headers: OutgoingHttpHeaders): unknown;
  end(chunk: Uint8Array): unknown;
  destroy(error?: Error): unknown;
}

/** What the adapter needs from a service. Any TwirpService qualifies. */
export type MountedService = Pick<TwirpService, "pathPrefix" | "serviceFullName" | "call">;

export interface RequestListenerOptions {
  /**
   * Path the services are mounted under, e.g. "/api" for
   * "/api/twirp/example.Haberdasher/MakeHat". Defaults to "" (the root).
   */
  basePath?: string;
}

/** Build a TwirpRequest from a Node request. The body is streamed on demand. */
export function toTwirpRequest(req: NodeRequest): TwirpRequest {
  const url = req.url ?? "/";
  const queryStart = url.indexOf("?");
  return {
    method: req.method ?? "GET",
    path: queryStart < 0 ? url : url.slice(0, queryStart),
    contentType: req.headers["content-type"],
    body: req,
  };
}

/** Write a TwirpResponse to a Node response. */
export function writeTwirpResponse(res: NodeResponse, response: TwirpResponse): void {
  const [body] = response.body;
  res.writeHead(response.status, { ...response.headers, "Content-Length": body.byteLength });
  res.end(body);
}

/**
 * Create a `node:http` request listener serving the given services.
 *
 * @example
 * ```typescript
 * const haberdasher = new TwirpService(Haberdasher, new HaberdasherHandler());
 * http.createServer(createRequestListener([haberdasher])).listen(8080);
 * ```
 *
 * @throws Error if two services share a path prefix
 */
export function createRequestListener(
  services: readonly MountedService[],
  options: RequestListenerOptions = {},
): (req: NodeRequest, res: NodeResponse) => void {
  const basePath = (options.basePath ?? "").replace(/\/+$/, "");
  const byPrefix = new Map<string, MountedService>();
  for (const service of services) {
    if (byPrefix.has(service.pathPrefix)) {
      throw new Error(`Duplicate service: ${service.serviceFullName}`);
    }
    byPrefix.set(service.pathPrefix, service);
  }

  const dispatch = async (request: TwirpRequest): Promise<TwirpResponse> => {
    const path = stripBasePath(basePath, request.path);
    const service = path === undefined ? undefined : byPrefix.get(path.slice(0, path.lastIndexOf("/")));
    if (path === undefined || service === undefined) {
      const error = badRouteError(INVALID_ROUTE_MESSAGE, request.method, request.path);
      return {
        status: error.httpStatus,
        headers: { "Content-Type": ContentType.Json },
        body: [encodeErrorEnvelope(error)],
      };
    }
    return service.call({ ...request, routePath: path });
  };

  return (req, res) => {
    dispatch(toTwirpRequest(req))
      .then((response) => writeTwirpResponse(res, response))
      .catch((e: unknown) => {
        log("failed to answer %s %s: %O", req.method, req.url, e);
        res.destroy(e instanceof Error ? e : undefined);
      });
  };
}

function stripBasePath(basePath: string, path: string): string | undefined {
  if (basePath === "") {
    return path;
  }
  return path.startsWith(`${basePath}/`) ? path.slice(basePath.length) : undefined;
}
