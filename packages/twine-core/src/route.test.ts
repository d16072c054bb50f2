// Tests for Twirp routing

import { describe, it, expect } from "vitest";
import { INVALID_ROUTE_MESSAGE, parseRoute, routeRequest } from "./route.ts";
import { jsonCodec, protobufCodec } from "./codec.ts";

const PREFIX = "/twirp/example.Haberdasher";
const hasMakeHat = (name: string) => name === "MakeHat";

describe("parseRoute", () => {
  it("extracts the rpc name", () => {
    expect(parseRoute(PREFIX, "/twirp/example.Haberdasher/MakeHat")).toBe("MakeHat");
  });

  it("rejects paths outside the prefix", () => {
    expect(parseRoute(PREFIX, "/wrongpath")).toBeUndefined();
    expect(parseRoute(PREFIX, "/twirp/example.Haberdasher")).toBeUndefined();
    expect(parseRoute(PREFIX, "/twirp/example.HaberdasherX/MakeHat")).toBeUndefined();
    expect(parseRoute(PREFIX, "/twirp/other.Haberdasher/MakeHat")).toBeUndefined();
  });

  it("rejects an empty or nested rpc name", () => {
    expect(parseRoute(PREFIX, "/twirp/example.Haberdasher/")).toBeUndefined();
    expect(parseRoute(PREFIX, "/twirp/example.Haberdasher/MakeHat/extra")).toBeUndefined();
  });
});

describe("routeRequest", () => {
  it("selects the codec from the Content-Type", () => {
    const json = routeRequest(PREFIX, { method: "POST", path: `${PREFIX}/MakeHat`, contentType: "application/json" }, hasMakeHat);
    expect(json).toEqual({ ok: true, rpcName: "MakeHat", codec: jsonCodec });

    const proto = routeRequest(
      PREFIX,
      { method: "POST", path: `${PREFIX}/MakeHat`, contentType: "application/protobuf" },
      hasMakeHat,
    );
    expect(proto).toEqual({ ok: true, rpcName: "MakeHat", codec: protobufCodec });
  });

  it("checks the path before anything else", () => {
    const result = routeRequest(PREFIX, { method: "GET", path: "/wrongpath", contentType: "text/plain" }, hasMakeHat);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("bad_route");
      expect(result.error.msg).toBe(INVALID_ROUTE_MESSAGE);
      expect(result.error.meta).toEqual({ twirp_invalid_route: "GET /wrongpath" });
    }
  });

  it("checks the method before the Content-Type", () => {
    const result = routeRequest(PREFIX, { method: "GET", path: `${PREFIX}/MakeHat`, contentType: "text/plain" }, hasMakeHat);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.msg).toBe("HTTP request method must be POST");
      expect(result.error.meta).toEqual({ twirp_invalid_route: "GET /twirp/example.Haberdasher/MakeHat" });
    }
  });

  it("checks the Content-Type before the rpc name", () => {
    const result = routeRequest(PREFIX, { method: "POST", path: `${PREFIX}/MakeUnicorns` }, hasMakeHat);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.msg).toBe(
        'unexpected Content-Type: "". Content-Type header must be one of "application/json" or "application/protobuf"',
      );
    }
  });

  it("matches the Content-Type exactly", () => {
    const result = routeRequest(
      PREFIX,
      { method: "POST", path: `${PREFIX}/MakeHat`, contentType: "application/json; charset=utf-8" },
      hasMakeHat,
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.msg).toBe(
        'unexpected Content-Type: "application/json; charset=utf-8". Content-Type header must be one of "application/json" or "application/protobuf"',
      );
    }
  });

  it("routes on routePath and reports the request path", () => {
    const routed = routeRequest(
      PREFIX,
      { method: "POST", path: `/api${PREFIX}/MakeHat`, routePath: `${PREFIX}/MakeHat`, contentType: "application/json" },
      hasMakeHat,
    );
    expect(routed).toEqual({ ok: true, rpcName: "MakeHat", codec: jsonCodec });

    const result = routeRequest(
      PREFIX,
      { method: "POST", path: `/api${PREFIX}/Nope`, routePath: `${PREFIX}/Nope`, contentType: "application/json" },
      hasMakeHat,
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.meta).toEqual({ twirp_invalid_route: "POST /api/twirp/example.Haberdasher/Nope" });
    }
  });

  it("reports unknown rpc names", () => {
    const result = routeRequest(
      PREFIX,
      { method: "POST", path: `${PREFIX}/makeHat`, contentType: "application/json" },
      hasMakeHat,
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.msg).toBe('rpc method not found: "makeHat"');
      expect(result.error.httpStatus).toBe(404);
    }
  });
});
