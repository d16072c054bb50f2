// Twirp service: dispatches HTTP requests to a handler.
//
// A TwirpService binds a ServiceDescriptor to one handler. It keeps no
// per-call state, so one instance can serve any number of concurrent calls.

import createDebug from "debug";
import { ContentType, TwirpError, badRouteError, encodeErrorEnvelope } from "@twine/wire";
import type { Codec } from "./codec.ts";
import type { RequestOf, RpcEntry, RpcMap, ServiceDescriptor, ServiceHandler } from "./descriptor.ts";
import { bindHandler, type BoundMethod } from "./handler.ts";
import { RequestContext, type ServiceHooks } from "./hooks.ts";
import { defaultServiceOptions, type ServiceOptions } from "./options.ts";
import { readBody, type TwirpRequest, type TwirpResponse } from "./request.ts";
import { routeRequest } from "./route.ts";

const log = createDebug("twine:service");

/** Message sent for unexpected failures unless internal errors are exposed. */
export const INTERNAL_ERROR_MESSAGE = "Internal server error";

/** Outcome of an RPC call. */
export type RpcOutcome =
  | { ok: true; value: unknown }
  | { ok: false; error: TwirpError };

/** How a handler call ended. */
type HandlerOutcome =
  | { kind: "success"; value: unknown }
  | { kind: "twirp-error"; error: TwirpError }
  | { kind: "unexpected"; cause: unknown };

/** Handler accepted for a descriptor; services without RPCs need none. */
export type HandlerArg<R extends RpcMap> = [keyof R] extends [never]
  ? ServiceHandler<R> | null | undefined
  : ServiceHandler<R>;

/**
 * A service instance: a descriptor bound to a handler.
 *
 * @example
 * ```typescript
 * const service = new TwirpService(Haberdasher, new HaberdasherHandler());
 * const response = await service.call({
 *   method: "POST",
 *   path: "/twirp/example.Haberdasher/MakeHat",
 *   contentType: "application/json",
 *   body: new TextEncoder().encode('{"inches": 10}'),
 * });
 * ```
 */
export class TwirpService<R extends RpcMap = RpcMap> {
  readonly descriptor: ServiceDescriptor<R>;
  private readonly handler: HandlerArg<R>;
  private readonly methods: ReadonlyMap<string, BoundMethod>;
  private readonly options: ServiceOptions;

  /**
   * @throws ServiceDefinitionError if the handler does not serve every RPC
   */
  constructor(descriptor: ServiceDescriptor<R>, handler: HandlerArg<R>, options: Partial<ServiceOptions> = {}) {
    this.descriptor = descriptor;
    this.methods = bindHandler(descriptor, handler);
    this.handler = handler;
    this.options = { ...defaultServiceOptions(), ...options };
  }

  get serviceFullName(): string {
    return this.descriptor.serviceFullName;
  }

  get pathPrefix(): string {
    return this.descriptor.pathPrefix;
  }

  /**
   * Return a new service with more hooks, run after the existing ones.
   */
  with(hooks: ServiceHooks): TwirpService<R> {
    return new TwirpService(this.descriptor, this.handler, {
      ...this.options,
      hooks: [...this.options.hooks, hooks],
    });
  }

  /**
   * Answer an HTTP request.
   *
   * Never rejects: every failure becomes a JSON error response.
   */
  async call(request: TwirpRequest): Promise<TwirpResponse> {
    const ctx = new RequestContext(this.serviceFullName, request.method, request.path, request.contentType);

    const route = routeRequest(this.pathPrefix, request, (name) => this.methods.has(name));
    if (!route.ok) {
      return this.errorResponse(route.error, ctx);
    }

    const entry = this.descriptor.rpc(route.rpcName);
    const method = this.methods.get(route.rpcName);
    if (entry === undefined || method === undefined) {
      return this.errorResponse(badRouteError(`rpc method not found: "${route.rpcName}"`, request.method, request.path), ctx);
    }
    ctx.rpcName = entry.name;
    ctx.handlerMethodName = entry.handlerMethodName;

    let bytes: Uint8Array;
    try {
      bytes = await readBody(request.body);
    } catch (e) {
      return this.errorResponse(await this.unexpected(e, ctx), ctx);
    }

    let input: unknown;
    try {
      input = route.codec.decode(entry.requestType, bytes);
    } catch (e) {
      return this.errorResponse(malformedRequest(entry, route.codec, e), ctx);
    }

    const outcome = await this.execute(entry, method, input, ctx);
    if (!outcome.ok) {
      return this.errorResponse(outcome.error, ctx);
    }

    let body: Uint8Array;
    try {
      body = route.codec.encode(entry.responseType, outcome.value);
    } catch (e) {
      return this.errorResponse(await this.unexpected(e, ctx), ctx);
    }

    return {
      status: 200,
      headers: { "Content-Type": route.codec.contentType },
      body: [body],
    };
  }

  /**
   * Call an RPC with an already decoded input, bypassing HTTP.
   *
   * Hooks run as for an HTTP call. Never rejects.
   */
  async callRpc<N extends keyof R & string>(rpcName: N, input: RequestOf<R[N]>): Promise<RpcOutcome> {
    const path = `${this.pathPrefix}/${rpcName}`;
    const ctx = new RequestContext(this.serviceFullName, "POST", path, undefined);

    const entry = this.descriptor.rpc(rpcName);
    const method = this.methods.get(rpcName);
    if (entry === undefined || method === undefined) {
      return this.failed(badRouteError(`rpc method not found: "${rpcName}"`, "POST", path), ctx);
    }
    ctx.rpcName = entry.name;
    ctx.handlerMethodName = entry.handlerMethodName;

    const problem = entry.requestType.verify(input);
    if (problem !== null) {
      return this.failed(TwirpError.invalidArgument(`Invalid input for rpc method "${rpcName}": ${problem}`), ctx);
    }

    // Handlers see the same object shape as for an HTTP call.
    const outcome = await this.execute(entry, method, entry.requestType.normalize(input), ctx);
    if (!outcome.ok) {
      return this.failed(outcome.error, ctx);
    }
    return outcome;
  }

  /** Run before hooks, the handler and onSuccess hooks for a decoded input. */
  private async execute(entry: RpcEntry, method: BoundMethod, input: unknown, ctx: RequestContext): Promise<RpcOutcome> {
    ctx.input = input;

    for (const hooks of this.options.hooks) {
      if (!hooks.before) continue;
      let result: TwirpError | void;
      try {
        result = await hooks.before(ctx);
      } catch (e) {
        return { ok: false, error: await this.unexpected(e, ctx) };
      }
      if (result instanceof TwirpError) {
        return { ok: false, error: result };
      }
    }

    const outcome = await invokeHandler(method, input);
    switch (outcome.kind) {
      case "twirp-error":
        return { ok: false, error: outcome.error };

      case "unexpected":
        return { ok: false, error: await this.unexpected(outcome.cause, ctx) };

      case "success": {
        const value = outcome.value;
        if (value === null || value === undefined) {
          const failure = new Error(`Handler method .${entry.handlerMethodName} returned no response for rpc ${entry.name}`);
          return { ok: false, error: await this.unexpected(failure, ctx) };
        }

        const problem = entry.responseType.verify(value);
        if (problem !== null) {
          const failure = new Error(
            `Handler method .${entry.handlerMethodName} returned an invalid ${entry.responseType.typeName}: ${problem}`,
          );
          return { ok: false, error: await this.unexpected(failure, ctx) };
        }

        ctx.output = value;
        for (const hooks of this.options.hooks) {
          if (!hooks.onSuccess) continue;
          try {
            await hooks.onSuccess(ctx);
          } catch (e) {
            return { ok: false, error: await this.unexpected(e, ctx) };
          }
        }
        return { ok: true, value };
      }
    }
  }

  /** Report an unexpected failure and turn it into an internal error. */
  private async unexpected(cause: unknown, ctx: RequestContext): Promise<TwirpError> {
    log("unexpected failure in %s/%s: %O", ctx.serviceFullName, ctx.rpcName ?? "-", cause);

    for (const hooks of this.options.hooks) {
      if (!hooks.exceptionRaised) continue;
      try {
        await hooks.exceptionRaised(cause, ctx);
      } catch (e) {
        log("exceptionRaised hook failed: %O", e);
      }
    }

    if (this.options.exposeInternalErrors) {
      return TwirpError.internalWith(cause);
    }
    return new TwirpError("internal", INTERNAL_ERROR_MESSAGE, {}, { cause });
  }

  private async failed(error: TwirpError, ctx: RequestContext): Promise<RpcOutcome> {
    for (const hooks of this.options.hooks) {
      if (!hooks.onError) continue;
      try {
        await hooks.onError(error, ctx);
      } catch (e) {
        log("onError hook failed: %O", e);
      }
    }
    return { ok: false, error };
  }

  /** Error responses are always JSON, whatever the request's Content-Type. */
  private async errorResponse(error: TwirpError, ctx: RequestContext): Promise<TwirpResponse> {
    await this.failed(error, ctx);
    return {
      status: error.httpStatus,
      headers: { "Content-Type": ContentType.Json },
      body: [encodeErrorEnvelope(error)],
    };
  }
}

async function invokeHandler(method: BoundMethod, input: unknown): Promise<HandlerOutcome> {
  try {
    const value: unknown = await method(input);
    if (value instanceof TwirpError) {
      return { kind: "twirp-error", error: value };
    }
    return { kind: "success", value };
  } catch (e) {
    if (e instanceof TwirpError) {
      return { kind: "twirp-error", error: e };
    }
    return { kind: "unexpected", cause: e };
  }
}

function malformedRequest(entry: RpcEntry, codec: Codec, cause: unknown): TwirpError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new TwirpError(
    "malformed",
    `Invalid request body for rpc method "${entry.name}" with Content-Type=${codec.contentType}: ${detail}`,
    {},
    { cause },
  );
}
