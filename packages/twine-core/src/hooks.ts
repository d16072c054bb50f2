// Service hooks and per-call context.
//
// Hooks allow observing and short-circuiting calls, enabling patterns like
// authentication, logging and error reporting without touching handlers.

import type { TwirpError } from "@twine/wire";

/**
 * Extensions provide type-safe, symbol-keyed storage for hook state.
 *
 * Each hook can define a unique symbol and store/retrieve typed data
 * without conflicts with other hooks.
 *
 * @example
 * ```typescript
 * const USER = Symbol("user");
 * ctx.extensions.set(USER, { id: "u-1" });
 * const user = ctx.extensions.get<{ id: string }>(USER);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }

  has(key: symbol): boolean {
    return this.data.has(key);
  }

  delete(key: symbol): boolean {
    return this.data.delete(key);
  }
}

/**
 * State of a single call, shared by all hooks for that call.
 *
 * Created when a request arrives and discarded once the response is built.
 */
export class RequestContext {
  /** Type-safe storage for hook state. */
  readonly extensions = new Extensions();
  /** Matched RPC name, once routing has succeeded. */
  rpcName: string | undefined;
  /** Handler method serving the RPC, once routing has succeeded. */
  handlerMethodName: string | undefined;
  /** Decoded request message, once decoding has succeeded. */
  input: unknown;
  /** Handler response, once the handler has succeeded. */
  output: unknown;

  constructor(
    /** Full name of the service, e.g. "example.Haberdasher". */
    readonly serviceFullName: string,
    readonly httpMethod: string,
    readonly path: string,
    readonly contentType: string | undefined,
  ) {}
}

type HookResult<T> = T | PromiseLike<T>;

/**
 * Hooks run by a service around each call, in registration order.
 */
export interface ServiceHooks {
  /**
   * Called after the request is routed and decoded, before the handler.
   * Returning a TwirpError answers the call with that error instead.
   */
  before?(ctx: RequestContext): HookResult<TwirpError | void>;

  /** Called after the handler succeeded, before the response is encoded. */
  onSuccess?(ctx: RequestContext): HookResult<void>;

  /**
   * Called for every error response, routing errors included.
   * Failures in this hook are logged and otherwise ignored.
   */
  onError?(error: TwirpError, ctx: RequestContext): HookResult<void>;

  /**
   * Called with an unexpected failure (a handler or hook that threw
   * something other than a TwirpError) before it is turned into an
   * internal error. Failures in this hook are logged and otherwise ignored.
   */
  exceptionRaised?(cause: unknown, ctx: RequestContext): HookResult<void>;
}
