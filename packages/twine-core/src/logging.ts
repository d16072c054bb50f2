// Logging hooks for Twirp services.
//
// Provides request/response logging with timing information.
// Output goes through the debug package, so it is enabled with the DEBUG
// environment variable (DEBUG=twine:* or DEBUG=twine:rpc).

import createDebug from "debug";
import type { TwirpError } from "@twine/wire";
import type { RequestContext, ServiceHooks } from "./hooks.ts";

const START_TIME = Symbol("logging:start-time");

/** Log sink: a message line and a structured object. */
export type LogFn = (message: string, data: Record<string, unknown>) => void;

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "twine:rpc".
   * Ignored when `log` is given.
   */
  namespace?: string;

  /**
   * Log decoded request messages. Defaults to true.
   */
  logInput?: boolean;

  /**
   * Log response messages. Defaults to true.
   */
  logOutput?: boolean;

  /**
   * Minimum duration (ms) to log. Calls faster than this are skipped.
   * Defaults to 0 (log all calls).
   */
  minDuration?: number;

  /**
   * Where to write log entries. Defaults to a debug logger for `namespace`.
   */
  log?: LogFn;
}

/**
 * Create hooks that log every call with timing information.
 *
 * Logs structured objects:
 * - Request: { type: "request", method, input? }
 * - Response: { type: "response", method, duration, ok, output? | errorCode, error }
 *
 * Calls rejected during routing are logged as responses without a duration.
 *
 * @example
 * ```typescript
 * const service = new TwirpService(Haberdasher, handler).with(loggingHooks());
 * // DEBUG=twine:rpc node server.js
 * ```
 */
export function loggingHooks(options: LoggingOptions = {}): ServiceHooks {
  const logInput = options.logInput ?? true;
  const logOutput = options.logOutput ?? true;
  const minDuration = options.minDuration ?? 0;
  const write = options.log ?? debugSink(options.namespace ?? "twine:rpc");

  const durationOf = (ctx: RequestContext): number | undefined => {
    const startTime = ctx.extensions.get<number>(START_TIME);
    return startTime === undefined ? undefined : performance.now() - startTime;
  };

  return {
    before(ctx: RequestContext): void {
      ctx.extensions.set(START_TIME, performance.now());

      const method = methodLabel(ctx);
      const logObj: Record<string, unknown> = { type: "request", method };
      if (logInput && ctx.input !== undefined) {
        logObj.input = ctx.input;
      }
      write(`→ ${method}`, logObj);
    },

    onSuccess(ctx: RequestContext): void {
      const duration = durationOf(ctx) ?? 0;
      if (duration < minDuration) return;

      const method = methodLabel(ctx);
      const logObj: Record<string, unknown> = {
        type: "response",
        method,
        duration: `${duration.toFixed(2)}ms`,
        ok: true,
      };
      if (logOutput && ctx.output !== undefined) {
        logObj.output = ctx.output;
      }
      write(`← ${method}: ✓ ${duration.toFixed(2)}ms`, logObj);
    },

    onError(error: TwirpError, ctx: RequestContext): void {
      const duration = durationOf(ctx);
      if (duration !== undefined && duration < minDuration) return;

      const method = methodLabel(ctx);
      const logObj: Record<string, unknown> = {
        type: "response",
        method,
        ok: false,
        errorCode: error.code,
        error: error.msg,
      };
      if (Object.keys(error.meta).length > 0) {
        logObj.meta = error.meta;
      }

      if (duration === undefined) {
        write(`← ${method}: ✗ ${error.code}`, logObj);
      } else {
        logObj.duration = `${duration.toFixed(2)}ms`;
        write(`← ${method}: ✗ ${duration.toFixed(2)}ms`, logObj);
      }
    },
  };
}

function methodLabel(ctx: RequestContext): string {
  return ctx.rpcName === undefined ? `${ctx.httpMethod} ${ctx.path}` : `${ctx.serviceFullName}/${ctx.rpcName}`;
}

function debugSink(namespace: string): LogFn {
  const debug = createDebug(namespace);
  return (message, data) => {
    if (!debug.enabled) return;
    debug("%s %O", message, data);
  };
}
