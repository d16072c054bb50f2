// Twirp error type and its JSON wire envelope.
//
// Every failed call is answered with a JSON body of the form
// {"code": "<code>", "msg": "<message>", "meta": {...}}, whatever the
// content type of the request was.

import { ErrorCode, httpStatusFromErrorCode, isErrorCode } from "./error_code.ts";

/** String key/value context attached to an error. */
export type ErrorMeta = Readonly<Record<string, string>>;

/** JSON shape of an error on the wire. */
export interface ErrorEnvelope {
  code: ErrorCode;
  msg: string;
  meta: Record<string, string>;
}

/** Meta key set on every bad_route error. */
export const INVALID_ROUTE_META_KEY = "twirp_invalid_route";

/**
 * RPC error with a Twirp code, a message and optional metadata.
 *
 * Instances are immutable; use `withMeta()` to derive an error with more context.
 */
export class TwirpError extends Error {
  /** The error code */
  readonly code: ErrorCode;
  /** The message sent to the client (same as `message`) */
  readonly msg: string;
  readonly meta: ErrorMeta;

  constructor(code: ErrorCode, msg: string, meta: Record<string, string> = {}, options?: { cause?: unknown }) {
    super(msg, options);
    this.name = "TwirpError";

    // Callers without static types can still hand us anything.
    if (!isErrorCode(code)) {
      throw new TypeError(`Invalid Twirp error code: ${String(code)}`);
    }
    for (const [key, value] of Object.entries(meta)) {
      if (typeof value !== "string") {
        throw new TypeError(`Twirp error meta value for key "${key}" must be a string, got ${typeof value}`);
      }
    }

    this.code = code;
    this.msg = msg;
    this.meta = Object.freeze({ ...meta });
  }

  /** HTTP status for this error's code. */
  get httpStatus(): number {
    return httpStatusFromErrorCode(this.code);
  }

  /** Return a copy of this error with one more meta entry. */
  withMeta(key: string, value: string): TwirpError {
    return new TwirpError(this.code, this.msg, { ...this.meta, [key]: value }, { cause: this.cause });
  }

  toJSON(): ErrorEnvelope {
    return { code: this.code, msg: this.msg, meta: { ...this.meta } };
  }

  /**
   * Wrap an unexpected failure as an internal error.
   *
   * The message is the failure's message and `meta.cause` its error name, so
   * only use this where exposing those details to clients is acceptable.
   */
  static internalWith(cause: unknown): TwirpError {
    if (cause instanceof Error) {
      return new TwirpError(ErrorCode.Internal, cause.message, { cause: cause.name }, { cause });
    }
    return new TwirpError(ErrorCode.Internal, String(cause), {}, { cause });
  }

  static canceled(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.Canceled, msg, meta);
  }

  static unknown(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.Unknown, msg, meta);
  }

  static invalidArgument(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.InvalidArgument, msg, meta);
  }

  static malformed(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.Malformed, msg, meta);
  }

  static deadlineExceeded(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.DeadlineExceeded, msg, meta);
  }

  static notFound(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.NotFound, msg, meta);
  }

  static badRoute(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.BadRoute, msg, meta);
  }

  static alreadyExists(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.AlreadyExists, msg, meta);
  }

  static permissionDenied(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.PermissionDenied, msg, meta);
  }

  static unauthenticated(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.Unauthenticated, msg, meta);
  }

  static resourceExhausted(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.ResourceExhausted, msg, meta);
  }

  static failedPrecondition(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.FailedPrecondition, msg, meta);
  }

  static aborted(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.Aborted, msg, meta);
  }

  static outOfRange(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.OutOfRange, msg, meta);
  }

  static unimplemented(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.Unimplemented, msg, meta);
  }

  static internal(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.Internal, msg, meta);
  }

  static unavailable(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.Unavailable, msg, meta);
  }

  static dataLoss(msg: string, meta?: Record<string, string>): TwirpError {
    return new TwirpError(ErrorCode.DataLoss, msg, meta);
  }
}

/**
 * Build a bad_route error for a request that could not be routed.
 *
 * The route is recorded in `meta.twirp_invalid_route` as "<METHOD> <path>".
 */
export function badRouteError(msg: string, httpMethod: string, path: string): TwirpError {
  return TwirpError.badRoute(msg, { [INVALID_ROUTE_META_KEY]: `${httpMethod} ${path}` });
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/** Encode an error as its UTF-8 JSON envelope. */
export function encodeErrorEnvelope(error: TwirpError): Uint8Array {
  return encoder.encode(JSON.stringify(error.toJSON()));
}

/**
 * Result of decoding an error envelope.
 *
 * Decoding never throws; a body that is not a valid envelope is reported
 * with a reason instead.
 */
export type ErrorEnvelopeResult =
  | { ok: true; error: TwirpError }
  | { ok: false; reason: string };

/** Try to decode a JSON error envelope, e.g. the body of a non-200 response. */
export function tryDecodeErrorEnvelope(bytes: Uint8Array): ErrorEnvelopeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(bytes));
  } catch (e) {
    return { ok: false, reason: `body is not JSON: ${e instanceof Error ? e.message : String(e)}` };
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { ok: false, reason: "body is not a JSON object" };
  }

  const code: unknown = Reflect.get(parsed, "code");
  if (!isErrorCode(code)) {
    return { ok: false, reason: `invalid error code: ${JSON.stringify(code) ?? "undefined"}` };
  }

  const msg: unknown = Reflect.get(parsed, "msg");
  if (typeof msg !== "string") {
    return { ok: false, reason: "msg is not a string" };
  }

  const rawMeta: unknown = Reflect.get(parsed, "meta");
  const meta: Record<string, string> = {};
  if (rawMeta !== undefined && rawMeta !== null) {
    if (typeof rawMeta !== "object" || Array.isArray(rawMeta)) {
      return { ok: false, reason: "meta is not a JSON object" };
    }
    for (const [key, value] of Object.entries(rawMeta)) {
      if (typeof value !== "string") {
        return { ok: false, reason: `meta value for key "${key}" is not a string` };
      }
      meta[key] = value;
    }
  }

  return { ok: true, error: new TwirpError(code, msg, meta) };
}
