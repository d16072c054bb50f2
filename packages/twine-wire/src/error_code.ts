// Twirp error codes and their HTTP status mapping.

/** Twirp error codes, keyed by the name used in TypeScript code. */
export const ErrorCode = {
  /** The operation was cancelled. */
  Canceled: "canceled",
  /** An unknown error occurred. */
  Unknown: "unknown",
  /** The client specified an invalid argument. */
  InvalidArgument: "invalid_argument",
  /** The client sent a message which could not be decoded. */
  Malformed: "malformed",
  /** The operation expired before completion. */
  DeadlineExceeded: "deadline_exceeded",
  /** Some requested entity was not found. */
  NotFound: "not_found",
  /** The requested URL path wasn't routable to a Twirp service and method. */
  BadRoute: "bad_route",
  /** An attempt to create an entity failed because one already exists. */
  AlreadyExists: "already_exists",
  /** The caller doesn't have permission to execute the operation. */
  PermissionDenied: "permission_denied",
  /** The request does not have valid authentication credentials. */
  Unauthenticated: "unauthenticated",
  /** Some resource has been exhausted or rate-limited. */
  ResourceExhausted: "resource_exhausted",
  /** The system is not in a state required for the operation. */
  FailedPrecondition: "failed_precondition",
  /** The operation was aborted, typically due to a concurrency issue. */
  Aborted: "aborted",
  /** The operation was attempted past the valid range. */
  OutOfRange: "out_of_range",
  /** The operation is not implemented or not supported. */
  Unimplemented: "unimplemented",
  /** Some invariant expected by the underlying system has been broken. */
  Internal: "internal",
  /** The service is currently unavailable. */
  Unavailable: "unavailable",
  /** Unrecoverable data loss or corruption. */
  DataLoss: "dataloss",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

const HTTP_STATUS: Record<ErrorCode, number> = {
  canceled: 408,
  unknown: 500,
  invalid_argument: 400,
  malformed: 400,
  deadline_exceeded: 408,
  not_found: 404,
  bad_route: 404,
  already_exists: 409,
  permission_denied: 403,
  unauthenticated: 401,
  resource_exhausted: 429,
  failed_precondition: 412,
  aborted: 409,
  out_of_range: 400,
  unimplemented: 501,
  internal: 500,
  unavailable: 503,
  dataloss: 500,
};

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

/** Check whether a value is one of the Twirp error codes. */
export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && ERROR_CODES.has(value);
}

/** HTTP status used when responding with an error of the given code. */
export function httpStatusFromErrorCode(code: ErrorCode): number {
  return HTTP_STATUS[code];
}
