// Twirp wire protocol types and utilities
//
// This package contains the parts of the Twirp protocol that do not depend on
// message schemas: error codes and their HTTP statuses, the JSON error
// envelope, and the accepted content types.

// ============================================================================
// Error Codes
// ============================================================================

export { ErrorCode, isErrorCode, httpStatusFromErrorCode } from "./error_code.ts";

// ============================================================================
// Errors
// ============================================================================

export {
  TwirpError,
  type ErrorMeta,
  type ErrorEnvelope,
  type ErrorEnvelopeResult,
  INVALID_ROUTE_META_KEY,
  badRouteError,
  encodeErrorEnvelope,
  tryDecodeErrorEnvelope,
} from "./twirp_error.ts";

// ============================================================================
// Content Types
// ============================================================================

export { ContentType, parseContentType } from "./content_type.ts";
