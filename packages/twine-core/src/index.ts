// @twine/core - Twirp service runtime
//
// This package provides service definitions, handler validation and the
// dispatcher that turns HTTP requests into handler calls.

// Errors and wire types used by handlers
export { TwirpError, ErrorCode, ContentType } from "@twine/wire";

// Messages and codecs
export {
  type MessageType,
  type ProtobufMessageOptions,
  MessageDecodeError,
  protobufMessageType,
} from "./message.ts";
export { type Codec, jsonCodec, protobufCodec, codecForContentType } from "./codec.ts";

// Service definitions
export {
  type RpcSpec,
  type RpcMap,
  type RpcEntry,
  type RequestOf,
  type ResponseOf,
  type HandlerResult,
  type ServiceHandler,
  type ServiceDefinition,
  ServiceDescriptor,
  ServiceDefinitionError,
  defineService,
  rpc,
  handlerMethodName,
} from "./descriptor.ts";
export { bindHandler, validateHandler, type BoundMethod } from "./handler.ts";

// Dispatch
export { type TwirpRequest, type TwirpResponse, readBody } from "./request.ts";
export { INVALID_ROUTE_MESSAGE, parseRoute, routeRequest, type RouteResult } from "./route.ts";
export { TwirpService, INTERNAL_ERROR_MESSAGE, type RpcOutcome, type HandlerArg } from "./service.ts";

// Hooks, logging and configuration
export { Extensions, RequestContext, type ServiceHooks } from "./hooks.ts";
export { loggingHooks, type LoggingOptions, type LogFn } from "./logging.ts";
export { type ServiceOptions, defaultServiceOptions, serviceOptionsFromEnv } from "./options.ts";
