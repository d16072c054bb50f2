// @twine/node - serve Twirp services with node:http

export {
  type NodeRequest,
  type NodeResponse,
  type MountedService,
  type RequestListenerOptions,
  toTwirpRequest,
  writeTwirpResponse,
  createRequestListener,
} from "./adapter.ts";

// Re-export the service API for convenience
export {
  TwirpService,
  TwirpError,
  ErrorCode,
  defineService,
  rpc,
  protobufMessageType,
  loggingHooks,
  serviceOptionsFromEnv,
  type ServiceHooks,
  type ServiceOptions,
} from "@twine/core";
