// Service and RPC descriptors.
//
// A service is declared once, by a single defineService() call, and the
// resulting descriptor is frozen before any service instance exists:
//
//   const Haberdasher = defineService({
//     packageName: "example",
//     serviceName: "Haberdasher",
//     rpcs: { MakeHat: rpc(SizeType, HatType) },
//   });

import type { MessageType } from "./message.ts";
import type { TwirpError } from "@twine/wire";

/** Request and response types of one RPC, as declared. */
export interface RpcSpec<I, O> {
  readonly requestType: MessageType<I>;
  readonly responseType: MessageType<O>;
}

/** Declared RPCs of a service, keyed by RPC name. */
export type RpcMap = Readonly<Record<string, RpcSpec<unknown, unknown>>>;

/** A registered RPC. */
export interface RpcEntry {
  /** RPC name as it appears in the URL, e.g. "MakeHat". */
  readonly name: string;
  readonly requestType: MessageType<unknown>;
  readonly responseType: MessageType<unknown>;
  /** Name of the handler method serving this RPC, e.g. "makeHat". */
  readonly handlerMethodName: string;
}

export type RequestOf<S> = S extends RpcSpec<infer I, unknown> ? I : never;
export type ResponseOf<S> = S extends RpcSpec<unknown, infer O> ? O : never;

/** What a handler method may produce: a response, or a Twirp error, possibly later. */
export type HandlerResult<O> = O | TwirpError | PromiseLike<O | TwirpError>;

/**
 * Handler interface for a service: one single-argument method per RPC,
 * named by handlerMethodName().
 */
export type ServiceHandler<R extends RpcMap> = {
  [K in keyof R & string as Uncapitalize<K>]: (input: RequestOf<R[K]>) => HandlerResult<ResponseOf<R[K]>>;
};

/** Declare an RPC's request and response types. */
export function rpc<I, O>(requestType: MessageType<I>, responseType: MessageType<O>): RpcSpec<I, O> {
  return { requestType, responseType };
}

/**
 * Derive the handler method name for an RPC name.
 *
 * The first character is lower-cased and the rest kept: "MakeHat" → "makeHat",
 * "GetHTTPStatus" → "getHTTPStatus". This matches TypeScript's `Uncapitalize`.
 */
export function handlerMethodName(rpcName: string): string {
  return rpcName.charAt(0).toLowerCase() + rpcName.slice(1);
}

/** Error in a service definition or a handler supplied for it. */
export class ServiceDefinitionError extends Error {
  constructor(
    public kind: "invalid-name" | "duplicate-rpc" | "missing-handler" | "invalid-handler",
    message: string,
  ) {
    super(message);
    this.name = "ServiceDefinitionError";
  }

  static invalidName(message: string): ServiceDefinitionError {
    return new ServiceDefinitionError("invalid-name", message);
  }

  static duplicateRpc(message: string): ServiceDefinitionError {
    return new ServiceDefinitionError("duplicate-rpc", message);
  }

  static missingHandler(message: string): ServiceDefinitionError {
    return new ServiceDefinitionError("missing-handler", message);
  }

  static invalidHandler(message: string): ServiceDefinitionError {
    return new ServiceDefinitionError("invalid-handler", message);
  }
}

export interface ServiceDefinition<R extends RpcMap> {
  /** Protobuf package, e.g. "example". Defaults to "". */
  packageName?: string;
  /** Service name, e.g. "Haberdasher". */
  serviceName: string;
  rpcs: R;
}

/** Describes a service at runtime. Immutable once built. */
export class ServiceDescriptor<R extends RpcMap = RpcMap> {
  readonly packageName: string;
  readonly serviceName: string;
  /** "package.Service", or just "Service" without a package. */
  readonly serviceFullName: string;
  /** "/twirp/" followed by the full service name. */
  readonly pathPrefix: string;
  /** Registered RPCs in declaration order. */
  readonly rpcs: ReadonlyMap<string, RpcEntry>;
  /** The RPCs as declared, for typed access. */
  readonly methods: Readonly<R>;

  constructor(definition: ServiceDefinition<R>) {
    const packageName = definition.packageName ?? "";
    if (packageName !== "" && !PACKAGE_NAME.test(packageName)) {
      throw ServiceDefinitionError.invalidName(`Invalid package name: "${packageName}"`);
    }
    if (!IDENTIFIER.test(definition.serviceName)) {
      throw ServiceDefinitionError.invalidName(`Invalid service name: "${definition.serviceName}"`);
    }

    this.packageName = packageName;
    this.serviceName = definition.serviceName;
    this.serviceFullName = packageName === "" ? this.serviceName : `${packageName}.${this.serviceName}`;
    this.pathPrefix = `/twirp/${this.serviceFullName}`;
    this.rpcs = buildEntries(this.serviceFullName, definition.rpcs);
    this.methods = Object.freeze({ ...definition.rpcs });
    Object.freeze(this);
  }

  /** Look up an RPC by its exact (case-sensitive) name. */
  rpc(name: string): RpcEntry | undefined {
    return this.rpcs.get(name);
  }
}

/** Declare a service. */
export function defineService<R extends RpcMap>(definition: ServiceDefinition<R>): ServiceDescriptor<R> {
  return new ServiceDescriptor(definition);
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PACKAGE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

function buildEntries(serviceFullName: string, rpcs: RpcMap): ReadonlyMap<string, RpcEntry> {
  const entries = new Map<string, RpcEntry>();
  const byHandlerMethod = new Map<string, string>();

  for (const [name, spec] of Object.entries(rpcs)) {
    if (!IDENTIFIER.test(name)) {
      throw ServiceDefinitionError.invalidName(`Invalid rpc name in ${serviceFullName}: "${name}"`);
    }

    const methodName = handlerMethodName(name);
    const existing = byHandlerMethod.get(methodName);
    if (existing !== undefined) {
      throw ServiceDefinitionError.duplicateRpc(
        `rpc ${name} in ${serviceFullName} maps to handler method .${methodName}, already used by rpc ${existing}`,
      );
    }
    byHandlerMethod.set(methodName, name);

    entries.set(
      name,
      Object.freeze({
        name,
        requestType: spec.requestType,
        responseType: spec.responseType,
        handlerMethodName: methodName,
      }),
    );
  }

  return entries;
}
