// Handler contract validation.
//
// Every RPC in a descriptor must be served by a single-argument method on the
// handler. This is checked once, when a service instance is created, so a
// misconfigured handler fails at startup instead of on the first request.

import {
  ServiceDefinitionError,
  type RpcMap,
  type ServiceDescriptor,
  type ServiceHandler,
} from "./descriptor.ts";

/** A handler method bound to its handler, called with the decoded request. */
export type BoundMethod = (input: unknown) => unknown;

/**
 * Check a handler against a descriptor and bind its methods.
 *
 * Entries are checked in declaration order and the first failure is thrown.
 *
 * @returns handler methods keyed by RPC name
 * @throws ServiceDefinitionError if the handler is missing or lacks a method
 */
export function bindHandler(descriptor: ServiceDescriptor, handler: unknown): ReadonlyMap<string, BoundMethod> {
  const methods = new Map<string, BoundMethod>();
  if (descriptor.rpcs.size === 0) {
    return methods;
  }

  if (handler === null || handler === undefined) {
    throw ServiceDefinitionError.missingHandler(`Handler is required for service ${descriptor.serviceFullName}`);
  }

  for (const entry of descriptor.rpcs.values()) {
    const method: unknown =
      typeof handler === "object" || typeof handler === "function"
        ? Reflect.get(handler, entry.handlerMethodName)
        : undefined;

    // A second declared parameter would never be filled in.
    if (typeof method !== "function" || method.length > 1 || isBuiltinMethod(entry.handlerMethodName, method)) {
      throw ServiceDefinitionError.invalidHandler(
        `Handler must respond to .${entry.handlerMethodName}(input) in order to handle the message ${entry.name}.`,
      );
    }

    methods.set(entry.name, (input) => Reflect.apply(method, handler, [input]));
  }

  return methods;
}

// toString, valueOf, call, bind and the like are not handler methods.
function isBuiltinMethod(name: string, method: unknown): boolean {
  return Reflect.get(Object.prototype, name) === method || Reflect.get(Function.prototype, name) === method;
}

/**
 * Assert that a value is a valid handler for a descriptor.
 *
 * @throws ServiceDefinitionError if it is not
 */
export function validateHandler<R extends RpcMap>(
  descriptor: ServiceDescriptor<R>,
  handler: unknown,
): asserts handler is ServiceHandler<R> {
  bindHandler(descriptor, handler);
}
