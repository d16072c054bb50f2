// Tests for handler validation

import { describe, it, expect } from "vitest";
import { bindHandler, validateHandler } from "./handler.ts";
import { defineService, rpc, ServiceDefinitionError } from "./descriptor.ts";
import { EmptyService, EmptyType, Haberdasher, HaberdasherHandler } from "../../../test-fixtures/example.ts";

describe("bindHandler", () => {
  it("binds one method per rpc", () => {
    const methods = bindHandler(Haberdasher, new HaberdasherHandler());
    expect([...methods.keys()]).toEqual(["MakeHat"]);
    expect(methods.get("MakeHat")?.({ inches: 7 })).toEqual({ inches: 7, color: "white" });
  });

  it("calls methods with the handler as this", () => {
    class Counter {
      calls = 0;
      makeHat(size: { inches: number }) {
        this.calls += 1;
        return { inches: size.inches, color: "red" };
      }
    }
    const handler = new Counter();
    bindHandler(Haberdasher, handler).get("MakeHat")?.({ inches: 1 });
    expect(handler.calls).toBe(1);
  });

  it("accepts plain objects and zero-argument methods", () => {
    const handler = { makeHat: () => ({ inches: 1, color: "blue" }) };
    expect(bindHandler(Haberdasher, handler).size).toBe(1);
  });

  it("rejects a handler without the method", () => {
    expect(() => bindHandler(Haberdasher, "fake handler")).toThrow(
      "Handler must respond to .makeHat(input) in order to handle the message MakeHat.",
    );
    expect(() => bindHandler(Haberdasher, { MakeHat: () => ({}) })).toThrow(
      "Handler must respond to .makeHat(input) in order to handle the message MakeHat.",
    );
    expect(() => bindHandler(Haberdasher, { makeHat: "not a function" })).toThrow(ServiceDefinitionError);
  });

  it("rejects methods taking more than one argument", () => {
    const handler = { makeHat: (size: unknown, extra: unknown) => ({ size, extra }) };
    try {
      bindHandler(Haberdasher, handler);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ServiceDefinitionError);
      if (e instanceof ServiceDefinitionError) {
        expect(e.kind).toBe("invalid-handler");
        expect(e.message).toBe("Handler must respond to .makeHat(input) in order to handle the message MakeHat.");
      }
    }
  });

  it("requires a handler when the service has rpcs", () => {
    try {
      bindHandler(Haberdasher, null);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ServiceDefinitionError);
      if (e instanceof ServiceDefinitionError) {
        expect(e.kind).toBe("missing-handler");
        expect(e.message).toBe("Handler is required for service example.Haberdasher");
      }
    }
  });

  it("accepts a missing handler for a service without rpcs", () => {
    expect(bindHandler(EmptyService, null).size).toBe(0);
    expect(bindHandler(EmptyService, undefined).size).toBe(0);
  });

  it("reports the first missing method in declaration order", () => {
    const service = defineService({
      serviceName: "Store",
      rpcs: {
        Open: rpc(EmptyType, EmptyType),
        Close: rpc(EmptyType, EmptyType),
      },
    });
    expect(() => bindHandler(service, {})).toThrow(
      "Handler must respond to .open(input) in order to handle the message Open.",
    );
    expect(() => bindHandler(service, { open: () => ({}) })).toThrow(
      "Handler must respond to .close(input) in order to handle the message Close.",
    );
  });

  it("does not take built-in object methods for handler methods", () => {
    const service = defineService({
      serviceName: "Printer",
      rpcs: { ToString: rpc(EmptyType, EmptyType), ValueOf: rpc(EmptyType, EmptyType) },
    });
    expect(() => bindHandler(service, {})).toThrow(
      "Handler must respond to .toString(input) in order to handle the message ToString.",
    );
    expect(() => bindHandler(service, { toString: () => ({}) })).toThrow(
      "Handler must respond to .valueOf(input) in order to handle the message ValueOf.",
    );
    expect(bindHandler(service, { toString: () => ({}), valueOf: () => ({}) }).size).toBe(2);
  });

  it("finds inherited methods", () => {
    class Base {
      makeHat() {
        return { inches: 2, color: "green" };
      }
    }
    class Derived extends Base {}
    expect(bindHandler(Haberdasher, new Derived()).size).toBe(1);
  });
});

describe("validateHandler", () => {
  it("narrows a valid handler", () => {
    const handler: unknown = new HaberdasherHandler();
    validateHandler(Haberdasher, handler);
    expect(handler.makeHat({ inches: 4 })).toEqual({ inches: 4, color: "white" });
  });

  it("throws for an invalid handler", () => {
    expect(() => validateHandler(Haberdasher, {})).toThrow(ServiceDefinitionError);
  });
});
