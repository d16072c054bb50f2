// Tests for service configuration

import { describe, it, expect } from "vitest";
import { defaultServiceOptions, serviceOptionsFromEnv } from "./options.ts";

describe("defaultServiceOptions", () => {
  it("hides internal errors and has no hooks", () => {
    expect(defaultServiceOptions()).toEqual({ exposeInternalErrors: false, hooks: [] });
  });

  it("returns a fresh object each time", () => {
    expect(defaultServiceOptions()).not.toBe(defaultServiceOptions());
  });
});

describe("serviceOptionsFromEnv", () => {
  it("reads TWINE_EXPOSE_INTERNAL_ERRORS", () => {
    expect(serviceOptionsFromEnv({ TWINE_EXPOSE_INTERNAL_ERRORS: "true" })).toEqual({ exposeInternalErrors: true });
    expect(serviceOptionsFromEnv({ TWINE_EXPOSE_INTERNAL_ERRORS: "1" })).toEqual({ exposeInternalErrors: true });
    expect(serviceOptionsFromEnv({ TWINE_EXPOSE_INTERNAL_ERRORS: " TRUE " })).toEqual({ exposeInternalErrors: true });
    expect(serviceOptionsFromEnv({ TWINE_EXPOSE_INTERNAL_ERRORS: "false" })).toEqual({ exposeInternalErrors: false });
    expect(serviceOptionsFromEnv({ TWINE_EXPOSE_INTERNAL_ERRORS: "yes please" })).toEqual({
      exposeInternalErrors: false,
    });
  });

  it("leaves unset variables out", () => {
    expect(serviceOptionsFromEnv({})).toEqual({});
    expect(serviceOptionsFromEnv({ TWINE_EXPOSE_INTERNAL_ERRORS: "" })).toEqual({});
    expect(serviceOptionsFromEnv({ TWINE_EXPOSE_INTERNAL_ERRORS: "  " })).toEqual({});
  });
});
