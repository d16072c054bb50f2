// Service configuration.

import type { ServiceHooks } from "./hooks.ts";

/** Configuration for a service instance. */
export interface ServiceOptions {
  /**
   * Send the message of unexpected handler failures to clients.
   *
   * When false (the default) such failures are answered with
   * `internal` / "Internal server error" and an empty meta; the failure is
   * still logged and passed to the `exceptionRaised` hooks.
   */
  exposeInternalErrors: boolean;
  /** Hooks run around each call, in order. */
  hooks: readonly ServiceHooks[];
}

/** Default service configuration. */
export function defaultServiceOptions(): ServiceOptions {
  return {
    exposeInternalErrors: false,
    hooks: [],
  };
}

/**
 * Read service configuration from environment variables.
 *
 * - `TWINE_EXPOSE_INTERNAL_ERRORS`: "true" or "1" to expose internal error messages
 */
export function serviceOptionsFromEnv(env: Record<string, string | undefined> = process.env): Partial<ServiceOptions> {
  const options: Partial<ServiceOptions> = {};
  const expose = env.TWINE_EXPOSE_INTERNAL_ERRORS?.trim().toLowerCase();
  if (expose !== undefined && expose !== "") {
    options.exposeInternalErrors = expose === "true" || expose === "1";
  }
  return options;
}
