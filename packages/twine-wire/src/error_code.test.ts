import { describe, it, expect } from "vitest";
import { ErrorCode, httpStatusFromErrorCode, isErrorCode } from "./error_code.ts";

describe("ErrorCode", () => {
  it("uses the Twirp wire names", () => {
    expect(ErrorCode.BadRoute).toBe("bad_route");
    expect(ErrorCode.Malformed).toBe("malformed");
    expect(ErrorCode.Internal).toBe("internal");
    expect(ErrorCode.Canceled).toBe("canceled");
    expect(ErrorCode.DataLoss).toBe("dataloss");
  });

  it("has eighteen codes", () => {
    expect(Object.values(ErrorCode)).toHaveLength(18);
  });
});

describe("httpStatusFromErrorCode", () => {
  it("maps routing and decoding failures to client errors", () => {
    expect(httpStatusFromErrorCode(ErrorCode.BadRoute)).toBe(404);
    expect(httpStatusFromErrorCode(ErrorCode.Malformed)).toBe(400);
    expect(httpStatusFromErrorCode(ErrorCode.InvalidArgument)).toBe(400);
  });

  it("maps server failures to 5xx", () => {
    expect(httpStatusFromErrorCode(ErrorCode.Internal)).toBe(500);
    expect(httpStatusFromErrorCode(ErrorCode.Unknown)).toBe(500);
    expect(httpStatusFromErrorCode(ErrorCode.DataLoss)).toBe(500);
    expect(httpStatusFromErrorCode(ErrorCode.Unimplemented)).toBe(501);
    expect(httpStatusFromErrorCode(ErrorCode.Unavailable)).toBe(503);
  });

  it("maps the remaining codes", () => {
    expect(httpStatusFromErrorCode(ErrorCode.Canceled)).toBe(408);
    expect(httpStatusFromErrorCode(ErrorCode.DeadlineExceeded)).toBe(408);
    expect(httpStatusFromErrorCode(ErrorCode.NotFound)).toBe(404);
    expect(httpStatusFromErrorCode(ErrorCode.AlreadyExists)).toBe(409);
    expect(httpStatusFromErrorCode(ErrorCode.Aborted)).toBe(409);
    expect(httpStatusFromErrorCode(ErrorCode.PermissionDenied)).toBe(403);
    expect(httpStatusFromErrorCode(ErrorCode.Unauthenticated)).toBe(401);
    expect(httpStatusFromErrorCode(ErrorCode.ResourceExhausted)).toBe(429);
    expect(httpStatusFromErrorCode(ErrorCode.FailedPrecondition)).toBe(412);
    expect(httpStatusFromErrorCode(ErrorCode.OutOfRange)).toBe(400);
  });
});

describe("isErrorCode", () => {
  it("accepts known codes only", () => {
    expect(isErrorCode("not_found")).toBe(true);
    expect(isErrorCode("NOT_FOUND")).toBe(false);
    expect(isErrorCode("teapot")).toBe(false);
    expect(isErrorCode(404)).toBe(false);
    expect(isErrorCode(undefined)).toBe(false);
  });
});
