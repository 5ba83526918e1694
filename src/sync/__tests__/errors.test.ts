import { describe, it, expect } from "vitest";
import {
  AuthDeniedError,
  SourceUnavailableError,
  SyncAlreadyRunningError,
  SyncError,
  TraktApiError,
  describeError,
  isSyncError,
} from "../errors";

describe("sync errors", () => {
  it("carries a code, category and HTTP status", () => {
    const error = new SourceUnavailableError("Trakt unavailable after 4 attempts (503)", { status: 503 });

    expect(error).toBeInstanceOf(SyncError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("SourceUnavailable");
    expect(error.category).toBe("transient");
    expect(error.httpStatus).toBe(503);
    expect(error.toJSON()).toEqual({
      name: "SourceUnavailableError",
      code: "SourceUnavailable",
      category: "transient",
      message: "Trakt unavailable after 4 attempts (503)",
      details: { status: 503 },
    });
  });

  it("keeps the underlying cause", () => {
    const cause = new TypeError("fetch failed");
    expect(new SourceUnavailableError("unreachable", {}, cause).cause).toBe(cause);
  });

  it("describes sync errors by their code", () => {
    expect(describeError(new AuthDeniedError())).toEqual({
      code: "AuthDenied",
      category: "auth",
      message: "Device authorization was denied",
      httpStatus: 403,
    });
    expect(describeError(new SyncAlreadyRunningError())).toMatchObject({ category: "conflict", httpStatus: 409 });
  });

  it("describes anything else as an internal error", () => {
    expect(isSyncError(new TraktApiError(404, "Not Found", "/sync/history/movies"))).toBe(false);
    expect(describeError(new TraktApiError(404, "Not Found", "/sync/history/movies"))).toEqual({
      code: "InternalError",
      category: "bug",
      message: "Trakt API error: 404 Not Found (/sync/history/movies)",
      httpStatus: 500,
    });
    expect(describeError("boom")).toMatchObject({ code: "InternalError", message: "boom" });
  });
});
