import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { apiError, apiErrorFromException } from "@/lib/api/errors";
import { GpaBatchError, GpaConfigError } from "@/lib/gpa/errors";

describe("apiError", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the error body with the request id header", async () => {
    const res = apiError({
      status: 400,
      code: "RESULTS_MISSING_FILES",
      userMessage: "No result sheets were provided.",
      route: "/api/results",
      requestId: "req-1",
    });
    expect(res.status).toBe(400);
    expect(res.headers.get("x-request-id")).toBe("req-1");
    expect(await res.json()).toEqual({ error: "No result sheets were provided.", code: "RESULTS_MISSING_FILES", requestId: "req-1" });
  });

  it("logs one structured line", () => {
    apiError({ code: "RESULTS_FAILED", userMessage: "Failed.", route: "/api/results", requestId: "req-2", cause: new Error("boom") });
    expect(console.error).toHaveBeenCalledWith(
      JSON.stringify({
        level: "error",
        route: "/api/results",
        requestId: "req-2",
        code: "RESULTS_FAILED",
        status: 500,
        userMessage: "Failed.",
        cause: "boom",
      })
    );
  });
});

describe("apiErrorFromException", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps an empty batch to 422", async () => {
    const res = apiErrorFromException("/api/results", "req-3", new GpaBatchError({ message: "empty", anomalies: [] }));
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ code: "RESULTS_NO_VALID_INPUT", details: { anomalies: [] } });
  });

  it("maps a configuration error to 500", async () => {
    const res = apiErrorFromException(
      "/api/grade-scale",
      "req-4",
      new GpaConfigError({ message: "bad", field: "scaleMax" })
    );
    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ code: "GRADE_SCALE_INVALID" });
  });

  it("maps anything else to 500", async () => {
    const res = apiErrorFromException("/api/results", "req-5", "unexpected");
    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ code: "RESULTS_FAILED", requestId: "req-5" });
  });
});
