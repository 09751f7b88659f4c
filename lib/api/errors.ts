import { randomUUID } from "crypto";
import { NextResponse } from "next/server";
import { GpaBatchError, GpaConfigError } from "@/lib/gpa/errors";

export type ApiRoute = "/api/results" | "/api/grade-scale";

type ApiErrorInput = {
  status?: number;
  code: string;
  userMessage: string;
  requestId?: string;
  route: ApiRoute;
  details?: unknown;
  cause?: unknown;
};

function toErrorMessage(cause: unknown) {
  if (!cause) return "";
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function makeRequestId() {
  return randomUUID();
}

export function apiError(input: ApiErrorInput) {
  const status = input.status ?? 500;
  const requestId = input.requestId || makeRequestId();
  const exposeDetails = process.env.NODE_ENV !== "production" || status < 500;

  console.error(
    JSON.stringify({
      level: status >= 500 ? "error" : "warn",
      route: input.route,
      requestId,
      code: input.code,
      status,
      userMessage: input.userMessage,
      cause: toErrorMessage(input.cause),
    })
  );

  const body: Record<string, unknown> = {
    error: input.userMessage,
    code: input.code,
    requestId,
  };
  if (exposeDetails && input.details !== undefined) {
    body.details = input.details;
  }

  return NextResponse.json(body, {
    status,
    headers: {
      "x-request-id": requestId,
    },
  });
}

/** Map a thrown error from the GPA core onto an API response. */
export function apiErrorFromException(route: ApiRoute, requestId: string, cause: unknown) {
  if (cause instanceof GpaBatchError) {
    return apiError({
      status: 422,
      code: "RESULTS_NO_VALID_INPUT",
      userMessage: "No valid student records or grades were found in the uploaded documents.",
      route,
      requestId,
      details: { anomalies: cause.anomalies },
      cause,
    });
  }
  if (cause instanceof GpaConfigError) {
    return apiError({
      status: 500,
      code: "GRADE_SCALE_INVALID",
      userMessage: "The grade scale configuration is invalid.",
      route,
      requestId,
      details: { field: cause.field },
      cause,
    });
  }
  return apiError({
    status: 500,
    code: "RESULTS_FAILED",
    userMessage: "Processing the result sheets failed.",
    route,
    requestId,
    cause,
  });
}
