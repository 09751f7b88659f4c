import { NextResponse } from "next/server";
import { apiErrorFromException, makeRequestId } from "@/lib/api/errors";
import { getGpaConfig, getGradeMapper } from "@/lib/gpa/config";

// GET /api/grade-scale
export async function GET() {
  const requestId = makeRequestId();
  try {
    const { config, source } = getGpaConfig();
    const mapper = getGradeMapper();
    return NextResponse.json(
      { source, scaleMax: mapper.scaleMax, config },
      { headers: { "x-request-id": requestId } }
    );
  } catch (err) {
    return apiErrorFromException("/api/grade-scale", requestId, err);
  }
}
