import { NextResponse } from "next/server";
import { v4 as uuid } from "uuid";
import { apiError, apiErrorFromException, makeRequestId } from "@/lib/api/errors";
import { getGpaConfig, getGradeMapper } from "@/lib/gpa/config";
import { resultSetToCsv } from "@/lib/gpa/csv";
import { GpaBatchError } from "@/lib/gpa/errors";
import { processUploads, type UploadedDocument } from "@/lib/gpa/processUploads";
import { findStudent, summarizeCohort } from "@/lib/gpa/resultTable";
import { appendOpsEvent } from "@/lib/ops/eventLog";

const ROUTE = "/api/results";
const CSV_FILENAME = "student_results_gpa.csv";

function isFlagOn(value: string | null) {
  const v = (value || "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes";
}

// POST /api/results?format=csv&modules=1&student=...
export async function POST(req: Request) {
  const requestId = makeRequestId();
  const runId = uuid();
  const { searchParams } = new URL(req.url);
  const format = (searchParams.get("format") || "json").trim().toLowerCase();

  try {
    const formData = await req.formData();
    const files = formData.getAll("files").filter((x): x is File => typeof x !== "string");

    if (!files.length) {
      return apiError({
        status: 400,
        code: "RESULTS_MISSING_FILES",
        userMessage: "No result sheets were provided.",
        route: ROUTE,
        requestId,
      });
    }

    const uploads: UploadedDocument[] = [];
    for (const file of files) {
      uploads.push({ filename: file.name, bytes: new Uint8Array(await file.arrayBuffer()) });
    }

    const { config } = getGpaConfig();
    const outcome = await processUploads(uploads, { config, mapper: getGradeMapper() });
    const { resultSet, anomalies, documents } = outcome;

    appendOpsEvent({
      type: "GPA_RUN_COMPLETED",
      route: ROUTE,
      status: 200,
      details: {
        runId,
        requestId,
        files: uploads.length,
        students: resultSet.studentCount,
        ranked: resultSet.cohortSize,
        anomalies: anomalies.length,
      },
    });

    if (format === "csv") {
      const csv = resultSetToCsv(resultSet, config, { includeModules: isFlagOn(searchParams.get("modules")) });
      return new NextResponse(csv, {
        status: 200,
        headers: {
          "Content-Type": "text/csv; charset=utf-8",
          "Content-Disposition": `attachment; filename="${CSV_FILENAME}"`,
          "x-request-id": requestId,
          "x-run-id": runId,
        },
      });
    }

    const studentQuery = searchParams.get("student");
    return NextResponse.json(
      {
        runId,
        resultSet,
        summary: summarizeCohort(resultSet, config.gpaDecimals),
        anomalies,
        documents,
        ...(studentQuery ? { student: findStudent(resultSet, studentQuery) } : {}),
      },
      { headers: { "x-request-id": requestId } }
    );
  } catch (err) {
    appendOpsEvent({
      type: "GPA_RUN_FAILED",
      route: ROUTE,
      status: err instanceof GpaBatchError ? 422 : 500,
      details: { runId, requestId, message: err instanceof Error ? err.message : String(err) },
    });
    return apiErrorFromException(ROUTE, requestId, err);
  }
}
