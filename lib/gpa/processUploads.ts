import path from "path";
import { extractDocumentText, runWithLimit, withTimeout, type ExtractedText } from "@/lib/extraction";
import { extractionRulesFrom, structuralAnomaly } from "@/lib/gpa/extractRecords";
import { runGpaPipeline, type PipelineDeps } from "@/lib/gpa/pipeline";
import { createRecognizers } from "@/lib/gpa/recognizers";
import type { DocumentReport, GpaAnomaly, PipelineOutcome, SourceDocument } from "@/lib/gpa/types";

export type UploadedDocument = {
  filename: string;
  bytes: Uint8Array;
};

export type TextExtractor = (filename: string, bytes: Uint8Array) => Promise<ExtractedText>;

export type ProcessUploadsDeps = PipelineDeps & {
  extractText?: TextExtractor;
  concurrency?: number;
  timeoutMs?: number;
};

const DECODE_CONCURRENCY = 4;
const DECODE_TIMEOUT_MS = 60000;

type Decoded = { ok: true; result: ExtractedText } | { ok: false; error: string };

function uniqueIds(files: UploadedDocument[]) {
  const seen = new Map<string, number>();
  return files.map((file, i) => {
    const base = path.basename(file.filename || "") || `document-${i + 1}`;
    const n = (seen.get(base) ?? 0) + 1;
    seen.set(base, n);
    return n === 1 ? base : `${base} (${n})`;
  });
}

function rejectedReport(documentId: string): DocumentReport {
  return {
    documentId,
    layout: "unknown",
    registrationNumbers: [],
    entryCount: 0,
    accepted: false,
    status: "rejected",
    discardedSections: 0,
  };
}

/**
 * Decode uploads (bounded concurrency, per-file timeout) and run the GPA
 * pipeline over them in upload order. Files that cannot be decoded become
 * structural anomalies and the rest of the batch carries on.
 */
export async function processUploads(files: UploadedDocument[], deps: ProcessUploadsDeps): Promise<PipelineOutcome> {
  const recognizers = createRecognizers(extractionRulesFrom(deps.config));
  const decode = deps.extractText ?? extractDocumentText;
  const timeoutMs = deps.timeoutMs ?? DECODE_TIMEOUT_MS;
  const ids = uniqueIds(files);

  const decoded = await runWithLimit<Decoded>(
    files.map((file, i) => async (): Promise<Decoded> => {
      try {
        const result = await withTimeout(decode(file.filename, file.bytes), timeoutMs, `decode ${ids[i]}`);
        return { ok: true, result };
      } catch (e) {
        return { ok: false, error: e instanceof Error ? e.message : String(e) };
      }
    }),
    deps.concurrency ?? DECODE_CONCURRENCY
  );

  const documents: SourceDocument[] = [];
  const prior: GpaAnomaly[] = [];
  decoded.forEach((d, i) => {
    const documentId = ids[i];
    const filename = files[i].filename;
    if (!d.ok) {
      prior.push(structuralAnomaly(documentId, "UNREADABLE_DOCUMENT", `Could not read the file: ${d.error}`));
      return;
    }
    if (d.result.kind === "UNKNOWN") {
      prior.push(
        structuralAnomaly(documentId, "UNSUPPORTED_FILE_TYPE", d.result.warnings[0] || "Unsupported file type.")
      );
      return;
    }
    if (d.result.isScanned) {
      prior.push(
        structuralAnomaly(documentId, "SCANNED_DOCUMENT", "The document has no text layer; scanned sheets are not supported.")
      );
      return;
    }
    const fromName = recognizers.registrationTokensIn(path.basename(filename || ""));
    documents.push({
      documentId,
      filename,
      text: d.result.text,
      registrationNumber: fromName.length === 1 ? fromName[0] : null,
    });
  });

  const outcome = runGpaPipeline(documents, deps, prior);
  const byId = new Map(outcome.documents.map((r) => [r.documentId, r]));
  return {
    ...outcome,
    documents: ids.map((id) => byId.get(id) ?? rejectedReport(id)),
  };
}
