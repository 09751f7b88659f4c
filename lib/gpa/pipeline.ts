import { aggregateGpa } from "@/lib/gpa/aggregate";
import type { GpaConfig } from "@/lib/gpa/config";
import { GpaBatchError } from "@/lib/gpa/errors";
import { extractDocument, extractionRulesFrom } from "@/lib/gpa/extractRecords";
import type { GradeMapper } from "@/lib/gpa/gradeMapper";
import { rankRecords } from "@/lib/gpa/rank";
import { createRecognizers } from "@/lib/gpa/recognizers";
import { buildResultSet } from "@/lib/gpa/resultTable";
import type {
  DocumentExtraction,
  DocumentReport,
  GpaAnomaly,
  PipelineOutcome,
  RawGradeEntry,
  SourceDocument,
} from "@/lib/gpa/types";

export type PipelineDeps = {
  config: GpaConfig;
  mapper: GradeMapper;
};

function toReport(extraction: DocumentExtraction): DocumentReport {
  const accepted = extraction.entries.length > 0;
  const discardedSections = extraction.anomalies.filter((a) => a.code === "MALFORMED_REGISTRATION").length;
  return {
    documentId: extraction.documentId,
    layout: extraction.layout,
    registrationNumbers: extraction.registrationNumbers,
    entryCount: extraction.entries.length,
    accepted,
    status: !accepted ? "rejected" : extraction.anomalies.length ? "partial" : "accepted",
    discardedSections,
  };
}

/**
 * Documents -> ranked result set. Per-entry and per-document problems are
 * returned as anomalies; the run only fails when nothing at all was usable.
 * `priorAnomalies` carries problems found before extraction (e.g. unreadable files).
 */
export function runGpaPipeline(
  documents: SourceDocument[],
  deps: PipelineDeps,
  priorAnomalies: GpaAnomaly[] = []
): PipelineOutcome {
  const { config, mapper } = deps;
  const rules = extractionRulesFrom(config);
  const recognizers = createRecognizers(rules);

  const extractions = documents.map((doc) => extractDocument(doc, rules, recognizers));
  const entries: RawGradeEntry[] = extractions.flatMap((x) => x.entries);
  const anomalies: GpaAnomaly[] = [...priorAnomalies, ...extractions.flatMap((x) => x.anomalies)];

  if (!entries.length) {
    throw new GpaBatchError({
      message: `No grade entries could be read from ${documents.length} document(s).`,
      anomalies,
    });
  }

  const aggregated = aggregateGpa(entries, mapper, { gpaDecimals: config.gpaDecimals });
  anomalies.push(...aggregated.anomalies);

  const ranked = rankRecords(aggregated.records, {
    percentileMethod: config.percentileMethod,
    percentileDecimals: config.percentileDecimals,
  });

  return {
    resultSet: buildResultSet(ranked),
    anomalies,
    documents: extractions.map(toReport),
  };
}
