import { countLines, toNumberedLines, type NumberedLine } from "@/lib/extraction/normalize/text";
import type { GpaConfig } from "@/lib/gpa/config";
import { createRecognizers, type ExtractionPatterns, type LineMatch, type Recognizers } from "@/lib/gpa/recognizers";
import type {
  DocumentExtraction,
  RawGradeEntry,
  SourceDocument,
  StructuralAnomaly,
  StructuralAnomalyCode,
} from "@/lib/gpa/types";

export type ExtractionRules = ExtractionPatterns & {
  maxDocumentChars: number;
  maxDocumentLines: number;
};

export type ClassifiedLine = NumberedLine & { match: LineMatch | null };

export function extractionRulesFrom(config: GpaConfig): ExtractionRules {
  return {
    registrationPattern: config.registrationPattern,
    modulePattern: config.modulePattern,
    maxDocumentChars: config.maxDocumentChars,
    maxDocumentLines: config.maxDocumentLines,
  };
}

/**
 * Classify every line with the recognizers. A label with nothing after it
 * ("Registration No" in one table cell, the value in the next) takes its
 * value from the following line, which is then consumed, unless that line
 * is itself a result row.
 */
export function classifyLines(lines: NumberedLine[], recognizers: Recognizers): ClassifiedLine[] {
  const out: ClassifiedLine[] = [];
  for (let i = 0; i < lines.length; i += 1) {
    const match = recognizers.classify(lines[i].text);
    if (match?.kind === "registration-label" && !match.rawValue && i + 1 < lines.length) {
      const next = lines[i + 1];
      const nextMatch = recognizers.classify(next.text);
      const fromNext = nextMatch?.kind === "result-row" ? null : recognizers.parseRegistrationValue(next.text);
      if (fromNext) {
        out.push({ ...lines[i], match: { ...match, registrationNumber: fromNext, rawValue: next.text } });
        i += 1;
        continue;
      }
    }
    out.push({ ...lines[i], match });
  }
  return out;
}

/**
 * Module/grade pairs for transcript-style text. Pairs are matched within a
 * line first; a trailing module code without a grade waits one line for a
 * grade. Label lines switch the owning student; lines outside a valid
 * section are not attributed.
 */
export function* scanTranscriptEntries(
  lines: Iterable<ClassifiedLine>,
  documentId: string,
  initialOwner: string | null
): Generator<RawGradeEntry> {
  let owner = initialOwner;
  let pending: { moduleCode: string; lineNumber: number } | null = null;

  for (const line of lines) {
    const m = line.match;
    if (!m) {
      pending = null;
      continue;
    }

    if (m.kind === "registration-label") {
      owner = m.registrationNumber;
      pending = null;
      continue;
    }

    if (m.kind === "module-grades") {
      if (pending && m.leadingGrade && owner) {
        yield { registrationNumber: owner, moduleCode: pending.moduleCode, gradeToken: m.leadingGrade, documentId, lineNumber: pending.lineNumber };
      }
      pending = null;
      const last = m.segments.length - 1;
      for (let i = 0; i <= last; i += 1) {
        const seg = m.segments[i];
        if (seg.gradeToken) {
          if (owner) {
            yield { registrationNumber: owner, moduleCode: seg.moduleCode, gradeToken: seg.gradeToken, documentId, lineNumber: line.lineNumber };
          }
        } else if (i === last) {
          pending = { moduleCode: seg.moduleCode, lineNumber: line.lineNumber };
        }
      }
      continue;
    }

    if (m.kind === "grade-only" && pending && owner) {
      yield { registrationNumber: owner, moduleCode: pending.moduleCode, gradeToken: m.gradeToken, documentId, lineNumber: pending.lineNumber };
    }
    pending = null;
  }
}

/** One entry per registration row of a single-module result sheet. */
export function* scanResultRows(
  lines: Iterable<ClassifiedLine>,
  documentId: string,
  moduleCode: string
): Generator<RawGradeEntry> {
  for (const line of lines) {
    if (line.match?.kind !== "result-row") continue;
    yield {
      registrationNumber: line.match.registrationNumber,
      moduleCode,
      gradeToken: line.match.gradeToken,
      documentId,
      lineNumber: line.lineNumber,
    };
  }
}

function distinct(values: string[]) {
  return Array.from(new Set(values));
}

function firstModuleCode(lines: ClassifiedLine[]): string | null {
  for (const line of lines) {
    if (line.match?.kind === "module-grades") return line.match.segments[0]?.moduleCode ?? null;
  }
  return null;
}

export function structuralAnomaly(
  documentId: string,
  code: StructuralAnomalyCode,
  message: string,
  lineNumber: number | null = null
): StructuralAnomaly {
  return { kind: "STRUCTURAL_ANOMALY", severity: "error", code, documentId, lineNumber, message };
}

export function extractDocument(
  doc: SourceDocument,
  rules: ExtractionRules,
  recognizers: Recognizers = createRecognizers(rules)
): DocumentExtraction {
  const { documentId } = doc;
  const text = doc.text || "";
  const anomalies: StructuralAnomaly[] = [];

  const lineCount = countLines(text);
  if (text.length > rules.maxDocumentChars || lineCount > rules.maxDocumentLines) {
    return {
      documentId,
      layout: "unknown",
      registrationNumbers: [],
      entries: [],
      anomalies: [
        structuralAnomaly(
          documentId,
          "DOCUMENT_TOO_LARGE",
          `Document has ${text.length} characters on ${lineCount} lines; the limit is ${rules.maxDocumentChars} characters and ${rules.maxDocumentLines} lines.`
        ),
      ],
    };
  }

  const lines = classifyLines(toNumberedLines(text), recognizers);
  let layout: DocumentExtraction["layout"] = "transcript";
  let entries: RawGradeEntry[] = [];

  const labels = lines.filter((l) => l.match?.kind === "registration-label");
  const validLabels = labels.filter((l) => l.match?.kind === "registration-label" && l.match.registrationNumber);
  const resultRows = lines.filter((l) => l.match?.kind === "result-row").length;
  const gradedModuleLines = lines.filter(
    (l) => l.match?.kind === "module-grades" && l.match.segments.some((s) => s.gradeToken)
  ).length;
  // A "Registration Number" column header on a result sheet is not a section label.
  const isModuleSheet = !validLabels.length && resultRows > 0 && resultRows >= gradedModuleLines;

  if (labels.length && !isModuleSheet) {
    for (const label of labels) {
      if (label.match?.kind !== "registration-label" || label.match.registrationNumber) continue;
      const shown = label.match.rawValue ? `"${label.match.rawValue}"` : "an empty value";
      anomalies.push(
        structuralAnomaly(
          documentId,
          "MALFORMED_REGISTRATION",
          `Registration number label has ${shown}; grades in this section cannot be attributed.`,
          label.lineNumber
        )
      );
    }
    entries = Array.from(scanTranscriptEntries(lines, documentId, null));
  } else if (isModuleSheet) {
    layout = "module-sheet";
    const moduleCode = recognizers.moduleCodeIn(doc.filename || "") ?? firstModuleCode(lines);
    if (!moduleCode) {
      anomalies.push(
        structuralAnomaly(documentId, "MISSING_MODULE_CODE", "Result sheet rows found, but no module code in the filename or text.")
      );
    } else {
      entries = Array.from(scanResultRows(lines, documentId, moduleCode));
    }
  } else {
    const hint = doc.registrationNumber ? recognizers.parseRegistrationValue(doc.registrationNumber) : null;
    const candidates = recognizers.registrationTokensIn(text);
    const owner = hint ?? (candidates.length === 1 ? candidates[0] : null);
    if (!owner) {
      anomalies.push(
        structuralAnomaly(
          documentId,
          "MISSING_REGISTRATION",
          candidates.length
            ? `Found ${candidates.length} different registration numbers and no label saying which one owns the document.`
            : "No registration number found."
        )
      );
    } else {
      entries = Array.from(scanTranscriptEntries(lines, documentId, owner));
    }
  }

  if (!entries.length && !anomalies.length) {
    anomalies.push(structuralAnomaly(documentId, "NO_GRADE_ENTRIES", "No module code and grade pairs found."));
  }

  return {
    documentId,
    layout,
    registrationNumbers: distinct(entries.map((e) => e.registrationNumber)),
    entries,
    anomalies,
  };
}
