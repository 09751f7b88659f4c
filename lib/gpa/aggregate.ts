import type { GradeMapper } from "@/lib/gpa/gradeMapper";
import type { GpaAnomaly, ModuleDetail, RawGradeEntry, StudentGpaRecord } from "@/lib/gpa/types";

export type AggregateOptions = {
  gpaDecimals: number;
};

export type AggregateResult = {
  records: StudentGpaRecord[];
  anomalies: GpaAnomaly[];
};

export function roundTo(value: number, decimals: number) {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

function groupByRegistration(entries: Iterable<RawGradeEntry>) {
  const groups = new Map<string, RawGradeEntry[]>();
  for (const entry of entries) {
    const bucket = groups.get(entry.registrationNumber);
    if (bucket) bucket.push(entry);
    else groups.set(entry.registrationNumber, [entry]);
  }
  return groups;
}

function buildStudent(
  registrationNumber: string,
  entries: RawGradeEntry[],
  order: number,
  mapper: GradeMapper,
  options: AggregateOptions,
  anomalies: GpaAnomaly[]
): StudentGpaRecord {
  const lastIndexByModule = new Map<string, number>();
  entries.forEach((e, i) => lastIndexByModule.set(e.moduleCode, i));

  let weightedPoints = 0;
  let credits = 0;

  const moduleDetail: ModuleDetail[] = entries.map((entry, i) => {
    const gradePoint = mapper.gradePointOf(entry.gradeToken);
    const known = mapper.hasModule(entry.moduleCode);
    const creditWeight = mapper.creditWeightOf(entry.moduleCode);
    const superseded = lastIndexByModule.get(entry.moduleCode) !== i;

    if (!known) {
      anomalies.push({
        kind: "UNRECOGNIZED_MODULE",
        severity: "info",
        documentId: entry.documentId,
        registrationNumber,
        moduleCode: entry.moduleCode,
        creditWeight,
        message: `${entry.moduleCode} is not in the credit table; default weight ${creditWeight} used.`,
      });
    }
    if (gradePoint === null) {
      anomalies.push({
        kind: "UNRECOGNIZED_GRADE",
        severity: "warning",
        documentId: entry.documentId,
        registrationNumber,
        moduleCode: entry.moduleCode,
        gradeToken: entry.gradeToken,
        message: `Grade "${entry.gradeToken}" for ${entry.moduleCode} is not in the grade table; excluded from GPA.`,
      });
    }

    const exclusionReason = superseded ? "DUPLICATE_MODULE" : gradePoint === null ? "UNRECOGNIZED_GRADE" : null;
    const included = exclusionReason === null;
    if (included && gradePoint !== null) {
      weightedPoints += gradePoint * creditWeight;
      credits += creditWeight;
    }

    return {
      moduleCode: entry.moduleCode,
      gradeToken: entry.gradeToken,
      gradePoint,
      creditWeight,
      creditSource: known ? "MODULE_TABLE" : "DEFAULT",
      included,
      exclusionReason,
      documentId: entry.documentId,
      lineNumber: entry.lineNumber,
    };
  });

  const gpa = credits > 0 ? roundTo(weightedPoints / credits, options.gpaDecimals) : null;
  if (gpa === null) {
    anomalies.push({
      kind: "UNDEFINED_GPA",
      severity: "warning",
      registrationNumber,
      message: `${registrationNumber} has no counted credits; GPA is undefined and the student is not ranked.`,
    });
  }

  return {
    registrationNumber,
    gpa,
    totalCreditsCounted: roundTo(credits, 6),
    moduleDetail,
    order,
  };
}

/**
 * Credit-weighted GPA per registration number, in first-seen order.
 * When a module repeats for a student the last occurrence counts.
 */
export function aggregateGpa(
  entries: Iterable<RawGradeEntry>,
  mapper: GradeMapper,
  options: AggregateOptions
): AggregateResult {
  const anomalies: GpaAnomaly[] = [];
  const records: StudentGpaRecord[] = [];
  let order = 0;
  for (const [registrationNumber, group] of groupByRegistration(entries)) {
    records.push(buildStudent(registrationNumber, group, order, mapper, options, anomalies));
    order += 1;
  }
  return { records, anomalies };
}
