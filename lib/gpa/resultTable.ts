import { roundTo } from "@/lib/gpa/aggregate";
import type { RankedRecord, ResultRow, ResultSet } from "@/lib/gpa/types";

export type CohortSummary = {
  studentCount: number;
  rankedCount: number;
  unrankedCount: number;
  meanGpa: number | null;
  medianGpa: number | null;
  highestGpa: number | null;
  lowestGpa: number | null;
  distribution: Array<{ gpa: number; count: number }>;
};

function compareForTable(a: RankedRecord, b: RankedRecord) {
  if (a.unranked !== b.unranked) return a.unranked ? 1 : -1;
  if (!a.unranked && !b.unranked && a.rank !== b.rank) return a.rank - b.rank;
  return a.order - b.order;
}

export function toResultRow(record: RankedRecord): ResultRow {
  return {
    registrationNumber: record.registrationNumber,
    gpa: record.gpa,
    rank: record.rank,
    percentile: record.percentile,
    totalCreditsCounted: record.totalCreditsCounted,
    unranked: record.unranked,
  };
}

export function buildResultSet(records: RankedRecord[]): ResultSet {
  const ordered = [...records].sort(compareForTable);
  const moduleCodes = new Set<string>();
  for (const record of ordered) {
    for (const detail of record.moduleDetail) moduleCodes.add(detail.moduleCode);
  }
  return {
    records: ordered,
    rows: ordered.map(toResultRow),
    moduleCodes: Array.from(moduleCodes).sort(),
    cohortSize: ordered.filter((r) => !r.unranked).length,
    studentCount: ordered.length,
  };
}

export function normalizeRegistrationQuery(query: string) {
  return String(query || "").replace(/\s+/g, "").toUpperCase();
}

export function findStudent(resultSet: ResultSet, query: string): RankedRecord | null {
  const wanted = normalizeRegistrationQuery(query);
  if (!wanted) return null;
  return resultSet.records.find((r) => normalizeRegistrationQuery(r.registrationNumber) === wanted) ?? null;
}

/** The grade token that counts for each module, for the wide student x module table. */
export function countedGrades(record: RankedRecord): Record<string, string> {
  const out: Record<string, string> = {};
  for (const detail of record.moduleDetail) {
    if (detail.exclusionReason === "DUPLICATE_MODULE") continue;
    out[detail.moduleCode] = detail.gradeToken;
  }
  return out;
}

export function summarizeCohort(resultSet: ResultSet, decimals = 2): CohortSummary {
  const gpas: number[] = [];
  for (const record of resultSet.records) {
    if (record.gpa !== null) gpas.push(record.gpa);
  }
  const sorted = [...gpas].sort((a, b) => a - b);
  const counts = new Map<number, number>();
  for (const gpa of sorted) counts.set(gpa, (counts.get(gpa) ?? 0) + 1);

  let median: number | null = null;
  if (sorted.length) {
    const mid = Math.floor(sorted.length / 2);
    median = sorted.length % 2 ? sorted[mid] : roundTo((sorted[mid - 1] + sorted[mid]) / 2, decimals);
  }

  return {
    studentCount: resultSet.studentCount,
    rankedCount: resultSet.cohortSize,
    unrankedCount: resultSet.studentCount - resultSet.cohortSize,
    meanGpa: sorted.length ? roundTo(sorted.reduce((s, g) => s + g, 0) / sorted.length, decimals) : null,
    medianGpa: median,
    highestGpa: sorted.length ? sorted[sorted.length - 1] : null,
    lowestGpa: sorted.length ? sorted[0] : null,
    distribution: Array.from(counts, ([gpa, count]) => ({ gpa, count })),
  };
}
