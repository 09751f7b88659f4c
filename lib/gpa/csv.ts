import * as XLSX from "xlsx";
import type { GpaConfig } from "@/lib/gpa/config";
import { countedGrades } from "@/lib/gpa/resultTable";
import type { ResultRow, ResultSet } from "@/lib/gpa/types";

export const RESULT_COLUMNS = [
  "registrationNumber",
  "gpa",
  "rank",
  "percentile",
  "totalCreditsCounted",
  "unranked",
] as const;

export type CsvFormat = Pick<GpaConfig, "gpaDecimals" | "percentileDecimals" | "creditDecimals">;

function fixed(value: number | null, decimals: number) {
  return value === null ? "" : value.toFixed(decimals);
}

export function resultSetToCsv(
  resultSet: ResultSet,
  format: CsvFormat,
  opts: { includeModules?: boolean } = {}
): string {
  const moduleColumns = opts.includeModules ? resultSet.moduleCodes : [];
  const rows = resultSet.records.map((record) => {
    const row: Record<string, string> = {
      registrationNumber: record.registrationNumber,
      gpa: fixed(record.gpa, format.gpaDecimals),
      rank: record.rank === null ? "" : String(record.rank),
      percentile: fixed(record.percentile, format.percentileDecimals),
      totalCreditsCounted: fixed(record.totalCreditsCounted, format.creditDecimals),
      unranked: record.unranked ? "true" : "false",
    };
    if (moduleColumns.length) {
      const grades = countedGrades(record);
      for (const code of moduleColumns) row[code] = grades[code] ?? "";
    }
    return row;
  });

  const ws = XLSX.utils.json_to_sheet(rows, { header: [...RESULT_COLUMNS, ...moduleColumns] });
  if (!rows.length) XLSX.utils.sheet_add_aoa(ws, [[...RESULT_COLUMNS, ...moduleColumns]], { origin: "A1" });
  return XLSX.utils.sheet_to_csv(ws);
}

function cellText(v: unknown) {
  if (v === null || v === undefined) return "";
  return String(v).trim();
}

function numberOrNull(v: unknown): number | null {
  const s = cellText(v);
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** Read rows written by resultSetToCsv. Extra (module) columns are ignored. */
export function parseResultCsv(csv: string): ResultRow[] {
  const wb = XLSX.read(csv, { type: "string", raw: true });
  const first = wb.SheetNames[0];
  const ws = first ? wb.Sheets[first] : undefined;
  if (!ws) return [];
  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(ws, { defval: "" });
  return records
    .map((r) => ({
      registrationNumber: cellText(r.registrationNumber),
      gpa: numberOrNull(r.gpa),
      rank: numberOrNull(r.rank),
      percentile: numberOrNull(r.percentile),
      totalCreditsCounted: numberOrNull(r.totalCreditsCounted) ?? 0,
      unranked: cellText(r.unranked).toLowerCase() === "true",
    }))
    .filter((r) => r.registrationNumber);
}
