import type { GpaConfig } from "@/lib/gpa/config";
import { GpaConfigError } from "@/lib/gpa/errors";

export type GradeScale = Pick<
  GpaConfig,
  "scaleMax" | "gradePoints" | "scoreBands" | "moduleCredits" | "defaultCreditWeight"
>;

export type GradeMapper = {
  readonly scaleMax: number;
  readonly defaultCreditWeight: number;
  gradePointOf(token: string): number | null;
  creditWeightOf(moduleCode: string): number;
  hasModule(moduleCode: string): boolean;
};

const NUMERIC_SCORE = /^\d{1,3}(?:\.\d+)?$/;

export function normalizeGradeToken(value: unknown): string {
  return String(value ?? "").replace(/\s+/g, "").toUpperCase();
}

export function normalizeModuleCode(value: unknown): string {
  return String(value ?? "").replace(/\s+/g, "").toUpperCase();
}

function assertPoint(point: number, scaleMax: number, field: string, label: string) {
  if (!Number.isFinite(point) || point < 0 || point > scaleMax) {
    throw new GpaConfigError({
      message: `${label} maps to ${point}, outside the 0..${scaleMax} scale.`,
      code: "GPA_POINT_OUT_OF_SCALE",
      field,
    });
  }
}

/**
 * Read-only lookup over a grade table, numeric score bands and module credits.
 * Unknown grade tokens return null; unknown modules fall back to the default weight.
 */
export function createGradeMapper(scale: GradeScale): GradeMapper {
  const { scaleMax, defaultCreditWeight } = scale;
  if (!Number.isFinite(scaleMax) || scaleMax <= 0) {
    throw new GpaConfigError({ message: `Invalid scale maximum: ${scaleMax}.`, field: "scaleMax" });
  }
  if (!Number.isFinite(defaultCreditWeight) || defaultCreditWeight <= 0) {
    throw new GpaConfigError({
      message: `Default credit weight must be positive, got ${defaultCreditWeight}.`,
      field: "defaultCreditWeight",
    });
  }

  const points = new Map<string, number>();
  for (const [token, point] of Object.entries(scale.gradePoints)) {
    const key = normalizeGradeToken(token);
    assertPoint(point, scaleMax, "gradePoints", `Grade ${key}`);
    points.set(key, point);
  }

  const bands = [...scale.scoreBands].sort((a, b) => b.minScore - a.minScore);
  for (const band of bands) {
    assertPoint(band.gradePoint, scaleMax, "scoreBands", `Score band ${band.minScore}`);
  }

  const credits = new Map<string, number>();
  for (const [code, weight] of Object.entries(scale.moduleCredits)) {
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new GpaConfigError({
        message: `Module ${code} has a non-positive credit weight (${weight}).`,
        field: "moduleCredits",
      });
    }
    credits.set(normalizeModuleCode(code), weight);
  }

  const gradePointOf = (token: string): number | null => {
    const key = normalizeGradeToken(token);
    if (!key) return null;
    const direct = points.get(key);
    if (direct !== undefined) return direct;
    if (!NUMERIC_SCORE.test(key)) return null;
    const score = Number(key);
    if (score > 100) return null;
    const band = bands.find((b) => score >= b.minScore);
    return band ? band.gradePoint : null;
  };

  return Object.freeze({
    scaleMax,
    defaultCreditWeight,
    gradePointOf,
    creditWeightOf: (moduleCode: string) => credits.get(normalizeModuleCode(moduleCode)) ?? defaultCreditWeight,
    hasModule: (moduleCode: string) => credits.has(normalizeModuleCode(moduleCode)),
  });
}
