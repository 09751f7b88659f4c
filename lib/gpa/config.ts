import fs from "node:fs";
import path from "node:path";
import defaultScale from "@/config/default-grade-scale.json";
import { createGradeMapper, normalizeGradeToken, normalizeModuleCode, type GradeMapper } from "@/lib/gpa/gradeMapper";

export type PercentileMethod = "spread" | "cohort";

export type ScoreBand = { minScore: number; gradePoint: number };

export type GpaConfig = {
  scaleMax: number;
  gradePoints: Record<string, number>;
  scoreBands: ScoreBand[];
  moduleCredits: Record<string, number>;
  defaultCreditWeight: number;
  gpaDecimals: number;
  percentileDecimals: number;
  creditDecimals: number;
  percentileMethod: PercentileMethod;
  registrationPattern: string;
  modulePattern: string;
  maxDocumentChars: number;
  maxDocumentLines: number;
};

export type GpaConfigSource = "default" | "settings";

const FALLBACK_SCALE_MAX = 4;
const FALLBACK_REGISTRATION_PATTERN = "[A-Z]{2}\\d{8}";
const FALLBACK_MODULE_PATTERN = "[A-Z]{2,4}\\d{4}";

function configFilePath() {
  return process.env.GPA_CONFIG_PATH || path.join(process.cwd(), ".gpa-config.json");
}

function warnConfig(field: string, message: string) {
  console.warn(JSON.stringify({ level: "warn", scope: "gpa-config", field, message }));
}

function entriesOf(v: unknown): Array<[string, unknown]> {
  if (!v || typeof v !== "object" || Array.isArray(v)) return [];
  return Object.entries(v);
}

function toRecord(v: unknown): Record<string, unknown> {
  return Object.fromEntries(entriesOf(v));
}

function normalizeNumber(v: unknown, fallback: number, min: number, max: number): number {
  const n = Number(v);
  if (v === null || v === undefined || v === "" || !Number.isFinite(n)) return fallback;
  if (n < min || n > max) return fallback;
  return n;
}

function normalizeSmallInt(v: unknown, fallback: number, min: number, max: number): number {
  const n = Number(v);
  if (v === null || v === undefined || v === "" || !Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, Math.round(n)));
}

function normalizePercentileMethod(v: unknown, fallback: PercentileMethod): PercentileMethod {
  const x = String(v || "").trim().toLowerCase();
  if (x === "spread" || x === "cohort") return x;
  return fallback;
}

function normalizePointTable(v: unknown, scaleMax: number, fallback: Record<string, number>) {
  const src = entriesOf(v);
  if (!src.length) return fallback;
  const out: Record<string, number> = {};
  for (const [rawToken, rawPoint] of src) {
    const token = normalizeGradeToken(rawToken);
    const point = Number(rawPoint);
    if (!token) continue;
    if (!Number.isFinite(point) || point < 0 || point > scaleMax) {
      warnConfig("gradePoints", `Dropped ${token}: ${String(rawPoint)} is outside 0..${scaleMax}.`);
      continue;
    }
    out[token] = point;
  }
  return Object.keys(out).length ? out : fallback;
}

function normalizeScoreBands(v: unknown, scaleMax: number, fallback: ScoreBand[]): ScoreBand[] {
  if (!Array.isArray(v)) return fallback;
  const seen = new Set<number>();
  const out: ScoreBand[] = [];
  for (const raw of v) {
    const band = toRecord(raw);
    const minScore = Number(band.minScore);
    const gradePoint = Number(band.gradePoint);
    if (!Number.isFinite(minScore) || minScore < 0 || minScore > 100) continue;
    if (!Number.isFinite(gradePoint) || gradePoint < 0 || gradePoint > scaleMax) {
      warnConfig("scoreBands", `Dropped band ${minScore}: ${String(band.gradePoint)} is outside 0..${scaleMax}.`);
      continue;
    }
    if (seen.has(minScore)) continue;
    seen.add(minScore);
    out.push({ minScore, gradePoint });
  }
  return out.sort((a, b) => b.minScore - a.minScore);
}

function normalizeCreditTable(v: unknown, fallback: Record<string, number>) {
  const src = entriesOf(v);
  if (!src.length) return fallback;
  const out: Record<string, number> = {};
  for (const [rawCode, rawCredits] of src) {
    const code = normalizeModuleCode(rawCode);
    const credits = Number(rawCredits);
    if (!code) continue;
    if (!Number.isFinite(credits) || credits <= 0) {
      warnConfig("moduleCredits", `Dropped ${code}: credit weight must be positive.`);
      continue;
    }
    out[code] = credits;
  }
  return out;
}

function normalizePattern(v: unknown, field: string, fallback: string): string {
  const source = String(v || "").trim();
  if (!source) return fallback;
  try {
    const whole = new RegExp(`^(?:${source})$`, "i");
    if (whole.test("")) {
      warnConfig(field, "Pattern matches an empty string; using the previous pattern.");
      return fallback;
    }
    return source;
  } catch (e) {
    warnConfig(field, `Invalid pattern (${e instanceof Error ? e.message : String(e)}); using the previous pattern.`);
    return fallback;
  }
}

function normalizeConfig(input: Record<string, unknown>, base: GpaConfig | null): GpaConfig {
  const scaleMax = normalizeNumber(input.scaleMax, base?.scaleMax ?? FALLBACK_SCALE_MAX, 0.5, 100);
  return {
    scaleMax,
    gradePoints: normalizePointTable(input.gradePoints, scaleMax, base?.gradePoints ?? {}),
    scoreBands: normalizeScoreBands(input.scoreBands, scaleMax, base?.scoreBands ?? []),
    moduleCredits: normalizeCreditTable(input.moduleCredits, base?.moduleCredits ?? {}),
    defaultCreditWeight: normalizeNumber(input.defaultCreditWeight, base?.defaultCreditWeight ?? 1, 0.01, 1000),
    gpaDecimals: normalizeSmallInt(input.gpaDecimals, base?.gpaDecimals ?? 2, 0, 6),
    percentileDecimals: normalizeSmallInt(input.percentileDecimals, base?.percentileDecimals ?? 2, 0, 6),
    creditDecimals: normalizeSmallInt(input.creditDecimals, base?.creditDecimals ?? 1, 0, 6),
    percentileMethod: normalizePercentileMethod(input.percentileMethod, base?.percentileMethod ?? "spread"),
    registrationPattern: normalizePattern(
      input.registrationPattern,
      "registrationPattern",
      base?.registrationPattern ?? FALLBACK_REGISTRATION_PATTERN
    ),
    modulePattern: normalizePattern(input.modulePattern, "modulePattern", base?.modulePattern ?? FALLBACK_MODULE_PATTERN),
    maxDocumentChars: normalizeSmallInt(input.maxDocumentChars, base?.maxDocumentChars ?? 2_000_000, 1_000, 50_000_000),
    maxDocumentLines: normalizeSmallInt(input.maxDocumentLines, base?.maxDocumentLines ?? 50_000, 10, 1_000_000),
  };
}

export function defaultGpaConfig(): GpaConfig {
  return normalizeConfig(toRecord(defaultScale), null);
}

/** Overrides in `input` are layered on top of the shipped defaults. */
export function resolveGpaConfig(input: unknown): GpaConfig {
  return normalizeConfig(toRecord(input), defaultGpaConfig());
}

export function readGpaConfig(): { config: GpaConfig; source: GpaConfigSource } {
  const filePath = configFilePath();
  try {
    if (!fs.existsSync(filePath)) return { config: defaultGpaConfig(), source: "default" };
    const raw = fs.readFileSync(filePath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    return { config: resolveGpaConfig(parsed), source: "settings" };
  } catch (e) {
    warnConfig("file", `Could not read ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    return { config: defaultGpaConfig(), source: "default" };
  }
}

let loaded: { config: GpaConfig; source: GpaConfigSource; mapper: GradeMapper } | null = null;

function loadOnce() {
  if (!loaded) {
    const { config, source } = readGpaConfig();
    loaded = { config, source, mapper: createGradeMapper(config) };
  }
  return loaded;
}

/** Process-wide configuration, read on first use and never reloaded. */
export function getGpaConfig() {
  const { config, source } = loadOnce();
  return { config, source };
}

export function getGradeMapper(): GradeMapper {
  return loadOnce().mapper;
}
