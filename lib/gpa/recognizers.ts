import { normalizeGradeToken, normalizeModuleCode } from "@/lib/gpa/gradeMapper";

export type ExtractionPatterns = {
  registrationPattern: string;
  modulePattern: string;
};

export type ModuleSegment = {
  moduleCode: string;
  gradeToken: string | null;
};

export type LineMatch =
  | { kind: "registration-label"; registrationNumber: string | null; rawValue: string }
  | { kind: "module-grades"; leadingGrade: string | null; segments: ModuleSegment[] }
  | { kind: "result-row"; registrationNumber: string; gradeToken: string }
  | { kind: "grade-only"; gradeToken: string };

export type LineRecognizer = {
  name: LineMatch["kind"];
  apply: (line: string) => LineMatch | null;
};

export type Recognizers = {
  rules: readonly LineRecognizer[];
  classify: (line: string) => LineMatch | null;
  parseRegistrationValue: (value: string) => string | null;
  registrationTokensIn: (text: string) => string[];
  moduleCodeIn: (text: string) => string | null;
};

// Letter grades are upper-case only so the article "a" in module titles is not read as a grade.
const LETTER_GRADE = /^[A-F][+-]?$/;
const GRADE_TOKEN = /^(?:[A-F][+-]?|\d{1,3}(?:\.\d+)?)$/;
const GRADE_CAPTION = /^(?:grade|result)s?\s*[:.\-]?\s*/i;
const EDGE_PUNCTUATION = /^[()[\]{},;:|]+|[()[\]{},;:|]+$/g;
const REGISTRATION_LABEL =
  /(?:\breg(?:istration)?\.?\s*(?:no\b|number\b|num\b|#)|\bstudent\s*(?:id|no|number)\b|\bindex\s*(?:no|number)\b)\.?/i;
const LABEL_SEPARATOR = /^\s*[:#.\-–]*\s*/;
const EXPLICIT_SEPARATOR = /^\s*[:#.\-–]/;
const LABEL_LEAD = /^[\s|()[\]{},;:.\-–*]*$/;
const MAX_REGISTRATION_PARTS = 6;
const MAX_ROW_PREFIX_TOKENS = 2;

export function cleanToken(raw: string) {
  return String(raw || "").replace(EDGE_PUNCTUATION, "");
}

export function isGradeToken(token: string) {
  return GRADE_TOKEN.test(token);
}

function tokensOf(text: string) {
  return String(text || "")
    .split(/\s+/)
    .map(cleanToken)
    .filter(Boolean);
}

/**
 * The last letter grade in a segment; a numeric score only when the segment
 * has no letter grade. A credits column after the grade ("A 4") is not a score.
 */
export function lastGradeToken(text: string): string | null {
  const tokens = tokensOf(text);
  let numeric: string | null = null;
  for (let i = tokens.length - 1; i >= 0; i -= 1) {
    if (LETTER_GRADE.test(tokens[i])) return normalizeGradeToken(tokens[i]);
    if (numeric === null && isGradeToken(tokens[i])) numeric = tokens[i];
  }
  return numeric === null ? null : normalizeGradeToken(numeric);
}

/** A line holding nothing but one grade, optionally captioned ("Grade: B+"). */
export function soleGradeToken(line: string): string | null {
  const tokens = tokensOf(String(line || "").replace(GRADE_CAPTION, ""));
  return tokens.length === 1 && isGradeToken(tokens[0]) ? normalizeGradeToken(tokens[0]) : null;
}

function bounded(source: string) {
  return `(?<![A-Za-z0-9])(?:${source})(?![A-Za-z0-9])`;
}

export function createRecognizers(patterns: ExtractionPatterns): Recognizers {
  const moduleSource = bounded(patterns.modulePattern);
  const registrationSource = bounded(patterns.registrationPattern);
  const wholeRegistration = new RegExp(`^(?:${patterns.registrationPattern})$`, "i");

  const moduleMatches = (text: string) => Array.from(text.matchAll(new RegExp(moduleSource, "gi")));

  const parseRegistrationValue = (value: string): string | null => {
    const parts = tokensOf(value).slice(0, MAX_REGISTRATION_PARTS);
    let acc = "";
    for (const part of parts) {
      acc += part.replace(/[-/]/g, "");
      if (wholeRegistration.test(acc)) return acc.toUpperCase();
    }
    return null;
  };

  const registrationLabel: LineRecognizer = {
    name: "registration-label",
    apply: (line) => {
      const m = REGISTRATION_LABEL.exec(line);
      if (!m) return null;
      const rest = line.slice(m.index + m[0].length);
      const rawValue = rest.replace(LABEL_SEPARATOR, "").trim();
      const registrationNumber = rawValue ? parseRegistrationValue(rawValue) : null;
      if (!registrationNumber) {
        // Without a readable value, only "Label:" or a bare "Label" at the start of a line counts.
        if (!LABEL_LEAD.test(line.slice(0, m.index))) return null;
        if (rawValue && !EXPLICIT_SEPARATOR.test(rest)) return null;
      }
      return { kind: "registration-label", registrationNumber, rawValue };
    },
  };

  const moduleGrades: LineRecognizer = {
    name: "module-grades",
    apply: (line) => {
      const hits = moduleMatches(line);
      if (!hits.length) return null;
      const segments = hits.map((hit, i) => {
        const start = (hit.index ?? 0) + hit[0].length;
        const next = hits[i + 1];
        const end = next ? next.index ?? line.length : line.length;
        return {
          moduleCode: normalizeModuleCode(hit[0]),
          gradeToken: lastGradeToken(line.slice(start, end)),
        };
      });
      return {
        kind: "module-grades",
        leadingGrade: lastGradeToken(line.slice(0, hits[0].index ?? 0)),
        segments,
      };
    },
  };

  const resultRow: LineRecognizer = {
    name: "result-row",
    apply: (line) => {
      const tokens = tokensOf(line);
      const at = tokens.slice(0, MAX_ROW_PREFIX_TOKENS + 1).findIndex((t) => wholeRegistration.test(t));
      if (at < 0) return null;
      const gradeToken = lastGradeToken(tokens.slice(at + 1).join(" "));
      if (!gradeToken) return null;
      return { kind: "result-row", registrationNumber: tokens[at].toUpperCase(), gradeToken };
    },
  };

  const gradeOnly: LineRecognizer = {
    name: "grade-only",
    apply: (line) => {
      const gradeToken = soleGradeToken(line);
      return gradeToken ? { kind: "grade-only", gradeToken } : null;
    },
  };

  const rules: readonly LineRecognizer[] = [registrationLabel, moduleGrades, resultRow, gradeOnly];

  return {
    rules,
    classify: (line) => {
      for (const rule of rules) {
        const out = rule.apply(line);
        if (out) return out;
      }
      return null;
    },
    parseRegistrationValue,
    registrationTokensIn: (text) => {
      const seen = new Set<string>();
      for (const m of String(text || "").matchAll(new RegExp(registrationSource, "gi"))) {
        seen.add(m[0].toUpperCase());
      }
      return Array.from(seen);
    },
    moduleCodeIn: (text) => {
      const first = moduleMatches(String(text || ""))[0];
      return first ? normalizeModuleCode(first[0]) : null;
    },
  };
}
