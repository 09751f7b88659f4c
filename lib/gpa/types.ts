export type SourceDocument = {
  documentId: string;
  filename?: string | null;
  text: string;
  /** Owner supplied by the caller (e.g. taken from the upload filename). */
  registrationNumber?: string | null;
};

export type RawGradeEntry = {
  registrationNumber: string;
  moduleCode: string;
  gradeToken: string;
  documentId: string;
  lineNumber: number;
};

export type DocumentLayout = "transcript" | "module-sheet" | "unknown";

export type StructuralAnomalyCode =
  | "MISSING_REGISTRATION"
  | "MALFORMED_REGISTRATION"
  | "MISSING_MODULE_CODE"
  | "NO_GRADE_ENTRIES"
  | "DOCUMENT_TOO_LARGE"
  | "UNREADABLE_DOCUMENT"
  | "UNSUPPORTED_FILE_TYPE"
  | "SCANNED_DOCUMENT";

export type AnomalySeverity = "error" | "warning" | "info";

export type StructuralAnomaly = {
  kind: "STRUCTURAL_ANOMALY";
  severity: "error";
  code: StructuralAnomalyCode;
  documentId: string;
  lineNumber: number | null;
  message: string;
};

export type UnrecognizedGradeAnomaly = {
  kind: "UNRECOGNIZED_GRADE";
  severity: "warning";
  documentId: string;
  registrationNumber: string;
  moduleCode: string;
  gradeToken: string;
  message: string;
};

export type UnrecognizedModuleAnomaly = {
  kind: "UNRECOGNIZED_MODULE";
  severity: "info";
  documentId: string;
  registrationNumber: string;
  moduleCode: string;
  creditWeight: number;
  message: string;
};

export type UndefinedGpaAnomaly = {
  kind: "UNDEFINED_GPA";
  severity: "warning";
  registrationNumber: string;
  message: string;
};

export type GpaAnomaly =
  | StructuralAnomaly
  | UnrecognizedGradeAnomaly
  | UnrecognizedModuleAnomaly
  | UndefinedGpaAnomaly;

export type DocumentExtraction = {
  documentId: string;
  layout: DocumentLayout;
  registrationNumbers: string[];
  entries: RawGradeEntry[];
  anomalies: StructuralAnomaly[];
};

export type CreditSource = "MODULE_TABLE" | "DEFAULT";
export type ExclusionReason = "UNRECOGNIZED_GRADE" | "DUPLICATE_MODULE";

export type ModuleDetail = {
  moduleCode: string;
  gradeToken: string;
  gradePoint: number | null;
  creditWeight: number;
  creditSource: CreditSource;
  included: boolean;
  exclusionReason: ExclusionReason | null;
  documentId: string;
  lineNumber: number;
};

export type StudentGpaRecord = {
  registrationNumber: string;
  /** null when no credit was counted; never 0 as a stand-in. */
  gpa: number | null;
  totalCreditsCounted: number;
  moduleDetail: ModuleDetail[];
  /** First-seen position across the batch. */
  order: number;
};

export type RankedRecord = StudentGpaRecord &
  (
    | { unranked: false; rank: number; percentile: number }
    | { unranked: true; rank: null; percentile: null }
  );

export type ResultRow = {
  registrationNumber: string;
  gpa: number | null;
  rank: number | null;
  percentile: number | null;
  totalCreditsCounted: number;
  unranked: boolean;
};

export type ResultSet = {
  records: RankedRecord[];
  rows: ResultRow[];
  moduleCodes: string[];
  /** Number of ranked students (N in the percentile formula). */
  cohortSize: number;
  studentCount: number;
};

/** partial: entries were kept, but some sections of the document were discarded. */
export type DocumentStatus = "accepted" | "partial" | "rejected";

export type DocumentReport = {
  documentId: string;
  layout: DocumentLayout;
  registrationNumbers: string[];
  entryCount: number;
  accepted: boolean;
  status: DocumentStatus;
  discardedSections: number;
};

export type PipelineOutcome = {
  resultSet: ResultSet;
  anomalies: GpaAnomaly[];
  documents: DocumentReport[];
};
