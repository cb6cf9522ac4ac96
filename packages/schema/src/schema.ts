// LAD-year table model
// Types only. No functions.

/* ------------------------------- Tables ------------------------------ */

// null is the only missing value; writers emit it as an empty cell.
export type Cell = string | number | null;

export type Row = Record<string, Cell>;

export interface Table {
  columns: string[];
  rows: Row[];
}

/* ------------------------------- Sources ----------------------------- */

export type SourceRole = "emissions" | "fuel" | "population" | "deprivation";

export type KeyShape = "LAD_YEAR" | "LAD";

export interface SourceTable {
  label: string;
  table: Table;
}

export interface ComposeSources {
  emissions: SourceTable;
  fuel: SourceTable;
  population: SourceTable;
  deprivation?: SourceTable;
}

export interface SourceContract {
  role: SourceRole;
  key: KeyShape;
  required: string[];
}

/* -------------------------------- Keys ------------------------------- */

export interface LadYearKey {
  lad_code: string;
  year: number;
}

// Serialised as a JSON pair in diagnostics artifacts.
export type LadYearPair = [string, number];

/* ----------------------------- Diagnostics --------------------------- */

export interface CoverageGap {
  missing_count: number;
  missing_examples: LadYearPair[]; // first 20, ordered by (lad_code, year)
}

export type CoverageReport = Record<string, CoverageGap>;

export type DiagnosticWarningCode = "EMPTY_JOIN";

export interface DiagnosticWarning {
  code: DiagnosticWarningCode;
  message: string;
  source: string;
}

export interface JoinStepSummary {
  source: string;
  on: KeyShape;
  left_rows: number;
  right_rows: number;
  out_rows: number;
}

export interface CompositionDiagnostics {
  coverage: CoverageReport;
  steps: JoinStepSummary[];
  warnings: DiagnosticWarning[];
}

export interface ScoringSummary {
  rows: number;
  cols: number;
  years: { min: number | null; max: number | null };
  lads: number;
}

/* ------------------------------- Errors ------------------------------ */

export type PipelineStage = "config" | "load" | "harmonise" | "compose" | "score" | "snapshot";

export type PipelineViolationCode =
  | "MISSING_COLUMN"
  | "DUPLICATE_KEY"
  | "DUPLICATE_SOURCE_LABEL"
  | "INVALID_YEAR"
  | "SOURCE_UNREADABLE"
  | "INVALID_CONFIG";

export interface PipelineViolation {
  code: PipelineViolationCode;
  stage: PipelineStage;
  message: string;
  source?: string;
  column?: string;
  meta?: Record<string, unknown> | null;
}
