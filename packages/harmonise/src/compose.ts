import type {
  ComposeSources,
  CompositionDiagnostics,
  DiagnosticWarning,
  JoinStepSummary,
  KeyShape,
  PipelineViolation,
  Row,
  SourceRole,
  SourceTable,
  Table,
} from "../../schema/src/schema.js";
import { KEY_COLUMNS, LAD_CODE, SOURCE_CONTRACTS, YEAR } from "../../schema/src/contracts.js";
import { checkDistinctLabels, checkRequiredColumns, checkUniqueKeys } from "../../schema/src/invariants.js";
import { ladYearId, ladYearOf, sortByLadYear, strOrNull } from "../../schema/src/table.js";
import { computeMissingCombinations, computeMissingLads, ladYearKeys, unionKeys } from "./coverage.js";

/**
 * How a joined column that already exists on the left side is resolved.
 *
 * KEEP_FIRST: the first-joined source's column wins, later duplicates are dropped.
 * SUPERSEDE:  the joined source replaces the earlier column (last writer wins);
 *             the column moves to the end of the column list.
 */
export type ColumnCollision = "KEEP_FIRST" | "SUPERSEDE";

export type JoinStep = {
  role: Exclude<SourceRole, "emissions">;
  on: KeyShape;
  carry: "ALL" | string[];
  collision: ColumnCollision;
};

// Order is significant: emissions is the left-most table, every step is an inner join.
export const JOIN_PLAN: readonly JoinStep[] = [
  { role: "fuel", on: "LAD_YEAR", carry: "ALL", collision: "KEEP_FIRST" },
  { role: "population", on: "LAD_YEAR", carry: ["population"], collision: "SUPERSEDE" },
  { role: "deprivation", on: "LAD", carry: ["imd_rank_avg"], collision: "KEEP_FIRST" },
];

export type ComposeResult =
  | { ok: true; base: Table; diagnostics: CompositionDiagnostics }
  | { ok: false; violations: PipelineViolation[] };

/**
 * Join harmonised sources into the base LAD-year table.
 *
 * Expects tables that went through `filterAndNormalise` (string lad_code,
 * integer year). Contract and key checks run first; any violation aborts
 * before a single join. Coverage is computed from the pre-join key sets.
 */
export function compose(sources: ComposeSources): ComposeResult {
  const present = presentSources(sources);

  const violations: PipelineViolation[] = [
    ...checkDistinctLabels(present.map(([, s]) => s.label), "compose"),
  ];
  for (const [role, s] of present) {
    const contract = SOURCE_CONTRACTS[role];
    const missing = checkRequiredColumns(s.table, contract.required, s.label, "compose");
    violations.push(...missing);
    if (missing.length === 0) violations.push(...checkUniqueKeys(s.table, contract.key, s.label, "compose"));
  }
  if (violations.length > 0) return { ok: false, violations };

  // ---- Coverage (report-only)
  const annual = [sources.emissions, sources.fuel, sources.population];
  const coverage = computeMissingCombinations(annual);
  if (sources.deprivation) {
    const union = unionKeys(annual.map((s) => ladYearKeys(s.table)));
    coverage[sources.deprivation.label] = computeMissingLads(union, sources.deprivation.table);
  }

  // ---- Ordered joins
  let left: Table = {
    columns: [...sources.emissions.table.columns],
    rows: sources.emissions.table.rows.map((r) => ({ ...r })),
  };
  const steps: JoinStepSummary[] = [];
  const warnings: DiagnosticWarning[] = [];

  for (const step of JOIN_PLAN) {
    const right = sources[step.role];
    if (!right) continue;

    const joined = innerJoin(left, right.table, step);
    steps.push({
      source: right.label,
      on: step.on,
      left_rows: left.rows.length,
      right_rows: right.table.rows.length,
      out_rows: joined.rows.length,
    });
    if (joined.rows.length === 0) {
      warnings.push({
        code: "EMPTY_JOIN",
        source: right.label,
        message: `Join with '${right.label}' on ${step.on} produced zero rows; check key normalisation`,
      });
    }
    left = joined;
  }

  const columns = orderColumns(left.columns);
  const base: Table = {
    columns,
    rows: sortByLadYear(left.rows).map((r) => project(r, columns)),
  };

  return { ok: true, base, diagnostics: { coverage, steps, warnings } };
}

/* ------------------------------ joins ------------------------------- */

function innerJoin(left: Table, right: Table, step: JoinStep): Table {
  const keyCols = step.on === "LAD_YEAR" ? [LAD_CODE, YEAR] : [LAD_CODE];
  const carried =
    step.carry === "ALL" ? right.columns.filter((c) => !keyCols.includes(c)) : step.carry;

  let columns: string[];
  let taken: string[];
  if (step.collision === "SUPERSEDE") {
    columns = [...left.columns.filter((c) => !carried.includes(c)), ...carried];
    taken = carried;
  } else {
    taken = carried.filter((c) => !left.columns.includes(c));
    columns = [...left.columns, ...taken];
  }

  const index = new Map<string, Row>();
  for (const r of right.rows) {
    const id = joinKey(r, step.on);
    if (id != null) index.set(id, r);
  }

  const rows: Row[] = [];
  for (const l of left.rows) {
    const id = joinKey(l, step.on);
    const r = id == null ? undefined : index.get(id);
    if (!r) continue;

    const out: Row = { ...l };
    for (const c of taken) out[c] = r[c] ?? null;
    rows.push(out);
  }

  return { columns, rows };
}

function joinKey(r: Row, on: KeyShape): string | null {
  if (on === "LAD") return strOrNull(r[LAD_CODE]);
  const k = ladYearOf(r);
  return k ? ladYearId(k.lad_code, k.year) : null;
}

/* ----------------------------- helpers ------------------------------ */

function presentSources(s: ComposeSources): Array<[SourceRole, SourceTable]> {
  const out: Array<[SourceRole, SourceTable]> = [
    ["emissions", s.emissions],
    ["fuel", s.fuel],
    ["population", s.population],
  ];
  if (s.deprivation) out.push(["deprivation", s.deprivation]);
  return out;
}

function orderColumns(columns: string[]): string[] {
  const lead: string[] = KEY_COLUMNS.filter((c) => columns.includes(c));
  return [...lead, ...columns.filter((c) => !lead.includes(c))];
}

function project(r: Row, columns: string[]): Row {
  const out: Row = {};
  for (const c of columns) out[c] = r[c] ?? null;
  return out;
}
