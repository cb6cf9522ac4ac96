import type { Cell, PipelineStage, PipelineViolation, Row, Table } from "../../schema/src/schema.js";
import { LAD_CODE, MISSING_KEY_LITERALS, YEAR } from "../../schema/src/contracts.js";
import { hasColumn, strOrNull } from "../../schema/src/table.js";

export type YearWindowOption = { min?: number; max?: number };

export type HarmoniseOptions = {
  source?: string; // label used in violation messages
  years?: YearWindowOption;
};

export type HarmoniseCounts = {
  input_rows: number;
  missing_key: number;
  outside_jurisdiction: number;
  outside_years: number;
  output_rows: number;
};

export type HarmoniseResult =
  | { ok: true; table: Table; counts: HarmoniseCounts }
  | { ok: false; violations: PipelineViolation[] };

export type YearCoercionResult =
  | { ok: true; table: Table }
  | { ok: false; violations: PipelineViolation[] };

/**
 * Normalise the LAD key of a source table and restrict it to a jurisdiction.
 *
 * - key cells become trimmed strings; null, blank and "nan"/"NaN"/"None" rows are dropped
 * - only keys starting with one of `prefixes` are kept
 * - `year` (when present) is coerced to an integer on every kept row; failure is fatal
 * - the optional year window is applied after coercion
 *
 * The caller's table is never touched: every kept row is a fresh object.
 */
export function filterAndNormalise(
  table: Table,
  prefixes: readonly string[],
  opts: HarmoniseOptions = {}
): HarmoniseResult {
  const source = opts.source ?? "source";

  if (!hasColumn(table, LAD_CODE)) {
    return {
      ok: false,
      violations: [
        {
          code: "MISSING_COLUMN",
          stage: "harmonise",
          source,
          column: LAD_CODE,
          message: `Source '${source}' is missing required column '${LAD_CODE}'`,
        },
      ],
    };
  }

  let missing_key = 0;
  let outside_jurisdiction = 0;
  const kept: Row[] = [];

  for (const r of table.rows) {
    const key = normaliseKey(r[LAD_CODE]);
    if (key == null) {
      missing_key++;
      continue;
    }
    if (!prefixes.some((p) => key.startsWith(p))) {
      outside_jurisdiction++;
      continue;
    }
    kept.push({ ...r, [LAD_CODE]: key });
  }

  const coerced = coerceYearColumn({ columns: [...table.columns], rows: kept }, source);
  if (!coerced.ok) return coerced;

  const windowed = applyYearWindow(coerced.table, opts.years);

  return {
    ok: true,
    table: windowed,
    counts: {
      input_rows: table.rows.length,
      missing_key,
      outside_jurisdiction,
      outside_years: coerced.table.rows.length - windowed.rows.length,
      output_rows: windowed.rows.length,
    },
  };
}

/**
 * Coerce `year` to an integer on every row. Tables without a year column
 * (static sources) are returned as a copy.
 */
export function coerceYearColumn(
  table: Table,
  source: string,
  stage: PipelineStage = "harmonise"
): YearCoercionResult {
  if (!hasColumn(table, YEAR)) {
    return { ok: true, table: { columns: [...table.columns], rows: table.rows.map((r) => ({ ...r })) } };
  }

  const violations: PipelineViolation[] = [];
  const rows = table.rows.map((r, idx) => {
    const year = coerceYear(r[YEAR]);
    if (year == null) {
      violations.push({
        code: "INVALID_YEAR",
        stage,
        source,
        column: YEAR,
        message: `Source '${source}' row ${idx}: cannot read year from ${JSON.stringify(r[YEAR] ?? null)}`,
        meta: { row: idx, value: r[YEAR] ?? null },
      });
    }
    return { ...r, [YEAR]: year };
  });

  if (violations.length > 0) return { ok: false, violations };
  return { ok: true, table: { columns: [...table.columns], rows } };
}

/* ------------------------------ helpers ------------------------------ */

export function normaliseKey(x: Cell | undefined): string | null {
  const s = strOrNull(x);
  if (s == null) return null;
  const t = s.trim();
  if (t.length === 0 || MISSING_KEY_LITERALS.has(t)) return null;
  return t;
}

const INTEGRAL_TEXT = /^[+-]?\d+(\.0+)?$/;

export function coerceYear(x: Cell | undefined): number | null {
  if (typeof x === "number") return Number.isInteger(x) ? x : null;
  if (typeof x === "string") {
    const t = x.trim();
    return INTEGRAL_TEXT.test(t) ? Number(t) : null;
  }
  return null;
}

function applyYearWindow(t: Table, w: YearWindowOption | undefined): Table {
  if (!w || (w.min == null && w.max == null)) return t;
  const rows = t.rows.filter((r) => {
    const y = r[YEAR];
    if (typeof y !== "number") return true; // static tables carry no year
    if (w.min != null && y < w.min) return false;
    if (w.max != null && y > w.max) return false;
    return true;
  });
  return { columns: t.columns, rows };
}
