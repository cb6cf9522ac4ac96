import type { Row, Table } from "../../schema/src/schema.js";
import { LAD_CODE } from "../../schema/src/contracts.js";
import { ladYearOf, numOrNull, safeDivide, sortByLadYear, withColumns } from "../../schema/src/table.js";

type Formula =
  | { kind: "PER_CAPITA"; metric: string } // metric * 1000 / population
  | { kind: "RATIO"; component: string; total: string } // component / total
  | { kind: "DENSITY"; metric: string } // metric * 1000 / area_km2
  | { kind: "YOY"; metric: string }; // pct change from the LAD's previous year

export type DerivedMetric = { column: string; formula: Formula };

const POPULATION = "population";
const AREA = "area_km2";

export const DERIVED_METRICS: readonly DerivedMetric[] = [
  // per-capita
  { column: "emissions_pc_tco2", formula: { kind: "PER_CAPITA", metric: "total_emissions_scope_ktco2" } },
  { column: "fuel_pc_ktoe_per_1000", formula: { kind: "PER_CAPITA", metric: "total_fuel_ktoe" } },
  { column: "personal_pc_ktoe_per_1000", formula: { kind: "PER_CAPITA", metric: "personal_transport_ktoe" } },
  { column: "freight_pc_ktoe_per_1000", formula: { kind: "PER_CAPITA", metric: "freight_transport_ktoe" } },

  // transport mix
  { column: "freight_share", formula: { kind: "RATIO", component: "freight_transport_ktoe", total: "total_fuel_ktoe" } },
  { column: "personal_share", formula: { kind: "RATIO", component: "personal_transport_ktoe", total: "total_fuel_ktoe" } },
  { column: "bioenergy_share", formula: { kind: "RATIO", component: "bioenergy_ktoe", total: "total_fuel_ktoe" } },

  // spatial intensity
  { column: "emissions_density_tco2_per_km2", formula: { kind: "DENSITY", metric: "total_emissions_scope_ktco2" } },

  // year-over-year
  { column: "emissions_yoy_pct", formula: { kind: "YOY", metric: "total_emissions_scope_ktco2" } },
  { column: "fuel_yoy_pct", formula: { kind: "YOY", metric: "total_fuel_ktoe" } },
  { column: "population_yoy_pct", formula: { kind: "YOY", metric: POPULATION } },
];

/**
 * Per-capita, ratio, density and year-over-year columns.
 *
 * Every formula reads only base columns, so the order of DERIVED_METRICS
 * does not matter. Output is sorted by (lad_code, year) with the same
 * number of rows as the input.
 */
export function derive(base: Table): Table {
  const sorted = sortByLadYear(base.rows);
  const previous = previousRowIndex(sorted);

  const rows = sorted.map((r, i) => {
    const out: Row = { ...r };
    const pi = previous[i];
    const prev = pi == null ? null : sorted[pi];
    for (const m of DERIVED_METRICS) out[m.column] = evaluate(m.formula, r, prev);
    return out;
  });

  return {
    columns: withColumns(base.columns, DERIVED_METRICS.map((m) => m.column)),
    rows,
  };
}

/**
 * Percent change from the previous period: (current - previous) / previous.
 * Missing for the first period, a missing operand, or a zero previous value.
 */
export function pctChange(current: number | null, previous: number | null): number | null {
  if (current == null) return null;
  return safeDivide(previous == null ? null : current - previous, previous);
}

function evaluate(f: Formula, r: Row, prev: Row | null): number | null {
  switch (f.kind) {
    case "PER_CAPITA":
      return safeDivide(scaled(r, f.metric), numOrNull(r[POPULATION]));
    case "RATIO":
      return safeDivide(numOrNull(r[f.component]), numOrNull(r[f.total]));
    case "DENSITY":
      return safeDivide(scaled(r, f.metric), numOrNull(r[AREA]));
    case "YOY":
      return prev == null ? null : pctChange(numOrNull(r[f.metric]), numOrNull(prev[f.metric]));
  }
}

// kilotonnes -> tonnes
function scaled(r: Row, column: string): number | null {
  const v = numOrNull(r[column]);
  return v == null ? null : v * 1000;
}

/**
 * For rows already sorted by (lad_code, year): index of the previous row
 * of the same LAD, or null for the first observed year.
 */
function previousRowIndex(sorted: Row[]): Array<number | null> {
  return sorted.map((r, i) => {
    if (i === 0) return null;
    const k = ladYearOf(r);
    const p = ladYearOf(sorted[i - 1]);
    if (!k || !p) return null;
    return sorted[i - 1][LAD_CODE] === r[LAD_CODE] ? i - 1 : null;
  });
}
