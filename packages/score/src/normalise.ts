import type { Row, Table } from "../../schema/src/schema.js";
import { columnValues, numOrNull, withColumns } from "../../schema/src/table.js";

// Returned for every entry when a column carries no discriminating signal.
export const NEUTRAL_SCORE = 0.5;

/**
 * Min-max normalisation to [0, 1] over all non-missing values.
 *
 * Degenerate input (fewer than two values, all equal, all missing, or a
 * range too wide to represent) yields NEUTRAL_SCORE for every entry, missing ones included, so nothing
 * undefined reaches the composite. Otherwise missing stays missing.
 */
export function normalise(values: ReadonlyArray<number | null>): Array<number | null> {
  let min = Infinity;
  let max = -Infinity;
  let n = 0;
  for (const v of values) {
    if (v == null || !Number.isFinite(v)) continue;
    n++;
    if (v < min) min = v;
    if (v > max) max = v;
  }

  const range = max - min;
  if (n < 2 || range === 0 || !Number.isFinite(range)) return values.map(() => NEUTRAL_SCORE);

  return values.map((v) => (v == null || !Number.isFinite(v) ? null : (v - min) / range));
}

type NormalisedMetric = {
  source: string;
  target: string;
  transform?: { kind: "ABS"; column: string }; // materialised before normalising
};

export const NORMALISED_METRICS: readonly NormalisedMetric[] = [
  // emissions
  { source: "emissions_pc_tco2", target: "norm_emissions_pc" },
  { source: "emissions_density_tco2_per_km2", target: "norm_emissions_density" },
  { source: "emissions_yoy_pct", target: "norm_emissions_yoy" },

  // transport
  { source: "fuel_pc_ktoe_per_1000", target: "norm_fuel_pc" },
  { source: "freight_share", target: "norm_freight_share" },
  { source: "bioenergy_share", target: "norm_bioenergy_share" },

  // structural: size of the population swing, either direction
  {
    source: "population_yoy_pct",
    target: "norm_population_yoy_abs",
    transform: { kind: "ABS", column: "population_yoy_abs" },
  },
];

/**
 * Adds one normalised column per NORMALISED_METRICS entry, each scaled
 * across the whole table (not per LAD or per year).
 */
export function normaliseMetrics(derived: Table): Table {
  const rows: Row[] = derived.rows.map((r) => ({ ...r }));
  const added: string[] = [];

  for (const m of NORMALISED_METRICS) {
    const input = m.transform ? absValues(derived, m.source) : columnValues(derived, m.source);
    if (m.transform) {
      const col = m.transform.column;
      rows.forEach((r, i) => (r[col] = input[i]));
      added.push(col);
    }

    const scaled = normalise(input);
    rows.forEach((r, i) => (r[m.target] = scaled[i]));
    added.push(m.target);
  }

  return { columns: withColumns(derived.columns, added), rows };
}

function absValues(t: Table, column: string): Array<number | null> {
  return t.rows.map((r) => {
    const v = numOrNull(r[column]);
    return v == null ? null : Math.abs(v);
  });
}
