import type { Row, ScoringSummary, Table } from "../../schema/src/schema.js";
import { numOrNull, withColumns } from "../../schema/src/table.js";
import { summarise } from "../../report/src/summary.js";
import { derive } from "./derive.js";
import { normaliseMetrics } from "./normalise.js";

/**
 * ADVERSE: a higher normalised value means more transition pressure.
 * FAVOURABLE: a higher value is judged good, so it enters as 1 - value.
 */
export type Polarity = "ADVERSE" | "FAVOURABLE";

export type CategoryComponent = { column: string; polarity: Polarity };

export type Category = "emissions_score" | "transport_score" | "structural_score";

export const CATEGORY_COMPONENTS: Record<Category, readonly CategoryComponent[]> = {
  emissions_score: [
    { column: "norm_emissions_pc", polarity: "ADVERSE" },
    { column: "norm_emissions_density", polarity: "ADVERSE" },
    { column: "norm_emissions_yoy", polarity: "ADVERSE" },
  ],
  transport_score: [
    { column: "norm_fuel_pc", polarity: "ADVERSE" },
    { column: "norm_freight_share", polarity: "ADVERSE" },
    // a larger bioenergy share of road fuel is a step in the right direction
    { column: "norm_bioenergy_share", polarity: "FAVOURABLE" },
  ],
  structural_score: [{ column: "norm_population_yoy_abs", polarity: "ADVERSE" }],
};

// Policy constants; must sum to 1.0.
export const CATEGORY_WEIGHTS: Record<Category, number> = {
  emissions_score: 0.5,
  transport_score: 0.4,
  structural_score: 0.1,
};

export const COMPOSITE_SCORE = "jti_score";

const CATEGORIES: readonly Category[] = ["emissions_score", "transport_score", "structural_score"];

/**
 * Appends the category scores (unweighted means of their components) and
 * the weighted composite. A missing component makes its category missing;
 * a missing category makes the composite missing.
 */
export function score(normalised: Table): Table {
  const rows = normalised.rows.map((r) => {
    const out: Row = { ...r };
    for (const c of CATEGORIES) out[c] = categoryScore(r, CATEGORY_COMPONENTS[c]);
    out[COMPOSITE_SCORE] = compositeScore(out);
    return out;
  });

  return { columns: withColumns(normalised.columns, [...CATEGORIES, COMPOSITE_SCORE]), rows };
}

export function categoryScore(r: Row, components: readonly CategoryComponent[]): number | null {
  let sum = 0;
  for (const comp of components) {
    const v = numOrNull(r[comp.column]);
    if (v == null) return null;
    sum += comp.polarity === "FAVOURABLE" ? 1 - v : v;
  }
  return components.length === 0 ? null : sum / components.length;
}

export function compositeScore(r: Row): number | null {
  let total = 0;
  for (const c of CATEGORIES) {
    const v = numOrNull(r[c]);
    if (v == null) return null;
    total += CATEGORY_WEIGHTS[c] * v;
  }
  return total;
}

export type ScoreRun = { table: Table; summary: ScoringSummary };

/** derive -> normalise -> score, plus the summary diagnostics record. */
export function computeScores(base: Table): ScoreRun {
  const table = score(normaliseMetrics(derive(base)));
  return { table, summary: summarise(table) };
}
