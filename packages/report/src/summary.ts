import type { ScoringSummary, Table } from "../../schema/src/schema.js";
import { LAD_CODE, YEAR } from "../../schema/src/contracts.js";
import { numOrNull, strOrNull } from "../../schema/src/table.js";

/**
 * Row/column counts, year range and distinct LAD count of a table.
 * Read-only; years are null when the table has no readable year.
 */
export function summarise(t: Table): ScoringSummary {
  let min: number | null = null;
  let max: number | null = null;
  const lads = new Set<string>();

  for (const r of t.rows) {
    const y = numOrNull(r[YEAR]);
    if (y != null) {
      if (min == null || y < min) min = y;
      if (max == null || y > max) max = y;
    }
    const lad = strOrNull(r[LAD_CODE]);
    if (lad != null) lads.add(lad);
  }

  return {
    rows: t.rows.length,
    cols: t.columns.length,
    years: { min, max },
    lads: lads.size,
  };
}
