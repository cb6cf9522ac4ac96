import type { Row, Table } from "../../schema/src/schema.js";
import { LAD_CODE, LAD_NAME, YEAR } from "../../schema/src/contracts.js";
import { compareCodes, numOrNull, strOrNull } from "../../schema/src/table.js";
import { COMPOSITE_SCORE } from "./aggregate.js";

export const RANK = "rank";

// Presentation columns, kept only where the scored table has them.
export const SNAPSHOT_COLUMNS = [
  LAD_CODE,
  LAD_NAME,
  "region",
  COMPOSITE_SCORE,
  "emissions_score",
  "transport_score",
  "structural_score",
  "emissions_pc_tco2",
  "fuel_pc_ktoe_per_1000",
  "freight_share",
  "bioenergy_share",
  "population",
  "area_km2",
];

/**
 * One year of the scored table, ranked by composite score (1 = most
 * transition pressure). Ties break on lad_code; missing scores rank last.
 */
export function rankSnapshot(scored: Table, year: number): Table {
  const columns = [RANK, ...SNAPSHOT_COLUMNS.filter((c) => scored.columns.includes(c))];

  const ranked = scored.rows
    .filter((r) => r[YEAR] === year)
    .map((r) => ({ r, s: numOrNull(r[COMPOSITE_SCORE]), lad: strOrNull(r[LAD_CODE]) ?? "" }))
    .sort((a, b) => {
      if (a.s == null || b.s == null) {
        if (a.s != null) return -1;
        if (b.s != null) return 1;
      } else if (a.s !== b.s) {
        return b.s - a.s;
      }
      return compareCodes(a.lad, b.lad);
    });

  const rows = ranked.map(({ r }, i) => {
    const out: Row = { [RANK]: i + 1 };
    for (const c of columns) if (c !== RANK) out[c] = r[c] ?? null;
    return out;
  });

  return { columns, rows };
}

/** Years present in a scored table, ascending. */
export function snapshotYears(scored: Table): number[] {
  const years = new Set<number>();
  for (const r of scored.rows) {
    const y = r[YEAR];
    if (typeof y === "number") years.add(y);
  }
  return [...years].sort((a, b) => a - b);
}
