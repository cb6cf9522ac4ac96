import type {
  CoverageGap,
  CoverageReport,
  LadYearKey,
  LadYearPair,
  SourceTable,
  Table,
} from "../../schema/src/schema.js";
import { LAD_CODE } from "../../schema/src/contracts.js";
import { compareLadYear, ladYearId, ladYearOf, strOrNull } from "../../schema/src/table.js";

export const MISSING_EXAMPLE_LIMIT = 20;

/**
 * For every source, the LAD-years present in the union of all sources but
 * absent from that source. Report-only: nothing here feeds the join.
 */
export function computeMissingCombinations(sources: SourceTable[]): CoverageReport {
  const keySets = sources.map((s) => ladYearKeys(s.table));
  const union = unionKeys(keySets);

  const report: CoverageReport = {};
  sources.forEach((s, i) => {
    const own = keySets[i];
    report[s.label] = toGap(union.filter((k) => !own.has(ladYearId(k.lad_code, k.year))));
  });
  return report;
}

/**
 * Coverage of a year-independent source over the annual key union:
 * a LAD-year is missing when its LAD is absent from the static table.
 */
export function computeMissingLads(union: LadYearKey[], staticTable: Table): CoverageGap {
  const lads = new Set<string>();
  for (const r of staticTable.rows) {
    const lad = strOrNull(r[LAD_CODE]);
    if (lad != null) lads.add(lad);
  }
  return toGap(union.filter((k) => !lads.has(k.lad_code)));
}

/** Union of key sets, ordered by (lad_code, year). */
export function unionKeys(keySets: Array<Map<string, LadYearKey>>): LadYearKey[] {
  const all = new Map<string, LadYearKey>();
  for (const ks of keySets) for (const [id, k] of ks) all.set(id, k);
  return [...all.values()].sort(compareLadYear);
}

export function ladYearKeys(t: Table): Map<string, LadYearKey> {
  const m = new Map<string, LadYearKey>();
  for (const r of t.rows) {
    const k = ladYearOf(r);
    if (k) m.set(ladYearId(k.lad_code, k.year), k);
  }
  return m;
}

function toGap(missing: LadYearKey[]): CoverageGap {
  const sorted = [...missing].sort(compareLadYear);
  return {
    missing_count: sorted.length,
    missing_examples: sorted.slice(0, MISSING_EXAMPLE_LIMIT).map((k): LadYearPair => [k.lad_code, k.year]),
  };
}
