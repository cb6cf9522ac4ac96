import type { Cell, LadYearKey, Row, Table } from "./schema.js";
import { LAD_CODE, YEAR } from "./contracts.js";

export function hasColumn(t: Table, column: string): boolean {
  return t.columns.includes(column);
}

// Plain decimal notation only; Number() would also take "0x1F" or "0b11".
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Lenient numeric read: finite numbers and numeric strings pass,
 * everything else (blank, text, NaN, ±Infinity) is missing.
 */
export function numOrNull(x: Cell | undefined): number | null {
  if (typeof x === "number") return Number.isFinite(x) ? x : null;
  if (typeof x === "string") {
    const s = x.trim();
    if (!DECIMAL_TEXT.test(s)) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function strOrNull(x: Cell | undefined): string | null {
  if (x == null) return null;
  return typeof x === "string" ? x : String(x);
}

/**
 * Division with the zero-denominator rule: a missing operand or a zero
 * denominator yields missing, never Infinity.
 */
export function safeDivide(num: number | null, den: number | null): number | null {
  if (num == null || den == null || den === 0) return null;
  const q = num / den;
  return Number.isFinite(q) ? q : null;
}

/* ------------------------------- Keys ------------------------------- */

// Code-point order, independent of the host locale.
export function compareCodes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareLadYear(a: LadYearKey, b: LadYearKey): number {
  return compareCodes(a.lad_code, b.lad_code) || a.year - b.year;
}

export function ladYearId(lad_code: string, year: number): string {
  return `${lad_code}\u0000${year}`;
}

/**
 * Reads the (lad_code, year) key of a harmonised row.
 * Returns null when either part is missing or the year is not an integer.
 */
export function ladYearOf(r: Row): LadYearKey | null {
  const lad_code = strOrNull(r[LAD_CODE]);
  const year = r[YEAR];
  if (lad_code == null || typeof year !== "number" || !Number.isInteger(year)) return null;
  return { lad_code, year };
}

/** Stable sort by (lad_code, year); rows without a full key sort last. */
export function sortByLadYear(rows: Row[]): Row[] {
  return rows
    .map((row, idx) => ({ row, idx, key: ladYearOf(row) }))
    .sort((a, b) => {
      if (a.key && b.key) return compareLadYear(a.key, b.key) || a.idx - b.idx;
      if (a.key) return -1;
      if (b.key) return 1;
      return a.idx - b.idx;
    })
    .map((x) => x.row);
}

/** Appends columns that are not yet present, keeping the existing order. */
export function withColumns(columns: string[], added: string[]): string[] {
  const out = [...columns];
  for (const c of added) if (!out.includes(c)) out.push(c);
  return out;
}

export function columnValues(t: Table, column: string): Array<number | null> {
  return t.rows.map((r) => numOrNull(r[column]));
}
