import type { Cell, Row, Table } from "../../schema/src/schema.js";

/**
 * Delimited text with a header row.
 * - missing cells are written empty
 * - numbers use their shortest round-trip form
 * - cells holding the delimiter, a quote or a line break are quoted (RFC 4180)
 * - `\n` line endings, trailing newline
 */
export function formatDelimited(t: Table, delimiter = ","): string {
  const lines = [t.columns.map((c) => quote(c, delimiter)).join(delimiter)];
  for (const r of t.rows) {
    lines.push(t.columns.map((c) => quote(formatCell(r[c]), delimiter)).join(delimiter));
  }
  return lines.join("\n") + "\n";
}

export function formatCell(x: Cell | undefined): string {
  if (x == null) return "";
  if (typeof x === "number") return Number.isFinite(x) ? String(x) : "";
  return x;
}

function quote(s: string, delimiter: string): string {
  if (s.includes(delimiter) || s.includes('"') || s.includes("\n") || s.includes("\r")) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}

/**
 * Parses delimited text into a table. Every cell stays a string (empty
 * cells become missing) so codes like "0123" are never reread as numbers;
 * numeric reads happen downstream.
 */
export function parseDelimited(text: string, delimiter = ","): Table {
  const records = splitRecords(text.charCodeAt(0) === 0xfeff ? text.slice(1) : text, delimiter);
  if (records.length === 0) return { columns: [], rows: [] };

  const columns = records[0].map((c) => c.trim());
  const rows: Row[] = records.slice(1).map((cells) => {
    const r: Row = {};
    columns.forEach((c, i) => {
      const v = cells[i];
      r[c] = v == null || v === "" ? null : v;
    });
    return r;
  });

  return { columns, rows };
}

function splitRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let quoted = false;
  let i = 0;

  const endRecord = () => {
    record.push(field);
    field = "";
    // blank lines carry no record
    if (!(record.length === 1 && record[0] === "")) records.push(record);
    record = [];
  };

  while (i < text.length) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === "") {
      quoted = true;
    } else if (ch === delimiter) {
      record.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      endRecord();
      if (ch === "\r" && text[i + 1] === "\n") i++;
    } else {
      field += ch;
    }
    i++;
  }

  if (field !== "" || record.length > 0) endRecord();
  return records;
}
