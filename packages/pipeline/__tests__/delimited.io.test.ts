// packages/pipeline/__tests__/delimited.io.test.ts
import { describe, expect, test } from "vitest";

import { formatDelimited, parseDelimited } from "../src/delimited.js";

describe("formatDelimited", () => {
  test("header row, empty missing cells, quoted specials, trailing newline", () => {
    const text = formatDelimited({
      columns: ["lad_code", "lad_name", "value"],
      rows: [
        { lad_code: "E1", lad_name: "Alder, North", value: 0.25 },
        { lad_code: "E2", lad_name: 'The "Brook"', value: null },
        { lad_code: "E3", lad_name: null, value: 1e21 },
      ],
    });

    expect(text).toBe(
      'lad_code,lad_name,value\nE1,"Alder, North",0.25\nE2,"The ""Brook""",\nE3,,1e+21\n'
    );
  });

  test("honours another delimiter", () => {
    const text = formatDelimited({ columns: ["a", "b"], rows: [{ a: "x;y", b: 2 }] }, ";");
    expect(text).toBe('a;b\n"x;y";2\n');
  });

  test("non-finite numbers are written empty", () => {
    expect(formatDelimited({ columns: ["a"], rows: [{ a: Number.NaN }] })).toBe("a\n\n");
  });
});

describe("parseDelimited", () => {
  test("keeps every cell as text", () => {
    const t = parseDelimited("lad_code,year,value\n0123,2020,1.50\n");
    expect(t.rows).toEqual([{ lad_code: "0123", year: "2020", value: "1.50" }]);
  });

  test("quoted fields, CRLF, BOM and blank lines", () => {
    const t = parseDelimited('\uFEFFlad_code,lad_name\r\nE1,"Alder, ""North"""\r\n\r\nE2,\r\n');
    expect(t.columns).toEqual(["lad_code", "lad_name"]);
    expect(t.rows).toEqual([
      { lad_code: "E1", lad_name: 'Alder, "North"' },
      { lad_code: "E2", lad_name: null },
    ]);
  });

  test("short records fill with missing", () => {
    expect(parseDelimited("a,b,c\n1\n").rows).toEqual([{ a: "1", b: null, c: null }]);
  });

  test("reads back what it writes", () => {
    const table = {
      columns: ["lad_code", "lad_name", "n"],
      rows: [{ lad_code: "W1", lad_name: "Line\nbreak", n: "3" }],
    };
    expect(parseDelimited(formatDelimited(table))).toEqual(table);
  });

  test("empty input has no columns", () => {
    expect(parseDelimited("")).toEqual({ columns: [], rows: [] });
  });
});
