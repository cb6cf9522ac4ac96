// packages/harmonise/__tests__/compose.join.test.ts
import { describe, expect, test } from "vitest";

import { compose } from "../src/compose.js";
import { alignedSources, table } from "./_helpers/fixtures.js";

describe("compose", () => {
  test("aligned sources give one row per LAD-year and no coverage gaps", () => {
    const r = compose(alignedSources());
    expect(r.ok).toBe(true);
    if (!r.ok) return;

    expect(r.base.rows).toHaveLength(4);
    expect(r.base.rows.map((x) => [x.lad_code, x.year])).toEqual([
      ["E0000001", 2020],
      ["E0000001", 2021],
      ["W0000002", 2020],
      ["W0000002", 2021],
    ]);
    for (const gap of Object.values(r.diagnostics.coverage)) expect(gap.missing_count).toBe(0);
    expect(Object.keys(r.diagnostics.coverage)).toEqual(["emissions", "fuel", "population", "deprivation"]);
    expect(r.diagnostics.warnings).toEqual([]);
  });

  test("leads with the key columns, then joined columns in join order", () => {
    const r = compose(alignedSources());
    if (!r.ok) throw new Error("expected ok");

    expect(r.base.columns).toEqual([
      "lad_code",
      "lad_name",
      "year",
      "total_emissions_scope_ktco2",
      "area_km2",
      "total_fuel_ktoe",
      "personal_transport_ktoe",
      "freight_transport_ktoe",
      "bioenergy_ktoe",
      "population",
      "imd_rank_avg",
    ]);
  });

  test("the first-joined source wins a shared column", () => {
    const r = compose(alignedSources());
    if (!r.ok) throw new Error("expected ok");
    expect(r.base.rows[0].lad_name).toBe("Alderford");
  });

  test("population replaces an earlier population column", () => {
    const s = alignedSources();
    s.emissions.table.columns.push("population");
    for (const row of s.emissions.table.rows) row.population = -1;

    const r = compose(s);
    if (!r.ok) throw new Error("expected ok");

    expect(r.base.columns[r.base.columns.length - 2]).toBe("population");
    expect(r.base.rows.map((x) => x.population)).toEqual([100000, 110000, 50000, 50000]);
  });

  test("join steps record row counts", () => {
    const r = compose(alignedSources());
    if (!r.ok) throw new Error("expected ok");
    expect(r.diagnostics.steps).toEqual([
      { source: "fuel", on: "LAD_YEAR", left_rows: 4, right_rows: 4, out_rows: 4 },
      { source: "population", on: "LAD_YEAR", left_rows: 4, right_rows: 4, out_rows: 4 },
      { source: "deprivation", on: "LAD", left_rows: 4, right_rows: 2, out_rows: 4 },
    ]);
  });

  test("inner joins drop LAD-years a later source lacks and report the gap", () => {
    const s = alignedSources();
    s.population.table.rows = s.population.table.rows.filter((x) => x.year !== 2021);

    const r = compose(s);
    if (!r.ok) throw new Error("expected ok");

    expect(r.base.rows.map((x) => x.year)).toEqual([2020, 2020]);
    expect(r.diagnostics.coverage.population).toEqual({
      missing_count: 2,
      missing_examples: [
        ["E0000001", 2021],
        ["W0000002", 2021],
      ],
    });
  });

  test("output is sorted whatever the input order", () => {
    const s = alignedSources();
    s.emissions.table.rows.reverse();
    s.fuel.table.rows.reverse();

    const r = compose(s);
    if (!r.ok) throw new Error("expected ok");
    expect(r.base.rows.map((x) => `${x.lad_code}:${x.year}`)).toEqual([
      "E0000001:2020",
      "E0000001:2021",
      "W0000002:2020",
      "W0000002:2021",
    ]);
  });

  test("deprivation is optional", () => {
    const { emissions, fuel, population } = alignedSources();
    const r = compose({ emissions, fuel, population });
    if (!r.ok) throw new Error("expected ok");

    expect(r.base.columns).not.toContain("imd_rank_avg");
    expect(r.diagnostics.steps).toHaveLength(2);
  });

  test("a zero-row join is a warning, not a failure", () => {
    const s = alignedSources();
    s.fuel.table.rows = s.fuel.table.rows.map((x) => ({ ...x, year: Number(x.year) + 10 }));

    const r = compose(s);
    expect(r.ok).toBe(true);
    if (!r.ok) return;

    expect(r.base.rows).toEqual([]);
    expect(r.diagnostics.warnings).toHaveLength(3);
    expect(r.diagnostics.warnings[0]).toMatchObject({ code: "EMPTY_JOIN", source: "fuel" });
  });

  test("a missing required column is fatal and names source and column", () => {
    const s = alignedSources();
    s.fuel.table = table(["lad_code", "year", "total_fuel_ktoe"], [["E0000001", 2020, 1]]);

    const r = compose(s);
    expect(r.ok).toBe(false);
    if (r.ok) return;

    expect(r.violations.map((v) => [v.code, v.source, v.column])).toEqual([
      ["MISSING_COLUMN", "fuel", "personal_transport_ktoe"],
      ["MISSING_COLUMN", "fuel", "freight_transport_ktoe"],
      ["MISSING_COLUMN", "fuel", "bioenergy_ktoe"],
    ]);
  });

  test("a duplicated key is fatal", () => {
    const s = alignedSources();
    s.population.table.rows.push({ lad_code: "E0000001", year: 2020, population: 1 });

    const r = compose(s);
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.violations[0]).toMatchObject({ code: "DUPLICATE_KEY", source: "population", meta: { row: 4 } });
  });

  test("two sources under one label are rejected", () => {
    const s = alignedSources();
    s.fuel.label = "emissions";

    const r = compose(s);
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.violations[0].code).toBe("DUPLICATE_SOURCE_LABEL");
  });

  test("no LAD-year appears twice in the base table", () => {
    const r = compose(alignedSources());
    if (!r.ok) throw new Error("expected ok");
    const ids = r.base.rows.map((x) => `${x.lad_code}:${x.year}`);
    expect(new Set(ids).size).toBe(ids.length);
  });
});
