// packages/score/__tests__/derive.metrics.test.ts
import { describe, expect, test } from "vitest";

import { derive, pctChange, DERIVED_METRICS } from "../src/derive.js";

function base(rows: Array<Record<string, string | number | null>>) {
  return {
    columns: [
      "lad_code",
      "year",
      "total_emissions_scope_ktco2",
      "total_fuel_ktoe",
      "personal_transport_ktoe",
      "freight_transport_ktoe",
      "bioenergy_ktoe",
      "area_km2",
      "population",
    ],
    rows,
  };
}

const row = (lad: string, year: number, over: Record<string, string | number | null> = {}) => ({
  lad_code: lad,
  year,
  total_emissions_scope_ktco2: 200,
  total_fuel_ktoe: 40,
  personal_transport_ktoe: 20,
  freight_transport_ktoe: 10,
  bioenergy_ktoe: 2,
  area_km2: 50,
  population: 80000,
  ...over,
});

describe("derive", () => {
  test("per-capita, ratio and density metrics", () => {
    const [r] = derive(base([row("E1", 2020)])).rows;

    expect(r.emissions_pc_tco2).toBe(2.5); // 200 kt * 1000 / 80000
    expect(r.fuel_pc_ktoe_per_1000).toBe(0.5);
    expect(r.personal_pc_ktoe_per_1000).toBe(0.25);
    expect(r.freight_pc_ktoe_per_1000).toBe(0.125);
    expect(r.freight_share).toBe(0.25);
    expect(r.personal_share).toBe(0.5);
    expect(r.bioenergy_share).toBe(0.05);
    expect(r.emissions_density_tco2_per_km2).toBe(4000);
  });

  test("zero population or total fuel gives missing, not Infinity", () => {
    const [r] = derive(base([row("E1", 2020, { population: 0, total_fuel_ktoe: 0 })])).rows;

    expect(r.emissions_pc_tco2).toBeNull();
    expect(r.fuel_pc_ktoe_per_1000).toBeNull();
    expect(r.freight_share).toBeNull();
  });

  test("year-over-year against the previous year of the same LAD", () => {
    const t = derive(
      base([
        row("E1", 2021, { total_emissions_scope_ktco2: 110 }),
        row("E1", 2020, { total_emissions_scope_ktco2: 100 }),
        row("E2", 2020, { total_emissions_scope_ktco2: 999 }),
      ])
    );

    expect(t.rows.map((r) => `${r.lad_code}:${r.year}`)).toEqual(["E1:2020", "E1:2021", "E2:2020"]);
    expect(t.rows[0].emissions_yoy_pct).toBeNull();
    expect(t.rows[1].emissions_yoy_pct).toBeCloseTo(0.1, 12);
    expect(t.rows[2].emissions_yoy_pct).toBeNull();
  });

  test("reads numeric text the way delimited files deliver it", () => {
    const [r] = derive(base([row("E1", 2020, { population: "80000", total_emissions_scope_ktco2: "200" })])).rows;
    expect(r.emissions_pc_tco2).toBe(2.5);
  });

  test("keeps row count and appends every derived column", () => {
    const t = derive(base([row("E1", 2020), row("E1", 2021), row("W1", 2020)]));
    expect(t.rows).toHaveLength(3);
    expect(t.columns.slice(-DERIVED_METRICS.length)).toEqual(DERIVED_METRICS.map((m) => m.column));
  });
});

describe("pctChange", () => {
  test("missing for a missing operand or zero base", () => {
    expect(pctChange(5, 0)).toBeNull();
    expect(pctChange(null, 4)).toBeNull();
    expect(pctChange(4, null)).toBeNull();
    expect(pctChange(90, 100)).toBeCloseTo(-0.1, 12);
  });
});
