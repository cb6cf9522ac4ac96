// packages/harmonise/__tests__/_helpers/fixtures.ts
import type { Cell, ComposeSources, Row, Table } from "../../../schema/src/schema.js";

export function table(columns: string[], values: Cell[][]): Table {
  const rows = values.map((vs) => {
    const r: Row = {};
    columns.forEach((c, i) => (r[c] = vs[i] ?? null));
    return r;
  });
  return { columns, rows };
}

// Two LADs (one English, one Welsh) over 2020-2021, every source aligned.
export function alignedSources(): ComposeSources {
  return {
    emissions: {
      label: "emissions",
      table: table(
        ["lad_code", "year", "lad_name", "total_emissions_scope_ktco2", "area_km2"],
        [
          ["E0000001", 2020, "Alderford", 500, 100],
          ["E0000001", 2021, "Alderford", 450, 100],
          ["W0000002", 2020, "Brynmoor", 300, 200],
          ["W0000002", 2021, "Brynmoor", 330, 200],
        ]
      ),
    },
    fuel: {
      label: "fuel",
      table: table(
        [
          "lad_code",
          "year",
          "lad_name",
          "total_fuel_ktoe",
          "personal_transport_ktoe",
          "freight_transport_ktoe",
          "bioenergy_ktoe",
        ],
        [
          ["E0000001", 2020, "Alderford (fuel)", 100, 60, 30, 5],
          ["E0000001", 2021, "Alderford (fuel)", 80, 48, 24, 8],
          ["W0000002", 2020, "Brynmoor (fuel)", 50, 30, 15, 1],
          ["W0000002", 2021, "Brynmoor (fuel)", 40, 24, 12, 2],
        ]
      ),
    },
    population: {
      label: "population",
      table: table(
        ["lad_code", "year", "population"],
        [
          ["E0000001", 2020, 100000],
          ["E0000001", 2021, 110000],
          ["W0000002", 2020, 50000],
          ["W0000002", 2021, 50000],
        ]
      ),
    },
    deprivation: {
      label: "deprivation",
      table: table(
        ["lad_code", "imd_rank_avg"],
        [
          ["E0000001", 120.5],
          ["W0000002", 80.25],
        ]
      ),
    },
  };
}
