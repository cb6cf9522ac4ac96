import type { SourceContract, SourceRole } from "./schema.js";

export const LAD_CODE = "lad_code";
export const LAD_NAME = "lad_name";
export const YEAR = "year";

// Leading columns of every composed table, in this order.
export const KEY_COLUMNS = [LAD_CODE, LAD_NAME, YEAR] as const;

// England and Wales.
export const DEFAULT_JURISDICTION_PREFIXES = ["E", "W"];

// Literal strings some producers emit for an absent key.
export const MISSING_KEY_LITERALS: ReadonlySet<string> = new Set(["nan", "NaN", "None"]);

export const SOURCE_CONTRACTS: Record<SourceRole, SourceContract> = {
  emissions: {
    role: "emissions",
    key: "LAD_YEAR",
    required: [LAD_CODE, YEAR, LAD_NAME, "total_emissions_scope_ktco2", "area_km2"],
  },
  fuel: {
    role: "fuel",
    key: "LAD_YEAR",
    required: [
      LAD_CODE,
      YEAR,
      "total_fuel_ktoe",
      "personal_transport_ktoe",
      "freight_transport_ktoe",
      "bioenergy_ktoe",
    ],
  },
  population: {
    role: "population",
    key: "LAD_YEAR",
    required: [LAD_CODE, YEAR, "population"],
  },
  deprivation: {
    role: "deprivation",
    key: "LAD",
    required: [LAD_CODE, "imd_rank_avg"],
  },
};

// What a persisted base table must carry to be scored on its own.
export const BASE_TABLE_REQUIRED = [
  LAD_CODE,
  YEAR,
  "total_emissions_scope_ktco2",
  "total_fuel_ktoe",
  "personal_transport_ktoe",
  "freight_transport_ktoe",
  "bioenergy_ktoe",
  "area_km2",
  "population",
];
