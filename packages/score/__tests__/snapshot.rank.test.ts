// packages/score/__tests__/snapshot.rank.test.ts
import { describe, expect, test } from "vitest";

import { rankSnapshot, snapshotYears } from "../src/snapshot.js";

const scored = {
  columns: ["lad_code", "lad_name", "year", "jti_score", "emissions_score", "internal_only"],
  rows: [
    { lad_code: "E3", lad_name: "Cleeve", year: 2022, jti_score: 0.4, emissions_score: 0.1, internal_only: 1 },
    { lad_code: "E1", lad_name: "Alderford", year: 2022, jti_score: null, emissions_score: null, internal_only: 2 },
    { lad_code: "E2", lad_name: "Brook", year: 2022, jti_score: 0.4, emissions_score: 0.2, internal_only: 3 },
    { lad_code: "W1", lad_name: "Brynmoor", year: 2022, jti_score: 0.9, emissions_score: 0.8, internal_only: 4 },
    { lad_code: "W1", lad_name: "Brynmoor", year: 2021, jti_score: 0.1, emissions_score: 0.1, internal_only: 5 },
  ],
};

describe("rankSnapshot", () => {
  test("ranks one year by composite, ties on lad_code, missing last", () => {
    const t = rankSnapshot(scored, 2022);

    expect(t.columns).toEqual(["rank", "lad_code", "lad_name", "jti_score", "emissions_score"]);
    expect(t.rows.map((r) => [r.rank, r.lad_code])).toEqual([
      [1, "W1"],
      [2, "E2"],
      [3, "E3"],
      [4, "E1"],
    ]);
  });

  test("an absent year gives an empty table with the same columns", () => {
    const t = rankSnapshot(scored, 2019);
    expect(t.rows).toEqual([]);
    expect(t.columns[0]).toBe("rank");
  });

  test("lists years ascending", () => {
    expect(snapshotYears(scored)).toEqual([2021, 2022]);
  });
});
