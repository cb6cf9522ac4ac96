import type { KeyShape, PipelineStage, PipelineViolation, Table } from "./schema.js";
import { LAD_CODE } from "./contracts.js";
import { ladYearId, ladYearOf, strOrNull } from "./table.js";

export function checkRequiredColumns(
  t: Table,
  required: readonly string[],
  source: string,
  stage: PipelineStage
): PipelineViolation[] {
  const present = new Set(t.columns);
  return required
    .filter((c) => !present.has(c))
    .map((column) => ({
      code: "MISSING_COLUMN" as const,
      stage,
      source,
      column,
      message: `Source '${source}' is missing required column '${column}'`,
    }));
}

/**
 * A key seen twice would fan out every join it takes part in.
 * Expects harmonised rows (string lad_code, integer year).
 */
export function checkUniqueKeys(
  t: Table,
  key: KeyShape,
  source: string,
  stage: PipelineStage
): PipelineViolation[] {
  const seen = new Set<string>();
  const v: PipelineViolation[] = [];

  t.rows.forEach((r, idx) => {
    let id: string | null;
    let label: string;
    if (key === "LAD_YEAR") {
      const k = ladYearOf(r);
      id = k ? ladYearId(k.lad_code, k.year) : null;
      label = k ? `(${k.lad_code}, ${k.year})` : "";
    } else {
      id = strOrNull(r[LAD_CODE]);
      label = id ?? "";
    }
    if (id == null) return;

    if (seen.has(id)) {
      v.push({
        code: "DUPLICATE_KEY",
        stage,
        source,
        message: `Source '${source}' has duplicate key ${label} at row ${idx}`,
        meta: { row: idx },
      });
    } else {
      seen.add(id);
    }
  });

  return v;
}

export function checkDistinctLabels(labels: string[], stage: PipelineStage): PipelineViolation[] {
  const seen = new Set<string>();
  const v: PipelineViolation[] = [];
  for (const label of labels) {
    if (seen.has(label)) {
      v.push({
        code: "DUPLICATE_SOURCE_LABEL",
        stage,
        source: label,
        message: `Source label '${label}' is used more than once`,
      });
    }
    seen.add(label);
  }
  return v;
}
