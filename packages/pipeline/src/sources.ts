import * as fs from "node:fs";

import type {
  ComposeSources,
  PipelineStage,
  PipelineViolation,
  SourceRole,
  SourceTable,
  Table,
} from "../../schema/src/schema.js";
import type { PipelineConfig } from "../../schema/src/validate.js";
import { parseDelimited } from "./delimited.js";
import { errorMessage, sourceLabel } from "./config.js";

export type ReadTableResult =
  | { ok: true; table: Table }
  | { ok: false; violations: PipelineViolation[] };

export type LoadSourcesResult =
  | { ok: true; sources: ComposeSources }
  | { ok: false; violations: PipelineViolation[] };

/** Reads one canonical delimited file; a missing or unreadable file is fatal. */
export function readTable(
  file: string,
  source: string,
  delimiter: string,
  stage: PipelineStage = "load"
): ReadTableResult {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (e) {
    return {
      ok: false,
      violations: [
        {
          code: "SOURCE_UNREADABLE",
          stage,
          source,
          message: `Cannot read '${source}' from ${file}: ${errorMessage(e)}`,
          meta: { file },
        },
      ],
    };
  }
  return { ok: true, table: parseDelimited(text, delimiter) };
}

/** Loads every configured source; reports all unreadable files at once. */
export function loadSources(config: PipelineConfig): LoadSourcesResult {
  const violations: PipelineViolation[] = [];

  const read = (role: SourceRole, file: string): SourceTable | null => {
    const label = sourceLabel(config, role);
    const r = readTable(file, label, config.delimiter);
    if (!r.ok) {
      violations.push(...r.violations);
      return null;
    }
    return { label, table: r.table };
  };

  const emissions = read("emissions", config.sources.emissions.path);
  const fuel = read("fuel", config.sources.fuel.path);
  const population = read("population", config.sources.population.path);
  const deprivation = config.sources.deprivation ? read("deprivation", config.sources.deprivation.path) : null;

  if (!emissions || !fuel || !population || violations.length > 0) return { ok: false, violations };

  return {
    ok: true,
    sources: deprivation ? { emissions, fuel, population, deprivation } : { emissions, fuel, population },
  };
}
