// packages/pipeline/src/run.ts
import * as fs from "node:fs";
import * as path from "node:path";

import type {
  ComposeSources,
  CompositionDiagnostics,
  PipelineViolation,
  ScoringSummary,
  SourceTable,
  Table,
} from "../../schema/src/schema.js";
import { BASE_TABLE_REQUIRED, DEFAULT_JURISDICTION_PREFIXES } from "../../schema/src/contracts.js";
import { checkRequiredColumns, checkUniqueKeys } from "../../schema/src/invariants.js";
import type { PipelineConfig } from "../../schema/src/validate.js";
import { filterAndNormalise, coerceYearColumn } from "../../harmonise/src/harmonise.js";
import type { YearWindowOption } from "../../harmonise/src/harmonise.js";
import { compose } from "../../harmonise/src/compose.js";
import { computeScores } from "../../score/src/aggregate.js";
import { rankSnapshot, snapshotYears } from "../../score/src/snapshot.js";
import { serialiseDiagnostics } from "../../report/src/serialise.js";

import { formatDelimited } from "./delimited.js";
import { consoleLogger } from "./log.js";
import type { Logger } from "./log.js";
import { loadSources, readTable } from "./sources.js";

export type CompositionRun =
  | { ok: true; base: Table; diagnostics: CompositionDiagnostics }
  | { ok: false; violations: PipelineViolation[] };

export type ScoringRun =
  | { ok: true; scored: Table; summary: ScoringSummary }
  | { ok: false; violations: PipelineViolation[] };

export type RunCompositionOptions = {
  log?: Logger;
  prefixes?: readonly string[];
  years?: YearWindowOption;
};

/* ------------------------------------------------------------------ */
/*                          In-memory stages                          */
/* ------------------------------------------------------------------ */

/**
 * Harmonise every source, then compose the base table.
 * Violations from all sources are collected before giving up.
 */
export function runComposition(sources: ComposeSources, opts: RunCompositionOptions = {}): CompositionRun {
  const log = opts.log ?? consoleLogger();
  const prefixes = opts.prefixes ?? DEFAULT_JURISDICTION_PREFIXES;

  const violations: PipelineViolation[] = [];
  const harmonise = (s: SourceTable): SourceTable | null => {
    const r = filterAndNormalise(s.table, prefixes, { source: s.label, years: opts.years });
    if (!r.ok) {
      violations.push(...r.violations);
      return null;
    }
    const c = r.counts;
    log.info(
      `Harmonised '${s.label}': ${c.input_rows} -> ${c.output_rows} rows ` +
        `(missing key ${c.missing_key}, outside jurisdiction ${c.outside_jurisdiction}, outside years ${c.outside_years})`
    );
    return { label: s.label, table: r.table };
  };

  const emissions = harmonise(sources.emissions);
  const fuel = harmonise(sources.fuel);
  const population = harmonise(sources.population);
  const deprivation = sources.deprivation ? harmonise(sources.deprivation) : null;

  if (!emissions || !fuel || !population || violations.length > 0) return { ok: false, violations };

  const composed = compose(
    deprivation ? { emissions, fuel, population, deprivation } : { emissions, fuel, population }
  );
  if (!composed.ok) return composed;

  const { coverage, steps, warnings } = composed.diagnostics;
  for (const s of steps) {
    log.info(`Merging with '${s.source}' on ${s.on}: ${s.left_rows} x ${s.right_rows} -> ${s.out_rows} rows`);
  }
  for (const [label, gap] of Object.entries(coverage)) {
    if (gap.missing_count > 0) log.info(`Coverage '${label}': ${gap.missing_count} missing`);
  }
  for (const w of warnings) log.warn(w.message);

  log.info(`Base table: ${composed.base.rows.length} rows, ${composed.base.columns.length} columns`);
  return composed;
}

/**
 * Score a base table. Works on a table read back from disk: years are
 * re-coerced and the key is checked again before deriving anything.
 */
export function runScoring(base: Table, opts: { log?: Logger; source?: string } = {}): ScoringRun {
  const log = opts.log ?? consoleLogger();
  const source = opts.source ?? "base_table";

  const missing = checkRequiredColumns(base, BASE_TABLE_REQUIRED, source, "score");
  if (missing.length > 0) return { ok: false, violations: missing };

  const coerced = coerceYearColumn(base, source, "score");
  if (!coerced.ok) return coerced;

  const dupes = checkUniqueKeys(coerced.table, "LAD_YEAR", source, "score");
  if (dupes.length > 0) return { ok: false, violations: dupes };

  const { table, summary } = computeScores(coerced.table);
  const years = summary.years.min == null ? "no years" : `years ${summary.years.min}-${summary.years.max}`;
  log.info(`Scored ${summary.rows} rows x ${summary.cols} columns, ${summary.lads} LADs, ${years}`);
  return { ok: true, scored: table, summary };
}

/* ------------------------------------------------------------------ */
/*                        Config-driven stages                        */
/* ------------------------------------------------------------------ */

export type StageOptions = {
  log?: Logger;
};

export type ComposeFromConfigResult =
  | { ok: true; base: Table; diagnostics: CompositionDiagnostics; written: string[] }
  | { ok: false; violations: PipelineViolation[] };

export type ScoreFromConfigResult =
  | { ok: true; scored: Table; summary: ScoringSummary; written: string[] }
  | { ok: false; violations: PipelineViolation[] };

export type SnapshotFromConfigResult =
  | { ok: true; years: number[]; written: string[] }
  | { ok: false; violations: PipelineViolation[] };

/** Load, harmonise and compose; write the base table and composition report. */
export function composeFromConfig(config: PipelineConfig, opts: StageOptions = {}): ComposeFromConfigResult {
  const log = opts.log ?? consoleLogger();

  log.info("Loading sources...");
  const loaded = loadSources(config);
  if (!loaded.ok) return loaded;

  const composed = runComposition(loaded.sources, {
    log,
    prefixes: config.jurisdiction_prefixes,
    years: config.years,
  });
  if (!composed.ok) return composed;

  writeArtifact(config.outputs.base_table, formatDelimited(composed.base, config.delimiter));
  writeArtifact(config.outputs.composition_report, serialiseDiagnostics(composed.diagnostics.coverage));
  log.info(`Saved base table to ${config.outputs.base_table}`);
  log.info(`Saved composition report to ${config.outputs.composition_report}`);

  return {
    ok: true,
    base: composed.base,
    diagnostics: composed.diagnostics,
    written: [config.outputs.base_table, config.outputs.composition_report],
  };
}

/** Score the persisted base table; write the scored table and scoring report. */
export function scoreFromConfig(config: PipelineConfig, opts: StageOptions = {}): ScoreFromConfigResult {
  const log = opts.log ?? consoleLogger();

  log.info(`Loading base table from ${config.outputs.base_table}`);
  const base = readTable(config.outputs.base_table, "base_table", config.delimiter, "score");
  if (!base.ok) return base;

  return scoreAndWrite(config, base.table, log);
}

/** Compose then score in one pass, without re-reading the base table. */
export function runFromConfig(config: PipelineConfig, opts: StageOptions = {}): ScoreFromConfigResult {
  const log = opts.log ?? consoleLogger();

  const composed = composeFromConfig(config, { log });
  if (!composed.ok) return composed;

  const scored = scoreAndWrite(config, composed.base, log);
  if (!scored.ok) return scored;
  return { ...scored, written: [...composed.written, ...scored.written] };
}

/**
 * Ranked view of the scored table, one file per year:
 * `<snapshot_dir>/jtis_<year>_ranked.csv`. Without a year every year is written.
 */
export function snapshotFromConfig(
  config: PipelineConfig,
  year: number | undefined,
  opts: StageOptions = {}
): SnapshotFromConfigResult {
  const log = opts.log ?? consoleLogger();

  const read = readTable(config.outputs.scored_table, "scored_table", config.delimiter, "snapshot");
  if (!read.ok) return read;

  const coerced = coerceYearColumn(read.table, "scored_table", "snapshot");
  if (!coerced.ok) return coerced;

  const available = snapshotYears(coerced.table);
  const years = year == null ? available : available.filter((y) => y === year);
  if (year != null && years.length === 0) {
    log.warn(`No rows for year ${year} in ${config.outputs.scored_table}`);
  }

  const dir = config.outputs.snapshot_dir ?? path.dirname(config.outputs.scored_table);
  const written: string[] = [];
  for (const y of years) {
    const file = path.join(dir, `jtis_${y}_ranked.csv`);
    const ranked = rankSnapshot(coerced.table, y);
    writeArtifact(file, formatDelimited(ranked, config.delimiter));
    log.info(`Saved ${y} snapshot (${ranked.rows.length} LADs) to ${file}`);
    written.push(file);
  }

  return { ok: true, years, written };
}

/* ------------------------------ helpers ----------------------------- */

// Nothing is written unless scoring succeeded.
function scoreAndWrite(config: PipelineConfig, base: Table, log: Logger): ScoreFromConfigResult {
  const r = runScoring(base, { log });
  if (!r.ok) return r;

  writeArtifact(config.outputs.scored_table, formatDelimited(r.scored, config.delimiter));
  writeArtifact(config.outputs.scoring_report, serialiseDiagnostics(r.summary));
  log.info(`Saved scored table to ${config.outputs.scored_table}`);
  log.info(`Saved scoring report to ${config.outputs.scoring_report}`);

  return {
    ok: true,
    scored: r.scored,
    summary: r.summary,
    written: [config.outputs.scored_table, config.outputs.scoring_report],
  };
}

function writeArtifact(file: string, text: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text, "utf8");
}
