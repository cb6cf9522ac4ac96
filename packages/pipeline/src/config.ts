import * as fs from "node:fs";
import * as path from "node:path";

import type { SourceRole } from "../../schema/src/schema.js";
import { parsePipelineConfig } from "../../schema/src/validate.js";
import type { ConfigParseResult, PipelineConfig } from "../../schema/src/validate.js";

/**
 * Read and validate a JSON pipeline config. Relative paths are resolved
 * against the directory holding the config file.
 */
export function loadPipelineConfig(file: string): ConfigParseResult {
  const abs = path.resolve(process.cwd(), file);

  let raw: string;
  try {
    raw = fs.readFileSync(abs, "utf8");
  } catch (e) {
    return invalid(`Cannot read config file ${file}: ${errorMessage(e)}`);
  }

  let input: unknown;
  try {
    input = JSON.parse(raw);
  } catch (e) {
    return invalid(`Config file ${file} is not valid JSON: ${errorMessage(e)}`);
  }

  const r = parsePipelineConfig(input);
  if (!r.ok) return r;
  return { ok: true, config: resolveConfigPaths(r.config, path.dirname(abs)) };
}

export function resolveConfigPaths(config: PipelineConfig, baseDir: string): PipelineConfig {
  const at = (p: string) => path.resolve(baseDir, p);
  const maybeAt = (p: string | undefined) => (p == null ? undefined : at(p));
  const s = config.sources;

  return {
    ...config,
    sources: {
      emissions: { ...s.emissions, path: at(s.emissions.path) },
      fuel: { ...s.fuel, path: at(s.fuel.path) },
      population: { ...s.population, path: at(s.population.path) },
      deprivation: s.deprivation ? { ...s.deprivation, path: at(s.deprivation.path) } : undefined,
    },
    outputs: {
      base_table: at(config.outputs.base_table),
      scored_table: at(config.outputs.scored_table),
      composition_report: at(config.outputs.composition_report),
      scoring_report: at(config.outputs.scoring_report),
      snapshot_dir: maybeAt(config.outputs.snapshot_dir),
    },
  };
}

/** Source label used in diagnostics: the configured label, else the role. */
export function sourceLabel(config: PipelineConfig, role: SourceRole): string {
  return config.sources[role]?.label ?? role;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function invalid(message: string): ConfigParseResult {
  return { ok: false, violations: [{ code: "INVALID_CONFIG", stage: "config", message }] };
}
