// ---------- Configuration ----------
export { loadPipelineConfig, resolveConfigPaths, sourceLabel } from "./config.js";

// ---------- Delimited I/O ----------
export { formatDelimited, parseDelimited, formatCell } from "./delimited.js";
export { readTable, loadSources } from "./sources.js";
export type { ReadTableResult, LoadSourcesResult } from "./sources.js";

// ---------- Logging ----------
export { consoleLogger, formatViolation } from "./log.js";
export type { Logger } from "./log.js";

// ---------- Orchestration ----------
export {
  runComposition,
  runScoring,
  composeFromConfig,
  scoreFromConfig,
  runFromConfig,
  snapshotFromConfig,
} from "./run.js";

export type {
  CompositionRun,
  ScoringRun,
  RunCompositionOptions,
  StageOptions,
  ComposeFromConfigResult,
  ScoreFromConfigResult,
  SnapshotFromConfigResult,
} from "./run.js";
