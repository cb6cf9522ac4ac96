// ---------- MetricDeriver ----------
export { derive, pctChange, DERIVED_METRICS } from "./derive.js";
export type { DerivedMetric } from "./derive.js";

// ---------- Normalizer ----------
export { normalise, normaliseMetrics, NORMALISED_METRICS, NEUTRAL_SCORE } from "./normalise.js";

// ---------- ScoreAggregator ----------
export {
  score,
  computeScores,
  categoryScore,
  compositeScore,
  CATEGORY_COMPONENTS,
  CATEGORY_WEIGHTS,
  COMPOSITE_SCORE,
} from "./aggregate.js";

export type { Category, CategoryComponent, Polarity, ScoreRun } from "./aggregate.js";

// ---------- Snapshots ----------
export { rankSnapshot, snapshotYears, SNAPSHOT_COLUMNS, RANK } from "./snapshot.js";
