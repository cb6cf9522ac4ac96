// ---------- Harmonizer ----------
export {
  filterAndNormalise,
  coerceYearColumn,
  coerceYear,
  normaliseKey,
} from "./harmonise.js";

export type {
  HarmoniseOptions,
  HarmoniseCounts,
  HarmoniseResult,
  YearCoercionResult,
  YearWindowOption,
} from "./harmonise.js";

export {
  computeMissingCombinations,
  computeMissingLads,
  ladYearKeys,
  unionKeys,
  MISSING_EXAMPLE_LIMIT,
} from "./coverage.js";

// ---------- Composer ----------
export { compose, JOIN_PLAN } from "./compose.js";

export type { ComposeResult, ColumnCollision, JoinStep } from "./compose.js";
