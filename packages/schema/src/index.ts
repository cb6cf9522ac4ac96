export type * from "./schema.js";

export * from "./contracts.js";
export * from "./table.js";
export * from "./invariants.js";

export { PipelineConfigSchema, parsePipelineConfig } from "./validate.js";
export type { PipelineConfig, SourceLocation, YearWindow, ConfigParseResult } from "./validate.js";
