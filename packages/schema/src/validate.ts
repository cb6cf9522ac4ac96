import { z } from "zod";
import type { PipelineViolation } from "./schema.js";
import { DEFAULT_JURISDICTION_PREFIXES } from "./contracts.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const FilePath = z.string().trim().min(1, "Path must not be empty");

const Year = z.number().int("Year must be an integer");

// Single-character administrative prefixes: "E" England, "W" Wales, ...
const JurisdictionPrefix = z.string().trim().min(1);

// Quote and line breaks are structural in delimited text.
const Delimiter = z
  .string()
  .length(1)
  .refine((d) => d !== '"' && d !== "\n" && d !== "\r", "Delimiter must not be a quote or line break");

/* ------------------------------------------------------------------ */
/*                               Sources                              */
/* ------------------------------------------------------------------ */

const SourceLocationSchema = z.object({
  label: z.string().trim().min(1).optional(),
  path: FilePath,
});

const SourcesSchema = z.object({
  emissions: SourceLocationSchema,
  fuel: SourceLocationSchema,
  population: SourceLocationSchema,
  deprivation: SourceLocationSchema.optional(),
});

/* ------------------------------------------------------------------ */
/*                               Outputs                              */
/* ------------------------------------------------------------------ */

const OutputsSchema = z.object({
  base_table: FilePath,
  scored_table: FilePath,
  composition_report: FilePath,
  scoring_report: FilePath,
  snapshot_dir: FilePath.optional(),
});

/* ------------------------------------------------------------------ */
/*                               Pipeline                             */
/* ------------------------------------------------------------------ */

const YearWindowSchema = z
  .object({
    min: Year.optional(),
    max: Year.optional(),
  })
  .refine((w) => w.min == null || w.max == null || w.min <= w.max, "years.min must not exceed years.max");

export const PipelineConfigSchema = z.object({
  jurisdiction_prefixes: z.array(JurisdictionPrefix).min(1).default(() => [...DEFAULT_JURISDICTION_PREFIXES]),
  years: YearWindowSchema.optional(),
  delimiter: Delimiter.default(","),
  sources: SourcesSchema,
  outputs: OutputsSchema,
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type SourceLocation = z.infer<typeof SourceLocationSchema>;
export type YearWindow = z.infer<typeof YearWindowSchema>;

export type ConfigParseResult =
  | { ok: true; config: PipelineConfig }
  | { ok: false; violations: PipelineViolation[] };

export function parsePipelineConfig(input: unknown): ConfigParseResult {
  const r = PipelineConfigSchema.safeParse(input);
  if (r.success) return { ok: true, config: r.data };

  return {
    ok: false,
    violations: r.error.issues.map((issue) => {
      const path = issue.path.map(String).join(".");
      return {
        code: "INVALID_CONFIG" as const,
        stage: "config" as const,
        message: path ? `${path}: ${issue.message}` : issue.message,
        meta: { path },
      };
    }),
  };
}
