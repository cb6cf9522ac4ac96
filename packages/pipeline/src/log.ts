/* eslint-disable no-console */
import type { PipelineViolation } from "../../schema/src/schema.js";

export type Logger = {
  info(message: string): void;
  warn(message: string): void;
};

/** Console logger with a bracketed tag: `[jtis] Merging with 'ons'...` */
export function consoleLogger(tag = "jtis"): Logger {
  return {
    info: (m) => console.log(`[${tag}] ${m}`),
    warn: (m) => console.warn(`[${tag}] WARN ${m}`),
  };
}

/** One line per violation: stage, code, source/column, message. */
export function formatViolation(v: PipelineViolation): string {
  const where = [v.source, v.column].filter((x): x is string => !!x).join(".");
  return `[${v.stage}] ${v.code}${where ? ` ${where}` : ""}: ${v.message}`;
}
