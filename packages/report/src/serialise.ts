import { createHash } from "node:crypto";

/**
 * Diagnostics artifacts are written as two-space indented JSON with a
 * trailing newline. Key order follows the record, which every producer
 * builds in a fixed order, so identical runs write identical bytes.
 */
export function serialiseDiagnostics(record: unknown): string {
  return JSON.stringify(record, null, 2) + "\n";
}

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/** Digest of a serialised artifact (delimited table or diagnostics JSON). */
export function digestTable(serialised: string): string {
  return sha256Hex(serialised);
}
