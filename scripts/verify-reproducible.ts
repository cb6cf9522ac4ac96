// scripts/verify-reproducible.ts
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import type { PipelineConfig } from "../packages/schema/src/validate.js";
import { digestTable } from "../packages/report/src/serialise.js";
import { loadPipelineConfig } from "../packages/pipeline/src/config.js";
import { formatViolation } from "../packages/pipeline/src/log.js";
import type { Logger } from "../packages/pipeline/src/log.js";
import { runFromConfig } from "../packages/pipeline/src/run.js";

const quiet: Logger = { info: () => {}, warn: () => {} };

// Same sources, outputs redirected into a fresh directory.
function intoDir(config: PipelineConfig, dir: string): PipelineConfig {
  return {
    ...config,
    outputs: {
      base_table: path.join(dir, "base_la_year.csv"),
      scored_table: path.join(dir, "jtis_scored_la_year.csv"),
      composition_report: path.join(dir, "composition_report.json"),
      scoring_report: path.join(dir, "scoring_report.json"),
    },
  };
}

function runOnce(config: PipelineConfig): Map<string, string> | null {
  const r = runFromConfig(config, { log: quiet });
  if (!r.ok) {
    for (const v of r.violations) console.error(formatViolation(v));
    return null;
  }
  const digests = new Map<string, string>();
  for (const file of r.written) digests.set(path.basename(file), digestTable(fs.readFileSync(file, "utf8")));
  return digests;
}

function main() {
  const configPath = process.argv[2] ?? fileURLToPath(new URL("../examples/jtis.config.json", import.meta.url));
  const loaded = loadPipelineConfig(configPath);
  if (!loaded.ok) {
    for (const v of loaded.violations) console.error(formatViolation(v));
    process.exit(1);
  }

  const root = fs.mkdtempSync(path.join(os.tmpdir(), "jtis-repro-"));
  try {
    const a = runOnce(intoDir(loaded.config, path.join(root, "a")));
    const b = a && runOnce(intoDir(loaded.config, path.join(root, "b")));
    if (!a || !b) {
      process.exitCode = 1;
      return;
    }

    let ok = true;
    for (const [name, digest] of a) {
      if (b.get(name) !== digest) {
        ok = false;
        console.error(`❌ Reproducibility mismatch: ${name}`);
      } else {
        console.log(`✅ Reproducible: ${name} ${digest.slice(0, 12)}`);
      }
    }
    if (!ok) {
      process.exitCode = 1;
      return;
    }
    console.log("Reproducibility check passed.");
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
}

main();
