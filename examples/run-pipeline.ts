// examples/run-pipeline.ts
import { fileURLToPath } from "node:url";

import { loadPipelineConfig } from "../packages/pipeline/src/config.js";
import { consoleLogger, formatViolation } from "../packages/pipeline/src/log.js";
import { runFromConfig, snapshotFromConfig } from "../packages/pipeline/src/run.js";

// assert
function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

function main() {
  const configPath = fileURLToPath(new URL("./jtis.config.json", import.meta.url));
  const loaded = loadPipelineConfig(configPath);
  if (!loaded.ok) {
    for (const v of loaded.violations) console.error(formatViolation(v));
    process.exit(1);
  }
  const config = loaded.config;
  const log = consoleLogger();

  const run = runFromConfig(config, { log });
  if (!run.ok) {
    for (const v of run.violations) console.error(formatViolation(v));
    process.exit(1);
  }

  const snap = snapshotFromConfig(config, run.summary.years.max ?? undefined, { log });
  assert(snap.ok, "snapshot failed");

  console.log(
    JSON.stringify(
      {
        summary: run.summary,
        written: [...run.written, ...snap.written],
      },
      null,
      2
    )
  );
}

main();
