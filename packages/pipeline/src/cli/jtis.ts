#!/usr/bin/env node
// packages/pipeline/src/cli/jtis.ts
/* eslint-disable no-console */

import type { PipelineViolation } from "../../../schema/src/schema.js";
import { loadPipelineConfig } from "../config.js";
import { consoleLogger, formatViolation } from "../log.js";
import { composeFromConfig, runFromConfig, scoreFromConfig, snapshotFromConfig } from "../run.js";

function usage(): string {
  return `jtis - Just Transition index pipeline

Usage:
  jtis --help
  jtis version

  jtis compose  --config <file.json>
  jtis score    --config <file.json>
  jtis run      --config <file.json>
  jtis snapshot --config <file.json> [--year <n>]

Examples:
  jtis run --config ./jtis.config.json
  jtis score --config ./jtis.config.json
  jtis snapshot --config ./jtis.config.json --year 2022
`;
}

// -------------------- argv parsing --------------------

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function fail(violations: PipelineViolation[]): never {
  for (const v of violations) console.error(`[jtis] ${formatViolation(v)}`);
  process.exit(1);
}

const COMMANDS = ["compose", "score", "run", "snapshot"];

export function run(argv: string[] = process.argv): void {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    process.stdout.write(usage());
    process.exit(0);
  }

  const cmd = args[0];

  if (cmd === "version") {
    process.stdout.write("jtis cli v1\n");
    process.exit(0);
  }

  if (!COMMANDS.includes(cmd)) {
    console.error(`Unknown command: ${cmd}\n`);
    console.error(usage());
    process.exit(1);
  }

  const configPath = getFlagValue(args, "--config");
  if (!configPath) {
    console.error("Missing --config <file.json>\n");
    console.error(usage());
    process.exit(1);
  }

  const loaded = loadPipelineConfig(configPath);
  if (!loaded.ok) fail(loaded.violations);
  const config = loaded.config;
  const log = consoleLogger();

  if (cmd === "snapshot") {
    const yearFlag = getFlagValue(args, "--year");
    const year = yearFlag == null ? undefined : Number(yearFlag);
    if (year !== undefined && !Number.isInteger(year)) {
      console.error(`--year must be an integer, got "${yearFlag}"\n`);
      process.exit(1);
    }
    const r = snapshotFromConfig(config, year, { log });
    if (!r.ok) fail(r.violations);
    process.exit(0);
  }

  const r =
    cmd === "compose"
      ? composeFromConfig(config, { log })
      : cmd === "score"
        ? scoreFromConfig(config, { log })
        : runFromConfig(config, { log });
  if (!r.ok) fail(r.violations);
  process.exit(0);
}

// ESM / tsx: execute when this file is the invoked script
const argv1 = process.argv[1] ?? "";
if (argv1.endsWith("jtis.ts") || argv1.endsWith("jtis.js") || argv1.endsWith("/jtis")) {
  run(process.argv);
}
