#!/usr/bin/env -S npx tsx
/**
 * fit-slide.ts: Fit a content block to a template, validate and repair it.
 *
 * Usage:
 *   npx tsx scripts/fit-slide.ts <block.json> [--hint <templateId>] [--aggressive]
 *                                [--max-iter <n>] [--out <file>] [--trace <file.jsonl>]
 *
 * Options:
 *   --hint <id>        Force a template from the catalog
 *   --aggressive       Allow truncation, case normalization and box shrinking
 *   --max-iter <n>     Fix pass budget (default 3)
 *   --out <file>       Write the result JSON to a file instead of stdout
 *   --trace <file>     Append one JSON line per fix pass
 *
 * Output (stdout):
 *   { model, validation, summary } JSON.
 *
 * Exit codes:
 *   0: valid (no critical issues)
 *   1: critical issues remain after repair
 *   2: usage, input or configuration error
 */

import * as fs from "node:fs";
import {
  SlideEngine,
  DeckfitError,
  readJSON,
  writeJSON,
  appendTrace,
  type PassTrace,
} from "../src/index.js";

// ── Parse args ──
const args = process.argv.slice(2);
const positional: string[] = [];
let hint: string | undefined;
let aggressive = false;
let maxIterations: number | undefined;
let outPath: string | undefined;
let tracePath: string | undefined;

function usage(message?: string): never {
  if (message) console.error(`Error: ${message}`);
  const prog = process.argv[1];
  console.error(`Usage: ${prog} <block.json> [--hint <templateId>] [--aggressive] [--max-iter <n>] [--out <file>] [--trace <file.jsonl>]`);
  console.error("Exit 0 = valid, exit 1 = critical issues remain, exit 2 = error.");
  process.exit(2);
}

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  const next = args[i + 1];
  if (arg === "--aggressive") {
    aggressive = true;
  } else if (arg === "--hint" && next) {
    hint = next;
    i++;
  } else if (arg === "--max-iter" && next) {
    maxIterations = Number.parseInt(next, 10);
    if (!Number.isInteger(maxIterations) || maxIterations < 1) usage(`--max-iter needs a positive integer, got "${next}"`);
    i++;
  } else if (arg === "--out" && next) {
    outPath = next;
    i++;
  } else if (arg === "--trace" && next) {
    tracePath = next;
    i++;
  } else if (arg !== undefined && arg.startsWith("--")) {
    usage(`unknown or incomplete option ${arg}`);
  } else if (arg !== undefined) {
    positional.push(arg);
  }
}

const blockPath = positional[0];
if (!blockPath) usage();
if (!fs.existsSync(blockPath)) usage(`content block not found: ${blockPath}`);

// ── Run ──
async function main(file: string): Promise<number> {
  const engine = new SlideEngine();
  const block = engine.parseBlock(await readJSON(file));

  const traces: PassTrace[] = [];
  const outcome = engine.process(block, {
    hint,
    aggressive,
    maxIterations,
    onPass: (trace) => traces.push(trace),
  });

  if (tracePath) {
    for (const trace of traces) {
      await appendTrace(tracePath, { block: file, template: outcome.model.templateId, ...trace });
    }
  }

  const output = {
    model: outcome.model,
    validation: outcome.validation,
    summary: outcome.summary,
  };
  if (outPath) {
    await writeJSON(outPath, output);
    console.error(`Wrote ${outPath}`);
  } else {
    console.log(JSON.stringify(output, null, 2));
  }

  const v = outcome.validation;
  console.error(
    `${outcome.model.templateId}: ${v.isValid ? "valid" : "INVALID"} (score ${v.score}, ${v.severityCounts.critical} critical, ${v.severityCounts.warning} warning)`
  );
  return v.isValid ? 0 : 1;
}

main(blockPath).then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (err instanceof DeckfitError || err instanceof SyntaxError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error("Fatal error:", err);
    }
    process.exit(2);
  }
);
