#!/usr/bin/env node
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { errorMessage } from "@voxedit/core";
import { parseArgs, runOptions } from "./options.js";
import { runProgram } from "./run.js";

const DEMO_PROGRAM = fileURLToPath(new URL("../programs/demo.yaml", import.meta.url));

function printHelp(): void {
  console.log(`voxedit

Usage:
  npm run cli -- run <program.yaml> --thumb out/thumb.png
  npm run cli -- demo

Options:
  --config <file>          YAML editor config (historyLimit, maxBlocks, noEdit, stepsPerFrame)
  --base <path>            Mesh snapshot (JSON) to place the program on
  --thumb <path>           Write a PNG thumbnail of the result
  --thumb-size <n>         Thumbnail dimension in px (default: 256)
  --snapshot <path>        Write the resulting mesh as JSON
  --steps <n>              Shape operations per frame (overrides config)
  --max-blocks <n>         Live block budget, 0 for none (overrides config)
`);
}

function run(): void {
  const argv = parseArgs(process.argv.slice(2));

  const command = argv._[0];
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command === "demo") {
    console.log(JSON.stringify(runProgram(runOptions(argv, DEMO_PROGRAM)), null, 2));
    return;
  }

  if (command !== "run") {
    throw new Error(`Unknown command: ${String(command)}`);
  }

  const program = argv._[1];
  if (!program) {
    throw new Error("Missing program argument.");
  }

  const summary = runProgram(runOptions(argv, resolve(String(program))));
  for (const warning of summary.warnings) {
    console.error(`[voxedit] warning ${warning.code}: ${warning.message}`);
  }
  console.log(JSON.stringify(summary, null, 2));
}

try {
  run();
} catch (error) {
  console.error(`[voxedit] ${errorMessage(error)}`);
  if (error instanceof Error && error.stack?.trim()) {
    console.error(error.stack);
  }
  process.exit(1);
}
