import minimist from "minimist";
import { resolve } from "node:path";
import type { EditorConfig } from "@voxedit/core";
import type { RunOptions } from "./run.js";

export function parseArgs(args: string[]): minimist.ParsedArgs {
  return minimist(args, {
    string: ["config", "base", "thumb", "snapshot"],
    default: {
      "thumb-size": 256
    }
  });
}

export function intFlag(value: unknown, name: string, min = 0): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`--${name} must be an integer >= ${min}`);
  }
  return n;
}

export function runOptions(argv: minimist.ParsedArgs, programPath: string): RunOptions {
  const overrides: Partial<EditorConfig> = {};
  const steps = intFlag(argv.steps, "steps", 1);
  if (steps !== undefined) overrides.stepsPerFrame = steps;
  const maxBlocks = intFlag(argv["max-blocks"], "max-blocks");
  if (maxBlocks !== undefined) overrides.maxBlocks = maxBlocks;
  return {
    programPath,
    configPath: argv.config ? resolve(argv.config) : undefined,
    basePath: argv.base ? resolve(argv.base) : undefined,
    overrides,
    thumbPath: argv.thumb ? resolve(argv.thumb) : undefined,
    thumbSize: intFlag(argv["thumb-size"], "thumb-size", 1) ?? 256,
    snapshotPath: argv.snapshot ? resolve(argv.snapshot) : undefined
  };
}
