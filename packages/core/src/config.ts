import { readFileSync } from "node:fs";
import YAML from "js-yaml";

export interface EditorConfig {
  /** Snapshots kept by the undo history, oldest dropped first. */
  historyLimit: number;
  /** Live block budget of the session's block pool; 0 means unbounded. */
  maxBlocks: number;
  noEdit: boolean;
  /** Shape operations a procedural program may run per frame. */
  stepsPerFrame: number;
}

export const DEFAULT_CONFIG: EditorConfig = {
  historyLimit: 128,
  maxBlocks: 0,
  noEdit: false,
  stepsPerFrame: 32
};

function readPositiveInt(obj: Record<string, unknown>, key: string, allowZero: boolean): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < (allowZero ? 0 : 1)) {
    throw new Error(`Invalid config value for ${key}: ${JSON.stringify(value)}`);
  }
  return value;
}

export function resolveConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  const merged = { ...DEFAULT_CONFIG };
  if (overrides.historyLimit !== undefined) merged.historyLimit = overrides.historyLimit;
  if (overrides.maxBlocks !== undefined) merged.maxBlocks = overrides.maxBlocks;
  if (overrides.noEdit !== undefined) merged.noEdit = overrides.noEdit;
  if (overrides.stepsPerFrame !== undefined) merged.stepsPerFrame = overrides.stepsPerFrame;
  return merged;
}

export function parseConfig(raw: string): Partial<EditorConfig> {
  const parsed: unknown = YAML.load(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return {};
  }
  const obj = parsed as Record<string, unknown>;
  const out: Partial<EditorConfig> = {};
  const historyLimit = readPositiveInt(obj, "historyLimit", false);
  if (historyLimit !== undefined) out.historyLimit = historyLimit;
  const maxBlocks = readPositiveInt(obj, "maxBlocks", true);
  if (maxBlocks !== undefined) out.maxBlocks = maxBlocks;
  const stepsPerFrame = readPositiveInt(obj, "stepsPerFrame", false);
  if (stepsPerFrame !== undefined) out.stepsPerFrame = stepsPerFrame;
  if (obj.noEdit !== undefined) {
    if (typeof obj.noEdit !== "boolean") {
      throw new Error(`Invalid config value for noEdit: ${JSON.stringify(obj.noEdit)}`);
    }
    out.noEdit = obj.noEdit;
  }
  return out;
}

export function readConfigFromYaml(path: string): Partial<EditorConfig> {
  return parseConfig(readFileSync(path, "utf8"));
}
