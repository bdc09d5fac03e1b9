import YAML from "js-yaml";
import { normalizeColor, parseHexColor, type Color, type Diagnostic, type Vec3 } from "@voxedit/core";
import { isMergeOp, isShapeKind, SHAPES, type MergeOp, type ShapeKind } from "@voxedit/mesh";

/**
 * One program step: a shape filling the box that starts at `at` and spans
 * `size` voxels, drawn `repeat` times, moving by `step` each time.
 */
export interface ProgramStep {
  shape: ShapeKind;
  at: Vec3;
  size: Vec3;
  color: Color;
  op: MergeOp;
  repeat: number;
  step: Vec3;
}

export interface ProgramParseResult {
  valid: boolean;
  steps: ProgramStep[];
  warnings: Diagnostic[];
  errors: Diagnostic[];
}

const KNOWN_KEYS = new Set(["shape", "at", "size", "color", "op", "repeat", "step"]);
const WHITE: Color = [255, 255, 255, 255];

interface ParseState {
  warnings: Diagnostic[];
  errors: Diagnostic[];
}

function addDiagnostic(target: ParseState, diag: Diagnostic): void {
  if (diag.severity === "error") target.errors.push(diag);
  else target.warnings.push(diag);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readVector(value: unknown, positive: boolean): Vec3 | null {
  if (typeof value === "number") {
    value = [value, value, value];
  }
  if (!Array.isArray(value) || value.length !== 3) return null;
  const out: number[] = [];
  for (const c of value) {
    if (typeof c !== "number" || !Number.isInteger(c) || (positive && c <= 0)) return null;
    out.push(c);
  }
  return [out[0], out[1], out[2]];
}

function readColor(value: unknown): Color | null {
  if (typeof value === "string") {
    try {
      return parseHexColor(value);
    } catch {
      return null;
    }
  }
  if (!Array.isArray(value) || (value.length !== 3 && value.length !== 4)) return null;
  const channels: number[] = [];
  for (const c of value) {
    if (typeof c !== "number" || !Number.isInteger(c) || c < 0 || c > 255) return null;
    channels.push(c);
  }
  if (channels.length === 3) channels.push(255);
  return normalizeColor(channels);
}

function readStep(raw: unknown, index: number, state: ParseState): ProgramStep | null {
  const where = `Step ${index + 1}`;
  if (!isRecord(raw)) {
    addDiagnostic(state, { code: "PROC_STEP_INVALID", severity: "error", message: `${where}: expected a mapping` });
    return null;
  }
  let ok = true;
  const fail = (code: string, message: string): void => {
    addDiagnostic(state, { code, severity: "error", message: `${where}: ${message}` });
    ok = false;
  };

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      addDiagnostic(state, { code: "PROC_KEY_UNKNOWN", severity: "warning", message: `${where}: unknown key "${key}" ignored` });
    }
  }

  const shape = raw.shape;
  if (!isShapeKind(shape)) {
    fail("PROC_SHAPE_UNKNOWN", `shape must be one of ${SHAPES.join(", ")}`);
  }
  const at = readVector(raw.at ?? [0, 0, 0], false);
  if (!at) fail("PROC_VECTOR_INVALID", "at must be three integers");
  const size = readVector(raw.size, true);
  if (!size) fail("PROC_VECTOR_INVALID", "size must be a positive integer or three of them");
  const step = readVector(raw.step ?? [0, 0, 0], false);
  if (!step) fail("PROC_VECTOR_INVALID", "step must be three integers");

  const color = raw.color === undefined ? WHITE : readColor(raw.color);
  if (!color) fail("PROC_COLOR_INVALID", "color must be #rrggbb[aa] or a list of 3 or 4 channels");

  const op = raw.op ?? "add";
  if (!isMergeOp(op)) fail("PROC_OP_UNKNOWN", `unknown op ${JSON.stringify(op)}`);

  const repeat = raw.repeat ?? 1;
  if (typeof repeat !== "number" || !Number.isInteger(repeat) || repeat < 1) {
    fail("PROC_REPEAT_INVALID", "repeat must be a positive integer");
  }

  if (!ok || !isShapeKind(shape) || !at || !size || !step || !color || !isMergeOp(op) || typeof repeat !== "number") {
    return null;
  }
  return { shape, at, size, color, op, repeat, step };
}

/** Parses a YAML program: a list of steps, or a mapping with a `steps` list. */
export function parseProgram(text: string): ProgramParseResult {
  const state: ParseState = { warnings: [], errors: [] };
  const steps: ProgramStep[] = [];

  let doc: unknown;
  try {
    doc = YAML.load(text);
  } catch (error) {
    if (error instanceof YAML.YAMLException) {
      addDiagnostic(state, {
        code: "PROC_YAML_INVALID",
        severity: "error",
        message: error.reason || error.message,
        line: error.mark ? error.mark.line + 1 : undefined
      });
      return { valid: false, steps, ...state };
    }
    throw error;
  }

  const list = isRecord(doc) ? doc.steps : doc;
  if (doc === undefined || doc === null) {
    addDiagnostic(state, { code: "PROC_EMPTY", severity: "warning", message: "Program has no steps" });
    return { valid: true, steps, ...state };
  }
  if (!Array.isArray(list)) {
    addDiagnostic(state, { code: "PROC_NOT_A_LIST", severity: "error", message: "Program must be a list of steps" });
    return { valid: false, steps, ...state };
  }
  if (list.length === 0) {
    addDiagnostic(state, { code: "PROC_EMPTY", severity: "warning", message: "Program has no steps" });
  }

  list.forEach((raw: unknown, index) => {
    const step = readStep(raw, index, state);
    if (step) steps.push(step);
  });

  return { valid: state.errors.length === 0, steps, ...state };
}
