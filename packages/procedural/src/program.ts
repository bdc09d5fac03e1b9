import {
  DEFAULT_CONFIG,
  isEmptyBounds,
  VoxeditError,
  type Bounds,
  type Diagnostic,
  type Vec3
} from "@voxedit/core";
import { paintShape, type Mesh, type Painter, type ShapeBox } from "@voxedit/mesh";
import { parseProgram, type ProgramStep } from "./parse.js";

export type ProgramState = "init" | "parseError" | "ready" | "running" | "done";

export class ProceduralError extends VoxeditError {}

interface ShapeOp {
  painter: Painter;
  box: ShapeBox;
}

function expand(steps: ProgramStep[], origin: Vec3): ShapeOp[] {
  const ops: ShapeOp[] = [];
  for (const step of steps) {
    const painter: Painter = { op: step.op, shape: step.shape, color: step.color };
    const halfSize: Vec3 = [step.size[0] / 2, step.size[1] / 2, step.size[2] / 2];
    for (let r = 0; r < step.repeat; r++) {
      const center: Vec3 = [
        origin[0] + step.at[0] + step.step[0] * r + halfSize[0],
        origin[1] + step.at[1] + step.step[1] * r + halfSize[1],
        origin[2] + step.at[2] + step.step[2] * r + halfSize[2]
      ];
      ops.push({ painter, box: { center, halfSize } });
    }
  }
  return ops;
}

/**
 * A parsed program run a few shape operations per frame.
 *
 * init -> parseError | ready -> running -> done. `iter` is the per-frame
 * resume point; `stop` returns a running program to ready.
 */
export class ProceduralProgram {
  private current: ProgramState = "init";
  private steps: ProgramStep[] = [];
  private diagnostics: { warnings: Diagnostic[]; errors: Diagnostic[] } = { warnings: [], errors: [] };
  private ops: ShapeOp[] = [];
  private cursor = 0;
  private frames = 0;
  private lastBaseKey: number | null = null;

  public get state(): ProgramState {
    return this.current;
  }

  public get errors(): Diagnostic[] {
    return this.diagnostics.errors;
  }

  public get warnings(): Diagnostic[] {
    return this.diagnostics.warnings;
  }

  public get stepCount(): number {
    return this.steps.length;
  }

  public get progress(): { done: number; total: number } {
    return { done: this.cursor, total: this.ops.length };
  }

  public get frameCount(): number {
    return this.frames;
  }

  public parse(text: string): boolean {
    const result = parseProgram(text);
    this.diagnostics = { warnings: result.warnings, errors: result.errors };
    this.steps = result.valid ? result.steps : [];
    this.ops = [];
    this.cursor = 0;
    this.frames = 0;
    this.current = result.valid ? "ready" : "parseError";
    return result.valid;
  }

  /** Places the program at the min corner of `bounds`, or at the origin. */
  public start(bounds?: Bounds): void {
    if (this.current !== "ready" && this.current !== "done") {
      throw new ProceduralError("PROC_NOT_READY", `Cannot start a program in state ${this.current}`);
    }
    const origin: Vec3 = bounds && !isEmptyBounds(bounds) ? [bounds.minX, bounds.minY, bounds.minZ] : [0, 0, 0];
    this.ops = expand(this.steps, origin);
    this.cursor = 0;
    this.frames = 0;
    this.current = this.ops.length === 0 ? "done" : "running";
  }

  /** Runs up to `budget` shape operations into `mesh`. */
  public iter(mesh: Mesh, budget: number = DEFAULT_CONFIG.stepsPerFrame): ProgramState {
    if (this.current !== "running") return this.current;
    if (!Number.isInteger(budget) || budget < 1) {
      throw new ProceduralError("PROC_BUDGET_INVALID", `Frame budget must be a positive integer, got ${budget}`);
    }
    const end = Math.min(this.ops.length, this.cursor + budget);
    while (this.cursor < end) {
      const { painter, box } = this.ops[this.cursor];
      paintShape(mesh, painter, box);
      this.cursor++;
    }
    this.frames++;
    if (this.cursor >= this.ops.length) {
      this.current = "done";
    }
    return this.current;
  }

  /** Runs the remaining operations, frame by frame. Returns the frames used. */
  public runToCompletion(mesh: Mesh, budget: number = DEFAULT_CONFIG.stepsPerFrame): number {
    while (this.current === "running") {
      this.iter(mesh, budget);
    }
    return this.frames;
  }

  public stop(): void {
    if (this.current === "running") {
      this.current = "ready";
    }
  }

  /** True the first time and whenever the base layer's key moved since the last call. */
  public needsRerun(baseKey: number): boolean {
    if (this.lastBaseKey === baseKey) return false;
    this.lastBaseKey = baseKey;
    return true;
  }
}
