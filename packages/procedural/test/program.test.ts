import { describe, expect, it } from "vitest";
import { boundsFromMinMax, EMPTY } from "@voxedit/core";
import { BlockPool, Mesh } from "@voxedit/mesh";
import { parseProgram, ProceduralError, ProceduralProgram } from "../src/index.js";

const TOWER = `
- shape: cube
  at: [0, 0, 0]
  size: 2
  color: "#ff0000"
- shape: cube
  size: 1
  op: subtract
- shape: cube
  at: [5, 0, 0]
  size: 1
  repeat: 3
  step: [2, 0, 0]
`;

function voxelCount(mesh: Mesh): number {
  return [...mesh.iterateVoxels()].length;
}

describe("parseProgram", () => {
  it("reads steps with defaults", () => {
    const result = parseProgram(TOWER);
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.steps).toHaveLength(3);
    expect(result.steps[0]).toEqual({
      shape: "cube",
      at: [0, 0, 0],
      size: [2, 2, 2],
      color: [255, 0, 0, 255],
      op: "add",
      repeat: 1,
      step: [0, 0, 0]
    });
    expect(result.steps[1].op).toBe("subtract");
    expect(result.steps[2].color).toEqual([255, 255, 255, 255]);
  });

  it("accepts a mapping with a steps list", () => {
    const result = parseProgram("steps:\n  - shape: cylinder\n    size: [3, 3, 6]\n    color: [0, 128, 255]\n");
    expect(result.valid).toBe(true);
    expect(result.steps[0].size).toEqual([3, 3, 6]);
    expect(result.steps[0].color).toEqual([0, 128, 255, 255]);
  });

  it("collects every problem of a bad step", () => {
    const result = parseProgram("- shape: pyramid\n  size: 0\n  op: xor\n");
    expect(result.valid).toBe(false);
    expect(result.steps).toEqual([]);
    expect(result.errors.map((d) => d.code)).toEqual(["PROC_SHAPE_UNKNOWN", "PROC_VECTOR_INVALID", "PROC_OP_UNKNOWN"]);
    expect(result.errors[0].message).toBe("Step 1: shape must be one of cube, sphere, cylinder");
  });

  it("warns about unknown keys", () => {
    const result = parseProgram("- shape: cube\n  size: 1\n  colour: red\n");
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      { code: "PROC_KEY_UNKNOWN", severity: "warning", message: 'Step 1: unknown key "colour" ignored' }
    ]);
  });

  it("rejects bad colors and repeats", () => {
    const result = parseProgram("- shape: cube\n  size: 1\n  color: [300, 0, 0]\n  repeat: 1.5\n");
    expect(result.errors.map((d) => d.code)).toEqual(["PROC_COLOR_INVALID", "PROC_REPEAT_INVALID"]);
  });

  it("reports YAML syntax errors", () => {
    const result = parseProgram("- shape: [cube\n");
    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe("PROC_YAML_INVALID");
    expect(typeof result.errors[0].line).toBe("number");
  });

  it("requires a list", () => {
    const result = parseProgram("shape: cube\n");
    expect(result.errors.map((d) => d.code)).toEqual(["PROC_NOT_A_LIST"]);
  });

  it("treats an empty document as an empty program", () => {
    const result = parseProgram("");
    expect(result.valid).toBe(true);
    expect(result.warnings.map((d) => d.code)).toEqual(["PROC_EMPTY"]);
  });
});

describe("ProceduralProgram", () => {
  it("runs a budget of shape operations per frame", () => {
    const program = new ProceduralProgram();
    expect(program.state).toBe("init");
    expect(program.parse(TOWER)).toBe(true);
    expect(program.state).toBe("ready");

    const mesh = new Mesh(new BlockPool());
    program.start();
    expect(program.state).toBe("running");
    expect(program.iter(mesh, 2)).toBe("running");
    expect(program.progress).toEqual({ done: 2, total: 5 });
    expect(voxelCount(mesh)).toBe(7);
    expect(mesh.getVoxel([0, 0, 0])).toEqual(EMPTY);

    expect(program.iter(mesh, 2)).toBe("running");
    expect(program.iter(mesh, 2)).toBe("done");
    expect(program.frameCount).toBe(3);
    expect(voxelCount(mesh)).toBe(10);
    expect(mesh.getVoxel([9, 0, 0])).toEqual([255, 255, 255, 255]);
    expect(mesh.getVoxel([8, 0, 0])).toEqual(EMPTY);
    expect(program.iter(mesh, 2)).toBe("done");
  });

  it("refuses to start after a parse error", () => {
    const program = new ProceduralProgram();
    expect(program.parse("- shape: blob\n  size: 1\n")).toBe(false);
    expect(program.state).toBe("parseError");
    expect(program.errors).toHaveLength(1);
    expect(() => program.start()).toThrow(ProceduralError);
  });

  it("stops back to ready and restarts from the first step", () => {
    const program = new ProceduralProgram();
    program.parse(TOWER);
    const mesh = new Mesh(new BlockPool());
    program.start();
    program.iter(mesh, 1);
    program.stop();
    expect(program.state).toBe("ready");
    expect(program.iter(mesh, 10)).toBe("ready");
    program.start();
    expect(program.progress).toEqual({ done: 0, total: 5 });
    expect(program.runToCompletion(mesh, 2)).toBe(3);
  });

  it("places the program at the min corner of the given bounds", () => {
    const program = new ProceduralProgram();
    program.parse("- shape: cube\n  size: 1\n");
    const mesh = new Mesh(new BlockPool());
    program.start(boundsFromMinMax([16, 0, -4], [20, 3, 0]));
    program.runToCompletion(mesh);
    expect([...mesh.iterateVoxels()].map((v) => [v.x, v.y, v.z])).toEqual([[16, 0, -4]]);
  });

  it("finishes an empty program immediately", () => {
    const program = new ProceduralProgram();
    program.parse("[]");
    program.start();
    expect(program.state).toBe("done");
  });

  it("rejects a zero frame budget", () => {
    const program = new ProceduralProgram();
    program.parse(TOWER);
    program.start();
    expect(() => program.iter(new Mesh(new BlockPool()), 0)).toThrow(ProceduralError);
  });

  it("asks for a rerun only when the base key changes", () => {
    const program = new ProceduralProgram();
    expect(program.needsRerun(0)).toBe(true);
    expect(program.needsRerun(0)).toBe(false);
    expect(program.needsRerun(1234)).toBe(true);
    expect(program.needsRerun(1234)).toBe(false);
  });
});
