import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { AllocationFailureError, contentDigest, type PositionedVoxel } from "@voxedit/core";
import { deserializeMesh, BlockPool, Mesh, serializeMesh } from "@voxedit/mesh";
import { formatDiagnostic, runProgram } from "../src/run.js";

const WHITE = [255, 255, 255, 255] as const;

function workspace(files: Record<string, string>): string {
  const base = mkdtempSync(join(tmpdir(), "voxedit-run-"));
  for (const [name, text] of Object.entries(files)) {
    writeFileSync(join(base, name), text);
  }
  return base;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runProgram", () => {
  it("summarizes the document a program builds", () => {
    const base = workspace({ "cube.yaml": "- shape: cube\n  size: 2\n" });
    const summary = runProgram({ programPath: join(base, "cube.yaml") });

    const expected: PositionedVoxel[] = [];
    for (let z = 0; z < 2; z++) {
      for (let y = 0; y < 2; y++) {
        for (let x = 0; x < 2; x++) expected.push({ x, y, z, color: WHITE });
      }
    }
    expect(summary).toMatchObject({
      steps: 1,
      frames: 1,
      layers: 1,
      blocks: 1,
      voxels: 8,
      bounds: { min: [0, 0, 0], max: [1, 1, 1] },
      warnings: []
    });
    expect(summary.digest).toBe(contentDigest(expected, { layer: "Layer 1" }));
    expect(summary.key).not.toBe(0);
  });

  it("reads the frame budget from the config file", () => {
    const base = workspace({
      "row.yaml": "- shape: cube\n  size: 1\n  repeat: 3\n  step: [2, 0, 0]\n",
      "config.yaml": "stepsPerFrame: 1\n"
    });
    const summary = runProgram({ programPath: join(base, "row.yaml"), configPath: join(base, "config.yaml") });
    expect(summary.frames).toBe(3);
    expect(summary.voxels).toBe(3);

    const overridden = runProgram({
      programPath: join(base, "row.yaml"),
      configPath: join(base, "config.yaml"),
      overrides: { stepsPerFrame: 2 }
    });
    expect(overridden.frames).toBe(2);
  });

  it("writes a thumbnail and a mesh snapshot", () => {
    const base = workspace({ "cube.yaml": "- shape: sphere\n  size: 6\n  color: \"#3366ff\"\n" });
    const thumb = join(base, "out", "thumb.png");
    const snapshot = join(base, "out", "mesh.json");
    const summary = runProgram({ programPath: join(base, "cube.yaml"), thumbPath: thumb, thumbSize: 32, snapshotPath: snapshot });

    expect(summary.thumbnail?.path).toBe(thumb);
    expect(summary.thumbnail?.cacheKey).toMatch(/^[0-9a-f]{64}$/);
    expect([...readFileSync(thumb).subarray(1, 4)]).toEqual([0x50, 0x4e, 0x47]);

    const restored = deserializeMesh(JSON.parse(readFileSync(snapshot, "utf8")), new BlockPool());
    expect([...restored.iterateVoxels()]).toHaveLength(summary.voxels);
  });

  it("places the program on a base layer", () => {
    const baseMesh = new Mesh(new BlockPool());
    baseMesh.setVoxel([10, 2, 0], [255, 0, 0, 255]);
    baseMesh.setVoxel([12, 4, 0], [255, 0, 0, 255]);
    const base = workspace({
      "cube.yaml": "- shape: cube\n  size: 2\n",
      "base.json": JSON.stringify(serializeMesh(baseMesh))
    });
    const summary = runProgram({ programPath: join(base, "cube.yaml"), basePath: join(base, "base.json") });

    expect(summary).toMatchObject({
      frames: 1,
      layers: 2,
      voxels: 8,
      bounds: { min: [10, 2, 0], max: [11, 3, 1] }
    });
  });

  it("refuses a program with errors", () => {
    const base = workspace({ "bad.yaml": "- shape: cone\n  size: 1\n" });
    expect(() => runProgram({ programPath: join(base, "bad.yaml") })).toThrow(
      "Program has errors: PROC_SHAPE_UNKNOWN Step 1: shape must be one of cube, sphere, cylinder"
    );
  });

  it("fails when the block budget is exhausted", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const base = workspace({ "wide.yaml": "- shape: cube\n  size: [20, 1, 1]\n" });
    expect(() => runProgram({ programPath: join(base, "wide.yaml"), overrides: { maxBlocks: 1 } })).toThrow(
      AllocationFailureError
    );
    expect(log).toHaveBeenCalledWith("[document] fatal: Block budget exhausted: 1 live blocks");
  });
});

describe("formatDiagnostic", () => {
  it("appends the line when known", () => {
    expect(formatDiagnostic({ code: "PROC_YAML_INVALID", severity: "error", message: "bad indent", line: 3 })).toBe(
      "PROC_YAML_INVALID bad indent (line 3)"
    );
  });
});
