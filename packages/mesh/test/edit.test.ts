import { describe, expect, it } from "vitest";
import { boundsFromMinMax, EMPTY, type Color } from "@voxedit/core";
import {
  BlockPool,
  cropToBounds,
  fillBounds,
  Mesh,
  paintShape,
  setVoxels,
  shapeBoxBounds,
  SYMMETRY_X,
  type Painter
} from "../src/index.js";

const RED: Color = [255, 0, 0, 255];

function painter(overrides: Partial<Painter> = {}): Painter {
  return { op: "add", shape: "cube", color: RED, ...overrides };
}

describe("shapeBoxBounds", () => {
  it("covers the voxels whose cells overlap the box", () => {
    expect(shapeBoxBounds({ center: [0, 0, 0], halfSize: [2, 2, 2] })).toEqual({
      minX: -2,
      minY: -2,
      minZ: -2,
      maxX: 1,
      maxY: 1,
      maxZ: 1,
      dx: 4,
      dy: 4,
      dz: 4
    });
  });
});

describe("paintShape", () => {
  it("adds a cube", () => {
    const mesh = new Mesh(new BlockPool());
    expect(paintShape(mesh, painter(), { center: [0, 0, 0], halfSize: [2, 2, 2] })).toBe(true);
    expect([...mesh.iterateVoxels()]).toHaveLength(64);
    expect(mesh.getVoxel([-2, 1, 0])).toEqual(RED);
    expect(mesh.getVoxel([2, 0, 0])).toEqual(EMPTY);
  });

  it("rasterizes a sphere by voxel centers", () => {
    const mesh = new Mesh(new BlockPool());
    paintShape(mesh, painter({ shape: "sphere" }), { center: [0, 0, 0], halfSize: [3, 3, 3] });
    expect(mesh.getVoxel([0, 0, 0])).toEqual(RED);
    expect(mesh.getVoxel([-3, 0, 0])).toEqual(RED);
    expect(mesh.getVoxel([2, 2, 2])).toEqual(EMPTY);
  });

  it("subtracts a shape", () => {
    const mesh = new Mesh(new BlockPool());
    paintShape(mesh, painter(), { center: [0, 0, 0], halfSize: [2, 2, 2] });
    paintShape(mesh, painter({ op: "subtract" }), { center: [0, 0, 0], halfSize: [1, 1, 1] });
    expect([...mesh.iterateVoxels()]).toHaveLength(56);
    expect(mesh.getVoxel([0, 0, 0])).toEqual(EMPTY);
  });

  it("mirrors across symmetry axes", () => {
    const mesh = new Mesh(new BlockPool());
    paintShape(mesh, painter({ symmetry: SYMMETRY_X, symmetryOrigin: [0, 0, 0] }), {
      center: [5.5, 0.5, 0.5],
      halfSize: [0.5, 0.5, 0.5]
    });
    expect(mesh.getVoxel([5, 0, 0])).toEqual(RED);
    expect(mesh.getVoxel([-6, 0, 0])).toEqual(RED);
    expect([...mesh.iterateVoxels()]).toHaveLength(2);
  });

  it("reports unchanged when painting nothing new", () => {
    const mesh = new Mesh(new BlockPool());
    const box = { center: [0, 0, 0] as const, halfSize: [1, 1, 1] as const };
    paintShape(mesh, painter(), box);
    const key = mesh.key;
    expect(paintShape(mesh, painter(), box)).toBe(false);
    expect(mesh.key).toBe(key);
  });
});

describe("setVoxels", () => {
  it("applies all writes or none", () => {
    const pool = new BlockPool({ maxBlocks: 2 });
    const mesh = new Mesh(pool);
    mesh.setVoxel([0, 0, 0], RED);

    expect(() =>
      setVoxels(mesh, [
        { pos: [1, 0, 0], color: RED },
        { pos: [40, 0, 0], color: RED }
      ])
    ).toThrow("Block budget exhausted");
    expect(mesh.getVoxel([1, 0, 0])).toEqual(EMPTY);
    expect(mesh.blockCount).toBe(1);
    expect(pool.liveBlocks).toBe(1);
    expect([...mesh.iterateBlocks()][0].block.refCount).toBe(1);

    expect(setVoxels(mesh, [{ pos: [1, 0, 0], color: RED }])).toBe(1);
    expect(mesh.getVoxel([1, 0, 0])).toEqual(RED);
    expect(pool.liveBlocks).toBe(1);
  });
});

describe("fillBounds", () => {
  it("counts changed voxels", () => {
    const mesh = new Mesh(new BlockPool());
    const bounds = boundsFromMinMax([0, 0, 0], [1, 1, 1]);
    expect(fillBounds(mesh, bounds, RED)).toBe(8);
    expect(fillBounds(mesh, bounds, RED)).toBe(0);
  });
});

describe("cropToBounds", () => {
  it("keeps only voxels inside the bounds", () => {
    const mesh = new Mesh(new BlockPool());
    mesh.setVoxel([0, 0, 0], RED);
    mesh.setVoxel([5, 5, 5], RED);
    const cropped = cropToBounds(mesh, boundsFromMinMax([-1, -1, -1], [1, 1, 1]));
    expect(cropped.getVoxel([0, 0, 0])).toEqual(RED);
    expect(cropped.getVoxel([5, 5, 5])).toEqual(EMPTY);
    expect(mesh.getVoxel([5, 5, 5])).toEqual(RED);
  });
});
