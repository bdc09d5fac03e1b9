import type { Bounds, Color, Vec3 } from "@voxedit/core";
import type { Mesh } from "./mesh.js";

export type ShapeKind = "cube" | "sphere" | "cylinder";

export const SHAPES: readonly ShapeKind[] = ["cube", "sphere", "cylinder"];

export function isShapeKind(value: unknown): value is ShapeKind {
  return typeof value === "string" && (SHAPES as readonly string[]).includes(value);
}

/** Axis aligned placement of a shape: center and half extents, in voxels. */
export interface ShapeBox {
  center: Vec3;
  halfSize: Vec3;
}

export function shapeContains(shape: ShapeKind, x: number, y: number, z: number): boolean {
  switch (shape) {
    case "cube":
      return Math.abs(x) <= 1 && Math.abs(y) <= 1 && Math.abs(z) <= 1;
    case "sphere":
      return x * x + y * y + z * z <= 1;
    case "cylinder":
      return x * x + y * y <= 1 && Math.abs(z) <= 1;
  }
}

export function shapeBoxBounds(box: ShapeBox): Bounds {
  const min = box.center.map((c, i) => Math.floor(c - box.halfSize[i]));
  const max = box.center.map((c, i) => Math.ceil(c + box.halfSize[i]) - 1);
  return {
    minX: min[0],
    minY: min[1],
    minZ: min[2],
    maxX: max[0],
    maxY: max[1],
    maxZ: max[2],
    dx: max[0] - min[0] + 1,
    dy: max[1] - min[1] + 1,
    dz: max[2] - min[2] + 1
  };
}

export function boundsToShapeBox(bounds: Bounds): ShapeBox {
  return {
    center: [bounds.minX + bounds.dx / 2, bounds.minY + bounds.dy / 2, bounds.minZ + bounds.dz / 2],
    halfSize: [bounds.dx / 2, bounds.dy / 2, bounds.dz / 2]
  };
}

/** Writes every voxel whose center lies inside the shape into `target`. */
export function rasterizeShape(target: Mesh, shape: ShapeKind, box: ShapeBox, color: Color): void {
  const [hx, hy, hz] = box.halfSize;
  if (hx <= 0 || hy <= 0 || hz <= 0) return;
  const b = shapeBoxBounds(box);
  for (let z = b.minZ; z <= b.maxZ; z++) {
    for (let y = b.minY; y <= b.maxY; y++) {
      for (let x = b.minX; x <= b.maxX; x++) {
        const nx = (x + 0.5 - box.center[0]) / hx;
        const ny = (y + 0.5 - box.center[1]) / hy;
        const nz = (z + 0.5 - box.center[2]) / hz;
        if (shapeContains(shape, nx, ny, nz)) {
          target.setVoxel([x, y, z], color);
        }
      }
    }
  }
}
