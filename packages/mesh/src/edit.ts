import { normalizeColor, type Bounds, type Color, type Vec3 } from "@voxedit/core";
import { Mesh } from "./mesh.js";
import type { MergeOp } from "./merge.js";
import { boundsToShapeBox, rasterizeShape, type ShapeBox, type ShapeKind } from "./shapes.js";

export const SYMMETRY_X = 1 << 0;
export const SYMMETRY_Y = 1 << 1;
export const SYMMETRY_Z = 1 << 2;

export interface Painter {
  op: MergeOp;
  shape: ShapeKind;
  color: Color;
  /** Bitmask of SYMMETRY_* axes the shape is mirrored across. */
  symmetry?: number;
  symmetryOrigin?: Vec3;
}

export interface VoxelWrite {
  pos: Vec3;
  color: Color;
}

/**
 * Runs `fn` against `mesh` and keeps its changes only if `fn` returns; on a
 * throw the blocks it touched are put back. Inside an enclosing edit the
 * outer one decides.
 */
export function transact<T>(mesh: Mesh, fn: (work: Mesh) => T): T {
  if (mesh.inEdit) return fn(mesh);
  mesh.beginEdit();
  try {
    const result = fn(mesh);
    mesh.commitEdit();
    return result;
  } catch (error) {
    mesh.rollbackEdit();
    throw error;
  }
}

export function setVoxels(mesh: Mesh, writes: Iterable<VoxelWrite>): number {
  return transact(mesh, (work) => {
    let changed = 0;
    for (const w of writes) {
      if (work.setVoxel(w.pos, w.color)) changed++;
    }
    return changed;
  });
}

export function fillBounds(mesh: Mesh, bounds: Bounds, color: Color): number {
  const c = normalizeColor(color);
  return transact(mesh, (work) => {
    let changed = 0;
    for (let z = bounds.minZ; z <= bounds.maxZ; z++) {
      for (let y = bounds.minY; y <= bounds.maxY; y++) {
        for (let x = bounds.minX; x <= bounds.maxX; x++) {
          if (work.setVoxel([x, y, z], c)) changed++;
        }
      }
    }
    return changed;
  });
}

function mirroredBoxes(box: ShapeBox, symmetry: number, origin: Vec3): ShapeBox[] {
  const boxes: ShapeBox[] = [box];
  for (let axis = 0; axis < 3; axis++) {
    if ((symmetry & (1 << axis)) === 0) continue;
    const count = boxes.length;
    for (let i = 0; i < count; i++) {
      const src = boxes[i];
      const center: [number, number, number] = [src.center[0], src.center[1], src.center[2]];
      center[axis] = 2 * origin[axis] - center[axis];
      boxes.push({ center, halfSize: src.halfSize });
    }
  }
  return boxes;
}

/** Rasterizes the painter's shape (and its mirrors) and merges it in. */
export function paintShape(mesh: Mesh, painter: Painter, box: ShapeBox): boolean {
  const stroke = new Mesh(mesh.pool);
  try {
    const boxes = mirroredBoxes(box, painter.symmetry ?? 0, painter.symmetryOrigin ?? [0, 0, 0]);
    for (const b of boxes) {
      rasterizeShape(stroke, painter.shape, b, painter.color);
    }
    return mesh.merge(stroke, painter.op);
  } finally {
    stroke.release();
  }
}

/** Keeps only the voxels inside `bounds`. Returns a new mesh. */
export function cropToBounds(mesh: Mesh, bounds: Bounds): Mesh {
  const out = mesh.copy();
  const mask = new Mesh(mesh.pool);
  try {
    rasterizeShape(mask, "cube", boundsToShapeBox(bounds), [255, 255, 255, 255]);
    out.merge(mask, "intersect");
  } catch (error) {
    out.release();
    throw error;
  } finally {
    mask.release();
  }
  return out;
}
