import { isEmptyBounds, type Color } from "@voxedit/core";
import type { Mesh } from "@voxedit/mesh";

export type Axis = 0 | 1 | 2;

export interface GreedyQuad {
  axis: Axis;
  dir: 1 | -1;
  x: number;
  y: number;
  z: number;
  w: number;
  h: number;
  color: Color;
  transparent: boolean;
}

interface MaskCell {
  packed: number;
  color: Color;
  dir: 1 | -1;
}

const AXES: readonly Axis[] = [0, 1, 2];
const NEXT_AXIS: Readonly<Record<Axis, Axis>> = { 0: 1, 1: 2, 2: 0 };

function packColor(c: Color): number {
  return ((c[0] << 24) | (c[1] << 16) | (c[2] << 8) | c[3]) >>> 0;
}

function cellEquals(a: MaskCell | null, b: MaskCell | null): boolean {
  if (!a || !b) return false;
  return a.packed === b.packed && a.dir === b.dir;
}

/**
 * Merges coplanar faces of equal color into rectangles. Faces only exist
 * where a voxel meets an empty voxel or one of another color. Coordinates
 * are in voxel space.
 */
export function greedyMesh(mesh: Mesh): GreedyQuad[] {
  const bounds = mesh.boundingBox();
  if (isEmptyBounds(bounds)) return [];
  const min: [number, number, number] = [bounds.minX, bounds.minY, bounds.minZ];
  const dims: [number, number, number] = [bounds.dx, bounds.dy, bounds.dz];
  const quads: GreedyQuad[] = [];

  const colorAt = (p: number[]): Color | null => {
    if (p[0] < 0 || p[1] < 0 || p[2] < 0 || p[0] >= dims[0] || p[1] >= dims[1] || p[2] >= dims[2]) {
      return null;
    }
    const c = mesh.getVoxel([p[0] + min[0], p[1] + min[1], p[2] + min[2]]);
    return c[3] === 0 ? null : c;
  };

  for (const d of AXES) {
    const u = NEXT_AXIS[d];
    const v = NEXT_AXIS[u];
    const x = [0, 0, 0];
    const q = [0, 0, 0];
    q[d] = 1;
    const mask = new Array<MaskCell | null>(dims[u] * dims[v]);

    for (x[d] = -1; x[d] < dims[d]; x[d]++) {
      let n = 0;
      for (x[v] = 0; x[v] < dims[v]; x[v]++) {
        for (x[u] = 0; x[u] < dims[u]; x[u]++) {
          const a = colorAt(x);
          const b = colorAt([x[0] + q[0], x[1] + q[1], x[2] + q[2]]);
          const pa = a ? packColor(a) : 0;
          const pb = b ? packColor(b) : 0;
          if (pa === pb) {
            mask[n++] = null;
          } else if (a) {
            mask[n++] = { packed: pa, color: a, dir: 1 };
          } else if (b) {
            mask[n++] = { packed: pb, color: b, dir: -1 };
          } else {
            mask[n++] = null;
          }
        }
      }

      n = 0;
      for (let j = 0; j < dims[v]; j++) {
        for (let i = 0; i < dims[u]; i++) {
          const cell = mask[n];
          if (!cell) {
            n++;
            continue;
          }

          let w = 1;
          while (i + w < dims[u] && cellEquals(mask[n + w], cell)) {
            w++;
          }

          let h = 1;
          outer: for (; j + h < dims[v]; h++) {
            for (let k = 0; k < w; k++) {
              if (!cellEquals(mask[n + k + h * dims[u]], cell)) {
                break outer;
              }
            }
          }

          const origin = [min[0], min[1], min[2]];
          origin[u] += i;
          origin[v] += j;
          origin[d] += x[d] + 1;

          quads.push({
            axis: d,
            dir: cell.dir,
            x: origin[0],
            y: origin[1],
            z: origin[2],
            w,
            h,
            color: cell.color,
            transparent: cell.color[3] < 255
          });

          for (let l = 0; l < h; l++) {
            for (let k = 0; k < w; k++) {
              mask[n + k + l * dims[u]] = null;
            }
          }

          i += w - 1;
          n += w;
        }
      }
    }
  }

  quads.sort((a, b) => {
    if (a.axis !== b.axis) return a.axis - b.axis;
    if (a.dir !== b.dir) return a.dir - b.dir;
    if (a.z !== b.z) return a.z - b.z;
    if (a.y !== b.y) return a.y - b.y;
    if (a.x !== b.x) return a.x - b.x;
    return packColor(a.color) - packColor(b.color);
  });

  return quads;
}

export function quadAxes(quad: GreedyQuad): [Axis, Axis] {
  const u = NEXT_AXIS[quad.axis];
  return [u, NEXT_AXIS[u]];
}
