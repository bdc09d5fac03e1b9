import type { Bounds, Vec3 } from "./types.js";

export function emptyBounds(): Bounds {
  return {
    minX: 0,
    minY: 0,
    minZ: 0,
    maxX: -1,
    maxY: -1,
    maxZ: -1,
    dx: 0,
    dy: 0,
    dz: 0
  };
}

export function isEmptyBounds(bounds: Bounds): boolean {
  return bounds.dx <= 0 || bounds.dy <= 0 || bounds.dz <= 0;
}

export function boundsFromMinMax(min: Vec3, max: Vec3): Bounds {
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

export function unionBounds(a: Bounds, b: Bounds): Bounds {
  if (isEmptyBounds(a)) return { ...b };
  if (isEmptyBounds(b)) return { ...a };
  return boundsFromMinMax(
    [Math.min(a.minX, b.minX), Math.min(a.minY, b.minY), Math.min(a.minZ, b.minZ)],
    [Math.max(a.maxX, b.maxX), Math.max(a.maxY, b.maxY), Math.max(a.maxZ, b.maxZ)]
  );
}

export function intersectBounds(a: Bounds, b: Bounds): Bounds {
  const minX = Math.max(a.minX, b.minX);
  const minY = Math.max(a.minY, b.minY);
  const minZ = Math.max(a.minZ, b.minZ);
  const maxX = Math.min(a.maxX, b.maxX);
  const maxY = Math.min(a.maxY, b.maxY);
  const maxZ = Math.min(a.maxZ, b.maxZ);
  if (minX > maxX || minY > maxY || minZ > maxZ) {
    return emptyBounds();
  }
  return boundsFromMinMax([minX, minY, minZ], [maxX, maxY, maxZ]);
}

export function voxelCoordKey(x: number, y: number, z: number): string {
  return `${x},${y},${z}`;
}

export function compareCoords(a: Vec3, b: Vec3): number {
  // z-major, then y, then x
  if (a[2] !== b[2]) return a[2] - b[2];
  if (a[1] !== b[1]) return a[1] - b[1];
  return a[0] - b[0];
}
