export type Vec3 = readonly [number, number, number];

/** RGBA, 0..255 per channel. Alpha 0 means the voxel is empty. */
export type Color = readonly [number, number, number, number];

export interface Bounds {
  minX: number;
  minY: number;
  minZ: number;
  maxX: number;
  maxY: number;
  maxZ: number;
  dx: number;
  dy: number;
  dz: number;
}

export interface PositionedVoxel {
  x: number;
  y: number;
  z: number;
  color: Color;
}

export interface Diagnostic {
  code: string;
  severity: "warning" | "error";
  message: string;
  line?: number;
}

export interface CanonicalMetadata {
  name?: string;
  layer?: string;
  [key: string]: string | number | boolean | null | undefined;
}
