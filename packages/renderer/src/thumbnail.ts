import { PNG } from "pngjs";
import { Matrix4, PerspectiveCamera, Vector3 } from "three";
import { isEmptyBounds } from "@voxedit/core";
import type { Mesh } from "@voxedit/mesh";
import { greedyMesh, quadAxes, type GreedyQuad } from "./greedy.js";

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface ThumbnailOptions {
  width?: number;
  height?: number;
  background?: Rgb & { a?: number };
  yawDeg?: number;
  pitchDeg?: number;
  fovDeg?: number;
}

type Quad3 = [Vector3, Vector3, Vector3, Vector3];

interface Face2D {
  p: Quad3;
  depth: number;
  color: Rgb;
  alpha: number;
}

function quadToVertices(q: GreedyQuad): Quad3 {
  const p = [q.x, q.y, q.z];
  const u = [0, 0, 0];
  const v = [0, 0, 0];
  const [axisU, axisV] = quadAxes(q);
  u[axisU] = q.w;
  v[axisV] = q.h;

  const a = new Vector3(p[0], p[1], p[2]);
  const b = new Vector3(p[0] + u[0], p[1] + u[1], p[2] + u[2]);
  const c = new Vector3(p[0] + u[0] + v[0], p[1] + u[1] + v[1], p[2] + u[2] + v[2]);
  const d = new Vector3(p[0] + v[0], p[1] + v[1], p[2] + v[2]);

  if (q.dir === 1) return [a, b, c, d];
  return [a, d, c, b];
}

function drawTriangle(
  pixels: Uint8Array,
  width: number,
  height: number,
  p0: Vector3,
  p1: Vector3,
  p2: Vector3,
  color: Rgb,
  alpha: number
): void {
  const minX = Math.max(0, Math.floor(Math.min(p0.x, p1.x, p2.x)));
  const maxX = Math.min(width - 1, Math.ceil(Math.max(p0.x, p1.x, p2.x)));
  const minY = Math.max(0, Math.floor(Math.min(p0.y, p1.y, p2.y)));
  const maxY = Math.min(height - 1, Math.ceil(Math.max(p0.y, p1.y, p2.y)));

  const edge = (ax: number, ay: number, bx: number, by: number, cx: number, cy: number): number =>
    (cx - ax) * (by - ay) - (cy - ay) * (bx - ax);

  const area = edge(p0.x, p0.y, p1.x, p1.y, p2.x, p2.y);
  if (area === 0) return;

  const t = alpha / 255;
  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      const px = x + 0.5;
      const py = y + 0.5;
      const w0 = edge(p1.x, p1.y, p2.x, p2.y, px, py);
      const w1 = edge(p2.x, p2.y, p0.x, p0.y, px, py);
      const w2 = edge(p0.x, p0.y, p1.x, p1.y, px, py);
      const inside = area > 0 ? w0 >= 0 && w1 >= 0 && w2 >= 0 : w0 <= 0 && w1 <= 0 && w2 <= 0;
      if (!inside) continue;
      const idx = (y * width + x) * 4;
      pixels[idx] = Math.round(pixels[idx] + (color.r - pixels[idx]) * t);
      pixels[idx + 1] = Math.round(pixels[idx + 1] + (color.g - pixels[idx + 1]) * t);
      pixels[idx + 2] = Math.round(pixels[idx + 2] + (color.b - pixels[idx + 2]) * t);
      pixels[idx + 3] = Math.max(pixels[idx + 3], alpha);
    }
  }
}

function toScreen(v: Vector3, width: number, height: number): Vector3 {
  return new Vector3(
    (v.x * 0.5 + 0.5) * (width - 1),
    (1 - (v.y * 0.5 + 0.5)) * (height - 1),
    v.z
  );
}

function applyBrightness(color: Rgb, factor: number): Rgb {
  return {
    r: Math.max(0, Math.min(255, Math.round(color.r * factor))),
    g: Math.max(0, Math.min(255, Math.round(color.g * factor))),
    b: Math.max(0, Math.min(255, Math.round(color.b * factor)))
  };
}

function encodePng(pixels: Uint8Array, width: number, height: number): Buffer {
  const png = new PNG({ width, height });
  png.data = Buffer.from(pixels);
  return PNG.sync.write(png);
}

/** Software rasterized view of a mesh, lit per face axis. */
export function renderThumbnailPng(mesh: Mesh, options: ThumbnailOptions = {}): Buffer {
  const width = options.width ?? 256;
  const height = options.height ?? 256;
  const bg = options.background ?? { r: 238, g: 241, b: 246, a: 255 };

  const pixels = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    const idx = i * 4;
    pixels[idx] = bg.r;
    pixels[idx + 1] = bg.g;
    pixels[idx + 2] = bg.b;
    pixels[idx + 3] = bg.a ?? 255;
  }

  const bounds = mesh.boundingBox();
  const quads = greedyMesh(mesh);
  if (quads.length === 0 || isEmptyBounds(bounds)) {
    return encodePng(pixels, width, height);
  }

  const center = new Vector3(
    bounds.minX + bounds.dx / 2,
    bounds.minY + bounds.dy / 2,
    bounds.minZ + bounds.dz / 2
  );
  const maxDim = Math.max(bounds.dx, bounds.dy, bounds.dz);
  const yaw = ((options.yawDeg ?? 45) * Math.PI) / 180;
  const pitch = ((options.pitchDeg ?? 35.26438968) * Math.PI) / 180;
  const fov = options.fovDeg ?? 35;
  const radius = maxDim * 2.8 + 6;

  // Voxel space is z-up; the camera orbits around the z axis.
  const camera = new PerspectiveCamera(fov, width / height, 0.1, 10000);
  const dir = new Vector3(
    Math.cos(pitch) * Math.cos(yaw),
    Math.cos(pitch) * Math.sin(yaw),
    Math.sin(pitch)
  ).normalize();
  camera.position.copy(center.clone().addScaledVector(dir, radius));
  camera.up.set(0, 0, 1);
  camera.lookAt(center);
  camera.updateMatrixWorld(true);
  camera.updateProjectionMatrix();

  const worldToCamera = new Matrix4().copy(camera.matrixWorldInverse);
  const faces: Face2D[] = [];
  for (const quad of quads) {
    const worldVerts = quadToVertices(quad);
    const [s0, s1, s2, s3] = worldVerts.map((v) => toScreen(v.clone().project(camera), width, height));
    const depth = worldVerts.reduce((sum, p) => sum + p.clone().applyMatrix4(worldToCamera).z, 0) / 4;
    let light = 1;
    if (quad.axis === 2) light = 1.12; // top brighter
    if (quad.axis === 0) light = 0.92;
    if (quad.axis === 1) light = 0.82;
    faces.push({
      p: [s0, s1, s2, s3],
      depth,
      color: applyBrightness({ r: quad.color[0], g: quad.color[1], b: quad.color[2] }, light),
      alpha: quad.color[3]
    });
  }

  faces.sort((a, b) => a.depth - b.depth);
  for (const face of faces) {
    drawTriangle(pixels, width, height, face.p[0], face.p[1], face.p[2], face.color, face.alpha);
    drawTriangle(pixels, width, height, face.p[0], face.p[2], face.p[3], face.color, face.alpha);
  }

  return encodePng(pixels, width, height);
}
