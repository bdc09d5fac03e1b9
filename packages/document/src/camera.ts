import { Matrix4, Quaternion, Vector3 } from "three";
import { isEmptyBounds, KeyHasher, type Bounds } from "@voxedit/core";

export type CameraId = number;

/**
 * Orbit camera: the eye sits `dist` away from the target along the rotated
 * view axis, and `ofs` moves the target.
 */
export interface Camera {
  readonly id: CameraId;
  name: string;
  ortho: boolean;
  dist: number;
  rot: Quaternion;
  ofs: Vector3;
  fovy: number;
  aspect: number;
}

export function createCamera(id: CameraId, name: string): Camera {
  return {
    id,
    name,
    ortho: false,
    dist: 128,
    rot: new Quaternion().setFromAxisAngle(new Vector3(1, 0, 0), -Math.PI / 4),
    ofs: new Vector3(0, 0, 0),
    fovy: 20,
    aspect: 1
  };
}

export function copyCamera(camera: Camera): Camera {
  return { ...camera, rot: camera.rot.clone(), ofs: camera.ofs.clone() };
}

export function cameraKey(camera: Camera): number {
  return new KeyHasher(0x63616d)
    .int(camera.id)
    .string(camera.name)
    .bool(camera.ortho)
    .number(camera.dist)
    .number(camera.rot.x)
    .number(camera.rot.y)
    .number(camera.rot.z)
    .number(camera.rot.w)
    .number(camera.ofs.x)
    .number(camera.ofs.y)
    .number(camera.ofs.z)
    .number(camera.fovy)
    .number(camera.aspect)
    .digest();
}

export function cameraViewMatrix(camera: Camera): Matrix4 {
  return new Matrix4()
    .makeTranslation(0, 0, -camera.dist)
    .multiply(new Matrix4().makeRotationFromQuaternion(camera.rot))
    .multiply(new Matrix4().makeTranslation(camera.ofs.x, camera.ofs.y, camera.ofs.z));
}

/** Centers the camera on `bounds` and backs off until all of it is in view. */
export function cameraFitBounds(camera: Camera, bounds: Bounds): void {
  if (isEmptyBounds(bounds)) return;
  camera.ofs.set(
    -(bounds.minX + bounds.dx / 2),
    -(bounds.minY + bounds.dy / 2),
    -(bounds.minZ + bounds.dz / 2)
  );
  const radius = Math.hypot(bounds.dx, bounds.dy, bounds.dz) / 2;
  const halfFov = (camera.fovy * Math.PI) / 360;
  camera.dist = radius / Math.sin(halfFov);
}
