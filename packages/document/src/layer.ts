import { Box3, Matrix4, Quaternion, Vector3 } from "three";
import { KeyHasher, type Color } from "@voxedit/core";
import type { MergeOp, Mesh, ShapeBox, ShapeKind } from "@voxedit/mesh";

export type LayerId = number;

/** What a shape layer regenerates its content from, inside its `mat` box. */
export interface ShapeSource {
  readonly shape: ShapeKind;
  readonly color: Color;
}

export interface Layer {
  readonly id: LayerId;
  name: string;
  mesh: Mesh;
  visible: boolean;
  mat: Matrix4;
  /** Optional editing box, used by the move and selection tools. */
  box: Box3 | null;
  /** How the layer folds into the merged result. */
  op: MergeOp;
  /** Set for clone layers: the layer mirrored and its mesh key at last sync. */
  baseId: LayerId | null;
  baseMeshKey: number;
  /** Set for shape layers, with the source key the mesh was generated from. */
  shape: ShapeSource | null;
  shapeKey: number;
}

export function createLayer(id: LayerId, name: string, mesh: Mesh): Layer {
  return {
    id,
    name,
    mesh,
    visible: true,
    mat: new Matrix4(),
    box: null,
    op: "add",
    baseId: null,
    baseMeshKey: 0,
    shape: null,
    shapeKey: 0
  };
}

/** Same fields, copy-on-write share of the mesh. */
export function copyLayer(layer: Layer): Layer {
  return {
    ...layer,
    mesh: layer.mesh.copy(),
    mat: layer.mat.clone(),
    box: layer.box ? layer.box.clone() : null
  };
}

export function layerKey(layer: Layer): number {
  const h = new KeyHasher(0x6c61796572)
    .int(layer.id)
    .string(layer.name)
    .bool(layer.visible)
    .string(layer.op)
    .int(layer.baseId ?? -1)
    .string(layer.shape?.shape ?? "")
    .key(layer.mesh.key);
  if (layer.shape) {
    for (const c of layer.shape.color) {
      h.int(c);
    }
  }
  for (const e of layer.mat.elements) {
    h.number(e);
  }
  if (layer.box) {
    h.bool(true)
      .number(layer.box.min.x)
      .number(layer.box.min.y)
      .number(layer.box.min.z)
      .number(layer.box.max.x)
      .number(layer.box.max.y)
      .number(layer.box.max.z);
  } else {
    h.bool(false);
  }
  return h.digest();
}

/** Changes whenever the shape, its color or the layer's box moves. */
export function shapeSourceKey(shape: ShapeSource, mat: Matrix4): number {
  const h = new KeyHasher(0x7368617065).string(shape.shape);
  for (const c of shape.color) {
    h.int(c);
  }
  for (const e of mat.elements) {
    h.number(e);
  }
  return h.digest();
}

/**
 * The unit cube [-1, 1]³ under `mat`, as an axis aligned shape box. Rotation
 * is dropped.
 */
export function matrixShapeBox(mat: Matrix4): ShapeBox {
  const position = new Vector3();
  const scale = new Vector3();
  mat.decompose(position, new Quaternion(), scale);
  return {
    center: [position.x, position.y, position.z],
    halfSize: [Math.abs(scale.x), Math.abs(scale.y), Math.abs(scale.z)]
  };
}

export function shapeBoxMatrix(box: ShapeBox): Matrix4 {
  return new Matrix4().compose(
    new Vector3(box.center[0], box.center[1], box.center[2]),
    new Quaternion(),
    new Vector3(box.halfSize[0], box.halfSize[1], box.halfSize[2])
  );
}
