import type { Matrix4 } from "three";
import {
  ConstraintViolationError,
  intersectBounds,
  isEmptyBounds,
  KeyHasher,
  normalizeColor,
  type Bounds,
  type Color,
  type Vec3
} from "@voxedit/core";
import {
  BlockPool,
  cropToBounds,
  defaultBlockPool,
  Mesh,
  rasterizeShape,
  type ShapeBox,
  type ShapeKind
} from "@voxedit/mesh";
import { cameraKey, copyCamera, createCamera, type Camera, type CameraId } from "./camera.js";
import {
  copyLayer,
  createLayer,
  layerKey,
  matrixShapeBox,
  shapeBoxMatrix,
  shapeSourceKey,
  type Layer,
  type LayerId
} from "./layer.js";

export interface ImageOptions {
  pool?: BlockPool;
  /** Read-only document: no layer accepts edits. */
  noEdit?: boolean;
}

/**
 * Captured image value. Meshes are copy-on-write shares, so a snapshot costs
 * one reference per block and never changes after capture.
 */
export interface ImageSnapshot {
  readonly layers: readonly Layer[];
  readonly activeLayerId: LayerId;
  readonly cameras: readonly Camera[];
  readonly activeCameraId: CameraId | null;
  readonly nextLayerId: number;
  readonly nextCameraId: number;
  readonly key: number;
}

export interface Clipboard {
  readonly mesh: Mesh;
  readonly bounds: Bounds;
}

export function releaseSnapshot(snapshot: ImageSnapshot): void {
  for (const layer of snapshot.layers) {
    layer.mesh.release();
  }
}

export class Image {
  public readonly pool: BlockPool;
  public noEdit: boolean;
  public path: string | null = null;
  public selection: Bounds | null = null;

  private readonly layerArena = new Map<LayerId, Layer>();
  private layerOrder: LayerId[] = [];
  private activeLayerId: LayerId = 0;
  private readonly cameraArena = new Map<CameraId, Camera>();
  private cameraOrder: CameraId[] = [];
  private activeCameraId: CameraId | null = null;
  private nextLayerId = 1;
  private nextCameraId = 1;
  private clip: Clipboard | null = null;
  private savedKey: number;
  private composite: { key: number; mesh: Mesh } | null = null;
  private compositeBuilds = 0;

  public constructor(options: ImageOptions = {}) {
    this.pool = options.pool ?? defaultBlockPool;
    this.noEdit = options.noEdit ?? false;
    this.newLayer();
    this.savedKey = this.key;
  }

  public get layers(): Layer[] {
    return this.layerOrder.map((id) => this.getLayer(id));
  }

  public get activeLayer(): Layer {
    return this.getLayer(this.activeLayerId);
  }

  public get cameras(): Camera[] {
    return this.cameraOrder.map((id) => this.getCamera(id));
  }

  public get activeCamera(): Camera | null {
    return this.activeCameraId === null ? null : this.getCamera(this.activeCameraId);
  }

  public get clipboard(): Clipboard | null {
    return this.clip;
  }

  public getLayer(id: LayerId): Layer {
    const layer = this.layerArena.get(id);
    if (!layer) {
      throw new ConstraintViolationError("LAYER_NOT_FOUND", `No layer with id ${id}`);
    }
    return layer;
  }

  public setActiveLayer(id: LayerId): void {
    this.activeLayerId = this.getLayer(id).id;
  }

  /** Clone and shape layers derive their content, so only ordinary layers take edits. */
  public layerCanEdit(layer: Layer): boolean {
    return !this.noEdit && layer.baseId === null && layer.shape === null;
  }

  public layerCanMove(layer: Layer): boolean {
    return !this.noEdit && this.layerArena.has(layer.id);
  }

  /** Inserted after the active layer, and made active. */
  public addLayer(name?: string): Layer {
    this.assertWritable();
    return this.newLayer(name);
  }

  /**
   * A layer whose content is `shape` filling `box`, regenerated whenever the
   * layer's transform or source changes.
   */
  public addShapeLayer(shape: ShapeKind, color: Color, box: ShapeBox, name?: string): Layer {
    this.assertWritable();
    const id = this.nextLayerId;
    const layer = this.newLayer(name ?? `Shape ${id}`);
    layer.shape = { shape, color: normalizeColor(color) };
    layer.mat = shapeBoxMatrix(box);
    this.regenerateShape(layer);
    return layer;
  }

  public deleteLayer(id: LayerId): void {
    this.assertWritable();
    const layer = this.getLayer(id);
    const index = this.layerOrder.indexOf(id);
    this.layerOrder.splice(index, 1);
    this.layerArena.delete(id);
    layer.mesh.release();

    // Clones keep the content they last synced, as ordinary layers.
    for (const other of this.layerArena.values()) {
      if (other.baseId === id) {
        other.baseId = null;
        other.baseMeshKey = 0;
      }
    }

    if (this.layerOrder.length === 0) {
      this.newLayer();
      return;
    }
    if (this.activeLayerId === id) {
      this.activeLayerId = this.layerOrder[Math.min(index, this.layerOrder.length - 1)];
    }
  }

  /** Swaps the layer with its neighbour: positive moves it up the stack. */
  public moveLayer(id: LayerId, direction: number): boolean {
    this.assertWritable();
    this.getLayer(id);
    const index = this.layerOrder.indexOf(id);
    const target = index + Math.sign(direction);
    if (direction === 0 || target < 0 || target >= this.layerOrder.length) {
      return false;
    }
    this.layerOrder[index] = this.layerOrder[target];
    this.layerOrder[target] = id;
    return true;
  }

  public duplicateLayer(id: LayerId): Layer {
    this.assertWritable();
    const source = this.getLayer(id);
    this.activeLayerId = id;
    const copy = createLayer(this.nextLayerId++, `${source.name} copy`, source.mesh.deepCopy(this.pool));
    copy.visible = source.visible;
    copy.mat = source.mat.clone();
    copy.box = source.box ? source.box.clone() : null;
    copy.op = source.op;
    copy.shape = source.shape;
    copy.shapeKey = source.shapeKey;
    this.insertAfterActive(copy);
    return copy;
  }

  public cloneLayer(id: LayerId): Layer {
    this.assertWritable();
    const base = this.getLayer(id);
    this.activeLayerId = id;
    const clone = createLayer(this.nextLayerId++, `${base.name} clone`, base.mesh.copy());
    clone.mat = base.mat.clone();
    clone.baseId = base.id;
    clone.baseMeshKey = base.mesh.key;
    this.insertAfterActive(clone);
    return clone;
  }

  /** Turns a clone or shape layer into an ordinary layer keeping its content. */
  public uncloneLayer(id: LayerId): void {
    this.assertWritable();
    const layer = this.getLayer(id);
    layer.baseId = null;
    layer.baseMeshKey = 0;
    layer.shape = null;
    layer.shapeKey = 0;
  }

  /** Re-shares the base content of every clone whose base changed. */
  public syncClones(): number {
    let synced = 0;
    for (const layer of this.layers) {
      if (layer.baseId === null) continue;
      const base = this.layerArena.get(layer.baseId);
      if (!base) {
        layer.baseId = null;
        layer.baseMeshKey = 0;
        continue;
      }
      const key = base.mesh.key;
      if (key === layer.baseMeshKey) continue;
      const shared = base.mesh.copy();
      layer.mesh.release();
      layer.mesh = shared;
      layer.baseMeshKey = key;
      synced++;
    }
    return synced;
  }

  /** Regenerates every shape layer whose source key moved. */
  public updateShapeLayers(): number {
    let updated = 0;
    for (const layer of this.layers) {
      if (!layer.shape) continue;
      if (shapeSourceKey(layer.shape, layer.mat) === layer.shapeKey) continue;
      this.regenerateShape(layer);
      updated++;
    }
    return updated;
  }

  /**
   * Folds the visible layers, bottom to top, each with its own op. The last
   * visible layer receives the result; the other visible layers are removed.
   */
  public mergeVisibleLayers(): Layer | null {
    this.assertWritable();
    const visible = this.layers.filter((layer) => layer.visible);
    if (visible.length === 0) return null;

    const merged = this.foldLayers(visible);
    const target = visible[visible.length - 1];
    target.mesh.release();
    target.mesh = merged;
    target.op = "add";
    target.baseId = null;
    target.baseMeshKey = 0;
    target.shape = null;
    target.shapeKey = 0;
    this.activeLayerId = target.id;
    for (const layer of visible) {
      if (layer !== target) this.deleteLayer(layer.id);
    }
    return target;
  }

  /**
   * All visible layers combined, as `mergeVisibleLayers` would, without
   * touching them. Rebuilt only when a visible layer's content or op changed.
   * The mesh belongs to the image: read it, copy it, never edit or release it.
   */
  public visibleMesh(): Mesh {
    const visible = this.layers.filter((layer) => layer.visible);
    const h = new KeyHasher(0x76697369).int(visible.length);
    for (const layer of visible) {
      h.key(layer.mesh.key).string(layer.op);
    }
    const key = h.digest();
    if (this.composite && this.composite.key === key) {
      return this.composite.mesh;
    }
    const mesh = this.foldLayers(visible);
    this.composite?.mesh.release();
    this.composite = { key, mesh };
    this.compositeBuilds++;
    return mesh;
  }

  /** How many times `visibleMesh` had to rebuild. */
  public get visibleMeshBuilds(): number {
    return this.compositeBuilds;
  }

  public setLayerTransform(id: LayerId, mat: Matrix4): void {
    const layer = this.getLayer(id);
    if (!this.layerCanMove(layer)) {
      throw new ConstraintViolationError("DOCUMENT_READ_ONLY", "Document is read-only");
    }
    layer.mat.copy(mat);
  }

  public getCamera(id: CameraId): Camera {
    const camera = this.cameraArena.get(id);
    if (!camera) {
      throw new ConstraintViolationError("CAMERA_NOT_FOUND", `No camera with id ${id}`);
    }
    return camera;
  }

  public addCamera(name?: string): Camera {
    this.assertWritable();
    const id = this.nextCameraId++;
    const camera = createCamera(id, name ?? `Camera ${id}`);
    this.cameraArena.set(id, camera);
    this.cameraOrder.push(id);
    this.activeCameraId = id;
    return camera;
  }

  public deleteCamera(id: CameraId): void {
    this.assertWritable();
    this.getCamera(id);
    const index = this.cameraOrder.indexOf(id);
    this.cameraOrder.splice(index, 1);
    this.cameraArena.delete(id);
    if (this.activeCameraId === id) {
      this.activeCameraId =
        this.cameraOrder.length === 0 ? null : this.cameraOrder[Math.min(index, this.cameraOrder.length - 1)];
    }
  }

  public setActiveCamera(id: CameraId): void {
    this.activeCameraId = this.getCamera(id).id;
  }

  public setSelection(bounds: Bounds | null): void {
    this.selection = bounds && !isEmptyBounds(bounds) ? { ...bounds } : null;
  }

  /**
   * Copies the active layer, cropped to the selection when there is one.
   * Returns false when there is nothing to copy.
   */
  public copySelection(): boolean {
    const mesh = this.activeLayer.mesh;
    const bounds = this.selection ? intersectBounds(this.selection, mesh.boundingBox()) : mesh.boundingBox();
    if (isEmptyBounds(bounds)) return false;
    const cropped = cropToBounds(mesh, bounds);
    if (cropped.isEmpty()) {
      cropped.release();
      return false;
    }
    this.clearClipboard();
    this.clip = { mesh: cropped, bounds: { ...bounds } };
    return true;
  }

  /** Adds the clipboard into the active layer, moved by `offset`. */
  public pasteClipboard(offset: Vec3 = [0, 0, 0]): boolean {
    const layer = this.activeLayer;
    if (!this.layerCanEdit(layer)) {
      throw new ConstraintViolationError(
        this.noEdit ? "DOCUMENT_READ_ONLY" : "LAYER_NOT_EDITABLE",
        `Layer "${layer.name}" cannot be edited`
      );
    }
    if (!this.clip) {
      throw new ConstraintViolationError("CLIPBOARD_EMPTY", "Nothing to paste");
    }
    const moved = this.clip.mesh.translated(offset);
    try {
      return layer.mesh.merge(moved, "add");
    } finally {
      moved.release();
    }
  }

  public clearClipboard(): void {
    this.clip?.mesh.release();
    this.clip = null;
  }

  public get key(): number {
    const h = new KeyHasher(0x696d67).int(this.layerOrder.length);
    for (const id of this.layerOrder) {
      h.key(layerKey(this.getLayer(id)));
    }
    h.int(this.cameraOrder.length);
    for (const id of this.cameraOrder) {
      h.key(cameraKey(this.getCamera(id)));
    }
    return h.digest();
  }

  public markSaved(path?: string): void {
    if (path !== undefined) this.path = path;
    this.savedKey = this.key;
  }

  public isDirty(): boolean {
    return this.key !== this.savedKey;
  }

  public snapshot(): ImageSnapshot {
    return {
      layers: this.layers.map(copyLayer),
      activeLayerId: this.activeLayerId,
      cameras: this.cameras.map(copyCamera),
      activeCameraId: this.activeCameraId,
      nextLayerId: this.nextLayerId,
      nextCameraId: this.nextCameraId,
      key: this.key
    };
  }

  /** Replaces the document content with fresh shares of `snapshot`. */
  public restore(snapshot: ImageSnapshot): void {
    for (const layer of this.layerArena.values()) {
      layer.mesh.release();
    }
    this.layerArena.clear();
    this.layerOrder = [];
    for (const layer of snapshot.layers) {
      const copy = copyLayer(layer);
      this.layerArena.set(copy.id, copy);
      this.layerOrder.push(copy.id);
    }
    this.activeLayerId = snapshot.activeLayerId;

    this.cameraArena.clear();
    this.cameraOrder = [];
    for (const camera of snapshot.cameras) {
      const copy = copyCamera(camera);
      this.cameraArena.set(copy.id, copy);
      this.cameraOrder.push(copy.id);
    }
    this.activeCameraId = snapshot.activeCameraId;
    this.nextLayerId = snapshot.nextLayerId;
    this.nextCameraId = snapshot.nextCameraId;
  }

  /** Releases every mesh the image holds, clipboard included. */
  public dispose(): void {
    for (const layer of this.layerArena.values()) {
      layer.mesh.release();
    }
    this.layerArena.clear();
    this.layerOrder = [];
    this.clearClipboard();
    this.composite?.mesh.release();
    this.composite = null;
  }

  private assertWritable(): void {
    if (this.noEdit) {
      throw new ConstraintViolationError("DOCUMENT_READ_ONLY", "Document is read-only");
    }
  }

  private newLayer(name?: string): Layer {
    const id = this.nextLayerId++;
    const layer = createLayer(id, name ?? `Layer ${id}`, new Mesh(this.pool));
    this.insertAfterActive(layer);
    return layer;
  }

  private foldLayers(layers: readonly Layer[]): Mesh {
    const merged = new Mesh(this.pool);
    try {
      for (const layer of layers) {
        merged.merge(layer.mesh, layer.op);
      }
    } catch (error) {
      merged.release();
      throw error;
    }
    return merged;
  }

  private regenerateShape(layer: Layer): void {
    if (!layer.shape) return;
    const mesh = new Mesh(this.pool);
    try {
      rasterizeShape(mesh, layer.shape.shape, matrixShapeBox(layer.mat), layer.shape.color);
    } catch (error) {
      mesh.release();
      throw error;
    }
    layer.mesh.release();
    layer.mesh = mesh;
    layer.shapeKey = shapeSourceKey(layer.shape, layer.mat);
  }

  private insertAfterActive(layer: Layer): void {
    this.layerArena.set(layer.id, layer);
    const index = this.layerOrder.indexOf(this.activeLayerId);
    this.layerOrder.splice(index + 1, 0, layer.id);
    this.activeLayerId = layer.id;
  }
}
