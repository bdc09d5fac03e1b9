import {
  ConstraintViolationError,
  isAllocationFailure,
  resolveConfig,
  type AllocationFailureError,
  type Color,
  type EditorConfig,
  type Vec3
} from "@voxedit/core";
import { BlockPool, paintShape, transact, type Mesh, type Painter, type ShapeBox } from "@voxedit/mesh";
import { History } from "./history.js";
import { Image } from "./image.js";
import type { Layer } from "./layer.js";
import {
  TOOL_REQUIRE_CAN_EDIT,
  TOOL_REQUIRE_CAN_MOVE,
  ToolRegistry,
  type ToolDescriptor
} from "./tools.js";

export interface SessionOptions {
  config?: Partial<EditorConfig>;
  tools?: readonly ToolDescriptor[];
  pool?: BlockPool;
}

/**
 * One open document and everything that edits it. Sessions share nothing, so
 * several can live side by side.
 */
export class EditorSession {
  public readonly config: EditorConfig;
  public readonly pool: BlockPool;
  public readonly image: Image;
  public readonly history: History;
  public readonly tools: ToolRegistry;
  private toolId = "brush";
  private failure: AllocationFailureError | null = null;

  public constructor(options: SessionOptions = {}) {
    this.config = resolveConfig(options.config);
    this.pool = options.pool ?? new BlockPool({ maxBlocks: this.config.maxBlocks });
    this.image = new Image({ pool: this.pool, noEdit: this.config.noEdit });
    this.history = new History(this.config.historyLimit);
    this.tools = new ToolRegistry(options.tools);
    this.history.push(this.image);
  }

  public get failed(): boolean {
    return this.failure !== null;
  }

  public get activeTool(): ToolDescriptor {
    return this.checkTool(this.toolId, false);
  }

  public setTool(id: string): void {
    this.checkTool(id, false);
    this.toolId = id;
  }

  /** Refuses, before anything is touched, a tool the active layer does not allow. */
  public checkTool(id: string = this.toolId, enforcePolicy = true): ToolDescriptor {
    const tool = this.tools.get(id);
    if (!tool) {
      throw new ConstraintViolationError("TOOL_NOT_FOUND", `Unknown tool: ${id}`);
    }
    if (enforcePolicy) {
      this.checkPolicy(tool.flags);
    }
    return tool;
  }

  /**
   * Runs `fn` on the active layer's mesh and keeps the changes only when `fn`
   * returns. Writes voxels, so the layer must be editable whatever the tool.
   */
  public edit<T>(fn: (mesh: Mesh, layer: Layer) => T, toolId?: string): T {
    return this.guard(toolId, TOOL_REQUIRE_CAN_EDIT, (layer) => transact(layer.mesh, (work) => fn(work, layer)));
  }

  public setVoxel(pos: Vec3, color: Color): boolean {
    return this.guard(undefined, TOOL_REQUIRE_CAN_EDIT, (layer) => layer.mesh.setVoxel(pos, color));
  }

  public paintShape(painter: Painter, box: ShapeBox): boolean {
    return this.guard("shape", TOOL_REQUIRE_CAN_EDIT, (layer) => paintShape(layer.mesh, painter, box));
  }

  /**
   * Moves the active layer's voxels by a whole number of voxels. The content
   * itself is rewritten, so clone and shape layers refuse it.
   */
  public translateLayer(offset: Vec3): void {
    this.guard("move", TOOL_REQUIRE_CAN_EDIT | TOOL_REQUIRE_CAN_MOVE, (layer) => {
      const moved = layer.mesh.translated(offset);
      layer.mesh.adopt(moved);
    });
  }

  /** Closes a gesture: the current state becomes an undo step. */
  public commit(): boolean {
    this.assertUsable();
    if (this.history.isCurrent(this.image)) return false;
    this.history.push(this.image);
    return true;
  }

  public undo(): boolean {
    this.assertUsable();
    return this.history.undo(this.image);
  }

  public redo(): boolean {
    this.assertUsable();
    return this.history.redo(this.image);
  }

  /**
   * Per-frame upkeep: shape layers regenerate, then clone layers pick up
   * changes to their base. Returns how many layers were refreshed.
   */
  public frame(): number {
    this.assertUsable();
    return this.fatal(() => this.image.updateShapeLayers() + this.image.syncClones());
  }

  public dispose(): void {
    this.history.clear();
    this.image.dispose();
  }

  /** `required` adds to whatever the tool itself demands. */
  private guard<T>(toolId: string | undefined, required: number, fn: (layer: Layer) => T): T {
    this.assertUsable();
    const tool = this.checkTool(toolId, false);
    this.checkPolicy(tool.flags | required);
    return this.fatal(() => fn(this.image.activeLayer));
  }

  private fatal<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isAllocationFailure(error)) {
        this.failure = error;
        console.error(`[document] fatal: ${error.message}`);
      }
      throw error;
    }
  }

  private checkPolicy(flags: number): void {
    const layer = this.image.activeLayer;
    if (flags & (TOOL_REQUIRE_CAN_EDIT | TOOL_REQUIRE_CAN_MOVE) && this.image.noEdit) {
      throw new ConstraintViolationError("DOCUMENT_READ_ONLY", "Document is read-only");
    }
    if (flags & TOOL_REQUIRE_CAN_EDIT && !this.image.layerCanEdit(layer)) {
      throw new ConstraintViolationError("LAYER_NOT_EDITABLE", `Layer "${layer.name}" cannot be edited`);
    }
    if (flags & TOOL_REQUIRE_CAN_MOVE && !this.image.layerCanMove(layer)) {
      throw new ConstraintViolationError("LAYER_NOT_EDITABLE", `Layer "${layer.name}" cannot be moved`);
    }
  }

  private assertUsable(): void {
    if (this.failure) {
      throw new ConstraintViolationError(
        "SESSION_FAILED",
        `Session stopped after a fatal error: ${this.failure.message}`
      );
    }
  }
}
