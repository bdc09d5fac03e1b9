import { DEFAULT_CONFIG } from "@voxedit/core";
import { releaseSnapshot, type Image, type ImageSnapshot } from "./image.js";

export type HistoryState = "NoHistory" | "HasPast" | "HasPastAndFuture";

/**
 * Linear undo history: snapshots in push order and a cursor on the one the
 * live image was last restored from or captured as.
 */
export class History {
  public readonly limit: number;
  private nodes: ImageSnapshot[] = [];
  private cursor = -1;

  public constructor(limit: number = DEFAULT_CONFIG.historyLimit) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`History limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  public get state(): HistoryState {
    if (this.nodes.length === 0) return "NoHistory";
    return this.cursor < this.nodes.length - 1 ? "HasPastAndFuture" : "HasPast";
  }

  public get length(): number {
    return this.nodes.length;
  }

  public get position(): number {
    return this.cursor;
  }

  /** True when the live image matches the snapshot under the cursor. */
  public isCurrent(image: Image): boolean {
    return this.cursor >= 0 && this.nodes[this.cursor].key === image.key;
  }

  public canUndo(image: Image): boolean {
    return this.cursor > 0 || (this.cursor === 0 && !this.isCurrent(image));
  }

  public canRedo(): boolean {
    return this.cursor >= 0 && this.cursor < this.nodes.length - 1;
  }

  public push(image: Image): void {
    this.discardFuture();
    this.nodes.push(image.snapshot());
    this.cursor = this.nodes.length - 1;
    this.trim();
  }

  public undo(image: Image): boolean {
    if (this.cursor < 0) return false;
    if (!this.isCurrent(image)) {
      // Unsaved edits since the last push become the redo target.
      this.push(image);
    }
    if (this.cursor === 0) return false;
    this.cursor--;
    image.restore(this.nodes[this.cursor]);
    return true;
  }

  public redo(image: Image): boolean {
    if (!this.canRedo()) return false;
    if (!this.isCurrent(image)) {
      this.discardFuture();
      return false;
    }
    this.cursor++;
    image.restore(this.nodes[this.cursor]);
    return true;
  }

  public clear(): void {
    for (const node of this.nodes) {
      releaseSnapshot(node);
    }
    this.nodes = [];
    this.cursor = -1;
  }

  private discardFuture(): void {
    for (const node of this.nodes.splice(this.cursor + 1)) {
      releaseSnapshot(node);
    }
  }

  private trim(): void {
    while (this.nodes.length > this.limit) {
      const dropped = this.nodes.shift();
      if (dropped) releaseSnapshot(dropped);
      this.cursor--;
    }
  }
}
