import { describe, expect, it } from "vitest";
import type { Color } from "@voxedit/core";
import { BlockPool } from "@voxedit/mesh";
import { History, Image } from "../src/index.js";

const RED: Color = [255, 0, 0, 255];
const GREEN: Color = [0, 255, 0, 255];
const BLUE: Color = [0, 0, 255, 255];

describe("History", () => {
  it("undoes and redoes to the same keys", () => {
    const image = new Image({ pool: new BlockPool() });
    const history = new History();
    history.push(image);
    const key0 = image.key;
    image.activeLayer.mesh.setVoxel([0, 0, 0], RED);
    const key1 = image.key;
    expect(history.state).toBe("HasPast");

    expect(history.undo(image)).toBe(true);
    expect(image.key).toBe(key0);
    expect(history.state).toBe("HasPastAndFuture");

    expect(history.redo(image)).toBe(true);
    expect(image.key).toBe(key1);
    expect(image.activeLayer.mesh.getVoxel([0, 0, 0])).toEqual(RED);
    expect(history.state).toBe("HasPast");
  });

  it("drops the redo branch after an edit from the past", () => {
    const image = new Image({ pool: new BlockPool() });
    const history = new History();
    history.push(image);
    const key0 = image.key;
    image.activeLayer.mesh.setVoxel([0, 0, 0], RED);
    history.undo(image);
    image.activeLayer.mesh.setVoxel([3, 0, 0], GREEN);

    expect(history.redo(image)).toBe(false);
    expect(history.length).toBe(1);
    expect(history.state).toBe("HasPast");
    expect(image.activeLayer.mesh.getVoxel([3, 0, 0])).toEqual(GREEN);

    expect(history.undo(image)).toBe(true);
    expect(image.key).toBe(key0);
  });

  it("treats undo and redo without history as no-ops", () => {
    const image = new Image({ pool: new BlockPool() });
    const history = new History();
    expect(history.state).toBe("NoHistory");
    expect(history.undo(image)).toBe(false);
    expect(history.redo(image)).toBe(false);

    history.push(image);
    expect(history.canUndo(image)).toBe(false);
    expect(history.undo(image)).toBe(false);
    expect(history.redo(image)).toBe(false);
  });

  it("shares blocks between snapshots and the live image", () => {
    const pool = new BlockPool();
    const image = new Image({ pool });
    image.activeLayer.mesh.setVoxel([0, 0, 0], RED);
    const history = new History();
    history.push(image);
    const [view] = [...image.activeLayer.mesh.iterateBlocks()];
    expect(view.block.refCount).toBe(2);
    expect(pool.liveBlocks).toBe(1);
  });

  it("releases the oldest snapshots past the limit", () => {
    const pool = new BlockPool();
    const image = new Image({ pool });
    const mesh = () => image.activeLayer.mesh;
    const history = new History(2);

    mesh().setVoxel([0, 0, 0], RED);
    history.push(image);
    mesh().setVoxel([0, 0, 0], GREEN);
    history.push(image);
    mesh().setVoxel([0, 0, 0], BLUE);
    expect(pool.liveBlocks).toBe(3);
    history.push(image);

    expect(history.length).toBe(2);
    expect(history.position).toBe(1);
    expect(pool.liveBlocks).toBe(2);

    expect(history.undo(image)).toBe(true);
    expect(mesh().getVoxel([0, 0, 0])).toEqual(GREEN);
    expect(history.undo(image)).toBe(false);
  });

  it("frees every snapshot on clear", () => {
    const pool = new BlockPool();
    const image = new Image({ pool });
    image.activeLayer.mesh.setVoxel([0, 0, 0], RED);
    const history = new History();
    history.push(image);
    image.dispose();
    history.clear();
    expect(pool.liveBlocks).toBe(0);
    expect(history.state).toBe("NoHistory");
  });

  it("rejects a non-positive limit", () => {
    expect(() => new History(0)).toThrow("History limit must be a positive integer, got 0");
  });
});
