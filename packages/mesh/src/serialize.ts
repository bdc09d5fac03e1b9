import { Buffer } from "node:buffer";
import type { Vec3 } from "@voxedit/core";
import { BLOCK_BYTES, BlockPool, defaultBlockPool } from "./block.js";
import { Mesh } from "./mesh.js";

export interface SerializedBlock {
  x: number;
  y: number;
  z: number;
  /** base64 of the raw RGBA block bytes. */
  data: string;
}

export interface SerializedMesh {
  version: 1;
  blocks: SerializedBlock[];
}

export function serializeMesh(mesh: Mesh): SerializedMesh {
  const blocks: SerializedBlock[] = [];
  for (const { origin, block } of mesh.iterateBlocks()) {
    blocks.push({
      x: origin[0],
      y: origin[1],
      z: origin[2],
      data: Buffer.from(block.data).toString("base64")
    });
  }
  return { version: 1, blocks };
}

function isSerializedBlock(value: unknown): value is SerializedBlock {
  if (!value || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    Number.isInteger(v.x) && Number.isInteger(v.y) && Number.isInteger(v.z) && typeof v.data === "string"
  );
}

export function deserializeMesh(input: unknown, pool: BlockPool = defaultBlockPool): Mesh {
  if (!input || typeof input !== "object") {
    throw new Error("Serialized mesh must be an object");
  }
  const obj = input as Record<string, unknown>;
  if (obj.version !== 1 || !Array.isArray(obj.blocks)) {
    throw new Error(`Unsupported serialized mesh version: ${String(obj.version)}`);
  }
  const mesh = new Mesh(pool);
  try {
    for (const record of obj.blocks) {
      if (!isSerializedBlock(record)) {
        throw new Error(`Invalid block record: ${JSON.stringify(record)}`);
      }
      const bytes = Buffer.from(record.data, "base64");
      if (bytes.length !== BLOCK_BYTES) {
        throw new Error(`Block at ${record.x},${record.y},${record.z} has ${bytes.length} bytes`);
      }
      const origin: Vec3 = [record.x, record.y, record.z];
      mesh.insertBlock(origin, bytes);
    }
  } catch (error) {
    mesh.release();
    throw error;
  }
  return mesh;
}
