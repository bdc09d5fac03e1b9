import {
  boundsFromMinMax,
  compareCoords,
  emptyBounds,
  EMPTY,
  KeyHasher,
  normalizeColor,
  unionBounds,
  voxelCoordKey,
  xorKeys,
  type Bounds,
  type Color,
  type PositionedVoxel,
  type Vec3
} from "@voxedit/core";
import { Block, BLOCK_BYTES, BLOCK_SIZE, BlockPool, defaultBlockPool, voxelIndex } from "./block.js";
import { combineVoxels, type MergeOp } from "./merge.js";

interface Entry {
  origin: Vec3;
  block: Block;
}

export interface BlockView {
  readonly origin: Vec3;
  readonly block: Block;
}

/** Block held at an id when an edit first touched it; null when there was none. */
interface JournalEntry {
  origin: Vec3;
  block: Block | null;
}

interface StagedChange {
  id: string;
  origin: Vec3;
  /** null removes the block at origin. */
  block: Block | null;
}

export function blockOrigin(x: number, y: number, z: number): Vec3 {
  return [
    Math.floor(x / BLOCK_SIZE) * BLOCK_SIZE,
    Math.floor(y / BLOCK_SIZE) * BLOCK_SIZE,
    Math.floor(z / BLOCK_SIZE) * BLOCK_SIZE
  ];
}

function assertVoxelPos(pos: Vec3): void {
  if (!Number.isInteger(pos[0]) || !Number.isInteger(pos[1]) || !Number.isInteger(pos[2])) {
    throw new Error(`Voxel coordinates must be integers: ${JSON.stringify(pos)}`);
  }
}

function isAligned(origin: Vec3): boolean {
  return origin.every((c) => Number.isInteger(c) && c % BLOCK_SIZE === 0);
}

function entryHash(origin: Vec3, block: Block): number {
  return new KeyHasher(0x6d657368).int(origin[0]).int(origin[1]).int(origin[2]).key(block.contentHash()).digest();
}

const scratch = new Uint8Array(BLOCK_BYTES);

function hasFilledVoxel(data: Uint8Array): boolean {
  for (let o = 3; o < data.length; o += 4) {
    if (data[o] !== 0) return true;
  }
  return false;
}

/**
 * Sparse voxel store: block origin (multiple of BLOCK_SIZE) to block.
 *
 * The key is the XOR of one hash per block, so an edit only rehashes the
 * blocks it touched. Blocks written since the last key read sit in `dirty`
 * and are folded back into the accumulator lazily.
 *
 * Between `beginEdit` and `commitEdit`/`rollbackEdit` the first write to each
 * block id keeps a reference to the block it replaced, so an edit costs one
 * entry per touched block and a rollback puts exactly those back.
 */
export class Mesh {
  public readonly pool: BlockPool;
  private readonly blocks = new Map<string, Entry>();
  private readonly dirty = new Set<string>();
  private acc = 0;
  private journal: Map<string, JournalEntry> | null = null;
  private journalAcc = 0;
  private last: Entry | null = null;
  private boundsCache: { key: number; bounds: Bounds } | null = null;
  private released = false;

  public constructor(pool: BlockPool = defaultBlockPool) {
    this.pool = pool;
  }

  public get blockCount(): number {
    return this.blocks.size;
  }

  public get isReleased(): boolean {
    return this.released;
  }

  public isEmpty(): boolean {
    return this.blocks.size === 0;
  }

  public get key(): number {
    for (const id of this.dirty) {
      const entry = this.blocks.get(id);
      if (entry) {
        this.toggleEntry(entryHash(entry.origin, entry.block));
      }
    }
    this.dirty.clear();
    return this.acc;
  }

  public get inEdit(): boolean {
    return this.journal !== null;
  }

  /** Starts an all-or-nothing edit. Edits do not nest. */
  public beginEdit(): void {
    this.assertLive();
    if (this.journal) {
      throw new Error("Mesh edit already in progress");
    }
    this.journalAcc = this.key;
    this.journal = new Map();
  }

  /** Keeps every change since `beginEdit`. */
  public commitEdit(): void {
    const journal = this.journal;
    if (!journal) return;
    this.journal = null;
    for (const saved of journal.values()) {
      saved.block?.release();
    }
  }

  /** Puts back every block touched since `beginEdit`. */
  public rollbackEdit(): void {
    const journal = this.journal;
    if (!journal) return;
    this.journal = null;
    for (const [id, saved] of journal) {
      const current = this.blocks.get(id);
      if (current) {
        current.block.release();
      }
      if (saved.block) {
        this.blocks.set(id, { origin: saved.origin, block: saved.block });
      } else {
        this.blocks.delete(id);
      }
    }
    // beginEdit folded the key, so only touched ids can be dirty.
    this.dirty.clear();
    this.acc = this.journalAcc;
    this.last = null;
    this.boundsCache = null;
  }

  public getVoxel(pos: Vec3): Color {
    assertVoxelPos(pos);
    const origin = blockOrigin(pos[0], pos[1], pos[2]);
    const entry = this.lookup(origin);
    if (!entry) return EMPTY;
    return entry.block.getVoxel(voxelIndex(pos[0] - origin[0], pos[1] - origin[1], pos[2] - origin[2]));
  }

  /** Returns false when the write left the mesh unchanged. */
  public setVoxel(pos: Vec3, color: Color): boolean {
    this.assertLive();
    assertVoxelPos(pos);
    const c = normalizeColor(color);
    const origin = blockOrigin(pos[0], pos[1], pos[2]);
    const index = voxelIndex(pos[0] - origin[0], pos[1] - origin[1], pos[2] - origin[2]);
    let entry = this.lookup(origin);

    if (!entry) {
      if (c[3] === 0) return false;
      entry = this.addEntry(origin, this.pool.allocate());
    } else {
      if (entry.block.voxelEquals(index, c)) return false;
      this.record(entry);
      this.markDirty(entry);
      if (entry.block.isShared) {
        const clone = entry.block.clone(this.pool);
        entry.block.release();
        entry.block = clone;
      }
    }

    entry.block.write(index, c);
    if (entry.block.isEmpty) {
      this.removeEntry(voxelCoordKey(origin[0], origin[1], origin[2]));
    }
    return true;
  }

  /**
   * Combines `other` into this mesh over the union of touched blocks.
   *
   * Every result block is computed before any is committed; an allocation
   * failure leaves this mesh untouched.
   */
  public merge(other: Mesh, op: MergeOp): boolean {
    this.assertLive();
    const staged: StagedChange[] = [];

    try {
      for (const [id, b] of other.blocks) {
        const a = this.blocks.get(id);
        if (!a) {
          // Nothing to subtract from, paint or intersect with.
          if (op === "add") {
            staged.push({ id, origin: b.origin, block: b.block.retain() });
          }
          continue;
        }
        if (op === "add" && a.block === b.block) continue;
        combineVoxels(op, a.block.data, b.block.data, scratch);
        if (a.block.contentEquals(scratch)) continue;
        if (!hasFilledVoxel(scratch)) {
          staged.push({ id, origin: a.origin, block: null });
        } else {
          staged.push({ id, origin: a.origin, block: this.pool.allocate(scratch) });
        }
      }

      if (op === "intersect") {
        for (const [id, a] of this.blocks) {
          if (!other.blocks.has(id)) {
            staged.push({ id, origin: a.origin, block: null });
          }
        }
      }
    } catch (error) {
      for (const change of staged) {
        change.block?.release();
      }
      throw error;
    }

    for (const change of staged) {
      if (change.block) {
        this.putBlock(change.id, change.origin, change.block);
      } else {
        this.removeEntry(change.id);
      }
    }
    return staged.length > 0;
  }

  /** Bulk insertion for loaders: replaces whatever block sits at `origin`. */
  public insertBlock(origin: Vec3, data: Uint8Array): void {
    this.assertLive();
    if (!isAligned(origin)) {
      throw new Error(`Block origin not aligned to ${BLOCK_SIZE}: ${JSON.stringify(origin)}`);
    }
    if (data.length !== BLOCK_BYTES) {
      throw new Error(`Block data must be ${BLOCK_BYTES} bytes, got ${data.length}`);
    }
    const normalized = Uint8Array.from(data);
    for (let o = 0; o < normalized.length; o += 4) {
      if (normalized[o + 3] === 0) {
        normalized[o] = 0;
        normalized[o + 1] = 0;
        normalized[o + 2] = 0;
      }
    }
    const id = voxelCoordKey(origin[0], origin[1], origin[2]);
    const block = this.pool.allocate(normalized);
    if (block.isEmpty) {
      block.release();
      this.removeEntry(id);
      return;
    }
    this.putBlock(id, origin, block);
  }

  public *iterateBlocks(): Generator<BlockView> {
    const entries = [...this.blocks.values()].sort((a, b) => compareCoords(a.origin, b.origin));
    for (const entry of entries) {
      yield { origin: entry.origin, block: entry.block };
    }
  }

  public *iterateVoxels(): Generator<PositionedVoxel> {
    for (const { origin, block } of this.iterateBlocks()) {
      for (let lz = 0; lz < BLOCK_SIZE; lz++) {
        for (let ly = 0; ly < BLOCK_SIZE; ly++) {
          for (let lx = 0; lx < BLOCK_SIZE; lx++) {
            const color = block.getVoxel(voxelIndex(lx, ly, lz));
            if (color[3] === 0) continue;
            yield { x: origin[0] + lx, y: origin[1] + ly, z: origin[2] + lz, color };
          }
        }
      }
    }
  }

  public boundingBox(): Bounds {
    const key = this.key;
    if (this.boundsCache && this.boundsCache.key === key) {
      return { ...this.boundsCache.bounds };
    }
    let bounds = emptyBounds();
    for (const { origin, block } of this.blocks.values()) {
      let minX = BLOCK_SIZE;
      let minY = BLOCK_SIZE;
      let minZ = BLOCK_SIZE;
      let maxX = -1;
      let maxY = -1;
      let maxZ = -1;
      for (let lz = 0; lz < BLOCK_SIZE; lz++) {
        for (let ly = 0; ly < BLOCK_SIZE; ly++) {
          for (let lx = 0; lx < BLOCK_SIZE; lx++) {
            if (block.data[voxelIndex(lx, ly, lz) * 4 + 3] === 0) continue;
            if (lx < minX) minX = lx;
            if (ly < minY) minY = ly;
            if (lz < minZ) minZ = lz;
            if (lx > maxX) maxX = lx;
            if (ly > maxY) maxY = ly;
            if (lz > maxZ) maxZ = lz;
          }
        }
      }
      if (maxX < 0) continue;
      bounds = unionBounds(
        bounds,
        boundsFromMinMax(
          [origin[0] + minX, origin[1] + minY, origin[2] + minZ],
          [origin[0] + maxX, origin[1] + maxY, origin[2] + maxZ]
        )
      );
    }
    this.boundsCache = { key, bounds };
    return { ...bounds };
  }

  /** Copy-on-write share: both meshes hold every block until one writes it. */
  public copy(): Mesh {
    this.assertLive();
    const out = new Mesh(this.pool);
    for (const [id, entry] of this.blocks) {
      out.blocks.set(id, { origin: entry.origin, block: entry.block.retain() });
    }
    for (const id of this.dirty) {
      out.dirty.add(id);
    }
    out.acc = this.acc;
    return out;
  }

  /** Fully independent copy with freshly allocated blocks. */
  public deepCopy(pool: BlockPool = this.pool): Mesh {
    this.assertLive();
    const out = new Mesh(pool);
    const created: Block[] = [];
    try {
      for (const [id, entry] of this.blocks) {
        const block = entry.block.clone(pool);
        created.push(block);
        out.blocks.set(id, { origin: entry.origin, block });
      }
    } catch (error) {
      for (const block of created) {
        block.release();
      }
      throw error;
    }
    for (const id of this.dirty) {
      out.dirty.add(id);
    }
    out.acc = this.acc;
    return out;
  }

  /** New mesh with every voxel moved by an integer offset. */
  public translated(offset: Vec3): Mesh {
    if (!offset.every((c) => Number.isInteger(c))) {
      throw new Error(`Translation must be integral: ${JSON.stringify(offset)}`);
    }
    if (isAligned(offset)) {
      const out = new Mesh(this.pool);
      for (const { origin, block } of this.blocks.values()) {
        const moved: Vec3 = [origin[0] + offset[0], origin[1] + offset[1], origin[2] + offset[2]];
        out.putBlock(voxelCoordKey(moved[0], moved[1], moved[2]), moved, block.retain());
      }
      return out;
    }
    const out = new Mesh(this.pool);
    for (const v of this.iterateVoxels()) {
      out.setVoxel([v.x + offset[0], v.y + offset[1], v.z + offset[2]], v.color);
    }
    return out;
  }

  /**
   * Takes over the content of `other`, which is released. Used to commit a
   * copy-on-write working copy in one step.
   */
  public adopt(other: Mesh): void {
    this.assertLive();
    if (other === this) return;
    other.assertLive();
    this.clear();
    for (const [id, entry] of other.blocks) {
      this.recordId(id, entry.origin);
      this.blocks.set(id, entry);
    }
    for (const id of other.dirty) {
      this.dirty.add(id);
    }
    this.acc = other.acc;
    other.blocks.clear();
    other.release();
  }

  public clear(): void {
    for (const entry of this.blocks.values()) {
      this.record(entry);
      entry.block.release();
    }
    this.blocks.clear();
    this.dirty.clear();
    this.acc = 0;
    this.last = null;
    this.boundsCache = null;
  }

  /** Drops every block reference; the mesh cannot be used afterwards. */
  public release(): void {
    if (this.released) return;
    this.commitEdit();
    this.clear();
    this.released = true;
  }

  private assertLive(): void {
    if (this.released) {
      throw new Error("Mesh used after release");
    }
  }

  private lookup(origin: Vec3): Entry | undefined {
    const last = this.last;
    if (last && last.origin[0] === origin[0] && last.origin[1] === origin[1] && last.origin[2] === origin[2]) {
      return last;
    }
    const entry = this.blocks.get(voxelCoordKey(origin[0], origin[1], origin[2]));
    if (entry) {
      this.last = entry;
    }
    return entry;
  }

  private toggleEntry(hash: number): void {
    this.acc = xorKeys(this.acc, hash);
  }

  private record(entry: Entry): void {
    this.recordId(voxelCoordKey(entry.origin[0], entry.origin[1], entry.origin[2]), entry.origin);
  }

  private recordId(id: string, origin: Vec3): void {
    if (!this.journal || this.journal.has(id)) return;
    const entry = this.blocks.get(id);
    this.journal.set(id, { origin, block: entry ? entry.block.retain() : null });
  }

  private markDirty(entry: Entry): void {
    const id = voxelCoordKey(entry.origin[0], entry.origin[1], entry.origin[2]);
    if (this.dirty.has(id)) return;
    this.toggleEntry(entryHash(entry.origin, entry.block));
    this.dirty.add(id);
  }

  private addEntry(origin: Vec3, block: Block): Entry {
    const id = voxelCoordKey(origin[0], origin[1], origin[2]);
    this.recordId(id, origin);
    const entry: Entry = { origin, block };
    this.blocks.set(id, entry);
    this.dirty.add(id);
    this.last = entry;
    return entry;
  }

  private putBlock(id: string, origin: Vec3, block: Block): void {
    const existing = this.blocks.get(id);
    if (existing) {
      this.record(existing);
      this.markDirty(existing);
      existing.block.release();
      existing.block = block;
      return;
    }
    this.addEntry(origin, block);
  }

  private removeEntry(id: string): void {
    const entry = this.blocks.get(id);
    if (!entry) return;
    this.recordId(id, entry.origin);
    if (this.dirty.has(id)) {
      this.dirty.delete(id);
    } else {
      this.toggleEntry(entryHash(entry.origin, entry.block));
    }
    entry.block.release();
    this.blocks.delete(id);
    if (this.last === entry) {
      this.last = null;
    }
  }
}
