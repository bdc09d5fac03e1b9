import { AllocationFailureError, EMPTY, hashWords, type Color } from "@voxedit/core";

export const BLOCK_SIZE = 16;
export const BLOCK_VOXELS = BLOCK_SIZE * BLOCK_SIZE * BLOCK_SIZE;
export const BLOCK_BYTES = BLOCK_VOXELS * 4;

export interface BlockPoolOptions {
  /** 0 or undefined for no budget. */
  maxBlocks?: number;
}

/**
 * Allocation accounting for blocks.
 *
 * A block counts as live from allocation until its last holder releases it,
 * whichever holder that is (a mesh, a history snapshot, a background reader).
 */
export class BlockPool {
  public readonly maxBlocks: number;
  private live = 0;
  private allocated = 0;

  public constructor(options: BlockPoolOptions = {}) {
    this.maxBlocks = options.maxBlocks ?? 0;
  }

  public get liveBlocks(): number {
    return this.live;
  }

  public get totalAllocated(): number {
    return this.allocated;
  }

  public allocate(source?: Uint8Array): Block {
    if (this.maxBlocks > 0 && this.live >= this.maxBlocks) {
      throw new AllocationFailureError(`Block budget exhausted: ${this.maxBlocks} live blocks`);
    }
    let data: Uint8Array;
    try {
      data = new Uint8Array(BLOCK_BYTES);
      if (source) {
        data.set(source);
      }
    } catch (error) {
      if (error instanceof RangeError) {
        throw new AllocationFailureError(`Cannot allocate block: ${error.message}`, { cause: error });
      }
      throw error;
    }
    this.live++;
    this.allocated++;
    return new Block(this, data);
  }

  /** @internal called by Block when its reference count reaches zero. */
  public reclaim(): void {
    this.live--;
  }
}

export const defaultBlockPool = new BlockPool();

export function voxelIndex(lx: number, ly: number, lz: number): number {
  return lx + ly * BLOCK_SIZE + lz * BLOCK_SIZE * BLOCK_SIZE;
}

/**
 * Fixed 16³ cube of RGBA voxels, shared between meshes by reference count.
 *
 * Content may only change while the count is one; a store holding a shared
 * block clones it before writing.
 */
export class Block {
  public readonly pool: BlockPool;
  public readonly data: Uint8Array;
  private readonly words: Uint32Array;
  private refs = 1;
  private filled: number;
  private hashCache: number | null = null;

  public constructor(pool: BlockPool, data: Uint8Array) {
    this.pool = pool;
    this.data = data;
    this.words = new Uint32Array(data.buffer, data.byteOffset, BLOCK_VOXELS);
    let filled = 0;
    for (let i = 3; i < data.length; i += 4) {
      if (data[i] !== 0) filled++;
    }
    this.filled = filled;
  }

  public get refCount(): number {
    return this.refs;
  }

  public get isShared(): boolean {
    return this.refs > 1;
  }

  public get isReclaimed(): boolean {
    return this.refs === 0;
  }

  public get filledCount(): number {
    return this.filled;
  }

  public get isEmpty(): boolean {
    return this.filled === 0;
  }

  public retain(): this {
    if (this.refs === 0) {
      throw new Error("Cannot retain a reclaimed block");
    }
    this.refs++;
    return this;
  }

  public release(): void {
    if (this.refs === 0) {
      throw new Error("Block released more times than retained");
    }
    this.refs--;
    if (this.refs === 0) {
      this.pool.reclaim();
    }
  }

  public getVoxel(index: number): Color {
    const o = index * 4;
    if (this.data[o + 3] === 0) return EMPTY;
    return [this.data[o], this.data[o + 1], this.data[o + 2], this.data[o + 3]];
  }

  public voxelEquals(index: number, color: Color): boolean {
    const o = index * 4;
    return (
      this.data[o] === color[0] &&
      this.data[o + 1] === color[1] &&
      this.data[o + 2] === color[2] &&
      this.data[o + 3] === color[3]
    );
  }

  /** Writes one voxel; the color must already be normalized. */
  public write(index: number, color: Color): void {
    if (this.refs !== 1) {
      throw new Error(`Write to block with ${this.refs} holders`);
    }
    const o = index * 4;
    const wasFilled = this.data[o + 3] !== 0;
    const isFilled = color[3] !== 0;
    this.data[o] = color[0];
    this.data[o + 1] = color[1];
    this.data[o + 2] = color[2];
    this.data[o + 3] = color[3];
    if (wasFilled !== isFilled) {
      this.filled += isFilled ? 1 : -1;
    }
    this.hashCache = null;
  }

  public contentHash(): number {
    if (this.hashCache === null) {
      this.hashCache = hashWords(this.words);
    }
    return this.hashCache;
  }

  public contentEquals(other: Uint8Array): boolean {
    if (other.length !== this.data.length) return false;
    for (let i = 0; i < other.length; i++) {
      if (other[i] !== this.data[i]) return false;
    }
    return true;
  }

  public clone(pool: BlockPool = this.pool): Block {
    const copy = pool.allocate(this.data);
    copy.hashCache = this.hashCache;
    return copy;
  }
}
