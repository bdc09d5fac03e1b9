import { createHash } from "node:crypto";
import { Buffer } from "node:buffer";
import type { CanonicalMetadata, PositionedVoxel } from "./types.js";
import { compareCoords } from "./bounds.js";

const TWO_32 = 0x100000000;
const HI_MASK = 0x1fffff;

const f64 = new Float64Array(1);
const f64Words = new Uint32Array(f64.buffer);

/**
 * Streaming 53-bit hash used for every change-detection key.
 *
 * Two 32-bit multiply/xor lanes folded into a safe integer, so keys can be
 * compared with `===` and stored as plain numbers.
 */
export class KeyHasher {
  private h1: number;
  private h2: number;

  public constructor(seed = 0) {
    this.h1 = 0xdeadbeef ^ seed;
    this.h2 = 0x41c6ce57 ^ seed;
  }

  public int(value: number): this {
    const v = value | 0;
    this.h1 = Math.imul(this.h1 ^ v, 2654435761);
    this.h2 = Math.imul(this.h2 ^ v, 1597334677);
    return this;
  }

  public number(value: number): this {
    f64[0] = value === 0 ? 0 : value;
    return this.int(f64Words[0]).int(f64Words[1]);
  }

  public bool(value: boolean): this {
    return this.int(value ? 1 : 0);
  }

  public string(value: string): this {
    this.int(value.length);
    for (let i = 0; i < value.length; i++) {
      this.int(value.charCodeAt(i));
    }
    return this;
  }

  public key(value: number): this {
    const [lo, hi] = splitKey(value);
    return this.int(lo).int(hi);
  }

  public words(values: Uint32Array): this {
    let h1 = this.h1;
    let h2 = this.h2;
    for (let i = 0; i < values.length; i++) {
      const v = values[i] | 0;
      h1 = Math.imul(h1 ^ v, 2654435761);
      h2 = Math.imul(h2 ^ v, 1597334677);
    }
    this.h1 = h1;
    this.h2 = h2;
    return this;
  }

  public digest(): number {
    let h1 = this.h1;
    let h2 = this.h2;
    h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507);
    h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909);
    h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507);
    h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909);
    return joinKey(h1 >>> 0, h2 >>> 0);
  }
}

export function splitKey(key: number): [number, number] {
  return [key % TWO_32 >>> 0, Math.floor(key / TWO_32) & HI_MASK];
}

export function joinKey(lo: number, hi: number): number {
  return (hi & HI_MASK) * TWO_32 + (lo >>> 0);
}

/** XOR of two keys over the full 53 bits. Order independent, self inverse. */
export function xorKeys(a: number, b: number): number {
  const [alo, ahi] = splitKey(a);
  const [blo, bhi] = splitKey(b);
  return joinKey((alo ^ blo) >>> 0, ahi ^ bhi);
}

export function hashWords(values: Uint32Array, seed = 0): number {
  return new KeyHasher(seed).int(values.length).words(values).digest();
}

function encodeString(target: number[], value: string): void {
  const utf8 = Buffer.from(value, "utf8");
  writeU32LE(target, utf8.length);
  for (const byte of utf8) {
    target.push(byte);
  }
}

function writeU32LE(target: number[], value: number): void {
  target.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
}

function writeI32LE(target: number[], value: number): void {
  writeU32LE(target, value >>> 0);
}

function encodeVoxel(target: number[], voxel: PositionedVoxel): void {
  writeI32LE(target, voxel.x);
  writeI32LE(target, voxel.y);
  writeI32LE(target, voxel.z);
  target.push(voxel.color[0], voxel.color[1], voxel.color[2], voxel.color[3]);
}

export function encodeCanonicalBytes(voxels: PositionedVoxel[], metadata: CanonicalMetadata = {}): Uint8Array {
  const bytes: number[] = [];

  // Magic VX01
  bytes.push(0x56, 0x58, 0x30, 0x31);
  // Endianness marker (little-endian)
  bytes.push(0x01);

  const metadataEntries = Object.entries(metadata)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => [key, JSON.stringify(value)] as const)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  writeU32LE(bytes, metadataEntries.length);
  for (const [key, value] of metadataEntries) {
    encodeString(bytes, key);
    encodeString(bytes, value);
  }

  const sorted = [...voxels].sort((a, b) => compareCoords([a.x, a.y, a.z], [b.x, b.y, b.z]));
  writeU32LE(bytes, sorted.length);
  for (const voxel of sorted) {
    encodeVoxel(bytes, voxel);
  }

  return Uint8Array.from(bytes);
}

export function contentDigest(voxels: PositionedVoxel[], metadata: CanonicalMetadata = {}): string {
  return createHash("sha256").update(encodeCanonicalBytes(voxels, metadata)).digest("hex");
}
