export type MergeOp = "add" | "subtract" | "paint" | "intersect";

export const MERGE_OPS: readonly MergeOp[] = ["add", "subtract", "paint", "intersect"];

export function isMergeOp(value: unknown): value is MergeOp {
  return typeof value === "string" && (MERGE_OPS as readonly string[]).includes(value);
}

function clear(out: Uint8Array, o: number): void {
  out[o] = 0;
  out[o + 1] = 0;
  out[o + 2] = 0;
  out[o + 3] = 0;
}

function copy(out: Uint8Array, src: Uint8Array, o: number): void {
  out[o] = src[o];
  out[o + 1] = src[o + 1];
  out[o + 2] = src[o + 2];
  out[o + 3] = src[o + 3];
}

/**
 * Combines two RGBA buffers voxel by voxel into `out`.
 *
 * `a` is the destination content and `b` the operand; either may be null for
 * an absent (all empty) block. Empty results are always written as zeros.
 */
export function combineVoxels(op: MergeOp, a: Uint8Array | null, b: Uint8Array | null, out: Uint8Array): void {
  for (let o = 0; o < out.length; o += 4) {
    const aa = a ? a[o + 3] : 0;
    const ba = b ? b[o + 3] : 0;

    switch (op) {
      case "add": {
        if (!b || ba === 0) {
          if (a && aa !== 0) copy(out, a, o);
          else clear(out, o);
        } else if (!a || aa === 0) {
          copy(out, b, o);
        } else {
          const denom = 255 * ba + aa * (255 - ba);
          for (let i = 0; i < 3; i++) {
            out[o + i] = Math.floor((255 * b[o + i] * ba + a[o + i] * aa * (255 - ba)) / denom);
          }
          out[o + 3] = ba + Math.floor((aa * (255 - ba)) / 255);
        }
        break;
      }
      case "subtract": {
        const alpha = Math.max(0, aa - ba);
        if (!a || alpha === 0) {
          clear(out, o);
        } else {
          copy(out, a, o);
          out[o + 3] = alpha;
        }
        break;
      }
      case "paint": {
        if (!a || aa === 0) {
          clear(out, o);
        } else if (!b || ba === 0) {
          copy(out, a, o);
        } else {
          for (let i = 0; i < 3; i++) {
            out[o + i] = Math.round(a[o + i] + ((b[o + i] - a[o + i]) * ba) / 255);
          }
          out[o + 3] = aa;
        }
        break;
      }
      case "intersect": {
        const alpha = Math.min(aa, ba);
        if (!a || alpha === 0) {
          clear(out, o);
        } else {
          copy(out, a, o);
          out[o + 3] = alpha;
        }
        break;
      }
    }
  }
}
