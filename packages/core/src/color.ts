import type { Color } from "./types.js";

export const EMPTY: Color = [0, 0, 0, 0];

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(255, Math.round(value)));
}

/** Clamps every channel and folds any zero-alpha color to EMPTY. */
export function normalizeColor(color: readonly number[]): Color {
  const a = clampChannel(color[3] ?? 255);
  if (a === 0) return EMPTY;
  return [clampChannel(color[0] ?? 0), clampChannel(color[1] ?? 0), clampChannel(color[2] ?? 0), a];
}

export function parseHexColor(value: string): Color {
  const hex = value.trim().replace(/^#/, "");
  if (!/^([0-9a-f]{6}|[0-9a-f]{8})$/i.test(hex)) {
    throw new Error(`Invalid color literal: ${value}`);
  }
  const n = (i: number): number => parseInt(hex.slice(i, i + 2), 16);
  return normalizeColor([n(0), n(2), n(4), hex.length === 8 ? n(6) : 255]);
}
