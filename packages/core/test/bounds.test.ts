import { describe, expect, it } from "vitest";
import {
  boundsFromMinMax,
  emptyBounds,
  intersectBounds,
  isEmptyBounds,
  normalizeColor,
  parseHexColor,
  unionBounds
} from "../src/index.js";

describe("bounds", () => {
  it("is empty when any extent is zero", () => {
    expect(isEmptyBounds(emptyBounds())).toBe(true);
    expect(isEmptyBounds(boundsFromMinMax([0, 0, 0], [0, 0, 0]))).toBe(false);
  });

  it("spans inclusive min and max corners", () => {
    expect(boundsFromMinMax([-1, 4, 6], [2, 9, 7])).toEqual({
      minX: -1,
      minY: 4,
      minZ: 6,
      maxX: 2,
      maxY: 9,
      maxZ: 7,
      dx: 4,
      dy: 6,
      dz: 2
    });
  });

  it("combines with union and intersection", () => {
    const a = boundsFromMinMax([0, 0, 0], [3, 3, 3]);
    const b = boundsFromMinMax([2, 2, 2], [5, 5, 5]);
    expect(unionBounds(a, b).dx).toBe(6);
    expect(unionBounds(emptyBounds(), b)).toEqual(b);
    const both = intersectBounds(a, b);
    expect([both.minX, both.maxX, both.dx]).toEqual([2, 3, 2]);
    expect(isEmptyBounds(intersectBounds(a, boundsFromMinMax([9, 9, 9], [9, 9, 9])))).toBe(true);
  });
});

describe("colors", () => {
  it("folds transparent colors to empty", () => {
    expect(normalizeColor([12, 34, 56, 0])).toEqual([0, 0, 0, 0]);
  });

  it("clamps channels", () => {
    expect(normalizeColor([300, -5, 10.4, 255])).toEqual([255, 0, 10, 255]);
  });

  it("parses hex literals", () => {
    expect(parseHexColor("#ff8000")).toEqual([255, 128, 0, 255]);
    expect(parseHexColor("00ff0080")).toEqual([0, 255, 0, 128]);
    expect(() => parseHexColor("nope")).toThrow("Invalid color literal");
  });
});
