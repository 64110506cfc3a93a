import { describe, it, expect } from "vitest";
import {
  SCALE,
  WEEK,
  MAX_UINT256,
  assertUint256,
  divScaled,
  epochAlign,
  floorZero,
  isEpochAligned,
} from "../utils/fixed-point.js";
import { isVotesError } from "../errors.js";

describe("epochAlign", () => {
  it("floors to the start of the week", () => {
    expect(epochAlign(0n)).toBe(0n);
    expect(epochAlign(WEEK - 1n)).toBe(0n);
    expect(epochAlign(WEEK)).toBe(WEEK);
    expect(epochAlign(3n * WEEK + 12_345n)).toBe(3n * WEEK);
  });

  it("recognises aligned timestamps", () => {
    expect(isEpochAligned(5n * WEEK)).toBe(true);
    expect(isEpochAligned(5n * WEEK + 1n)).toBe(false);
  });
});

describe("fixed-point helpers", () => {
  it("divides with truncation", () => {
    expect(divScaled(1n, 3n)).toBe(333_333_333_333_333_333n);
    expect(divScaled(5n, 0n)).toBe(0n);
  });

  it("floors negatives at zero", () => {
    expect(floorZero(-1n)).toBe(0n);
    expect(floorZero(7n)).toBe(7n);
  });

  it("accepts the full unsigned 256-bit range and nothing else", () => {
    expect(() => assertUint256("x", MAX_UINT256)).not.toThrow();
    expect(() => assertUint256("x", 0n)).not.toThrow();

    let caught: unknown;
    try {
      assertUint256("x", MAX_UINT256 + 1n);
    } catch (err) {
      caught = err;
    }
    expect(isVotesError(caught, "ValueOutOfRange")).toBe(true);
    expect(() => assertUint256("x", -1n)).toThrow("ValueOutOfRange");
  });
});
