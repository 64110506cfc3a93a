/**
 * Fixed-point and epoch arithmetic shared by the engine and the host.
 * Uses BigInt throughout; every division truncates toward zero.
 */

import { VotesError } from "../errors.js";

// Engine constants
export const SCALE = 10n ** 18n;               // 1.0 in fixed point
export const WEEK = 604_800n;                  // Epoch width in seconds
export const MAX_ROLL_STEPS = 64;              // Weekly steps per rolling pass
export const MAX_UINT256 = (1n << 256n) - 1n;

/** Start of the week-aligned epoch containing `t`. */
export function epochAlign(t: bigint): bigint {
  return (t / WEEK) * WEEK;
}

export function isEpochAligned(t: bigint): boolean {
  return t % WEEK === 0n;
}

/** Clamp a signed value at zero. */
export function floorZero(x: bigint): bigint {
  return x < 0n ? 0n : x;
}

/** Fixed-point divide: (a * SCALE) / b. Returns 0 for a zero denominator. */
export function divScaled(a: bigint, b: bigint): bigint {
  if (b === 0n) return 0n;
  return (a * SCALE) / b;
}

/** Reject values outside the unsigned 256-bit range. */
export function assertUint256(name: string, value: bigint): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new VotesError("ValueOutOfRange", `${name} must fit in an unsigned 256-bit integer`);
  }
}
