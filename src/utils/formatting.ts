import { SCALE } from "./fixed-point.js";

const DECIMALS = 18;

/** Convert a SCALE fixed-point value to a decimal string, e.g. 15n * SCALE / 10n → "1.5". */
export function fromFixedPoint(value: bigint): string {
  const sign = value < 0n ? "-" : "";
  const abs = value < 0n ? -value : value;
  const whole = abs / SCALE;
  const frac = abs % SCALE;
  if (frac === 0n) return `${sign}${whole}`;
  const fracStr = frac.toString().padStart(DECIMALS, "0").replace(/0+$/, "");
  return `${sign}${whole}.${fracStr}`;
}

/** Convert a non-negative decimal string (at most 18 fractional digits kept) to fixed point. */
export function toFixedPoint(value: string): bigint {
  const trimmed = value.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new Error(`Not a non-negative decimal: "${value}"`);
  }
  const [wholePart, fracPart = ""] = trimmed.split(".");
  const paddedFrac = fracPart.padEnd(DECIMALS, "0").slice(0, DECIMALS);
  return BigInt(wholePart) * SCALE + BigInt(paddedFrac);
}

/** Format a fixed-point share as a percentage with two decimals, e.g. "37.50%". */
export function formatShare(share: bigint): string {
  const basisPoints = (share * 10_000n) / SCALE;
  const whole = basisPoints / 100n;
  const frac = (basisPoints % 100n).toString().padStart(2, "0");
  return `${whole}.${frac}%`;
}

// Largest timestamp a Date can hold, in seconds.
const MAX_DATE_SECONDS = 8_640_000_000_000n;

/** Render a unix timestamp (seconds) as an ISO-8601 string, or the raw seconds past the Date range. */
export function formatTimestamp(seconds: bigint): string {
  if (seconds > MAX_DATE_SECONDS) return `${seconds}s`;
  return new Date(Number(seconds) * 1000).toISOString();
}
