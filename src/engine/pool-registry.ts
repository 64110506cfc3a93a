import { VotesError } from "../errors.js";
import { SCALE, assertUint256 } from "../utils/fixed-point.js";
import type { VotesStore } from "./store.js";
import type { PoolConfig, PoolId } from "./types.js";

/** Validate a one-time pool configuration and return it ready to commit. */
export function planPoolConfig(
  store: VotesStore,
  poolId: PoolId,
  multiplier: bigint,
  maxLockDuration: bigint,
): PoolConfig {
  assertUint256("multiplier", multiplier);
  assertUint256("maxLockDuration", maxLockDuration);

  if (store.getPoolConfig(poolId) !== undefined) {
    throw new VotesError("AlreadyConfigured", `pool "${poolId}" is already configured`);
  }
  if (multiplier < SCALE) {
    throw new VotesError("MultiplierTooLow", `multiplier ${multiplier} is below ${SCALE}`);
  }
  if (maxLockDuration <= 0n) {
    throw new VotesError("InvalidMaxLockDuration", "maxLockDuration must be positive");
  }

  return { multiplier, maxLockDuration };
}

export function requirePoolConfig(store: VotesStore, poolId: PoolId): PoolConfig {
  const config = store.getPoolConfig(poolId);
  if (config === undefined) {
    throw new VotesError("PoolNotConfigured", `pool "${poolId}" is not configured`);
  }
  return config;
}
