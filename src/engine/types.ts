export type PoolId = string;
export type UserId = string;
export type LockId = bigint;

/** Immutable once set. `multiplier` is SCALE fixed point, `maxLockDuration` seconds. */
export interface PoolConfig {
  multiplier: bigint;
  maxLockDuration: bigint;
}

/**
 * A linearly decaying quantity. At any `t >= lastUpdate` its value is
 * `max(0, bias - slope * (t - lastUpdate))`. `period` is the original lock
 * duration that priced the slope.
 */
export interface Point {
  bias: bigint;
  slope: bigint;
  period: bigint;
  lastUpdate: bigint;
}

/** Balance and unlock time supplied by the lock-owning collaborator. */
export interface LockedBalance {
  amount: bigint;
  end: bigint;
}

/** A user point together with the pool its lock was created in. */
export interface UserLock {
  poolId: PoolId;
  point: Point;
}

export interface LockRef {
  user: UserId;
  lockId: LockId;
}

export const ZERO_LOCK: LockedBalance = { amount: 0n, end: 0n };

export function zeroPoint(now: bigint): Point {
  return { bias: 0n, slope: 0n, period: 0n, lastUpdate: now };
}
