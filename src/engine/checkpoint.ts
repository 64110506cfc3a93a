/**
 * Rolling + apply routine shared by every lock mutation and by the bare
 * pool checkpoint.
 *
 * The global point of a pool is the sum of all live user points in it. Instead
 * of visiting every lock, each lock registers a (negative) slope change at its
 * unlock epoch; rolling the global point forward week by week adds those
 * changes as the cursor crosses them.
 */

import { VotesError } from "../errors.js";
import { MAX_ROLL_STEPS, SCALE, WEEK, epochAlign, floorZero } from "../utils/fixed-point.js";
import type { StoreBatch, VotesStore } from "./store.js";
import type { LockId, LockedBalance, Point, PoolConfig, PoolId, UserId } from "./types.js";
import { zeroPoint } from "./types.js";

export interface LockDelta {
  user: UserId;
  lockId: LockId;
  config: PoolConfig;
  oldLocked: LockedBalance;
  newLocked: LockedBalance;
  /** Stored user point, absent on lock creation. */
  existing?: Point;
}

export interface RollResult {
  point: Point;
  reachedNow: boolean;
}

export interface CheckpointPlan {
  batch: StoreBatch;
  globalPoint: Point;
  userPoint?: Point;
}

/** Slope of a lock: (amount / T) * (multiplier * period / T), T = maxLockDuration. */
export function lockSlope(amount: bigint, config: PoolConfig, period: bigint): bigint {
  const rawSlope = amount / config.maxLockDuration;
  const weight = (config.multiplier * period) / config.maxLockDuration;
  return (rawSlope * weight) / SCALE;
}

/** Point of a lock as of `now`; zero once expired or emptied. */
export function lockPoint(locked: LockedBalance, now: bigint, config: PoolConfig, period: bigint): Point {
  if (locked.end > now && locked.amount > 0n) {
    const slope = lockSlope(locked.amount, config, period);
    return { bias: slope * (locked.end - now), slope, period, lastUpdate: now };
  }
  return { bias: 0n, slope: 0n, period, lastUpdate: now };
}

/**
 * Advance a global point to `now` in weekly steps, applying scheduled slope
 * changes at each epoch crossed. Stops after `maxSteps`; the returned point
 * then sits at the last epoch reached.
 */
export function rollGlobalPoint(
  last: Point,
  now: bigint,
  slopeChangeAt: (epoch: bigint) => bigint,
  maxSteps: number = MAX_ROLL_STEPS,
): RollResult {
  let { bias, slope } = last;
  let lastCheckpoint = last.lastUpdate;
  let cursor = epochAlign(lastCheckpoint);

  for (let i = 0; i < maxSteps && lastCheckpoint < now; i++) {
    cursor += WEEK;
    let dSlope = 0n;
    if (cursor > now) {
      cursor = now;
    } else {
      dSlope = slopeChangeAt(cursor);
    }

    bias = floorZero(bias - slope * (cursor - lastCheckpoint));
    slope = floorZero(slope + dSlope);
    lastCheckpoint = cursor;
  }

  return {
    point: { bias, slope, period: last.period, lastUpdate: lastCheckpoint },
    reachedNow: lastCheckpoint === now,
  };
}

/**
 * Compute everything a checkpoint writes without touching the store.
 * Throws before anything is planned if the pool cannot be brought to `now`.
 */
export function planCheckpoint(
  store: VotesStore,
  poolId: PoolId,
  now: bigint,
  delta?: LockDelta,
): CheckpointPlan {
  let pointOld: Point | undefined;
  let pointNew: Point | undefined;
  let dSlopeOld = 0n;
  let dSlopeNew = 0n;

  if (delta) {
    const { config, oldLocked, newLocked, existing } = delta;
    const period = existing && existing.period !== 0n ? existing.period : newLocked.end - now;
    pointOld = lockPoint(oldLocked, now, config, period);
    pointNew = lockPoint(newLocked, now, config, period);

    dSlopeOld = store.getSlopeChange(poolId, oldLocked.end);
    dSlopeNew = newLocked.end === oldLocked.end ? dSlopeOld : store.getSlopeChange(poolId, newLocked.end);
  }

  const last = store.getGlobalPoint(poolId) ?? zeroPoint(now);
  if (last.lastUpdate > now) {
    throw new VotesError(
      "NonMonotonicClock",
      `pool "${poolId}" was last updated at ${last.lastUpdate}, after now (${now})`,
    );
  }

  const rolled = rollGlobalPoint(last, now, (epoch) => store.getSlopeChange(poolId, epoch));
  const globalPoint = rolled.point;

  if (!delta || !pointOld || !pointNew) {
    return { batch: { globalPoint: { poolId, point: globalPoint } }, globalPoint };
  }

  if (!rolled.reachedNow) {
    throw new VotesError(
      "CheckpointRequired",
      `pool "${poolId}" is more than ${MAX_ROLL_STEPS} weeks behind; checkpoint it before mutating locks`,
    );
  }

  globalPoint.slope = floorZero(globalPoint.slope + pointNew.slope - pointOld.slope);
  globalPoint.bias = floorZero(globalPoint.bias + pointNew.bias - pointOld.bias);

  const { oldLocked, newLocked } = delta;
  const slopeChanges: NonNullable<StoreBatch["slopeChanges"]> = [];

  if (oldLocked.end > now) {
    dSlopeOld += pointOld.slope;
    if (newLocked.end === oldLocked.end) {
      dSlopeOld -= pointNew.slope;
    }
    slopeChanges.push({ poolId, epoch: oldLocked.end, delta: dSlopeOld });
  }

  if (newLocked.end > now && oldLocked.end < newLocked.end) {
    dSlopeNew -= pointNew.slope;
    slopeChanges.push({ poolId, epoch: newLocked.end, delta: dSlopeNew });
  }

  return {
    batch: {
      globalPoint: { poolId, point: globalPoint },
      slopeChanges,
      userLock: { user: delta.user, lockId: delta.lockId, lock: { poolId, point: pointNew } },
    },
    globalPoint,
    userPoint: pointNew,
  };
}
