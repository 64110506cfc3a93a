import { VotesError } from "../errors.js";
import { divScaled, floorZero } from "../utils/fixed-point.js";
import type { VotesStore } from "./store.js";
import type { LockId, Point, PoolId, UserId } from "./types.js";

/** Value of a point at `t`, floored at zero. */
export function decayedBias(point: Point, t: bigint): bigint {
  const elapsed = t > point.lastUpdate ? t - point.lastUpdate : 0n;
  return floorZero(point.bias - point.slope * elapsed);
}

/** Last history entry with `lastUpdate <= t`, or undefined if `t` precedes the history. */
export function pointAt(history: readonly Point[], t: bigint): Point | undefined {
  let lo = 0;
  let hi = history.length - 1;
  let found: Point | undefined;

  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const candidate = history[mid];
    if (candidate.lastUpdate <= t) {
      found = candidate;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }

  return found;
}

export function votingPower(store: VotesStore, user: UserId, lockId: LockId, now: bigint): bigint {
  const lock = store.getUserLock(user, lockId);
  if (!lock) {
    throw new VotesError("NoLockFound", `no lock ${lockId} for user "${user}"`);
  }
  return decayedBias(lock.point, now);
}

/**
 * Stored global point decayed linearly to `now`. Scheduled slope changes
 * between the last checkpoint and `now` are not applied; only a checkpoint
 * brings them in.
 */
export function globalVotingPower(store: VotesStore, poolId: PoolId, now: bigint): bigint {
  const point = store.getGlobalPoint(poolId);
  return point ? decayedBias(point, now) : 0n;
}

/** Fixed-point share of the pool total; 0 when the pool total is 0. */
export function votingPowerShare(power: bigint, total: bigint): bigint {
  return divScaled(power, total);
}

export function votingPowerAt(
  store: VotesStore,
  user: UserId,
  lockId: LockId,
  timestamp: bigint,
  now: bigint,
): bigint {
  requirePast(timestamp, now);
  if (!store.getUserLock(user, lockId)) {
    throw new VotesError("NoLockFound", `no lock ${lockId} for user "${user}"`);
  }
  const point = pointAt(store.getUserHistory(user, lockId), timestamp);
  return point ? decayedBias(point, timestamp) : 0n;
}

export function globalVotingPowerAt(store: VotesStore, poolId: PoolId, timestamp: bigint, now: bigint): bigint {
  requirePast(timestamp, now);
  const point = pointAt(store.getGlobalHistory(poolId), timestamp);
  return point ? decayedBias(point, timestamp) : 0n;
}

function requirePast(timestamp: bigint, now: bigint): void {
  if (timestamp > now) {
    throw new VotesError("FutureTimestamp", `timestamp ${timestamp} is after now (${now})`);
  }
}
