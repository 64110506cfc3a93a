import type { Logger } from "winston";
import { VotesError, isVotesError } from "../errors.js";
import { logger as defaultLogger } from "../logger.js";
import { WEEK, assertUint256, epochAlign, isEpochAligned } from "../utils/fixed-point.js";
import { planCheckpoint } from "./checkpoint.js";
import type { LockDelta } from "./checkpoint.js";
import { planPoolConfig, requirePoolConfig } from "./pool-registry.js";
import * as queries from "./queries.js";
import { systemClock } from "./ports.js";
import type { AccessControl, Clock } from "./ports.js";
import { InMemoryVotesStore } from "./store.js";
import type { VotesStore } from "./store.js";
import type { LockId, LockRef, Point, PoolConfig, PoolId, UserId, UserLock } from "./types.js";
import { ZERO_LOCK } from "./types.js";

export interface VotesEngineOptions {
  access: AccessControl;
  clock?: Clock;
  store?: VotesStore;
  logger?: Logger;
}

/**
 * Decay-weighted voting power per pool.
 *
 * All methods are synchronous and each mutation either commits fully or
 * throws a {@link VotesError} with nothing written, so the host's event loop
 * already serializes writers to the same pool.
 */
export class VotesEngine {
  private readonly access: AccessControl;
  private readonly clock: Clock;
  private readonly store: VotesStore;
  private readonly logger: Logger;

  constructor(options: VotesEngineOptions) {
    this.access = options.access;
    this.clock = options.clock ?? systemClock;
    this.store = options.store ?? new InMemoryVotesStore();
    this.logger = options.logger ?? defaultLogger;
  }

  // -- Pool registry --

  configurePool(caller: UserId, poolId: PoolId, multiplier: bigint, maxLockDuration: bigint): PoolConfig {
    return this.mutate("configurePool", { caller, poolId }, () => {
      this.requireAuthorized(caller);
      const config = planPoolConfig(this.store, poolId, multiplier, maxLockDuration);
      this.store.commit({ poolConfig: { poolId, config } });
      return config;
    });
  }

  // -- Checkpoint engine --

  /** Roll the pool's global point to now without touching any lock. */
  checkpoint(poolId: PoolId): Point {
    return this.mutate("checkpoint", { poolId }, () => {
      const plan = planCheckpoint(this.store, poolId, this.clock.now());
      this.store.commit(plan.batch);
      return plan.globalPoint;
    });
  }

  noteLockCreation(caller: UserId, user: UserId, poolId: PoolId, balance: bigint, unlockTime: bigint): LockId {
    return this.mutate("noteLockCreation", { caller, user, poolId }, () => {
      this.requireAuthorized(caller);
      assertUint256("balance", balance);
      assertUint256("unlockTime", unlockTime);
      const config = requirePoolConfig(this.store, poolId);
      const now = this.clock.now();

      if (balance === 0n) {
        throw new VotesError("ZeroLock", "cannot lock a zero balance");
      }
      this.requireAligned(unlockTime);
      if (unlockTime < now + WEEK) {
        throw new VotesError("LockTooShort", `unlock time ${unlockTime} is less than a week away`);
      }
      if (unlockTime > now + config.maxLockDuration) {
        throw new VotesError("LockTooLong", `unlock time ${unlockTime} exceeds the pool maximum`);
      }

      const lockId = this.store.peekNextLockId();
      const plan = planCheckpoint(this.store, poolId, now, {
        user,
        lockId,
        config,
        oldLocked: ZERO_LOCK,
        newLocked: { amount: balance, end: unlockTime },
      });
      this.store.commit({ ...plan.batch, allocatedLockId: lockId });
      this.logger.debug("lock created", { user, poolId, lockId: lockId.toString(), unlockTime: unlockTime.toString() });
      return lockId;
    });
  }

  noteLockBalanceChange(
    caller: UserId,
    user: UserId,
    poolId: PoolId,
    lockId: LockId,
    oldBalance: bigint,
    newBalance: bigint,
    unlockTime: bigint,
  ): Point {
    return this.mutate("noteLockBalanceChange", { caller, user, poolId }, () => {
      this.requireAuthorized(caller);
      assertUint256("oldBalance", oldBalance);
      assertUint256("newBalance", newBalance);
      assertUint256("unlockTime", unlockTime);
      const config = requirePoolConfig(this.store, poolId);
      const existing = this.requireLock(user, lockId, poolId);
      const now = this.clock.now();

      this.requireAligned(unlockTime);
      if (unlockTime <= now) {
        throw new VotesError("LockExpired", `lock ${lockId} unlocked at ${unlockTime}`);
      }

      return this.applyLockDelta(poolId, now, {
        user,
        lockId,
        config,
        existing: existing.point,
        oldLocked: { amount: oldBalance, end: unlockTime },
        newLocked: { amount: newBalance, end: unlockTime },
      });
    });
  }

  noteLockExtension(
    caller: UserId,
    user: UserId,
    poolId: PoolId,
    lockId: LockId,
    balance: bigint,
    oldUnlockTime: bigint,
    newUnlockTime: bigint,
  ): Point {
    return this.mutate("noteLockExtension", { caller, user, poolId }, () => {
      this.requireAuthorized(caller);
      assertUint256("balance", balance);
      assertUint256("oldUnlockTime", oldUnlockTime);
      assertUint256("newUnlockTime", newUnlockTime);
      const config = requirePoolConfig(this.store, poolId);
      const existing = this.requireLock(user, lockId, poolId);
      const now = this.clock.now();

      this.requireAligned(oldUnlockTime);
      this.requireAligned(newUnlockTime);
      if (newUnlockTime < now) {
        throw new VotesError("LockTooShort", `new unlock time ${newUnlockTime} is in the past`);
      }
      if (newUnlockTime < oldUnlockTime) {
        throw new VotesError("OnlyExtensions", "unlock time can only move forward");
      }
      if (newUnlockTime > now + config.maxLockDuration) {
        throw new VotesError("LockTooLong", `unlock time ${newUnlockTime} exceeds the pool maximum`);
      }

      return this.applyLockDelta(poolId, now, {
        user,
        lockId,
        config,
        existing: existing.point,
        oldLocked: { amount: balance, end: oldUnlockTime },
        newLocked: { amount: balance, end: newUnlockTime },
      });
    });
  }

  // -- Query layer --

  getVotingPower(user: UserId, lockId: LockId): bigint {
    return queries.votingPower(this.store, user, lockId, this.clock.now());
  }

  getVotingPowerAt(user: UserId, lockId: LockId, timestamp: bigint): bigint {
    return queries.votingPowerAt(this.store, user, lockId, timestamp, this.clock.now());
  }

  getGlobalVotingPower(poolId: PoolId): bigint {
    return queries.globalVotingPower(this.store, poolId, this.clock.now());
  }

  getGlobalVotingPowerAt(poolId: PoolId, timestamp: bigint): bigint {
    return queries.globalVotingPowerAt(this.store, poolId, timestamp, this.clock.now());
  }

  getVotingPowerShare(user: UserId, poolId: PoolId, lockId: LockId): bigint {
    return queries.votingPowerShare(this.getVotingPower(user, lockId), this.getGlobalVotingPower(poolId));
  }

  getVotingPowerShares(entries: readonly LockRef[], poolId: PoolId): bigint[] {
    const total = this.getGlobalVotingPower(poolId);
    return entries.map(({ user, lockId }) => queries.votingPowerShare(this.getVotingPower(user, lockId), total));
  }

  isOpenPool(poolId: PoolId): boolean {
    return this.store.getPoolConfig(poolId) !== undefined;
  }

  isOnceNotedPoint(user: UserId, lockId: LockId): boolean {
    return this.store.getUserLock(user, lockId) !== undefined;
  }

  getMaximumLockTime(poolId: PoolId): bigint {
    return requirePoolConfig(this.store, poolId).maxLockDuration;
  }

  getMultiplier(poolId: PoolId): bigint {
    return requirePoolConfig(this.store, poolId).multiplier;
  }

  getGlobalPoint(poolId: PoolId): Point | undefined {
    return this.store.getGlobalPoint(poolId);
  }

  getUserPoint(user: UserId, lockId: LockId): Point | undefined {
    return this.store.getUserLock(user, lockId)?.point;
  }

  getEpochTime(timestamp: bigint = this.clock.now()): bigint {
    return epochAlign(timestamp);
  }

  now(): bigint {
    return this.clock.now();
  }

  // -- Internals --

  private applyLockDelta(poolId: PoolId, now: bigint, delta: LockDelta): Point {
    const plan = planCheckpoint(this.store, poolId, now, delta);
    this.store.commit(plan.batch);
    this.logger.debug("lock updated", { user: delta.user, poolId, lockId: delta.lockId.toString() });
    return plan.userPoint ?? plan.globalPoint;
  }

  private requireAuthorized(caller: UserId): void {
    if (!this.access.isAuthorized(caller)) {
      throw new VotesError("Unauthorized", `caller "${caller}" may not mutate voting state`);
    }
  }

  private requireAligned(t: bigint): void {
    if (!isEpochAligned(t)) {
      throw new VotesError("NotEpochAligned", `unlock time ${t} is not aligned to a week boundary`);
    }
  }

  private requireLock(user: UserId, lockId: LockId, poolId: PoolId): UserLock {
    const lock = this.store.getUserLock(user, lockId);
    if (!lock) {
      throw new VotesError("NoLockFound", `no lock ${lockId} for user "${user}"`);
    }
    if (lock.poolId !== poolId) {
      throw new VotesError("WrongPool", `lock ${lockId} belongs to pool "${lock.poolId}"`);
    }
    return lock;
  }

  private mutate<T>(operation: string, meta: Record<string, string>, run: () => T): T {
    try {
      return run();
    } catch (err) {
      if (isVotesError(err)) {
        this.logger.warn("mutation rejected", { operation, kind: err.kind, ...meta });
      }
      throw err;
    }
  }
}
