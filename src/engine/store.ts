import type { LockId, Point, PoolConfig, PoolId, UserId, UserLock } from "./types.js";

/**
 * Everything one mutation writes. The engine builds a batch after all checks
 * and computations have passed, then hands it to `commit` in one step.
 */
export interface StoreBatch {
  poolConfig?: { poolId: PoolId; config: PoolConfig };
  globalPoint?: { poolId: PoolId; point: Point };
  slopeChanges?: Array<{ poolId: PoolId; epoch: bigint; delta: bigint }>;
  userLock?: { user: UserId; lockId: LockId; lock: UserLock };
  /** Set when the batch consumes the next lock id. */
  allocatedLockId?: LockId;
}

/** Persisted state: PoolConfig, GlobalPoint, SlopeChangeSchedule, UserPoint, nextLockId. */
export interface VotesStore {
  getPoolConfig(poolId: PoolId): PoolConfig | undefined;
  getGlobalPoint(poolId: PoolId): Point | undefined;
  getGlobalHistory(poolId: PoolId): readonly Point[];
  getSlopeChange(poolId: PoolId, epoch: bigint): bigint;
  getUserLock(user: UserId, lockId: LockId): UserLock | undefined;
  getUserHistory(user: UserId, lockId: LockId): readonly Point[];
  peekNextLockId(): LockId;
  commit(batch: StoreBatch): void;
}

export class InMemoryVotesStore implements VotesStore {
  private readonly pools = new Map<PoolId, PoolConfig>();
  private readonly globalHistory = new Map<PoolId, Point[]>();
  private readonly slopeChanges = new Map<PoolId, Map<bigint, bigint>>();
  private readonly userLocks = new Map<UserId, Map<LockId, UserLock>>();
  private readonly userHistory = new Map<UserId, Map<LockId, Point[]>>();
  private nextLockId: LockId = 1n;

  getPoolConfig(poolId: PoolId): PoolConfig | undefined {
    const config = this.pools.get(poolId);
    return config && { ...config };
  }

  getGlobalPoint(poolId: PoolId): Point | undefined {
    const history = this.globalHistory.get(poolId);
    const last = history?.[history.length - 1];
    return last && { ...last };
  }

  getGlobalHistory(poolId: PoolId): readonly Point[] {
    return this.globalHistory.get(poolId) ?? [];
  }

  getSlopeChange(poolId: PoolId, epoch: bigint): bigint {
    return this.slopeChanges.get(poolId)?.get(epoch) ?? 0n;
  }

  getUserLock(user: UserId, lockId: LockId): UserLock | undefined {
    const lock = this.userLocks.get(user)?.get(lockId);
    return lock && { poolId: lock.poolId, point: { ...lock.point } };
  }

  getUserHistory(user: UserId, lockId: LockId): readonly Point[] {
    return this.userHistory.get(user)?.get(lockId) ?? [];
  }

  peekNextLockId(): LockId {
    return this.nextLockId;
  }

  commit(batch: StoreBatch): void {
    if (batch.poolConfig) {
      this.pools.set(batch.poolConfig.poolId, { ...batch.poolConfig.config });
    }

    if (batch.globalPoint) {
      const { poolId, point } = batch.globalPoint;
      appendPoint(getOrCreate(this.globalHistory, poolId, () => []), point);
    }

    for (const { poolId, epoch, delta } of batch.slopeChanges ?? []) {
      getOrCreate(this.slopeChanges, poolId, () => new Map()).set(epoch, delta);
    }

    if (batch.userLock) {
      const { user, lockId, lock } = batch.userLock;
      getOrCreate(this.userLocks, user, () => new Map()).set(lockId, {
        poolId: lock.poolId,
        point: { ...lock.point },
      });
      const perUser = getOrCreate(this.userHistory, user, () => new Map<LockId, Point[]>());
      appendPoint(getOrCreate(perUser, lockId, () => []), lock.point);
    }

    if (batch.allocatedLockId !== undefined) {
      this.nextLockId = batch.allocatedLockId + 1n;
    }
  }
}

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}

// Several writes in the same second collapse into one history entry.
function appendPoint(history: Point[], point: Point): void {
  const last = history[history.length - 1];
  if (last && last.lastUpdate === point.lastUpdate) {
    history[history.length - 1] = { ...point };
  } else {
    history.push({ ...point });
  }
}
