import { describe, it, expect } from "vitest";
import { InMemoryVotesStore } from "../engine/store.js";
import type { Point } from "../engine/types.js";

const point = (bias: bigint, lastUpdate: bigint): Point => ({ bias, slope: 1n, period: 0n, lastUpdate });

describe("InMemoryVotesStore", () => {
  it("starts lock ids at 1 and advances only when a batch allocates one", () => {
    const store = new InMemoryVotesStore();
    expect(store.peekNextLockId()).toBe(1n);

    store.commit({ globalPoint: { poolId: "p", point: point(5n, 10n) } });
    expect(store.peekNextLockId()).toBe(1n);

    store.commit({ allocatedLockId: 1n });
    expect(store.peekNextLockId()).toBe(2n);
  });

  it("collapses writes in the same second into one history entry", () => {
    const store = new InMemoryVotesStore();
    store.commit({ globalPoint: { poolId: "p", point: point(5n, 10n) } });
    store.commit({ globalPoint: { poolId: "p", point: point(7n, 10n) } });
    store.commit({ globalPoint: { poolId: "p", point: point(3n, 20n) } });

    expect(store.getGlobalHistory("p").map((p) => p.bias)).toEqual([7n, 3n]);
    expect(store.getGlobalPoint("p")?.bias).toBe(3n);
  });

  it("hands out copies that cannot change stored state", () => {
    const store = new InMemoryVotesStore();
    store.commit({ userLock: { user: "u", lockId: 1n, lock: { poolId: "p", point: point(9n, 1n) } } });

    const lock = store.getUserLock("u", 1n);
    if (lock) lock.point.bias = 0n;

    expect(store.getUserLock("u", 1n)?.point.bias).toBe(9n);
    expect(store.getSlopeChange("p", 604_800n)).toBe(0n);
  });
});
