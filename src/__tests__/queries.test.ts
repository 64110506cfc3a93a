import { describe, it, expect } from "vitest";
import { decayedBias, pointAt } from "../engine/queries.js";
import type { Point } from "../engine/types.js";
import { SCALE, WEEK } from "../utils/fixed-point.js";
import { ADMIN, POOL, T0, createConfiguredEngine, tokens } from "./helpers.js";

const START = T0 + 1000n;
const END = T0 + 4n * WEEK;
const SLOPE_100 = 244_490_486_417n;
const BIAS_100 = 591_226_894_253_589_400n;

describe("decayedBias", () => {
  const point: Point = { bias: 1_000n, slope: 10n, period: 0n, lastUpdate: 100n };

  it("decays linearly from the last update", () => {
    expect(decayedBias(point, 100n)).toBe(1_000n);
    expect(decayedBias(point, 150n)).toBe(500n);
  });

  it("never goes below zero", () => {
    expect(decayedBias(point, 10_000n)).toBe(0n);
  });

  it("does not grow for timestamps before the last update", () => {
    expect(decayedBias(point, 50n)).toBe(1_000n);
  });
});

describe("pointAt", () => {
  const history: Point[] = [10n, 20n, 30n].map((t) => ({ bias: t, slope: 0n, period: 0n, lastUpdate: t }));

  it("picks the latest entry at or before the timestamp", () => {
    expect(pointAt(history, 10n)?.lastUpdate).toBe(10n);
    expect(pointAt(history, 25n)?.lastUpdate).toBe(20n);
    expect(pointAt(history, 99n)?.lastUpdate).toBe(30n);
  });

  it("returns nothing before the first entry", () => {
    expect(pointAt(history, 9n)).toBeUndefined();
    expect(pointAt([], 9n)).toBeUndefined();
  });
});

describe("voting power queries", () => {
  it("fails for a lock that was never created", () => {
    const { engine } = createConfiguredEngine();
    expect(() => engine.getVotingPower("alice", 1n)).toThrow("NoLockFound");
    expect(engine.isOnceNotedPoint("alice", 1n)).toBe(false);
    expect(engine.getUserPoint("alice", 1n)).toBeUndefined();
  });

  it("reports each lock's share of the pool", () => {
    const { engine } = createConfiguredEngine();
    const a = engine.noteLockCreation(ADMIN, "alice", POOL, tokens(100n), END);
    const b = engine.noteLockCreation(ADMIN, "bob", POOL, tokens(300n), END);

    expect(engine.getVotingPowerShare("alice", POOL, a)).toBe(SCALE / 4n);
    expect(engine.getVotingPowerShares([{ user: "alice", lockId: a }, { user: "bob", lockId: b }], POOL)).toEqual([
      SCALE / 4n,
      (3n * SCALE) / 4n,
    ]);
  });

  it("reports a zero share when the pool has no power", () => {
    const { engine, clock } = createConfiguredEngine();
    const a = engine.noteLockCreation(ADMIN, "alice", POOL, tokens(100n), END);
    clock.set(END + WEEK);
    engine.checkpoint(POOL);

    expect(engine.getVotingPowerShare("alice", POOL, a)).toBe(0n);
  });

  it("aligns timestamps to epochs", () => {
    const { engine } = createConfiguredEngine();
    expect(engine.getEpochTime()).toBe(T0);
    expect(engine.getEpochTime(T0 + 3n * WEEK + 1n)).toBe(T0 + 3n * WEEK);
  });
});

describe("historical queries", () => {
  it("reads a lock's power at past timestamps across mutations", () => {
    const { engine, clock } = createConfiguredEngine();
    const lockId = engine.noteLockCreation(ADMIN, "alice", POOL, tokens(100n), END);
    clock.advance(WEEK);
    engine.noteLockBalanceChange(ADMIN, "alice", POOL, lockId, tokens(100n), tokens(200n), END);
    clock.advance(WEEK);

    expect(engine.getVotingPowerAt("alice", lockId, START - 1n)).toBe(0n);
    expect(engine.getVotingPowerAt("alice", lockId, START)).toBe(BIAS_100);
    expect(engine.getVotingPowerAt("alice", lockId, START + 100n)).toBe(BIAS_100 - SLOPE_100 * 100n);
    expect(engine.getVotingPowerAt("alice", lockId, START + WEEK)).toBe(886_718_096_137_175_600n);
    expect(engine.getVotingPowerAt("alice", lockId, clock.now())).toBe(engine.getVotingPower("alice", lockId));
  });

  it("reads the pool total at past timestamps", () => {
    const { engine, clock } = createConfiguredEngine();
    engine.noteLockCreation(ADMIN, "alice", POOL, tokens(100n), END);
    clock.advance(2n * WEEK);

    expect(engine.getGlobalVotingPowerAt(POOL, START - 1n)).toBe(0n);
    expect(engine.getGlobalVotingPowerAt(POOL, START + 10n)).toBe(BIAS_100 - SLOPE_100 * 10n);
    expect(engine.getGlobalVotingPowerAt("other", START)).toBe(0n);
  });

  it("refuses timestamps in the future", () => {
    const { engine, clock } = createConfiguredEngine();
    const lockId = engine.noteLockCreation(ADMIN, "alice", POOL, tokens(100n), END);

    expect(() => engine.getVotingPowerAt("alice", lockId, clock.now() + 1n)).toThrow("FutureTimestamp");
    expect(() => engine.getGlobalVotingPowerAt(POOL, clock.now() + 1n)).toThrow("FutureTimestamp");
  });
});
