import winston from "winston";
import { AllowListAccessControl, InMemoryVotesStore, ManualClock, SCALE, VotesEngine, WEEK } from "../engine/index.js";

export const ADMIN = "admin";
export const POOL = "pool-a";
/** Week-aligned start of the test timeline. */
export const T0 = WEEK * 2800n;
export const MAX_LOCK = 52n * WEEK;

export const silentLogger = winston.createLogger({ silent: true });

export function tokens(n: bigint): bigint {
  return n * SCALE;
}

export function createTestEngine(start: bigint = T0 + 1000n) {
  const clock = new ManualClock(start);
  const store = new InMemoryVotesStore();
  const engine = new VotesEngine({
    access: new AllowListAccessControl([ADMIN]),
    clock,
    store,
    logger: silentLogger,
  });
  return { engine, clock, store };
}

export function createConfiguredEngine(start?: bigint) {
  const ctx = createTestEngine(start);
  ctx.engine.configurePool(ADMIN, POOL, SCALE, MAX_LOCK);
  return ctx;
}
