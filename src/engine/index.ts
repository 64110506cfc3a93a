export { VotesEngine } from "./votes-engine.js";
export type { VotesEngineOptions } from "./votes-engine.js";
export { InMemoryVotesStore } from "./store.js";
export type { StoreBatch, VotesStore } from "./store.js";
export { AllowListAccessControl, ManualClock, systemClock } from "./ports.js";
export type { AccessControl, Clock } from "./ports.js";
export { lockPoint, lockSlope, rollGlobalPoint } from "./checkpoint.js";
export { decayedBias } from "./queries.js";
export type { LockId, LockRef, LockedBalance, Point, PoolConfig, PoolId, UserId } from "./types.js";
export { VotesError, isVotesError } from "../errors.js";
export type { VotesErrorKind } from "../errors.js";
export { SCALE, WEEK, MAX_ROLL_STEPS, epochAlign } from "../utils/fixed-point.js";
