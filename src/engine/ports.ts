import type { UserId } from "./types.js";

/** Source of the current time in unix seconds. Must never go backwards. */
export interface Clock {
  now(): bigint;
}

/** Decides which callers may invoke mutating operations. */
export interface AccessControl {
  isAuthorized(caller: UserId): boolean;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

export class AllowListAccessControl implements AccessControl {
  private readonly allowed: Set<UserId>;

  constructor(callers: Iterable<UserId>) {
    this.allowed = new Set(callers);
  }

  isAuthorized(caller: UserId): boolean {
    return this.allowed.has(caller);
  }
}

/** Test and simulation clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: bigint) {}

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    if (timestamp < this.current) {
      throw new Error(`ManualClock cannot move backwards (${this.current} → ${timestamp})`);
    }
    this.current = timestamp;
  }

  advance(seconds: bigint): void {
    this.set(this.current + seconds);
  }
}
