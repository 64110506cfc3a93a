export type VotesErrorKind =
  | "Unauthorized"
  | "AlreadyConfigured"
  | "MultiplierTooLow"
  | "InvalidMaxLockDuration"
  | "PoolNotConfigured"
  | "ZeroLock"
  | "NotEpochAligned"
  | "LockTooShort"
  | "LockTooLong"
  | "OnlyExtensions"
  | "NoLockFound"
  | "WrongPool"
  | "LockExpired"
  | "CheckpointRequired"
  | "NonMonotonicClock"
  | "FutureTimestamp"
  | "ValueOutOfRange";

/**
 * Every failure the engine reports. Failures are synchronous and leave state
 * untouched; the caller decides whether to retry with corrected arguments.
 */
export class VotesError extends Error {
  constructor(
    public readonly kind: VotesErrorKind,
    message: string,
  ) {
    super(`${kind}: ${message}`);
    this.name = "VotesError";
  }
}

export function isVotesError(err: unknown, kind?: VotesErrorKind): err is VotesError {
  return err instanceof VotesError && (kind === undefined || err.kind === kind);
}
