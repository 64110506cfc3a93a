import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { fromFixedPoint, formatTimestamp, toFixedPoint } from "../utils/formatting.js";
import { amountSchema, callerSchema, lockIdSchema, timestampSchema } from "../utils/schemas.js";

export const extendLockSchema = z.object({
  caller: callerSchema,
  user: z.string().min(1).describe("Owner of the lock"),
  pool_id: z.string().min(1).describe("Pool the lock belongs to"),
  lock_id: lockIdSchema,
  balance: amountSchema.describe("Balance currently locked"),
  old_unlock_time: timestampSchema.describe("Current unlock time"),
  new_unlock_time: timestampSchema.describe("New week-aligned unlock time, not earlier than the current one"),
});

export async function extendLock(args: z.infer<typeof extendLockSchema>) {
  const newUnlockTime = BigInt(args.new_unlock_time);
  const point = getEngine().noteLockExtension(
    args.caller,
    args.user,
    args.pool_id,
    BigInt(args.lock_id),
    toFixedPoint(args.balance),
    BigInt(args.old_unlock_time),
    newUnlockTime,
  );
  return {
    content: [
      {
        type: "text" as const,
        text: [
          `**Lock ${args.lock_id} extended**`,
          `- **Unlocks:** ${formatTimestamp(newUnlockTime)}`,
          `- **Voting power:** ${fromFixedPoint(point.bias)}`,
        ].join("\n"),
      },
    ],
  };
}
