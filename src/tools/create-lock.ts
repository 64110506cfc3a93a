import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { fromFixedPoint, formatTimestamp, toFixedPoint } from "../utils/formatting.js";
import { amountSchema, callerSchema, timestampSchema } from "../utils/schemas.js";

export const createLockSchema = z.object({
  caller: callerSchema,
  user: z.string().min(1).describe("Owner of the lock"),
  pool_id: z.string().min(1).describe("Pool the lock is created in"),
  balance: amountSchema,
  unlock_time: timestampSchema.describe("Week-aligned unlock time (unix seconds)"),
});

export async function createLock(args: z.infer<typeof createLockSchema>) {
  const engine = getEngine();
  const unlockTime = BigInt(args.unlock_time);
  const lockId = engine.noteLockCreation(
    args.caller,
    args.user,
    args.pool_id,
    toFixedPoint(args.balance),
    unlockTime,
  );
  const power = engine.getVotingPower(args.user, lockId);
  return {
    content: [
      {
        type: "text" as const,
        text: [
          `**Lock created**`,
          `- **Lock ID:** ${lockId}`,
          `- **Owner:** \`${args.user}\``,
          `- **Pool:** \`${args.pool_id}\``,
          `- **Unlocks:** ${formatTimestamp(unlockTime)}`,
          `- **Voting power:** ${fromFixedPoint(power)}`,
        ].join("\n"),
      },
    ],
  };
}
