import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { fromFixedPoint, toFixedPoint } from "../utils/formatting.js";
import { amountSchema, callerSchema, lockIdSchema, timestampSchema } from "../utils/schemas.js";

export const changeLockBalanceSchema = z.object({
  caller: callerSchema,
  user: z.string().min(1).describe("Owner of the lock"),
  pool_id: z.string().min(1).describe("Pool the lock belongs to"),
  lock_id: lockIdSchema,
  old_balance: amountSchema.describe("Balance locked before the change"),
  new_balance: amountSchema.describe("Balance locked after the change"),
  unlock_time: timestampSchema.describe("Current unlock time of the lock"),
});

export async function changeLockBalance(args: z.infer<typeof changeLockBalanceSchema>) {
  const point = getEngine().noteLockBalanceChange(
    args.caller,
    args.user,
    args.pool_id,
    BigInt(args.lock_id),
    toFixedPoint(args.old_balance),
    toFixedPoint(args.new_balance),
    BigInt(args.unlock_time),
  );
  return {
    content: [
      {
        type: "text" as const,
        text: [
          `**Lock ${args.lock_id} balance updated**`,
          `- **Balance:** ${args.old_balance} → ${args.new_balance}`,
          `- **Voting power:** ${fromFixedPoint(point.bias)}`,
          `- **Decay per second:** ${fromFixedPoint(point.slope)}`,
        ].join("\n"),
      },
    ],
  };
}
