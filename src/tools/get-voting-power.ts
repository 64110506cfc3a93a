import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { fromFixedPoint } from "../utils/formatting.js";
import { lockIdSchema, timestampSchema } from "../utils/schemas.js";

export const getVotingPowerSchema = z.object({
  user: z.string().min(1).describe("Owner of the lock"),
  lock_id: lockIdSchema,
  timestamp: timestampSchema.optional().describe("Optional: past timestamp to read historical power at"),
});

export async function getVotingPower(args: z.infer<typeof getVotingPowerSchema>) {
  const engine = getEngine();
  const lockId = BigInt(args.lock_id);
  const power = args.timestamp == null
    ? engine.getVotingPower(args.user, lockId)
    : engine.getVotingPowerAt(args.user, lockId, BigInt(args.timestamp));
  const when = args.timestamp == null ? "now" : `at ${args.timestamp}`;
  return {
    content: [
      {
        type: "text" as const,
        text: `Voting power of lock ${args.lock_id} (\`${args.user}\`) ${when}: **${fromFixedPoint(power)}**`,
      },
    ],
  };
}
