import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { formatShare } from "../utils/formatting.js";
import { lockIdSchema } from "../utils/schemas.js";

export const getVotingPowerShareSchema = z.object({
  pool_id: z.string().min(1).describe("Pool identifier"),
  locks: z
    .array(z.object({ user: z.string().min(1), lock_id: lockIdSchema }))
    .min(1)
    .describe("Locks to compute the share of pool voting power for"),
});

export async function getVotingPowerShare(args: z.infer<typeof getVotingPowerShareSchema>) {
  const shares = getEngine().getVotingPowerShares(
    args.locks.map((l) => ({ user: l.user, lockId: BigInt(l.lock_id) })),
    args.pool_id,
  );
  return {
    content: [
      {
        type: "text" as const,
        text: [
          `**Share of pool \`${args.pool_id}\` voting power**`,
          ...args.locks.map((l, i) => `- Lock ${l.lock_id} (\`${l.user}\`): ${formatShare(shares[i])}`),
        ].join("\n"),
      },
    ],
  };
}
