import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { fromFixedPoint, formatTimestamp } from "../utils/formatting.js";

export const getPoolInfoSchema = z.object({
  pool_id: z.string().min(1).describe("Pool identifier"),
});

export async function getPoolInfo(args: z.infer<typeof getPoolInfoSchema>) {
  const engine = getEngine();
  if (!engine.isOpenPool(args.pool_id)) {
    return {
      content: [{ type: "text" as const, text: `Pool \`${args.pool_id}\` is not configured.` }],
    };
  }

  const point = engine.getGlobalPoint(args.pool_id);
  return {
    content: [
      {
        type: "text" as const,
        text: [
          `**Pool \`${args.pool_id}\`**`,
          `- **Multiplier:** ${fromFixedPoint(engine.getMultiplier(args.pool_id))}x`,
          `- **Max lock duration:** ${engine.getMaximumLockTime(args.pool_id).toLocaleString()} seconds`,
          `- **Total voting power:** ${fromFixedPoint(engine.getGlobalVotingPower(args.pool_id))}`,
          `- **Last checkpoint:** ${point ? formatTimestamp(point.lastUpdate) : "never"}`,
        ].join("\n"),
      },
    ],
  };
}
