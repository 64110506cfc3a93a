import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { fromFixedPoint, formatTimestamp } from "../utils/formatting.js";

export const checkpointPoolSchema = z.object({
  pool_id: z.string().min(1).describe("Pool to roll forward"),
});

export async function checkpointPool(args: z.infer<typeof checkpointPoolSchema>) {
  const engine = getEngine();
  const point = engine.checkpoint(args.pool_id);
  const caughtUp = point.lastUpdate === engine.now();
  return {
    content: [
      {
        type: "text" as const,
        text: [
          `**Pool \`${args.pool_id}\` checkpointed**`,
          `- **Total voting power:** ${fromFixedPoint(point.bias)}`,
          `- **Decay per second:** ${fromFixedPoint(point.slope)}`,
          `- **Rolled to:** ${formatTimestamp(point.lastUpdate)}`,
          ...(caughtUp ? [] : [`- **Behind:** run checkpoint_pool again to catch up`]),
        ].join("\n"),
      },
    ],
  };
}
