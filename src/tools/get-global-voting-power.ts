import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { fromFixedPoint } from "../utils/formatting.js";
import { timestampSchema } from "../utils/schemas.js";

export const getGlobalVotingPowerSchema = z.object({
  pool_id: z.string().min(1).describe("Pool identifier"),
  timestamp: timestampSchema.optional().describe("Optional: past timestamp to read historical power at"),
});

export async function getGlobalVotingPower(args: z.infer<typeof getGlobalVotingPowerSchema>) {
  const engine = getEngine();
  const power = args.timestamp == null
    ? engine.getGlobalVotingPower(args.pool_id)
    : engine.getGlobalVotingPowerAt(args.pool_id, BigInt(args.timestamp));
  const when = args.timestamp == null ? "now" : `at ${args.timestamp}`;
  return {
    content: [
      {
        type: "text" as const,
        text: `Total voting power of pool \`${args.pool_id}\` ${when}: **${fromFixedPoint(power)}**`,
      },
    ],
  };
}
