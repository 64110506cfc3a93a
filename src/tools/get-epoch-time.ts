import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { formatTimestamp } from "../utils/formatting.js";
import { timestampSchema } from "../utils/schemas.js";

export const getEpochTimeSchema = z.object({
  timestamp: timestampSchema.optional().describe("Optional: timestamp to align (defaults to now)"),
});

export async function getEpochTime(args: z.infer<typeof getEpochTimeSchema>) {
  const engine = getEngine();
  const epoch = args.timestamp == null ? engine.getEpochTime() : engine.getEpochTime(BigInt(args.timestamp));
  return {
    content: [
      {
        type: "text" as const,
        text: `Epoch start: ${epoch} (${formatTimestamp(epoch)})`,
      },
    ],
  };
}
