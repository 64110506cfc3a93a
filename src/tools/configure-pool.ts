import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { fromFixedPoint, toFixedPoint } from "../utils/formatting.js";
import { callerSchema } from "../utils/schemas.js";

export const configurePoolSchema = z.object({
  caller: callerSchema,
  pool_id: z.string().min(1).describe("Pool identifier"),
  multiplier: z
    .string()
    .regex(/^\d+(\.\d+)?$/)
    .describe("Weight multiplier as a decimal, at least 1 (e.g. \"1.5\")"),
  max_lock_duration_secs: z.number().int().positive().describe("Maximum lock duration in seconds"),
});

export async function configurePool(args: z.infer<typeof configurePoolSchema>) {
  const config = getEngine().configurePool(
    args.caller,
    args.pool_id,
    toFixedPoint(args.multiplier),
    BigInt(args.max_lock_duration_secs),
  );
  return {
    content: [
      {
        type: "text" as const,
        text: [
          `**Pool \`${args.pool_id}\` configured**`,
          `- **Multiplier:** ${fromFixedPoint(config.multiplier)}x`,
          `- **Max lock duration:** ${config.maxLockDuration.toLocaleString()} seconds`,
        ].join("\n"),
      },
    ],
  };
}
