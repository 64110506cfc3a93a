import { z } from "zod";
import { getEngine } from "../clients/engine.js";
import { lockIdSchema } from "../utils/schemas.js";

export const getLockPointSchema = z.object({
  user: z.string().min(1).describe("Owner of the lock"),
  lock_id: lockIdSchema,
});

export async function getLockPoint(args: z.infer<typeof getLockPointSchema>) {
  const point = getEngine().getUserPoint(args.user, BigInt(args.lock_id));
  if (!point) {
    return {
      content: [{ type: "text" as const, text: `No lock ${args.lock_id} for \`${args.user}\`.` }],
    };
  }

  const raw = {
    bias: point.bias.toString(),
    slope: point.slope.toString(),
    period: point.period.toString(),
    last_update: point.lastUpdate.toString(),
  };
  return {
    content: [{ type: "text" as const, text: JSON.stringify(raw, null, 2) }],
  };
}
