import { readFileSync } from "node:fs";
import { z } from "zod";
import { planPoolConfig } from "./engine/pool-registry.js";
import type { VotesStore } from "./engine/store.js";
import { toFixedPoint } from "./utils/formatting.js";

export const poolSeedFileSchema = z.object({
  pools: z.array(
    z.object({
      id: z.string().min(1),
      multiplier: z.string().regex(/^\d+(\.\d+)?$/, "multiplier must be a decimal string"),
      maxLockDurationSecs: z.number().int().positive(),
    }),
  ),
});

export type PoolSeedFile = z.infer<typeof poolSeedFileSchema>;

export function loadPoolSeeds(path: string): PoolSeedFile {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return poolSeedFileSchema.parse(raw);
}

/** Configure every seeded pool directly in the store; host configuration needs no caller. */
export function seedPools(store: VotesStore, seeds: PoolSeedFile): string[] {
  const configured: string[] = [];
  for (const seed of seeds.pools) {
    const config = planPoolConfig(
      store,
      seed.id,
      toFixedPoint(seed.multiplier),
      BigInt(seed.maxLockDurationSecs),
    );
    store.commit({ poolConfig: { poolId: seed.id, config } });
    configured.push(seed.id);
  }
  return configured;
}
