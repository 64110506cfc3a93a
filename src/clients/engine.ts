import { config } from "../config.js";
import { logger } from "../logger.js";
import { AllowListAccessControl } from "../engine/ports.js";
import { InMemoryVotesStore } from "../engine/store.js";
import { VotesEngine } from "../engine/votes-engine.js";
import { loadPoolSeeds, seedPools } from "../pools.js";

let instance: VotesEngine | undefined;

export function createEngine(): VotesEngine {
  const store = new InMemoryVotesStore();
  if (config.poolsFile) {
    const seeded = seedPools(store, loadPoolSeeds(config.poolsFile));
    logger.info("pools configured from file", { file: config.poolsFile, pools: seeded });
  }
  return new VotesEngine({
    access: new AllowListAccessControl(config.admins),
    store,
    logger,
  });
}

/** Engine shared by every tool handler. */
export function getEngine(): VotesEngine {
  instance ??= createEngine();
  return instance;
}

export function setEngine(engine: VotesEngine): void {
  instance = engine;
}
