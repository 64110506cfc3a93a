import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { InMemoryVotesStore } from "../engine/store.js";
import { loadPoolSeeds, seedPools } from "../pools.js";
import { SCALE } from "../utils/fixed-point.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("loadPoolSeeds", () => {
  it("parses a pool file", () => {
    const seeds = loadPoolSeeds(fixture("pools.json"));
    expect(seeds.pools.map((p) => p.id)).toEqual(["core", "boosted"]);
  });

  it("rejects an invalid pool file", () => {
    expect(() => loadPoolSeeds(fixture("pools-invalid.json"))).toThrow("multiplier must be a decimal string");
  });
});

describe("seedPools", () => {
  it("configures every pool in the store", () => {
    const store = new InMemoryVotesStore();
    const configured = seedPools(store, loadPoolSeeds(fixture("pools.json")));

    expect(configured).toEqual(["core", "boosted"]);
    expect(store.getPoolConfig("boosted")).toEqual({ multiplier: 25n * SCALE / 10n, maxLockDuration: 2_419_200n });
  });

  it("refuses to configure a pool twice", () => {
    const store = new InMemoryVotesStore();
    const seeds = loadPoolSeeds(fixture("pools.json"));
    seedPools(store, seeds);
    expect(() => seedPools(store, seeds)).toThrow("AlreadyConfigured");
  });
});
