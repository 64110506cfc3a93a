#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { getEngine } from "./clients/engine.js";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { configurePoolSchema, configurePool } from "./tools/configure-pool.js";
import { createLockSchema, createLock } from "./tools/create-lock.js";
import { changeLockBalanceSchema, changeLockBalance } from "./tools/change-lock-balance.js";
import { extendLockSchema, extendLock } from "./tools/extend-lock.js";
import { checkpointPoolSchema, checkpointPool } from "./tools/checkpoint-pool.js";
import { getVotingPowerSchema, getVotingPower } from "./tools/get-voting-power.js";
import { getGlobalVotingPowerSchema, getGlobalVotingPower } from "./tools/get-global-voting-power.js";
import { getVotingPowerShareSchema, getVotingPowerShare } from "./tools/get-voting-power-share.js";
import { getPoolInfoSchema, getPoolInfo } from "./tools/get-pool-info.js";
import { getLockPointSchema, getLockPoint } from "./tools/get-lock-point.js";
import { getEpochTimeSchema, getEpochTime } from "./tools/get-epoch-time.js";

const server = new McpServer({
  name: "decay-votes",
  version: "0.1.0",
});

// -- Pool tools --

server.tool(
  "configure_pool",
  "Configure a pool's weight multiplier and maximum lock duration. One-time; requires an admin caller",
  configurePoolSchema.shape,
  configurePool,
);

server.tool(
  "get_pool_info",
  "Get a pool's configuration, total voting power and last checkpoint time",
  getPoolInfoSchema.shape,
  getPoolInfo,
);

server.tool(
  "checkpoint_pool",
  "Roll a pool's aggregate voting power forward to now, applying scheduled slope changes",
  checkpointPoolSchema.shape,
  checkpointPool,
);

// -- Lock tools --

server.tool(
  "create_lock",
  "Record a new time-locked balance and return its lock id. Requires an admin caller",
  createLockSchema.shape,
  createLock,
);

server.tool(
  "change_lock_balance",
  "Record a deposit or withdrawal on an existing lock. Requires an admin caller",
  changeLockBalanceSchema.shape,
  changeLockBalance,
);

server.tool(
  "extend_lock",
  "Move a lock's unlock time later. Requires an admin caller",
  extendLockSchema.shape,
  extendLock,
);

// -- Query tools --

server.tool(
  "get_voting_power",
  "Get the decayed voting power of a lock, now or at a past timestamp",
  getVotingPowerSchema.shape,
  getVotingPower,
);

server.tool(
  "get_global_voting_power",
  "Get the total voting power of a pool, now or at a past timestamp",
  getGlobalVotingPowerSchema.shape,
  getGlobalVotingPower,
);

server.tool(
  "get_voting_power_share",
  "Get each lock's share of its pool's total voting power",
  getVotingPowerShareSchema.shape,
  getVotingPowerShare,
);

server.tool(
  "get_lock_point",
  "Get the raw stored point (bias, slope, period, last update) of a lock",
  getLockPointSchema.shape,
  getLockPoint,
);

server.tool(
  "get_epoch_time",
  "Align a timestamp (default now) to the start of its week-long epoch",
  getEpochTimeSchema.shape,
  getEpochTime,
);

// -- Start server --

async function main() {
  getEngine();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("decay-votes server started", { admins: config.admins.length });
}

main().catch((err) => {
  logger.error("Fatal", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
