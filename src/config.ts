export const config = {
  admins: (process.env.VOTES_ADMINS ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0),
  logLevel: process.env.VOTES_LOG_LEVEL ?? "info",
  poolsFile: process.env.VOTES_POOLS_FILE,
};
