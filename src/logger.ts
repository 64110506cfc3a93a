import winston from "winston";
import { config } from "./config.js";

// stdout carries the MCP protocol, so every level goes to stderr.
export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  defaultMeta: { service: "decay-votes" },
  transports: [
    new winston.transports.Console({
      stderrLevels: Object.keys(winston.config.npm.levels),
    }),
  ],
});
