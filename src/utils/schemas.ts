import { z } from "zod";

export const amountSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "expected a non-negative decimal string")
  .describe("Token amount as a decimal string, e.g. \"250.5\"");

export const timestampSchema = z.number().int().nonnegative().describe("Unix timestamp in seconds");

export const lockIdSchema = z.number().int().positive().describe("Lock id returned by create_lock");

export const callerSchema = z.string().min(1).describe("Caller id checked against the admin allow list");
