/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";
import { VOTING } from "../constants/index.js";

// ============================================
// SCHEMA VERSIONING
// ============================================

export const CURRENT_SCHEMA_VERSION = "1.0.0";

export const schemaVersionSchema = z.string().regex(
  /^\d+\.\d+\.\d+$/,
  "Schema version must be in semver format (e.g., 1.0.0)"
);

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/**
 * Opaque account handle. Organizations, proposals, voters and funders
 * are all identified this way (e.g. `SP2J6ZY48GV1EZ5V2V5RB9MP66SW86PYKKNRV9EJ7.dao`).
 */
export const accountIdSchema = z
  .string()
  .min(1, "Account id must not be empty")
  .max(150, "Account id is too long")
  .regex(/^[A-Za-z0-9][A-Za-z0-9._:-]*$/, "Invalid account id");

export type AccountId = z.infer<typeof accountIdSchema>;

/** Logical clock value (epoch counter) */
export const epochSchema = z.number().int().nonnegative();

/** Non-negative integer amount in base units */
export const amountSchema = z.bigint().nonnegative();

/** Strictly positive integer amount in base units */
export const positiveAmountSchema = z.bigint().positive();

/** Whole-number percentage, 0-100 inclusive */
export const percentageSchema = z.number().int().min(0).max(VOTING.maxApprovalPercentage);

/** Alternate asset identifier (fungible token contract) */
export const assetIdSchema = accountIdSchema;

export const uuidSchema = z.string().uuid();

// ============================================
// WINDOWS
// ============================================

/**
 * Half-open logical-time window [start, end)
 */
export const epochWindowSchema = z
  .object({
    start: epochSchema,
    end: epochSchema,
  })
  .refine((window) => window.end >= window.start, {
    message: "Window end must not precede its start",
    path: ["end"],
  });

export type EpochWindow = z.infer<typeof epochWindowSchema>;
