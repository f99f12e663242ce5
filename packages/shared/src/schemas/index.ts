/**
 * Civitas Zod Schemas
 * Validation schemas for all data structures
 *
 * @version 1.0.0
 * Schema versioning enables backward compatibility tracking
 */

import { z } from "zod";
import { accountIdSchema } from "./common.js";
import { PROPOSAL_LIMITS, AUDIT_DEFAULTS } from "../constants/index.js";

// ============================================
// RE-EXPORT ALL SCHEMAS
// ============================================

// Common primitives
export * from "./common.js";

// Domain schemas
export * from "./proposal.js";
export * from "./funding.js";
export * from "./dao.js";
export * from "./governance-event.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

const booleanString = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

export const envSchema = z.object({
  // Escrow
  GOVERNANCE_ESCROW_ACCOUNT: accountIdSchema.default("civitas-escrow"),

  // Proposal text limits
  GOVERNANCE_MAX_TITLE_LENGTH: z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .default(String(PROPOSAL_LIMITS.maxTitleLength)),
  GOVERNANCE_MAX_DESCRIPTION_LENGTH: z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .default(String(PROPOSAL_LIMITS.maxDescriptionLength)),

  // Audit stream
  GOVERNANCE_AUDIT_HISTORY_SIZE: z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .default(String(AUDIT_DEFAULTS.historySize)),

  // Post-action invariant enforcement
  GOVERNANCE_ENFORCE_INVARIANTS: booleanString.default("true"),

  // Logging
  LOG_LEVEL: z.enum(["silent", "debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;
