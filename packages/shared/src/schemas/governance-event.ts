/**
 * GovernanceEvent Schema
 * Append-only audit stream emitted after every committed action
 *
 * @version 1.0.0
 * @backward-compatibility
 * - v1.0.0: Initial schema
 */

import { z } from "zod";
import {
  accountIdSchema,
  epochSchema,
  schemaVersionSchema,
  uuidSchema,
  CURRENT_SCHEMA_VERSION,
} from "./common.js";

export const governanceEventKindSchema = z.enum([
  // Registry
  "dao_created",
  "dao_deactivated",

  // Proposal lifecycle
  "proposal_registered",
  "proposal_activated",
  "vote_cast",
  "proposal_finalized",
  "proposal_executed",
  "proposal_canceled",

  // Power ledger
  "power_updated",
  "delegation_created",
  "delegation_revoked",
  "delegation_expired",

  // Funding escrow
  "funding_initialized",
  "contribution_received",
  "funds_withdrawn",
  "contribution_refunded",
]);

export type GovernanceEventKind = z.infer<typeof governanceEventKindSchema>;

/**
 * Changed fields are plain JSON values; amounts travel as decimal strings.
 */
export const eventValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

export type EventValue = z.infer<typeof eventValueSchema>;

export const governanceEventSchema = z.object({
  schemaVersion: schemaVersionSchema.default(CURRENT_SCHEMA_VERSION),
  id: uuidSchema,
  sequence: z.number().int().positive(),
  kind: governanceEventKindSchema,
  actor: accountIdSchema,
  epoch: epochSchema,
  subject: z.record(z.string()),
  changes: z.record(eventValueSchema),
});

export type GovernanceEvent = z.infer<typeof governanceEventSchema>;
