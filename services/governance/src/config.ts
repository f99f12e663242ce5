/**
 * Governance Service Configuration
 */

import { z } from "zod";
import {
  accountIdSchema,
  envSchema,
  AUDIT_DEFAULTS,
  PROPOSAL_LIMITS,
} from "@civitas/shared";

// ============================================
// GOVERNANCE CONFIG SCHEMA
// ============================================

const governanceConfigSchema = z.object({
  // Account the funding escrow holds contributions in
  escrowAccount: accountIdSchema,

  // Proposal text limits
  maxTitleLength: z.number().int().positive(),
  maxDescriptionLength: z.number().int().positive(),

  // Audit stream
  auditHistorySize: z.number().int().positive(),

  // Run the invariant checker after every service action
  enforceInvariants: z.boolean(),
});

export type GovernanceConfig = z.infer<typeof governanceConfigSchema>;

export const DEFAULT_GOVERNANCE_CONFIG: GovernanceConfig = {
  escrowAccount: "civitas-escrow",
  maxTitleLength: PROPOSAL_LIMITS.maxTitleLength,
  maxDescriptionLength: PROPOSAL_LIMITS.maxDescriptionLength,
  auditHistorySize: AUDIT_DEFAULTS.historySize,
  enforceInvariants: true,
};

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadGovernanceConfig(
  source: Record<string, string | undefined> = process.env
): GovernanceConfig {
  const env = envSchema.parse(source);

  const config: GovernanceConfig = {
    escrowAccount: env.GOVERNANCE_ESCROW_ACCOUNT,
    maxTitleLength: env.GOVERNANCE_MAX_TITLE_LENGTH,
    maxDescriptionLength: env.GOVERNANCE_MAX_DESCRIPTION_LENGTH,
    auditHistorySize: env.GOVERNANCE_AUDIT_HISTORY_SIZE,
    enforceInvariants: env.GOVERNANCE_ENFORCE_INVARIANTS,
  };

  return governanceConfigSchema.parse(config);
}

export function createGovernanceConfig(
  overrides: Partial<GovernanceConfig> = {}
): GovernanceConfig {
  return governanceConfigSchema.parse({ ...DEFAULT_GOVERNANCE_CONFIG, ...overrides });
}
