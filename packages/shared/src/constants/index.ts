/**
 * Civitas Constants
 */

// ============================================
// PROPOSAL LIMITS
// ============================================
export const PROPOSAL_LIMITS = {
  maxTitleLength: 256,
  maxDescriptionLength: 4096,
} as const;

// ============================================
// VOTING
// ============================================
export const VOTING = {
  // Approval is computed as floor(yes * 100 / (yes + no))
  percentScale: 100n,
  maxApprovalPercentage: 100,
} as const;

// ============================================
// AUDIT STREAM
// ============================================
export const AUDIT_DEFAULTS = {
  historySize: 1000,
} as const;

// ============================================
// ASSETS
// ============================================

/** Asset key used for native-currency balances in asset providers */
export const NATIVE_ASSET = "native";
