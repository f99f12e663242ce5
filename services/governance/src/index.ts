/**
 * @civitas/governance
 * Proposal lifecycle, voting power ledger and funding escrow
 */

export * from "./errors.js";
export * from "./clock.js";
export * from "./config.js";
export * from "./store/index.js";
export * from "./assets/index.js";
export * from "./audit/index.js";
export * from "./power/index.js";
export * from "./funding/index.js";
export * from "./proposals/index.js";
export * from "./registry/index.js";
export * from "./invariants/index.js";
export * from "./governance-service.js";
