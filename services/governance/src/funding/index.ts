export * from "./types.js";
export * from "./funding-escrow.js";
