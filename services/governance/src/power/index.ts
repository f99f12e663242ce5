export * from "./types.js";
export * from "./power-ledger.js";
