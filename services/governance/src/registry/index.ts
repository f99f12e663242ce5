export * from "./types.js";
export * from "./dao-registry.js";
