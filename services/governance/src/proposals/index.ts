export * from "./types.js";
export * from "./proposal-lifecycle.js";
