export * from "./unit-of-work.js";
export * from "./keyed-store.js";
