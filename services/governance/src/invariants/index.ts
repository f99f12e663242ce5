export * from "./invariant-checker.js";
