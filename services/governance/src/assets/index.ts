export * from "./asset-provider.js";
