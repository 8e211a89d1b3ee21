export * from "./patch-id.js";
export * from "./patch-locator.js";
export * from "./resolve-locator.js";
