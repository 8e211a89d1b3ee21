export * from "./patch-range.js";
export * from "./resolve-range.js";
