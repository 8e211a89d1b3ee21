export * from "./locator-errors.js";
export * from "./patch-error.js";
export * from "./range-errors.js";
export * from "./stack-errors.js";
export * from "./syntax-errors.js";
