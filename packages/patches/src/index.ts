// Errors
export * from "./errors/index.js";
// Patch names and offsets
export * from "./name/patch-name.js";
export * from "./offset/patch-offsets.js";
// Stack model and location constraints
export * from "./stack/index.js";
// Locators
export * from "./locator/index.js";
// Ranges
export * from "./range/index.js";
// Revision specs
export * from "./revspec/index.js";
