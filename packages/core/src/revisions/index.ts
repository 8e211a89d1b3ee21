export * from "./revision-engine.js";
export * from "./revision-errors.js";
