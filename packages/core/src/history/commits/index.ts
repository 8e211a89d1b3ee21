export * from "./commits.js";
