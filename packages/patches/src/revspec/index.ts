export * from "./branch-locator.js";
export * from "./memory-branch-registry.js";
export * from "./revision-resolver.js";
export * from "./revision-spec.js";
