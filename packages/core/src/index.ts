// Object IDs
export * from "./common/id/index.js";
// Commits and person identity
export * from "./history/commits/index.js";
// References
export * from "./refs/index.js";
// Revision text interpretation
export * from "./revisions/index.js";
