/**
 * In-memory storage implementations
 *
 * For testing and development purposes.
 */

export * from "./commit-store.js";
export * from "./create-memory-storage.js";
export * from "./ref-store.js";
