/**
 * Factory function for creating an in-memory repository
 */

import { createRevisionEngine, type RevisionEngine } from "@patchstack/core";
import { MemoryCommitStore } from "./commit-store.js";
import { MemoryRefStore } from "./ref-store.js";

/**
 * Options for creating an in-memory repository
 */
export interface MemoryRepositoryOptions {
  /** Shortest abbreviated object id the revision engine accepts (default: 4) */
  minPrefixLength?: number;
}

export interface MemoryRepository {
  commits: MemoryCommitStore;
  refs: MemoryRefStore;
  /** Revision engine reading from `commits` and `refs` */
  revisions: RevisionEngine;
}

/**
 * Create an in-memory repository: commit store, ref store and a revision
 * engine wired to both.
 */
export function createMemoryRepository(options?: MemoryRepositoryOptions): MemoryRepository {
  const commits = new MemoryCommitStore();
  const refs = new MemoryRefStore();
  const revisions = createRevisionEngine({
    commits,
    refs,
    minPrefixLength: options?.minPrefixLength,
  });
  return { commits, refs, revisions };
}
