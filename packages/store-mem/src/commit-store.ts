/**
 * In-memory Commits implementation
 *
 * Pure in-memory commit storage for testing and ephemeral operations.
 * Commits are kept as JavaScript objects; ids are derived from their content.
 */

import {
  type Commit,
  type Commits,
  GitFormat,
  type ObjectId,
  UnknownCommitError,
} from "@patchstack/core";

/** FNV offset bases used to fill the 40-character id */
const SEEDS = [2166136261, 84696351, 3735928559, 1540483477, 2654435761];

/**
 * Deterministic 40-hex-digit id for a commit (FNV-1a, one lane per seed).
 */
function computeCommitHash(commit: Commit): ObjectId {
  const content = JSON.stringify({
    tree: commit.tree,
    parents: commit.parents,
    author: commit.author,
    committer: commit.committer,
    message: commit.message,
  });

  let hex = "";
  for (const seed of SEEDS) {
    let hash = seed;
    for (let i = 0; i < content.length; i++) {
      hash ^= content.charCodeAt(i);
      hash = Math.imul(hash, 16777619);
    }
    hex += (hash >>> 0).toString(16).padStart(8, "0");
  }
  return hex.slice(0, GitFormat.OBJECT_ID_STRING_LENGTH);
}

function copyCommit(commit: Commit): Commit {
  return {
    tree: commit.tree,
    parents: [...commit.parents],
    author: { ...commit.author },
    committer: { ...commit.committer },
    message: commit.message,
  };
}

/**
 * In-memory Commits implementation.
 */
export class MemoryCommitStore implements Commits {
  private commits = new Map<ObjectId, Commit>();

  /**
   * Store a commit object and return its id.
   */
  async storeCommit(commit: Commit): Promise<ObjectId> {
    const id = computeCommitHash(commit);

    // Store a copy to prevent external mutation
    if (!this.commits.has(id)) {
      this.commits.set(id, copyCommit(commit));
    }

    return id;
  }

  async loadCommit(id: ObjectId): Promise<Commit> {
    const commit = this.commits.get(id);
    if (!commit) {
      throw new UnknownCommitError(id, `Commit ${id} not found`);
    }
    return copyCommit(commit);
  }

  async has(id: ObjectId): Promise<boolean> {
    return this.commits.has(id);
  }

  async getParents(id: ObjectId): Promise<ObjectId[]> {
    const commit = await this.loadCommit(id);
    return commit.parents;
  }

  async findByPrefix(prefix: string): Promise<ObjectId[]> {
    const matches: ObjectId[] = [];
    for (const id of this.commits.keys()) {
      if (id.startsWith(prefix)) {
        matches.push(id);
      }
    }
    return matches;
  }
}
