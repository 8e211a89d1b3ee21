/**
 * Commit model and the commit lookup interface consumed by revision resolution.
 */

import type { ObjectId } from "../../common/id/object-id.js";

/**
 * Person identity (author, committer)
 *
 * Following git's "Name <email> timestamp timezone" layout.
 */
export interface PersonIdent {
  /** Display name */
  name: string;
  /** Email address */
  email: string;
  /** Unix timestamp in seconds */
  timestamp: number;
  /** Timezone offset string: "+HHMM" or "-HHMM" */
  tzOffset: string;
}

/**
 * Commit object
 *
 * - tree: id of the root tree
 * - parents: parent commit ids (empty for a root commit)
 * - author / committer identities
 * - message: commit message (UTF-8)
 */
export interface Commit {
  tree: ObjectId;
  parents: ObjectId[];
  author: PersonIdent;
  committer: PersonIdent;
  message: string;
}

/**
 * Read access to commits.
 *
 * Implementations may perform I/O; every method is asynchronous.
 */
export interface Commits {
  /**
   * Load a commit object.
   *
   * @throws UnknownCommitError if no commit has this id
   */
  loadCommit(id: ObjectId): Promise<Commit>;

  /**
   * Check if a commit exists
   */
  has(id: ObjectId): Promise<boolean>;

  /**
   * Get parent commit ids (empty for root commits).
   */
  getParents(id: ObjectId): Promise<ObjectId[]>;

  /**
   * List the ids of all stored commits starting with a hex prefix.
   */
  findByPrefix(prefix: string): Promise<ObjectId[]>;
}

/**
 * First line of a commit message.
 */
export function getCommitSubject(commit: Commit): string {
  const newline = commit.message.indexOf("\n");
  return newline === -1 ? commit.message : commit.message.slice(0, newline);
}
