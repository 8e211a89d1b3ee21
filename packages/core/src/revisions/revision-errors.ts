import type { ObjectId } from "../common/id/object-id.js";

/**
 * Base class for failures while turning revision text into a commit.
 */
export class RevisionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RevisionError";
  }
}

/**
 * Thrown when a revision does not name any known commit.
 */
export class UnknownCommitError extends RevisionError {
  readonly revision: string;

  constructor(revision: string, message?: string) {
    super(message ?? `Unknown revision: ${revision}`);
    this.name = "UnknownCommitError";
    this.revision = revision;
  }
}

/**
 * Thrown when an abbreviated object id matches more than one commit.
 */
export class AmbiguousCommitPrefixError extends RevisionError {
  readonly prefix: string;
  readonly matches: ObjectId[];

  constructor(prefix: string, matches: ObjectId[], message?: string) {
    super(message ?? `Ambiguous commit prefix '${prefix}' matches ${matches.length} commits`);
    this.name = "AmbiguousCommitPrefixError";
    this.prefix = prefix;
    this.matches = matches;
  }
}

/**
 * Thrown when a parent selected by `~N` or `^N` does not exist.
 */
export class MissingParentError extends RevisionError {
  readonly commitId: ObjectId;
  readonly parent: number;

  constructor(commitId: ObjectId, parent: number, message?: string) {
    super(message ?? `Commit ${commitId} has no parent ${parent}`);
    this.name = "MissingParentError";
    this.commitId = commitId;
    this.parent = parent;
  }
}

/**
 * Thrown for revision syntax this engine does not interpret.
 */
export class UnsupportedRevisionError extends RevisionError {
  readonly revision: string;

  constructor(revision: string, message?: string) {
    super(message ?? `Unsupported revision syntax: ${revision}`);
    this.name = "UnsupportedRevisionError";
    this.revision = revision;
  }
}
