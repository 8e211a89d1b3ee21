/**
 * Minimal git revision interpreter.
 *
 * Understands a start point (ref name, full object id or unique abbreviation)
 * followed by any chain of `~[N]` and `^[N]` selectors. Everything else git
 * accepts (`@{N}`, `^{type}`, `:path`, ...) is reported as unsupported.
 */

import { isObjectId, isObjectIdPrefix, type ObjectId } from "../common/id/object-id.js";
import type { Commits } from "../history/commits/commits.js";
import { R_HEADS, R_TAGS } from "../refs/ref-name.js";
import type { Refs } from "../refs/refs.js";
import {
  AmbiguousCommitPrefixError,
  MissingParentError,
  UnknownCommitError,
  UnsupportedRevisionError,
} from "./revision-errors.js";

/**
 * Resolves git revision text to commit ids.
 */
export interface RevisionEngine {
  /**
   * Resolve a complete revision such as `main~2` or `1a2b3c^2`.
   */
  resolveRevision(revision: string): Promise<ObjectId>;

  /**
   * Apply a revision suffix such as `~^2` to an already resolved commit.
   * An empty suffix returns `start` unchanged.
   */
  applySuffix(start: ObjectId, suffix: string): Promise<ObjectId>;
}

export interface RevisionEngineOptions {
  commits: Commits;
  /** Ref lookup; without it only object ids and abbreviations resolve */
  refs?: Refs;
  /** Shortest abbreviated object id accepted */
  minPrefixLength?: number;
}

/** A single parent selector */
interface ParentStep {
  type: "~" | "^";
  count: number;
}

const SUFFIX = /^(?:[~^]\d*)*$/;
const STEP = /([~^])(\d*)/g;

function parseSuffix(suffix: string): ParentStep[] {
  if (!SUFFIX.test(suffix)) {
    throw new UnsupportedRevisionError(suffix);
  }
  const steps: ParentStep[] = [];
  for (const m of suffix.matchAll(STEP)) {
    const type = m[1] === "^" ? "^" : "~";
    const digits = m[2] ?? "";
    steps.push({ type, count: digits.length > 0 ? Number.parseInt(digits, 10) : 1 });
  }
  return steps;
}

export function createRevisionEngine(options: RevisionEngineOptions): RevisionEngine {
  const { commits, refs } = options;
  const minPrefixLength = options.minPrefixLength;

  async function resolveStart(name: string): Promise<ObjectId> {
    if (refs) {
      for (const candidate of [name, `${R_HEADS}${name}`, `${R_TAGS}${name}`]) {
        const ref = await refs.resolve(candidate);
        if (ref) return ref.objectId;
      }
    }

    if (isObjectId(name) && (await commits.has(name))) {
      return name;
    }

    if (isObjectIdPrefix(name, minPrefixLength)) {
      const matches = await commits.findByPrefix(name);
      if (matches.length > 1) {
        throw new AmbiguousCommitPrefixError(name, matches);
      }
      const [match] = matches;
      if (match !== undefined) return match;
    }

    throw new UnknownCommitError(name);
  }

  async function applySuffix(start: ObjectId, suffix: string): Promise<ObjectId> {
    let commitId = start;
    for (const step of parseSuffix(suffix)) {
      if (step.type === "~") {
        // ~N follows the first parent N times
        for (let i = 0; i < step.count; i++) {
          const [first] = await commits.getParents(commitId);
          if (first === undefined) {
            throw new MissingParentError(commitId, 1);
          }
          commitId = first;
        }
      } else if (step.count > 0) {
        // ^N selects the N'th parent, ^0 is the commit itself
        const parents = await commits.getParents(commitId);
        const parent = parents[step.count - 1];
        if (parent === undefined) {
          throw new MissingParentError(commitId, step.count);
        }
        commitId = parent;
      }
    }
    return commitId;
  }

  return {
    async resolveRevision(revision: string): Promise<ObjectId> {
      const cut = revision.search(/[~^]/);
      const name = cut === -1 ? revision : revision.slice(0, cut);
      const suffix = cut === -1 ? "" : revision.slice(cut);
      if (name.length === 0) {
        throw new UnknownCommitError(revision);
      }
      if (name.includes(":") || name.includes("@{")) {
        throw new UnsupportedRevisionError(revision);
      }
      const start = await resolveStart(name);
      return applySuffix(start, suffix);
    },
    applySuffix,
  };
}
