/**
 * Resolution of revision specs to commits.
 *
 * Collaborators are awaited one after another; the resolver never mutates a
 * stack snapshot. A resolver keeps the commits it has loaded, so every result
 * referring to the same commit id shares one `Commit` object. Create one
 * resolver per command invocation.
 */

import type { Commit, Commits, ObjectId, RevisionEngine } from "@patchstack/core";
import { EmptyRangeError, OutOfRangeIndexError, UnknownPatchError } from "../errors/index.js";
import { resolvePosition, type ResolveOptions } from "../locator/resolve-locator.js";
import type { PatchName } from "../name/patch-name.js";
import type { PatchRangeBounds } from "../range/patch-range.js";
import { formatRangeBounds } from "../range/patch-range.js";
import { resolveRangeBounds } from "../range/resolve-range.js";
import { RangeConstraint } from "../stack/location-group.js";
import type { StackSnapshot } from "../stack/stack-snapshot.js";
import type { BranchLocator } from "./branch-locator.js";
import {
  type PatchLikeSpec,
  parseRangeRevisionSpec,
  parseSingleRevisionSpec,
  type RangeRevisionSpec,
  type SingleRevisionSpec,
} from "./revision-spec.js";

/**
 * Supplies the stack of a branch; without a locator, of the current branch.
 */
export interface BranchResolver {
  /**
   * @throws UnknownBranchError
   */
  resolveStack(branch?: BranchLocator): Promise<StackSnapshot>;
}

/**
 * Loads commit objects by id.
 */
export type CommitLookup = Pick<Commits, "loadCommit">;

/**
 * A resolved revision: a commit and, when it is a patch commit, its name.
 */
export interface StGitRevision {
  readonly patchName?: PatchName;
  readonly commitId: ObjectId;
  readonly commit: Commit;
}

/**
 * Resolved boundary revisions of a revision spec.
 */
export type StGitBoundaryRevisions =
  | { readonly kind: "single"; readonly revision: StGitRevision }
  | { readonly kind: "bounds"; readonly begin: StGitRevision; readonly end: StGitRevision };

export interface RevisionResolverOptions {
  branches: BranchResolver;
  commits: CommitLookup;
  /** Interprets git revisions and revision suffixes */
  revisions: RevisionEngine;
  /** Options for locating patches */
  locate?: ResolveOptions;
  /** Constraint for range specs when `resolveRange()` is given none */
  rangeConstraint?: RangeConstraint;
}

const DIGITS = /^\d+$/;

/**
 * A digit-only name that is neither a patch nor an index into the stack;
 * git may still know it as a ref or an abbreviated commit id.
 */
function isNumericNameMiss(spec: PatchLikeSpec, error: unknown): boolean {
  const id = spec.patchLoc.id;
  if (!(error instanceof OutOfRangeIndexError) || id.kind !== "name") return false;
  const name = id.name.toString();
  return DIGITS.test(name) && error.index === Number.parseInt(name, 10);
}

export class RevisionResolver {
  private readonly branches: BranchResolver;
  private readonly commits: CommitLookup;
  private readonly revisions: RevisionEngine;
  private readonly locate: ResolveOptions;
  private readonly rangeConstraint: RangeConstraint;
  private readonly loaded = new Map<ObjectId, Commit>();

  constructor(options: RevisionResolverOptions) {
    this.branches = options.branches;
    this.commits = options.commits;
    this.revisions = options.revisions;
    this.locate = options.locate ?? {};
    this.rangeConstraint = options.rangeConstraint ?? RangeConstraint.ALL;
  }

  /**
   * Resolve a single revision spec (or its text) to one commit.
   */
  async resolveSingle(spec: SingleRevisionSpec | string): Promise<StGitRevision> {
    const parsed = typeof spec === "string" ? parseSingleRevisionSpec(spec) : spec;
    switch (parsed.kind) {
      case "branch": {
        const stack = await this.branches.resolveStack(parsed.branchLoc);
        return this.resolvePatchLike(stack, parsed.patchLike);
      }
      case "patchLike": {
        const stack = await this.branches.resolveStack();
        return this.resolvePatchLike(stack, parsed.patchLike);
      }
      case "patchAndGitLike": {
        const stack = await this.branches.resolveStack();
        try {
          return await this.resolvePatchLike(stack, parsed.patchLike);
        } catch (error) {
          if (error instanceof UnknownPatchError || isNumericNameMiss(parsed.patchLike, error)) {
            return this.resolveGitLike(stack, parsed.gitLike);
          }
          throw error;
        }
      }
      case "gitLike": {
        const stack = await this.branches.resolveStack();
        return this.resolveGitLike(stack, parsed.revision);
      }
    }
  }

  /**
   * Resolve a revision spec that may be a patch range.
   *
   * Ranges resolve to the first and last patch of the range.
   *
   * @throws EmptyRangeError when the range selects no patch
   */
  async resolveRange(
    spec: RangeRevisionSpec | string,
    constraint: RangeConstraint = this.rangeConstraint,
  ): Promise<StGitBoundaryRevisions> {
    const parsed = typeof spec === "string" ? parseRangeRevisionSpec(spec) : spec;
    switch (parsed.kind) {
      case "single":
        return { kind: "single", revision: await this.resolveSingle(parsed.spec) };
      case "range": {
        const stack = await this.branches.resolveStack();
        return this.resolveBounds(stack, parsed.bounds, constraint);
      }
      case "branchRange": {
        const stack = await this.branches.resolveStack(parsed.branchLoc);
        return this.resolveBounds(stack, parsed.bounds, constraint);
      }
    }
  }

  private async resolveBounds(
    stack: StackSnapshot,
    bounds: PatchRangeBounds,
    constraint: RangeConstraint,
  ): Promise<StGitBoundaryRevisions> {
    const names = resolveRangeBounds(stack, bounds, constraint, this.locate);
    const first = names[0];
    const last = names.at(-1);
    if (first === undefined || last === undefined) {
      throw new EmptyRangeError(formatRangeBounds(bounds));
    }
    const begin = await this.patchRevision(stack, first);
    const end = await this.patchRevision(stack, last);
    return { kind: "bounds", begin, end };
  }

  private async resolvePatchLike(
    stack: StackSnapshot,
    spec: PatchLikeSpec,
  ): Promise<StGitRevision> {
    const index = resolvePosition(stack, spec.patchLoc, this.locate);
    const patch = stack.patchAt(index);

    let commitId: ObjectId;
    if (patch) {
      commitId = stack.commitOf(patch);
    } else if (index < -1) {
      // Below the base: first-parent ancestors of the base commit
      commitId = await this.revisions.applySuffix(stack.base, `~${-1 - index}`);
    } else {
      commitId = stack.base;
    }

    if (spec.suffix.length === 0) {
      return this.revision(commitId, patch);
    }
    commitId = await this.revisions.applySuffix(commitId, spec.suffix);
    return this.revision(commitId, stack.patchByCommit(commitId));
  }

  private async resolveGitLike(stack: StackSnapshot, revision: string): Promise<StGitRevision> {
    const commitId = await this.revisions.resolveRevision(revision);
    return this.revision(commitId, stack.patchByCommit(commitId));
  }

  private patchRevision(stack: StackSnapshot, patch: PatchName): Promise<StGitRevision> {
    return this.revision(stack.commitOf(patch), patch);
  }

  private async revision(commitId: ObjectId, patchName?: PatchName): Promise<StGitRevision> {
    const commit = await this.loadCommit(commitId);
    return patchName ? { patchName, commitId, commit } : { commitId, commit };
  }

  private async loadCommit(id: ObjectId): Promise<Commit> {
    const cached = this.loaded.get(id);
    if (cached) return cached;
    const commit = await this.commits.loadCommit(id);
    this.loaded.set(id, commit);
    return commit;
  }
}
