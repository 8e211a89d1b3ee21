/**
 * Read-only view of one patch stack at one point in time.
 */

import type { ObjectId } from "@patchstack/core";
import { InvalidStackError, UnknownPatchError } from "../errors/index.js";
import { PatchName } from "../name/patch-name.js";
import type { LocationGroup } from "./location-group.js";

export interface StackSnapshotInit {
  /** Branch the stack belongs to */
  branch: string;
  applied?: readonly (PatchName | string)[];
  unapplied?: readonly (PatchName | string)[];
  hidden?: readonly (PatchName | string)[];
  /** Commit directly below the first applied patch */
  base: ObjectId;
  /** Commit of every patch in the stack, by patch name */
  patchCommits: ReadonlyMap<string, ObjectId> | Readonly<Record<string, ObjectId>>;
  /**
   * Branch head; must be the commit of the last applied patch, or the base
   * when nothing is applied. Derived when omitted.
   */
  top?: ObjectId;
}

/**
 * Immutable snapshot of a stack.
 *
 * Index 0 is the first applied patch; indices continue through the
 * unapplied and then the hidden patches. Index -1 denotes the base.
 */
export interface StackSnapshot {
  readonly branch: string;
  readonly applied: readonly PatchName[];
  readonly unapplied: readonly PatchName[];
  readonly hidden: readonly PatchName[];
  readonly base: ObjectId;
  readonly top: ObjectId;

  /** All patches in stack order */
  all(): readonly PatchName[];
  /** Applied and unapplied patches */
  visible(): readonly PatchName[];
  has(name: PatchName | string): boolean;
  indexOf(name: PatchName | string): number | undefined;
  patchAt(index: number): PatchName | undefined;
  groupAt(index: number): LocationGroup | undefined;
  groupOf(name: PatchName | string): LocationGroup | undefined;
  /**
   * @throws UnknownPatchError
   */
  commitOf(name: PatchName | string): ObjectId;
  patchByCommit(id: ObjectId): PatchName | undefined;
}

function toNames(list: readonly (PatchName | string)[] | undefined): readonly PatchName[] {
  return Object.freeze((list ?? []).map((n) => (typeof n === "string" ? PatchName.make(n) : n)));
}

type PatchCommits = StackSnapshotInit["patchCommits"];

function isMap(commits: PatchCommits): commits is ReadonlyMap<string, ObjectId> {
  return commits instanceof Map;
}

function toCommitMap(commits: PatchCommits): ReadonlyMap<string, ObjectId> {
  return isMap(commits) ? commits : new Map(Object.entries(commits));
}

class PatchStackSnapshot implements StackSnapshot {
  readonly branch: string;
  readonly applied: readonly PatchName[];
  readonly unapplied: readonly PatchName[];
  readonly hidden: readonly PatchName[];
  readonly base: ObjectId;
  readonly top: ObjectId;

  private readonly order: readonly PatchName[];
  private readonly indices = new Map<string, number>();
  private readonly commits = new Map<string, ObjectId>();
  private readonly byCommit = new Map<ObjectId, PatchName>();

  constructor(init: StackSnapshotInit) {
    this.branch = init.branch;
    this.applied = toNames(init.applied);
    this.unapplied = toNames(init.unapplied);
    this.hidden = toNames(init.hidden);
    this.base = init.base;
    this.order = Object.freeze([...this.applied, ...this.unapplied, ...this.hidden]);
    const patchCommits = toCommitMap(init.patchCommits);

    this.order.forEach((patch, index) => {
      const name = patch.toString();
      if (this.indices.has(name)) {
        throw new InvalidStackError(
          `Patch '${name}' appears more than once in stack ${init.branch}`,
        );
      }
      const commitId = patchCommits.get(name);
      if (commitId === undefined) {
        throw new InvalidStackError(`Patch '${name}' has no commit in stack ${init.branch}`);
      }
      this.indices.set(name, index);
      this.commits.set(name, commitId);
      this.byCommit.set(commitId, patch);
    });

    const lastApplied = this.applied.at(-1);
    const expectedTop = lastApplied ? this.commitOf(lastApplied) : this.base;
    if (init.top !== undefined && init.top !== expectedTop) {
      throw new InvalidStackError(
        `Top ${init.top} of stack ${init.branch} does not match its last applied patch`,
      );
    }
    this.top = expectedTop;
    Object.freeze(this);
  }

  all(): readonly PatchName[] {
    return this.order;
  }

  visible(): readonly PatchName[] {
    return this.order.slice(0, this.applied.length + this.unapplied.length);
  }

  has(name: PatchName | string): boolean {
    return this.indices.has(name.toString());
  }

  indexOf(name: PatchName | string): number | undefined {
    return this.indices.get(name.toString());
  }

  patchAt(index: number): PatchName | undefined {
    return index >= 0 ? this.order[index] : undefined;
  }

  groupAt(index: number): LocationGroup | undefined {
    if (index < 0 || index >= this.order.length) return undefined;
    if (index < this.applied.length) return "applied";
    if (index < this.applied.length + this.unapplied.length) return "unapplied";
    return "hidden";
  }

  groupOf(name: PatchName | string): LocationGroup | undefined {
    const index = this.indexOf(name);
    return index === undefined ? undefined : this.groupAt(index);
  }

  commitOf(name: PatchName | string): ObjectId {
    const commitId = this.commits.get(name.toString());
    if (commitId === undefined) {
      throw new UnknownPatchError(name.toString());
    }
    return commitId;
  }

  patchByCommit(id: ObjectId): PatchName | undefined {
    return this.byCommit.get(id);
  }
}

/**
 * Build a snapshot, validating names and their uniqueness.
 *
 * @throws InvalidPatchNameError for a name that breaks the naming rules
 * @throws InvalidStackError for duplicates, patches without commits or a wrong top
 */
export function createStackSnapshot(init: StackSnapshotInit): StackSnapshot {
  return new PatchStackSnapshot(init);
}
