import { shortenRefName } from "@patchstack/core";
import { UnknownBranchError } from "../errors/index.js";
import type { StackSnapshot } from "../stack/stack-snapshot.js";
import { type BranchLocator, formatBranchLocator } from "./branch-locator.js";
import type { BranchResolver } from "./revision-resolver.js";

/**
 * In-memory branch registry: the stack of each branch plus a checkout
 * history, so that `@{-N}` names the N'th branch checked out before the
 * current one.
 *
 * Branches may be given short (`main`) or full (`refs/heads/main`).
 */
export class MemoryBranchRegistry implements BranchResolver {
  private readonly stacks = new Map<string, StackSnapshot>();
  /** Previously checked out branches, most recent first */
  private readonly history: string[] = [];
  private current: string | undefined;

  /**
   * Register the stack of `stack.branch`, replacing an earlier snapshot.
   */
  async setStack(stack: StackSnapshot): Promise<void> {
    this.stacks.set(shortenRefName(stack.branch), stack);
  }

  /**
   * Make `branch` the current branch; the one it replaces becomes `@{-1}`.
   */
  async checkout(branch: string): Promise<void> {
    const name = shortenRefName(branch);
    if (this.current !== undefined && this.current !== name) {
      this.history.unshift(this.current);
    }
    this.current = name;
  }

  async resolveStack(branch?: BranchLocator): Promise<StackSnapshot> {
    const name = this.branchName(branch);
    const stack = name === undefined ? undefined : this.stacks.get(name);
    if (!stack) {
      throw new UnknownBranchError(branch ? formatBranchLocator(branch) : (name ?? "HEAD"));
    }
    return stack;
  }

  private branchName(branch: BranchLocator | undefined): string | undefined {
    if (branch === undefined) return this.current;
    if (branch.kind === "name") return shortenRefName(branch.name);
    return this.history[branch.n - 1];
  }
}
