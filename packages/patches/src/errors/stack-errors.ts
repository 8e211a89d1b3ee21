import { PatchError } from "./patch-error.js";

/**
 * Thrown when a branch qualifier does not name a branch with a stack.
 */
export class UnknownBranchError extends PatchError {
  readonly branch: string;

  constructor(branch: string, message?: string) {
    super(message ?? `Branch '${branch}' not found`);
    this.name = "UnknownBranchError";
    this.branch = branch;
  }
}

/**
 * Thrown when a stack snapshot is internally inconsistent.
 */
export class InvalidStackError extends PatchError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStackError";
  }
}
