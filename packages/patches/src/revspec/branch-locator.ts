import { isValidBranchName } from "@patchstack/core";
import { MalformedSyntaxError } from "../errors/syntax-errors.js";

/**
 * A branch named in a revision spec: by name, or as `@{-N}`, the N'th
 * branch checked out before the current one.
 */
export type BranchLocator =
  | { readonly kind: "name"; readonly name: string }
  | { readonly kind: "previous"; readonly n: number };

const PREVIOUS = /^@\{-(\d+)\}$/;

/**
 * @throws MalformedSyntaxError
 */
export function parseBranchLocator(text: string): BranchLocator {
  const m = PREVIOUS.exec(text);
  if (m) {
    const n = Number.parseInt(m[1] ?? "", 10);
    if (!Number.isSafeInteger(n) || n < 1) {
      throw new MalformedSyntaxError(text, "expected @{-N} with N >= 1");
    }
    return Object.freeze<BranchLocator>({ kind: "previous", n });
  }
  if (!isValidBranchName(text)) {
    throw new MalformedSyntaxError(text, "invalid branch name");
  }
  return Object.freeze<BranchLocator>({ kind: "name", name: text });
}

export function formatBranchLocator(branch: BranchLocator): string {
  return branch.kind === "name" ? branch.name : `@{-${branch.n}}`;
}
