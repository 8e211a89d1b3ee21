/**
 * Revision specifications: patch locators and ranges that may carry a branch
 * qualifier and a git revision suffix, and may resolve outside the stack.
 */

import { MalformedSyntaxError } from "../errors/syntax-errors.js";
import { PatchId } from "../locator/patch-id.js";
import { PatchLocator, takeLocator } from "../locator/patch-locator.js";
import { PatchName } from "../name/patch-name.js";
import {
  formatRangeBounds,
  type PatchRangeBounds,
  parseRangeBounds,
} from "../range/patch-range.js";
import { type BranchLocator, formatBranchLocator, parseBranchLocator } from "./branch-locator.js";

/**
 * A git revision suffix such as `^2` or `@{1}`. Never interpreted here;
 * handed verbatim to the revision engine.
 */
export type GitRevisionSuffix = string;

/**
 * A patch locator with an optional git revision suffix, e.g. `{base}~^2`.
 */
export interface PatchLikeSpec {
  readonly patchLoc: PatchLocator;
  readonly suffix: GitRevisionSuffix;
}

/**
 * Specification of a single revision, inside or outside the stack.
 *
 * `patchAndGitLike` holds text that is meaningful both as a patch locator
 * and as a git revision; the patch interpretation is tried first.
 */
export type SingleRevisionSpec =
  | {
      readonly kind: "branch";
      readonly branchLoc: BranchLocator;
      readonly patchLike: PatchLikeSpec;
    }
  | {
      readonly kind: "patchAndGitLike";
      readonly patchLike: PatchLikeSpec;
      readonly gitLike: string;
    }
  | { readonly kind: "gitLike"; readonly revision: string }
  | { readonly kind: "patchLike"; readonly patchLike: PatchLikeSpec };

/**
 * Specification of a revision or a patch range.
 *
 * Any text containing `..` is a patch range; git revision ranges are not
 * accepted.
 */
export type RangeRevisionSpec =
  | {
      readonly kind: "branchRange";
      readonly branchLoc: BranchLocator;
      readonly bounds: PatchRangeBounds;
    }
  | { readonly kind: "range"; readonly bounds: PatchRangeBounds }
  | { readonly kind: "single"; readonly spec: SingleRevisionSpec };

/**
 * Parse a locator followed by an optional suffix starting with `^` or `@{`.
 *
 * @throws MalformedSyntaxError
 */
export function parsePatchLikeSpec(text: string): PatchLikeSpec {
  if (text.length === 0) {
    throw new MalformedSyntaxError(text, "empty revision");
  }
  if (PatchName.isValid(text)) {
    const patchLoc = new PatchLocator(PatchId.name(PatchName.make(text)));
    return Object.freeze<PatchLikeSpec>({ patchLoc, suffix: "" });
  }
  const { locator, end } = takeLocator(text, 0);
  const suffix = text.slice(end);
  if (suffix.length > 0 && !suffix.startsWith("^") && !suffix.startsWith("@{")) {
    throw new MalformedSyntaxError(text, `unexpected '${suffix}'`);
  }
  return Object.freeze<PatchLikeSpec>({ patchLoc: locator, suffix });
}

function splitBranch(text: string): { branchLoc: BranchLocator; rest: string } | undefined {
  const colon = text.indexOf(":");
  if (colon <= 0) return undefined;
  try {
    return { branchLoc: parseBranchLocator(text.slice(0, colon)), rest: text.slice(colon + 1) };
  } catch (error) {
    if (error instanceof MalformedSyntaxError) return undefined;
    throw error;
  }
}

function tryPatchLike(text: string): PatchLikeSpec | undefined {
  try {
    return parsePatchLikeSpec(text);
  } catch (error) {
    if (error instanceof MalformedSyntaxError) return undefined;
    throw error;
  }
}

/**
 * Parse a single revision spec. Text that is not a patch-like spec, with or
 * without a branch qualifier, is a git revision.
 *
 * @throws MalformedSyntaxError for empty text
 */
export function parseSingleRevisionSpec(text: string): SingleRevisionSpec {
  if (text.length === 0) {
    throw new MalformedSyntaxError(text, "empty revision");
  }

  const qualified = splitBranch(text);
  if (qualified) {
    const patchLike = tryPatchLike(qualified.rest);
    if (patchLike) {
      return Object.freeze<SingleRevisionSpec>({
        kind: "branch",
        branchLoc: qualified.branchLoc,
        patchLike,
      });
    }
    return Object.freeze<SingleRevisionSpec>({ kind: "gitLike", revision: text });
  }

  const patchLike = tryPatchLike(text);
  if (!patchLike) {
    return Object.freeze<SingleRevisionSpec>({ kind: "gitLike", revision: text });
  }
  const anchor = patchLike.patchLoc.id.kind;
  if (anchor === "name" || anchor === "top") {
    return Object.freeze<SingleRevisionSpec>({
      kind: "patchAndGitLike",
      patchLike,
      gitLike: text,
    });
  }
  return Object.freeze<SingleRevisionSpec>({ kind: "patchLike", patchLike });
}

/**
 * Parse a revision spec that may also be a patch range.
 *
 * @throws MalformedSyntaxError
 */
export function parseRangeRevisionSpec(text: string): RangeRevisionSpec {
  const dots = text.indexOf("..");
  if (dots === -1) {
    const spec = parseSingleRevisionSpec(text);
    return Object.freeze<RangeRevisionSpec>({ kind: "single", spec });
  }
  const colon = text.indexOf(":");
  if (colon > 0 && colon < dots) {
    return Object.freeze<RangeRevisionSpec>({
      kind: "branchRange",
      branchLoc: parseBranchLocator(text.slice(0, colon)),
      bounds: parseRangeBounds(text.slice(colon + 1)),
    });
  }
  return Object.freeze<RangeRevisionSpec>({ kind: "range", bounds: parseRangeBounds(text) });
}

export function formatPatchLikeSpec(spec: PatchLikeSpec): string {
  return `${spec.patchLoc}${spec.suffix}`;
}

export function formatSingleRevisionSpec(spec: SingleRevisionSpec): string {
  switch (spec.kind) {
    case "branch":
      return `${formatBranchLocator(spec.branchLoc)}:${formatPatchLikeSpec(spec.patchLike)}`;
    case "patchAndGitLike":
      return spec.gitLike;
    case "gitLike":
      return spec.revision;
    case "patchLike":
      return formatPatchLikeSpec(spec.patchLike);
  }
}

export function formatRangeRevisionSpec(spec: RangeRevisionSpec): string {
  switch (spec.kind) {
    case "branchRange":
      return `${formatBranchLocator(spec.branchLoc)}:${formatRangeBounds(spec.bounds)}`;
    case "range":
      return formatRangeBounds(spec.bounds);
    case "single":
      return formatSingleRevisionSpec(spec.spec);
  }
}
