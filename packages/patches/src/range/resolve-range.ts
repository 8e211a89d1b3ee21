import {
  DuplicatePatchError,
  EmptyRangeError,
  InvalidStackError,
  InvertedRangeError,
} from "../errors/index.js";
import { resolveLocator, type ResolveOptions } from "../locator/resolve-locator.js";
import type { PatchName } from "../name/patch-name.js";
import {
  isAllowed,
  type LocationConstraint,
  RangeConstraint,
  toLocationConstraint,
} from "../stack/location-group.js";
import type { StackSnapshot } from "../stack/stack-snapshot.js";
import { formatRangeBounds, type PatchRange, type PatchRangeBounds } from "./patch-range.js";

function firstAllowedIndex(
  stack: StackSnapshot,
  constraint: LocationConstraint,
): number | undefined {
  const count = stack.all().length;
  for (let index = 0; index < count; index++) {
    const group = stack.groupAt(index);
    if (group && isAllowed(constraint, group)) return index;
  }
  return undefined;
}

function lastAllowedIndex(
  stack: StackSnapshot,
  constraint: LocationConstraint,
): number | undefined {
  for (let index = stack.all().length - 1; index >= 0; index--) {
    const group = stack.groupAt(index);
    if (group && isAllowed(constraint, group)) return index;
  }
  return undefined;
}

/**
 * Where an open-ended range stops.
 */
function openEndIndex(
  stack: StackSnapshot,
  constraint: RangeConstraint,
  beginIndex: number,
): number | undefined {
  const stopsAtApplied =
    constraint === RangeConstraint.ALL_WITH_APPLIED_BOUNDARY ||
    constraint === RangeConstraint.VISIBLE_WITH_APPLIED_BOUNDARY;
  if (stopsAtApplied && stack.groupAt(beginIndex) === "applied") {
    return stack.applied.length - 1;
  }
  return lastAllowedIndex(stack, toLocationConstraint(constraint));
}

function indexOfResolved(stack: StackSnapshot, name: PatchName): number {
  const index = stack.indexOf(name);
  if (index === undefined) {
    throw new InvalidStackError(`Patch '${name}' is missing from stack ${stack.branch}`);
  }
  return index;
}

/**
 * Resolve range bounds to the patches between them, in stack order.
 *
 * A range with both ends open and no patch the constraint allows is empty.
 *
 * @throws InvertedRangeError when the begin patch comes after the end patch
 */
export function resolveRangeBounds(
  stack: StackSnapshot,
  bounds: PatchRangeBounds,
  constraint: RangeConstraint = RangeConstraint.ALL,
  options: ResolveOptions = {},
): PatchName[] {
  const boundConstraint = toLocationConstraint(constraint);

  const beginIndex = bounds.begin
    ? indexOfResolved(stack, resolveLocator(stack, bounds.begin, boundConstraint, options))
    : firstAllowedIndex(stack, boundConstraint);
  if (beginIndex === undefined) {
    if (bounds.end) {
      // Resolving the end reports why nothing qualifies
      resolveLocator(stack, bounds.end, boundConstraint, options);
    }
    return [];
  }

  const endIndex = bounds.end
    ? indexOfResolved(stack, resolveLocator(stack, bounds.end, boundConstraint, options))
    : openEndIndex(stack, constraint, beginIndex);
  if (endIndex === undefined) {
    throw new EmptyRangeError(formatRangeBounds(bounds));
  }

  const all = stack.all();
  if (beginIndex > endIndex) {
    throw new InvertedRangeError(`${all[beginIndex]}`, `${all[endIndex]}`);
  }
  return all.slice(beginIndex, endIndex + 1);
}

/**
 * Resolve a patch range under a range constraint.
 */
export function resolveRange(
  stack: StackSnapshot,
  range: PatchRange,
  constraint: RangeConstraint = RangeConstraint.ALL,
  options: ResolveOptions = {},
): PatchName[] {
  if (range.kind === "single") {
    return [resolveLocator(stack, range.locator, toLocationConstraint(constraint), options)];
  }
  return resolveRangeBounds(stack, range.bounds, constraint, options);
}

/**
 * Resolve several ranges, as given in separate arguments, into one list.
 *
 * @throws DuplicatePatchError when two ranges select the same patch
 */
export function resolveRanges(
  stack: StackSnapshot,
  ranges: readonly PatchRange[],
  constraint: RangeConstraint = RangeConstraint.ALL,
  options: ResolveOptions = {},
): PatchName[] {
  const seen = new Set<string>();
  const result: PatchName[] = [];
  for (const range of ranges) {
    for (const name of resolveRange(stack, range, constraint, options)) {
      if (seen.has(name.toString())) {
        throw new DuplicatePatchError(name.toString());
      }
      seen.add(name.toString());
      result.push(name);
    }
  }
  return result;
}
