/**
 * The groups of patches within a stack.
 *
 * The stack consists of all applied patches, then the unapplied ones,
 * followed by any hidden patches. Indices count through that order.
 */
export type LocationGroup = "applied" | "unapplied" | "hidden";

/**
 * Which patches a single user-supplied locator may refer to.
 */
export enum LocationConstraint {
  /** Any patch in the stack */
  ALL = "all",
  /** Applied or unapplied patches */
  VISIBLE = "visible",
  APPLIED = "applied",
  UNAPPLIED = "unapplied",
  HIDDEN = "hidden",
}

/**
 * Which patches a user-supplied range may contain, and where an open-ended
 * range stops.
 *
 * The `*_WITH_APPLIED_BOUNDARY` variants accept the same patches as `ALL`
 * and `VISIBLE`, but an open-ended range that begins with an applied patch
 * stops at the last applied patch.
 */
export enum RangeConstraint {
  ALL = "all",
  ALL_WITH_APPLIED_BOUNDARY = "allWithAppliedBoundary",
  VISIBLE = "visible",
  VISIBLE_WITH_APPLIED_BOUNDARY = "visibleWithAppliedBoundary",
  APPLIED = "applied",
  UNAPPLIED = "unapplied",
  HIDDEN = "hidden",
}

const EVERY_GROUP: readonly LocationGroup[] = Object.freeze(["applied", "unapplied", "hidden"]);
const VISIBLE_GROUPS: readonly LocationGroup[] = Object.freeze(["applied", "unapplied"]);

/**
 * Groups accepted by a constraint, in stack order.
 */
export function allowedGroups(constraint: LocationConstraint): readonly LocationGroup[] {
  switch (constraint) {
    case LocationConstraint.ALL:
      return EVERY_GROUP;
    case LocationConstraint.VISIBLE:
      return VISIBLE_GROUPS;
    case LocationConstraint.APPLIED:
      return ["applied"];
    case LocationConstraint.UNAPPLIED:
      return ["unapplied"];
    case LocationConstraint.HIDDEN:
      return ["hidden"];
  }
}

export function isAllowed(constraint: LocationConstraint, group: LocationGroup): boolean {
  return allowedGroups(constraint).includes(group);
}

/**
 * The constraint a range applies to each of its explicit bounds; it accepts
 * the same groups as the range.
 */
export function toLocationConstraint(constraint: RangeConstraint): LocationConstraint {
  switch (constraint) {
    case RangeConstraint.ALL:
    case RangeConstraint.ALL_WITH_APPLIED_BOUNDARY:
      return LocationConstraint.ALL;
    case RangeConstraint.VISIBLE:
    case RangeConstraint.VISIBLE_WITH_APPLIED_BOUNDARY:
      return LocationConstraint.VISIBLE;
    case RangeConstraint.APPLIED:
      return LocationConstraint.APPLIED;
    case RangeConstraint.UNAPPLIED:
      return LocationConstraint.UNAPPLIED;
    case RangeConstraint.HIDDEN:
      return LocationConstraint.HIDDEN;
  }
}
