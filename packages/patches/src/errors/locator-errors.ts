import type { LocationGroup } from "../stack/location-group.js";
import { PatchError } from "./patch-error.js";

/**
 * Thrown when a named patch is not in any group of the stack.
 */
export class UnknownPatchError extends PatchError {
  readonly patchName: string;

  constructor(patchName: string, message?: string) {
    super(message ?? `Patch '${patchName}' does not exist`);
    this.name = "UnknownPatchError";
    this.patchName = patchName;
  }
}

/**
 * Thrown when an offset lands on a position without a patch (the stack base).
 */
export class InvalidOffsetError extends PatchError {
  readonly locator: string;

  constructor(locator: string, message?: string) {
    super(
      message ?? `Locator '${locator}' does not refer to a patch: offset ends at the stack base`,
    );
    this.name = "InvalidOffsetError";
    this.locator = locator;
  }
}

/**
 * Thrown when a locator points outside the stack.
 */
export class OutOfRangeIndexError extends PatchError {
  readonly locator: string;
  readonly index: number;

  constructor(locator: string, index: number, message?: string) {
    super(message ?? `Locator '${locator}' is out of range (index ${index})`);
    this.name = "OutOfRangeIndexError";
    this.locator = locator;
    this.index = index;
  }
}

/**
 * Thrown when a located patch is not in a group the operation accepts.
 */
export class ConstraintViolationError extends PatchError {
  readonly patchName: string;
  readonly group: LocationGroup;
  readonly allowed: readonly LocationGroup[];

  constructor(
    patchName: string,
    group: LocationGroup,
    allowed: readonly LocationGroup[],
    message?: string,
  ) {
    super(message ?? `Patch '${patchName}' is ${group}; expected ${allowed.join(" or ")}`);
    this.name = "ConstraintViolationError";
    this.patchName = patchName;
    this.group = group;
    this.allowed = allowed;
  }
}
