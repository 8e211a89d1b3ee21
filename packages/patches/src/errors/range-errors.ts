import { PatchError } from "./patch-error.js";

/**
 * Thrown when a range begins after its end.
 */
export class InvertedRangeError extends PatchError {
  readonly begin: string;
  readonly end: string;

  constructor(begin: string, end: string, message?: string) {
    super(message ?? `Patch '${begin}' comes after '${end}' in the stack`);
    this.name = "InvertedRangeError";
    this.begin = begin;
    this.end = end;
  }
}

/**
 * Thrown when revision bounds are requested for a range without patches.
 */
export class EmptyRangeError extends PatchError {
  readonly range: string;

  constructor(range: string, message?: string) {
    super(message ?? `Range '${range}' contains no patches`);
    this.name = "EmptyRangeError";
    this.range = range;
  }
}

/**
 * Thrown when several ranges select the same patch.
 */
export class DuplicatePatchError extends PatchError {
  readonly patchName: string;

  constructor(patchName: string, message?: string) {
    super(message ?? `Patch '${patchName}' is selected more than once`);
    this.name = "DuplicatePatchError";
    this.patchName = patchName;
  }
}
