import { PatchError } from "./patch-error.js";

/**
 * Thrown when a string violates the patch naming rules.
 */
export class InvalidPatchNameError extends PatchError {
  readonly patchName: string;
  readonly reason: string;

  constructor(patchName: string, reason: string, message?: string) {
    super(message ?? `Invalid patch name '${patchName}': ${reason}`);
    this.name = "InvalidPatchNameError";
    this.patchName = patchName;
    this.reason = reason;
  }
}

/**
 * Thrown when locator, range or revision text does not match the grammar.
 */
export class MalformedSyntaxError extends PatchError {
  readonly text: string;
  readonly reason: string;

  constructor(text: string, reason: string, message?: string) {
    super(message ?? `Malformed patch reference '${text}': ${reason}`);
    this.name = "MalformedSyntaxError";
    this.text = text;
    this.reason = reason;
  }
}
