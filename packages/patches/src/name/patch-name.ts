import { isValidRefName } from "@patchstack/core";
import { InvalidPatchNameError } from "../errors/syntax-errors.js";

/** Spellings reserved for the locator grammar */
const RESERVED = new Set(["@", "{base}"]);

/**
 * A string that follows the patch naming rules.
 *
 * A valid patch name meets every rule of a git reference name, does not
 * contain "/" and is not one of the reserved spellings `@` or `{base}`.
 * Instances are immutable and only created through {@link PatchName.make}.
 */
export class PatchName {
  private constructor(private readonly value: string) {}

  /**
   * Explain why a string is not a valid patch name.
   *
   * @returns The reason, or undefined when the name is valid
   */
  static validate(raw: string): string | undefined {
    if (raw.length === 0) return "name is empty";
    if (RESERVED.has(raw)) return `'${raw}' is reserved`;
    if (raw.includes("/")) return "name contains '/'";
    if (!isValidRefName(raw)) return "name is not a valid git reference name";
    return undefined;
  }

  static isValid(raw: string): boolean {
    return PatchName.validate(raw) === undefined;
  }

  /**
   * @throws InvalidPatchNameError
   */
  static make(raw: string): PatchName {
    const reason = PatchName.validate(raw);
    if (reason !== undefined) {
      throw new InvalidPatchNameError(raw, reason);
    }
    return new PatchName(raw);
  }

  equals(other: PatchName | string): boolean {
    return this.value === other.toString();
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
