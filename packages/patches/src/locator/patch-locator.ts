import { MalformedSyntaxError } from "../errors/syntax-errors.js";
import { PatchName } from "../name/patch-name.js";
import { PatchOffsets } from "../offset/patch-offsets.js";
import { formatPatchId, PatchId } from "./patch-id.js";

/**
 * Location of a patch within the stack: an identifier plus offsets.
 *
 * Locators come from command line text and are turned into patch names with
 * `resolveLocator()`. Parsing never looks at a stack, so text such as `5` or
 * `p0+1` is kept as a name candidate and disambiguated later.
 */
export class PatchLocator {
  readonly id: PatchId;
  readonly offsets: PatchOffsets;

  constructor(id: PatchId, offsets: PatchOffsets = PatchOffsets.EMPTY) {
    this.id = id;
    this.offsets = offsets;
    Object.freeze(this);
  }

  static parse(text: string): PatchLocator {
    return parseLocator(text);
  }

  withOffsets(offsets: PatchOffsets): PatchLocator {
    return new PatchLocator(this.id, this.offsets.concat(offsets));
  }

  equals(other: PatchLocator): boolean {
    return formatPatchId(this.id) === formatPatchId(other.id) && this.offsets.equals(other.offsets);
  }

  toString(): string {
    return `${formatPatchId(this.id)}${this.offsets}`;
  }
}

const SIGNED_INT = /^-?\d+/;

/**
 * Length of the name-like run starting at `start`: stops at characters a
 * patch name cannot contain before offsets or revision syntax.
 */
function nameRunEnd(text: string, start: number): number {
  let pos = start;
  while (pos < text.length) {
    const ch = text.charAt(pos);
    if (ch === "~" || ch === "^" || ch === ":") break;
    if (text.startsWith("..", pos) || text.startsWith("@{", pos)) break;
    pos++;
  }
  return pos;
}

/**
 * Parse a locator starting at `start`, stopping where the locator grammar
 * ends.
 *
 * @returns The locator and the position after it
 * @throws MalformedSyntaxError when no locator starts at `start`
 */
export function takeLocator(text: string, start: number): { locator: PatchLocator; end: number } {
  let pos = start;
  let id: PatchId;

  if (text.startsWith("{base}", pos)) {
    id = PatchId.base();
    pos += "{base}".length;
  } else if (text.startsWith("@", pos) && !text.startsWith("@{", pos)) {
    id = PatchId.top();
    pos += 1;
  } else if (text.startsWith("^", pos)) {
    const m = SIGNED_INT.exec(text.slice(pos + 1));
    const offset = m ? Number.parseInt(m[0], 10) : undefined;
    if (offset !== undefined && !Number.isSafeInteger(offset)) {
      throw new MalformedSyntaxError(text, "offset after '^' is too large");
    }
    id = PatchId.belowLast(offset);
    pos += 1 + (m ? m[0].length : 0);
  } else {
    const end = nameRunEnd(text, pos);
    const anchor = text.slice(pos, end);
    if (anchor.length === 0) {
      id = PatchId.belowTop();
    } else {
      const reason = PatchName.validate(anchor);
      if (reason !== undefined) {
        throw new MalformedSyntaxError(text, `invalid patch name '${anchor}': ${reason}`);
      }
      id = PatchId.name(PatchName.make(anchor));
    }
    pos = end;
  }

  const taken = PatchOffsets.take(text, pos);
  if (id.kind === "belowTop" && taken.offsets.isEmpty()) {
    throw new MalformedSyntaxError(text, "expected a patch locator");
  }
  return { locator: new PatchLocator(id, taken.offsets), end: taken.end };
}

/**
 * Parse complete locator text.
 *
 * Text that is a valid patch name as a whole always becomes a name
 * candidate; only other text is split into an anchor and offsets.
 *
 * @throws MalformedSyntaxError
 */
export function parseLocator(text: string): PatchLocator {
  if (text.length === 0) {
    throw new MalformedSyntaxError(text, "empty locator");
  }
  if (PatchName.isValid(text)) {
    return new PatchLocator(PatchId.name(PatchName.make(text)));
  }
  const { locator, end } = takeLocator(text, 0);
  if (end !== text.length) {
    throw new MalformedSyntaxError(text, `unexpected '${text.slice(end)}'`);
  }
  return locator;
}
