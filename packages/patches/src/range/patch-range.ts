import { MalformedSyntaxError } from "../errors/syntax-errors.js";
import { parseLocator, type PatchLocator } from "../locator/patch-locator.js";

/**
 * Patch locations bounding a range of patches; both bounds are inclusive.
 *
 * An absent `begin` starts at the first patch the constraint allows. An
 * absent `end` is open; where it stops depends on the `RangeConstraint`.
 */
export interface PatchRangeBounds {
  readonly begin?: PatchLocator;
  readonly end?: PatchLocator;
}

/**
 * A range of patches, written `[<locator>]..[<locator>]`, or a single patch.
 */
export type PatchRange =
  | { readonly kind: "single"; readonly locator: PatchLocator }
  | { readonly kind: "range"; readonly bounds: PatchRangeBounds };

/**
 * Parse text containing `..` into range bounds.
 *
 * @throws MalformedSyntaxError
 */
export function parseRangeBounds(text: string): PatchRangeBounds {
  const dots = text.indexOf("..");
  if (dots === -1) {
    throw new MalformedSyntaxError(text, "expected '..' in range");
  }
  const beginText = text.slice(0, dots);
  const endText = text.slice(dots + 2);
  if (endText.includes("..")) {
    throw new MalformedSyntaxError(text, "more than one '..' in range");
  }
  return Object.freeze<PatchRangeBounds>({
    begin: beginText.length > 0 ? parseLocator(beginText) : undefined,
    end: endText.length > 0 ? parseLocator(endText) : undefined,
  });
}

/**
 * Parse a patch range; text without `..` is a single locator.
 *
 * @throws MalformedSyntaxError
 */
export function parseRange(text: string): PatchRange {
  if (text.includes("..")) {
    return Object.freeze<PatchRange>({ kind: "range", bounds: parseRangeBounds(text) });
  }
  return Object.freeze<PatchRange>({ kind: "single", locator: parseLocator(text) });
}

export function formatRangeBounds(bounds: PatchRangeBounds): string {
  return `${bounds.begin ?? ""}..${bounds.end ?? ""}`;
}

export function formatRange(range: PatchRange): string {
  return range.kind === "single" ? range.locator.toString() : formatRangeBounds(range.bounds);
}
