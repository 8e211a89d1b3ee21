/**
 * Resolution of locators against a stack snapshot.
 *
 * Positions are indices into applied ++ unapplied ++ hidden; -1 is the base.
 */

import { AmbiguousCommitPrefixError, GitFormat, isObjectIdPrefix } from "@patchstack/core";
import {
  ConstraintViolationError,
  InvalidOffsetError,
  MalformedSyntaxError,
  OutOfRangeIndexError,
  UnknownPatchError,
} from "../errors/index.js";
import type { PatchName } from "../name/patch-name.js";
import { PatchOffsets } from "../offset/patch-offsets.js";
import { allowedGroups, isAllowed, LocationConstraint } from "../stack/location-group.js";
import type { StackSnapshot } from "../stack/stack-snapshot.js";
import type { PatchId } from "./patch-id.js";
import type { PatchLocator } from "./patch-locator.js";

export interface ResolveOptions {
  /**
   * Shortest hexadecimal text matched against patch commit ids when it is
   * not a patch name (default: 4)
   */
  minCommitPrefixLength?: number;
}

/** Where a locator starts before its own offsets are applied */
interface Anchor {
  index: number;
  /** Offsets recovered from a name candidate, applied before the locator's own */
  offsets: PatchOffsets;
  /** The anchor is `{base}`, which needs a positive offset to reach a patch */
  base: boolean;
}

const DIGITS = /^\d+$/;

/**
 * The offsets from `start` to the end of `text`, or undefined when that part
 * is not an offset chain.
 */
function trailingOffsets(text: string, start: number): PatchOffsets | undefined {
  try {
    const { offsets, end } = PatchOffsets.take(text, start);
    return end === text.length ? offsets : undefined;
  } catch (error) {
    // A count too large for an offset makes the text a plain name
    if (error instanceof MalformedSyntaxError) return undefined;
    throw error;
  }
}

class LocatorResolution {
  constructor(
    private readonly stack: StackSnapshot,
    private readonly locatorText: string,
    private readonly options: ResolveOptions,
  ) {}

  private get lastIndex(): number {
    return this.stack.all().length - 1;
  }

  private at(index: number): Anchor {
    if (index > this.lastIndex || index < -1) {
      throw new OutOfRangeIndexError(this.locatorText, index);
    }
    return { index, offsets: PatchOffsets.EMPTY, base: false };
  }

  private base(): Anchor {
    return { index: -1, offsets: PatchOffsets.EMPTY, base: true };
  }

  private top(): Anchor {
    return this.at(this.stack.applied.length - 1);
  }

  anchor(id: PatchId): Anchor {
    switch (id.kind) {
      case "base":
        return this.base();
      case "top":
        return this.top();
      case "belowLast":
        return this.at(this.stack.visible().length - 1 - (id.offset ?? 0));
      case "belowTop":
        return id.index === undefined ? this.top() : this.at(id.index);
      case "name":
        return this.nameCandidate(id.name.toString());
    }
  }

  /**
   * A name candidate is the patch of that name when there is one. Otherwise
   * it is tried, in order, as an absolute index, as an anchor followed by
   * `+` offsets, and as a commit id prefix.
   */
  private nameCandidate(text: string): Anchor {
    const index = this.stack.indexOf(text);
    if (index !== undefined) {
      return { index, offsets: PatchOffsets.EMPTY, base: false };
    }

    if (DIGITS.test(text)) {
      const absolute = Number.parseInt(text, 10);
      if (absolute <= this.lastIndex) {
        return this.at(absolute);
      }
      const byCommit = this.commitPrefix(text);
      if (byCommit) return byCommit;
      throw new OutOfRangeIndexError(this.locatorText, absolute);
    }

    const split = this.splitTrailingOffsets(text);
    if (split) {
      let anchor: Anchor;
      try {
        anchor = this.anchorText(split.anchor);
      } catch (error) {
        if (error instanceof UnknownPatchError) {
          throw new UnknownPatchError(text);
        }
        throw error;
      }
      return { ...anchor, offsets: anchor.offsets.concat(split.offsets) };
    }

    const byCommit = this.commitPrefix(text);
    if (byCommit) return byCommit;

    throw new UnknownPatchError(text);
  }

  private anchorText(text: string): Anchor {
    if (text === "" || text === "@") return this.top();
    if (text === "{base}") return this.base();
    return this.nameCandidate(text);
  }

  /**
   * Split `anchor+N+...` at the `+` atoms ending the text. The longest
   * anchor naming an existing patch wins; otherwise all trailing atoms are
   * offsets.
   */
  private splitTrailingOffsets(
    text: string,
  ): { anchor: string; offsets: PatchOffsets } | undefined {
    let shortest: { anchor: string; offsets: PatchOffsets } | undefined;
    for (let i = text.lastIndexOf("+"); i !== -1; i = i > 0 ? text.lastIndexOf("+", i - 1) : -1) {
      const offsets = trailingOffsets(text, i);
      if (!offsets) break;
      const split = { anchor: text.slice(0, i), offsets };
      if (this.stack.has(split.anchor)) return split;
      shortest = split;
    }
    return shortest;
  }

  private commitPrefix(text: string): Anchor | undefined {
    const minLength = this.options.minCommitPrefixLength ?? GitFormat.MIN_ABBREVIATED_LENGTH;
    const prefix = text.toLowerCase();
    if (!isObjectIdPrefix(prefix, minLength)) return undefined;

    const matches = this.stack.all().filter((p) => this.stack.commitOf(p).startsWith(prefix));
    if (matches.length > 1) {
      throw new AmbiguousCommitPrefixError(text, matches.map((p) => this.stack.commitOf(p)));
    }
    const [match] = matches;
    if (match === undefined) return undefined;
    return this.at(this.stack.all().indexOf(match));
  }

  /**
   * Apply offsets one atom at a time. Every step must stay at or below the
   * last patch and, unless `belowBase`, at or above the base.
   */
  walk(start: number, offsets: PatchOffsets, belowBase: boolean): number {
    let index = start;
    for (const step of offsets.steps()) {
      index += step;
      if (index > this.lastIndex || (!belowBase && index < -1)) {
        throw new OutOfRangeIndexError(this.locatorText, index);
      }
    }
    return index;
  }
}

/**
 * Resolve a locator to a stack position for revision lookups.
 *
 * Unlike {@link resolveLocator}, the result may be the base (-1) or lie below
 * it (-1 - n for the n'th first-parent ancestor of the base).
 *
 * @throws UnknownPatchError, OutOfRangeIndexError, AmbiguousCommitPrefixError
 */
export function resolvePosition(
  stack: StackSnapshot,
  locator: PatchLocator,
  options: ResolveOptions = {},
): number {
  const resolution = new LocatorResolution(stack, locator.toString(), options);
  const anchor = resolution.anchor(locator.id);
  return resolution.walk(anchor.index, anchor.offsets.concat(locator.offsets), true);
}

/**
 * Resolve a locator to the name of a patch allowed by `constraint`.
 *
 * @throws UnknownPatchError when a name candidate matches nothing
 * @throws InvalidOffsetError when the position is the base
 * @throws OutOfRangeIndexError when the position is outside the stack
 * @throws ConstraintViolationError when the patch is in a group not allowed
 * @throws AmbiguousCommitPrefixError when a commit prefix matches several patches
 */
export function resolveLocator(
  stack: StackSnapshot,
  locator: PatchLocator,
  constraint: LocationConstraint = LocationConstraint.ALL,
  options: ResolveOptions = {},
): PatchName {
  const text = locator.toString();
  const resolution = new LocatorResolution(stack, text, options);
  const anchor = resolution.anchor(locator.id);
  const offsets = anchor.offsets.concat(locator.offsets);

  if (anchor.base && offsets.net() <= 0) {
    throw new InvalidOffsetError(text);
  }
  const index = resolution.walk(anchor.index, offsets, false);
  if (index === -1) {
    throw new InvalidOffsetError(text);
  }

  const patch = stack.patchAt(index);
  const group = stack.groupAt(index);
  if (patch === undefined || group === undefined) {
    throw new OutOfRangeIndexError(text, index);
  }
  if (!isAllowed(constraint, group)) {
    throw new ConstraintViolationError(patch.toString(), group, allowedGroups(constraint));
  }
  return patch;
}
