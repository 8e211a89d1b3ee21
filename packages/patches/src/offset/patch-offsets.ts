import { MalformedSyntaxError } from "../errors/syntax-errors.js";

/**
 * An individual offset atom such as `+`, `~`, `~3` or `+1`.
 *
 * `plus` moves to the n'th next patch, `tilde` to the n'th previous one.
 * An absent count means 1.
 */
export type PatchOffsetAtom =
  | { readonly kind: "plus"; readonly count?: number }
  | { readonly kind: "tilde"; readonly count?: number };

const ATOM = /^([+~])(\d*)/;

function parseAtom(
  text: string,
  start: number,
): { atom: PatchOffsetAtom; end: number } | undefined {
  const m = ATOM.exec(text.slice(start));
  if (!m) return undefined;
  const digits = m[2] ?? "";
  let count: number | undefined;
  if (digits.length > 0) {
    count = Number.parseInt(digits, 10);
    if (!Number.isSafeInteger(count)) {
      throw new MalformedSyntaxError(text, `offset '${m[0]}' is too large`);
    }
  }
  const kind = m[1] === "+" ? "plus" : "tilde";
  return { atom: { kind, count }, end: start + m[0].length };
}

function formatAtom(atom: PatchOffsetAtom): string {
  const sign = atom.kind === "plus" ? "+" : "~";
  return atom.count === undefined ? sign : `${sign}${atom.count}`;
}

/**
 * Offsets from one patch location to another, e.g. `~3+` or `+2~1`.
 *
 * The atoms are kept in order and keep their exact spelling, so that
 * `toString()` reproduces the parsed text.
 */
export class PatchOffsets {
  static readonly EMPTY = new PatchOffsets([], "");

  private readonly list: readonly PatchOffsetAtom[];
  private readonly text: string;

  private constructor(atoms: readonly PatchOffsetAtom[], text: string) {
    this.list = Object.freeze(atoms.map((atom) => Object.freeze({ ...atom })));
    this.text = text;
  }

  static fromAtoms(atoms: readonly PatchOffsetAtom[]): PatchOffsets {
    if (atoms.length === 0) return PatchOffsets.EMPTY;
    return new PatchOffsets(atoms, atoms.map(formatAtom).join(""));
  }

  /**
   * Parse a complete offset chain.
   *
   * @throws MalformedSyntaxError when any part of the text is not an offset atom
   */
  static parse(text: string): PatchOffsets {
    const { offsets, end } = PatchOffsets.take(text, 0);
    if (end !== text.length) {
      throw new MalformedSyntaxError(text, `unexpected '${text.slice(end)}' in offsets`);
    }
    return offsets;
  }

  /**
   * Consume the longest offset chain starting at `start`.
   *
   * @returns The offsets and the position after the last consumed atom
   */
  static take(text: string, start: number): { offsets: PatchOffsets; end: number } {
    const atoms: PatchOffsetAtom[] = [];
    let pos = start;
    for (let next = parseAtom(text, pos); next; next = parseAtom(text, pos)) {
      atoms.push(next.atom);
      pos = next.end;
    }
    const offsets =
      atoms.length === 0 ? PatchOffsets.EMPTY : new PatchOffsets(atoms, text.slice(start, pos));
    return { offsets, end: pos };
  }

  atoms(): readonly PatchOffsetAtom[] {
    return this.list;
  }

  isEmpty(): boolean {
    return this.list.length === 0;
  }

  /**
   * Signed sum of all atoms; positive towards the end of the stack.
   */
  net(): number {
    let total = 0;
    for (const step of this.steps()) total += step;
    return total;
  }

  /**
   * Signed step of each atom, in application order.
   */
  *steps(): Generator<number> {
    for (const atom of this.list) {
      const count = atom.count ?? 1;
      yield atom.kind === "plus" ? count : -count;
    }
  }

  concat(other: PatchOffsets): PatchOffsets {
    if (other.isEmpty()) return this;
    if (this.isEmpty()) return other;
    return new PatchOffsets([...this.list, ...other.list], this.text + other.text);
  }

  /**
   * Compare atom sequences; `~1` equals `~` but `~2` does not equal `~~`.
   */
  equals(other: PatchOffsets): boolean {
    return (
      this.list.length === other.list.length &&
      this.list.every((atom, i) => {
        const theirs = other.list[i];
        return (
          theirs !== undefined &&
          atom.kind === theirs.kind &&
          (atom.count ?? 1) === (theirs.count ?? 1)
        );
      })
    );
  }

  /**
   * The offsets as spelled when parsed.
   */
  toString(): string {
    return this.text;
  }
}
