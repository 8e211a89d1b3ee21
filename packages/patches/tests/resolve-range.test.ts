import { describe, expect, it } from "vitest";
import {
  ConstraintViolationError,
  createStackSnapshot,
  DuplicatePatchError,
  formatRange,
  InvertedRangeError,
  MalformedSyntaxError,
  type PatchRange,
  parseRange,
  parseRangeBounds,
  RangeConstraint,
  resolveRange,
  resolveRanges,
  type StackSnapshot,
  UnknownPatchError,
} from "../src/index.js";
import { fakeId, sampleStack } from "./test-helper.js";

function names(
  stack: StackSnapshot,
  text: string,
  constraint: RangeConstraint = RangeConstraint.ALL,
): string[] {
  return resolveRange(stack, parseRange(text), constraint).map(String);
}

describe("parseRange", () => {
  it("parses single locators and bounds", () => {
    const single = parseRange("p1~");
    expect(single.kind).toBe("single");
    const range = parseRange("p0..@");
    expect(range.kind === "range" && range.bounds.begin?.toString()).toBe("p0");
    expect(range.kind === "range" && range.bounds.end?.toString()).toBe("@");
  });

  it("leaves out missing bounds", () => {
    expect(parseRangeBounds("..")).toEqual({ begin: undefined, end: undefined });
    expect(parseRangeBounds("p1..").end).toBeUndefined();
  });

  it("rejects malformed ranges", () => {
    expect(() => parseRangeBounds("p0")).toThrow(
      "Malformed patch reference 'p0': expected '..' in range",
    );
    expect(() => parseRange("a..b..c")).toThrow(MalformedSyntaxError);
    expect(() => parseRange("a..b..c")).toThrow(
      "Malformed patch reference 'a..b..c': more than one '..' in range",
    );
  });

  it("formats ranges", () => {
    for (const text of ["p0..p2", "..", "p1~..", "..^", "{base}+1"]) {
      expect(formatRange(parseRange(text))).toBe(text);
    }
  });
});

describe("resolveRange", () => {
  const stack = sampleStack();

  it("resolves closed ranges inclusively", () => {
    expect(names(stack, "p0..p2")).toEqual(["p0", "p1", "p2"]);
    expect(names(stack, "p1..p1")).toEqual(["p1"]);
    expect(names(stack, "{base}+1..@")).toEqual(["p0", "p1", "p2"]);
  });

  it("rejects inverted ranges", () => {
    expect(() => names(stack, "p2..p0")).toThrow(InvertedRangeError);
    expect(() => names(stack, "p2..p0")).toThrow("Patch 'p2' comes after 'p0' in the stack");
  });

  it("starts an open range at the first allowed patch", () => {
    expect(names(stack, "..p1")).toEqual(["p0", "p1"]);
    expect(names(stack, "..p4", RangeConstraint.UNAPPLIED)).toEqual(["p3", "p4"]);
  });

  it("ends an open range at the last allowed patch", () => {
    expect(names(stack, "p1..")).toEqual(["p1", "p2", "p3", "p4", "h0"]);
    expect(names(stack, "p3..", RangeConstraint.VISIBLE)).toEqual(["p3", "p4"]);
  });

  it("stops at the last applied patch with an applied boundary", () => {
    expect(names(stack, "p1..", RangeConstraint.ALL_WITH_APPLIED_BOUNDARY)).toEqual(["p1", "p2"]);
    expect(names(stack, "p1..", RangeConstraint.VISIBLE_WITH_APPLIED_BOUNDARY)).toEqual([
      "p1",
      "p2",
    ]);
    expect(names(stack, "p3..", RangeConstraint.ALL_WITH_APPLIED_BOUNDARY)).toEqual([
      "p3",
      "p4",
      "h0",
    ]);
    expect(names(stack, "..", RangeConstraint.ALL_WITH_APPLIED_BOUNDARY)).toEqual([
      "p0",
      "p1",
      "p2",
    ]);
  });

  it("covers a whole group with a fully open range", () => {
    expect(names(stack, "..", RangeConstraint.APPLIED)).toEqual(["p0", "p1", "p2"]);
    expect(names(stack, "..", RangeConstraint.HIDDEN)).toEqual(["h0"]);
    expect(names(stack, "..", RangeConstraint.VISIBLE)).toEqual(["p0", "p1", "p2", "p3", "p4"]);
  });

  it("checks explicit bounds against the constraint", () => {
    expect(() => names(stack, "..h0", RangeConstraint.VISIBLE)).toThrow(ConstraintViolationError);
    expect(() => names(stack, "..h0", RangeConstraint.VISIBLE)).toThrow(
      "Patch 'h0' is hidden; expected applied or unapplied",
    );
    expect(() => names(stack, "p3", RangeConstraint.APPLIED)).toThrow(
      "Patch 'p3' is unapplied; expected applied",
    );
    expect(names(stack, "p1", RangeConstraint.APPLIED)).toEqual(["p1"]);
  });

  it("returns nothing for an open range over an empty stack", () => {
    const empty = createStackSnapshot({ branch: "main", base: fakeId("ba5e"), patchCommits: {} });
    expect(names(empty, "..")).toEqual([]);
    expect(() => names(empty, "..x")).toThrow(UnknownPatchError);
    expect(names(stack, "..", RangeConstraint.HIDDEN)).toEqual(["h0"]);
  });
});

describe("resolveRanges", () => {
  const stack = sampleStack();

  it("concatenates ranges in argument order", () => {
    const ranges: PatchRange[] = [parseRange("p3"), parseRange("p0..p1")];
    expect(resolveRanges(stack, ranges).map(String)).toEqual(["p3", "p0", "p1"]);
  });

  it("rejects a patch selected twice", () => {
    const ranges = [parseRange("p0..p1"), parseRange("p1")];
    expect(() => resolveRanges(stack, ranges)).toThrow(DuplicatePatchError);
    expect(() => resolveRanges(stack, ranges)).toThrow("Patch 'p1' is selected more than once");
  });
});
