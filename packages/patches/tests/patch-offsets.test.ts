import { describe, expect, it } from "vitest";
import { MalformedSyntaxError, PatchOffsets } from "../src/index.js";

describe("PatchOffsets", () => {
  it("parses atoms in order", () => {
    const offsets = PatchOffsets.parse("~3+");
    expect(offsets.atoms()).toEqual([
      { kind: "tilde", count: 3 },
      { kind: "plus", count: undefined },
    ]);
    expect([...offsets.steps()]).toEqual([-3, 1]);
    expect(offsets.net()).toBe(-2);
  });

  it("reproduces the parsed spelling", () => {
    expect(PatchOffsets.parse("~1+2~").toString()).toBe("~1+2~");
    expect(PatchOffsets.parse("+0").toString()).toBe("+0");
  });

  it("parses empty text as no offsets", () => {
    const offsets = PatchOffsets.parse("");
    expect(offsets.isEmpty()).toBe(true);
    expect(offsets).toBe(PatchOffsets.EMPTY);
    expect(offsets.net()).toBe(0);
  });

  it("rejects text that is not an offset", () => {
    expect(() => PatchOffsets.parse("~x")).toThrow(MalformedSyntaxError);
    expect(() => PatchOffsets.parse("~x")).toThrow(
      "Malformed patch reference '~x': unexpected 'x' in offsets",
    );
  });

  it("rejects counts beyond safe integers", () => {
    expect(() => PatchOffsets.parse("~99999999999999999999")).toThrow(
      "Malformed patch reference '~99999999999999999999': offset '~99999999999999999999' is too large",
    );
  });

  it("takes the longest chain at a position", () => {
    const { offsets, end } = PatchOffsets.take("p0~2^1", 2);
    expect(offsets.toString()).toBe("~2");
    expect(end).toBe(4);
    expect(PatchOffsets.take("p0", 2)).toEqual({ offsets: PatchOffsets.EMPTY, end: 2 });
  });

  it("treats an absent count as 1 when comparing", () => {
    expect(PatchOffsets.parse("~1").equals(PatchOffsets.parse("~"))).toBe(true);
    expect(PatchOffsets.parse("~2").equals(PatchOffsets.parse("~~"))).toBe(false);
    expect(PatchOffsets.parse("+").equals(PatchOffsets.parse("~"))).toBe(false);
  });

  it("concatenates and builds from atoms", () => {
    expect(PatchOffsets.parse("+").concat(PatchOffsets.parse("~2")).toString()).toBe("+~2");
    const built = PatchOffsets.fromAtoms([{ kind: "plus", count: 2 }, { kind: "tilde" }]);
    expect(built.toString()).toBe("+2~");
    expect(built.net()).toBe(1);
    expect(PatchOffsets.fromAtoms([])).toBe(PatchOffsets.EMPTY);
  });
});
