import { describe, expect, it } from "vitest";
import {
  createStackSnapshot,
  InvalidPatchNameError,
  InvalidStackError,
  UnknownPatchError,
} from "../src/index.js";
import { fakeId, sampleStack } from "./test-helper.js";

const names = (list: readonly { toString(): string }[]) => list.map(String);

describe("StackSnapshot", () => {
  const stack = sampleStack();

  it("orders applied, unapplied and hidden patches", () => {
    expect(names(stack.all())).toEqual(["p0", "p1", "p2", "p3", "p4", "h0"]);
    expect(names(stack.visible())).toEqual(["p0", "p1", "p2", "p3", "p4"]);
    expect(stack.indexOf("p3")).toBe(3);
    expect(stack.indexOf("nope")).toBeUndefined();
  });

  it("maps indices to patches and groups", () => {
    expect(stack.patchAt(5)?.toString()).toBe("h0");
    expect(stack.patchAt(-1)).toBeUndefined();
    expect(stack.patchAt(6)).toBeUndefined();
    expect(stack.groupAt(2)).toBe("applied");
    expect(stack.groupAt(3)).toBe("unapplied");
    expect(stack.groupAt(5)).toBe("hidden");
    expect(stack.groupAt(-1)).toBeUndefined();
    expect(stack.groupOf("p4")).toBe("unapplied");
    expect(stack.groupOf("nope")).toBeUndefined();
  });

  it("maps patches to commits and back", () => {
    expect(stack.commitOf("p1")).toBe(fakeId("a1"));
    expect(stack.patchByCommit(fakeId("dead4"))?.toString()).toBe("p4");
    expect(stack.patchByCommit(fakeId("ba5e"))).toBeUndefined();
    expect(() => stack.commitOf("nope")).toThrow(UnknownPatchError);
  });

  it("derives the top from the last applied patch", () => {
    expect(stack.top).toBe(fakeId("a2"));
    const empty = createStackSnapshot({ branch: "main", base: fakeId("ba5e"), patchCommits: {} });
    expect(empty.top).toBe(fakeId("ba5e"));
    expect(empty.all()).toEqual([]);
  });

  it("accepts patch commits as a map", () => {
    const fromMap = createStackSnapshot({
      branch: "dev",
      applied: ["x"],
      base: fakeId("ba5e"),
      patchCommits: new Map([["x", fakeId("f0")]]),
      top: fakeId("f0"),
    });
    expect(fromMap.commitOf("x")).toBe(fakeId("f0"));
    expect(fromMap.branch).toBe("dev");
  });

  it("rejects duplicate patches", () => {
    expect(() =>
      createStackSnapshot({
        branch: "main",
        applied: ["p0", "p1"],
        hidden: ["p1"],
        base: fakeId("ba5e"),
        patchCommits: { p0: fakeId("a0"), p1: fakeId("a1") },
      }),
    ).toThrow("Patch 'p1' appears more than once in stack main");
  });

  it("rejects patches without a commit", () => {
    expect(() =>
      createStackSnapshot({
        branch: "main",
        unapplied: ["p9"],
        base: fakeId("ba5e"),
        patchCommits: {},
      }),
    ).toThrow(InvalidStackError);
  });

  it("rejects a top that is not the last applied patch", () => {
    expect(() =>
      createStackSnapshot({
        branch: "main",
        applied: ["p0"],
        base: fakeId("ba5e"),
        patchCommits: { p0: fakeId("a0") },
        top: fakeId("ba5e"),
      }),
    ).toThrow(`Top ${fakeId("ba5e")} of stack main does not match its last applied patch`);
  });

  it("rejects invalid patch names", () => {
    expect(() =>
      createStackSnapshot({
        branch: "main",
        applied: ["a/b"],
        base: fakeId("ba5e"),
        patchCommits: { "a/b": fakeId("a0") },
      }),
    ).toThrow(InvalidPatchNameError);
  });
});
