import type { ObjectId } from "@patchstack/core";
import { createStackSnapshot, type StackSnapshot } from "../src/index.js";

/**
 * A 40-digit object id starting with `prefix`.
 */
export function fakeId(prefix: string): ObjectId {
  return prefix.padEnd(40, "0");
}

/**
 * applied: p0 p1 p2, unapplied: p3 p4, hidden: h0
 *
 * p3 and p4 share the commit prefix "dead"; h0's commit starts with "1234".
 */
export function sampleStack(): StackSnapshot {
  return createStackSnapshot({
    branch: "main",
    applied: ["p0", "p1", "p2"],
    unapplied: ["p3", "p4"],
    hidden: ["h0"],
    base: fakeId("ba5e"),
    patchCommits: {
      p0: fakeId("a0"),
      p1: fakeId("a1"),
      p2: fakeId("a2"),
      p3: fakeId("dead3"),
      p4: fakeId("dead4"),
      h0: fakeId("1234"),
    },
  });
}
