import { describe, expect, it } from "vitest";
import {
  allowedGroups,
  isAllowed,
  LocationConstraint,
  RangeConstraint,
  toLocationConstraint,
} from "../src/index.js";

describe("location constraints", () => {
  it("lists the allowed groups in stack order", () => {
    expect(allowedGroups(LocationConstraint.ALL)).toEqual(["applied", "unapplied", "hidden"]);
    expect(allowedGroups(LocationConstraint.VISIBLE)).toEqual(["applied", "unapplied"]);
    expect(allowedGroups(LocationConstraint.HIDDEN)).toEqual(["hidden"]);
    expect(isAllowed(LocationConstraint.APPLIED, "unapplied")).toBe(false);
  });

  it("maps range constraints to the constraint of their bounds", () => {
    expect(toLocationConstraint(RangeConstraint.ALL)).toBe(LocationConstraint.ALL);
    expect(toLocationConstraint(RangeConstraint.ALL_WITH_APPLIED_BOUNDARY)).toBe(
      LocationConstraint.ALL,
    );
    expect(toLocationConstraint(RangeConstraint.VISIBLE_WITH_APPLIED_BOUNDARY)).toBe(
      LocationConstraint.VISIBLE,
    );
    expect(toLocationConstraint(RangeConstraint.UNAPPLIED)).toBe(LocationConstraint.UNAPPLIED);
  });
});
