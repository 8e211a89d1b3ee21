import {
  AmbiguousCommitPrefixError,
  type Commits,
  createRevisionEngine,
  MissingParentError,
  type ObjectId,
  UnknownCommitError,
  UnsupportedRevisionError,
} from "@patchstack/core";
import { beforeEach, describe, expect, it } from "vitest";
import { createMemoryRepository, type MemoryRepository } from "../src/index.js";
import { makeCommit } from "./test-helper.js";

describe("RevisionEngine", () => {
  let repo: MemoryRepository;
  let root: ObjectId;
  let second: ObjectId;
  let third: ObjectId;
  let side: ObjectId;
  let merge: ObjectId;

  beforeEach(async () => {
    repo = createMemoryRepository();
    root = await repo.commits.storeCommit(makeCommit("root"));
    second = await repo.commits.storeCommit(makeCommit("second", [root]));
    third = await repo.commits.storeCommit(makeCommit("third", [second]));
    side = await repo.commits.storeCommit(makeCommit("side", [root]));
    merge = await repo.commits.storeCommit(makeCommit("merge", [third, side]));
    await repo.refs.set("refs/heads/main", merge);
    await repo.refs.setSymbolic("HEAD", "refs/heads/main");
    await repo.refs.set("refs/tags/v1", second);
  });

  it("resolves refs, short branch and tag names", async () => {
    expect(await repo.revisions.resolveRevision("HEAD")).toBe(merge);
    expect(await repo.revisions.resolveRevision("main")).toBe(merge);
    expect(await repo.revisions.resolveRevision("v1")).toBe(second);
  });

  it("resolves full ids and unique abbreviations", async () => {
    expect(await repo.revisions.resolveRevision(third)).toBe(third);
    expect(await repo.revisions.resolveRevision(third.slice(0, 10))).toBe(third);
  });

  it("follows first parents with ~N", async () => {
    expect(await repo.revisions.resolveRevision("main~")).toBe(third);
    expect(await repo.revisions.resolveRevision("main~3")).toBe(root);
    expect(await repo.revisions.resolveRevision("main~0")).toBe(merge);
  });

  it("selects parents with ^N", async () => {
    expect(await repo.revisions.resolveRevision("main^")).toBe(third);
    expect(await repo.revisions.resolveRevision("main^2")).toBe(side);
    expect(await repo.revisions.resolveRevision("main^0")).toBe(merge);
    expect(await repo.revisions.resolveRevision("main^2~")).toBe(root);
  });

  it("applies a suffix to a resolved commit", async () => {
    expect(await repo.revisions.applySuffix(merge, "~^2")).toBe(root);
    expect(await repo.revisions.applySuffix(merge, "")).toBe(merge);
  });

  it("reports missing parents", async () => {
    await expect(repo.revisions.resolveRevision("v1~2")).rejects.toBeInstanceOf(MissingParentError);
    await expect(repo.revisions.applySuffix(third, "^2")).rejects.toThrow(
      `Commit ${third} has no parent 2`,
    );
  });

  it("reports unknown and unsupported revisions", async () => {
    await expect(repo.revisions.resolveRevision("nope")).rejects.toBeInstanceOf(UnknownCommitError);
    await expect(repo.revisions.resolveRevision("~1")).rejects.toBeInstanceOf(UnknownCommitError);
    await expect(repo.revisions.resolveRevision("HEAD:file.txt")).rejects.toBeInstanceOf(
      UnsupportedRevisionError,
    );
    await expect(repo.revisions.applySuffix(merge, "@{1}")).rejects.toBeInstanceOf(
      UnsupportedRevisionError,
    );
  });
});

describe("RevisionEngine prefix matching", () => {
  const ids = ["abcd000000000000000000000000000000000001", "abcd000000000000000000000000000000000002"];
  const commits: Commits = {
    loadCommit: async () => makeCommit("unused"),
    has: async (id) => ids.includes(id),
    getParents: async () => [],
    findByPrefix: async (prefix) => ids.filter((id) => id.startsWith(prefix)),
  };

  it("rejects ambiguous abbreviations", async () => {
    const engine = createRevisionEngine({ commits });
    await expect(engine.resolveRevision("abcd")).rejects.toBeInstanceOf(AmbiguousCommitPrefixError);
    await expect(engine.resolveRevision("abcd")).rejects.toThrow(
      "Ambiguous commit prefix 'abcd' matches 2 commits",
    );
  });

  it("honors the minimum abbreviation length", async () => {
    const engine = createRevisionEngine({ commits, minPrefixLength: 6 });
    await expect(engine.resolveRevision("abcd")).rejects.toBeInstanceOf(UnknownCommitError);
    expect(await engine.resolveRevision(`${"abcd".padEnd(39, "0")}2`)).toBe(ids[1]);
  });
});
