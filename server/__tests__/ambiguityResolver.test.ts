import { describe, it, expect } from "vitest";
import { formatDisambiguationQuestion, resolveRepository } from "../intent/ambiguityResolver";
import type { TaskRef } from "../intent/types";

const RECENT: TaskRef[] = [
  { prNumber: 7, repo: "A/x" },
  { prNumber: 7, repo: "B/y" },
  { prNumber: 9, repo: "A/x" },
];

describe("resolveRepository", () => {
  it("is ambiguous when the number appears in several repositories", () => {
    expect(resolveRepository(7, undefined, RECENT)).toEqual({
      kind: "ambiguous",
      prNumber: 7,
      candidates: ["A/x", "B/y"],
    });
  });

  it("resolves a number that appears in exactly one repository", () => {
    expect(resolveRepository(9, undefined, RECENT)).toEqual({ kind: "resolved", repo: "A/x" });
  });

  it("is unresolved when nothing matches", () => {
    expect(resolveRepository(42, undefined, RECENT)).toEqual({ kind: "unresolved" });
  });

  it("keeps an explicitly stated repository", () => {
    expect(resolveRepository(7, "C/z", RECENT)).toEqual({ kind: "explicit", repo: "C/z" });
  });

  it("is unresolved without recent references", () => {
    expect(resolveRepository(7, undefined, undefined)).toEqual({ kind: "unresolved" });
    expect(resolveRepository(7, undefined, [])).toEqual({ kind: "unresolved" });
  });

  it("is unresolved without a number", () => {
    expect(resolveRepository(undefined, undefined, RECENT)).toEqual({ kind: "unresolved" });
  });

  it("lists a repository once even if the listing repeats it", () => {
    const refs: TaskRef[] = [...RECENT, { prNumber: 7, repo: "A/x" }];
    expect(resolveRepository(7, undefined, refs)).toEqual({
      kind: "ambiguous",
      prNumber: 7,
      candidates: ["A/x", "B/y"],
    });
  });
});

describe("formatDisambiguationQuestion", () => {
  it("names every candidate", () => {
    expect(formatDisambiguationQuestion(7, ["A/x", "B/y"])).toBe("Did you mean PR 7 in A/x or B/y?");
    expect(formatDisambiguationQuestion(3, ["A/x", "B/y", "C/z"])).toBe("Did you mean PR 3 in A/x or B/y or C/z?");
  });
});
