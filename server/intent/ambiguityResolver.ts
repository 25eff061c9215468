/**
 * Ambiguity Resolver
 *
 * Resolves a bare PR number ("PR 123") to the repository it lives in, using
 * the pull requests from the session's most recent listing.
 */

import type { TaskRef } from "./types";

export type RepoResolution =
  | { kind: "explicit"; repo: string }
  | { kind: "resolved"; repo: string }
  | { kind: "ambiguous"; prNumber: number; candidates: string[] }
  | { kind: "unresolved" };

export function resolveRepository(
  prNumber: number | undefined,
  repo: string | undefined,
  recentRefs: TaskRef[] | undefined,
): RepoResolution {
  if (repo) {
    return { kind: "explicit", repo };
  }
  if (prNumber === undefined || !recentRefs || recentRefs.length === 0) {
    return { kind: "unresolved" };
  }

  const candidates: string[] = [];
  for (const ref of recentRefs) {
    if (ref.prNumber === prNumber && !candidates.includes(ref.repo)) {
      candidates.push(ref.repo);
    }
  }

  if (candidates.length === 0) {
    return { kind: "unresolved" };
  }
  if (candidates.length === 1) {
    return { kind: "resolved", repo: candidates[0] };
  }
  return { kind: "ambiguous", prNumber, candidates };
}

export function formatDisambiguationQuestion(prNumber: number, candidates: string[]): string {
  return `Did you mean PR ${prNumber} in ${candidates.join(" or ")}?`;
}
