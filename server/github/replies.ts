/**
 * Spoken replies for GitHub actions.
 *
 * Everything here ends up in text-to-speech, so replies stay short and never
 * contain raw API output.
 */

import type {
  MergeMethod,
  PullRequest,
  PullRequestDiff,
  PullRequestListKind,
  PullRequestStatus,
} from "@shared/schema";
import { REPLY_CONSTANTS } from "../config/constants";
import { Intent, type ActionIntent } from "../intent/types";

export const AUTH_REQUIRED_REPLY =
  "Please connect your GitHub account to use this application. This service helps you manage GitHub pull requests - fetching, listing, merging, and viewing PR comments.";

export const DEFAULT_CLARIFY_REPLY =
  "Mind giving me a tiny bit more detail? I promise I listen better than your rubber duck.";

export const NOT_IMPLEMENTED_REPLY = "I haven't learned that trick yet, but I'm practicing!";

export const FAILURE_REPLIES: Record<ActionIntent, string> = {
  [Intent.LIST_PRS_MINE]:
    "I couldn't fetch your pull requests from GitHub right now. This might be a temporary issue with GitHub's API. Try again in a moment?",
  [Intent.LIST_PRS_REVIEW]:
    "I couldn't fetch your pull requests from GitHub right now. This might be a temporary issue with GitHub's API. Try again in a moment?",
  [Intent.GET_PR_COMMENTS]:
    "I couldn't retrieve the PR comments from GitHub. This could be a temporary GitHub API issue or the PR might not exist. Mind trying again?",
  [Intent.MERGE_PR]:
    "I couldn't merge the pull request on GitHub. This could be due to failing checks, merge conflicts, or insufficient permissions. Would you like me to check the PR status?",
  [Intent.GET_PR_STATUS]:
    "I couldn't check the status of that pull request on GitHub. The PR might not exist or GitHub may be having trouble. Want to try again?",
  [Intent.GET_PR_DIFF]:
    "I couldn't load the changes for that pull request from GitHub. Mind trying again in a moment?",
  [Intent.ADD_PR_COMMENT]:
    "I couldn't post your comment on GitHub. You might not have permission on that repository. Want me to try again?",
};

export function formatPRListReply(prs: PullRequest[], kind: PullRequestListKind): string {
  if (prs.length === 0) {
    return kind === "review"
      ? "You have no GitHub pull requests to review at the moment."
      : "You have no open pull requests on GitHub.";
  }

  const intro =
    kind === "review"
      ? `You have ${prs.length} GitHub pull request(s) to review. `
      : `You have ${prs.length} GitHub pull request(s). `;

  const spoken = prs
    .slice(0, REPLY_CONSTANTS.MAX_SPOKEN_PRS)
    .map((pr) => `#${pr.number} ${pr.title} (${pr.repository})`)
    .join("; ");

  const remaining = prs.length - REPLY_CONSTANTS.MAX_SPOKEN_PRS;
  if (remaining > 0) {
    return `${intro}${spoken}; and ${remaining} more.`;
  }
  return `${intro}${spoken}`;
}

export function formatCommentsReply(repo: string, prNumber: number, count: number): string {
  return `I found ${count} comment(s) on GitHub pull request ${repo}#${prNumber}.`;
}

export function formatMergeReply(repo: string, prNumber: number, method: MergeMethod): string {
  return `Successfully merged GitHub pull request ${repo}#${prNumber} using ${method} method.`;
}

export function formatStatusReply(repo: string, prNumber: number, status: PullRequestStatus): string {
  const parts: string[] = [];
  parts.push(
    status.checksTotal === 0
      ? "no checks reported"
      : `${status.checksPassing} of ${status.checksTotal} checks passing`,
  );
  parts.push(`${status.approvals.length} approval(s)`);
  if (status.hasConflicts) {
    parts.push("it has merge conflicts");
  } else if (status.mergeable) {
    parts.push("it is ready to merge");
  } else {
    parts.push("it is not mergeable yet");
  }
  return `GitHub pull request ${repo}#${prNumber}: ${parts.join(", ")}.`;
}

export function formatDiffReply(repo: string, prNumber: number, diff: PullRequestDiff): string {
  return `GitHub pull request ${repo}#${prNumber} changes ${diff.filesChanged} file(s) with ${diff.additions} addition(s) and ${diff.deletions} deletion(s).`;
}

export function formatCommentAddedReply(repo: string, prNumber: number): string {
  return `I added your comment to GitHub pull request ${repo}#${prNumber}.`;
}
