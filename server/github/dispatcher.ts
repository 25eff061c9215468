/**
 * Action Dispatcher
 *
 * Runs exactly one ActionProvider call for a fully resolved intent and turns
 * the outcome into a spoken reply plus a structured intent for the UI.
 *
 * Failures are never retried and never rethrown: the caller gets a fixed,
 * non-technical reply and `{ type: "error" }`. The provider's own error text
 * goes to the log only.
 */

import type { StructuredIntent } from "@shared/schema";
import { Intent, type ResolvedIntent, type TaskRef } from "../intent/types";
import { getErrorMessage } from "../utils/errorHandler";
import type { ActionProvider } from "./actionProvider";
import {
  FAILURE_REPLIES,
  formatCommentAddedReply,
  formatCommentsReply,
  formatDiffReply,
  formatMergeReply,
  formatPRListReply,
  formatStatusReply,
} from "./replies";

export type DispatchSuccess = {
  ok: true;
  reply: string;
  intent: StructuredIntent;
  /** Present for listing intents only; replaces the session's task references. */
  taskRefs?: TaskRef[];
};

export type DispatchFailure = {
  ok: false;
  reply: string;
  intent: { type: "error" };
  error: unknown;
};

export type DispatchResult = DispatchSuccess | DispatchFailure;

export class ActionDispatcher {
  constructor(private readonly provider: ActionProvider) {}

  async dispatch(resolved: ResolvedIntent, credential: string): Promise<DispatchResult> {
    try {
      return await this.execute(resolved, credential);
    } catch (error) {
      console.error(`[Dispatcher] ${resolved.type} failed: ${getErrorMessage(error)}`);
      return {
        ok: false,
        reply: FAILURE_REPLIES[resolved.type],
        intent: { type: "error" },
        error,
      };
    }
  }

  private async execute(resolved: ResolvedIntent, token: string): Promise<DispatchSuccess> {
    switch (resolved.type) {
      case Intent.LIST_PRS_MINE:
      case Intent.LIST_PRS_REVIEW: {
        const kind = resolved.type === Intent.LIST_PRS_REVIEW ? "review" : "mine";
        const prs =
          kind === "review"
            ? await this.provider.listReviewRequests(token)
            : await this.provider.listUserPullRequests(token);
        return {
          ok: true,
          reply: formatPRListReply(prs, kind),
          intent: { type: "show_prs", payload: { prs, kind } },
          taskRefs: prs.map((pr) => ({ prNumber: pr.number, repo: pr.repository })),
        };
      }

      case Intent.GET_PR_COMMENTS: {
        const { repo, prNumber } = resolved.target;
        const comments = await this.provider.getComments(token, resolved.target);
        return {
          ok: true,
          reply: formatCommentsReply(repo, prNumber, comments.length),
          intent: { type: "show_comments", payload: { repo, prNumber, comments } },
        };
      }

      case Intent.MERGE_PR: {
        const { repo, prNumber } = resolved.target;
        await this.provider.mergePullRequest(token, resolved.target, resolved.method);
        return {
          ok: true,
          reply: formatMergeReply(repo, prNumber, resolved.method),
          intent: { type: "merged", payload: { repo, prNumber, method: resolved.method } },
        };
      }

      case Intent.GET_PR_STATUS: {
        const { repo, prNumber } = resolved.target;
        const status = await this.provider.getStatus(token, resolved.target);
        return {
          ok: true,
          reply: formatStatusReply(repo, prNumber, status),
          intent: { type: "show_status", payload: { repo, prNumber, status } },
        };
      }

      case Intent.GET_PR_DIFF: {
        const { repo, prNumber } = resolved.target;
        const diff = await this.provider.getDiff(token, resolved.target);
        return {
          ok: true,
          reply: formatDiffReply(repo, prNumber, diff),
          intent: { type: "show_diff", payload: { repo, prNumber, diff } },
        };
      }

      case Intent.ADD_PR_COMMENT: {
        const { repo, prNumber } = resolved.target;
        await this.provider.addComment(token, resolved.target, resolved.body);
        return {
          ok: true,
          reply: formatCommentAddedReply(repo, prNumber),
          intent: { type: "comment_added", payload: { repo, prNumber } },
        };
      }
    }
  }
}
