/**
 * Intent Types
 *
 * Canonical intent vocabulary shared by the classifier boundary, the slot-filling
 * merger and the resolution engine.
 *
 * Classifier output is loosely typed; it is converted into `ClassifiedIntent`
 * (see ingest.ts) before anything else looks at it. Once every required slot is
 * filled the request becomes a `ResolvedIntent`, one variant per action.
 */

import type { MergeMethod } from "@shared/schema";

export enum Intent {
  LIST_PRS_MINE = "list_prs_mine",
  LIST_PRS_REVIEW = "list_prs_review",
  GET_PR_COMMENTS = "get_pr_comments",
  MERGE_PR = "merge_pr",
  GET_PR_STATUS = "get_pr_status",
  GET_PR_DIFF = "get_pr_diff",
  ADD_PR_COMMENT = "add_pr_comment",
  CLARIFY = "clarify",
  UNKNOWN = "unknown",
  NOT_IMPLEMENTED = "not_implemented",
}

export type ListingIntent = Intent.LIST_PRS_MINE | Intent.LIST_PRS_REVIEW;

/** Intents that act on one pull request and need repo + number. */
export type TargetedIntent =
  | Intent.GET_PR_COMMENTS
  | Intent.MERGE_PR
  | Intent.GET_PR_STATUS
  | Intent.GET_PR_DIFF
  | Intent.ADD_PR_COMMENT;

export type ActionIntent = ListingIntent | TargetedIntent;

export const LISTING_INTENTS: readonly ListingIntent[] = [Intent.LIST_PRS_MINE, Intent.LIST_PRS_REVIEW];

export const TARGETED_INTENTS: readonly TargetedIntent[] = [
  Intent.GET_PR_COMMENTS,
  Intent.MERGE_PR,
  Intent.GET_PR_STATUS,
  Intent.GET_PR_DIFF,
  Intent.ADD_PR_COMMENT,
];

const INTENT_VALUES = new Set<string>(Object.values(Intent));

export function isIntent(value: string): value is Intent {
  return INTENT_VALUES.has(value);
}

export function isListingIntent(intent: Intent): intent is ListingIntent {
  return LISTING_INTENTS.some((listing) => listing === intent);
}

export function isTargetedIntent(intent: Intent): intent is TargetedIntent {
  return TARGETED_INTENTS.some((targeted) => targeted === intent);
}

export function isActionIntent(intent: Intent): intent is ActionIntent {
  return isListingIntent(intent) || isTargetedIntent(intent);
}

/**
 * Slots an intent may carry. Every key is optional; which ones are required
 * depends on the intent type.
 */
export type IntentArgs = {
  repo?: string;
  prNumber?: number;
  mergeMethod?: MergeMethod;
  body?: string;
};

export type IntentArgKey = keyof IntentArgs;

export const INTENT_ARG_KEYS: readonly IntentArgKey[] = ["repo", "prNumber", "mergeMethod", "body"];

/** Classifier judgment after validation at the ingestion boundary. */
export type ClassifiedIntent = {
  type: Intent;
  args: IntentArgs;
  confidence: number;
  message?: string;
};

export type PullRequestTarget = {
  repo: string;
  prNumber: number;
};

export type ResolvedIntent =
  | { type: Intent.LIST_PRS_MINE }
  | { type: Intent.LIST_PRS_REVIEW }
  | { type: Intent.GET_PR_COMMENTS; target: PullRequestTarget }
  | { type: Intent.MERGE_PR; target: PullRequestTarget; method: MergeMethod }
  | { type: Intent.GET_PR_STATUS; target: PullRequestTarget }
  | { type: Intent.GET_PR_DIFF; target: PullRequestTarget }
  | { type: Intent.ADD_PR_COMMENT; target: PullRequestTarget; body: string };

/** A pull request seen in the most recent listing. */
export type TaskRef = {
  prNumber: number;
  repo: string;
};
