import type {
  MergeMethod,
  PullRequest,
  PullRequestComment,
  PullRequestDiff,
  PullRequestStatus,
} from "@shared/schema";
import type { PullRequestTarget } from "../intent/types";

/**
 * Operations the assistant can perform on the hosting platform.
 * Implementations throw on any provider-level failure; callers do not
 * distinguish failure subtypes.
 */
export interface ActionProvider {
  listUserPullRequests(token: string): Promise<PullRequest[]>;
  listReviewRequests(token: string): Promise<PullRequest[]>;
  getComments(token: string, target: PullRequestTarget): Promise<PullRequestComment[]>;
  mergePullRequest(token: string, target: PullRequestTarget, method: MergeMethod): Promise<void>;
  getStatus(token: string, target: PullRequestTarget): Promise<PullRequestStatus>;
  getDiff(token: string, target: PullRequestTarget): Promise<PullRequestDiff>;
  addComment(token: string, target: PullRequestTarget, body: string): Promise<void>;
}
