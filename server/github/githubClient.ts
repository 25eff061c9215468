/**
 * GitHub REST integration layer.
 *
 * Implements ActionProvider against api.github.com with plain fetch.
 * This file MUST NOT contain conversation logic; it only maps REST
 * responses to the shared pull request types.
 *
 * Layer: Integration (I/O only)
 */

import type {
  DiffFile,
  MergeMethod,
  PullRequest,
  PullRequestComment,
  PullRequestDiff,
  PullRequestStatus,
} from "@shared/schema";
import { GITHUB_CONSTANTS, TIMEOUT_CONSTANTS } from "../config/constants";
import type { PullRequestTarget } from "../intent/types";
import { ExternalServiceError, ValidationError } from "../utils/errorHandler";
import { logDebug } from "../utils/logger";
import type { ActionProvider } from "./actionProvider";

type SearchIssuesResponse = {
  items?: Array<{
    number: number;
    title: string;
    html_url: string;
    state?: string;
    user?: { login?: string } | null;
  }>;
};

type ReviewCommentResponse = {
  user?: { login?: string } | null;
  body?: string;
  path?: string;
  line?: number | null;
  created_at?: string;
};

type IssueCommentResponse = {
  user?: { login?: string } | null;
  body?: string;
  created_at?: string;
};

type PullRequestDetailsResponse = {
  mergeable?: boolean | null;
  mergeable_state?: string;
  state?: string;
  head?: { sha?: string };
};

type ReviewResponse = {
  state?: string;
  user?: { login?: string } | null;
};

type CombinedStatusResponse = {
  state?: string;
  statuses?: Array<{ state?: string; context?: string }>;
};

type PullRequestFileResponse = {
  filename: string;
  additions: number;
  deletions: number;
  patch?: string;
};

export type GitHubRestClientOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  mergeTimeoutMs?: number;
};

/**
 * Repository "owner/repo" from a pull request URL such as
 * https://github.com/owner/repo/pull/123.
 */
export function repoFromHtmlUrl(url: string): string {
  const marker = "github.com/";
  const index = url.indexOf(marker);
  if (index === -1) return "";
  const parts = url.slice(index + marker.length).split("/");
  if (parts.length < 3) return "";
  return `${parts[0]}/${parts[1]}`;
}

function splitRepo(repo: string): { owner: string; name: string } {
  const parts = repo.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ValidationError(`invalid repo: ${repo}`);
  }
  return { owner: parts[0], name: parts[1] };
}

export class GitHubRestClient implements ActionProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly mergeTimeoutMs: number;

  constructor(options: GitHubRestClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? GITHUB_CONSTANTS.API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_CONSTANTS.GITHUB_API_TIMEOUT_MS;
    this.mergeTimeoutMs = options.mergeTimeoutMs ?? TIMEOUT_CONSTANTS.GITHUB_MERGE_TIMEOUT_MS;
  }

  private async request(
    token: string,
    method: "GET" | "POST" | "PUT",
    path: string,
    body?: unknown,
    timeoutMs: number = this.timeoutMs,
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      logDebug(`[GitHub] ${method} ${path} response body`, { body: (await response.text()).trim() });
      throw new ExternalServiceError("GitHub", `${method} ${path} failed (${response.status})`, response.status);
    }
    return response;
  }

  private async getJSON<T>(token: string, path: string): Promise<T> {
    const response = await this.request(token, "GET", path);
    return (await response.json()) as T;
  }

  private async searchPullRequests(token: string, query: string): Promise<PullRequest[]> {
    const params = new URLSearchParams({
      q: query,
      per_page: String(GITHUB_CONSTANTS.SEARCH_PAGE_SIZE),
    });
    const data = await this.getJSON<SearchIssuesResponse>(token, `/search/issues?${params.toString()}`);
    return (data.items ?? []).map((item) => ({
      number: item.number,
      title: item.title,
      author: item.user?.login ?? "",
      status: item.state ?? "open",
      url: item.html_url,
      repository: repoFromHtmlUrl(item.html_url),
    }));
  }

  listUserPullRequests(token: string): Promise<PullRequest[]> {
    return this.searchPullRequests(token, "type:pr state:open author:@me");
  }

  listReviewRequests(token: string): Promise<PullRequest[]> {
    return this.searchPullRequests(token, "type:pr state:open review-requested:@me");
  }

  async getComments(token: string, target: PullRequestTarget): Promise<PullRequestComment[]> {
    const { owner, name } = splitRepo(target.repo);
    const review = await this.getJSON<ReviewCommentResponse[]>(
      token,
      `/repos/${owner}/${name}/pulls/${target.prNumber}/comments`,
    );
    const issue = await this.getJSON<IssueCommentResponse[]>(
      token,
      `/repos/${owner}/${name}/issues/${target.prNumber}/comments`,
    );

    const comments: PullRequestComment[] = [];
    for (const rc of review) {
      const comment: PullRequestComment = {
        author: rc.user?.login ?? "",
        body: rc.body ?? "",
        timestamp: rc.created_at ?? "",
        type: "inline",
      };
      if (rc.path) comment.path = rc.path;
      if (typeof rc.line === "number") comment.line = rc.line;
      comments.push(comment);
    }
    for (const ic of issue) {
      comments.push({
        author: ic.user?.login ?? "",
        body: ic.body ?? "",
        timestamp: ic.created_at ?? "",
        type: "general",
      });
    }
    return comments;
  }

  async mergePullRequest(token: string, target: PullRequestTarget, method: MergeMethod): Promise<void> {
    const { owner, name } = splitRepo(target.repo);
    await this.request(
      token,
      "PUT",
      `/repos/${owner}/${name}/pulls/${target.prNumber}/merge`,
      { merge_method: method },
      this.mergeTimeoutMs,
    );
  }

  async getStatus(token: string, target: PullRequestTarget): Promise<PullRequestStatus> {
    const { owner, name } = splitRepo(target.repo);
    const pr = await this.getJSON<PullRequestDetailsResponse>(
      token,
      `/repos/${owner}/${name}/pulls/${target.prNumber}`,
    );
    const reviews = await this.getJSON<ReviewResponse[]>(
      token,
      `/repos/${owner}/${name}/pulls/${target.prNumber}/reviews`,
    );

    const approvals: string[] = [];
    for (const review of reviews) {
      const login = review.user?.login;
      if (review.state?.toUpperCase() === "APPROVED" && login && !approvals.includes(login)) {
        approvals.push(login);
      }
    }

    let checksPassing = 0;
    let checksTotal = 0;
    const failingCheckIds: string[] = [];
    const sha = pr.head?.sha;
    if (sha) {
      const combined = await this.getJSON<CombinedStatusResponse>(
        token,
        `/repos/${owner}/${name}/commits/${sha}/status`,
      );
      const statuses = combined.statuses ?? [];
      checksTotal = statuses.length;
      for (const status of statuses) {
        const state = status.state?.toLowerCase();
        if (state === "success") {
          checksPassing++;
        } else if ((state === "failure" || state === "error") && status.context) {
          failingCheckIds.push(status.context);
        }
      }
    }

    const result: PullRequestStatus = {
      checksPassing,
      checksTotal,
      approvals,
      mergeable: pr.mergeable === true,
      hasConflicts: pr.mergeable_state === "dirty",
    };
    if (failingCheckIds.length > 0) result.failingCheckIds = failingCheckIds;
    return result;
  }

  async getDiff(token: string, target: PullRequestTarget): Promise<PullRequestDiff> {
    const { owner, name } = splitRepo(target.repo);
    const files = await this.getJSON<PullRequestFileResponse[]>(
      token,
      `/repos/${owner}/${name}/pulls/${target.prNumber}/files?per_page=${GITHUB_CONSTANTS.DIFF_PAGE_SIZE}`,
    );

    const diff: PullRequestDiff = { filesChanged: files.length, additions: 0, deletions: 0, files: [] };
    for (const file of files) {
      const entry: DiffFile = { filename: file.filename, additions: file.additions, deletions: file.deletions };
      if (file.patch !== undefined) entry.patch = file.patch;
      diff.files.push(entry);
      diff.additions += file.additions;
      diff.deletions += file.deletions;
    }
    return diff;
  }

  async addComment(token: string, target: PullRequestTarget, body: string): Promise<void> {
    const { owner, name } = splitRepo(target.repo);
    await this.request(
      token,
      "POST",
      `/repos/${owner}/${name}/issues/${target.prNumber}/comments`,
      { body },
    );
  }
}
