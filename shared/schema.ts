import { z } from "zod";

// Conversation transcript
export const MESSAGE_ROLES = ["user", "assistant", "system"] as const;
export type MessageRole = typeof MESSAGE_ROLES[number];

export type ConversationMessage = {
  role: MessageRole;
  content: string;
};

// Pull request data returned by the hosting platform
export type PullRequest = {
  number: number;
  title: string;
  author: string;
  status: string;
  url: string;
  repository: string; // owner/repo
};

export type PullRequestCommentKind = "inline" | "general";

export type PullRequestComment = {
  author: string;
  body: string;
  timestamp: string;
  type: PullRequestCommentKind;
  path?: string;
  line?: number;
};

export type PullRequestStatus = {
  checksPassing: number;
  checksTotal: number;
  approvals: string[];
  mergeable: boolean;
  hasConflicts: boolean;
  failingCheckIds?: string[];
};

export type DiffFile = {
  filename: string;
  additions: number;
  deletions: number;
  patch?: string;
};

export type PullRequestDiff = {
  filesChanged: number;
  additions: number;
  deletions: number;
  files: DiffFile[];
};

export const MERGE_METHODS = ["merge", "squash", "rebase"] as const;
export type MergeMethod = typeof MERGE_METHODS[number];

export type PullRequestListKind = "mine" | "review";

/**
 * Structured intent handed to the visual surface alongside the spoken reply.
 * The `type` discriminates which payload (if any) accompanies it.
 */
export type StructuredIntent =
  | { type: "show_prs"; payload: { prs: PullRequest[]; kind: PullRequestListKind } }
  | { type: "show_comments"; payload: { repo: string; prNumber: number; comments: PullRequestComment[] } }
  | { type: "merged"; payload: { repo: string; prNumber: number; method: MergeMethod } }
  | { type: "show_status"; payload: { repo: string; prNumber: number; status: PullRequestStatus } }
  | { type: "show_diff"; payload: { repo: string; prNumber: number; diff: PullRequestDiff } }
  | { type: "comment_added"; payload: { repo: string; prNumber: number } }
  | { type: "clarify"; payload?: { repo?: string; prNumber?: number; candidates?: string[] } }
  | { type: "require_authorization" }
  | { type: "not_implemented" }
  | { type: "error" };

export type StructuredIntentType = StructuredIntent["type"];

// HTTP contracts
export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, "message is required"),
  system: z.string().trim().optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export type ChatResponse = {
  sessionId: string;
  reply: string;
  intent: StructuredIntent;
};

export const oauthCallbackQuerySchema = z.object({
  code: z.string().min(1, "code is required"),
  state: z.string().min(1, "state is required"),
});

export type GitHubAuthStatus = {
  authenticated: boolean;
  username?: string;
};
