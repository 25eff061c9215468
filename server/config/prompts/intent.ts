/**
 * Intent Classification Prompts
 *
 * System prompt and function catalogue for the pull request intent classifier.
 * The classifier sees the whole transcript so it can carry arguments across turns.
 */

export type IntentFunctionSpec = {
  name: string;
  description: string;
  args: Record<string, string>;
};

export const INTENT_FUNCTIONS: IntentFunctionSpec[] = [
  {
    name: "list_prs_mine",
    description: "List the user's own open pull requests.",
    args: {},
  },
  {
    name: "list_prs_review",
    description: "List open pull requests where the user's review is requested.",
    args: {},
  },
  {
    name: "get_pr_comments",
    description: "Read the comments on one pull request.",
    args: { repo: "owner/repo or bare repo name", pr_number: "integer" },
  },
  {
    name: "merge_pr",
    description: "Merge one pull request.",
    args: { repo: "owner/repo or bare repo name", pr_number: "integer", merge_method: "merge | squash | rebase (optional)" },
  },
  {
    name: "get_pr_status",
    description: "Check CI checks, approvals and mergeability of one pull request.",
    args: { repo: "owner/repo or bare repo name", pr_number: "integer" },
  },
  {
    name: "get_pr_diff",
    description: "Summarise the files changed by one pull request.",
    args: { repo: "owner/repo or bare repo name", pr_number: "integer" },
  },
  {
    name: "add_pr_comment",
    description: "Post a general comment on one pull request.",
    args: { repo: "owner/repo or bare repo name", pr_number: "integer", body: "comment text" },
  },
  {
    name: "clarify",
    description: "The request is about pull requests but you cannot tell what the user wants. Put a short question in message.",
    args: { repo: "optional", pr_number: "optional" },
  },
  {
    name: "not_implemented",
    description: "The user wants something none of the functions above can do. Put a short, friendly decline in message.",
    args: {},
  },
];

export const INTENT_CLASSIFICATION_PROMPT = `You are the intent classifier for a voice assistant that manages GitHub pull requests.

YOUR JOB: read the transcript and pick exactly ONE function from the catalogue, with its arguments.

RULES:
- Use the whole transcript. If an earlier turn already named the repository or the PR number, include it in args.
- Never invent a repository or a PR number the user did not say.
- "PR 12", "pull request twelve", "number 12" all mean pr_number 12.
- If the user answers a question the assistant just asked (e.g. "it's in acme/widgets"), return "clarify" with the args you extracted; the application merges them into the open request.
- If multiple repositories share the same PR number, ask a targeted choice.
- Anything unrelated to pull requests is "not_implemented".

OUTPUT: ONLY a JSON object of the form
{"type": "<function name>", "args": {...}, "confidence": <0..1>, "message": "<optional short text>"}`;
