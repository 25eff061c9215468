/**
 * Application Constants
 *
 * Centralized configuration values used across the application.
 * Consolidates magic numbers and hardcoded values for easier maintenance.
 */

/**
 * Session store limits
 */
export const SESSION_CONSTANTS = {
  /**
   * Maximum conversation messages kept per session (oldest evicted first).
   * Also bounds the transcript handed to the classifier.
   */
  HISTORY_LIMIT: 40,

  /**
   * How long the pull requests from the last listing can be used to
   * resolve a bare PR number to its repository (milliseconds).
   */
  TASK_REF_TTL_MS: 7 * 60 * 1000, // 7 minutes

  /**
   * How long a partially filled request waits for the missing pieces (milliseconds).
   */
  PENDING_INTENT_TTL_MS: 7 * 60 * 1000, // 7 minutes
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Intent classifier call (milliseconds).
   */
  CLASSIFIER_TIMEOUT_MS: 10000, // 10 seconds

  /**
   * Standard GitHub API call (milliseconds).
   */
  GITHUB_API_TIMEOUT_MS: 20000, // 20 seconds

  /**
   * Merge calls run checks on GitHub's side and take longer.
   */
  GITHUB_MERGE_TIMEOUT_MS: 25000, // 25 seconds
} as const;

export const REPLY_CONSTANTS = {
  /**
   * Pull requests read out loud in a listing reply; the rest are summarised as "and N more".
   */
  MAX_SPOKEN_PRS: 5,
} as const;

export const GITHUB_CONSTANTS = {
  API_BASE_URL: "https://api.github.com",
  AUTHORIZE_URL: "https://github.com/login/oauth/authorize",
  ACCESS_TOKEN_URL: "https://github.com/login/oauth/access_token",
  SEARCH_PAGE_SIZE: 20,
  DIFF_PAGE_SIZE: 100,
} as const;
