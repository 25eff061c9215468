/**
 * GitHub OAuth (web application flow)
 *
 * 1. authorizeUrl() - browser is sent to GitHub with a single-use state token
 * 2. exchangeCode() - callback trades the code for an access token
 * 3. fetchUsername() - login of the token's owner, used to qualify bare repo names
 */

import { z } from "zod";
import { GITHUB_CONSTANTS, TIMEOUT_CONSTANTS } from "../config/constants";
import { AuthenticationError, ExternalServiceError } from "../utils/errorHandler";

export type GitHubOAuthConfig = {
  clientId: string;
  clientSecret: string;
  redirectUrl: string;
  scopes: string[];
};

const accessTokenResponseSchema = z.object({
  access_token: z.string().min(1).optional(),
  token_type: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

const userResponseSchema = z.object({
  login: z.string().min(1),
});

export class GitHubOAuth {
  constructor(
    private readonly config: GitHubOAuthConfig,
    private readonly apiBaseUrl: string = GITHUB_CONSTANTS.API_BASE_URL,
  ) {}

  authorizeUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUrl,
      scope: this.config.scopes.join(" "),
      state,
    });
    return `${GITHUB_CONSTANTS.AUTHORIZE_URL}?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<string> {
    const response = await fetch(GITHUB_CONSTANTS.ACCESS_TOKEN_URL, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        code,
        redirect_uri: this.config.redirectUrl,
      }),
      signal: AbortSignal.timeout(TIMEOUT_CONSTANTS.GITHUB_API_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new ExternalServiceError("GitHub OAuth", `token exchange failed (${response.status})`, response.status);
    }

    const data = accessTokenResponseSchema.parse(await response.json());
    if (!data.access_token) {
      throw new AuthenticationError(`GitHub token exchange rejected: ${data.error ?? "no access token"}`);
    }
    return data.access_token;
  }

  async fetchUsername(accessToken: string): Promise<string> {
    const response = await fetch(`${this.apiBaseUrl}/user`, {
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: "application/vnd.github+json",
      },
      signal: AbortSignal.timeout(TIMEOUT_CONSTANTS.GITHUB_API_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new ExternalServiceError("GitHub", `failed to fetch user (${response.status})`, response.status);
    }
    return userResponseSchema.parse(await response.json()).login;
  }
}
