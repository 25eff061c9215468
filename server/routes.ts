import type { Express, Request, Response } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import {
  MERGE_METHODS,
  chatRequestSchema,
  oauthCallbackQuerySchema,
  type ChatRequest,
  type ChatResponse,
  type GitHubAuthStatus,
} from "@shared/schema";
import type { ConversationService } from "./assistant/conversationService";
import type { CredentialStore } from "./auth/credentialStore";
import type { GitHubOAuth } from "./auth/githubOAuth";
import type { ActionProvider } from "./github/actionProvider";
import type { PullRequestTarget } from "./intent/types";
import { validate } from "./middleware/validation";
import { getOrCreateSessionId, getSessionId } from "./session/sessionId";
import type { SessionStore } from "./session/sessionStore";
import { AuthenticationError, handleRouteError } from "./utils/errorHandler";

export type RouteDeps = {
  store: SessionStore;
  credentials: CredentialStore;
  conversation: ConversationService;
  provider: ActionProvider;
  /** Absent when GITHUB_CLIENT_ID / GITHUB_CLIENT_SECRET are not configured. */
  oauth?: GitHubOAuth;
  frontendUrl: string;
};

type Handler = (req: Request, res: Response) => Promise<void> | void;

const pullRequestParamsSchema = z.object({
  owner: z.string().min(1),
  repo: z.string().min(1),
  number: z.coerce.number().int().positive(),
});

const addCommentBodySchema = z.object({
  body: z.string().trim().min(1, "body is required"),
});

const mergeBodySchema = z.object({
  merge_method: z.enum(MERGE_METHODS).default("merge"),
});

function parseTarget(params: unknown): PullRequestTarget {
  const { owner, repo, number } = pullRequestParamsSchema.parse(params);
  return { repo: `${owner}/${repo}`, prNumber: number };
}

function requireCredential(deps: RouteDeps, sessionId: string): string {
  const token = deps.credentials.get(sessionId);
  if (!token) {
    throw new AuthenticationError("GitHub account not connected");
  }
  return token;
}

// Conversation

export function createChatHandler(deps: RouteDeps): Handler {
  return async (req, res) => {
    const sessionId = getOrCreateSessionId(req, res);
    try {
      const { message, system }: ChatRequest = chatRequestSchema.parse(req.body);
      const outcome = await deps.conversation.handleUtterance(sessionId, message, system);
      const response: ChatResponse = { sessionId, reply: outcome.reply, intent: outcome.intent };
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, "Chat");
    }
  };
}

// GitHub authorization

export function createGitHubAuthHandler(deps: RouteDeps): Handler {
  return (req, res) => {
    if (!deps.oauth) {
      res.status(400).json({ error: "github oauth not configured" });
      return;
    }
    const sessionId = getOrCreateSessionId(req, res);
    const state = deps.store.beginAuthHandshake(sessionId);
    res.json({ url: deps.oauth.authorizeUrl(state), sessionId });
  };
}

export function createGitHubCallbackHandler(deps: RouteDeps): Handler {
  return async (req, res) => {
    const { oauth, store } = deps;
    if (!oauth) {
      res.status(400).json({ error: "github oauth not configured" });
      return;
    }

    const query = oauthCallbackQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: "missing state or code" });
      return;
    }
    const { code, state } = query.data;

    const sessionId = store.resolveAuthHandshake(state);
    if (!sessionId) {
      console.warn("[GitHubAuth] Callback with unknown state");
      res.status(400).json({ error: "invalid oauth state" });
      return;
    }

    // Held under the session lock: a concurrent callback for this session
    // finds the handshake already consumed.
    await store.withSession(sessionId, async () => {
      if (store.getAuthHandshake(sessionId) !== state) {
        console.warn("[GitHubAuth] Callback with stale state");
        res.status(400).json({ error: "invalid oauth state" });
        return;
      }

      let accessToken: string;
      try {
        accessToken = await oauth.exchangeCode(code);
      } catch (error) {
        handleRouteError(res, error, "GitHubAuth");
        return;
      }

      let username: string;
      try {
        username = await oauth.fetchUsername(accessToken);
      } catch (error) {
        console.error("[GitHubAuth] Failed to fetch username:", error);
        res.status(500).json({ error: "failed to fetch GitHub username" });
        return;
      }

      deps.credentials.set(sessionId, accessToken);
      store.setResolvedIdentity(sessionId, username);
      store.clearAuthHandshake(sessionId);
      console.log(`[GitHubAuth] Connected ${username} for session ${sessionId}`);

      res.redirect(302, `${deps.frontendUrl}?githubAuth=success`);
    });
  };
}

export function createGitHubStatusHandler(deps: RouteDeps): Handler {
  return (req, res) => {
    const sessionId = getSessionId(req);
    const status: GitHubAuthStatus = {
      authenticated: sessionId
        ? deps.credentials.get(sessionId) !== undefined
        : deps.credentials.hasStaticToken(),
    };
    const username = sessionId ? deps.store.getResolvedIdentity(sessionId) : undefined;
    if (username) status.username = username;
    res.json(status);
  };
}

// Direct pull request endpoints for the visual surface

export function createPullRequestHandlers(deps: RouteDeps) {
  const { provider } = deps;

  const withToken =
    (context: string, fn: (token: string, req: Request, res: Response) => Promise<void>): Handler =>
    async (req, res) => {
      try {
        const token = requireCredential(deps, getOrCreateSessionId(req, res));
        await fn(token, req, res);
      } catch (error) {
        handleRouteError(res, error, context);
      }
    };

  return {
    listMine: withToken("PRsMine", async (token, _req, res) => {
      res.json(await provider.listUserPullRequests(token));
    }),
    listReview: withToken("PRsReview", async (token, _req, res) => {
      res.json(await provider.listReviewRequests(token));
    }),
    getComments: withToken("PRComments", async (token, req, res) => {
      res.json(await provider.getComments(token, parseTarget(req.params)));
    }),
    addComment: withToken("AddPRComment", async (token, req, res) => {
      const target = parseTarget(req.params);
      const { body } = addCommentBodySchema.parse(req.body);
      await provider.addComment(token, target, body);
      res.status(201).json({ ok: true });
    }),
    merge: withToken("MergePR", async (token, req, res) => {
      const target = parseTarget(req.params);
      const { merge_method } = mergeBodySchema.parse(req.body ?? {});
      await provider.mergePullRequest(token, target, merge_method);
      res.json({ merged: true, method: merge_method });
    }),
    getStatus: withToken("PRStatus", async (token, req, res) => {
      res.json(await provider.getStatus(token, parseTarget(req.params)));
    }),
    getDiff: withToken("PRDiff", async (token, req, res) => {
      res.json(await provider.getDiff(token, parseTarget(req.params)));
    }),
  };
}

export async function registerRoutes(app: Express, deps: RouteDeps): Promise<Server> {
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/api/chat", validate({ body: chatRequestSchema }), createChatHandler(deps));

  app.get("/api/github/auth", createGitHubAuthHandler(deps));
  app.get("/api/github/callback", createGitHubCallbackHandler(deps));
  app.get("/api/github/status", createGitHubStatusHandler(deps));

  const prs = createPullRequestHandlers(deps);
  app.get("/api/github/prs/mine", prs.listMine);
  app.get("/api/github/prs/review", prs.listReview);
  app.get("/api/github/repos/:owner/:repo/prs/:number/comments", prs.getComments);
  app.post("/api/github/repos/:owner/:repo/prs/:number/comments", prs.addComment);
  app.post("/api/github/repos/:owner/:repo/prs/:number/merge", prs.merge);
  app.get("/api/github/repos/:owner/:repo/prs/:number/status", prs.getStatus);
  app.get("/api/github/repos/:owner/:repo/prs/:number/diff", prs.getDiff);

  const httpServer = createServer(app);
  return httpServer;
}
