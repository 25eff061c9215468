import express, { type NextFunction, type Request, type Response } from "express";
import { ConversationService } from "./assistant/conversationService";
import { CredentialStore } from "./auth/credentialStore";
import { GitHubOAuth } from "./auth/githubOAuth";
import { loadSettings } from "./config/settings";
import { ActionDispatcher } from "./github/dispatcher";
import { GitHubRestClient } from "./github/githubClient";
import { OpenAIIntentClassifier } from "./intent/classifier";
import { IntentEngine } from "./intent/engine";
import { addSecurityHeaders, cors } from "./middleware/security";
import { registerRoutes } from "./routes";
import { SessionStore } from "./session/sessionStore";
import { getErrorMessage, getErrorStatusCode, logError } from "./utils/errorHandler";
import { setLogLevel } from "./utils/logger";

async function main(): Promise<void> {
  const settings = loadSettings();
  setLogLevel(settings.logLevel);

  const store = new SessionStore();
  const credentials = new CredentialStore(settings.github.staticToken);
  const provider = new GitHubRestClient();
  const engine = new IntentEngine({
    store,
    dispatcher: new ActionDispatcher(provider),
    defaultRepoOwner: settings.github.defaultRepoOwner,
  });
  const classifier = new OpenAIIntentClassifier({
    apiKey: settings.openaiApiKey,
    model: settings.openaiModel,
  });
  const conversation = new ConversationService({ store, credentials, classifier, engine });

  const { clientId, clientSecret } = settings.github;
  const oauth =
    clientId && clientSecret
      ? new GitHubOAuth({
          clientId,
          clientSecret,
          redirectUrl: settings.github.redirectUrl,
          scopes: settings.github.scopes,
        })
      : undefined;
  if (!oauth) {
    console.log("[Server] GitHub OAuth not configured; only GITHUB_TOKEN can authorize requests");
  }

  const app = express();
  if (settings.trustProxy) {
    app.set("trust proxy", 1);
  }
  app.use(cors(settings.allowedOrigin));
  app.use(addSecurityHeaders);
  app.use(express.json());

  const server = await registerRoutes(app, {
    store,
    credentials,
    conversation,
    provider,
    oauth,
    frontendUrl: settings.frontendUrl,
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = getErrorStatusCode(err);
    if (status >= 500) {
      logError("Server", err);
    }
    res.status(status).json({ error: getErrorMessage(err) });
  });

  server.listen(settings.port, () => {
    console.log(`[Server] Listening on port ${settings.port} (${settings.nodeEnv})`);
  });
}

main().catch((error) => {
  logError("Server", error);
  process.exit(1);
});
