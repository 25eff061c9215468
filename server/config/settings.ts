/**
 * Runtime Settings
 *
 * Reads process configuration once from the environment. Everything optional
 * has a default so the server can start locally with only OPENAI_API_KEY.
 */

import { z } from "zod";
import { MODEL_ASSIGNMENTS } from "./models";

const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off"]);

function optionalString() {
  return z
    .string()
    .optional()
    .transform((v) => {
      const trimmed = v?.trim();
      return trimmed ? trimmed : undefined;
    });
}

function envList(defaults: string[]) {
  return z
    .string()
    .optional()
    .transform((v) => {
      const parts = (v ?? "")
        .split(",")
        .map((p) => p.trim())
        .filter(Boolean);
      return parts.length > 0 ? parts : defaults;
    });
}

function envBoolean(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((v) => {
      const normalized = v?.trim().toLowerCase() ?? "";
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      return defaultValue;
    });
}

const settingsSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).catch("info"),
  OPENAI_API_KEY: optionalString(),
  OPENAI_MODEL: optionalString().transform((v) => v ?? MODEL_ASSIGNMENTS.INTENT_CLASSIFICATION),
  ALLOWED_ORIGIN: optionalString().transform((v) => v ?? "*"),
  FRONTEND_URL: optionalString().transform((v) => v ?? "http://localhost:5173"),
  GITHUB_CLIENT_ID: optionalString(),
  GITHUB_CLIENT_SECRET: optionalString(),
  GITHUB_REDIRECT_URL: optionalString().transform((v) => v ?? "http://localhost:8080/api/github/callback"),
  GITHUB_OAUTH_SCOPES: envList(["repo", "read:user"]),
  GITHUB_TOKEN: optionalString(),
  DEFAULT_REPO_OWNER: optionalString(),
  TRUST_PROXY: envBoolean(false),
});

export type Settings = {
  port: number;
  nodeEnv: string;
  logLevel: "debug" | "info" | "warn" | "error";
  openaiApiKey?: string;
  openaiModel: string;
  allowedOrigin: string;
  frontendUrl: string;
  github: {
    clientId?: string;
    clientSecret?: string;
    redirectUrl: string;
    scopes: string[];
    staticToken?: string;
    defaultRepoOwner?: string;
  };
  trustProxy: boolean;
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.parse(env);

  if (!parsed.OPENAI_API_KEY) {
    console.warn("[Settings] OPENAI_API_KEY is not set; classification will fail until provided");
  }

  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiModel: parsed.OPENAI_MODEL,
    allowedOrigin: parsed.ALLOWED_ORIGIN,
    frontendUrl: parsed.FRONTEND_URL,
    github: {
      clientId: parsed.GITHUB_CLIENT_ID,
      clientSecret: parsed.GITHUB_CLIENT_SECRET,
      redirectUrl: parsed.GITHUB_REDIRECT_URL,
      scopes: parsed.GITHUB_OAUTH_SCOPES,
      staticToken: parsed.GITHUB_TOKEN,
      defaultRepoOwner: parsed.DEFAULT_REPO_OWNER,
    },
    trustProxy: parsed.TRUST_PROXY,
  };
}
