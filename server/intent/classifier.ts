/**
 * Intent Classifier
 *
 * Sends the conversation transcript and the function catalogue to the
 * chat completions API and validates the JSON it returns. Nothing is retried;
 * every failure becomes a ClassificationError.
 */

import { OpenAI } from "openai";
import type { ConversationMessage } from "@shared/schema";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { CLASSIFIER_STYLE, MODEL_ASSIGNMENTS } from "../config/models";
import { INTENT_CLASSIFICATION_PROMPT, INTENT_FUNCTIONS } from "../config/prompts";
import { ClassificationError, getErrorMessage } from "../utils/errorHandler";
import { parseClassifierText } from "./ingest";
import type { ClassifiedIntent } from "./types";

export interface IntentClassifier {
  classify(transcript: ConversationMessage[]): Promise<ClassifiedIntent>;
}

export type OpenAIIntentClassifierOptions = {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  /** Prebuilt client; when omitted one is created on first use from `apiKey`. */
  client?: OpenAI;
};

export function formatTranscript(transcript: ConversationMessage[]): string {
  if (transcript.length === 0) return "(no previous turns)";
  return transcript.map((m) => `${m.role.toUpperCase()}: ${m.content}`).join("\n");
}

export function buildClassifierSystemPrompt(transcript: ConversationMessage[]): string {
  return `${INTENT_CLASSIFICATION_PROMPT}

FUNCTIONS:
${JSON.stringify(INTENT_FUNCTIONS, null, 2)}

TRANSCRIPT:
${formatTranscript(transcript)}`;
}

export class OpenAIIntentClassifier implements IntentClassifier {
  private client: OpenAI | null;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: OpenAIIntentClassifierOptions = {}) {
    this.client = options.client ?? null;
    this.apiKey = options.apiKey;
    this.model = options.model ?? MODEL_ASSIGNMENTS.INTENT_CLASSIFICATION;
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_CONSTANTS.CLASSIFIER_TIMEOUT_MS;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new ClassificationError("OPENAI_API_KEY is not set");
      }
      this.client = new OpenAI({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async classify(transcript: ConversationMessage[]): Promise<ClassifiedIntent> {
    const client = this.getClient();

    let content: string | null | undefined;
    try {
      const response = await client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "system", content: buildClassifierSystemPrompt(transcript) }],
          temperature: CLASSIFIER_STYLE.TEMPERATURE,
          max_tokens: CLASSIFIER_STYLE.MAX_TOKENS,
          response_format: { type: "json_object" },
        },
        { timeout: this.timeoutMs },
      );
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw new ClassificationError(`classifier request failed: ${getErrorMessage(error)}`, { cause: error });
    }

    const classified = parseClassifierText(content ?? "");
    console.log(
      `[IntentClassifier] ${classified.type} (confidence ${classified.confidence.toFixed(2)}) args=${Object.keys(classified.args).join(",") || "none"}`,
    );
    return classified;
  }
}
