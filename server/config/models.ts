/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for model selections. OPENAI_MODEL overrides the
 * classifier model at runtime (see settings.ts).
 *
 * FAST_CLASSIFICATION - gpt-4o-mini
 *   Speed: ~100-300ms | Cost: Lowest | Quality: Good for structured tasks
 *   Use for: Intent classification and argument extraction
 */

export const LLM_MODELS = {
  FAST_CLASSIFICATION: "gpt-4o-mini",
} as const;

export const MODEL_ASSIGNMENTS = {
  INTENT_CLASSIFICATION: LLM_MODELS.FAST_CLASSIFICATION,
} as const;

export const CLASSIFIER_STYLE = {
  TEMPERATURE: 0.1,
  MAX_TOKENS: 300,
} as const;
