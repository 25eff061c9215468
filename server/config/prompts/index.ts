/**
 * Centralized Prompt Configuration
 *
 * All LLM prompts are maintained in this single location so wording changes
 * are reviewed in one place.
 *
 * Structure:
 * - intent.ts: Intent classification prompt and function catalogue
 */

export * from "./intent";
