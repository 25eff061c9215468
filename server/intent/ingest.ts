/**
 * Classifier Ingestion Boundary
 *
 * Converts the classifier's loosely typed JSON into a `ClassifiedIntent`.
 * Invalid argument values are dropped rather than rejected so that one bad
 * slot never costs the user the others. Unrecognised intent types become
 * NOT_IMPLEMENTED.
 */

import { z } from "zod";
import { MERGE_METHODS } from "@shared/schema";
import { ClassificationError } from "../utils/errorHandler";
import { Intent, isIntent, type ClassifiedIntent, type IntentArgs } from "./types";

function trimmedLower(value: unknown): unknown {
  return typeof value === "string" ? value.trim().toLowerCase() : value;
}

const rawArgsSchema = z.object({
  repo: z.string().trim().min(1).optional().catch(undefined),
  pr_number: z.coerce.number().int().positive().optional().catch(undefined),
  merge_method: z.preprocess(trimmedLower, z.enum(MERGE_METHODS)).optional().catch(undefined),
  body: z.string().trim().min(1).optional().catch(undefined),
});

const rawClassificationSchema = z.object({
  type: z.preprocess(trimmedLower, z.string().min(1)),
  args: z.record(z.unknown()).nullish().catch(undefined),
  confidence: z.coerce.number().catch(0),
  message: z.string().trim().optional().catch(undefined),
});

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function toIntentArgs(raw: Record<string, unknown> | null | undefined): IntentArgs {
  const parsed = rawArgsSchema.parse(raw ?? {});
  const args: IntentArgs = {};
  if (parsed.repo !== undefined) args.repo = parsed.repo;
  if (parsed.pr_number !== undefined) args.prNumber = parsed.pr_number;
  if (parsed.merge_method !== undefined) args.mergeMethod = parsed.merge_method;
  if (parsed.body !== undefined) args.body = parsed.body;
  return args;
}

/**
 * Validate an already-decoded classifier object.
 * Throws ClassificationError when the object has no usable `type`.
 */
export function ingestClassification(raw: unknown): ClassifiedIntent {
  const result = rawClassificationSchema.safeParse(raw);
  if (!result.success) {
    throw new ClassificationError(`malformed classifier output: ${result.error.message}`);
  }

  const { type, args, confidence, message } = result.data;
  const classified: ClassifiedIntent = {
    type: isIntent(type) ? type : Intent.NOT_IMPLEMENTED,
    args: toIntentArgs(args),
    confidence: clampConfidence(confidence),
  };
  if (message) classified.message = message;
  return classified;
}

/**
 * Decode classifier text. Models sometimes wrap the JSON in prose or code
 * fences, so fall back to the outermost {...} span before giving up.
 */
export function parseClassifierText(text: string): ClassifiedIntent {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ClassificationError("empty classifier response");
  }

  try {
    return ingestClassification(JSON.parse(trimmed));
  } catch (error) {
    if (error instanceof ClassificationError) throw error;

    const first = trimmed.indexOf("{");
    const last = trimmed.lastIndexOf("}");
    if (first >= 0 && last > first) {
      try {
        return ingestClassification(JSON.parse(trimmed.slice(first, last + 1)));
      } catch (inner) {
        if (inner instanceof ClassificationError) throw inner;
        throw new ClassificationError("classifier response is not valid JSON", { cause: inner });
      }
    }
    throw new ClassificationError("classifier response is not valid JSON", { cause: error });
  }
}
