/**
 * Slot-Filling Merger
 *
 * Combines a freshly classified intent with the session's pending intent:
 * - CLARIFY while something is pending means "this answers your question",
 *   so the effective type becomes the pending type.
 * - Same effective type: pending slots fill the gaps; new values always win.
 * - Different type: nothing is merged. The engine decides what happens to the
 *   old pending intent.
 */

import type { PendingIntent } from "../session/sessionStore";
import { INTENT_ARG_KEYS, Intent, type ClassifiedIntent, type IntentArgs } from "./types";

export type MergedIntent = {
  type: Intent;
  args: IntentArgs;
  /** True when the pending intent's slots were carried into `args`. */
  continuedPending: boolean;
  /** True when a pending intent existed and this turn moved to a different type. */
  topicChanged: boolean;
};

function fillMissing(target: IntentArgs, source: IntentArgs): IntentArgs {
  const merged: IntentArgs = { ...target };
  for (const key of INTENT_ARG_KEYS) {
    if (merged[key] === undefined && source[key] !== undefined) {
      copySlot(merged, source, key);
    }
  }
  return merged;
}

function copySlot<K extends keyof IntentArgs>(target: IntentArgs, source: IntentArgs, key: K): void {
  target[key] = source[key];
}

export function mergeWithPending(
  classified: Pick<ClassifiedIntent, "type" | "args">,
  pending: PendingIntent | undefined,
): MergedIntent {
  const args: IntentArgs = { ...classified.args };

  if (!pending) {
    return { type: classified.type, args, continuedPending: false, topicChanged: false };
  }

  const effectiveType = classified.type === Intent.CLARIFY ? pending.type : classified.type;

  if (effectiveType === pending.type) {
    return {
      type: effectiveType,
      args: fillMissing(args, pending.args),
      continuedPending: true,
      topicChanged: false,
    };
  }

  return { type: effectiveType, args, continuedPending: false, topicChanged: true };
}
