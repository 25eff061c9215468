/**
 * Intent Resolution Engine
 *
 * Per-turn state machine. Given the classifier's judgment it decides to:
 * - ask for authorization (no credential; pending state untouched)
 * - ask a targeted question and persist the partial request (Collecting / Ambiguous)
 * - dispatch the action (Ready)
 * - decline (unknown / not_implemented; pending state cleared, classifier's
 *   own wording preferred)
 *
 * `resolve` reads and writes session state in several steps. Callers run it
 * inside `SessionStore.withSession` so concurrent turns for one session
 * cannot interleave.
 */

import type { StructuredIntent } from "@shared/schema";
import type { ActionDispatcher } from "../github/dispatcher";
import {
  AUTH_REQUIRED_REPLY,
  DEFAULT_CLARIFY_REPLY,
  NOT_IMPLEMENTED_REPLY,
} from "../github/replies";
import type { SessionStore } from "../session/sessionStore";
import { formatDisambiguationQuestion, resolveRepository } from "./ambiguityResolver";
import { mergeWithPending } from "./slotFilling";
import {
  Intent,
  isActionIntent,
  isListingIntent,
  type ActionIntent,
  type ClassifiedIntent,
  type IntentArgs,
  type ResolvedIntent,
  type TargetedIntent,
} from "./types";

export type TurnOutcome = {
  reply: string;
  intent: StructuredIntent;
};

export type IntentEngineDeps = {
  store: SessionStore;
  dispatcher: ActionDispatcher;
  /** Owner used to qualify a bare repo name when the user's login is unknown. */
  defaultRepoOwner?: string;
};

const MISSING_BOTH_QUESTIONS: Record<TargetedIntent, string> = {
  [Intent.GET_PR_COMMENTS]: "Which repository and PR number should I look at?",
  [Intent.MERGE_PR]: "Which repo and PR should I merge?",
  [Intent.GET_PR_STATUS]: "Which repository and PR number should I check?",
  [Intent.GET_PR_DIFF]: "Which repository and PR number should I show the changes for?",
  [Intent.ADD_PR_COMMENT]: "Which repository and PR number should I comment on?",
};

function clarify(reply: string, payload?: { repo?: string; prNumber?: number; candidates?: string[] }): TurnOutcome {
  return payload ? { reply, intent: { type: "clarify", payload } } : { reply, intent: { type: "clarify" } };
}

function missingSlotQuestion(type: TargetedIntent, repo: string | undefined, prNumber: number | undefined): TurnOutcome {
  if (repo) {
    return clarify(`Which PR number in ${repo}?`, { repo });
  }
  if (prNumber !== undefined) {
    return clarify(`Which repository is PR ${prNumber} in?`, { prNumber });
  }
  return clarify(MISSING_BOTH_QUESTIONS[type]);
}

/** Whatever the classifier already knows about the target, for the visual surface. */
function knownTarget(args: IntentArgs): { repo?: string; prNumber?: number } | undefined {
  if (!args.repo && args.prNumber === undefined) return undefined;
  const payload: { repo?: string; prNumber?: number } = {};
  if (args.repo) payload.repo = args.repo;
  if (args.prNumber !== undefined) payload.prNumber = args.prNumber;
  return payload;
}

type Readiness =
  | { ready: true; resolved: ResolvedIntent }
  | { ready: false; outcome: TurnOutcome };

export class IntentEngine {
  private readonly store: SessionStore;
  private readonly dispatcher: ActionDispatcher;
  private readonly defaultRepoOwner?: string;

  constructor(deps: IntentEngineDeps) {
    this.store = deps.store;
    this.dispatcher = deps.dispatcher;
    this.defaultRepoOwner = deps.defaultRepoOwner;
  }

  async resolve(
    sessionId: string,
    classified: ClassifiedIntent,
    credential: string | undefined,
  ): Promise<TurnOutcome> {
    if (!credential) {
      return { reply: AUTH_REQUIRED_REPLY, intent: { type: "require_authorization" } };
    }

    const pending = this.store.getPendingIntent(sessionId);
    const merged = mergeWithPending(classified, pending);

    if (merged.topicChanged) {
      console.log(`[IntentEngine] Topic changed from ${pending?.type} to ${merged.type}; discarding pending intent`);
      this.store.clearPendingIntent(sessionId);
    }

    if (merged.type === Intent.CLARIFY) {
      return clarify(classified.message || DEFAULT_CLARIFY_REPLY, knownTarget(merged.args));
    }

    if (!isActionIntent(merged.type)) {
      this.store.clearPendingIntent(sessionId);
      return { reply: classified.message || NOT_IMPLEMENTED_REPLY, intent: { type: "not_implemented" } };
    }

    const readiness = this.checkReadiness(sessionId, merged.type, merged.args);
    if (!readiness.ready) {
      return readiness.outcome;
    }

    const result = await this.dispatcher.dispatch(readiness.resolved, credential);
    if (!result.ok) {
      return { reply: result.reply, intent: result.intent };
    }

    this.store.clearPendingIntent(sessionId);
    if (result.taskRefs) {
      this.store.setTaskRefs(sessionId, result.taskRefs);
    }
    return { reply: result.reply, intent: result.intent };
  }

  /**
   * Qualify a bare repo name ("widgets") with the user's login, else the
   * configured default owner. Left as-is when neither is known.
   */
  private qualifyRepo(sessionId: string, repo: string | undefined): string | undefined {
    if (!repo || repo.includes("/")) return repo;
    const owner = this.store.getResolvedIdentity(sessionId) ?? this.defaultRepoOwner;
    return owner ? `${owner}/${repo}` : repo;
  }

  private checkReadiness(sessionId: string, type: ActionIntent, input: IntentArgs): Readiness {
    if (isListingIntent(type)) {
      return { ready: true, resolved: { type } };
    }

    const args: IntentArgs = { ...input, repo: this.qualifyRepo(sessionId, input.repo) };
    const { prNumber } = args;

    const resolution = resolveRepository(prNumber, args.repo, this.store.getTaskRefs(sessionId));

    if (resolution.kind === "ambiguous") {
      this.store.setPendingIntent(sessionId, type, args);
      return {
        ready: false,
        outcome: clarify(formatDisambiguationQuestion(resolution.prNumber, resolution.candidates), {
          prNumber: resolution.prNumber,
          candidates: resolution.candidates,
        }),
      };
    }

    const repo = resolution.kind === "unresolved" ? undefined : resolution.repo;
    if (repo !== undefined) {
      args.repo = repo;
    }

    if (!repo || prNumber === undefined) {
      this.store.setPendingIntent(sessionId, type, args);
      return { ready: false, outcome: missingSlotQuestion(type, repo, prNumber) };
    }

    const target = { repo, prNumber };
    switch (type) {
      case Intent.MERGE_PR:
        return { ready: true, resolved: { type, target, method: args.mergeMethod ?? "merge" } };
      case Intent.ADD_PR_COMMENT:
        if (!args.body) {
          this.store.setPendingIntent(sessionId, type, args);
          return {
            ready: false,
            outcome: clarify(`What should the comment on PR ${prNumber} in ${repo} say?`, { repo, prNumber }),
          };
        }
        return { ready: true, resolved: { type, target, body: args.body } };
      case Intent.GET_PR_COMMENTS:
      case Intent.GET_PR_STATUS:
      case Intent.GET_PR_DIFF:
        return { ready: true, resolved: { type, target } };
    }
  }
}
