/**
 * Conversation Service
 *
 * One conversational turn, end to end:
 *   history append → authorization check → classification → engine → reply append
 *
 * The whole turn runs under the session lock, so two requests for the same
 * session see each other's history and pending state in order.
 */

import type { CredentialStore } from "../auth/credentialStore";
import { AUTH_REQUIRED_REPLY } from "../github/replies";
import type { IntentClassifier } from "../intent/classifier";
import type { IntentEngine, TurnOutcome } from "../intent/engine";
import type { ClassifiedIntent } from "../intent/types";
import type { SessionStore } from "../session/sessionStore";
import { RequestLogger } from "../utils/logger";

export type ConversationServiceDeps = {
  store: SessionStore;
  credentials: CredentialStore;
  classifier: IntentClassifier;
  engine: IntentEngine;
};

export class ConversationService {
  constructor(private readonly deps: ConversationServiceDeps) {}

  handleUtterance(sessionId: string, message: string, system?: string): Promise<TurnOutcome> {
    const { store } = this.deps;
    return store.withSession(sessionId, async () => {
      const logger = new RequestLogger(sessionId);

      if (system) {
        store.appendMessage(sessionId, { role: "system", content: system });
      }
      store.appendMessage(sessionId, { role: "user", content: message });

      const credential = this.deps.credentials.get(sessionId);
      if (!credential) {
        logger.info("No GitHub credential; asking for authorization");
        return this.reply(sessionId, { reply: AUTH_REQUIRED_REPLY, intent: { type: "require_authorization" } });
      }

      logger.startStage("classify");
      let classified: ClassifiedIntent;
      try {
        classified = await this.deps.classifier.classify(store.getHistory(sessionId));
      } catch (error) {
        logger.error("Classification failed", error, { duration: logger.endStage("classify") });
        throw error;
      }
      logger.debug("Classified", { intent: classified.type, duration: logger.endStage("classify") });

      logger.startStage("resolve");
      const outcome = await this.deps.engine.resolve(sessionId, classified, credential);
      logger.info("Turn complete", {
        intent: classified.type,
        state: outcome.intent.type,
        duration: logger.endStage("resolve"),
      });

      return this.reply(sessionId, outcome);
    });
  }

  private reply(sessionId: string, outcome: TurnOutcome): TurnOutcome {
    this.deps.store.appendMessage(sessionId, { role: "assistant", content: outcome.reply });
    return outcome;
  }
}
