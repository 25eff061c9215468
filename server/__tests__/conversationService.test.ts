import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { ConversationService } from "../assistant/conversationService";
import { CredentialStore } from "../auth/credentialStore";
import type { ActionProvider } from "../github/actionProvider";
import { ActionDispatcher } from "../github/dispatcher";
import { AUTH_REQUIRED_REPLY } from "../github/replies";
import type { IntentClassifier } from "../intent/classifier";
import { IntentEngine } from "../intent/engine";
import { Intent } from "../intent/types";
import { SessionStore } from "../session/sessionStore";
import { ClassificationError } from "../utils/errorHandler";

const SESSION = "session-1";

function createProvider() {
  return {
    listUserPullRequests: vi.fn<ActionProvider["listUserPullRequests"]>().mockResolvedValue([]),
    listReviewRequests: vi.fn<ActionProvider["listReviewRequests"]>().mockResolvedValue([]),
    getComments: vi.fn<ActionProvider["getComments"]>().mockResolvedValue([]),
    mergePullRequest: vi.fn<ActionProvider["mergePullRequest"]>().mockResolvedValue(undefined),
    getStatus: vi.fn<ActionProvider["getStatus"]>(),
    getDiff: vi.fn<ActionProvider["getDiff"]>(),
    addComment: vi.fn<ActionProvider["addComment"]>().mockResolvedValue(undefined),
  } satisfies ActionProvider;
}

describe("ConversationService", () => {
  let store: SessionStore;
  let credentials: CredentialStore;
  let classify: Mock<IntentClassifier["classify"]>;
  let provider: ReturnType<typeof createProvider>;
  let service: ConversationService;

  beforeEach(() => {
    store = new SessionStore();
    credentials = new CredentialStore();
    classify = vi.fn<IntentClassifier["classify"]>();
    provider = createProvider();
    const engine = new IntentEngine({ store, dispatcher: new ActionDispatcher(provider) });
    service = new ConversationService({ store, credentials, classifier: { classify }, engine });
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("asks for authorization without classifying when no credential exists", async () => {
    const outcome = await service.handleUtterance(SESSION, "show my PRs");

    expect(outcome).toEqual({ reply: AUTH_REQUIRED_REPLY, intent: { type: "require_authorization" } });
    expect(classify).not.toHaveBeenCalled();
    expect(store.getHistory(SESSION)).toEqual([
      { role: "user", content: "show my PRs" },
      { role: "assistant", content: AUTH_REQUIRED_REPLY },
    ]);
  });

  it("classifies the full history and records the reply", async () => {
    credentials.set(SESSION, "test-token");
    classify.mockResolvedValue({ type: Intent.LIST_PRS_MINE, args: {}, confidence: 0.9 });

    const outcome = await service.handleUtterance(SESSION, "show my PRs", "You are terse.");

    expect(classify).toHaveBeenCalledWith([
      { role: "system", content: "You are terse." },
      { role: "user", content: "show my PRs" },
    ]);
    expect(provider.listUserPullRequests).toHaveBeenCalledWith("test-token");
    expect(outcome.reply).toBe("You have no open pull requests on GitHub.");
    expect(store.getHistory(SESSION)).toEqual([
      { role: "system", content: "You are terse." },
      { role: "user", content: "show my PRs" },
      { role: "assistant", content: "You have no open pull requests on GitHub." },
    ]);
  });

  it("uses the static token when the session has none", async () => {
    const withStatic = new ConversationService({
      store,
      credentials: new CredentialStore("static-test-token"),
      classifier: { classify },
      engine: new IntentEngine({ store, dispatcher: new ActionDispatcher(provider) }),
    });
    classify.mockResolvedValue({ type: Intent.LIST_PRS_MINE, args: {}, confidence: 0.9 });

    await withStatic.handleUtterance(SESSION, "show my PRs");

    expect(provider.listUserPullRequests).toHaveBeenCalledWith("static-test-token");
  });

  it("propagates classification failures and leaves the pending intent alone", async () => {
    credentials.set(SESSION, "test-token");
    store.setPendingIntent(SESSION, Intent.GET_PR_COMMENTS, { prNumber: 123 });
    const before = store.getPendingIntent(SESSION);
    classify.mockRejectedValue(new ClassificationError("classifier request failed: timeout"));

    await expect(service.handleUtterance(SESSION, "acme/widgets")).rejects.toBeInstanceOf(ClassificationError);

    expect(store.getPendingIntent(SESSION)).toEqual(before);
    expect(store.getHistory(SESSION)).toEqual([{ role: "user", content: "acme/widgets" }]);
  });

  it("carries a pending request across two turns", async () => {
    credentials.set(SESSION, "test-token");
    classify
      .mockResolvedValueOnce({ type: Intent.GET_PR_COMMENTS, args: { prNumber: 123 }, confidence: 0.9 })
      .mockResolvedValueOnce({ type: Intent.CLARIFY, args: { repo: "acme/widgets" }, confidence: 0.8 });

    const first = await service.handleUtterance(SESSION, "show me the comments on PR 123");
    const second = await service.handleUtterance(SESSION, "it's in acme/widgets");

    expect(first.reply).toBe("Which repository is PR 123 in?");
    expect(provider.getComments).toHaveBeenCalledWith("test-token", { repo: "acme/widgets", prNumber: 123 });
    expect(second.reply).toBe("I found 0 comment(s) on GitHub pull request acme/widgets#123.");
    expect(classify.mock.calls[1][0]).toEqual([
      { role: "user", content: "show me the comments on PR 123" },
      { role: "assistant", content: "Which repository is PR 123 in?" },
      { role: "user", content: "it's in acme/widgets" },
    ]);
  });

  it("runs concurrent turns for one session one after the other", async () => {
    credentials.set(SESSION, "test-token");
    let releaseFirst: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });
    classify
      .mockImplementationOnce(async () => {
        await gate;
        return { type: Intent.GET_PR_COMMENTS, args: { prNumber: 123 }, confidence: 0.9 };
      })
      .mockResolvedValueOnce({ type: Intent.CLARIFY, args: { repo: "acme/widgets" }, confidence: 0.8 });

    const first = service.handleUtterance(SESSION, "comments on PR 123");
    const second = service.handleUtterance(SESSION, "acme/widgets");
    releaseFirst();

    const [firstOutcome, secondOutcome] = await Promise.all([first, second]);

    expect(firstOutcome.reply).toBe("Which repository is PR 123 in?");
    expect(secondOutcome.reply).toBe("I found 0 comment(s) on GitHub pull request acme/widgets#123.");
  });
});
