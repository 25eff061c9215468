/**
 * Unit Tests: OpenAI Intent Classifier
 *
 * The openai module is mocked; these tests check the request we send and how
 * the completion text is turned into a ClassifiedIntent.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const mockOpenAICreate = vi.fn();

vi.mock("openai", () => {
  return {
    OpenAI: class MockOpenAI {
      chat = {
        completions: {
          create: mockOpenAICreate,
        },
      };
    },
  };
});

import { OpenAIIntentClassifier, formatTranscript } from "../intent/classifier";
import { Intent } from "../intent/types";
import { ClassificationError } from "../utils/errorHandler";

function completion(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe("OpenAIIntentClassifier", () => {
  beforeEach(() => {
    mockOpenAICreate.mockReset();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends the transcript and catalogue with the classifier settings", async () => {
    mockOpenAICreate.mockResolvedValue(
      completion('{"type":"get_pr_comments","args":{"repo":"acme/widgets","pr_number":123},"confidence":0.95}'),
    );
    const classifier = new OpenAIIntentClassifier({ apiKey: "test-key", model: "gpt-test", timeoutMs: 1234 });

    const result = await classifier.classify([
      { role: "user", content: "show me the comments on PR 123 in acme/widgets" },
    ]);

    expect(result).toEqual({
      type: Intent.GET_PR_COMMENTS,
      args: { repo: "acme/widgets", prNumber: 123 },
      confidence: 0.95,
    });

    expect(mockOpenAICreate).toHaveBeenCalledTimes(1);
    const [request, options] = mockOpenAICreate.mock.calls[0];
    expect(request.model).toBe("gpt-test");
    expect(request.temperature).toBe(0.1);
    expect(request.max_tokens).toBe(300);
    expect(request.response_format).toEqual({ type: "json_object" });
    expect(request.messages).toHaveLength(1);
    expect(request.messages[0].role).toBe("system");
    expect(request.messages[0].content).toContain("USER: show me the comments on PR 123 in acme/widgets");
    expect(request.messages[0].content).toContain('"name": "add_pr_comment"');
    expect(options).toEqual({ timeout: 1234 });
  });

  it("uses the default model when none is configured", async () => {
    mockOpenAICreate.mockResolvedValue(completion('{"type":"list_prs_mine"}'));
    const classifier = new OpenAIIntentClassifier({ apiKey: "test-key" });

    await classifier.classify([]);

    expect(mockOpenAICreate.mock.calls[0][0].model).toBe("gpt-4o-mini");
  });

  it("tolerates an empty transcript", async () => {
    mockOpenAICreate.mockResolvedValue(completion('{"type":"clarify","message":"What would you like to do?"}'));
    const classifier = new OpenAIIntentClassifier({ apiKey: "test-key" });

    const result = await classifier.classify([]);

    expect(result.type).toBe(Intent.CLARIFY);
    expect(result.message).toBe("What would you like to do?");
    expect(mockOpenAICreate.mock.calls[0][0].messages[0].content).toContain("(no previous turns)");
  });

  it("wraps transport failures in ClassificationError", async () => {
    mockOpenAICreate.mockRejectedValue(new Error("Request timed out."));
    const classifier = new OpenAIIntentClassifier({ apiKey: "test-key" });

    const promise = classifier.classify([{ role: "user", content: "merge it" }]);

    await expect(promise).rejects.toBeInstanceOf(ClassificationError);
    await expect(promise).rejects.toMatchObject({ detail: "classifier request failed: Request timed out." });
  });

  it("fails on an empty completion", async () => {
    mockOpenAICreate.mockResolvedValue(completion(null));
    const classifier = new OpenAIIntentClassifier({ apiKey: "test-key" });

    await expect(classifier.classify([])).rejects.toMatchObject({ detail: "empty classifier response" });
  });

  it("fails without an API key and never calls the API", async () => {
    const classifier = new OpenAIIntentClassifier();

    await expect(classifier.classify([])).rejects.toBeInstanceOf(ClassificationError);
    expect(mockOpenAICreate).not.toHaveBeenCalled();
  });
});

describe("formatTranscript", () => {
  it("prefixes each turn with its role", () => {
    expect(
      formatTranscript([
        { role: "system", content: "be brief" },
        { role: "user", content: "hi" },
        { role: "assistant", content: "hello" },
      ]),
    ).toBe("SYSTEM: be brief\nUSER: hi\nASSISTANT: hello");
  });
});
