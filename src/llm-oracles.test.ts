import { describe, it, expect, vi } from "vitest";
import {
  DEFAULT_CHAT_MODEL,
  EmbeddingSimilarityMatcher,
  OpenAIBinaryCoverageOracle,
  OpenAIBulletDecomposer,
  OpenAIClaimOracle,
  OpenAIConfidenceOracle,
  OpenAICoverageOracle,
  OpenAIPhrasingOracle,
} from "./llm-oracles.js";
import type { OpenAIClient } from "./llm-oracles.js";

// ─── Mock client ────────────────────────────────────────────────────────────────

function chatResponse(content: string | null) {
  return { choices: [{ message: { content } }] };
}

function createMockClient(contents: Array<string | null> = [], embeddings: Array<{ index: number; embedding: number[] }> = []) {
  const chatCreate = vi.fn();
  for (const content of contents) {
    chatCreate.mockResolvedValueOnce(chatResponse(content));
  }
  const embeddingsCreate = vi.fn().mockResolvedValue({ data: embeddings });
  const client: OpenAIClient = {
    chat: { completions: { create: chatCreate } },
    embeddings: { create: embeddingsCreate },
  };
  return { client, chatCreate, embeddingsCreate };
}

// ─── Coverage ───────────────────────────────────────────────────────────────────

describe("OpenAICoverageOracle", () => {
  it("should return the status label in JSON mode at temperature 0", async () => {
    const { client, chatCreate } = createMockClient([JSON.stringify({ status: "partial" })]);
    const oracle = new OpenAICoverageOracle(client);

    await expect(oracle.classify("Threads share memory", "they share stuff")).resolves.toBe("partial");

    const params = chatCreate.mock.calls[0][0];
    expect(params.model).toBe(DEFAULT_CHAT_MODEL);
    expect(params.response_format).toEqual({ type: "json_object" });
    expect(params.temperature).toBe(0);
    expect(params.messages[1].content).toContain('"Threads share memory"');
  });

  it("should normalize case, whitespace and rubric aliases", async () => {
    const { client } = createMockClient([
      JSON.stringify({ status: "  Covered " }),
      JSON.stringify({ status: "complete" }),
    ]);
    const oracle = new OpenAICoverageOracle(client, "custom-model");

    await expect(oracle.classify("p", "a")).resolves.toBe("covered");
    await expect(oracle.classify("p", "a")).resolves.toBe("covered");
  });

  it("should reject unknown labels, empty content and invalid JSON", async () => {
    const { client } = createMockClient([JSON.stringify({ status: "maybe" }), null, "not json", "[1]"]);
    const oracle = new OpenAICoverageOracle(client);

    await expect(oracle.classify("p", "a")).rejects.toThrow('LLM response has unexpected status "maybe"');
    await expect(oracle.classify("p", "a")).rejects.toThrow("LLM returned empty response");
    await expect(oracle.classify("p", "a")).rejects.toThrow("Failed to parse LLM response as JSON: not json");
    await expect(oracle.classify("p", "a")).rejects.toThrow("LLM response is not a JSON object");
  });
});

describe("OpenAIBinaryCoverageOracle", () => {
  it("should accept only covered or uncovered", async () => {
    const { client } = createMockClient([JSON.stringify({ status: "uncovered" }), JSON.stringify({ status: "partial" })]);
    const oracle = new OpenAIBinaryCoverageOracle(client);

    await expect(oracle.classify("p", "a")).resolves.toBe("uncovered");
    await expect(oracle.classify("p", "a")).rejects.toThrow('LLM response has unexpected status "partial"');
  });
});

// ─── Confidence ─────────────────────────────────────────────────────────────────

describe("OpenAIConfidenceOracle", () => {
  it("should read the state field, including the spoken alias", async () => {
    const { client } = createMockClient([
      JSON.stringify({ state: "uncertain" }),
      JSON.stringify({ state: "Doesn't know" }),
      JSON.stringify({ verdict: "knows" }),
    ]);
    const oracle = new OpenAIConfidenceOracle(client);

    await expect(oracle.classify("um, maybe?")).resolves.toBe("uncertain");
    await expect(oracle.classify("no idea")).resolves.toBe("does_not_know");
    await expect(oracle.classify("sure")).rejects.toThrow("LLM response missing or invalid 'state' field");
  });
});

// ─── Claims ─────────────────────────────────────────────────────────────────────

describe("OpenAIClaimOracle", () => {
  it("should keep well-formed claims and drop the rest", async () => {
    const { client } = createMockClient([
      JSON.stringify({
        claims: [
          { text: " Threads share memory ", entities: ["threads", 3, "memory"], predicate: "share" },
          { text: "" },
          "loose string",
          { text: "Processes are isolated" },
        ],
      }),
    ]);
    const oracle = new OpenAIClaimOracle(client);

    await expect(oracle.extract("...")).resolves.toEqual([
      { text: "Threads share memory", entities: ["threads", "memory"], predicate: "share" },
      { text: "Processes are isolated" },
    ]);
  });

  it("should reject a response without a claims array", async () => {
    const { client } = createMockClient([JSON.stringify({ claims: "none" })]);
    await expect(new OpenAIClaimOracle(client).extract("...")).rejects.toThrow(
      "LLM response missing or invalid 'claims' array",
    );
  });
});

// ─── Similarity ─────────────────────────────────────────────────────────────────

describe("EmbeddingSimilarityMatcher", () => {
  it("should embed claims and bullets in one call and pick the closest bullet per claim", async () => {
    const { client, embeddingsCreate } = createMockClient(
      [],
      [
        { index: 3, embedding: [1, 0] },
        { index: 0, embedding: [1, 0] },
        { index: 1, embedding: [0, 1] },
        { index: 2, embedding: [0, 1] },
      ],
    );
    const matcher = new EmbeddingSimilarityMatcher(client, "embed-test");

    const matches = await matcher.bestMatch(["claim a", "claim b"], ["bullet a", "bullet b"]);

    expect(embeddingsCreate).toHaveBeenCalledWith({
      model: "embed-test",
      input: ["claim a", "claim b", "bullet a", "bullet b"],
    });
    expect(matches).toEqual([
      { bulletIndex: 1, score: 1 },
      { bulletIndex: 0, score: 1 },
    ]);
  });

  it("should clamp negative similarity to 0", async () => {
    const { client } = createMockClient(
      [],
      [
        { index: 0, embedding: [1, 0] },
        { index: 1, embedding: [-1, 0] },
      ],
    );
    const matches = await new EmbeddingSimilarityMatcher(client).bestMatch(["claim"], ["bullet"]);
    expect(matches).toEqual([{ bulletIndex: 0, score: 0 }]);
  });

  it("should skip the call when either side is empty", async () => {
    const { client, embeddingsCreate } = createMockClient();
    const matcher = new EmbeddingSimilarityMatcher(client);

    await expect(matcher.bestMatch([], ["bullet"])).resolves.toEqual([]);
    await expect(matcher.bestMatch(["claim"], [])).resolves.toEqual([]);
    expect(embeddingsCreate).not.toHaveBeenCalled();
  });

  it("should reject a response with a missing vector", async () => {
    const { client } = createMockClient(
      [],
      [
        { index: 0, embedding: [1, 0] },
        { index: 1, embedding: [0, 1] },
      ],
    );
    await expect(new EmbeddingSimilarityMatcher(client).bestMatch(["claim"], ["b1", "b2"])).rejects.toThrow(
      "Embeddings response missing vector 2 of 3",
    );
  });
});

// ─── Phrasing & decomposition ───────────────────────────────────────────────────

describe("OpenAIPhrasingOracle", () => {
  it("should return the trimmed question and list the other missing points", async () => {
    const { client, chatCreate } = createMockClient([JSON.stringify({ question: " How do threads share data? " })]);
    const oracle = new OpenAIPhrasingOracle(client);

    await expect(oracle.compose("Threads share memory", ["Threads share memory", "Processes are isolated"])).resolves.toBe(
      "How do threads share data?",
    );
    const params = chatCreate.mock.calls[0][0];
    expect(params.temperature).toBe(0.4);
    expect(params.messages[1].content).toContain("- Processes are isolated");
    expect(params.messages[1].content).not.toContain("- Threads share memory");
  });

  it("should reject a blank question", async () => {
    const { client } = createMockClient([JSON.stringify({ question: "  " })]);
    await expect(new OpenAIPhrasingOracle(client).compose("p", [])).rejects.toThrow(
      "LLM response missing or invalid 'question' field",
    );
  });
});

describe("OpenAIBulletDecomposer", () => {
  it("should number the non-empty bullets b1..bn", async () => {
    const { client } = createMockClient([JSON.stringify({ bullets: ["Point one", " ", 7, " Point two "] })]);
    const decomposer = new OpenAIBulletDecomposer(client);

    await expect(decomposer.decompose("Q?", "Model answer")).resolves.toEqual([
      { id: "b1", text: "Point one" },
      { id: "b2", text: "Point two" },
    ]);
  });
});
