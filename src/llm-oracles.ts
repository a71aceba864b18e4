// OpenAI-backed oracle implementations.
//
// Each oracle issues one JSON-mode chat completion (or one embeddings call) and
// validates the shape of the response. Malformed output throws; deciding what
// a failure means is left to the caller (see coverage-strategy.ts).

import type {
  BinaryCoverageStatus,
  BulletInput,
  Claim,
  ClaimMatch,
  ConfidenceVerdict,
  TernaryCoverageStatus,
} from "./types.js";
import type {
  BinaryCoverageOracle,
  BulletDecomposer,
  ClaimOracle,
  ConfidenceOracle,
  PhrasingOracle,
  SimilarityMatcher,
  TernaryCoverageOracle,
} from "./oracles.js";
import {
  buildBinaryCoveragePrompt,
  buildClaimPrompt,
  buildConfidencePrompt,
  buildCoveragePrompt,
  buildDecompositionPrompt,
  buildPhrasingPrompt,
  type ChatPrompt,
} from "./prompts.js";
import { clampScore, cosineSimilarity } from "./utils.js";

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        response_format?: { type: "json_object" };
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{
        index: number;
        embedding: number[];
      }>;
    }>;
  };
}

export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

// ─── Shared JSON call ───────────────────────────────────────────────────────────

async function callJson(
  client: OpenAIClient,
  model: string,
  prompt: ChatPrompt,
  temperature: number,
): Promise<Record<string, unknown>> {
  const response = await client.chat.completions.create({
    model,
    messages: [
      { role: "system", content: prompt.system },
      { role: "user", content: prompt.user },
    ],
    response_format: { type: "json_object" },
    temperature,
  });

  const content = response.choices[0]?.message?.content;
  if (!content) {
    throw new Error("LLM returned empty response");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Failed to parse LLM response as JSON: ${content.slice(0, 200)}`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("LLM response is not a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

function readLabel<T extends string>(
  obj: Record<string, unknown>,
  field: string,
  allowed: readonly T[],
  aliases: Readonly<Record<string, T>> = {},
): T {
  const raw = obj[field];
  if (typeof raw !== "string") {
    throw new Error(`LLM response missing or invalid '${field}' field`);
  }
  const normalized = raw.trim().toLowerCase();
  const match = allowed.find((label) => label === normalized) ?? aliases[normalized];
  if (!match) {
    throw new Error(`LLM response has unexpected ${field} "${raw}"`);
  }
  return match;
}

// ─── Coverage ───────────────────────────────────────────────────────────────────

const TERNARY_STATUSES = ["covered", "partial", "incomplete"] as const;
const BINARY_STATUSES = ["covered", "uncovered"] as const;

/** Models sometimes echo the rubric wording instead of the label. */
const COVERAGE_ALIASES: Readonly<Record<string, "covered">> = {
  complete: "covered",
  completed: "covered",
};

export class OpenAICoverageOracle implements TernaryCoverageOracle {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string = DEFAULT_CHAT_MODEL,
  ) {}

  async classify(bulletText: string, fullAnswerText: string): Promise<TernaryCoverageStatus> {
    const obj = await callJson(this.client, this.model, buildCoveragePrompt(bulletText, fullAnswerText), 0);
    return readLabel(obj, "status", TERNARY_STATUSES, COVERAGE_ALIASES);
  }
}

export class OpenAIBinaryCoverageOracle implements BinaryCoverageOracle {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string = DEFAULT_CHAT_MODEL,
  ) {}

  async classify(bulletText: string, fullAnswerText: string): Promise<BinaryCoverageStatus> {
    const obj = await callJson(this.client, this.model, buildBinaryCoveragePrompt(bulletText, fullAnswerText), 0);
    return readLabel(obj, "status", BINARY_STATUSES, COVERAGE_ALIASES);
  }
}

// ─── Confidence ─────────────────────────────────────────────────────────────────

const CONFIDENCE_VERDICTS = ["knows", "uncertain", "does_not_know"] as const;

export class OpenAIConfidenceOracle implements ConfidenceOracle {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string = DEFAULT_CHAT_MODEL,
  ) {}

  async classify(latestFragmentText: string): Promise<ConfidenceVerdict> {
    const obj = await callJson(this.client, this.model, buildConfidencePrompt(latestFragmentText), 0);
    return readLabel<ConfidenceVerdict>(obj, "state", CONFIDENCE_VERDICTS, { "doesn't know": "does_not_know" });
  }
}

// ─── Claims ─────────────────────────────────────────────────────────────────────

export class OpenAIClaimOracle implements ClaimOracle {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string = DEFAULT_CHAT_MODEL,
  ) {}

  async extract(fragmentText: string): Promise<Claim[]> {
    const obj = await callJson(this.client, this.model, buildClaimPrompt(fragmentText), 0);
    if (!Array.isArray(obj.claims)) {
      throw new Error("LLM response missing or invalid 'claims' array");
    }

    const rawClaims: unknown[] = obj.claims;
    const claims: Claim[] = [];
    for (const entry of rawClaims) {
      if (!entry || typeof entry !== "object") continue;
      const text = "text" in entry ? entry.text : undefined;
      if (typeof text !== "string" || text.trim().length === 0) continue;

      const claim: Claim = { text: text.trim() };
      const entities = "entities" in entry ? entry.entities : undefined;
      if (Array.isArray(entities)) {
        claim.entities = entities.filter((e): e is string => typeof e === "string");
      }
      const predicate = "predicate" in entry ? entry.predicate : undefined;
      if (typeof predicate === "string" && predicate.length > 0) {
        claim.predicate = predicate;
      }
      claims.push(claim);
    }
    return claims;
  }
}

// ─── Similarity ─────────────────────────────────────────────────────────────────

/**
 * Embeds claims and bullets in one request and scores every claim against
 * every bullet by cosine similarity. Negative similarities clamp to 0.
 */
export class EmbeddingSimilarityMatcher implements SimilarityMatcher {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string = DEFAULT_EMBEDDING_MODEL,
  ) {}

  async bestMatch(claimTexts: string[], bulletTexts: string[]): Promise<ClaimMatch[]> {
    if (claimTexts.length === 0 || bulletTexts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create({
      model: this.model,
      input: [...claimTexts, ...bulletTexts],
    });

    const vectors: number[][] = [];
    for (const item of response.data) {
      vectors[item.index] = item.embedding;
    }
    const expected = claimTexts.length + bulletTexts.length;
    for (let i = 0; i < expected; i++) {
      if (!vectors[i]) {
        throw new Error(`Embeddings response missing vector ${i} of ${expected}`);
      }
    }

    const claimVectors = vectors.slice(0, claimTexts.length);
    const bulletVectors = vectors.slice(claimTexts.length);

    return claimVectors.map((claimVector) => {
      let bulletIndex = 0;
      let score = -1;
      bulletVectors.forEach((bulletVector, index) => {
        const similarity = cosineSimilarity(claimVector, bulletVector);
        if (similarity > score) {
          score = similarity;
          bulletIndex = index;
        }
      });
      return { bulletIndex, score: clampScore(score) };
    });
  }
}

// ─── Phrasing ───────────────────────────────────────────────────────────────────

export class OpenAIPhrasingOracle implements PhrasingOracle {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string = DEFAULT_CHAT_MODEL,
  ) {}

  async compose(targetBulletText: string, uncoveredBulletTexts: string[]): Promise<string> {
    // Slight temperature so repeated nudges don't read identically
    const obj = await callJson(
      this.client,
      this.model,
      buildPhrasingPrompt(targetBulletText, uncoveredBulletTexts),
      0.4,
    );
    const question = obj.question;
    if (typeof question !== "string" || question.trim().length === 0) {
      throw new Error("LLM response missing or invalid 'question' field");
    }
    return question.trim();
  }
}

// ─── Model answer decomposition ────────────────────────────────────────────────

export class OpenAIBulletDecomposer implements BulletDecomposer {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string = DEFAULT_CHAT_MODEL,
  ) {}

  async decompose(questionText: string, modelAnswer: string): Promise<BulletInput[]> {
    const obj = await callJson(this.client, this.model, buildDecompositionPrompt(questionText, modelAnswer), 0);
    if (!Array.isArray(obj.bullets)) {
      throw new Error("LLM response missing or invalid 'bullets' array");
    }
    const rawBullets: unknown[] = obj.bullets;
    return rawBullets
      .filter((b): b is string => typeof b === "string" && b.trim().length > 0)
      .map((text, index) => ({ id: `b${index + 1}`, text: text.trim() }));
  }
}
