// Contracts of the external collaborators the engine consults.
// The engine only relies on these shapes; implementations live in
// llm-oracles.ts (OpenAI) or are injected by tests.

import type {
  BinaryCoverageStatus,
  BulletInput,
  Claim,
  ClaimMatch,
  ConfidenceVerdict,
  TernaryCoverageStatus,
} from "./types.js";

export interface CoverageOracle<S extends TernaryCoverageStatus | BinaryCoverageStatus = TernaryCoverageStatus> {
  classify(bulletText: string, fullAnswerText: string): Promise<S>;
}

export type TernaryCoverageOracle = CoverageOracle<TernaryCoverageStatus>;
export type BinaryCoverageOracle = CoverageOracle<BinaryCoverageStatus>;

export interface ConfidenceOracle {
  classify(latestFragmentText: string): Promise<ConfidenceVerdict>;
}

export interface ClaimOracle {
  extract(fragmentText: string): Promise<Claim[]>;
}

export interface SimilarityMatcher {
  /** One entry per claim, in claim order. */
  bestMatch(claimTexts: string[], bulletTexts: string[]): Promise<ClaimMatch[]>;
}

export interface PhrasingOracle {
  compose(targetBulletText: string, uncoveredBulletTexts: string[]): Promise<string>;
}

export interface BulletDecomposer {
  decompose(questionText: string, modelAnswer: string): Promise<BulletInput[]>;
}

/** Deterministic question used whenever the phrasing oracle is absent or fails. */
export function fallbackFollowupText(bulletText: string): string {
  return `You haven't clearly covered this point yet: '${bulletText}'. Could you elaborate?`;
}
