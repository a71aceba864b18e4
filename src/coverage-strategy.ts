// Coverage strategies: the two ways of turning one evaluation cycle into one
// verdict per bullet, behind a single interface so the state machine and the
// scheduler never know which is in use.
//
//   ternary:     CoverageOracle per bullet against the full answer
//                (covered / partial / incomplete).
//   similarity:  ClaimOracle on the latest text, SimilarityMatcher against the
//                bullets; a bullet is covered once any claim reaches the
//                present threshold, otherwise an optional binary
//                CoverageOracle decides (covered / uncovered).
//
// Every oracle call is bounded by a timeout. A failed call never throws out of
// evaluate(); it yields a degraded verdict instead.

import type {
  Bullet,
  BulletVerdict,
  Claim,
  CoverageClassification,
  EngineConfig,
  EvaluationStrategyName,
} from "./types.js";
import type {
  BinaryCoverageOracle,
  ClaimOracle,
  SimilarityMatcher,
  TernaryCoverageOracle,
} from "./oracles.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { splitSentences, withTimeout } from "./utils.js";

export interface CoverageStrategyInput {
  /** Bullets to judge this cycle (never the covered ones). */
  bullets: readonly Bullet[];
  /** Speech plus follow-up markers, in order. */
  fullAnswerText: string;
  /** Speech drained for this cycle. */
  latestText: string;
}

export interface CoverageStrategy {
  readonly name: EvaluationStrategyName;
  /** Classification a degraded verdict falls back to when a bullet has none. */
  readonly conservativeClassification: CoverageClassification;
  evaluate(input: CoverageStrategyInput): Promise<BulletVerdict[]>;
}

// ─── Ternary strategy ───────────────────────────────────────────────────────────

export interface TernaryCoverageStrategyDeps {
  coverageOracle: TernaryCoverageOracle;
  timeoutMs: number;
  logger?: Logger;
}

export class TernaryCoverageStrategy implements CoverageStrategy {
  readonly name = "ternary";
  readonly conservativeClassification = "incomplete";
  private readonly deps: TernaryCoverageStrategyDeps;
  private readonly logger: Logger;

  constructor(deps: TernaryCoverageStrategyDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
  }

  async evaluate(input: CoverageStrategyInput): Promise<BulletVerdict[]> {
    // Bullets are judged independently; one failure leaves the others intact
    return Promise.all(
      input.bullets.map(async (bullet): Promise<BulletVerdict> => {
        try {
          const status = await withTimeout("CoverageOracle", this.deps.timeoutMs, () =>
            this.deps.coverageOracle.classify(bullet.text, input.fullAnswerText),
          );
          return { bulletId: bullet.id, status, degraded: false };
        } catch (err) {
          this.logger.warn(`Coverage for bullet ${bullet.id} degraded: ${errorMessage(err)}`);
          return { bulletId: bullet.id, status: "incomplete", degraded: true };
        }
      }),
    );
  }
}

// ─── Similarity strategy ────────────────────────────────────────────────────────

export interface SimilarityCoverageStrategyDeps {
  claimOracle: ClaimOracle;
  similarityMatcher: SimilarityMatcher;
  /** Consulted for bullets no claim has matched well enough yet. */
  coverageOracle?: BinaryCoverageOracle;
  presentThreshold: number;
  timeoutMs: number;
  logger?: Logger;
}

export class SimilarityCoverageStrategy implements CoverageStrategy {
  readonly name = "similarity";
  readonly conservativeClassification = "uncovered";
  private readonly deps: SimilarityCoverageStrategyDeps;
  private readonly logger: Logger;

  constructor(deps: SimilarityCoverageStrategyDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
  }

  async evaluate(input: CoverageStrategyInput): Promise<BulletVerdict[]> {
    const claims = await this.extractClaims(input.latestText);
    const cycleScores = new Map<string, number>();
    let matcherFailed = false;

    if (claims.length > 0 && input.bullets.length > 0) {
      try {
        const matches = await withTimeout("SimilarityMatcher", this.deps.timeoutMs, () =>
          this.deps.similarityMatcher.bestMatch(
            claims.map((c) => c.text),
            input.bullets.map((b) => b.text),
          ),
        );
        for (const match of matches) {
          const bullet = input.bullets[match.bulletIndex];
          if (!bullet) continue;
          cycleScores.set(bullet.id, Math.max(cycleScores.get(bullet.id) ?? 0, match.score));
        }
      } catch (err) {
        matcherFailed = true;
        this.logger.warn(`Claim matching degraded: ${errorMessage(err)}`);
      }
    }

    return Promise.all(
      input.bullets.map(async (bullet): Promise<BulletVerdict> => {
        const cycleScore = cycleScores.get(bullet.id);
        const score = Math.max(bullet.bestMatchScore ?? 0, cycleScore ?? 0);

        if (score >= this.deps.presentThreshold) {
          return { bulletId: bullet.id, status: "covered", score, degraded: false };
        }

        const oracle = this.deps.coverageOracle;
        if (!oracle) {
          return { bulletId: bullet.id, status: "uncovered", score, degraded: matcherFailed };
        }

        try {
          const status = await withTimeout("CoverageOracle", this.deps.timeoutMs, () =>
            oracle.classify(bullet.text, input.fullAnswerText),
          );
          return { bulletId: bullet.id, status, score, degraded: false };
        } catch (err) {
          this.logger.warn(`Coverage for bullet ${bullet.id} degraded: ${errorMessage(err)}`);
          return { bulletId: bullet.id, status: "uncovered", score, degraded: true };
        }
      }),
    );
  }

  /** Claims from the oracle, or one naive claim per sentence when it fails. */
  private async extractClaims(text: string): Promise<Claim[]> {
    if (text.trim().length === 0) {
      return [];
    }
    try {
      return await withTimeout("ClaimOracle", this.deps.timeoutMs, () => this.deps.claimOracle.extract(text));
    } catch (err) {
      this.logger.warn(`Claim extraction failed, falling back to sentence split: ${errorMessage(err)}`);
      return splitSentences(text).map((sentence) => ({ text: sentence }));
    }
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

export interface CoverageOracleSet {
  coverageOracle: TernaryCoverageOracle;
  binaryCoverageOracle?: BinaryCoverageOracle;
  claimOracle?: ClaimOracle;
  similarityMatcher?: SimilarityMatcher;
}

/**
 * Builds the strategy a config names from the oracles on hand.
 * @throws ConfigurationError when "similarity" lacks a claim oracle or matcher
 */
export function createCoverageStrategy(
  config: Pick<EngineConfig, "evaluationStrategy" | "presentThreshold" | "oracleTimeoutMs">,
  oracles: CoverageOracleSet,
  logger?: Logger,
): CoverageStrategy {
  switch (config.evaluationStrategy) {
    case "ternary":
      return new TernaryCoverageStrategy({
        coverageOracle: oracles.coverageOracle,
        timeoutMs: config.oracleTimeoutMs,
        logger,
      });
    case "similarity": {
      const { claimOracle, similarityMatcher } = oracles;
      if (!claimOracle || !similarityMatcher) {
        throw new ConfigurationError("The similarity strategy needs a claim oracle and a similarity matcher");
      }
      return new SimilarityCoverageStrategy({
        claimOracle,
        similarityMatcher,
        coverageOracle: oracles.binaryCoverageOracle,
        presentThreshold: config.presentThreshold,
        timeoutMs: config.oracleTimeoutMs,
        logger,
      });
    }
    default: {
      const _exhaustive: never = config.evaluationStrategy;
      throw new ConfigurationError(`Unknown evaluation strategy: ${String(_exhaustive)}`);
    }
  }
}
