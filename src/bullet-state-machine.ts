// Bullet state machine: owns one state per bullet and applies the per-cycle
// transition rules, evaluated in order for every bullet that got a verdict:
//
//   1. coverage verdict "covered"                    → COVERED (frozen from then on)
//   2. follow-up outstanding + "does_not_know"       → SKIPPED
//   3. follow-up outstanding + "uncertain"           → PENDING
//   4. follow-up outstanding + "knows"               → coverage classification
//   5. otherwise                                     → coverage classification
//
// Rule 4 keeps the granular classification (partial / incomplete) rather than
// collapsing to UNCOVERED: confidence alone never decides coverage.
//
// SKIPPED is left only through rule 1.

import { BulletState } from "./types.js";
import type {
  Bullet,
  BulletInput,
  BulletSummary,
  BulletTransition,
  BulletVerdict,
  ConfidenceVerdict,
  CoverageClassification,
  TransitionRule,
} from "./types.js";
import { ConfigurationError } from "./errors.js";

const CLASSIFICATION_STATES: Readonly<Record<CoverageClassification, BulletState>> = {
  partial: BulletState.PARTIAL,
  incomplete: BulletState.INCOMPLETE,
  uncovered: BulletState.UNCOVERED,
};

/**
 * Builds the initial bullet records.
 * @throws ConfigurationError on a duplicate id or a blank id/text.
 */
export function createBullets(inputs: readonly BulletInput[]): Bullet[] {
  const seen = new Set<string>();
  return inputs.map((input, index) => {
    const id = input.id.trim();
    if (id.length === 0) {
      throw new ConfigurationError(`Bullet at position ${index} has an empty id`);
    }
    if (seen.has(id)) {
      throw new ConfigurationError(`Duplicate bullet id "${id}"`);
    }
    if (input.text.trim().length === 0) {
      throw new ConfigurationError(`Bullet "${id}" has empty text`);
    }
    seen.add(id);
    return {
      id,
      text: input.text.trim(),
      state: BulletState.UNCOVERED,
      classification: null,
      lastFollowupAt: null,
      bestMatchScore: null,
    };
  });
}

export class BulletStateMachine {
  private readonly bullets: Bullet[];
  private readonly byId: Map<string, Bullet>;
  private readonly conservativeClassification: CoverageClassification;

  constructor(inputs: readonly BulletInput[], conservativeClassification: CoverageClassification) {
    this.bullets = createBullets(inputs);
    this.byId = new Map<string, Bullet>(this.bullets.map((b) => [b.id, b]));
    this.conservativeClassification = conservativeClassification;
  }

  /** Bullets in declaration order. Callers must not mutate them. */
  get all(): readonly Bullet[] {
    return this.bullets;
  }

  get(bulletId: string): Bullet | undefined {
    return this.byId.get(bulletId);
  }

  /** Bullets still worth sending to the coverage strategy. */
  evaluationTargets(): Bullet[] {
    return this.bullets.filter((b) => b.state !== BulletState.COVERED);
  }

  summaries(): BulletSummary[] {
    return this.bullets.map((b) => ({ id: b.id, text: b.text, state: b.state }));
  }

  /**
   * Apply one cycle's verdicts. `outstandingBulletId` names the bullet the
   * previous follow-up targeted when no cycle has consumed it yet.
   *
   * @returns the transitions that changed a state, in declaration order
   */
  apply(
    verdicts: readonly BulletVerdict[],
    confidence: ConfidenceVerdict,
    outstandingBulletId: string | null,
  ): BulletTransition[] {
    const verdictById = new Map<string, BulletVerdict>(verdicts.map((v) => [v.bulletId, v]));
    const transitions: BulletTransition[] = [];

    for (const bullet of this.bullets) {
      const verdict = verdictById.get(bullet.id);
      if (!verdict || bullet.state === BulletState.COVERED) continue;

      if (!verdict.degraded) {
        if (verdict.score !== undefined) {
          bullet.bestMatchScore = Math.max(bullet.bestMatchScore ?? 0, verdict.score);
        }
        if (verdict.status !== "covered") {
          bullet.classification = verdict.status;
        }
      }

      const [next, rule] = this.nextState(bullet, verdict, confidence, outstandingBulletId === bullet.id);
      if (next !== bullet.state) {
        transitions.push({ bulletId: bullet.id, from: bullet.state, to: next, rule });
        bullet.state = next;
      }
    }

    return transitions;
  }

  /**
   * Mark a bullet as just asked about: PENDING, stamped with `now`.
   * @returns the transition, or null if it was already PENDING
   * @throws Error for an unknown id or a bullet that can no longer be asked about
   */
  markFollowupIssued(bulletId: string, now: number): BulletTransition | null {
    const bullet = this.byId.get(bulletId);
    if (!bullet) {
      throw new Error(`Unknown bullet: ${bulletId}`);
    }
    if (bullet.state === BulletState.COVERED || bullet.state === BulletState.SKIPPED) {
      throw new Error(`Cannot issue a follow-up for bullet ${bulletId} in "${bullet.state}" state`);
    }

    bullet.lastFollowupAt = now;
    if (bullet.state === BulletState.PENDING) {
      return null;
    }
    const transition: BulletTransition = {
      bulletId,
      from: bullet.state,
      to: BulletState.PENDING,
      rule: "followup_issued",
    };
    bullet.state = BulletState.PENDING;
    return transition;
  }

  private nextState(
    bullet: Bullet,
    verdict: BulletVerdict,
    confidence: ConfidenceVerdict,
    outstanding: boolean,
  ): [BulletState, TransitionRule] {
    if (verdict.status === "covered" && !verdict.degraded) {
      return [BulletState.COVERED, "coverage_covered"];
    }
    if (bullet.state === BulletState.SKIPPED) {
      return [BulletState.SKIPPED, "coverage_classification"];
    }
    if (outstanding) {
      switch (confidence) {
        case "does_not_know":
          return [BulletState.SKIPPED, "confidence_does_not_know"];
        case "uncertain":
          return [BulletState.PENDING, "confidence_uncertain"];
        case "knows":
          return [this.classificationState(bullet), "confidence_knows"];
      }
    }
    return [this.classificationState(bullet), "coverage_classification"];
  }

  /** A degraded verdict leaves classification untouched, so this falls back to the last good one. */
  private classificationState(bullet: Bullet): BulletState {
    return CLASSIFICATION_STATES[bullet.classification ?? this.conservativeClassification];
  }
}
