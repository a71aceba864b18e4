/**
 * Follow-up scheduler: decides which bullet, if any, the next follow-up
 * question targets. It never decides how the question is phrased.
 *
 * Candidates are ordered by tier: bullets last classified "partial" first (a
 * nudge is most likely to close them), then "incomplete"/"uncovered" or not
 * yet classified, each tier in declaration order. The first candidate passing
 * every selection predicate wins; at most one per cycle.
 */

import { BulletState, OPEN_BULLET_STATES } from "./types.js";
import type { Bullet, FollowupCandidate, FollowupRecord } from "./types.js";
import type { BulletStateMachine } from "./bullet-state-machine.js";

export interface SelectionContext {
  lastFollowup: FollowupRecord | null;
  now: number;
  cooldownMs: number;
}

export type SelectionPredicate = (bullet: Bullet, context: SelectionContext) => boolean;

// ─── Selection predicates ───────────────────────────────────────────────────────

export const isOpen: SelectionPredicate = (bullet) => OPEN_BULLET_STATES.has(bullet.state);

export const isNotImmediateRepeat: SelectionPredicate = (bullet, { lastFollowup }) =>
  lastFollowup === null || lastFollowup.bulletId !== bullet.id;

export const isOutsideCooldown: SelectionPredicate = (bullet, { now, cooldownMs }) =>
  bullet.lastFollowupAt === null || now - bullet.lastFollowupAt > cooldownMs;

export const SELECTION_PREDICATES: readonly SelectionPredicate[] = [
  isOpen,
  isNotImmediateRepeat,
  isOutsideCooldown,
];

// ─── Candidate ordering ─────────────────────────────────────────────────────────

/** Partial first, then incomplete/uncovered/unclassified; covered and skipped never appear. */
export function orderCandidates(bullets: readonly Bullet[]): Bullet[] {
  const eligible = bullets.filter(
    (b) => b.state !== BulletState.COVERED && b.state !== BulletState.SKIPPED,
  );
  const partial = eligible.filter((b) => b.classification === "partial");
  const rest = eligible.filter((b) => b.classification !== "partial");
  return [...partial, ...rest];
}

export interface FollowupSchedulerConfig {
  followupCooldownMs: number;
}

export class FollowupScheduler {
  private readonly config: FollowupSchedulerConfig;
  private readonly predicates: readonly SelectionPredicate[];

  constructor(config: FollowupSchedulerConfig, predicates: readonly SelectionPredicate[] = SELECTION_PREDICATES) {
    this.config = config;
    this.predicates = predicates;
  }

  /**
   * Pick the next follow-up target, or null when nothing qualifies. Selection
   * reads the machine only; the caller marks the bullet PENDING once the
   * follow-up is actually issued.
   */
  selectFollowup(
    machine: BulletStateMachine,
    lastFollowup: FollowupRecord | null,
    now: number,
  ): FollowupCandidate | null {
    const context: SelectionContext = { lastFollowup, now, cooldownMs: this.config.followupCooldownMs };
    const chosen = orderCandidates(machine.all).find((bullet) =>
      this.predicates.every((predicate) => predicate(bullet, context)),
    );
    if (!chosen) {
      return null;
    }

    const uncoveredBulletTexts = machine.all.filter((b) => isOpen(b, context)).map((b) => b.text);
    return { bullet: chosen, uncoveredBulletTexts };
  }
}
