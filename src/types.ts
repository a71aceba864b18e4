// Answer Coverage Coach - Shared TypeScript interfaces and types
// Bullet/session data model, oracle verdicts, report shape and the WebSocket protocol.

// ─── Bullet State Machine ───────────────────────────────────────────────────────

export enum BulletState {
  UNCOVERED = "uncovered",
  PENDING = "pending",
  PARTIAL = "partial",
  INCOMPLETE = "incomplete",
  COVERED = "covered",
  SKIPPED = "skipped",
}

/** States the scheduler may still target with a follow-up. */
export const OPEN_BULLET_STATES: ReadonlySet<BulletState> = new Set([
  BulletState.UNCOVERED,
  BulletState.PENDING,
  BulletState.PARTIAL,
  BulletState.INCOMPLETE,
]);

// ─── Oracle verdicts ────────────────────────────────────────────────────────────

/** Ternary classification (completeness strategy). */
export type TernaryCoverageStatus = "covered" | "partial" | "incomplete";

/** Binary classification (similarity strategy). */
export type BinaryCoverageStatus = "covered" | "uncovered";

export type CoverageStatus = TernaryCoverageStatus | BinaryCoverageStatus;

/** Raw, non-covered classification a bullet can carry between cycles. */
export type CoverageClassification = Exclude<CoverageStatus, "covered">;

export type ConfidenceVerdict = "knows" | "uncertain" | "does_not_know";

export type EvaluationStrategyName = "ternary" | "similarity";

/**
 * One bullet's verdict for one cycle, whatever strategy produced it.
 * `degraded` is set when the oracle call behind it failed or timed out; the
 * status is then the conservative placeholder, never "covered".
 */
export interface BulletVerdict {
  bulletId: string;
  status: CoverageStatus;
  score?: number; // similarity strategy only, in [0, 1]
  degraded: boolean;
}

// ─── Bullet ─────────────────────────────────────────────────────────────────────

export interface BulletInput {
  id: string;
  text: string;
}

export interface Bullet {
  id: string;
  text: string;
  state: BulletState;
  /** Last raw, non-degraded coverage classification; null before the first verdict. */
  classification: CoverageClassification | null;
  /** Clock value (ms) of the last follow-up targeting this bullet; null = never. */
  lastFollowupAt: number | null;
  /** Best claim similarity seen so far (similarity strategy only). */
  bestMatchScore: number | null;
}

export interface BulletTransition {
  bulletId: string;
  from: BulletState;
  to: BulletState;
  rule: TransitionRule;
}

export type TransitionRule =
  | "coverage_covered"
  | "confidence_does_not_know"
  | "confidence_uncertain"
  | "confidence_knows"
  | "coverage_classification"
  | "followup_issued";

// ─── Transcript ─────────────────────────────────────────────────────────────────

export interface TranscriptFragment {
  readonly sequenceIndex: number;
  readonly text: string;
  readonly receivedAt: number;
}

export interface FollowupRecord {
  readonly bulletId: string;
  readonly text: string;
  readonly issuedAt: number;
}

export type TranscriptEntry =
  | { readonly kind: "speech"; readonly fragment: TranscriptFragment }
  | { readonly kind: "followup"; readonly record: FollowupRecord };

// ─── Claims (similarity strategy) ──────────────────────────────────────────────

export interface Claim {
  text: string;
  entities?: string[];
  predicate?: string;
}

export interface ClaimMatch {
  /** Index into the bullet list the matcher was given. */
  bulletIndex: number;
  score: number;
}

// ─── Follow-up selection ────────────────────────────────────────────────────────

export interface FollowupCandidate {
  bullet: Bullet;
  /** Texts of every bullet still open, handed to the phrasing oracle as context. */
  uncoveredBulletTexts: string[];
}

// ─── Session ────────────────────────────────────────────────────────────────────

export type SessionStatus = "active" | "finalized";

export interface QuestionContext {
  questionId: string;
  questionText: string;
  tags: string[];
  subtags: string[];
}

export interface EngineConfig {
  evaluationStrategy: EvaluationStrategyName;
  /** Time trigger for a cycle, ms since the last drain. Default 20000. */
  evaluationIntervalMs: number;
  /** Count trigger for a cycle. Default 3. */
  fragmentThreshold: number;
  /** Minimum gap between follow-ups on the same bullet. Default 30000. */
  followupCooldownMs: number;
  /** Similarity at or above which a bullet counts as covered. Default 0.75. */
  presentThreshold: number;
  /** Upper bound on any single oracle call. Default 8000. */
  oracleTimeoutMs: number;
}

export interface CycleResult {
  cycle: number;
  evaluatedText: string;
  confidence: ConfidenceVerdict;
  verdicts: BulletVerdict[];
  transitions: BulletTransition[];
  followup: FollowupRecord | null;
  /** True when every coverage call degraded and the cycle changed nothing. */
  noop: boolean;
}

export interface BulletSummary {
  id: string;
  text: string;
  state: BulletState;
}

export interface SessionReport {
  readonly sessionId: string;
  readonly questionId: string;
  readonly questionText: string;
  readonly tags: readonly string[];
  readonly subtags: readonly string[];
  readonly score: number;
  readonly coveredPoints: readonly string[];
  readonly missedPoints: readonly string[];
  readonly skippedPoints: readonly string[];
  readonly bullets: readonly BulletSummary[];
  readonly followups: readonly FollowupRecord[];
  readonly transcript: readonly TranscriptEntry[];
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly durationSeconds: number;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Client → Server messages
export type ClientMessage =
  | {
      type: "start_answer";
      questionId: string;
      questionText: string;
      bullets?: BulletInput[];
      modelAnswer?: string;
      tags?: string[];
      subtags?: string[];
    }
  | { type: "transcript_fragment"; sequenceIndex: number; text: string }
  | { type: "audio_start" }
  | { type: "audio_stop" }
  | { type: "end_answer"; save?: boolean };

// Server → Client messages
export type ServerMessage =
  | { type: "session_started"; sessionId: string; bullets: BulletSummary[] }
  | { type: "bullet_update"; transitions: BulletTransition[]; bullets: BulletSummary[] }
  | { type: "followup"; record: FollowupRecord }
  | { type: "report"; report: SessionReport; paths: string[] }
  | { type: "error"; message: string; recoverable: boolean };
