// Coverage Session - one spoken answer to one question.
//
// Composes the transcript log, the transcript buffer, a coverage strategy, the
// bullet state machine and the follow-up scheduler, and runs evaluation cycles:
//
//   drain → full answer → coverage strategy + confidence oracle
//         → state machine → scheduler → phrasing → follow-up logged
//
// Ownership: update() only ingests synchronously; the cycle loop is the sole
// writer of bullet state and the follow-up log. At most one cycle loop runs
// per session. A fragment that arrives mid-cycle waits in the buffer and the
// loop re-checks the trigger after every cycle, so nothing is evaluated twice
// or dropped.
//
// Lifecycle: active → finalized, exactly once. Oracle results landing after
// finalize() are discarded.

import { v4 as uuidv4 } from "uuid";
import { BulletState } from "./types.js";
import type {
  Bullet,
  BulletInput,
  BulletSummary,
  BulletVerdict,
  ConfidenceVerdict,
  CycleResult,
  EngineConfig,
  FollowupCandidate,
  FollowupRecord,
  QuestionContext,
  SessionReport,
  SessionStatus,
  TranscriptEntry,
} from "./types.js";
import type { ConfidenceOracle, PhrasingOracle } from "./oracles.js";
import { fallbackFollowupText } from "./oracles.js";
import type { CoverageStrategy } from "./coverage-strategy.js";
import { BulletStateMachine } from "./bullet-state-machine.js";
import { FollowupScheduler } from "./followup-scheduler.js";
import { TranscriptBuffer } from "./transcript-buffer.js";
import { TranscriptLog } from "./transcript-log.js";
import { resolveEngineConfig } from "./config.js";
import { SequenceGapError, SessionFinalizedError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { withTimeout } from "./utils.js";

export interface SessionCallbacks {
  onCycle?: (result: CycleResult) => void;
  onFollowup?: (record: FollowupRecord) => void;
}

export interface CoverageSessionDeps {
  strategy: CoverageStrategy;
  confidenceOracle: ConfidenceOracle;
  /** Falls back to the fixed template when absent or failing. */
  phrasingOracle?: PhrasingOracle;
  logger?: Logger;
  /** Monotonic milliseconds. Defaults to Date.now. */
  clock?: () => number;
  callbacks?: SessionCallbacks;
}

export interface CoverageSessionOptions {
  id?: string;
  question: Pick<QuestionContext, "questionId" | "questionText"> & Partial<QuestionContext>;
  bullets: readonly BulletInput[];
  config?: Partial<EngineConfig>;
}

export interface FragmentInput {
  sequenceIndex: number;
  text: string;
}

export class CoverageSession {
  readonly id: string;
  readonly question: QuestionContext;
  readonly config: EngineConfig;
  readonly startedAt: Date;

  private status: SessionStatus = "active";
  private readonly startedAtMs: number;

  private readonly log = new TranscriptLog();
  private readonly buffer: TranscriptBuffer;
  private readonly machine: BulletStateMachine;
  private readonly scheduler: FollowupScheduler;
  private readonly followups: FollowupRecord[] = [];

  private lastFollowup: FollowupRecord | null = null;
  /** Bullet the last follow-up targeted, until one cycle has consumed it. */
  private outstandingBulletId: string | null = null;
  private lastSequenceIndex: number | null = null;
  private cycleCount = 0;
  private cycleRunning = false;
  private inFlight: Promise<FollowupRecord | null> | null = null;

  private readonly deps: CoverageSessionDeps;
  private readonly logger: Logger;
  private readonly clock: () => number;

  /** @throws ConfigurationError for invalid config or bullets */
  constructor(options: CoverageSessionOptions, deps: CoverageSessionDeps) {
    this.config = resolveEngineConfig(options.config);
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("CoverageSession");
    this.clock = deps.clock ?? Date.now;

    this.id = options.id ?? uuidv4();
    this.question = {
      questionId: options.question.questionId,
      questionText: options.question.questionText,
      tags: [...(options.question.tags ?? [])],
      subtags: [...(options.question.subtags ?? [])],
    };
    this.machine = new BulletStateMachine(options.bullets, deps.strategy.conservativeClassification);
    this.scheduler = new FollowupScheduler({ followupCooldownMs: this.config.followupCooldownMs });

    this.startedAt = new Date();
    this.startedAtMs = this.clock();
    this.buffer = new TranscriptBuffer(
      { evaluationIntervalMs: this.config.evaluationIntervalMs, fragmentThreshold: this.config.fragmentThreshold },
      this.log,
      this.startedAtMs,
    );

    this.logger.info(
      `Session ${this.id} started for question ${this.question.questionId}: ` +
        `${this.machine.all.length} bullets, strategy=${deps.strategy.name}`,
    );
  }

  // ─── Accessors ──────────────────────────────────────────────────────────────

  get isFinalized(): boolean {
    return this.status === "finalized";
  }

  /** Index the next in-order fragment should carry. */
  get nextSequenceIndex(): number {
    return this.lastSequenceIndex === null ? 0 : this.lastSequenceIndex + 1;
  }

  get bullets(): BulletSummary[] {
    return this.machine.summaries();
  }

  get followupLog(): FollowupRecord[] {
    return [...this.followups];
  }

  get transcript(): TranscriptEntry[] {
    return this.log.snapshot();
  }

  // ─── Ingestion ──────────────────────────────────────────────────────────────

  /**
   * Ingest one fragment and run any evaluation cycles it triggers.
   * Sequence numbers are advisory: a gap is logged, never rejected.
   *
   * @returns the latest follow-up issued by the cycles this call ran, or null
   *          (also null when another call's cycle loop picks the fragment up)
   * @throws SessionFinalizedError after finalize()
   */
  async update(fragment: FragmentInput): Promise<FollowupRecord | null> {
    this.assertActive("update");

    if (this.lastSequenceIndex !== null && fragment.sequenceIndex !== this.lastSequenceIndex + 1) {
      const gap = new SequenceGapError(this.lastSequenceIndex + 1, fragment.sequenceIndex);
      this.logger.warn(`${gap.message} (session ${this.id}); processing in arrival order`);
    }
    this.lastSequenceIndex = fragment.sequenceIndex;

    this.buffer.ingest({
      sequenceIndex: fragment.sequenceIndex,
      text: fragment.text,
      receivedAt: this.clock(),
    });

    return this.pump(false);
  }

  /** Run cycles due on the time trigger. No-op once finalized. */
  async tick(): Promise<FollowupRecord | null> {
    if (this.isFinalized) {
      return null;
    }
    return this.pump(false);
  }

  /**
   * Wait for any running cycle, then force one over whatever is still
   * buffered. Used before finalize() so trailing speech is counted.
   */
  async flush(): Promise<FollowupRecord | null> {
    this.assertActive("flush");
    while (this.cycleRunning && this.inFlight) {
      await this.inFlight;
    }
    return this.pump(true);
  }

  // ─── Finalization ───────────────────────────────────────────────────────────

  /**
   * Stamp completion and build the immutable report.
   * score = covered / total * 100, or 0 without bullets.
   *
   * @throws SessionFinalizedError on a second call
   */
  finalize(): SessionReport {
    this.assertActive("finalize");
    this.status = "finalized";
    const completedAt = new Date();
    const durationMs = Math.max(0, this.clock() - this.startedAtMs);

    const bullets = this.machine.all;
    const covered = bullets.filter((b) => b.state === BulletState.COVERED);
    const skipped = bullets.filter((b) => b.state === BulletState.SKIPPED);
    const missed = bullets.filter((b) => b.state !== BulletState.COVERED);
    const score = bullets.length === 0 ? 0 : (covered.length / bullets.length) * 100;

    const report: SessionReport = Object.freeze({
      sessionId: this.id,
      questionId: this.question.questionId,
      questionText: this.question.questionText,
      tags: Object.freeze([...this.question.tags]),
      subtags: Object.freeze([...this.question.subtags]),
      score,
      coveredPoints: Object.freeze(covered.map((b) => b.text)),
      missedPoints: Object.freeze(missed.map((b) => b.text)),
      skippedPoints: Object.freeze(skipped.map((b) => b.text)),
      bullets: Object.freeze(this.machine.summaries().map((s) => Object.freeze(s))),
      followups: Object.freeze([...this.followups]),
      transcript: Object.freeze(this.log.snapshot()),
      startedAt: this.startedAt,
      completedAt,
      durationSeconds: Math.round(durationMs / 100) / 10,
    });

    this.logger.info(
      `Session ${this.id} finalized: score=${score.toFixed(1)}, ` +
        `covered=${covered.length}/${bullets.length}, followups=${this.followups.length}`,
    );
    return report;
  }

  // ─── Cycle loop ─────────────────────────────────────────────────────────────

  private pump(force: boolean): Promise<FollowupRecord | null> {
    if (this.cycleRunning) {
      return Promise.resolve(null);
    }
    this.cycleRunning = true;
    const run = this.runCycles(force);
    this.inFlight = run;
    return run;
  }

  private async runCycles(force: boolean): Promise<FollowupRecord | null> {
    let latest: FollowupRecord | null = null;
    let forced = force && this.buffer.size > 0;
    try {
      while (!this.isFinalized && (forced || this.buffer.shouldEvaluate(this.clock()))) {
        forced = false;
        const result = await this.runCycle();
        if (result?.followup) {
          latest = result.followup;
        }
      }
    } finally {
      // Reset before this promise settles so an update() landing right after
      // the last trigger check starts a fresh loop
      this.cycleRunning = false;
    }
    return latest;
  }

  /** One evaluation cycle; null when the session was finalized mid-cycle. */
  private async runCycle(): Promise<CycleResult | null> {
    const cycle = ++this.cycleCount;
    const evaluatedText = this.buffer.drain(this.clock());
    const fullAnswerText = this.log.fullAnswerText();
    const targets = this.machine.evaluationTargets();

    const [verdicts, confidence] = await Promise.all([
      this.evaluateCoverage(targets, fullAnswerText, evaluatedText),
      this.classifyConfidence(evaluatedText),
    ]);

    if (this.isFinalized) {
      this.logger.info(`Cycle ${cycle} of session ${this.id} finished after finalize; results discarded`);
      return null;
    }

    if (verdicts.length > 0 && verdicts.every((v) => v.degraded)) {
      this.logger.warn(`Cycle ${cycle} of session ${this.id}: no usable coverage verdicts, state left unchanged`);
      const result: CycleResult = {
        cycle,
        evaluatedText,
        confidence,
        verdicts,
        transitions: [],
        followup: null,
        noop: true,
      };
      this.notify(result);
      return result;
    }

    const outstanding = this.outstandingBulletId;
    this.outstandingBulletId = null;
    const transitions = this.machine.apply(verdicts, confidence, outstanding);

    const issuedAt = this.clock();
    const candidate = this.scheduler.selectFollowup(this.machine, this.lastFollowup, issuedAt);
    let followup: FollowupRecord | null = null;
    if (candidate) {
      const text = await this.phrase(candidate);
      if (this.isFinalized) {
        this.logger.info(`Follow-up for bullet ${candidate.bullet.id} dropped: session ${this.id} finalized`);
        return null;
      }
      // Only this loop writes bullet state, so the candidate is still open here
      const issued = this.machine.markFollowupIssued(candidate.bullet.id, issuedAt);
      if (issued) {
        transitions.push(issued);
      }
      followup = { bulletId: candidate.bullet.id, text, issuedAt };
      this.followups.push(followup);
      this.log.appendFollowup(followup);
      this.lastFollowup = followup;
      this.outstandingBulletId = followup.bulletId;
      this.logger.info(`Follow-up for bullet ${followup.bulletId} (session ${this.id}): ${followup.text}`);
    }

    const result: CycleResult = {
      cycle,
      evaluatedText,
      confidence,
      verdicts,
      transitions,
      followup,
      noop: false,
    };
    this.notify(result);
    return result;
  }

  private async evaluateCoverage(
    targets: readonly Bullet[],
    fullAnswerText: string,
    latestText: string,
  ): Promise<BulletVerdict[]> {
    if (targets.length === 0) {
      return [];
    }
    try {
      return await this.deps.strategy.evaluate({ bullets: targets, fullAnswerText, latestText });
    } catch (err) {
      // Strategies degrade per call; anything escaping is treated as a wholesale failure
      this.logger.error(`Coverage strategy failed (session ${this.id}): ${errorMessage(err)}`);
      return targets.map((b): BulletVerdict => ({
        bulletId: b.id,
        status: this.deps.strategy.conservativeClassification,
        degraded: true,
      }));
    }
  }

  private async classifyConfidence(text: string): Promise<ConfidenceVerdict> {
    if (text.trim().length === 0) {
      return "knows";
    }
    try {
      return await withTimeout("ConfidenceOracle", this.config.oracleTimeoutMs, () =>
        this.deps.confidenceOracle.classify(text),
      );
    } catch (err) {
      this.logger.warn(`Confidence degraded to "knows" (session ${this.id}): ${errorMessage(err)}`);
      return "knows";
    }
  }

  private async phrase(candidate: FollowupCandidate): Promise<string> {
    const oracle = this.deps.phrasingOracle;
    if (!oracle) {
      return fallbackFollowupText(candidate.bullet.text);
    }
    try {
      return await withTimeout("PhrasingOracle", this.config.oracleTimeoutMs, () =>
        oracle.compose(candidate.bullet.text, candidate.uncoveredBulletTexts),
      );
    } catch (err) {
      this.logger.warn(`Phrasing fell back to template (session ${this.id}): ${errorMessage(err)}`);
      return fallbackFollowupText(candidate.bullet.text);
    }
  }

  private notify(result: CycleResult): void {
    const { onCycle, onFollowup } = this.deps.callbacks ?? {};
    try {
      onCycle?.(result);
      if (result.followup) {
        onFollowup?.(result.followup);
      }
    } catch (err) {
      this.logger.error(`Session callback threw (session ${this.id}): ${errorMessage(err)}`);
    }
  }

  private assertActive(operation: string): void {
    if (this.isFinalized) {
      throw new SessionFinalizedError(this.id, operation);
    }
  }
}
