// Answer Coverage Coach - Session Manager
// Registry of independent coverage sessions keyed by id. Each session owns all
// of its state; the manager only wires oracles, transcription and persistence
// around it.
//
// Privacy: audio chunks are forwarded to the transcript source in memory only.

import type { BulletInput, EngineConfig, SessionReport } from "./types.js";
import type { BulletDecomposer, ConfidenceOracle, PhrasingOracle } from "./oracles.js";
import type { CoverageOracleSet } from "./coverage-strategy.js";
import { createCoverageStrategy } from "./coverage-strategy.js";
import { CoverageSession } from "./coverage-session.js";
import type { SessionCallbacks } from "./coverage-session.js";
import type { TranscriptSource } from "./transcription-engine.js";
import type { ReportSink } from "./file-persistence.js";
import { decomposeModelAnswer } from "./bullet-decomposer.js";
import { resolveEngineConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  oracles: CoverageOracleSet & {
    confidenceOracle: ConfidenceOracle;
    phrasingOracle?: PhrasingOracle;
    bulletDecomposer?: BulletDecomposer;
  };
  config?: Partial<EngineConfig>;
  reportSink?: ReportSink;
  /** One source per audio stream; absent means text fragments only. */
  transcriptSourceFactory?: () => TranscriptSource;
  logger?: Logger;
  clock?: () => number;
}

export interface StartAnswerRequest {
  questionId: string;
  questionText: string;
  /** Explicit bullets win over a model answer. */
  bullets?: BulletInput[];
  modelAnswer?: string;
  tags?: string[];
  subtags?: string[];
}

export interface EndAnswerResult {
  report: SessionReport;
  paths: string[];
}

export class SessionManager {
  private readonly sessions = new Map<string, CoverageSession>();
  private readonly transcriptSources = new Map<string, TranscriptSource>();
  private readonly deps: SessionManagerDeps;
  private readonly config: EngineConfig;
  private readonly logger: Logger;

  /** @throws ConfigurationError for an invalid engine config */
  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
    this.config = resolveEngineConfig(deps.config);
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    // Fail at startup, not on the first answer
    createCoverageStrategy(this.config, deps.oracles, this.logger);
    this.logger.info(
      `Strategy: ${this.config.evaluationStrategy}; ` +
        `audio: ${deps.transcriptSourceFactory ? "enabled" : "disabled (text fragments only)"}`,
    );
  }

  get size(): number {
    return this.sessions.size;
  }

  get audioEnabled(): boolean {
    return this.deps.transcriptSourceFactory !== undefined;
  }

  /**
   * Resolve bullets (explicit, else decomposed from the model answer) and open
   * a new session.
   * @throws ConfigurationError for invalid bullets
   */
  async startAnswer(request: StartAnswerRequest, callbacks?: SessionCallbacks): Promise<CoverageSession> {
    const bullets = await this.resolveBullets(request);
    if (bullets.length === 0) {
      this.logger.warn(`Question ${request.questionId} has no bullets; its score will be 0`);
    }

    const session = new CoverageSession(
      {
        question: {
          questionId: request.questionId,
          questionText: request.questionText,
          tags: request.tags,
          subtags: request.subtags,
        },
        bullets,
        config: this.config,
      },
      {
        strategy: createCoverageStrategy(this.config, this.deps.oracles, this.logger),
        confidenceOracle: this.deps.oracles.confidenceOracle,
        phrasingOracle: this.deps.oracles.phrasingOracle,
        logger: this.logger,
        clock: this.deps.clock,
        callbacks,
      },
    );
    this.sessions.set(session.id, session);
    return session;
  }

  /** @throws Error if the session does not exist */
  getSession(sessionId: string): CoverageSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  // ─── Audio ──────────────────────────────────────────────────────────────────

  /**
   * Open a transcript source whose final fragments feed the session.
   * @throws Error when audio is disabled or already running for the session
   */
  startAudio(sessionId: string): void {
    const session = this.getSession(sessionId);
    const factory = this.deps.transcriptSourceFactory;
    if (!factory) {
      throw new Error("Audio input is not configured (DEEPGRAM_API_KEY missing)");
    }
    if (this.transcriptSources.has(sessionId)) {
      throw new Error(`Audio already active for session ${sessionId}`);
    }

    const source = factory();
    this.transcriptSources.set(sessionId, source);
    source.start((fragment) => {
      if (session.isFinalized) return;
      // Renumber onto the session's sequence so audio and text fragments interleave cleanly
      session.update({ sequenceIndex: session.nextSequenceIndex, text: fragment.text }).catch((err: unknown) => {
        this.logger.error(`Audio fragment rejected by session ${sessionId}: ${errorMessage(err)}`);
      });
    });
    this.logger.info(`Live transcription started for session ${sessionId}`);
  }

  /** @throws Error if no audio is active for the session */
  feedAudio(sessionId: string, chunk: Buffer): void {
    const source = this.transcriptSources.get(sessionId);
    if (!source) {
      throw new Error(`No active audio for session ${sessionId}`);
    }
    source.feedAudio(chunk);
  }

  /** No-op when audio is not running. */
  stopAudio(sessionId: string): void {
    const source = this.transcriptSources.get(sessionId);
    if (!source) return;
    this.transcriptSources.delete(sessionId);
    source.stop();
    if (source.qualityWarning) {
      this.logger.warn(`Transcription quality warning for session ${sessionId}: connection dropped or errored`);
    }
    this.logger.info(`Live transcription stopped for session ${sessionId}`);
  }

  // ─── Completion ─────────────────────────────────────────────────────────────

  /**
   * Stop audio, evaluate what is still buffered, finalize and optionally save.
   * The session leaves the registry whatever the outcome.
   */
  async endAnswer(sessionId: string, options: { save?: boolean } = {}): Promise<EndAnswerResult> {
    const session = this.getSession(sessionId);
    try {
      this.stopAudio(sessionId);
      await session.flush();
      const report = session.finalize();
      const paths = options.save ? await this.saveReport(report) : [];
      return { report, paths };
    } finally {
      this.sessions.delete(sessionId);
    }
  }

  /** Drop a session without a report (e.g. the client disconnected). */
  removeSession(sessionId: string): void {
    this.stopAudio(sessionId);
    const session = this.sessions.get(sessionId);
    if (session && !session.isFinalized) {
      session.finalize();
    }
    this.sessions.delete(sessionId);
  }

  private async saveReport(report: SessionReport): Promise<string[]> {
    if (!this.deps.reportSink) {
      this.logger.warn(`Save requested for session ${report.sessionId} but no report sink is configured`);
      return [];
    }
    return this.deps.reportSink.save(report);
  }

  private async resolveBullets(request: StartAnswerRequest): Promise<BulletInput[]> {
    if (request.bullets && request.bullets.length > 0) {
      return request.bullets;
    }
    if (request.modelAnswer) {
      return decomposeModelAnswer(request.questionText, request.modelAnswer, {
        decomposer: this.deps.oracles.bulletDecomposer,
        timeoutMs: this.config.oracleTimeoutMs,
        logger: this.logger,
      });
    }
    return [];
  }
}
