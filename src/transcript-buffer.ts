/**
 * Batches incoming transcript fragments and decides when an evaluation cycle
 * is due: either the count threshold is reached, or the evaluation interval
 * has elapsed since the last drain with something still buffered.
 *
 * The buffer is the only component that resets its own accumulation; the
 * session's TranscriptLog is append-only and untouched by drain().
 */

import type { TranscriptFragment } from "./types.js";
import type { TranscriptLog } from "./transcript-log.js";

export interface TranscriptBufferConfig {
  evaluationIntervalMs: number;
  fragmentThreshold: number;
}

export class TranscriptBuffer {
  private pending: TranscriptFragment[] = [];
  private lastEvaluationAt: number;
  private readonly config: TranscriptBufferConfig;
  private readonly log: TranscriptLog;

  constructor(config: TranscriptBufferConfig, log: TranscriptLog, startedAt: number) {
    this.config = config;
    this.log = log;
    this.lastEvaluationAt = startedAt;
  }

  /**
   * Append to the session transcript log and, unless the text is blank, to
   * the pending batch. Silence never counts toward either trigger.
   */
  ingest(fragment: TranscriptFragment): void {
    this.log.appendSpeech(fragment);
    if (fragment.text.trim().length > 0) {
      this.pending.push(fragment);
    }
  }

  shouldEvaluate(now: number): boolean {
    if (this.pending.length === 0) {
      return false;
    }
    if (this.pending.length >= this.config.fragmentThreshold) {
      return true;
    }
    return now - this.lastEvaluationAt > this.config.evaluationIntervalMs;
  }

  /**
   * Returns the pending fragments joined in order and clears the batch.
   * Draining an empty buffer yields "" and only restamps the clock.
   */
  drain(now: number): string {
    const text = this.pending.map((fragment) => fragment.text.trim()).join(" ");
    this.pending = [];
    this.lastEvaluationAt = now;
    return text;
  }

  /** Number of fragments waiting for the next cycle. */
  get size(): number {
    return this.pending.length;
  }
}
