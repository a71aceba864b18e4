// Append-only transcript log for one session.
// Speech fragments and follow-up markers interleave in arrival order; the
// full-answer text handed to the coverage oracle is rebuilt from it each cycle.

import type { FollowupRecord, TranscriptEntry, TranscriptFragment } from "./types.js";

export const FOLLOWUP_MARKER = "[FOLLOW-UP]";

export class TranscriptLog {
  private readonly entries: TranscriptEntry[] = [];

  appendSpeech(fragment: TranscriptFragment): void {
    this.entries.push({ kind: "speech", fragment });
  }

  appendFollowup(record: FollowupRecord): void {
    this.entries.push({ kind: "followup", record });
  }

  get length(): number {
    return this.entries.length;
  }

  /** Snapshot copy; the log itself is never handed out. */
  snapshot(): TranscriptEntry[] {
    return [...this.entries];
  }

  /**
   * Speech and follow-up markers joined in order, so the coverage oracle sees
   * what was asked as context.
   */
  fullAnswerText(): string {
    return this.entries
      .map((entry) =>
        entry.kind === "speech" ? entry.fragment.text : `${FOLLOWUP_MARKER} ${entry.record.text}`,
      )
      .filter((text) => text.trim().length > 0)
      .join(" ");
  }
}
