// Answer Coverage Coach - File Persistence
// Opt-in saving of finalized session reports to disk.
//
// Append-only: every save creates a fresh directory and writes with exclusive
// create, so an earlier report is never overwritten.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { SessionReport, TranscriptEntry } from "./types.js";
import { FOLLOWUP_MARKER } from "./transcript-log.js";
import { formatElapsed } from "./utils.js";

/** Where finalized reports go. FilePersistence is the on-disk implementation. */
export interface ReportSink {
  /** @returns the paths written */
  save(report: SessionReport): Promise<string[]>;
}

function entryTime(entry: TranscriptEntry): number {
  return entry.kind === "speech" ? entry.fragment.receivedAt : entry.record.issuedAt;
}

/**
 * Renders the transcript.txt format, timed from the first entry:
 *   [MM:SS] spoken text
 *   [MM:SS] [FOLLOW-UP] question asked
 */
export function formatTranscript(entries: readonly TranscriptEntry[]): string {
  if (entries.length === 0) {
    return "";
  }
  const origin = entryTime(entries[0]);
  return entries
    .map((entry) => {
      const stamp = formatElapsed(entryTime(entry) - origin);
      return entry.kind === "speech"
        ? `${stamp} ${entry.fragment.text.trim()}`
        : `${stamp} ${FOLLOWUP_MARKER} ${entry.record.text}`;
    })
    .join("\n");
}

/** Pretty-printed report; Dates serialize as ISO strings. */
export function formatReport(report: SessionReport): string {
  return JSON.stringify(report, null, 2);
}

function sanitizeSegment(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9_-]+/g, "-").replace(/^-+|-+$/g, "");
  return cleaned.length > 0 ? cleaned : "question";
}

/**
 * Directory name for a report, in local time.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{questionId}_{sessionId}`
 */
export function buildDirectoryName(report: SessionReport): string {
  const date = report.startedAt;
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${sanitizeSegment(report.questionId)}_${sanitizeSegment(report.sessionId)}`;
}

/**
 * Output directory structure:
 *   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{questionId}_{sessionId}/
 *     report.json
 *     transcript.txt
 */
export class FilePersistence implements ReportSink {
  private readonly baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  /** @throws when the report directory already exists */
  async save(report: SessionReport): Promise<string[]> {
    await mkdir(this.baseDir, { recursive: true });
    const dirPath = join(this.baseDir, buildDirectoryName(report));
    await mkdir(dirPath);

    const reportPath = join(dirPath, "report.json");
    await writeFile(reportPath, formatReport(report), { encoding: "utf-8", flag: "wx" });

    const transcriptPath = join(dirPath, "transcript.txt");
    await writeFile(transcriptPath, formatTranscript(report.transcript), { encoding: "utf-8", flag: "wx" });

    return [reportPath, transcriptPath];
  }
}
