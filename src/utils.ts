// Shared utilities for the Answer Coverage Coach.
//
// Deterministic helpers used by several components (claim fallback, similarity
// matching, oracle timeouts, report formatting).

import { OracleUnavailableError, errorMessage } from "./errors.js";

// ─── splitSentences ─────────────────────────────────────────────────────────────

/**
 * Abbreviations (lowercase, no trailing period) whose period never ends a
 * sentence. Spoken technical answers mostly hit the Latin ones.
 */
const ABBREVIATIONS = new Set(["e.g", "i.e", "etc", "vs", "mr", "mrs", "ms", "dr", "prof", "approx"]);

/**
 * Split text into sentences at `.`, `!` and `?`, keeping the punctuation with
 * the preceding sentence. A run of punctuation ("?!", "...") counts as one
 * boundary; decimals ("0.75") and the abbreviations above never split.
 *
 * @returns trimmed, non-empty sentences
 */
export function splitSentences(text: string): string[] {
  if (!text || text.trim().length === 0) {
    return [];
  }

  const sentences: string[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch !== "." && ch !== "!" && ch !== "?") continue;

    let end = i + 1;
    while (end < text.length && ".!?".includes(text[end])) end++;

    // Boundary only when followed by whitespace or end of text
    if (end < text.length && !/\s/.test(text[end])) {
      i = end - 1;
      continue;
    }

    if (ch === "." && end === i + 1) {
      const preceding = text.slice(start, i).trim().split(/\s+/).pop() ?? "";
      if (ABBREVIATIONS.has(preceding.toLowerCase())) {
        continue;
      }
    }

    const sentence = text.slice(start, end).trim();
    if (sentence.length > 0) sentences.push(sentence);
    start = end;
    i = end - 1;
  }

  const rest = text.slice(start).trim();
  if (rest.length > 0) sentences.push(rest);

  return sentences;
}

// ─── Cosine Similarity ──────────────────────────────────────────────────────────

/**
 * dot(a, b) / (|a| * |b|). Returns 0 for empty vectors, mismatched lengths or a
 * zero vector.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Clamp a similarity into [0, 1]; negative cosine means "no match". */
export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

// ─── Timeouts ───────────────────────────────────────────────────────────────────

/**
 * Run an oracle call with a hard deadline. Any rejection, and the deadline
 * itself, surfaces as an OracleUnavailableError tagged with `oracle`.
 */
export async function withTimeout<T>(
  oracle: string,
  timeoutMs: number,
  call: () => Promise<T>,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new OracleUnavailableError(oracle, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(), deadline]);
  } catch (err) {
    if (err instanceof OracleUnavailableError) throw err;
    throw new OracleUnavailableError(oracle, errorMessage(err), { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

// ─── Formatting ─────────────────────────────────────────────────────────────────

/** Formats milliseconds since an origin as `[MM:SS]`. */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `[${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}]`;
}
