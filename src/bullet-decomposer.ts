// Turns a free-form model answer into the bullet list a session tracks.
// The LLM decomposer is preferred; a failure, a timeout or an empty result
// falls back to one bullet per line or sentence of the model answer.

import type { BulletInput } from "./types.js";
import type { BulletDecomposer } from "./oracles.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { errorMessage } from "./errors.js";
import { splitSentences, withTimeout } from "./utils.js";

export interface DecomposeOptions {
  decomposer?: BulletDecomposer;
  timeoutMs: number;
  logger?: Logger;
}

/** One bullet per non-empty line, each line split further into sentences; ids b1..bn. */
export function splitModelAnswer(modelAnswer: string): BulletInput[] {
  return modelAnswer
    .split(/\r?\n/)
    .flatMap((line) => splitSentences(line))
    .map((text, index) => ({ id: `b${index + 1}`, text }));
}

export async function decomposeModelAnswer(
  questionText: string,
  modelAnswer: string,
  options: DecomposeOptions,
): Promise<BulletInput[]> {
  if (modelAnswer.trim().length === 0) {
    return [];
  }
  const logger = options.logger ?? silentLogger;
  const decomposer = options.decomposer;
  if (!decomposer) {
    return splitModelAnswer(modelAnswer);
  }

  try {
    const bullets = await withTimeout("BulletDecomposer", options.timeoutMs, () =>
      decomposer.decompose(questionText, modelAnswer),
    );
    if (bullets.length > 0) {
      return bullets;
    }
    logger.warn("Bullet decomposer returned no bullets; splitting the model answer instead");
  } catch (err) {
    logger.warn(`Bullet decomposition degraded to sentence split: ${errorMessage(err)}`);
  }
  return splitModelAnswer(modelAnswer);
}
