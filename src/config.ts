// Configuration: engine defaults, engine config validation, and the process
// config read from the environment (the entry point loads .env first).

import type { EngineConfig, EvaluationStrategyName } from "./types.js";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_CHAT_MODEL, DEFAULT_EMBEDDING_MODEL } from "./llm-oracles.js";

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  evaluationStrategy: "ternary",
  evaluationIntervalMs: 20_000,
  fragmentThreshold: 3,
  followupCooldownMs: 30_000,
  presentThreshold: 0.75,
  oracleTimeoutMs: 8_000,
};

const STRATEGIES: readonly EvaluationStrategyName[] = ["ternary", "similarity"];

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws ConfigurationError naming the first invalid field
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };

  if (!STRATEGIES.includes(config.evaluationStrategy)) {
    throw new ConfigurationError(
      `Invalid evaluationStrategy "${config.evaluationStrategy}". Expected one of: ${STRATEGIES.join(", ")}`,
    );
  }
  if (!Number.isFinite(config.evaluationIntervalMs) || config.evaluationIntervalMs <= 0) {
    throw new ConfigurationError(`Invalid evaluationIntervalMs: ${config.evaluationIntervalMs}. Must be > 0.`);
  }
  if (!Number.isInteger(config.fragmentThreshold) || config.fragmentThreshold < 1) {
    throw new ConfigurationError(`Invalid fragmentThreshold: ${config.fragmentThreshold}. Must be an integer >= 1.`);
  }
  if (!Number.isFinite(config.followupCooldownMs) || config.followupCooldownMs < 0) {
    throw new ConfigurationError(`Invalid followupCooldownMs: ${config.followupCooldownMs}. Must be >= 0.`);
  }
  if (!Number.isFinite(config.presentThreshold) || config.presentThreshold <= 0 || config.presentThreshold > 1) {
    throw new ConfigurationError(`Invalid presentThreshold: ${config.presentThreshold}. Must be in (0, 1].`);
  }
  if (!Number.isFinite(config.oracleTimeoutMs) || config.oracleTimeoutMs <= 0) {
    throw new ConfigurationError(`Invalid oracleTimeoutMs: ${config.oracleTimeoutMs}. Must be > 0.`);
  }

  return config;
}

// ─── Process configuration ──────────────────────────────────────────────────────

export interface AppConfig {
  port: number;
  openaiApiKey: string;
  /** Null disables audio input; clients then send text fragments only. */
  deepgramApiKey: string | null;
  chatModel: string;
  embeddingModel: string;
  outputDir: string;
  engine: EngineConfig;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readStrategy(env: NodeJS.ProcessEnv): EvaluationStrategyName {
  const raw = env.EVALUATION_STRATEGY?.trim();
  if (!raw) {
    return DEFAULT_ENGINE_CONFIG.evaluationStrategy;
  }
  const match = STRATEGIES.find((s) => s === raw);
  if (!match) {
    throw new ConfigurationError(
      `EVALUATION_STRATEGY must be one of ${STRATEGIES.join(", ")}, got "${raw}"`,
    );
  }
  return match;
}

/**
 * Read the process configuration from environment variables.
 * @throws ConfigurationError when OPENAI_API_KEY is missing or a value is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const openaiApiKey = env.OPENAI_API_KEY?.trim();
  if (!openaiApiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is not set. Add it to your .env file.");
  }

  const port = readNumber(env, "PORT", 3000);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`PORT must be an integer between 0 and 65535, got ${port}`);
  }

  return {
    port,
    openaiApiKey,
    deepgramApiKey: env.DEEPGRAM_API_KEY?.trim() || null,
    chatModel: env.CHAT_MODEL?.trim() || DEFAULT_CHAT_MODEL,
    embeddingModel: env.EMBED_MODEL?.trim() || DEFAULT_EMBEDDING_MODEL,
    outputDir: env.OUTPUT_DIR?.trim() || "output",
    engine: resolveEngineConfig({
      evaluationStrategy: readStrategy(env),
      evaluationIntervalMs: readNumber(env, "EVALUATION_INTERVAL_MS", DEFAULT_ENGINE_CONFIG.evaluationIntervalMs),
      fragmentThreshold: readNumber(env, "FRAGMENT_THRESHOLD", DEFAULT_ENGINE_CONFIG.fragmentThreshold),
      followupCooldownMs: readNumber(env, "FOLLOWUP_COOLDOWN_MS", DEFAULT_ENGINE_CONFIG.followupCooldownMs),
      presentThreshold: readNumber(env, "PRESENT_THRESHOLD", DEFAULT_ENGINE_CONFIG.presentThreshold),
      oracleTimeoutMs: readNumber(env, "ORACLE_TIMEOUT_MS", DEFAULT_ENGINE_CONFIG.oracleTimeoutMs),
    }),
  };
}
