// Answer Coverage Coach - Entry point
// Wires the OpenAI oracles, optional Deepgram transcription and persistence
// into the session manager and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { TranscriptionEngine } from "./transcription-engine.js";
import { FilePersistence } from "./file-persistence.js";
import {
  EmbeddingSimilarityMatcher,
  OpenAIBinaryCoverageOracle,
  OpenAIBulletDecomposer,
  OpenAIClaimOracle,
  OpenAIConfidenceOracle,
  OpenAICoverageOracle,
  OpenAIPhrasingOracle,
} from "./llm-oracles.js";
import type { OpenAIClient } from "./llm-oracles.js";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { errorMessage } from "./errors.js";

export const APP_NAME = "Answer Coverage Coach";
export const APP_VERSION = "0.1.0";

const logger = createConsoleLogger("Init");

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    logger.error(errorMessage(err));
    return process.exit(1);
  }
}

const config = loadConfigOrExit();

// ─── Initialize API clients ─────────────────────────────────────────────────────

logger.info(`Creating OpenAI client (chat: ${config.chatModel}, embeddings: ${config.embeddingModel})...`);
const openaiClient = new OpenAI({ apiKey: config.openaiApiKey }) as unknown as OpenAIClient;

const deepgramKey = config.deepgramApiKey;
if (!deepgramKey) {
  logger.warn("DEEPGRAM_API_KEY is not set; audio input disabled, text fragments only.");
}
const deepgramClient = deepgramKey ? createDeepgramClient(deepgramKey) : null;

// ─── Create SessionManager with all dependencies ────────────────────────────────

const sessionManager = new SessionManager({
  oracles: {
    coverageOracle: new OpenAICoverageOracle(openaiClient, config.chatModel),
    binaryCoverageOracle: new OpenAIBinaryCoverageOracle(openaiClient, config.chatModel),
    claimOracle: new OpenAIClaimOracle(openaiClient, config.chatModel),
    similarityMatcher: new EmbeddingSimilarityMatcher(openaiClient, config.embeddingModel),
    confidenceOracle: new OpenAIConfidenceOracle(openaiClient, config.chatModel),
    phrasingOracle: new OpenAIPhrasingOracle(openaiClient, config.chatModel),
    bulletDecomposer: new OpenAIBulletDecomposer(openaiClient, config.chatModel),
  },
  config: config.engine,
  reportSink: new FilePersistence(config.outputDir),
  transcriptSourceFactory: deepgramClient
    ? () => new TranscriptionEngine(deepgramClient, undefined, createConsoleLogger("TranscriptionEngine"))
    : undefined,
  logger: createConsoleLogger("SessionManager"),
});

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ sessionManager, logger: createConsoleLogger("Server") });

server
  .listen(config.port)
  .then((port) => {
    logger.info(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    logger.info(`Strategy: ${config.engine.evaluationStrategy}; reports saved under ${config.outputDir}/`);
  })
  .catch((err: unknown) => {
    logger.error(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  });
