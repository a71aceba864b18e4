// Answer Coverage Coach - WebSocket Handler and Express Server
//
// One answer at a time per connection. The client opens it with start_answer,
// streams text fragments (or binary audio between audio_start/audio_stop),
// and closes it with end_answer. The server pushes bullet updates, follow-up
// questions and the final report.
//
// Privacy: audio chunks are in-memory only, never written to disk.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { SessionManager } from "./session-manager.js";
import type { BulletInput, ClientMessage, ServerMessage } from "./types.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./errors.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** How often due time-triggered cycles are run for an active answer */
const TICK_INTERVAL_MS = 1000;

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string | null;
  /** Set while start_answer is resolving bullets. */
  starting: boolean;
  audioActive: boolean;
  tickTimer: ReturnType<typeof setInterval> | null;
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export type ServerLogger = Logger;

const defaultLogger: ServerLogger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  /** Directory to serve static files from; nothing is served when omitted. */
  staticDir?: string;
  logger?: ServerLogger;
  tickIntervalMs?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Resolves with the bound port once listening (pass 0 for an ephemeral port). */
  listen(port: number): Promise<number>;
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { sessionManager, staticDir, logger = defaultLogger, tickIntervalMs = TICK_INTERVAL_MS } = options;

  const app = express();
  const httpServer = createServer(app);

  if (staticDir) {
    app.use(express.static(staticDir));
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", activeSessions: sessionManager.size, audio: sessionManager.audioEnabled });
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, logger, tickIntervalMs);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = address && typeof address === "object" ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  sessionManager: SessionManager,
  logger: ServerLogger,
  tickIntervalMs: number,
): void {
  const connState: ConnectionState = {
    sessionId: null,
    starting: false,
    audioActive: false,
    tickTimer: null,
  };

  logger.info("New WebSocket connection");

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, toBuffer(data), connState, sessionManager);
      } else {
        const message = parseClientMessage(toBuffer(data).toString("utf-8"));
        handleClientMessage(ws, message, connState, sessionManager, logger, tickIntervalMs);
      }
    } catch (err) {
      reportError(ws, connState, logger, err);
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed${connState.sessionId ? `, session ${connState.sessionId}` : ""}`);
    cleanupConnection(connState, sessionManager);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error: ${err.message}`);
    cleanupConnection(connState, sessionManager);
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function reportError(ws: WebSocket, connState: ConnectionState, logger: ServerLogger, err: unknown): void {
  const message = errorMessage(err);
  logger.error(`Error handling message${connState.sessionId ? ` for session ${connState.sessionId}` : ""}: ${message}`);
  sendMessage(ws, { type: "error", message, recoverable: true });
}

// ─── Client Message Parsing ─────────────────────────────────────────────────────

function readString(obj: Record<string, unknown>, field: string): string {
  const value = obj[field];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`Field "${field}" must be a non-empty string`);
  }
  return value;
}

function readStringArray(obj: Record<string, unknown>, field: string): string[] | undefined {
  const value = obj[field];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new Error(`Field "${field}" must be an array of strings`);
  }
  const items: unknown[] = value;
  return items.map((item) => {
    if (typeof item !== "string") {
      throw new Error(`Field "${field}" must be an array of strings`);
    }
    return item;
  });
}

function readBullets(obj: Record<string, unknown>): BulletInput[] | undefined {
  const value = obj.bullets;
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new Error(`Field "bullets" must be an array of { id, text }`);
  }
  const items: unknown[] = value;
  return items.map((item) => {
    if (!item || typeof item !== "object") {
      throw new Error(`Field "bullets" must be an array of { id, text }`);
    }
    const entry: Record<string, unknown> = Object.fromEntries(Object.entries(item));
    return { id: readString(entry, "id"), text: readString(entry, "text") };
  });
}

/**
 * Validates a JSON text frame into a ClientMessage.
 * @throws Error naming the first problem
 */
export function parseClientMessage(text: string): ClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error("Message is not valid JSON");
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("Message must be a JSON object");
  }
  const obj: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));

  switch (obj.type) {
    case "start_answer": {
      const modelAnswer = obj.modelAnswer;
      if (modelAnswer !== undefined && typeof modelAnswer !== "string") {
        throw new Error(`Field "modelAnswer" must be a string`);
      }
      return {
        type: "start_answer",
        questionId: readString(obj, "questionId"),
        questionText: readString(obj, "questionText"),
        bullets: readBullets(obj),
        modelAnswer,
        tags: readStringArray(obj, "tags"),
        subtags: readStringArray(obj, "subtags"),
      };
    }
    case "transcript_fragment": {
      const { sequenceIndex, text: fragmentText } = obj;
      if (typeof sequenceIndex !== "number" || !Number.isInteger(sequenceIndex) || sequenceIndex < 0) {
        throw new Error(`Field "sequenceIndex" must be a non-negative integer`);
      }
      if (typeof fragmentText !== "string") {
        throw new Error(`Field "text" must be a string`);
      }
      return { type: "transcript_fragment", sequenceIndex, text: fragmentText };
    }
    case "audio_start":
      return { type: "audio_start" };
    case "audio_stop":
      return { type: "audio_stop" };
    case "end_answer": {
      const save = obj.save;
      if (save !== undefined && typeof save !== "boolean") {
        throw new Error(`Field "save" must be a boolean`);
      }
      return { type: "end_answer", save };
    }
    default:
      throw new Error(`Unknown message type: ${String(obj.type)}`);
  }
}

// ─── Binary Message Handler (Audio Chunks) ──────────────────────────────────────

function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  connState: ConnectionState,
  sessionManager: SessionManager,
): void {
  if (!connState.sessionId || !connState.audioActive) {
    sendMessage(ws, {
      type: "error",
      message: "Audio chunks rejected: send audio_start during an active answer first.",
      recoverable: true,
    });
    return;
  }

  // 16-bit PCM = 2 bytes per sample
  if (data.length % 2 !== 0) {
    sendMessage(ws, {
      type: "error",
      message: `Audio chunk byte length (${data.length}) is not a multiple of 2. Expected 16-bit aligned PCM data.`,
      recoverable: true,
    });
    return;
  }

  sessionManager.feedAudio(connState.sessionId, data);
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
  tickIntervalMs: number,
): void {
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err: unknown) => reportError(ws, connState, logger, err));
  };

  switch (message.type) {
    case "start_answer":
      catchAsync(handleStartAnswer(ws, message, connState, sessionManager, logger, tickIntervalMs));
      break;

    case "transcript_fragment":
      catchAsync(handleTranscriptFragment(message, connState, sessionManager));
      break;

    case "audio_start":
      sessionManager.startAudio(requireSession(connState));
      connState.audioActive = true;
      break;

    case "audio_stop":
      sessionManager.stopAudio(requireSession(connState));
      connState.audioActive = false;
      break;

    case "end_answer":
      catchAsync(handleEndAnswer(ws, message, connState, sessionManager, logger));
      break;

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

function requireSession(connState: ConnectionState): string {
  if (!connState.sessionId) {
    throw new Error("No active answer. Send start_answer first.");
  }
  return connState.sessionId;
}

// ─── Start Answer ───────────────────────────────────────────────────────────────

async function handleStartAnswer(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "start_answer" }>,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
  tickIntervalMs: number,
): Promise<void> {
  if (connState.sessionId || connState.starting) {
    throw new Error("An answer is already in progress. Send end_answer first.");
  }

  connState.starting = true;
  try {
    const session = await sessionManager.startAnswer(
      {
        questionId: message.questionId,
        questionText: message.questionText,
        bullets: message.bullets,
        modelAnswer: message.modelAnswer,
        tags: message.tags,
        subtags: message.subtags,
      },
      {
        onCycle: (result) => {
          if (result.transitions.length > 0) {
            sendMessage(ws, { type: "bullet_update", transitions: result.transitions, bullets: session.bullets });
          }
        },
        onFollowup: (record) => {
          sendMessage(ws, { type: "followup", record });
        },
      },
    );

    if (ws.readyState !== WebSocket.OPEN) {
      // Client left while bullets were being resolved
      sessionManager.removeSession(session.id);
      return;
    }

    connState.sessionId = session.id;
    startTickTimer(connState, sessionManager, logger, tickIntervalMs);
    logger.info(`Answer started for question ${message.questionId}, session ${session.id}`);
    sendMessage(ws, { type: "session_started", sessionId: session.id, bullets: session.bullets });
  } finally {
    connState.starting = false;
  }
}

// ─── Transcript Fragment ────────────────────────────────────────────────────────

async function handleTranscriptFragment(
  message: Extract<ClientMessage, { type: "transcript_fragment" }>,
  connState: ConnectionState,
  sessionManager: SessionManager,
): Promise<void> {
  const session = sessionManager.getSession(requireSession(connState));
  // Follow-ups reach the client through the onFollowup callback
  await session.update({ sequenceIndex: message.sequenceIndex, text: message.text });
}

// ─── End Answer ─────────────────────────────────────────────────────────────────

async function handleEndAnswer(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "end_answer" }>,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): Promise<void> {
  const sessionId = requireSession(connState);
  stopTickTimer(connState);
  connState.sessionId = null;
  connState.audioActive = false;

  const { report, paths } = await sessionManager.endAnswer(sessionId, { save: message.save });
  logger.info(`Answer ended for session ${sessionId}: score ${report.score.toFixed(1)}`);
  sendMessage(ws, { type: "report", report, paths });
}

// ─── Tick Timer ─────────────────────────────────────────────────────────────────

function startTickTimer(
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
  tickIntervalMs: number,
): void {
  stopTickTimer(connState);
  connState.tickTimer = setInterval(() => {
    const sessionId = connState.sessionId;
    if (!sessionId) return;
    sessionManager
      .getSession(sessionId)
      .tick()
      .catch((err: unknown) => {
        logger.error(`Tick failed for session ${sessionId}: ${errorMessage(err)}`);
      });
  }, tickIntervalMs);
}

function stopTickTimer(connState: ConnectionState): void {
  if (connState.tickTimer !== null) {
    clearInterval(connState.tickTimer);
    connState.tickTimer = null;
  }
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(connState: ConnectionState, sessionManager: SessionManager): void {
  stopTickTimer(connState);
  if (connState.sessionId) {
    sessionManager.removeSession(connState.sessionId);
    connState.sessionId = null;
  }
  connState.audioActive = false;
}
