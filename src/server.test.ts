import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import WebSocket from "ws";
import { createAppServer, parseClientMessage, type AppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import type { TranscriptSource } from "./transcription-engine.js";
import type { FragmentInput } from "./coverage-session.js";
import type { TernaryCoverageStatus } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TEST_PORT = 0; // Let OS assign a random port

function createSilentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

type ReceivedMessage = { type: string } & Record<string, unknown>;

function isReceivedMessage(value: unknown): value is ReceivedMessage {
  return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string";
}

/**
 * A test WebSocket client that queues all incoming messages.
 * Messages are buffered so none are lost to race conditions.
 */
class TestClient {
  readonly ws: WebSocket;
  private readonly received: ReceivedMessage[] = [];
  private readonly listeners = new Set<() => void>();

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) return;
      const parsed: unknown = JSON.parse(Buffer.isBuffer(data) ? data.toString("utf-8") : String(data));
      if (isReceivedMessage(parsed)) {
        this.received.push(parsed);
        for (const listener of this.listeners) listener();
      }
    });
  }

  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.on("open", resolve);
      this.ws.on("error", reject);
    });
  }

  send(message: Record<string, unknown>): void {
    this.ws.send(JSON.stringify(message));
  }

  sendBinary(data: Buffer): void {
    this.ws.send(data, { binary: true });
  }

  /** Take the first queued message of the given type, waiting for one if needed. */
  nextOfType(type: string, timeoutMs = 3000): Promise<ReceivedMessage> {
    return new Promise((resolve, reject) => {
      const take = (): boolean => {
        const index = this.received.findIndex((m) => m.type === type);
        if (index < 0) return false;
        const [message] = this.received.splice(index, 1);
        resolve(message);
        return true;
      };
      if (take()) return;

      const listener = () => {
        if (take()) done();
      };
      const timer = setTimeout(() => {
        done();
        reject(new Error(`Timed out waiting for "${type}"`));
      }, timeoutMs);
      const done = () => {
        clearTimeout(timer);
        this.listeners.delete(listener);
      };
      this.listeners.add(listener);
    });
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

class FakeTranscriptSource implements TranscriptSource {
  readonly qualityWarning = false;
  readonly feedAudio = vi.fn((_chunk: Buffer) => {});
  readonly stop = vi.fn();
  start(_onFragment: (fragment: FragmentInput) => void): void {}
}

const START_ANSWER = {
  type: "start_answer",
  questionId: "q-threads",
  questionText: "Threads versus processes?",
  bullets: [
    { id: "b1", text: "Threads share memory" },
    { id: "b2", text: "Processes are isolated" },
  ],
};

// ─── Server ─────────────────────────────────────────────────────────────────────

describe("createAppServer", () => {
  let server: AppServer;
  let sessionManager: SessionManager;
  let source: FakeTranscriptSource;
  let clients: TestClient[];
  let coverage: Map<string, TernaryCoverageStatus>;

  beforeEach(async () => {
    coverage = new Map();
    source = new FakeTranscriptSource();
    sessionManager = new SessionManager({
      oracles: {
        coverageOracle: { classify: async (bullet) => coverage.get(bullet) ?? "incomplete" },
        confidenceOracle: { classify: async () => "knows" },
      },
      config: { fragmentThreshold: 1 },
      transcriptSourceFactory: () => source,
      logger: createSilentLogger(),
    });
    server = createAppServer({ sessionManager, logger: createSilentLogger(), tickIntervalMs: 60_000 });
    await server.listen(TEST_PORT);
    clients = [];
  });

  afterEach(async () => {
    for (const c of clients) c.close();
    await server.close();
  });

  async function connect(): Promise<TestClient> {
    const address = server.httpServer.address();
    const port = address && typeof address === "object" ? address.port : 0;
    const client = new TestClient(`ws://localhost:${port}`);
    clients.push(client);
    await client.waitForOpen();
    return client;
  }

  // ── HTTP ─────────────────────────────────────────────────────────────────

  it("should answer the health check", async () => {
    const address = server.httpServer.address();
    const port = address && typeof address === "object" ? address.port : 0;

    const response = await fetch(`http://localhost:${port}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", activeSessions: 0, audio: true });
  });

  // ── Answer lifecycle ─────────────────────────────────────────────────────

  it("should start an answer and report its bullets", async () => {
    const client = await connect();
    client.send(START_ANSWER);

    const started = await client.nextOfType("session_started");

    expect(typeof started.sessionId).toBe("string");
    expect(started.bullets).toEqual([
      { id: "b1", text: "Threads share memory", state: "uncovered" },
      { id: "b2", text: "Processes are isolated", state: "uncovered" },
    ]);
    expect(sessionManager.size).toBe(1);
  });

  it("should push bullet updates and follow-ups as fragments are evaluated", async () => {
    const client = await connect();
    client.send(START_ANSWER);
    await client.nextOfType("session_started");
    coverage.set("Threads share memory", "covered");

    client.send({ type: "transcript_fragment", sequenceIndex: 0, text: "Threads share the heap." });

    const update = await client.nextOfType("bullet_update");
    expect(update.transitions).toEqual([
      { bulletId: "b1", from: "uncovered", to: "covered", rule: "coverage_covered" },
      { bulletId: "b2", from: "uncovered", to: "incomplete", rule: "coverage_classification" },
      { bulletId: "b2", from: "incomplete", to: "pending", rule: "followup_issued" },
    ]);
    const followup = await client.nextOfType("followup");
    expect(followup.record).toMatchObject({
      bulletId: "b2",
      text: "You haven't clearly covered this point yet: 'Processes are isolated'. Could you elaborate?",
    });
  });

  it("should send the report on end_answer and free the session", async () => {
    const client = await connect();
    client.send(START_ANSWER);
    await client.nextOfType("session_started");
    coverage.set("Threads share memory", "covered");
    client.send({ type: "transcript_fragment", sequenceIndex: 0, text: "Threads share the heap." });
    await client.nextOfType("followup");

    client.send({ type: "end_answer" });
    const message = await client.nextOfType("report");

    expect(message.paths).toEqual([]);
    expect(message.report).toMatchObject({
      questionId: "q-threads",
      score: 50,
      coveredPoints: ["Threads share memory"],
      missedPoints: ["Processes are isolated"],
    });
    expect(sessionManager.size).toBe(0);
  });

  it("should allow a new answer after the previous one ended", async () => {
    const client = await connect();
    client.send(START_ANSWER);
    await client.nextOfType("session_started");
    client.send({ type: "end_answer" });
    await client.nextOfType("report");

    client.send({ ...START_ANSWER, questionId: "q-next" });
    await expect(client.nextOfType("session_started")).resolves.toMatchObject({ type: "session_started" });
  });

  it("should drop the session when the client disconnects", async () => {
    const client = await connect();
    client.send(START_ANSWER);
    await client.nextOfType("session_started");

    client.close();

    await vi.waitFor(() => expect(sessionManager.size).toBe(0));
  });

  // ── Errors ───────────────────────────────────────────────────────────────

  it("should reject malformed messages", async () => {
    const client = await connect();
    client.ws.send("{not json");

    await expect(client.nextOfType("error")).resolves.toEqual({
      type: "error",
      message: "Message is not valid JSON",
      recoverable: true,
    });
  });

  it("should reject fragments before an answer is started", async () => {
    const client = await connect();
    client.send({ type: "transcript_fragment", sequenceIndex: 0, text: "hello" });

    const error = await client.nextOfType("error");
    expect(error.message).toBe("No active answer. Send start_answer first.");
  });

  it("should reject a second start_answer while one is in progress", async () => {
    const client = await connect();
    client.send(START_ANSWER);
    await client.nextOfType("session_started");

    client.send(START_ANSWER);

    const error = await client.nextOfType("error");
    expect(error.message).toBe("An answer is already in progress. Send end_answer first.");
    expect(sessionManager.size).toBe(1);
  });

  it("should report invalid bullets without opening a session", async () => {
    const client = await connect();
    client.send({ ...START_ANSWER, bullets: [{ id: "b1", text: "a" }, { id: "b1", text: "b" }] });

    const error = await client.nextOfType("error");
    expect(error.message).toBe('Duplicate bullet id "b1"');
    expect(sessionManager.size).toBe(0);
  });

  // ── Audio ────────────────────────────────────────────────────────────────

  it("should reject audio before audio_start", async () => {
    const client = await connect();
    client.sendBinary(Buffer.alloc(4));

    const error = await client.nextOfType("error");
    expect(error.message).toBe("Audio chunks rejected: send audio_start during an active answer first.");
  });

  it("should forward aligned audio chunks and reject odd-length ones", async () => {
    const client = await connect();
    client.send(START_ANSWER);
    await client.nextOfType("session_started");
    client.send({ type: "audio_start" });

    client.sendBinary(Buffer.alloc(3));
    const error = await client.nextOfType("error");
    expect(error.message).toBe(
      "Audio chunk byte length (3) is not a multiple of 2. Expected 16-bit aligned PCM data.",
    );

    client.sendBinary(Buffer.from([1, 0, 2, 0]));
    await vi.waitFor(() => expect(source.feedAudio).toHaveBeenCalledWith(Buffer.from([1, 0, 2, 0])));

    client.send({ type: "audio_stop" });
    await vi.waitFor(() => expect(source.stop).toHaveBeenCalledTimes(1));
  });
});

// ─── parseClientMessage ─────────────────────────────────────────────────────────

describe("parseClientMessage", () => {
  it("should parse a start_answer with bullets and tags", () => {
    expect(
      parseClientMessage(
        JSON.stringify({
          type: "start_answer",
          questionId: "q1",
          questionText: "Why?",
          bullets: [{ id: "b1", text: "Because" }],
          tags: ["os"],
        }),
      ),
    ).toEqual({
      type: "start_answer",
      questionId: "q1",
      questionText: "Why?",
      bullets: [{ id: "b1", text: "Because" }],
      modelAnswer: undefined,
      tags: ["os"],
      subtags: undefined,
    });
  });

  it("should parse fragments, audio control and end_answer", () => {
    expect(parseClientMessage('{"type":"transcript_fragment","sequenceIndex":2,"text":"hi"}')).toEqual({
      type: "transcript_fragment",
      sequenceIndex: 2,
      text: "hi",
    });
    expect(parseClientMessage('{"type":"audio_start"}')).toEqual({ type: "audio_start" });
    expect(parseClientMessage('{"type":"end_answer","save":true}')).toEqual({ type: "end_answer", save: true });
  });

  it.each([
    ["[1, 2]", "Message must be a JSON object"],
    ['{"type":"dance"}', "Unknown message type: dance"],
    ['{"type":"start_answer","questionId":" ","questionText":"?"}', 'Field "questionId" must be a non-empty string'],
    ['{"type":"start_answer","questionId":"q","questionText":"?","bullets":"b1"}', 'Field "bullets" must be an array of { id, text }'],
    ['{"type":"start_answer","questionId":"q","questionText":"?","tags":[1]}', 'Field "tags" must be an array of strings'],
    ['{"type":"transcript_fragment","sequenceIndex":-1,"text":"x"}', 'Field "sequenceIndex" must be a non-negative integer'],
    ['{"type":"transcript_fragment","sequenceIndex":0}', 'Field "text" must be a string'],
    ['{"type":"end_answer","save":"yes"}', 'Field "save" must be a boolean'],
  ])("should reject %s", (text, message) => {
    expect(() => parseClientMessage(text)).toThrow(message);
  });
});
