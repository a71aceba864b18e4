import { describe, it, expect, vi, beforeEach } from "vitest";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import type { LiveSchema } from "@deepgram/sdk";
import { TranscriptionEngine } from "./transcription-engine.js";
import type { FragmentInput } from "./coverage-session.js";
import type { Logger } from "./logger.js";

/**
 * Creates a mock Deepgram client with a controllable live connection.
 * Event handlers are captured so tests can simulate Deepgram events.
 */
function createMockDeepgramClient() {
  const eventHandlers: Record<string, Array<(data: unknown) => void>> = {};

  const liveConnection = {
    on: vi.fn((event: string, handler: (data: unknown) => void) => {
      (eventHandlers[event] ??= []).push(handler);
    }),
    send: vi.fn((_data: ArrayBufferLike) => {}),
    requestClose: vi.fn(),
  };

  const client = {
    listen: {
      live: vi.fn((_config: LiveSchema) => liveConnection),
    },
  };

  function emit(event: string, data?: unknown) {
    for (const handler of eventHandlers[event] ?? []) {
      handler(data);
    }
  }

  return { client, liveConnection, emit };
}

function transcriptEvent(transcript: string, isFinal: boolean) {
  return {
    type: "Results",
    is_final: isFinal,
    speech_final: isFinal,
    channel: { alternatives: [{ transcript, confidence: 0.93 }] },
  };
}

function createSpyLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe("TranscriptionEngine", () => {
  let mock: ReturnType<typeof createMockDeepgramClient>;
  let logger: ReturnType<typeof createSpyLogger>;
  let engine: TranscriptionEngine;
  let fragments: FragmentInput[];

  beforeEach(() => {
    mock = createMockDeepgramClient();
    logger = createSpyLogger();
    engine = new TranscriptionEngine(mock.client, undefined, logger);
    fragments = [];
  });

  const start = () => engine.start((fragment) => fragments.push(fragment));

  // ── start ────────────────────────────────────────────────────────────────

  describe("start", () => {
    it("should open a live connection for 16 kHz mono LINEAR16 with interim results", () => {
      start();

      expect(mock.client.listen.live).toHaveBeenCalledWith(
        expect.objectContaining({
          model: "nova-2",
          encoding: "linear16",
          sample_rate: 16000,
          channels: 1,
          interim_results: true,
        }),
      );
    });

    it("should let config overrides replace the defaults", () => {
      engine = new TranscriptionEngine(mock.client, { model: "nova-3", language: "de" }, logger);
      start();

      expect(mock.client.listen.live).toHaveBeenCalledWith(
        expect.objectContaining({ model: "nova-3", language: "de", sample_rate: 16000 }),
      );
    });

    it("should listen for Transcript, Error and Close", () => {
      start();

      const events = mock.liveConnection.on.mock.calls.map((call) => call[0]);
      expect(events).toEqual([
        LiveTranscriptionEvents.Transcript,
        LiveTranscriptionEvents.Error,
        LiveTranscriptionEvents.Close,
      ]);
    });

    it("should throw while a connection is already open", () => {
      start();
      expect(() => start()).toThrow("Live transcription already active. Call stop() first.");
    });
  });

  // ── transcript events ────────────────────────────────────────────────────

  describe("transcript events", () => {
    it("should emit only final, non-empty transcripts, numbered from 0", () => {
      start();

      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("threads share", false));
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("  Threads share memory.  ", true));
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("   ", true));
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("Processes do not.", true));

      expect(fragments).toEqual([
        { sequenceIndex: 0, text: "Threads share memory." },
        { sequenceIndex: 1, text: "Processes do not." },
      ]);
    });

    it("should ignore malformed events", () => {
      start();

      mock.emit(LiveTranscriptionEvents.Transcript, null);
      mock.emit(LiveTranscriptionEvents.Transcript, { is_final: true });
      mock.emit(LiveTranscriptionEvents.Transcript, { is_final: true, channel: { alternatives: [{ text: "x" }] } });
      mock.emit(LiveTranscriptionEvents.Transcript, { is_final: true, channel: { alternatives: [] } });

      expect(fragments).toEqual([]);
    });

    it("should restart numbering on every start()", () => {
      start();
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("first", true));
      engine.stop();

      start();
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("second", true));

      expect(fragments.map((f) => f.sequenceIndex)).toEqual([0, 0]);
    });

    it("should drop events that arrive after stop()", () => {
      start();
      engine.stop();

      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("late", true));

      expect(fragments).toEqual([]);
    });
  });

  // ── feedAudio ────────────────────────────────────────────────────────────

  describe("feedAudio", () => {
    it("should forward exactly the chunk's bytes", () => {
      start();
      const backing = Buffer.from([9, 9, 1, 2, 3, 4, 9, 9]);
      const chunk = backing.subarray(2, 6);

      engine.feedAudio(chunk);

      const sent = mock.liveConnection.send.mock.calls[0][0];
      expect(Buffer.from(new Uint8Array(sent))).toEqual(Buffer.from([1, 2, 3, 4]));
    });

    it("should throw without an open connection", () => {
      expect(() => engine.feedAudio(Buffer.alloc(4))).toThrow("No active live transcription. Call start() first.");
    });
  });

  // ── stop & quality ───────────────────────────────────────────────────────

  describe("stop", () => {
    it("should request close once and be idempotent", () => {
      start();
      engine.stop();
      engine.stop();

      expect(mock.liveConnection.requestClose).toHaveBeenCalledTimes(1);
    });

    it("should not flag a close it initiated", () => {
      start();
      engine.stop();
      mock.emit(LiveTranscriptionEvents.Close);

      expect(engine.qualityWarning).toBe(false);
    });

    it("should log a failing close instead of throwing", () => {
      start();
      mock.liveConnection.requestClose.mockImplementationOnce(() => {
        throw new Error("socket gone");
      });

      expect(() => engine.stop()).not.toThrow();
      expect(logger.warn).toHaveBeenCalledWith("Error while closing Deepgram connection: socket gone");
    });
  });

  describe("qualityWarning", () => {
    it("should be set by a Deepgram error", () => {
      start();
      mock.emit(LiveTranscriptionEvents.Error, { message: "rate limited" });

      expect(engine.qualityWarning).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith("Deepgram error: rate limited");
    });

    it("should be set by an unexpected close", () => {
      start();
      mock.emit(LiveTranscriptionEvents.Close);

      expect(engine.qualityWarning).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith("Deepgram connection closed unexpectedly");
    });

    it("should reset on the next start()", () => {
      start();
      mock.emit(LiveTranscriptionEvents.Error, new Error("boom"));
      engine.stop();

      start();
      expect(engine.qualityWarning).toBe(false);
    });
  });
});
