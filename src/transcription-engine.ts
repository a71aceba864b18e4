// Answer Coverage Coach - Transcription Engine
// Deepgram live transcription as a transcript source: audio chunks go in,
// sequenced final fragments come out, ready for CoverageSession.update().
//
// Interim results are ignored: coverage is judged on settled text only.
// Audio is held in memory only and never written to disk.

import type { LiveSchema } from "@deepgram/sdk";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import type { FragmentInput } from "./coverage-session.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

// ─── Deepgram client interface (for testability / dependency injection) ─────────

/** The slice of a Deepgram live connection the engine drives. */
export interface LiveConnection {
  on(event: string, listener: (data: unknown) => void): unknown;
  send(data: ArrayBufferLike): void;
  requestClose(): void;
}

/** The slice of DeepgramClient the engine uses; the SDK client satisfies it. */
export interface LiveTranscriptionClient {
  listen: {
    live(config: LiveSchema): LiveConnection;
  };
}

/** Audio format contract: mono LINEAR16 at 16 kHz. */
const DEFAULT_LIVE_CONFIG: LiveSchema = {
  model: "nova-2",
  language: "en",
  encoding: "linear16",
  sample_rate: 16000,
  channels: 1,
  interim_results: true,
  punctuate: true,
  smart_format: true,
};

/** Anything that turns audio into sequenced transcript fragments. */
export interface TranscriptSource {
  start(onFragment: (fragment: FragmentInput) => void): void;
  feedAudio(chunk: Buffer): void;
  stop(): void;
  readonly qualityWarning: boolean;
}

export class TranscriptionEngine implements TranscriptSource {
  private readonly client: LiveTranscriptionClient;
  private readonly liveConfig: LiveSchema;
  private readonly logger: Logger;
  private connection: LiveConnection | null = null;
  private onFragment: ((fragment: FragmentInput) => void) | null = null;
  private nextSequenceIndex = 0;
  private _qualityWarning = false;

  constructor(client: LiveTranscriptionClient, config?: Partial<LiveSchema>, logger?: Logger) {
    this.client = client;
    this.liveConfig = { ...DEFAULT_LIVE_CONFIG, ...config };
    this.logger = logger ?? createConsoleLogger("TranscriptionEngine");
  }

  /** Set when the connection errored or dropped before stop(); there is no reconnect. */
  get qualityWarning(): boolean {
    return this._qualityWarning;
  }

  /**
   * Open a live connection. Sequence indices restart at 0 for every start().
   * @throws Error if a connection is already open
   */
  start(onFragment: (fragment: FragmentInput) => void): void {
    if (this.connection) {
      throw new Error("Live transcription already active. Call stop() first.");
    }

    this._qualityWarning = false;
    this.nextSequenceIndex = 0;
    this.onFragment = onFragment;
    const connection = this.client.listen.live(this.liveConfig);
    this.connection = connection;

    connection.on(LiveTranscriptionEvents.Transcript, (data) => {
      this.handleTranscriptEvent(data);
    });

    connection.on(LiveTranscriptionEvents.Error, (error) => {
      this._qualityWarning = true;
      this.logger.warn(`Deepgram error: ${describeError(error)}`);
    });

    connection.on(LiveTranscriptionEvents.Close, () => {
      // Still set means we did not initiate the close
      if (this.connection === connection) {
        this._qualityWarning = true;
        this.logger.warn("Deepgram connection closed unexpectedly");
      }
    });
  }

  /**
   * Forward a raw PCM chunk (16-bit, mono, 16 kHz).
   * @throws Error if no connection is open
   */
  feedAudio(chunk: Buffer): void {
    if (!this.connection) {
      throw new Error("No active live transcription. Call start() first.");
    }
    this.connection.send(chunk.buffer.slice(chunk.byteOffset, chunk.byteOffset + chunk.byteLength));
  }

  /** Close the connection; a no-op when already stopped. */
  stop(): void {
    const connection = this.connection;
    if (!connection) {
      return;
    }
    this.connection = null;
    this.onFragment = null;

    try {
      connection.requestClose();
    } catch (err) {
      this.logger.warn(`Error while closing Deepgram connection: ${describeError(err)}`);
    }
  }

  private handleTranscriptEvent(data: unknown): void {
    if (!this.onFragment || !isFinalTranscript(data)) {
      return;
    }
    const text = data.channel.alternatives[0]?.transcript.trim() ?? "";
    if (text.length === 0) {
      return;
    }
    this.onFragment({ sequenceIndex: this.nextSequenceIndex++, text });
  }
}

// ─── Deepgram event narrowing ───────────────────────────────────────────────────

interface FinalTranscriptEvent {
  is_final: true;
  channel: { alternatives: Array<{ transcript: string }> };
}

function isFinalTranscript(data: unknown): data is FinalTranscriptEvent {
  if (!data || typeof data !== "object") return false;
  if (!("is_final" in data) || data.is_final !== true) return false;
  if (!("channel" in data) || !data.channel || typeof data.channel !== "object") return false;
  const channel = data.channel;
  if (!("alternatives" in channel) || !Array.isArray(channel.alternatives)) return false;
  const alternatives: unknown[] = channel.alternatives;
  return alternatives.every(
    (alt) => !!alt && typeof alt === "object" && "transcript" in alt && typeof alt.transcript === "string",
  );
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
