/**
 * TtsSpeechOutput: text -> TTS adapter -> audio sink, one utterance at a time.
 * cancel() cuts off every utterance issued so far; later speak() calls play normally.
 */

import * as crypto from "crypto";
import type { ITTS } from "../adapters/tts";
import { ttsToStream } from "../adapters/tts";
import type { SpeechOutput } from "../pipeline/types";
import { errorMessage, logger } from "../logging";

const MAX_TTS_FAILURES = 3;

/** Receives PCM chunks; may return a promise to apply backpressure (e.g. real-time playback). */
export type AudioSink = (chunk: Buffer) => void | Promise<void>;

export interface SpeechOutputConfig {
  sampleRateHz?: number;
  voiceName?: string;
}

export class TtsSpeechOutput implements SpeechOutput {
  private running = false;
  private issued = 0;
  /** Utterances numbered at or below this are cancelled. */
  private cancelledThrough = 0;
  private queue: Promise<void> = Promise.resolve();
  private ttsFailures = 0;

  constructor(
    private readonly tts: ITTS,
    private readonly sink: AudioSink,
    private readonly config: SpeechOutputConfig = {}
  ) {}

  speak(text: string, interrupt = false): Promise<void> {
    if (!this.running) return Promise.reject(new Error("speech output is stopped"));
    if (interrupt) this.cancel();
    const seq = ++this.issued;
    const run = this.queue.then(() => this.play(text.trim(), seq));
    // Errors surface through `run`; the queue itself keeps going.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  cancel(): void {
    if (this.cancelledThrough < this.issued) {
      logger.info({ event: "TTS_CANCELLED", through: this.issued }, "Speech cut off");
    }
    this.cancelledThrough = this.issued;
  }

  private async play(text: string, seq: number): Promise<void> {
    if (seq <= this.cancelledThrough || text.length === 0) return;
    const utteranceId = crypto.randomUUID();
    const started = Date.now();
    let bytes = 0;
    logger.debug({ event: "TTS_START", utteranceId, textLength: text.length }, "Speaking");
    try {
      const result = this.tts.synthesize(text, {
        sampleRateHz: this.config.sampleRateHz,
        voiceName: this.config.voiceName,
      });
      for await (const buf of ttsToStream(result)) {
        if (seq <= this.cancelledThrough) break;
        if (buf.length === 0) continue;
        bytes += buf.length;
        await this.sink(buf);
      }
      this.ttsFailures = 0;
    } catch (err) {
      this.ttsFailures++;
      logger.warn({ event: "TTS_FAILED", utteranceId, err: errorMessage(err) }, "TTS failed");
      throw err;
    }
    logger.debug(
      { event: "TTS_END", utteranceId, bytes, ms: Date.now() - started, cancelled: seq <= this.cancelledThrough },
      "Speech done"
    );
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
    this.cancel();
  }

  async restart(): Promise<void> {
    await this.stop();
    this.ttsFailures = 0;
    await this.start();
  }

  async healthCheck(): Promise<boolean> {
    return this.running && this.ttsFailures < MAX_TTS_FAILURES;
  }
}
