/**
 * VadSpeechInput: cabin microphone PCM -> VAD segments -> ASR -> wake latch or transcription callback.
 *
 * A segment whose transcript contains a wake phrase latches the wake flag (held for wakeWordHoldMs,
 * consumed by the first isWakeWordDetected() call). Anything said after the phrase in the same segment is
 * dropped: the conversation starts with the acknowledgement, and the follow-up is heard in Listening.
 */

import type { IASR } from "../adapters/asr";
import type { SpeechInput, TranscriptionHandler } from "../pipeline/types";
import { VAD } from "./vad";
import { pcmToWav } from "./audio-utils";
import { withTimeout } from "../pipeline/errors";
import { errorMessage, logger } from "../logging";

/** Consecutive ASR failures after which the health check reports unhealthy. */
const MAX_ASR_FAILURES = 3;

export interface SpeechInputConfig {
  vadSilenceMs: number;
  vadEnergyThreshold?: number;
  /** Lowercase phrases; matched on word boundaries after punctuation is stripped. */
  wakePhrases: string[];
  wakeWordHoldMs: number;
  asrTimeoutMs: number;
  now?: () => number;
}

/** Lowercase, strip punctuation, collapse whitespace. */
export function normalizeUtterance(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s']/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** First wake phrase found in `normalized` and the offset just past it, or null. */
export function findWakePhrase(normalized: string, phrases: string[]): { phrase: string; end: number } | null {
  const padded = ` ${normalized} `;
  for (const phrase of phrases) {
    const needle = ` ${normalizeUtterance(phrase)} `;
    if (needle.trim().length === 0) continue;
    const at = padded.indexOf(needle);
    if (at >= 0) return { phrase, end: at + needle.length - 1 };
  }
  return null;
}

export class VadSpeechInput implements SpeechInput {
  private readonly vad: VAD;
  private readonly now: () => number;
  private handler: TranscriptionHandler | null = null;
  private wakeLatchedAt: number | null = null;
  private running = false;
  private asrFailures = 0;
  private audioTail: Buffer = Buffer.alloc(0);
  private transcribing: Promise<void> = Promise.resolve();

  constructor(
    private readonly asr: IASR,
    private readonly config: SpeechInputConfig
  ) {
    this.vad = new VAD({ silenceMs: config.vadSilenceMs, energyThreshold: config.vadEnergyThreshold });
    this.now = config.now ?? Date.now;
  }

  onTranscription(handler: TranscriptionHandler): void {
    this.handler = handler;
  }

  async isWakeWordDetected(): Promise<boolean> {
    if (this.wakeLatchedAt === null) return false;
    const age = this.now() - this.wakeLatchedAt;
    this.wakeLatchedAt = null;
    if (age > this.config.wakeWordHoldMs) {
      logger.debug({ event: "WAKE_WORD_EXPIRED", ageMs: age }, "Wake word latch expired unread");
      return false;
    }
    return true;
  }

  /**
   * Push raw audio (16kHz mono 16-bit PCM). Resolves once every segment completed by this chunk
   * has been transcribed and routed. Segments are transcribed one at a time, in order.
   */
  pushAudio(chunk: Buffer): Promise<void> {
    if (!this.running) return Promise.resolve();
    const combined = this.audioTail.length > 0 ? Buffer.concat([this.audioTail, chunk]) : chunk;
    const frameSize = VAD.getFrameSizeBytes();
    let offset = 0;
    while (offset + frameSize <= combined.length) {
      const result = this.vad.processFrame(combined.subarray(offset, offset + frameSize));
      offset += frameSize;
      if (result.endOfTurn && result.segment && result.segment.length > 0) {
        const segment = result.segment;
        logger.debug(
          { event: "VAD_END_OF_TURN", segmentMs: Math.round((segment.length / frameSize) * 20) },
          "VAD: end of utterance"
        );
        this.transcribing = this.transcribing.then(() => this.transcribeSegment(segment));
      }
    }
    this.audioTail = Buffer.from(combined.subarray(offset));
    return this.transcribing;
  }

  /** Never rejects; ASR failures are counted for the health check. */
  private async transcribeSegment(segment: Buffer): Promise<void> {
    try {
      const wav = pcmToWav(segment, VAD.getSampleRate());
      const result = await withTimeout(this.asr.transcribe(wav, "wav"), this.config.asrTimeoutMs, "ASR");
      this.asrFailures = 0;
      this.ingestTranscript(result.text, result.confidence);
    } catch (err) {
      this.asrFailures++;
      logger.warn({ event: "ASR_FAILED", failures: this.asrFailures, err: errorMessage(err) }, "ASR failed");
    }
  }

  /** Route one final transcript: wake phrase -> latch, otherwise -> transcription handler. */
  ingestTranscript(text: string, confidence: number): void {
    const normalized = normalizeUtterance(text);
    if (normalized.length === 0) return;
    const wake = findWakePhrase(normalized, this.config.wakePhrases);
    if (wake) {
      this.wakeLatchedAt = this.now();
      const remainder = normalized.slice(wake.end).trim();
      logger.info({ event: "WAKE_PHRASE_HEARD", phrase: wake.phrase }, "Wake phrase heard");
      if (remainder.length > 0) {
        logger.debug({ event: "WAKE_REMAINDER_DROPPED", remainder }, "Speech after the wake phrase dropped");
      }
      return;
    }
    if (!this.handler) {
      logger.debug({ event: "TRANSCRIPTION_UNHANDLED" }, "No transcription handler registered");
      return;
    }
    this.handler(text.trim(), Math.min(1, Math.max(0, confidence)));
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
    this.vad.reset();
    this.audioTail = Buffer.alloc(0);
    this.wakeLatchedAt = null;
  }

  async restart(): Promise<void> {
    await this.stop();
    this.asrFailures = 0;
    await this.start();
  }

  async healthCheck(): Promise<boolean> {
    if (!this.running || this.asrFailures >= MAX_ASR_FAILURES) return false;
    return this.asr.ping ? this.asr.ping() : true;
  }
}
