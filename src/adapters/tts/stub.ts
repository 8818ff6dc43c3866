/**
 * Stub TTS adapter for testing or when no provider is configured.
 * Streams silence, 10ms per character, in 20ms chunks.
 */

import type { ITTS, VoiceOptions } from "./types";

const DEFAULT_SAMPLE_RATE = 16000;

export class StubTTS implements ITTS {
  /** Texts synthesized so far, oldest first. */
  readonly spoken: string[] = [];

  async *synthesize(text: string, options?: VoiceOptions): AsyncIterable<Buffer> {
    this.spoken.push(text);
    const sampleRate = options?.sampleRateHz ?? DEFAULT_SAMPLE_RATE;
    const chunkBytes = (sampleRate / 50) * 2;
    const chunks = Math.max(1, Math.ceil(text.length / 2));
    for (let i = 0; i < chunks; i++) {
      yield Buffer.alloc(chunkBytes);
    }
  }
}
