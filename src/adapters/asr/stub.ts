/**
 * Stub ASR adapter for tests and local runs.
 * Plays back scripted transcripts in order, then returns empty text.
 */

import type { IASR, TranscriptResult } from "./types";

export class StubASR implements IASR {
  private readonly script: TranscriptResult[];

  constructor(script: Array<string | TranscriptResult> = []) {
    this.script = script.map((s) => (typeof s === "string" ? { text: s, confidence: 0.9 } : s));
  }

  async transcribe(_audioBuffer: Buffer, _format?: string): Promise<TranscriptResult> {
    return this.script.shift() ?? { text: "", confidence: 0 };
  }
}
