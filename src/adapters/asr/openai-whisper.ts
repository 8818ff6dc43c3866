/**
 * OpenAI Whisper API ASR adapter.
 * Confidence is the mean per-segment probability, exp(avg_logprob), from the verbose response.
 */

import OpenAI, { toFile } from "openai";
import { z } from "zod";
import type { IASR, TranscriptResult } from "./types";

export interface OpenAIWhisperConfig {
  apiKey: string;
  model?: string;
}

const verboseSchema = z.object({
  text: z.string().default(""),
  language: z.string().optional(),
  segments: z.array(z.object({ avg_logprob: z.number() }).passthrough()).optional(),
});

/** Mean of exp(avg_logprob) over segments, clamped to 0..1. Empty text has no confidence. */
export function confidenceFromSegments(text: string, segments: Array<{ avg_logprob: number }> | undefined): number {
  if (text.trim().length === 0) return 0;
  if (!segments || segments.length === 0) return 1;
  const mean = segments.reduce((sum, s) => sum + Math.exp(s.avg_logprob), 0) / segments.length;
  return Math.min(1, Math.max(0, mean));
}

export class OpenAIWhisperASR implements IASR {
  private client: OpenAI;
  private readonly model: string;

  constructor(config: OpenAIWhisperConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model ?? "whisper-1";
  }

  async transcribe(audioBuffer: Buffer, format: string = "wav"): Promise<TranscriptResult> {
    const ext = format === "webm" ? "webm" : "wav";
    const transcription = await this.client.audio.transcriptions.create({
      file: await toFile(audioBuffer, `utterance.${ext}`),
      model: this.model,
      response_format: "verbose_json",
    });
    const parsed = verboseSchema.safeParse(transcription);
    if (!parsed.success) {
      throw new Error(`Unexpected transcription response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    const text = parsed.data.text.trim();
    return {
      text,
      confidence: confidenceFromSegments(text, parsed.data.segments),
      language: parsed.data.language,
    };
  }

  async ping(): Promise<boolean> {
    await this.client.models.retrieve(this.model);
    return true;
  }
}
