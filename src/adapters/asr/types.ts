/**
 * ASR (Automatic Speech Recognition) adapter types.
 * Implementations can be swapped via config (OpenAI Whisper, stub).
 */

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Recognition confidence in 0..1. */
  confidence: number;
  /** Optional language code. */
  language?: string;
}

/**
 * ASR adapter interface: audio buffer in, transcript out.
 */
export interface IASR {
  /**
   * Transcribe audio to text.
   * @param audioBuffer - Encoded audio (WAV unless `format` says otherwise).
   * @param format - Optional format hint (e.g. "wav", "webm"). Provider-dependent.
   */
  transcribe(audioBuffer: Buffer, format?: string): Promise<TranscriptResult>;
  /** Cheap reachability check used by the speech input's health check. */
  ping?(): Promise<boolean>;
}
