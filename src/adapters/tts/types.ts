/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (Google Cloud, stub).
 */

export interface VoiceOptions {
  /** Voice name or id (provider-specific). */
  voiceName?: string;
  /** Language code (e.g. en-US). */
  languageCode?: string;
  /** Sample rate in Hz of the LINEAR16 output. */
  sampleRateHz?: number;
  speakingRate?: number;
  pitch?: number;
}

export type TtsResult = Promise<Buffer> | Promise<AsyncIterable<Buffer>> | AsyncIterable<Buffer>;

/**
 * TTS adapter interface: text in, PCM audio out.
 * Returns either a single buffer or an async iterable of chunks for streaming.
 */
export interface ITTS {
  synthesize(text: string, options?: VoiceOptions): TtsResult;
}

function isAsyncIterable(value: Buffer | AsyncIterable<Buffer>): value is AsyncIterable<Buffer> {
  return !Buffer.isBuffer(value) && Symbol.asyncIterator in value;
}

/**
 * Normalize TTS result to async iterable of buffers for uniform consumption.
 */
export async function* ttsToStream(result: TtsResult): AsyncIterable<Buffer> {
  const resolved: Buffer | AsyncIterable<Buffer> = await result;
  if (isAsyncIterable(resolved)) {
    yield* resolved;
  } else {
    yield resolved;
  }
}
