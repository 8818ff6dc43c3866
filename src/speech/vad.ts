/**
 * Voice Activity Detection: energy-based speech/silence decision on 16kHz mono 16-bit frames.
 * A segment ends after `silenceMs` of silence following speech.
 */

const VAD_FRAME_MS = 20;
const VAD_SAMPLE_RATE = 16000;
const BYTES_PER_SAMPLE = 2;
const SAMPLES_PER_FRAME = (VAD_SAMPLE_RATE * VAD_FRAME_MS) / 1000;
const FRAME_SIZE_BYTES = SAMPLES_PER_FRAME * BYTES_PER_SAMPLE;

/** RMS threshold (16-bit PCM): at or below = silence. */
const DEFAULT_ENERGY_THRESHOLD = 500;

export interface VADConfig {
  /** Silence duration (ms) to consider end of utterance. */
  silenceMs: number;
  /** RMS threshold; lower = more sensitive. */
  energyThreshold?: number;
}

export interface VADResult {
  /** True if speech detected in this frame. */
  isSpeech: boolean;
  /** True when silence has lasted >= silenceMs after speech. */
  endOfTurn: boolean;
  /** Accumulated segment (all frames since speech started) when endOfTurn. */
  segment: Buffer | undefined;
}

/** RMS of a 16-bit little-endian PCM frame. */
export function frameRms(frame: Buffer): number {
  const samples = Math.floor(frame.length / 2);
  if (samples === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples * 2; i += 2) {
    const s = frame.readInt16LE(i);
    sum += s * s;
  }
  return Math.sqrt(sum / samples);
}

export class VAD {
  private readonly silenceFrames: number;
  private readonly energyThreshold: number;
  private buffer: Buffer[] = [];
  private silenceCount = 0;
  private hadSpeech = false;

  constructor(config: VADConfig) {
    this.silenceFrames = Math.max(1, Math.ceil(config.silenceMs / VAD_FRAME_MS));
    this.energyThreshold = config.energyThreshold ?? DEFAULT_ENERGY_THRESHOLD;
  }

  /**
   * Process one frame of audio (16kHz mono 16-bit, 20ms = 640 bytes).
   * Returns VAD result; when endOfTurn, segment contains the accumulated speech.
   */
  processFrame(frame: Buffer): VADResult {
    if (frame.length < FRAME_SIZE_BYTES) {
      return { isSpeech: false, endOfTurn: false, segment: undefined };
    }
    const slice = frame.subarray(0, FRAME_SIZE_BYTES);
    const isSpeech = frameRms(slice) > this.energyThreshold;
    if (isSpeech) {
      this.buffer.push(slice);
      this.silenceCount = 0;
      this.hadSpeech = true;
      return { isSpeech: true, endOfTurn: false, segment: undefined };
    }
    if (this.hadSpeech) {
      this.buffer.push(slice);
      this.silenceCount++;
      if (this.silenceCount >= this.silenceFrames) {
        const segment = Buffer.concat(this.buffer);
        this.reset();
        return { isSpeech: false, endOfTurn: true, segment };
      }
    }
    return { isSpeech: false, endOfTurn: false, segment: undefined };
  }

  /** Drop any partially accumulated segment. */
  reset(): void {
    this.buffer = [];
    this.silenceCount = 0;
    this.hadSpeech = false;
  }

  static getFrameSizeBytes(): number {
    return FRAME_SIZE_BYTES;
  }

  static getSampleRate(): number {
    return VAD_SAMPLE_RATE;
  }
}
