/**
 * Mock cabin audio for local runs: no microphone or speaker.
 * Feeds microphone audio from a WAV file and captures spoken output into a WAV file.
 */

import * as fs from "fs";
import { VAD } from "../speech/vad";
import { parseWav, pcmToWav } from "../speech/audio-utils";
import { logger } from "../logging";

export interface MockCabinConfig {
  /** WAV file used as microphone audio (16kHz mono 16-bit). */
  inputWavPath?: string;
  /** Where spoken output is written on flush. */
  outputWavPath?: string;
  /** Sample rate of the speech output audio. */
  outputSampleRateHz?: number;
  /** Silence appended after the input so the VAD closes the last utterance. */
  trailingSilenceMs?: number;
}

export type MicrophoneSink = (frame: Buffer) => Promise<void> | void;

export class MockCabin {
  private outputBuffers: Buffer[] = [];

  constructor(private readonly config: MockCabinConfig = {}) {}

  /** Audio sink for speech output; accumulates until flushOutputToFile(). */
  readonly speaker = (chunk: Buffer): void => {
    this.outputBuffers.push(chunk);
  };

  getOutputBuffer(): Buffer {
    return Buffer.concat(this.outputBuffers);
  }

  /** Write accumulated output audio as WAV and clear it. */
  flushOutputToFile(filePath?: string): string {
    const outPath = filePath ?? this.config.outputWavPath;
    if (!outPath) throw new Error("No output path");
    const pcm = Buffer.concat(this.outputBuffers);
    this.outputBuffers = [];
    fs.writeFileSync(outPath, pcmToWav(pcm, this.config.outputSampleRateHz ?? VAD.getSampleRate()));
    logger.info({ event: "MOCK_CABIN_OUTPUT", path: outPath, bytes: pcm.length }, "Wrote speech output");
    return outPath;
  }

  /**
   * Feed a WAV file to the microphone sink, one VAD frame at a time, followed by trailing silence.
   * Resolves with the number of frames delivered; 0 when no file is configured.
   * Stops early once `signal` is aborted.
   */
  async feedFromWav(sink: MicrophoneSink, wavPath?: string, signal?: AbortSignal): Promise<number> {
    const p = wavPath ?? this.config.inputWavPath;
    if (!p) return 0;
    const wav = parseWav(fs.readFileSync(p));
    if (wav.sampleRateHz !== VAD.getSampleRate() || wav.channels !== 1 || wav.bitsPerSample !== 16) {
      throw new Error(
        `Mock cabin input must be ${VAD.getSampleRate()}Hz mono 16-bit, got ${wav.sampleRateHz}Hz ${wav.channels}ch ${wav.bitsPerSample}-bit`
      );
    }
    const frameSize = VAD.getFrameSizeBytes();
    const silenceFrames = Math.ceil((this.config.trailingSilenceMs ?? 1000) / 20);
    let frames = 0;
    for (let offset = 0; offset + frameSize <= wav.pcm.length; offset += frameSize) {
      if (signal?.aborted) return frames;
      await sink(wav.pcm.subarray(offset, offset + frameSize));
      frames++;
    }
    const silence = Buffer.alloc(frameSize);
    for (let i = 0; i < silenceFrames; i++) {
      if (signal?.aborted) return frames;
      await sink(silence);
      frames++;
    }
    logger.info({ event: "MOCK_CABIN_INPUT", path: p, frames }, "Fed microphone audio from WAV");
    return frames;
  }
}
