/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key: REST API (GOOGLE_CLOUD_TTS_API_KEY).
 * - Without API key: @google-cloud/text-to-speech client using Application Default
 *   Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON).
 */

import { TextToSpeechClient } from "@google-cloud/text-to-speech";
import { z } from "zod";
import type { ITTS, VoiceOptions } from "./types";

export interface GoogleCloudTTSConfig {
  apiKey: string;
  voiceName?: string;
  languageCode?: string;
}

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";
const DEFAULT_VOICE = "en-US-Neural2-F";
const DEFAULT_SAMPLE_RATE = 16000;

const synthesizeResponse = z.object({ audioContent: z.string().optional() });

interface AudioConfig {
  audioEncoding: "LINEAR16";
  sampleRateHertz: number;
  speakingRate?: number;
  pitch?: number;
}

function audioConfigFor(options?: VoiceOptions): AudioConfig {
  const audioConfig: AudioConfig = {
    audioEncoding: "LINEAR16",
    sampleRateHertz: options?.sampleRateHz ?? DEFAULT_SAMPLE_RATE,
  };
  if (options?.speakingRate != null) audioConfig.speakingRate = options.speakingRate;
  if (options?.pitch != null) audioConfig.pitch = options.pitch;
  return audioConfig;
}

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const body = {
      input: { text },
      voice: {
        name: options?.voiceName ?? this.config.voiceName ?? DEFAULT_VOICE,
        languageCode: options?.languageCode ?? this.config.languageCode ?? "en-US",
      },
      audioConfig: audioConfigFor(options),
    };
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    if (!response.ok) {
      const errText = await response.text();
      throw new Error(`Google TTS failed: ${response.status} ${errText}`);
    }
    const data = synthesizeResponse.parse(await response.json());
    if (!data.audioContent) return Buffer.alloc(0);
    return stripWavHeader(Buffer.from(data.audioContent, "base64"));
  }
}

/** TTS using official Node client and Application Default Credentials (OAuth2 / service account). */
export interface GoogleCloudTTSADCConfig {
  voiceName?: string;
  languageCode?: string;
}

export class GoogleCloudTTSADC implements ITTS {
  private readonly client: TextToSpeechClient;
  constructor(private readonly config: GoogleCloudTTSADCConfig = {}) {
    this.client = new TextToSpeechClient();
  }

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const [response] = await this.client.synthesizeSpeech({
      input: { text },
      voice: {
        name: options?.voiceName ?? this.config.voiceName ?? DEFAULT_VOICE,
        languageCode: options?.languageCode ?? this.config.languageCode ?? "en-US",
      },
      audioConfig: audioConfigFor(options),
    });
    const content = response.audioContent;
    if (!content || !(content instanceof Uint8Array)) return Buffer.alloc(0);
    return stripWavHeader(Buffer.from(content));
  }
}

/** LINEAR16 responses carry a 44-byte RIFF header; the audio sink wants raw PCM. */
export function stripWavHeader(audio: Buffer): Buffer {
  if (audio.length >= 44 && audio.toString("ascii", 0, 4) === "RIFF" && audio.toString("ascii", 8, 12) === "WAVE") {
    return audio.subarray(44);
  }
  return audio;
}
