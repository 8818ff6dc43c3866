/**
 * TTS adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { ITTS } from "./types";
import { StubTTS } from "./stub";
import { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";

export type { ITTS, VoiceOptions, TtsResult } from "./types";
export { ttsToStream } from "./types";
export { StubTTS } from "./stub";
export { GoogleCloudTTS, GoogleCloudTTSADC, stripWavHeader } from "./google-cloud";

export function createTTS(config: AppConfig): ITTS {
  const { provider, googleApiKey, googleVoiceName } = config.tts;
  if (provider === "google") {
    if (googleApiKey) {
      return new GoogleCloudTTS({
        apiKey: googleApiKey,
        voiceName: googleVoiceName,
        languageCode: "en-US",
      });
    }
    return new GoogleCloudTTSADC({
      voiceName: googleVoiceName,
      languageCode: "en-US",
    });
  }
  return new StubTTS();
}
