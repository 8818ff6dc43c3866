import { VadSpeechInput, findWakePhrase, normalizeUtterance } from "../../../src/speech/speech-input";
import { StubASR } from "../../../src/adapters/asr";
import type { IASR } from "../../../src/adapters/asr";
import { utterance } from "../../helpers/audio";

function setup(asr: IASR = new StubASR(), holdMs = 2_000) {
  let t = 0;
  const input = new VadSpeechInput(asr, {
    vadSilenceMs: 60,
    wakePhrases: ["hey car"],
    wakeWordHoldMs: holdMs,
    asrTimeoutMs: 200,
    now: () => t,
  });
  const heard: Array<[string, number]> = [];
  input.onTranscription((text, confidence) => heard.push([text, confidence]));
  return { input, heard, advance: (ms: number) => (t += ms) };
}

describe("normalizeUtterance / findWakePhrase", () => {
  it("matches the wake phrase on word boundaries", () => {
    expect(normalizeUtterance("Hey, Car!  Turn it up.")).toBe("hey car turn it up");
    expect(findWakePhrase("hey car turn it up", ["hey car"])).toEqual({ phrase: "hey car", end: 8 });
    expect(findWakePhrase("hey cart", ["hey car"])).toBeNull();
  });
});

describe("VadSpeechInput", () => {
  it("latches the wake word once and drops the rest of the utterance", async () => {
    const { input, heard } = setup();
    await input.start();
    input.ingestTranscript("Hey car, set temperature to 21", 0.9);
    expect(heard).toEqual([]);
    expect(await input.isWakeWordDetected()).toBe(true);
    expect(await input.isWakeWordDetected()).toBe(false);
  });

  it("lets an unread wake word expire after the hold time", async () => {
    const { input, advance } = setup(new StubASR(), 1_000);
    await input.start();
    input.ingestTranscript("hey car", 0.9);
    advance(1_001);
    expect(await input.isWakeWordDetected()).toBe(false);
  });

  it("passes other transcripts to the handler with clamped confidence", async () => {
    const { input, heard } = setup();
    await input.start();
    input.ingestTranscript("  set temperature to 21 ", 1.4);
    input.ingestTranscript("...", 0.9);
    expect(heard).toEqual([["set temperature to 21", 1]]);
  });

  it("transcribes each VAD segment in order", async () => {
    const { input, heard } = setup(new StubASR(["set temperature to 21", { text: "louder", confidence: 0.4 }]));
    await input.start();
    await input.pushAudio(Buffer.concat([utterance(5, 3), utterance(4, 3)]));
    expect(heard).toEqual([
      ["set temperature to 21", 0.9],
      ["louder", 0.4],
    ]);
  });

  it("buffers partial frames across chunks", async () => {
    const { input, heard } = setup(new StubASR(["navigate home"]));
    await input.start();
    const audio = utterance(5, 3);
    await input.pushAudio(audio.subarray(0, 1000));
    expect(heard).toEqual([]);
    await input.pushAudio(audio.subarray(1000));
    expect(heard).toEqual([["navigate home", 0.9]]);
  });

  it("ignores audio while stopped", async () => {
    const { input, heard } = setup(new StubASR(["navigate home"]));
    await input.pushAudio(utterance(5, 3));
    expect(heard).toEqual([]);
  });

  it("reports unhealthy after repeated ASR failures", async () => {
    const failing: IASR = { transcribe: async () => Promise.reject(new Error("asr down")) };
    const { input } = setup(failing);
    await input.start();
    expect(await input.healthCheck()).toBe(true);
    await input.pushAudio(Buffer.concat([utterance(3, 3), utterance(3, 3), utterance(3, 3)]));
    expect(await input.healthCheck()).toBe(false);
    await input.restart();
    expect(await input.healthCheck()).toBe(true);
  });
});
