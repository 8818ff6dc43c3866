import { VAD, frameRms } from "../../../src/speech/vad";
import { frame } from "../../helpers/audio";

describe("frameRms", () => {
  it("is the amplitude of a constant signal", () => {
    expect(frameRms(frame(1000))).toBe(1000);
    expect(frameRms(Buffer.alloc(0))).toBe(0);
  });
});

describe("VAD", () => {
  it("ends a turn after enough silence following speech", () => {
    const vad = new VAD({ silenceMs: 60 });
    expect(vad.processFrame(frame(3000))).toEqual({ isSpeech: true, endOfTurn: false, segment: undefined });
    expect(vad.processFrame(frame(0)).endOfTurn).toBe(false);
    expect(vad.processFrame(frame(0)).endOfTurn).toBe(false);
    const end = vad.processFrame(frame(0));
    expect(end.endOfTurn).toBe(true);
    expect(end.segment?.length).toBe(4 * VAD.getFrameSizeBytes());
  });

  it("ignores silence with no speech before it", () => {
    const vad = new VAD({ silenceMs: 20 });
    for (let i = 0; i < 5; i++) expect(vad.processFrame(frame(0)).endOfTurn).toBe(false);
  });

  it("ignores short frames", () => {
    const vad = new VAD({ silenceMs: 20 });
    expect(vad.processFrame(Buffer.alloc(10)).isSpeech).toBe(false);
  });
});
