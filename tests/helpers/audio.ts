import { VAD } from "../../src/speech/vad";

/** One 20ms frame of constant-amplitude 16-bit PCM. */
export function frame(amplitude: number): Buffer {
  const buf = Buffer.alloc(VAD.getFrameSizeBytes());
  for (let i = 0; i < buf.length; i += 2) buf.writeInt16LE(amplitude, i);
  return buf;
}

/** `speechFrames` loud frames followed by `silenceFrames` silent ones. */
export function utterance(speechFrames: number, silenceFrames: number): Buffer {
  const frames: Buffer[] = [];
  for (let i = 0; i < speechFrames; i++) frames.push(frame(3000));
  for (let i = 0; i < silenceFrames; i++) frames.push(frame(0));
  return Buffer.concat(frames);
}
