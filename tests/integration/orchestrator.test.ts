import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CommandQueue } from "../../src/pipeline/command-queue";
import { IntegrityError } from "../../src/pipeline/errors";
import { Orchestrator, APOLOGY_PROMPT, CLARIFY_PROMPT, WAKE_ACK_PROMPT, type OrchestratorConfig } from "../../src/pipeline/orchestrator";
import type { TransitionEvent } from "../../src/pipeline/state-machine";
import { StubASR } from "../../src/adapters/asr";
import type { TranscriptResult } from "../../src/adapters/asr";
import { StubTTS } from "../../src/adapters/tts";
import { VadSpeechInput } from "../../src/speech/speech-input";
import { TtsSpeechOutput } from "../../src/speech/speech-output";
import { RuleBasedUnderstanding } from "../../src/nlu/understanding";
import { DialogueManager } from "../../src/dialogue/dialogue-manager";
import { SimulatedVehicle } from "../../src/vehicle/simulated";
import { ContextStore } from "../../src/memory/context-store";
import { ManifestIntegrityVerifier } from "../../src/security/integrity";
import { Telemetry } from "../../src/metrics";
import { utterance } from "../helpers/audio";

const config: OrchestratorConfig = {
  tickIntervalMs: 10,
  healthCheckTimeoutMs: 500,
  healthDegradedMs: 400,
  healthCheckIntervalMs: 60_000,
  recoveryMaxAttempts: 1,
  recoveryRestartTimeoutMs: 500,
  providerTimeoutMs: 1_000,
  listenTimeoutMs: 60_000,
  loopErrorBackoffMs: 50,
  wakeWordPolicy: "ignore",
  minConfidence: 0.5,
};

async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

function cabin(script: Array<string | TranscriptResult> = [], manifestPath?: string) {
  const speechInput = new VadSpeechInput(new StubASR(script), {
    vadSilenceMs: 60,
    wakePhrases: ["hey car"],
    wakeWordHoldMs: 5_000,
    asrTimeoutMs: 500,
  });
  const tts = new StubTTS();
  const vehicle = new SimulatedVehicle();
  const context = new ContextStore({ windowSize: 10, ttlMs: 60_000 });
  const telemetry = new Telemetry();
  const understanding = new RuleBasedUnderstanding();
  const dialogue = new DialogueManager(null);
  const speechOutput = new TtsSpeechOutput(tts, () => undefined);
  const integrity = new ManifestIntegrityVerifier(manifestPath);
  const orchestrator = new Orchestrator(
    { speechInput, understanding, dialogue, speechOutput, vehicle, context, telemetry, integrity },
    config
  );
  const transitions: string[] = [];
  orchestrator.onTransition((e: TransitionEvent) => transitions.push(`${e.from}->${e.to}`));
  /** One spoken segment: loud frames, then enough silence to end it. */
  const speak = () => speechInput.pushAudio(utterance(10, 3));
  return {
    orchestrator,
    speechInput,
    tts,
    vehicle,
    context,
    telemetry,
    understanding,
    dialogue,
    speechOutput,
    integrity,
    transitions,
    speak,
  };
}

let current: Orchestrator | null = null;

afterEach(async () => {
  await current?.shutdown();
  current = null;
  jest.restoreAllMocks();
});

describe("Orchestrator end to end", () => {
  it("wakes, sets the temperature and keeps listening", async () => {
    const c = cabin(["hey car", "set temperature to 21"]);
    current = c.orchestrator;
    expect(await c.orchestrator.start()).toEqual({ status: "ok" });
    expect(c.orchestrator.isActive()).toBe(true);
    expect(c.orchestrator.isSystemHealthy()).toBe(true);

    await c.speak();
    await waitFor(() => c.orchestrator.getConversationState() === "listening" && c.tts.spoken.length === 1);
    expect(c.tts.spoken).toEqual([WAKE_ACK_PROMPT]);

    await c.speak();
    await waitFor(() => c.vehicle.uiStates.length === 4);
    expect(c.transitions).toEqual(["idle->listening", "listening->processing", "processing->speaking", "speaking->listening"]);
    expect(c.vehicle.uiStates).toEqual(["listening", "processing", "speaking", "listening"]);
    expect(c.tts.spoken).toEqual([WAKE_ACK_PROMPT, "Setting the temperature to 21 degrees."]);
    expect(c.vehicle.uiUpdates).toEqual([{ screen: "climate", temperature: 21 }]);

    const vehicleState = await c.vehicle.getCurrentState();
    expect(vehicleState.climate_control).toMatchObject({ temperature: 21 });
    const ctx = await c.context.read();
    expect(ctx.vehicleState.climate_control).toMatchObject({ temperature: 21 });
    expect(ctx.currentIntent).toBe("climate_control");
    expect(ctx.history.map((t) => [t.speaker, t.text, t.intent])).toEqual([
      ["user", "set temperature to 21", "climate_control"],
      ["assistant", "Setting the temperature to 21 degrees.", "climate_control"],
    ]);
    expect(c.telemetry.getLastTurnMetrics()).toMatchObject({ intent: "climate_control", commandCount: 1, turn: 1 });
    expect(c.orchestrator.getSession()).toMatchObject({ origin: "wake_word", turnCount: 1, active: true });
  });

  it("asks to repeat a low-confidence transcription", async () => {
    const c = cabin(["hey car", { text: "mumble", confidence: 0.2 }]);
    current = c.orchestrator;
    await c.orchestrator.start();

    await c.speak();
    await waitFor(() => c.tts.spoken.length === 1);
    await c.speak();
    await waitFor(() => c.tts.spoken.length === 2);
    expect(c.tts.spoken[1]).toBe(CLARIFY_PROMPT);
    expect(c.orchestrator.getConversationState()).toBe("listening");
    expect(c.transitions).toEqual(["idle->listening", "listening->listening"]);
  });

  it("ends the conversation on a farewell", async () => {
    const c = cabin(["hey car", "goodbye"]);
    current = c.orchestrator;
    await c.orchestrator.start();

    await c.speak();
    await waitFor(() => c.tts.spoken.length === 1);
    await c.speak();
    await waitFor(() => c.transitions.length === 4);
    expect(c.transitions[3]).toBe("speaking->idle");
    expect(c.tts.spoken[1]).toBe("Goodbye. Drive safely.");
    expect(c.orchestrator.getSession()).toBeNull();
    await waitFor(() => c.telemetry.getCounters().byEvent.conversation_end === 1);
  });

  it("apologizes when understanding fails mid-turn", async () => {
    const c = cabin(["hey car", "set temperature to 21"]);
    current = c.orchestrator;
    await c.orchestrator.start();
    jest.spyOn(c.understanding, "process").mockRejectedValueOnce(new Error("nlu down"));

    await c.speak();
    await waitFor(() => c.tts.spoken.length === 1);
    await c.speak();
    await waitFor(() => c.tts.spoken.length === 2);
    expect(c.tts.spoken[1]).toBe(APOLOGY_PROMPT);
    expect(c.transitions).toEqual(["idle->listening", "listening->processing", "processing->listening"]);
    expect(c.telemetry.getCounters().byEvent.turn_failed).toBe(1);
  });

  it("speaks a low fuel notification from idle and returns to idle", async () => {
    const c = cabin();
    current = c.orchestrator;
    await c.orchestrator.start();

    c.vehicle.emitEvent("low_fuel", { fuel_level: 12 });
    await waitFor(() => c.transitions.length === 2);
    expect(c.transitions).toEqual(["idle->speaking", "speaking->idle"]);
    expect(c.tts.spoken).toEqual(["Fuel is low at 12 percent. Would you like me to find the nearest gas station?"]);

    const ctx = await c.context.read();
    expect(ctx.vehicleState.events).toMatchObject({ low_fuel: { fuel_level: 12 } });
    const last = ctx.history[ctx.history.length - 1];
    expect(last.speaker).toBe("system");
    expect(last.intent).toBe("proactive:low_fuel");
    await waitFor(() => c.telemetry.getCounters().byEvent.conversation_end === 1);
    expect(c.telemetry.getCounters().byEvent.proactive_notification).toBe(1);
  });

  it("aborts startup when integrity verification fails", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cabin-int-"));
    fs.writeFileSync(path.join(dir, "model.bin"), "weights");
    const manifest = path.join(dir, "manifest.json");
    fs.writeFileSync(manifest, JSON.stringify({ files: { "model.bin": "0".repeat(64) } }));
    const c = cabin([], manifest);
    current = c.orchestrator;

    expect(await c.orchestrator.start()).toEqual({
      status: "integrity_failed",
      error: "System integrity verification failed",
    });
    expect(c.orchestrator.isActive()).toBe(false);
    expect(c.orchestrator.isShutDown()).toBe(true);
    expect(await c.vehicle.healthCheck()).toBe(false);
    expect(c.telemetry.getCounters().byEvent).toMatchObject({ integrity_failed: 1, emergency_shutdown: 1 });
    expect(await c.orchestrator.start()).toEqual({ status: "shut_down" });
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("recovers a component that fails its first health check", async () => {
    const c = cabin();
    current = c.orchestrator;
    jest.spyOn(c.understanding, "healthCheck").mockResolvedValueOnce(false);

    expect(await c.orchestrator.start()).toEqual({ status: "ok" });
    expect(c.orchestrator.isSystemHealthy()).toBe(true);
    expect(c.orchestrator.getComponentHealth()?.components.understanding?.status).toBe("healthy");
  });

  it("shuts down when a failed component cannot be recovered", async () => {
    const c = cabin();
    current = c.orchestrator;
    c.vehicle.failOn("healthCheck");

    expect(await c.orchestrator.start()).toEqual({ status: "recovery_failed", components: ["vehicle_link"] });
    expect(c.orchestrator.isShutDown()).toBe(true);
    expect(c.orchestrator.isActive()).toBe(false);
    expect(c.telemetry.getCounters().byEvent.emergency_shutdown).toBe(1);
    expect(c.vehicle.subscriberCount()).toBe(0);
  });

  it("does not wake again on a wake phrase heard while it was speaking", async () => {
    const c = cabin();
    current = c.orchestrator;
    await c.orchestrator.start();
    c.orchestrator.onTransition((e) => {
      if (e.to === "speaking") c.speechInput.ingestTranscript("hey car", 0.9);
    });

    c.speechInput.ingestTranscript("hey car", 0.9);
    await waitFor(() => c.orchestrator.getConversationState() === "listening");
    c.speechInput.ingestTranscript("goodbye", 0.9);
    await waitFor(() => c.transitions.length >= 4);
    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(c.transitions).toEqual(["idle->listening", "listening->processing", "processing->speaking", "speaking->idle"]);
    expect(c.orchestrator.getConversationState()).toBe("idle");

    c.speechInput.ingestTranscript("hey car", 0.9);
    await waitFor(() => c.transitions.length === 5);
    expect(c.transitions[4]).toBe("idle->listening");
  });

  it("stops components in reverse start order, then the verifier, then the command queue", async () => {
    const c = cabin();
    current = c.orchestrator;
    await c.orchestrator.start();
    const stopped: string[] = [];
    const record = (name: string) => async () => {
      stopped.push(name);
    };
    jest.spyOn(c.context, "stop").mockImplementation(record("context_fusion"));
    jest.spyOn(c.vehicle, "stop").mockImplementation(record("vehicle_link"));
    jest.spyOn(c.understanding, "stop").mockImplementation(record("understanding"));
    jest.spyOn(c.dialogue, "stop").mockImplementation(record("dialogue"));
    jest.spyOn(c.speechOutput, "stop").mockImplementation(record("speech_output"));
    jest.spyOn(c.speechInput, "stop").mockImplementation(record("speech_input"));
    jest.spyOn(c.integrity, "stop").mockImplementation(record("integrity"));
    jest.spyOn(CommandQueue.prototype, "close").mockImplementation(record("command_queue"));

    await c.orchestrator.shutdown({ reason: "test" });
    expect(stopped).toEqual([
      "speech_input",
      "speech_output",
      "dialogue",
      "understanding",
      "vehicle_link",
      "context_fusion",
      "integrity",
      "command_queue",
    ]);
    await expect(c.orchestrator.shutdown()).resolves.toBeUndefined();
    expect(stopped).toHaveLength(8);
    expect(await c.orchestrator.closed).toEqual({ emergency: false, reason: "test" });
    expect(c.telemetry.getCounters().byEvent.system_stop).toBe(1);
  });

  it("backs off and keeps ticking after a non-critical loop error", async () => {
    const c = cabin();
    current = c.orchestrator;
    const reads: number[] = [];
    const read = c.context.read.bind(c.context);
    jest
      .spyOn(c.context, "read")
      .mockImplementationOnce(async () => {
        reads.push(Date.now());
        throw new Error("context busy");
      })
      .mockImplementation(async () => {
        reads.push(Date.now());
        return read();
      });

    await c.orchestrator.start();
    await waitFor(() => reads.length >= 3);
    expect(reads[1] - reads[0]).toBeGreaterThanOrEqual(40);
    expect(c.orchestrator.isActive()).toBe(true);
    expect(c.orchestrator.isShutDown()).toBe(false);
  });

  it("shuts down on a critical loop error", async () => {
    const c = cabin();
    current = c.orchestrator;
    jest.spyOn(c.context, "read").mockRejectedValueOnce(new IntegrityError("manifest changed at run time"));

    await c.orchestrator.start();
    expect(await c.orchestrator.closed).toEqual({ emergency: true, reason: "manifest changed at run time" });
    expect(c.orchestrator.isActive()).toBe(false);
    expect(c.telemetry.getCounters().byEvent.emergency_shutdown).toBe(1);
  });

  it("reports an emergency when a component fails at run time and cannot be recovered", async () => {
    const c = cabin();
    current = c.orchestrator;
    await c.orchestrator.start();

    c.vehicle.failOn("healthCheck");
    c.vehicle.failOn("getCurrentState");
    expect(await c.orchestrator.closed).toEqual({ emergency: true, reason: "Recovery failed for: vehicle_link" });
    expect(c.orchestrator.isShutDown()).toBe(true);
  });
});
