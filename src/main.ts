/**
 * Entry point: load config, build adapters and components, start the orchestrator.
 * Uses the simulated vehicle unless VEHICLE_LINK=ws; microphone audio comes from MOCK_CABIN_INPUT when set.
 */

import type { Server } from "http";
import { loadConfig, type AppConfig } from "./config";
import { createASR } from "./adapters/asr";
import { createLLM } from "./adapters/llm";
import { createTTS } from "./adapters/tts";
import { ContextStore } from "./memory/context-store";
import { VadSpeechInput } from "./speech/speech-input";
import { TtsSpeechOutput } from "./speech/speech-output";
import { RuleBasedUnderstanding } from "./nlu/understanding";
import { DialogueManager } from "./dialogue/dialogue-manager";
import { SimulatedVehicle } from "./vehicle/simulated";
import { WsVehicleLink } from "./vehicle/ws-link";
import { ManifestIntegrityVerifier } from "./security/integrity";
import { MockCabin } from "./audio/mock-cabin";
import { Orchestrator } from "./pipeline/orchestrator";
import { Telemetry } from "./metrics";
import type { VehicleLink } from "./pipeline/types";
import { startHealthServer } from "./health-server";
import { errorMessage, logger, logError } from "./logging";

const SAMPLE_RATE_HZ = 16000;

function createVehicleLink(config: AppConfig): VehicleLink {
  const { link, wsAddress, token, requestTimeoutMs } = config.vehicle;
  if (link === "ws") {
    if (!wsAddress) throw new Error("VEHICLE_LINK=ws requires VEHICLE_WS_ADDRESS");
    return new WsVehicleLink({ wsAddress, token: token ?? "", requestTimeoutMs });
  }
  logger.info({ event: "VEHICLE_SIMULATED" }, "Using simulated vehicle; set VEHICLE_LINK=ws to connect a gateway");
  return new SimulatedVehicle();
}

async function main(): Promise<void> {
  const config = loadConfig();
  const cabin = new MockCabin({
    inputWavPath: process.env.MOCK_CABIN_INPUT,
    outputWavPath: process.env.MOCK_CABIN_OUTPUT ?? "cabin_output.wav",
    outputSampleRateHz: SAMPLE_RATE_HZ,
    trailingSilenceMs: config.pipeline.vadSilenceMs * 2,
  });

  const speechInput = new VadSpeechInput(createASR(config), {
    vadSilenceMs: config.pipeline.vadSilenceMs,
    wakePhrases: config.pipeline.wakePhrases,
    wakeWordHoldMs: config.pipeline.wakeWordHoldMs,
    asrTimeoutMs: config.orchestrator.providerTimeoutMs,
  });
  const telemetry = new Telemetry();
  const orchestrator = new Orchestrator(
    {
      speechInput,
      understanding: new RuleBasedUnderstanding({ confidenceThreshold: config.pipeline.intentConfidenceThreshold }),
      dialogue: new DialogueManager(createLLM(config), {
        llmTimeoutMs: config.pipeline.llmTimeoutMs,
        proactiveCooldownMs: config.pipeline.proactiveCooldownMs,
      }),
      speechOutput: new TtsSpeechOutput(createTTS(config), cabin.speaker, {
        sampleRateHz: SAMPLE_RATE_HZ,
        voiceName: config.tts.googleVoiceName,
      }),
      vehicle: createVehicleLink(config),
      context: new ContextStore({ windowSize: config.pipeline.contextWindowSize, ttlMs: config.pipeline.contextTtlMs }),
      telemetry,
      integrity: new ManifestIntegrityVerifier(config.security.integrityManifest),
    },
    { ...config.orchestrator, minConfidence: config.pipeline.minConfidence }
  );

  const server: Server = startHealthServer({
    getReady: () => orchestrator.isActive() && orchestrator.isSystemHealthy(),
    getStatus: () => ({
      active: orchestrator.isActive(),
      state: orchestrator.getConversationState(),
      session: orchestrator.getSession(),
      health: orchestrator.getComponentHealth(),
      telemetry: telemetry.getCounters(),
      lastTurn: telemetry.getLastTurnMetrics(),
    }),
  });

  const cabinFeed = new AbortController();
  const closed = orchestrator.closed.then(({ emergency, reason }) => {
    cabinFeed.abort();
    try {
      if (cabin.getOutputBuffer().length > 0) cabin.flushOutputToFile();
    } catch (err) {
      logger.warn({ event: "MOCK_CABIN_OUTPUT_FAILED", err: errorMessage(err) }, "Could not write cabin audio");
    }
    server.close();
    if (emergency) {
      logger.error({ event: "STOPPED_ON_EMERGENCY", reason }, "Assistant stopped after an emergency shutdown");
      process.exitCode = 1;
    }
  });

  let stopping = false;
  const stop = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ event: "SIGNAL", signal }, "Shutting down");
    await orchestrator.shutdown({ reason: signal });
    await closed;
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      stop(signal).then(
        () => process.exit(),
        (err: unknown) => {
          logError(logger, err, { signal });
          process.exit(1);
        }
      );
    });
  }

  const result = await orchestrator.start();
  if (result.status !== "ok") {
    logger.error({ event: "STARTUP_FAILED", result }, "Startup failed");
    await closed;
    process.exitCode = 1;
    return;
  }

  if (process.env.MOCK_CABIN_INPUT) {
    cabin.feedFromWav((frame) => speechInput.pushAudio(frame), undefined, cabinFeed.signal).catch((err: unknown) => {
      logger.warn({ event: "MOCK_CABIN_INPUT_FAILED", err: errorMessage(err) }, "Could not feed cabin audio");
    });
  }
}

main().catch((err) => {
  logError(logger, err);
  process.exit(1);
});
