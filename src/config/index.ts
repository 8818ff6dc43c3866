/**
 * Env-based configuration for the cabin voice assistant.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type AsrProvider = "openai" | "stub";
export type LlmProvider = "openai" | "anthropic" | "stub";
export type TtsProvider = "google" | "stub";
export type VehicleLinkKind = "simulated" | "ws";
export type WakeWordPolicy = "ignore" | "barge-in";

export interface AppConfig {
  /** ASR (speech-to-text) provider and options */
  asr: {
    provider: AsrProvider;
    openaiApiKey?: string;
  };

  /** LLM provider used by the dialogue manager for phrasing replies */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
  };

  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    googleApiKey?: string;
    googleVoiceName?: string;
  };

  /** Vehicle link: in-memory simulator or the cabin gateway over WebSocket */
  vehicle: {
    link: VehicleLinkKind;
    wsAddress?: string;
    token?: string;
    /** Deadline for one request/response round trip to the gateway */
    requestTimeoutMs: number;
  };

  security: {
    /** JSON manifest of { files: { relativePath: sha256 } }. Unset = integrity check passes with a warning. */
    integrityManifest?: string;
  };

  /** Speech and context tuning */
  pipeline: {
    /** Silence duration (ms) to consider end of utterance */
    vadSilenceMs: number;
    /** Phrases that wake the assistant (lowercase) */
    wakePhrases: string[];
    /** How long (ms) a detected wake word stays latched for the tick loop */
    wakeWordHoldMs: number;
    /** Transcriptions below this confidence get a clarification prompt */
    minConfidence: number;
    /** NLU intents below this confidence become "unknown" */
    intentConfidenceThreshold: number;
    /** Turns kept in context history */
    contextWindowSize: number;
    /** Context resets to defaults when unmodified longer than this */
    contextTtlMs: number;
    /** Deadline for LLM reply phrasing; the templated reply is used past it */
    llmTimeoutMs: number;
    /** Minimum gap between two proactive notifications of the same type */
    proactiveCooldownMs: number;
  };

  /** Orchestrator timing, recovery budget and policies */
  orchestrator: OrchestratorSettings;
}

export interface OrchestratorSettings {
  tickIntervalMs: number;
  healthCheckTimeoutMs: number;
  /** Healthy checks slower than this are reported degraded */
  healthDegradedMs: number;
  healthCheckIntervalMs: number;
  recoveryMaxAttempts: number;
  recoveryRestartTimeoutMs: number;
  providerTimeoutMs: number;
  listenTimeoutMs: number;
  loopErrorBackoffMs: number;
  wakeWordPolicy: WakeWordPolicy;
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getInt(key: string, defaultValue: number, min = 0): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getFloat(key: string, defaultValue: number, min = 0, max = 1): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) || n < min || n > max ? defaultValue : n;
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const found = allowed.find((a) => a === value);
  return found ?? fallback;
}

const ASR_PROVIDERS = ["openai", "stub"] as const;
const LLM_PROVIDERS = ["openai", "anthropic", "stub"] as const;
const TTS_PROVIDERS = ["google", "stub"] as const;
const VEHICLE_LINKS = ["simulated", "ws"] as const;
const WAKE_POLICIES = ["ignore", "barge-in"] as const;

/**
 * Build config from environment variables.
 * ASR_PROVIDER, LLM_PROVIDER, TTS_PROVIDER select adapters; VEHICLE_LINK selects the vehicle link.
 */
export function loadConfig(): AppConfig {
  const wakePhrases = (getEnv("WAKE_PHRASES") ?? "hey car")
    .split(",")
    .map((p) => p.trim().toLowerCase())
    .filter((p) => p.length > 0);

  return {
    asr: {
      provider: pick(getEnv("ASR_PROVIDER"), ASR_PROVIDERS, "stub"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
    },
    llm: {
      provider: pick(getEnv("LLM_PROVIDER"), LLM_PROVIDERS, "stub"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-haiku-20241022",
    },
    tts: {
      provider: pick(getEnv("TTS_PROVIDER"), TTS_PROVIDERS, "stub"),
      googleApiKey: getEnv("GOOGLE_CLOUD_TTS_API_KEY"),
      googleVoiceName: getEnv("GOOGLE_TTS_VOICE_NAME") || "en-US-Neural2-F",
    },
    vehicle: {
      link: pick(getEnv("VEHICLE_LINK"), VEHICLE_LINKS, "simulated"),
      wsAddress: getEnv("VEHICLE_WS_ADDRESS"),
      token: getEnv("VEHICLE_TOKEN"),
      requestTimeoutMs: getInt("VEHICLE_REQUEST_TIMEOUT_MS", 3000, 1),
    },
    security: {
      integrityManifest: getEnv("INTEGRITY_MANIFEST"),
    },
    pipeline: {
      vadSilenceMs: getInt("VAD_SILENCE_MS", 500, 1),
      wakePhrases: wakePhrases.length > 0 ? wakePhrases : ["hey car"],
      wakeWordHoldMs: getInt("WAKE_WORD_HOLD_MS", 2000, 1),
      minConfidence: getFloat("MIN_CONFIDENCE", 0.6),
      intentConfidenceThreshold: getFloat("INTENT_CONFIDENCE_THRESHOLD", 0.7),
      contextWindowSize: getInt("CONTEXT_WINDOW_SIZE", 5, 1),
      contextTtlMs: getInt("CONTEXT_TTL_MS", 30 * 60_000, 1),
      llmTimeoutMs: getInt("LLM_TIMEOUT_MS", 4000, 1),
      proactiveCooldownMs: getInt("PROACTIVE_COOLDOWN_MS", 5 * 60_000, 0),
    },
    orchestrator: {
      tickIntervalMs: getInt("TICK_INTERVAL_MS", 100, 10),
      healthCheckTimeoutMs: getInt("HEALTH_CHECK_TIMEOUT_MS", 2000, 1),
      healthDegradedMs: getInt("HEALTH_DEGRADED_MS", 1500, 1),
      healthCheckIntervalMs: getInt("HEALTH_CHECK_INTERVAL_MS", 30_000, 1000),
      recoveryMaxAttempts: getInt("RECOVERY_MAX_ATTEMPTS", 1, 1),
      recoveryRestartTimeoutMs: getInt("RECOVERY_RESTART_TIMEOUT_MS", 5000, 1),
      providerTimeoutMs: getInt("PROVIDER_TIMEOUT_MS", 10_000, 1),
      listenTimeoutMs: getInt("LISTEN_TIMEOUT_MS", 8000, 1),
      loopErrorBackoffMs: getInt("LOOP_ERROR_BACKOFF_MS", 1000, 0),
      wakeWordPolicy: pick(getEnv("WAKE_WORD_POLICY"), WAKE_POLICIES, "ignore"),
    },
  };
}
