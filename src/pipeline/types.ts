/**
 * Collaborator contracts consumed by the orchestrator, plus the shared conversation types.
 */

import type { ConversationContext } from "../memory/types";
import type { TurnMetrics } from "../metrics";

/** Lifecycle every collaborator exposes to the health monitor and recovery manager. */
export interface Lifecycle {
  start(): Promise<void>;
  stop(): Promise<void>;
  restart(): Promise<void>;
  /** Zero-argument liveness check. */
  healthCheck(): Promise<boolean>;
}

export const COMPONENT_NAMES = [
  "speech_input",
  "understanding",
  "dialogue",
  "speech_output",
  "vehicle_link",
  "context_fusion",
] as const;

export type ComponentName = (typeof COMPONENT_NAMES)[number];

export type TranscriptionHandler = (text: string, confidence: number) => void;

export interface SpeechInput extends Lifecycle {
  /** True once per detected wake word (consumes the latch). */
  isWakeWordDetected(): Promise<boolean>;
  /** Register the consumer of final transcriptions; confidence in 0..1. */
  onTranscription(handler: TranscriptionHandler): void;
}

export interface NluResult {
  text: string;
  intent: string;
  entities: Record<string, unknown>;
  confidence: number;
}

export interface Understanding extends Lifecycle {
  process(text: string): Promise<NluResult>;
}

export const COMMAND_TYPES = ["climate_control", "navigation", "media", "vehicle_settings"] as const;
export type CommandType = (typeof COMMAND_TYPES)[number];

/** Vehicle or dialogue issued instruction awaiting execution. */
export interface PendingCommand {
  type: string;
  parameters: Record<string, unknown>;
}

export interface DialogueResponse {
  speechResponse: string;
  commands: PendingCommand[];
  uiUpdate?: Record<string, unknown>;
  endConversation: boolean;
}

export interface ProactiveNotification {
  speech: string;
  commands: PendingCommand[];
}

export interface Dialogue extends Lifecycle {
  processTurn(nlu: NluResult, context: ConversationContext): Promise<DialogueResponse>;
  checkProactiveTrigger(
    eventType: string,
    eventData: Record<string, unknown>,
    context: ConversationContext
  ): Promise<ProactiveNotification | null>;
}

export interface SpeechOutput extends Lifecycle {
  /** Resolves when the utterance has been delivered (or cancelled). interrupt=true cuts off current speech first. */
  speak(text: string, interrupt?: boolean): Promise<void>;
  /** Cut off the utterance in progress, if any. */
  cancel(): void;
}

export type UiState = "idle" | "listening" | "processing" | "speaking";

export type VehicleState = Record<string, unknown>;

export type VehicleEventHandler = (eventType: string, payload: Record<string, unknown>) => void;

export interface ClimateParams {
  temperature?: number;
  fan_speed?: number;
  zone?: string;
  mode?: string;
}

export interface NavigationParams {
  destination: string;
  route_preferences?: Record<string, unknown>;
}

export interface MediaParams {
  action: string;
  source?: string;
  content?: string;
  volume?: number;
}

export interface VehicleLink extends Lifecycle {
  getCurrentState(): Promise<VehicleState>;
  setUiState(state: UiState): Promise<void>;
  updateUi(update: Record<string, unknown>): Promise<void>;
  /** Returns an unsubscribe function. */
  subscribeToEvents(handler: VehicleEventHandler): () => void;
  setClimate(params: ClimateParams): Promise<boolean>;
  setNavigationDestination(params: NavigationParams): Promise<boolean>;
  controlMedia(params: MediaParams): Promise<boolean>;
  updateSettings(settings: Record<string, unknown>): Promise<boolean>;
}

export interface TelemetrySink {
  logEvent(name: string, payload: Record<string, unknown>): void;
  logInteraction(input: string, nlu: NluResult, response: DialogueResponse): void;
  getLastEventTime(name: string): number | undefined;
  recordTurnMetrics(metrics: TurnMetrics): void;
}

/** Startup integrity verification (runs before any component starts). */
export interface IntegrityVerifier {
  start(): Promise<void>;
  stop(): Promise<void>;
  verifySystemIntegrity(): Promise<boolean>;
}
