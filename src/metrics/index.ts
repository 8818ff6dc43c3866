/**
 * Telemetry sink: events, interactions and turn latencies, logged as structured lines.
 * Keeps the last time each event was seen (session duration) and running counters for /status.
 */

import type { DialogueResponse, NluResult, TelemetrySink } from "../pipeline/types";
import { logger } from "../logging";

/** Last turn timing (ms). */
export interface TurnMetrics {
  /** Transcription delivered to the state machine until NLU finished. */
  nluLatencyMs?: number;
  dialogueLatencyMs?: number;
  /** Time spent executing the turn's vehicle commands. */
  commandLatencyMs?: number;
  ttsLatencyMs?: number;
  /** End of user speech to end of spoken response (primary KPI). */
  endOfUserSpeechToResponseMs?: number;
  sessionId?: string;
  turn?: number;
  intent?: string;
  commandCount?: number;
}

export interface TelemetryCounters {
  events: number;
  interactions: number;
  /** Per-event-name counts. */
  byEvent: Record<string, number>;
}

export class Telemetry implements TelemetrySink {
  private readonly lastEventAt = new Map<string, number>();
  private lastTurnMetrics: TurnMetrics = {};
  private counters: TelemetryCounters = { events: 0, interactions: 0, byEvent: {} };

  constructor(private readonly now: () => number = Date.now) {}

  logEvent(name: string, payload: Record<string, unknown>): void {
    this.lastEventAt.set(name, this.now());
    this.counters.events++;
    this.counters.byEvent[name] = (this.counters.byEvent[name] ?? 0) + 1;
    logger.info({ event: "TELEMETRY_EVENT", name, ...payload }, "Telemetry event");
  }

  logInteraction(input: string, nlu: NluResult, response: DialogueResponse): void {
    this.counters.interactions++;
    logger.info(
      {
        event: "INTERACTION",
        input,
        intent: nlu.intent,
        confidence: nlu.confidence,
        entities: nlu.entities,
        response: response.speechResponse,
        commands: response.commands.map((c) => c.type),
        end_conversation: response.endConversation,
      },
      "Interaction"
    );
  }

  getLastEventTime(name: string): number | undefined {
    return this.lastEventAt.get(name);
  }

  recordTurnMetrics(metrics: TurnMetrics): void {
    this.lastTurnMetrics = { ...this.lastTurnMetrics, ...metrics };
    logger.info(
      {
        event: "TURN_METRICS",
        nlu_latency_ms: metrics.nluLatencyMs,
        dialogue_latency_ms: metrics.dialogueLatencyMs,
        command_latency_ms: metrics.commandLatencyMs,
        tts_latency_ms: metrics.ttsLatencyMs,
        end_of_user_speech_to_response_ms: metrics.endOfUserSpeechToResponseMs,
        session_id: metrics.sessionId,
        turn: metrics.turn,
        intent: metrics.intent,
        command_count: metrics.commandCount,
      },
      "Turn latency"
    );
  }

  getLastTurnMetrics(): TurnMetrics {
    return { ...this.lastTurnMetrics };
  }

  getCounters(): TelemetryCounters {
    return { ...this.counters, byEvent: { ...this.counters.byEvent } };
  }
}
