/**
 * Orchestrator: starts the cabin components, runs the steady-state tick loop and owns the conversation.
 *
 * Startup: integrity -> start components -> health check -> recovery (if needed) -> tick loop.
 * Each tick refreshes vehicle state, polls the wake word, raises listen timeouts and (periodically)
 * re-checks component health. Speech and vehicle callbacks only enqueue triggers on the state machine;
 * the orchestrator performs the side effects of each transition.
 */

import { isDeepStrictEqual } from "util";
import type { ContextStore } from "../memory/context-store";
import type {
  ComponentName,
  Dialogue,
  IntegrityVerifier,
  Lifecycle,
  PendingCommand,
  SpeechInput,
  SpeechOutput,
  TelemetrySink,
  UiState,
  Understanding,
  VehicleLink,
} from "./types";
import type { OrchestratorSettings } from "../config";
import type { ComponentHealth } from "./health-monitor";
import { HealthMonitor } from "./health-monitor";
import { RecoveryManager } from "./recovery";
import { CommandQueue, type CommandResult } from "./command-queue";
import { EventDispatcher } from "./event-dispatcher";
import {
  ConversationStateMachine,
  type ConversationSession,
  type ConversationState,
  type EndReason,
  type ProactiveTrigger,
  type ResponseReadyTrigger,
  type StateEffects,
  type TransitionListener,
  type Trigger,
} from "./state-machine";
import {
  callProvider,
  defaultErrorPolicy,
  IntegrityError,
  RecoveryFailedError,
  withTimeout,
  type ErrorPolicy,
  type OrchestratorError,
  type Outcome,
} from "./errors";
import { executeCommand } from "../vehicle/commands";
import { errorMessage, logError, logger, logTurn } from "../logging";

export const WAKE_ACK_PROMPT = "I'm listening";
export const CLARIFY_PROMPT = "I didn't catch that. Could you please repeat?";
export const APOLOGY_PROMPT = "I'm sorry, I encountered an error. Please try again.";

/** Components start concurrently; this order is recorded so shutdown can walk it backwards. */
const START_ORDER: readonly ComponentName[] = [
  "context_fusion",
  "vehicle_link",
  "understanding",
  "dialogue",
  "speech_output",
  "speech_input",
];

export interface OrchestratorDeps {
  speechInput: SpeechInput;
  understanding: Understanding;
  dialogue: Dialogue;
  speechOutput: SpeechOutput;
  vehicle: VehicleLink;
  context: ContextStore;
  telemetry: TelemetrySink;
  integrity: IntegrityVerifier;
}

export interface OrchestratorConfig extends OrchestratorSettings {
  /** Transcriptions below this confidence get a clarification prompt. */
  minConfidence: number;
  errorPolicy?: ErrorPolicy;
}

export type StartupResult =
  | { status: "ok" }
  | { status: "integrity_failed"; error: string }
  | { status: "recovery_failed"; components: ComponentName[] }
  | { status: "shut_down" };

export interface ShutdownOptions {
  emergency?: boolean;
  reason?: string;
}

/** How the orchestrator went down; `closed` resolves with it once shutdown has finished. */
export interface ShutdownInfo {
  emergency: boolean;
  reason?: string;
}

interface TurnTiming {
  startedAt: number;
  nluLatencyMs?: number;
  dialogueLatencyMs?: number;
}

export class Orchestrator implements StateEffects {
  private readonly machine: ConversationStateMachine;
  private readonly dispatcher: EventDispatcher;
  private readonly health: HealthMonitor;
  private readonly recovery: RecoveryManager;
  private readonly commands: CommandQueue;
  private readonly components: Record<ComponentName, Lifecycle>;
  private readonly errorPolicy: ErrorPolicy;

  private active = false;
  private startupBegun = false;
  private started: ComponentName[] = [];
  private committedHealth: ComponentHealth | null = null;
  private tickTimer: NodeJS.Timeout | null = null;
  private lastHealthCheckAt = 0;
  /** stateSince() of the listening period a timeout was already raised for. */
  private listenTimeoutRaisedFor: number | null = null;
  private recoveryInFlight: Promise<void> | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private unsubscribeVehicle: (() => void) | null = null;
  private turnTiming: TurnTiming | null = null;
  private resolveClosed: (info: ShutdownInfo) => void = () => undefined;
  /** Resolves after any shutdown (requested, startup failure or emergency) completes. */
  readonly closed: Promise<ShutdownInfo> = new Promise((resolve) => {
    this.resolveClosed = resolve;
  });

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly config: OrchestratorConfig
  ) {
    this.components = {
      speech_input: deps.speechInput,
      understanding: deps.understanding,
      dialogue: deps.dialogue,
      speech_output: deps.speechOutput,
      vehicle_link: deps.vehicle,
      context_fusion: deps.context,
    };
    this.errorPolicy = config.errorPolicy ?? defaultErrorPolicy;
    this.machine = new ConversationStateMachine(this, {
      minConfidence: config.minConfidence,
      wakeWordPolicy: config.wakeWordPolicy,
    });
    this.dispatcher = new EventDispatcher(
      deps.context,
      deps.dialogue,
      this.machine,
      { providerTimeoutMs: config.providerTimeoutMs },
      (component, error) => this.reportFailure(component, error)
    );
    this.health = new HealthMonitor({ checkTimeoutMs: config.healthCheckTimeoutMs, degradedMs: config.healthDegradedMs });
    for (const name of START_ORDER) this.health.register(name, this.components[name]);
    this.recovery = new RecoveryManager((name) => this.components[name], {
      maxAttempts: config.recoveryMaxAttempts,
      restartTimeoutMs: config.recoveryRestartTimeoutMs,
    });
    this.commands = new CommandQueue((command) => this.runCommand(command));
  }

  // ---- lifecycle ----

  async start(): Promise<StartupResult> {
    if (this.shutdownPromise) return { status: "shut_down" };
    if (this.startupBegun) return { status: "ok" };
    this.startupBegun = true;
    const { integrity, telemetry } = this.deps;

    try {
      await integrity.start();
      if (!(await integrity.verifySystemIntegrity())) throw new IntegrityError("System integrity verification failed");
    } catch (err) {
      logger.error({ event: "INTEGRITY_FAILED", err: errorMessage(err) }, "Integrity check failed; aborting startup");
      telemetry.logEvent("integrity_failed", { error: errorMessage(err) });
      await this.shutdown({ emergency: true, reason: "integrity check failed" });
      return { status: "integrity_failed", error: errorMessage(err) };
    }

    this.started = [...START_ORDER];
    const results = await Promise.allSettled(START_ORDER.map((name) => this.components[name].start()));
    results.forEach((r, i) => {
      if (r.status === "rejected") {
        logger.error({ event: "COMPONENT_START_FAILED", component: START_ORDER[i], err: errorMessage(r.reason) }, "Start failed");
      }
    });
    this.unsubscribeVehicle = this.deps.vehicle.subscribeToEvents((eventType, payload) => {
      void this.dispatcher.onVehicleEvent(eventType, payload);
    });
    this.deps.speechInput.onTranscription((text, confidence) => {
      void this.machine.send({ type: "transcription", text, confidence });
    });

    const report = await this.health.checkAll();
    this.commitHealth(report);
    const failed = this.health.failedComponents(report);
    if (failed.length > 0) {
      const recovered = await this.recovery.recover(failed);
      if (!recovered.fullyRecovered) {
        const error = new RecoveryFailedError(recovered.terminallyFailed);
        await this.shutdown({ emergency: true, reason: error.message });
        return { status: "recovery_failed", components: recovered.terminallyFailed };
      }
      this.commitHealth(this.health.markHealthy(failed));
    }

    this.active = true;
    this.lastHealthCheckAt = Date.now();
    await this.withContext("update", () =>
      this.deps.context.update({ systemStatus: { status: "active", activeFeatures: [...START_ORDER], errors: [] } })
    );
    telemetry.logEvent("system_start", { components: [...START_ORDER] });
    logger.info({ event: "SYSTEM_ACTIVE" }, "Cabin voice assistant active");
    this.scheduleTick(0);
    return { status: "ok" };
  }

  /** Idempotent; a second call returns the first call's promise. */
  shutdown(options: ShutdownOptions = {}): Promise<void> {
    if (!this.shutdownPromise) this.shutdownPromise = this.runShutdown(options);
    return this.shutdownPromise;
  }

  private async runShutdown({ emergency = false, reason }: ShutdownOptions): Promise<void> {
    this.active = false;
    if (this.tickTimer) clearTimeout(this.tickTimer);
    this.tickTimer = null;
    if (emergency) {
      logger.error({ event: "EMERGENCY_SHUTDOWN", reason }, "Emergency shutdown");
      this.deps.telemetry.logEvent("emergency_shutdown", { reason: reason ?? "unspecified" });
    } else {
      logger.info({ event: "SYSTEM_SHUTDOWN", reason }, "Shutting down");
    }

    this.machine.halt();
    this.dispatcher.close();
    this.unsubscribeVehicle?.();
    this.unsubscribeVehicle = null;

    for (const name of [...this.started].reverse()) {
      try {
        await withTimeout(
          Promise.resolve().then(() => this.components[name].stop()),
          this.config.recoveryRestartTimeoutMs,
          `${name}.stop`
        );
        logger.debug({ event: "COMPONENT_STOPPED", component: name }, "Component stopped");
      } catch (err) {
        logger.warn({ event: "COMPONENT_STOP_FAILED", component: name, err: errorMessage(err) }, "Stop failed");
      }
    }
    this.started = [];
    try {
      await this.deps.integrity.stop();
    } catch (err) {
      logger.warn({ event: "INTEGRITY_STOP_FAILED", err: errorMessage(err) }, "Integrity verifier stop failed");
    }
    await this.commands.close();
    this.deps.telemetry.logEvent("system_stop", { emergency });
    this.resolveClosed({ emergency, reason });
  }

  isActive(): boolean {
    return this.active;
  }

  isShutDown(): boolean {
    return this.shutdownPromise !== null;
  }

  /** Last committed health report. */
  getComponentHealth(): ComponentHealth | null {
    return this.committedHealth;
  }

  /** Every component healthy in the last committed report. */
  isSystemHealthy(): boolean {
    return this.health.isSystemHealthy(this.committedHealth);
  }

  getConversationState(): ConversationState {
    return this.machine.getState();
  }

  getSession(): ConversationSession | null {
    return this.machine.getSession();
  }

  onTransition(listener: TransitionListener): () => void {
    return this.machine.onTransition(listener);
  }

  // ---- tick loop ----

  private scheduleTick(delayMs: number): void {
    if (!this.active) return;
    this.tickTimer = setTimeout(() => {
      this.tickTimer = null;
      void this.runTick();
    }, delayMs);
  }

  private async runTick(): Promise<void> {
    let delay = this.config.tickIntervalMs;
    try {
      await this.tick();
    } catch (err) {
      if (this.errorPolicy.isCritical(err)) {
        logError(logger, err, { event: "LOOP_CRITICAL_ERROR" });
        await this.shutdown({ emergency: true, reason: errorMessage(err) });
        return;
      }
      logger.warn({ event: "LOOP_ERROR", err: errorMessage(err) }, "Tick failed; backing off");
      delay = this.config.loopErrorBackoffMs;
    }
    this.scheduleTick(delay);
  }

  private async tick(): Promise<void> {
    await this.refreshVehicleState();

    const state = this.machine.getState();
    // Idle with triggers still queued: leave the latch for the next tick.
    if (state !== "idle" || this.machine.isSettled()) {
      const eligible = state === "idle" || (state === "speaking" && this.config.wakeWordPolicy === "barge-in");
      const wake = await this.provider("speech_input", "isWakeWordDetected", () =>
        this.deps.speechInput.isWakeWordDetected()
      );
      if (wake.ok && wake.value) {
        if (eligible) {
          logger.info({ event: "WAKE_WORD_DETECTED", state }, "Wake word detected");
          void this.machine.send({ type: "wake_word" });
        } else {
          logger.info({ event: "WAKE_WORD_IGNORED", state }, "Wake word outside Idle; ignored");
        }
      }
    }

    const now = Date.now();
    if (state === "listening") {
      const since = this.machine.stateSince();
      if (now - since >= this.config.listenTimeoutMs && this.listenTimeoutRaisedFor !== since) {
        this.listenTimeoutRaisedFor = since;
        logger.info({ event: "LISTEN_TIMEOUT", waitedMs: now - since }, "No speech; ending conversation");
        void this.machine.send({ type: "listen_timeout" });
      }
    }

    if (now - this.lastHealthCheckAt >= this.config.healthCheckIntervalMs) {
      this.lastHealthCheckAt = now;
      const report = await this.health.checkAll();
      this.commitHealth(report);
      if (this.health.failedComponents(report).length > 0) await this.recoverInBackground();
    }
  }

  /** Pull the vehicle snapshot into the context store when any top-level field changed. */
  private async refreshVehicleState(): Promise<void> {
    const current = await this.provider("vehicle_link", "getCurrentState", () => this.deps.vehicle.getCurrentState());
    if (!current.ok) return;
    const snapshot = await this.deps.context.read();
    const changed = Object.entries(current.value).some(([k, v]) => !isDeepStrictEqual(snapshot.vehicleState[k], v));
    if (!changed) return;
    await this.deps.context.update({ vehicleState: current.value });
    logger.debug({ event: "VEHICLE_STATE_REFRESHED" }, "Vehicle state refreshed into context");
  }

  // ---- failure routing ----

  /** Bounded collaborator call; transient failures mark the component failed and start recovery. */
  private async provider<T>(component: ComponentName, operation: string, fn: () => Promise<T>): Promise<Outcome<T>> {
    const outcome = await callProvider(component, operation, this.config.providerTimeoutMs, fn);
    if (!outcome.ok) this.reportFailure(component, outcome.error);
    return outcome;
  }

  private withContext<T>(operation: string, fn: () => Promise<T>): Promise<Outcome<T>> {
    return this.provider("context_fusion", operation, fn);
  }

  private reportFailure(component: ComponentName, error: OrchestratorError): void {
    logger.warn(
      { event: "COMPONENT_CALL_FAILED", component, kind: error.kind, err: error.message },
      "Collaborator call failed"
    );
    if (error.kind !== "transient") return;
    this.commitHealth(this.health.markFailed(component, error.message));
    this.deps.telemetry.logEvent("component_failure", { component, error: error.message });
    if (this.active) void this.recoverInBackground();
  }

  /** Single flight: concurrent callers share the recovery already running. Never rejects. */
  private recoverInBackground(): Promise<void> {
    if (!this.recoveryInFlight) {
      this.recoveryInFlight = this.runRecovery().finally(() => {
        this.recoveryInFlight = null;
      });
    }
    return this.recoveryInFlight;
  }

  private async runRecovery(): Promise<void> {
    const failed = this.health.failedComponents();
    if (failed.length === 0 || !this.active) return;
    const result = await this.recovery.recover(failed);
    if (result.fullyRecovered) {
      this.commitHealth(this.health.markHealthy(failed));
      return;
    }
    await this.shutdown({ emergency: true, reason: new RecoveryFailedError(result.terminallyFailed).message });
  }

  private commitHealth(report: ComponentHealth): void {
    this.committedHealth = report;
  }

  // ---- state effects ----

  async acknowledgeWake(session: ConversationSession): Promise<void> {
    await this.setUi("listening");
    await this.say(WAKE_ACK_PROMPT, true);
    this.deps.telemetry.logEvent("conversation_start", { sessionId: session.id, origin: session.origin });
  }

  async clarify(session: ConversationSession): Promise<void> {
    logger.info({ event: "LOW_CONFIDENCE", sessionId: session.id }, "Low-confidence transcription; asking to repeat");
    await this.say(CLARIFY_PROMPT);
  }

  async processUtterance(text: string, confidence: number, session: ConversationSession): Promise<Trigger> {
    const timing: TurnTiming = { startedAt: Date.now() };
    this.turnTiming = timing;
    logTurn(logger, "start", session.id, session.turnCount + 1);
    logger.info({ event: "TRANSCRIPTION", sessionId: session.id, text, confidence }, "User said");
    await this.setUi("processing");

    const nluStart = Date.now();
    const nlu = await this.provider("understanding", "process", () => this.deps.understanding.process(text));
    if (!nlu.ok) return { type: "turn_failed", reason: nlu.error.message };
    timing.nluLatencyMs = Date.now() - nluStart;

    const { context } = this.deps;
    const recorded = await this.withContext("appendTurn", async () => {
      await context.appendTurn({ speaker: "user", text, intent: nlu.value.intent, entities: nlu.value.entities });
      await context.update({ currentIntent: nlu.value.intent, entities: nlu.value.entities });
    });
    if (!recorded.ok) return { type: "turn_failed", reason: recorded.error.message };

    const snapshot = await context.read();
    const dialogueStart = Date.now();
    const response = await this.provider("dialogue", "processTurn", () =>
      this.deps.dialogue.processTurn(nlu.value, snapshot)
    );
    if (!response.ok) return { type: "turn_failed", reason: response.error.message };
    timing.dialogueLatencyMs = Date.now() - dialogueStart;

    return { type: "response_ready", input: text, nlu: nlu.value, response: response.value };
  }

  async deliverResponse(trigger: ResponseReadyTrigger, session: ConversationSession): Promise<Trigger> {
    const { response, nlu, input } = trigger;
    const commandStart = Date.now();
    await this.executeCommands(response.commands, session);
    const commandLatencyMs = Date.now() - commandStart;

    await this.setUi("speaking");
    const ttsStart = Date.now();
    await this.say(response.speechResponse);
    const ttsLatencyMs = Date.now() - ttsStart;
    if (response.uiUpdate) {
      const ui = response.uiUpdate;
      await this.provider("vehicle_link", "updateUi", () => this.deps.vehicle.updateUi(ui));
    }
    await this.withContext("appendTurn", () =>
      this.deps.context.appendTurn({ speaker: "assistant", text: response.speechResponse, intent: nlu.intent })
    );
    this.deps.telemetry.logInteraction(input, nlu, response);

    const timing = this.turnTiming;
    this.turnTiming = null;
    this.deps.telemetry.recordTurnMetrics({
      nluLatencyMs: timing?.nluLatencyMs,
      dialogueLatencyMs: timing?.dialogueLatencyMs,
      commandLatencyMs,
      ttsLatencyMs,
      endOfUserSpeechToResponseMs: timing ? Date.now() - timing.startedAt : undefined,
      sessionId: session.id,
      turn: session.turnCount,
      intent: nlu.intent,
      commandCount: response.commands.length,
    });
    logTurn(logger, "end", session.id, session.turnCount);
    return { type: "response_delivered", endConversation: response.endConversation };
  }

  async apologize(reason: string, session: ConversationSession): Promise<void> {
    this.turnTiming = null;
    logger.warn({ event: "TURN_FAILED", sessionId: session.id, reason }, "Turn failed; apologizing");
    this.deps.telemetry.logEvent("turn_failed", { sessionId: session.id, reason });
    await this.say(APOLOGY_PROMPT);
  }

  async resumeListening(_session: ConversationSession): Promise<void> {
    await this.setUi("listening");
  }

  async endConversation(session: ConversationSession, reason: EndReason): Promise<void> {
    // A wake phrase heard during the conversation must not reopen it.
    const stale = this.discardWakeWord();
    await this.setUi("idle");
    await stale;
    const startedAt =
      session.origin === "wake_word"
        ? this.deps.telemetry.getLastEventTime("conversation_start") ?? session.startedAt
        : session.startedAt;
    const durationMs = Date.now() - startedAt;
    logger.info(
      { event: "SESSION_END", sessionId: session.id, reason, durationMs, turns: session.turnCount },
      "Conversation ended"
    );
    this.deps.telemetry.logEvent("conversation_end", {
      sessionId: session.id,
      reason,
      durationMs,
      turns: session.turnCount,
    });
  }

  async deliverProactive(trigger: ProactiveTrigger, session: ConversationSession): Promise<Trigger> {
    const { notification, eventType } = trigger;
    await this.setUi("speaking");
    await this.say(notification.speech, true);
    await this.executeCommands(notification.commands, session);
    await this.withContext("appendTurn", () =>
      this.deps.context.appendTurn({ speaker: "system", text: notification.speech, intent: `proactive:${eventType}` })
    );
    this.deps.telemetry.logEvent("proactive_notification", {
      sessionId: session.id,
      eventType,
      commands: notification.commands.map((c) => c.type),
    });
    return { type: "proactive_delivered" };
  }

  interruptSpeech(): void {
    try {
      this.deps.speechOutput.cancel();
    } catch (err) {
      logger.warn({ event: "SPEECH_CANCEL_FAILED", err: errorMessage(err) }, "Speech cancel failed");
    }
  }

  // ---- helpers ----

  private async discardWakeWord(): Promise<void> {
    const wake = await this.provider("speech_input", "isWakeWordDetected", () => this.deps.speechInput.isWakeWordDetected());
    if (wake.ok && wake.value) logger.info({ event: "WAKE_WORD_DISCARDED" }, "Wake word heard mid-conversation discarded");
  }

  private async setUi(state: UiState): Promise<void> {
    await this.provider("vehicle_link", "setUiState", () => this.deps.vehicle.setUiState(state));
  }

  private async say(text: string, interrupt = false): Promise<boolean> {
    const spoken = await this.provider("speech_output", "speak", () => this.deps.speechOutput.speak(text, interrupt));
    return spoken.ok;
  }

  /** Enqueue in order and wait; refresh vehicle state when anything succeeded. */
  private async executeCommands(commands: PendingCommand[], session: ConversationSession): Promise<CommandResult[]> {
    if (commands.length === 0) return [];
    const results = await this.commands.enqueueAll(commands);
    const failed = results.filter((r) => !r.success).map((r) => r.command.type);
    logger.info(
      { event: "COMMANDS_EXECUTED", sessionId: session.id, total: results.length, failed },
      failed.length === 0 ? "Commands executed" : "Some commands failed"
    );
    if (results.some((r) => r.success)) {
      try {
        await this.refreshVehicleState();
      } catch (err) {
        logger.warn({ event: "VEHICLE_STATE_REFRESH_FAILED", err: errorMessage(err) }, "Could not refresh vehicle state");
      }
    }
    return results;
  }

  /** Command queue consumer: validate, dispatch, bounded by the provider timeout. */
  private async runCommand(command: PendingCommand): Promise<boolean> {
    const outcome = await this.provider("vehicle_link", command.type, () => executeCommand(this.deps.vehicle, command));
    return outcome.ok && outcome.value;
  }
}
