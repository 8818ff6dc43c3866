/**
 * ConversationStateMachine: Idle / Listening / Processing / Speaking.
 *
 * Triggers enter one FIFO queue and are evaluated strictly one at a time. Side effects run inside the
 * transition; an effect may hand back a follow-up trigger (e.g. processing -> response_ready), which is
 * evaluated before anything else in the queue so a turn completes before a trigger that arrived meanwhile.
 * Speech and vehicle callbacks never touch the state directly; they only call send().
 */

import * as crypto from "crypto";
import type { DialogueResponse, NluResult, ProactiveNotification } from "./types";
import type { WakeWordPolicy } from "../config";
import { errorMessage, logger } from "../logging";

export type ConversationState = "idle" | "listening" | "processing" | "speaking";

export type ResponseReadyTrigger = {
  type: "response_ready";
  input: string;
  nlu: NluResult;
  response: DialogueResponse;
};

export type ProactiveTrigger = {
  type: "proactive";
  eventType: string;
  notification: ProactiveNotification;
};

export type Trigger =
  | { type: "wake_word" }
  | { type: "transcription"; text: string; confidence: number }
  | ResponseReadyTrigger
  | { type: "turn_failed"; reason: string }
  | { type: "response_delivered"; endConversation: boolean }
  | { type: "listen_timeout" }
  | ProactiveTrigger
  | { type: "proactive_delivered" };

export type SessionOrigin = "wake_word" | "proactive";

/** Transient; exists only while a conversation is active. */
export interface ConversationSession {
  id: string;
  origin: SessionOrigin;
  startedAt: number;
  turnCount: number;
  active: boolean;
}

export type EndReason = "completed" | "listen_timeout" | "proactive_complete";

/** Side effects the orchestrator performs for each transition. */
export interface StateEffects {
  acknowledgeWake(session: ConversationSession): Promise<void>;
  clarify(session: ConversationSession): Promise<void>;
  /** Understand and answer an utterance; resolves with response_ready or turn_failed. */
  processUtterance(text: string, confidence: number, session: ConversationSession): Promise<Trigger>;
  /** Execute attached commands, then speak; resolves with response_delivered. */
  deliverResponse(trigger: ResponseReadyTrigger, session: ConversationSession): Promise<Trigger>;
  apologize(reason: string, session: ConversationSession): Promise<void>;
  resumeListening(session: ConversationSession): Promise<void>;
  endConversation(session: ConversationSession, reason: EndReason): Promise<void>;
  /** Speak a notification, then run its commands; resolves with proactive_delivered. */
  deliverProactive(trigger: ProactiveTrigger, session: ConversationSession): Promise<Trigger>;
  /** Cut off speech immediately (barge-in). */
  interruptSpeech(): void;
}

type EffectName =
  | "acknowledgeWake"
  | "clarify"
  | "processUtterance"
  | "deliverResponse"
  | "apologize"
  | "resumeListening"
  | "endConversation"
  | "deliverProactive";

export interface TransitionPlan {
  to: ConversationState;
  effect: EffectName;
}

/** Transition table. null = the trigger is a no-op in this state. */
export function planTransition(state: ConversationState, trigger: Trigger, minConfidence: number): TransitionPlan | null {
  switch (trigger.type) {
    case "proactive":
      return { to: "speaking", effect: "deliverProactive" };
    case "wake_word":
      return state === "idle" ? { to: "listening", effect: "acknowledgeWake" } : null;
    case "transcription":
      if (state !== "listening") return null;
      return trigger.confidence >= minConfidence
        ? { to: "processing", effect: "processUtterance" }
        : { to: "listening", effect: "clarify" };
    case "listen_timeout":
      return state === "listening" ? { to: "idle", effect: "endConversation" } : null;
    case "response_ready":
      return state === "processing" ? { to: "speaking", effect: "deliverResponse" } : null;
    case "turn_failed":
      return state === "processing" ? { to: "listening", effect: "apologize" } : null;
    case "response_delivered":
      if (state !== "speaking") return null;
      return trigger.endConversation
        ? { to: "idle", effect: "endConversation" }
        : { to: "listening", effect: "resumeListening" };
    case "proactive_delivered":
      return state === "speaking" ? { to: "idle", effect: "endConversation" } : null;
  }
}

export interface TransitionEvent {
  from: ConversationState;
  to: ConversationState;
  trigger: Trigger["type"];
  at: number;
}

export type TransitionListener = (event: TransitionEvent) => void;

/** Called when the queue has drained; `state` is where the machine came to rest. */
export type SettledListener = (state: ConversationState) => void;

export interface StateMachineConfig {
  minConfidence: number;
  wakeWordPolicy?: WakeWordPolicy;
  now?: () => number;
}

interface QueueEntry {
  trigger: Trigger;
  done: () => void;
}

export class ConversationStateMachine {
  private state: ConversationState = "idle";
  private enteredAt: number;
  private session: ConversationSession | null = null;
  private readonly queue: QueueEntry[] = [];
  private draining = false;
  private halted = false;
  private readonly listeners: TransitionListener[] = [];
  private readonly settledListeners: SettledListener[] = [];
  private readonly minConfidence: number;
  private readonly wakeWordPolicy: WakeWordPolicy;
  private readonly now: () => number;

  constructor(
    private readonly effects: StateEffects,
    config: StateMachineConfig
  ) {
    this.minConfidence = config.minConfidence;
    this.wakeWordPolicy = config.wakeWordPolicy ?? "ignore";
    this.now = config.now ?? Date.now;
    this.enteredAt = this.now();
  }

  getState(): ConversationState {
    return this.state;
  }

  /** Epoch ms when the current state was (re-)entered. */
  stateSince(): number {
    return this.enteredAt;
  }

  getSession(): ConversationSession | null {
    return this.session ? { ...this.session } : null;
  }

  /** A conversation is active whenever the machine is not resting in Idle. */
  isConversationActive(): boolean {
    return this.state !== "idle";
  }

  /**
   * No trigger queued or being evaluated. A trigger sent now is evaluated against getState(),
   * not against a state some in-flight transition is about to leave.
   */
  isSettled(): boolean {
    return !this.halted && !this.draining && this.queue.length === 0;
  }

  onSettled(listener: SettledListener): () => void {
    this.settledListeners.push(listener);
    return () => {
      const i = this.settledListeners.indexOf(listener);
      if (i >= 0) this.settledListeners.splice(i, 1);
    };
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const i = this.listeners.indexOf(listener);
      if (i >= 0) this.listeners.splice(i, 1);
    };
  }

  /**
   * Queue a trigger. Resolves once it (and any follow-ups it produced) has been evaluated.
   * Never rejects.
   */
  send(trigger: Trigger): Promise<void> {
    if (this.halted) {
      logger.debug({ event: "STATE_TRIGGER_DROPPED", trigger: trigger.type, reason: "halted" }, "State machine halted");
      return Promise.resolve();
    }
    if (trigger.type === "wake_word" && this.wakeWordPolicy === "barge-in" && this.state === "speaking") {
      logger.info({ event: "BARGE_IN", state: this.state }, "Wake word while speaking; cutting off speech");
      this.effects.interruptSpeech();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ trigger, done: resolve });
      void this.drain();
    });
  }

  /** Stop evaluating triggers; queued ones are dropped. */
  halt(): void {
    this.halted = true;
    const dropped = this.queue.splice(0);
    for (const entry of dropped) entry.done();
    if (this.session) this.session.active = false;
    this.session = null;
  }

  isHalted(): boolean {
    return this.halted;
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      while (!this.halted && this.queue.length > 0) {
        const entry = this.queue.shift();
        if (!entry) break;
        let next: Trigger | null = entry.trigger;
        while (next && !this.halted) {
          next = await this.step(next);
        }
        entry.done();
      }
    } finally {
      this.draining = false;
    }
    if (this.isSettled()) this.notifySettled();
  }

  /** Evaluate one trigger against the current state; returns a follow-up trigger, if any. */
  private async step(trigger: Trigger): Promise<Trigger | null> {
    const from = this.state;
    const plan = planTransition(from, trigger, this.minConfidence);
    if (!plan) {
      logger.debug({ event: "STATE_TRIGGER_IGNORED", state: from, trigger: trigger.type }, "Trigger ignored in this state");
      return null;
    }

    const session = this.sessionFor(from, plan, trigger);
    this.state = plan.to;
    this.enteredAt = this.now();
    logger.info({ event: "STATE_TRANSITION", from, to: plan.to, trigger: trigger.type, sessionId: session.id }, "State transition");
    this.notify({ from, to: plan.to, trigger: trigger.type, at: this.enteredAt });

    try {
      return await this.runEffect(plan.effect, trigger, session);
    } catch (err) {
      logger.error(
        { event: "STATE_EFFECT_FAILED", effect: plan.effect, state: plan.to, err: errorMessage(err) },
        "Transition side effect failed"
      );
      return this.fallbackAfterFailure(plan.to, session);
    }
  }

  /** Resolve the session a transition acts on, opening or closing it as the plan requires. */
  private sessionFor(from: ConversationState, plan: TransitionPlan, trigger: Trigger): ConversationSession {
    if (trigger.type === "proactive") {
      if (this.session) {
        logger.info(
          { event: "SESSION_ABANDONED", sessionId: this.session.id, state: from },
          "Proactive notification interrupts the active conversation"
        );
        this.session.active = false;
      }
      this.session = this.openSession("proactive");
    } else if (!this.session) {
      this.session = this.openSession("wake_word");
    }
    const session = this.session;
    if (trigger.type === "response_ready") session.turnCount++;
    if (plan.to === "idle") {
      session.active = false;
      this.session = null;
    }
    return session;
  }

  private openSession(origin: SessionOrigin): ConversationSession {
    return { id: crypto.randomUUID(), origin, startedAt: this.now(), turnCount: 0, active: true };
  }

  private runEffect(effect: EffectName, trigger: Trigger, session: ConversationSession): Promise<Trigger | null> {
    const e = this.effects;
    switch (effect) {
      case "acknowledgeWake":
        return e.acknowledgeWake(session).then(() => null);
      case "clarify":
        return e.clarify(session).then(() => null);
      case "processUtterance":
        return trigger.type === "transcription"
          ? e.processUtterance(trigger.text, trigger.confidence, session)
          : Promise.resolve(null);
      case "deliverResponse":
        return trigger.type === "response_ready" ? e.deliverResponse(trigger, session) : Promise.resolve(null);
      case "apologize":
        return e.apologize(trigger.type === "turn_failed" ? trigger.reason : "unknown", session).then(() => null);
      case "resumeListening":
        return e.resumeListening(session).then(() => null);
      case "endConversation": {
        const reason: EndReason =
          trigger.type === "listen_timeout"
            ? "listen_timeout"
            : trigger.type === "proactive_delivered"
              ? "proactive_complete"
              : "completed";
        return e.endConversation(session, reason).then(() => null);
      }
      case "deliverProactive":
        return trigger.type === "proactive" ? e.deliverProactive(trigger, session) : Promise.resolve(null);
    }
  }

  /** Keep the machine from stalling in a transient state when an effect throws. */
  private fallbackAfterFailure(state: ConversationState, session: ConversationSession): Trigger | null {
    if (state === "processing") return { type: "turn_failed", reason: "internal error" };
    if (state === "speaking") {
      return session.origin === "proactive" && session.turnCount === 0
        ? { type: "proactive_delivered" }
        : { type: "response_delivered", endConversation: false };
    }
    return null;
  }

  private notifySettled(): void {
    for (const listener of [...this.settledListeners]) {
      try {
        listener(this.state);
      } catch (err) {
        logger.warn({ event: "SETTLED_LISTENER_FAILED", err: errorMessage(err) }, "Settled listener threw");
      }
    }
  }

  private notify(event: TransitionEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        logger.warn({ event: "TRANSITION_LISTENER_FAILED", err: errorMessage(err) }, "Transition listener threw");
      }
    }
  }
}
