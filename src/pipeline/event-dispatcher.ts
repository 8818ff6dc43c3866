/**
 * EventDispatcher: vehicle events -> context store, and (when a proactive rule fires) -> state machine.
 * Notifications raised during an active conversation wait in FIFO order for the next turn boundary.
 *
 * A notification starts only when the machine is settled in Idle: a machine that reads Idle while its
 * queue still holds a wake word is about to start a conversation. Deferred ones are released the same
 * way, once the machine has settled after a boundary transition.
 */

import type { ContextStore } from "../memory/context-store";
import type { ComponentName, Dialogue, ProactiveNotification } from "./types";
import type { ConversationState, ConversationStateMachine, TransitionEvent } from "./state-machine";
import { callProvider, fail, ok, type OrchestratorError, type Outcome } from "./errors";
import { errorMessage, logger } from "../logging";

export interface EventDispatcherConfig {
  providerTimeoutMs: number;
}

export type DispatchResult = "recorded" | "proactive_started" | "proactive_deferred";

interface DeferredNotification {
  eventType: string;
  notification: ProactiveNotification;
  queuedAt: number;
}

/** Reported when a collaborator fails (error or timeout) while an event is handled. */
export type ComponentFailureHandler = (component: ComponentName, error: OrchestratorError) => void;

export class EventDispatcher {
  private readonly deferred: DeferredNotification[] = [];
  private readonly unsubscribe: Array<() => void>;
  /** The last committed transition was a turn boundary. */
  private atBoundary = false;

  constructor(
    private readonly store: ContextStore,
    private readonly dialogue: Dialogue,
    private readonly machine: ConversationStateMachine,
    private readonly config: EventDispatcherConfig,
    private readonly onComponentFailure?: ComponentFailureHandler
  ) {
    this.unsubscribe = [
      machine.onTransition((e) => this.onTransition(e)),
      machine.onSettled((state) => this.onSettled(state)),
    ];
  }

  /**
   * Record the event, then ask dialogue whether it warrants a notification.
   * Resolves with what happened; never throws into the vehicle link.
   */
  async onVehicleEvent(eventType: string, payload: Record<string, unknown>): Promise<Outcome<DispatchResult>> {
    logger.info({ event: "VEHICLE_EVENT", type: eventType }, "Vehicle event received");
    const recorded = await callProvider("context_fusion", "update", this.config.providerTimeoutMs, () =>
      this.store.update({ vehicleState: { events: { [eventType]: { ...payload, receivedAt: Date.now() } } } })
    );
    if (!recorded.ok) {
      logger.warn({ event: "VEHICLE_EVENT_NOT_RECORDED", type: eventType, err: recorded.error.message }, "Event not recorded");
      return this.failed("context_fusion", recorded.error);
    }

    const context = await this.store.read();
    const check = await callProvider("dialogue", "checkProactiveTrigger", this.config.providerTimeoutMs, () =>
      this.dialogue.checkProactiveTrigger(eventType, payload, context)
    );
    if (!check.ok) {
      logger.warn({ event: "PROACTIVE_CHECK_FAILED", type: eventType, err: check.error.message }, "Proactive trigger check failed");
      return this.failed("dialogue", check.error);
    }
    if (!check.value) return ok("recorded");

    const notification = check.value;
    if (this.machine.isSettled() && this.machine.getState() === "idle" && this.deferred.length === 0) {
      logger.info({ event: "PROACTIVE_TRIGGERED", type: eventType }, "Proactive notification starting");
      void this.machine.send({ type: "proactive", eventType, notification });
      return ok("proactive_started");
    }
    this.deferred.push({ eventType, notification, queuedAt: Date.now() });
    logger.info(
      { event: "PROACTIVE_DEFERRED", type: eventType, state: this.machine.getState(), pending: this.deferred.length },
      "Conversation active; notification deferred"
    );
    return ok("proactive_deferred");
  }

  pendingCount(): number {
    return this.deferred.length;
  }

  /** Drop deferred notifications and detach from the state machine. */
  close(): void {
    for (const off of this.unsubscribe) off();
    if (this.deferred.length > 0) {
      logger.info({ event: "PROACTIVE_DROPPED", count: this.deferred.length }, "Dropping deferred notifications");
    }
    this.deferred.splice(0);
  }

  /** Validation errors stay local; transient ones are handed to the failure handler. */
  private failed<T>(component: ComponentName, error: OrchestratorError): Outcome<T> {
    if (error.kind === "transient") {
      try {
        this.onComponentFailure?.(component, error);
      } catch (err) {
        logger.warn({ event: "FAILURE_HANDLER_FAILED", err: errorMessage(err) }, "Component failure handler threw");
      }
    }
    return fail(error);
  }

  private onTransition(e: TransitionEvent): void {
    this.atBoundary = e.to === "idle" || (e.from === "speaking" && e.to === "listening");
  }

  /** Release one deferred notification per turn boundary the machine came to rest at. */
  private onSettled(state: ConversationState): void {
    if (!this.atBoundary) return;
    const next = this.deferred.shift();
    if (!next) return;
    this.atBoundary = false;
    logger.info(
      { event: "PROACTIVE_RELEASED", type: next.eventType, state, waitedMs: Date.now() - next.queuedAt },
      "Releasing deferred notification"
    );
    void this.machine.send({ type: "proactive", eventType: next.eventType, notification: next.notification });
  }
}
