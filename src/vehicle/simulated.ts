/**
 * In-process vehicle: holds cabin state in memory, applies commands to it and lets callers emit
 * vehicle events. Used when no vehicle gateway is configured, and by tests.
 */

import type {
  ClimateParams,
  MediaParams,
  NavigationParams,
  UiState,
  VehicleEventHandler,
  VehicleLink,
  VehicleState,
} from "../pipeline/types";
import { deepMerge } from "../memory/context-store";
import { errorMessage, logger } from "../logging";

export type VehicleSection = Record<string, unknown>;

export function defaultVehicleState(): Record<string, VehicleSection> {
  return {
    climate_control: { temperature: 22, fan_speed: 2, mode: "auto", recirculation: false },
    media: { source: "radio", volume: 50, muted: false, current_track: null, playing: false },
    navigation: { destination: null, route: null, eta: null, distance: null },
    phone: { connected: false, active_call: null },
    vehicle: { speed: 0, fuel_level: 100, battery_level: 100, doors_locked: true, lights: "auto" },
    settings: {},
  };
}

export type SimulatedOperation = "getCurrentState" | "command" | "ui" | "healthCheck";

export class SimulatedVehicle implements VehicleLink {
  private state = defaultVehicleState();
  private readonly handlers = new Set<VehicleEventHandler>();
  private readonly failing = new Set<SimulatedOperation>();
  private running = false;
  /** UI states in the order they were set. */
  readonly uiStates: UiState[] = [];
  readonly uiUpdates: Record<string, unknown>[] = [];

  constructor(initial: Record<string, VehicleSection> = {}) {
    this.state = this.merged(initial);
  }

  async start(): Promise<void> {
    this.running = true;
    logger.info({ event: "VEHICLE_CONNECTED", kind: "simulated" }, "Simulated vehicle ready");
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  async restart(): Promise<void> {
    await this.stop();
    await this.start();
  }

  async healthCheck(): Promise<boolean> {
    return this.running && !this.failing.has("healthCheck");
  }

  async getCurrentState(): Promise<VehicleState> {
    this.check("getCurrentState");
    return structuredClone(this.state);
  }

  async setUiState(state: UiState): Promise<void> {
    this.check("ui");
    this.uiStates.push(state);
  }

  async updateUi(update: Record<string, unknown>): Promise<void> {
    this.check("ui");
    this.uiUpdates.push({ ...update });
  }

  subscribeToEvents(handler: VehicleEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async setClimate(params: ClimateParams): Promise<boolean> {
    if (!this.accepts()) return false;
    const { zone, ...rest } = params;
    const patch: VehicleSection = {};
    for (const [key, value] of Object.entries(rest)) if (value !== undefined) patch[key] = value;
    if (zone && zone !== "all") {
      this.apply({ climate_control: { zones: { [zone]: patch } } });
    } else {
      this.apply({ climate_control: patch });
    }
    return true;
  }

  async setNavigationDestination(params: NavigationParams): Promise<boolean> {
    if (!this.accepts()) return false;
    this.apply({ navigation: { destination: params.destination, route: params.route_preferences ?? null } });
    return true;
  }

  async controlMedia(params: MediaParams): Promise<boolean> {
    if (!this.accepts()) return false;
    const patch: VehicleSection = {};
    switch (params.action) {
      case "play":
        patch.playing = true;
        if (params.source) patch.source = params.source;
        if (params.content) patch.current_track = params.content;
        break;
      case "pause":
      case "stop":
        patch.playing = false;
        break;
      case "mute":
        patch.muted = true;
        break;
      case "unmute":
        patch.muted = false;
        break;
      case "volume":
        if (params.volume === undefined) return false;
        patch.volume = params.volume;
        break;
      case "next":
      case "previous":
        patch.last_skip = params.action;
        break;
      default:
        return false;
    }
    this.apply({ media: patch });
    return true;
  }

  async updateSettings(settings: Record<string, unknown>): Promise<boolean> {
    if (!this.accepts()) return false;
    this.apply({ settings });
    return true;
  }

  /** Deliver a vehicle event to every subscriber; subscriber errors are logged. */
  emitEvent(eventType: string, payload: Record<string, unknown> = {}): void {
    for (const handler of [...this.handlers]) {
      try {
        handler(eventType, payload);
      } catch (err) {
        logger.warn({ event: "VEHICLE_EVENT_HANDLER_FAILED", type: eventType, err: errorMessage(err) }, "Event handler threw");
      }
    }
  }

  /** Change sensor readings directly (e.g. speed, fuel level). */
  setSensors(patch: Record<string, VehicleSection>): void {
    this.apply(patch);
  }

  /** Make an operation fail until cleared. */
  failOn(operation: SimulatedOperation, failing = true): void {
    if (failing) this.failing.add(operation);
    else this.failing.delete(operation);
  }

  subscriberCount(): number {
    return this.handlers.size;
  }

  private accepts(): boolean {
    return this.running && !this.failing.has("command");
  }

  private check(operation: SimulatedOperation): void {
    if (!this.running) throw new Error("vehicle link is not running");
    if (this.failing.has(operation)) throw new Error(`simulated ${operation} failure`);
  }

  private apply(patch: Record<string, VehicleSection>): void {
    this.state = this.merged(patch);
  }

  private merged(patch: Record<string, VehicleSection>): Record<string, VehicleSection> {
    const next: Record<string, VehicleSection> = {};
    for (const key of new Set([...Object.keys(this.state), ...Object.keys(patch)])) {
      next[key] = deepMerge(this.state[key] ?? {}, patch[key] ?? {});
    }
    return next;
  }
}
