/**
 * Vehicle gateway client over WebSocket.
 * Connect with ?token=<token>. Requests carry a request_id and are answered by a response with the same id;
 * vehicle events arrive unsolicited as { type: "event", event_type, payload }.
 */

import WebSocket from "ws";
import { randomUUID } from "crypto";
import { z } from "zod";
import type {
  ClimateParams,
  MediaParams,
  NavigationParams,
  UiState,
  VehicleEventHandler,
  VehicleLink,
  VehicleState,
} from "../pipeline/types";
import { errorMessage, logger } from "../logging";

export interface WsVehicleLinkConfig {
  wsAddress: string;
  token: string;
  requestTimeoutMs: number;
}

export type VehicleMethod =
  | "get_state"
  | "set_ui_state"
  | "update_ui"
  | "set_climate"
  | "set_navigation"
  | "control_media"
  | "update_settings";

const responseSchema = z.object({
  type: z.literal("response"),
  request_id: z.string(),
  ok: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

const eventSchema = z.object({
  type: z.literal("event"),
  event_type: z.string().min(1),
  payload: z.record(z.string(), z.unknown()).default({}),
});

const incomingSchema = z.discriminatedUnion("type", [responseSchema, eventSchema]);

const stateSchema = z.record(z.string(), z.unknown());

interface PendingRequest {
  method: VehicleMethod;
  resolve: (result: unknown) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

export class WsVehicleLink implements VehicleLink {
  private ws: WebSocket | null = null;
  private readonly pending = new Map<string, PendingRequest>();
  private readonly handlers = new Set<VehicleEventHandler>();

  constructor(private readonly config: WsVehicleLinkConfig) {}

  start(): Promise<void> {
    const token = this.config.token.trim();
    if (!token) {
      return Promise.reject(new Error("Vehicle gateway auth: token is missing. Set VEHICLE_TOKEN."));
    }
    const url = `${this.config.wsAddress}?token=${encodeURIComponent(token)}`;
    logger.debug({ event: "VEHICLE_WS_CONNECT", url: `${this.config.wsAddress}?token=[REDACTED]` }, "Vehicle gateway connecting");
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url);
      this.ws = ws;
      ws.on("open", () => {
        ws.on("close", (code, reason) => {
          logger.warn({ event: "VEHICLE_WS_CLOSED", code, reason: reason.toString() }, "Vehicle gateway closed");
          this.dropSocket(ws, new Error("vehicle gateway disconnected"));
        });
        ws.on("error", (err) => {
          logger.warn({ event: "VEHICLE_WS_ERROR", err: err.message }, "Vehicle gateway error");
          this.dropSocket(ws, err);
        });
        logger.info({ event: "VEHICLE_CONNECTED", kind: "ws" }, "Vehicle gateway connected");
        resolve();
      });
      ws.on("error", (err) => {
        if (this.ws === ws) this.ws = null;
        reject(err);
      });
      ws.on("message", (data) => this.onMessage(data.toString()));
    });
  }

  async stop(): Promise<void> {
    const ws = this.ws;
    if (!ws) return;
    this.dropSocket(ws, new Error("vehicle link stopped"));
    ws.removeAllListeners();
    ws.on("error", () => undefined);
    ws.close();
  }

  async restart(): Promise<void> {
    await this.stop();
    await this.start();
  }

  async healthCheck(): Promise<boolean> {
    return this.isConnected();
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  async getCurrentState(): Promise<VehicleState> {
    const parsed = stateSchema.safeParse(await this.request("get_state", {}));
    if (!parsed.success) throw new Error("vehicle gateway returned a malformed state");
    return parsed.data;
  }

  async setUiState(state: UiState): Promise<void> {
    await this.request("set_ui_state", { state });
  }

  async updateUi(update: Record<string, unknown>): Promise<void> {
    await this.request("update_ui", update);
  }

  subscribeToEvents(handler: VehicleEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  setClimate(params: ClimateParams): Promise<boolean> {
    return this.command("set_climate", { ...params });
  }

  setNavigationDestination(params: NavigationParams): Promise<boolean> {
    return this.command("set_navigation", { ...params });
  }

  controlMedia(params: MediaParams): Promise<boolean> {
    return this.command("control_media", { ...params });
  }

  updateSettings(settings: Record<string, unknown>): Promise<boolean> {
    return this.command("update_settings", settings);
  }

  /** Commands report the gateway's verdict; transport failures propagate. */
  private async command(method: VehicleMethod, params: Record<string, unknown>): Promise<boolean> {
    const result = await this.request(method, params);
    return result !== false;
  }

  private request(method: VehicleMethod, params: Record<string, unknown>): Promise<unknown> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("vehicle gateway not connected"));
    }
    const requestId = randomUUID();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error(`vehicle gateway ${method} timed out after ${this.config.requestTimeoutMs}ms`));
      }, this.config.requestTimeoutMs);
      this.pending.set(requestId, { method, resolve, reject, timer });
      const payload = JSON.stringify({ type: "request", request_id: requestId, method, params });
      logger.debug({ event: "VEHICLE_WS_SEND", method, requestId }, "Vehicle gateway request");
      ws.send(payload, (err) => {
        if (err) this.settle(requestId, err);
      });
    });
  }

  private onMessage(raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.warn({ event: "VEHICLE_WS_BAD_MESSAGE", err: errorMessage(err) }, "Unparseable gateway message");
      return;
    }
    const parsed = incomingSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ event: "VEHICLE_WS_BAD_MESSAGE", err: parsed.error.message }, "Unexpected gateway message");
      return;
    }
    const msg = parsed.data;
    if (msg.type === "response") {
      if (msg.ok) this.settle(msg.request_id, undefined, msg.result);
      else this.settle(msg.request_id, new Error(msg.error ?? "vehicle gateway request failed"));
      return;
    }
    logger.debug({ event: "VEHICLE_WS_EVENT", type: msg.event_type }, "Vehicle event");
    for (const handler of [...this.handlers]) {
      try {
        handler(msg.event_type, msg.payload);
      } catch (err) {
        logger.warn({ event: "VEHICLE_EVENT_HANDLER_FAILED", type: msg.event_type, err: errorMessage(err) }, "Event handler threw");
      }
    }
  }

  private settle(requestId: string, err?: Error, result?: unknown): void {
    const entry = this.pending.get(requestId);
    if (!entry) {
      logger.debug({ event: "VEHICLE_WS_STALE_RESPONSE", requestId }, "Response for unknown request");
      return;
    }
    clearTimeout(entry.timer);
    this.pending.delete(requestId);
    if (err) entry.reject(err);
    else entry.resolve(result);
  }

  private dropSocket(ws: WebSocket, reason: Error): void {
    if (this.ws !== ws) return;
    this.ws = null;
    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.reject(reason);
      this.pending.delete(id);
    }
  }
}
