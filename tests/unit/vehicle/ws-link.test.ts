import { WebSocketServer, type WebSocket } from "ws";
import type { AddressInfo } from "net";
import { WsVehicleLink } from "../../../src/vehicle/ws-link";

interface GatewayRequest {
  type: "request";
  request_id: string;
  method: string;
  params: Record<string, unknown>;
}

/** In-process vehicle gateway: answers requests through `reply` and records them. */
class FakeGateway {
  readonly server: WebSocketServer;
  readonly requests: GatewayRequest[] = [];
  readonly tokens: string[] = [];
  socket: WebSocket | null = null;
  reply: (req: GatewayRequest) => Record<string, unknown> | null = (req) => ({ ok: true, result: req.method === "get_state" ? {} : true });

  constructor() {
    this.server = new WebSocketServer({ port: 0 });
    this.server.on("connection", (socket, req) => {
      this.socket = socket;
      this.tokens.push(new URL(req.url ?? "/", "ws://localhost").searchParams.get("token") ?? "");
      socket.on("message", (data) => {
        const req: GatewayRequest = JSON.parse(data.toString());
        this.requests.push(req);
        const answer = this.reply(req);
        if (answer) socket.send(JSON.stringify({ type: "response", request_id: req.request_id, ...answer }));
      });
    });
  }

  address(): string {
    const info: AddressInfo | string | null = this.server.address();
    const port = typeof info === "object" && info !== null ? info.port : 0;
    return `ws://127.0.0.1:${port}/vehicle`;
  }

  emit(eventType: string, payload: Record<string, unknown>): void {
    this.socket?.send(JSON.stringify({ type: "event", event_type: eventType, payload }));
  }

  close(): Promise<void> {
    for (const client of this.server.clients) client.terminate();
    return new Promise((resolve) => this.server.close(() => resolve()));
  }
}

function listening(server: WebSocketServer): Promise<void> {
  return new Promise((resolve) => server.once("listening", () => resolve()));
}

describe("WsVehicleLink", () => {
  let gateway: FakeGateway;
  let link: WsVehicleLink;

  beforeEach(async () => {
    gateway = new FakeGateway();
    await listening(gateway.server);
    link = new WsVehicleLink({ wsAddress: gateway.address(), token: "test-secret", requestTimeoutMs: 200 });
  });

  afterEach(async () => {
    await link.stop();
    await gateway.close();
  });

  it("authenticates with the token in the URL", async () => {
    await link.start();
    expect(gateway.tokens).toEqual(["test-secret"]);
    expect(await link.healthCheck()).toBe(true);
  });

  it("refuses to connect without a token", async () => {
    const anonymous = new WsVehicleLink({ wsAddress: gateway.address(), token: " ", requestTimeoutMs: 200 });
    await expect(anonymous.start()).rejects.toThrow("token is missing");
  });

  it("correlates responses with requests", async () => {
    gateway.reply = (req) =>
      req.method === "get_state" ? { ok: true, result: { vehicle: { fuel_level: 42 } } } : { ok: true, result: true };
    await link.start();
    const [state, climate] = await Promise.all([link.getCurrentState(), link.setClimate({ temperature: 21 })]);
    expect(state).toEqual({ vehicle: { fuel_level: 42 } });
    expect(climate).toBe(true);
    expect(gateway.requests.map((r) => [r.method, r.params])).toEqual([
      ["get_state", {}],
      ["set_climate", { temperature: 21 }],
    ]);
  });

  it("reports a command the gateway declined as failed", async () => {
    gateway.reply = () => ({ ok: true, result: false });
    await link.start();
    expect(await link.controlMedia({ action: "play" })).toBe(false);
  });

  it("rejects when the gateway answers with an error", async () => {
    gateway.reply = () => ({ ok: false, error: "ui unavailable" });
    await link.start();
    await expect(link.setUiState("listening")).rejects.toThrow("ui unavailable");
  });

  it("times out requests that get no answer", async () => {
    gateway.reply = () => null;
    await link.start();
    await expect(link.updateSettings({ display_mode: "night" })).rejects.toThrow(
      "vehicle gateway update_settings timed out after 200ms"
    );
  });

  it("delivers vehicle events to subscribers", async () => {
    await link.start();
    const received = new Promise<[string, Record<string, unknown>]>((resolve) => {
      link.subscribeToEvents((type, payload) => resolve([type, payload]));
    });
    gateway.emit("low_fuel", { fuel_level: 9 });
    expect(await received).toEqual(["low_fuel", { fuel_level: 9 }]);
  });

  it("fails pending requests and turns unhealthy when the gateway goes away", async () => {
    gateway.reply = () => null;
    await link.start();
    const pending = link.getCurrentState();
    await new Promise((r) => setTimeout(r, 20));
    gateway.socket?.terminate();
    await expect(pending).rejects.toThrow();
    expect(await link.healthCheck()).toBe(false);
    await expect(link.setNavigationDestination({ destination: "home" })).rejects.toThrow("vehicle gateway not connected");
  });
});
