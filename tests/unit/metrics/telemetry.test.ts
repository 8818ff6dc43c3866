import { Telemetry } from "../../../src/metrics";

describe("Telemetry", () => {
  it("tracks the last time each event was logged and counts events", () => {
    let t = 100;
    const telemetry = new Telemetry(() => t);
    telemetry.logEvent("conversation_start", { sessionId: "s1" });
    t = 250;
    telemetry.logEvent("conversation_start", { sessionId: "s2" });
    telemetry.logEvent("system_start", {});
    expect(telemetry.getLastEventTime("conversation_start")).toBe(250);
    expect(telemetry.getLastEventTime("never")).toBeUndefined();
    expect(telemetry.getCounters()).toEqual({
      events: 3,
      interactions: 0,
      byEvent: { conversation_start: 2, system_start: 1 },
    });
  });

  it("counts interactions and keeps the latest turn metrics", () => {
    const telemetry = new Telemetry();
    telemetry.logInteraction(
      "set temperature to 21",
      { text: "set temperature to 21", intent: "climate_control", entities: { temperature: 21 }, confidence: 0.9 },
      { speechResponse: "Setting the temperature to 21 degrees.", commands: [], endConversation: false }
    );
    telemetry.recordTurnMetrics({ nluLatencyMs: 3, intent: "climate_control" });
    telemetry.recordTurnMetrics({ ttsLatencyMs: 40 });
    expect(telemetry.getCounters().interactions).toBe(1);
    expect(telemetry.getLastTurnMetrics()).toEqual({ nluLatencyMs: 3, intent: "climate_control", ttsLatencyMs: 40 });
  });

  it("returns counters that callers cannot mutate", () => {
    const telemetry = new Telemetry();
    telemetry.logEvent("a", {});
    telemetry.getCounters().byEvent.a = 99;
    expect(telemetry.getCounters().byEvent.a).toBe(1);
  });
});
