import { HealthMonitor } from "../../../src/pipeline/health-monitor";

function stub(result: boolean | Error | "hang") {
  return {
    healthCheck: (): Promise<boolean> => {
      if (result === "hang") return new Promise<boolean>(() => undefined);
      if (result instanceof Error) return Promise.reject(result);
      return Promise.resolve(result);
    },
  };
}

describe("HealthMonitor", () => {
  it("reports a healthy system when every component passes", async () => {
    const monitor = new HealthMonitor({ checkTimeoutMs: 100 });
    monitor.register("speech_input", stub(true));
    monitor.register("dialogue", stub(true));
    const report = await monitor.checkAll();
    expect(report.components.speech_input?.status).toBe("healthy");
    expect(monitor.isSystemHealthy(report)).toBe(true);
    expect(monitor.failedComponents(report)).toEqual([]);
  });

  it("marks a component failed when its health check reports unhealthy, throws or hangs", async () => {
    const monitor = new HealthMonitor({ checkTimeoutMs: 20 });
    monitor.register("speech_input", stub(true));
    monitor.register("dialogue", stub(false));
    monitor.register("vehicle_link", stub(new Error("socket closed")));
    monitor.register("speech_output", stub("hang"));
    const report = await monitor.checkAll();
    expect(monitor.isSystemHealthy(report)).toBe(false);
    expect(monitor.failedComponents(report)).toEqual(["dialogue", "vehicle_link", "speech_output"]);
    expect(report.components.dialogue?.error).toBe("health check reported unhealthy");
    expect(report.components.vehicle_link?.error).toBe("socket closed");
  });

  it("reports slow but healthy checks as degraded", async () => {
    let t = 0;
    const monitor = new HealthMonitor({ checkTimeoutMs: 1000, degradedMs: 50, now: () => t });
    monitor.register("understanding", {
      healthCheck: async () => {
        t += 60;
        return true;
      },
    });
    const report = await monitor.checkAll();
    expect(report.components.understanding).toMatchObject({ status: "degraded", latencyMs: 60 });
    expect(monitor.isSystemHealthy(report)).toBe(false);
    expect(monitor.failedComponents(report)).toEqual([]);
  });

  it("is unhealthy before any check has run", () => {
    const monitor = new HealthMonitor({ checkTimeoutMs: 100 });
    monitor.register("dialogue", stub(true));
    expect(monitor.isSystemHealthy()).toBe(false);
  });

  it("records failures observed outside a health check and later recoveries", async () => {
    const monitor = new HealthMonitor({ checkTimeoutMs: 100 });
    monitor.register("dialogue", stub(true));
    monitor.register("vehicle_link", stub(true));
    await monitor.checkAll();
    monitor.markFailed("vehicle_link", "timed out");
    expect(monitor.failedComponents()).toEqual(["vehicle_link"]);
    monitor.markHealthy(["vehicle_link"]);
    expect(monitor.isSystemHealthy()).toBe(true);
  });
});
