/**
 * HealthMonitor: fan-out liveness checks with a per-check deadline.
 * One check costs at most the slowest check's timeout, not the sum.
 * The monitor only proposes reports; the orchestrator commits them.
 */

import type { ComponentName, Lifecycle } from "./types";
import { withTimeout } from "./errors";
import { errorMessage, logger } from "../logging";

export type HealthStatus = "healthy" | "degraded" | "failed";

export interface ComponentStatus {
  status: HealthStatus;
  lastChecked: number;
  latencyMs: number;
  error?: string;
}

export interface ComponentHealth {
  checkedAt: number;
  components: Partial<Record<ComponentName, ComponentStatus>>;
}

export interface HealthMonitorConfig {
  checkTimeoutMs: number;
  /** Healthy checks slower than this are reported degraded. */
  degradedMs?: number;
  now?: () => number;
}

export class HealthMonitor {
  private readonly components = new Map<ComponentName, Pick<Lifecycle, "healthCheck">>();
  private readonly checkTimeoutMs: number;
  private readonly degradedMs: number;
  private readonly now: () => number;
  private lastReport: ComponentHealth | null = null;

  constructor(config: HealthMonitorConfig) {
    this.checkTimeoutMs = config.checkTimeoutMs;
    this.degradedMs = config.degradedMs ?? Math.floor(config.checkTimeoutMs * 0.75);
    this.now = config.now ?? Date.now;
  }

  register(name: ComponentName, component: Pick<Lifecycle, "healthCheck">): void {
    this.components.set(name, component);
  }

  registeredNames(): ComponentName[] {
    return [...this.components.keys()];
  }

  async checkAll(): Promise<ComponentHealth> {
    const entries = await Promise.all(
      [...this.components.entries()].map(async ([name, component]) => [name, await this.checkOne(name, component)] as const)
    );
    const report: ComponentHealth = { checkedAt: this.now(), components: {} };
    for (const [name, status] of entries) report.components[name] = status;
    this.lastReport = report;
    const failed = this.failedComponents(report);
    logger.info(
      { event: "HEALTH_CHECK", healthy: this.isSystemHealthy(report), failed },
      failed.length === 0 ? "Health check passed" : "Health check found failed components"
    );
    return report;
  }

  private async checkOne(name: ComponentName, component: Pick<Lifecycle, "healthCheck">): Promise<ComponentStatus> {
    const started = this.now();
    try {
      const healthy = await withTimeout(
        Promise.resolve().then(() => component.healthCheck()),
        this.checkTimeoutMs,
        `${name}.healthCheck`
      );
      const latencyMs = this.now() - started;
      if (!healthy) return { status: "failed", lastChecked: this.now(), latencyMs, error: "health check reported unhealthy" };
      return { status: latencyMs > this.degradedMs ? "degraded" : "healthy", lastChecked: this.now(), latencyMs };
    } catch (err) {
      logger.warn({ event: "HEALTH_CHECK_ERROR", component: name, err: errorMessage(err) }, "Health check errored");
      return { status: "failed", lastChecked: this.now(), latencyMs: this.now() - started, error: errorMessage(err) };
    }
  }

  /** True iff every registered component reported healthy. */
  isSystemHealthy(report: ComponentHealth | null = this.lastReport): boolean {
    if (!report) return false;
    return this.registeredNames().every((name) => report.components[name]?.status === "healthy");
  }

  failedComponents(report: ComponentHealth | null = this.lastReport): ComponentName[] {
    if (!report) return [];
    return this.registeredNames().filter((name) => report.components[name]?.status === "failed");
  }

  /** Record a failure observed outside a health check (e.g. a provider timeout). Returns the proposed report. */
  markFailed(name: ComponentName, error: string): ComponentHealth {
    const base: ComponentHealth = this.lastReport ?? { checkedAt: this.now(), components: {} };
    const report: ComponentHealth = {
      checkedAt: base.checkedAt,
      components: { ...base.components, [name]: { status: "failed", lastChecked: this.now(), latencyMs: 0, error } },
    };
    this.lastReport = report;
    return report;
  }

  /** Record components that recovered since the last report. */
  markHealthy(names: ComponentName[]): ComponentHealth {
    const base: ComponentHealth = this.lastReport ?? { checkedAt: this.now(), components: {} };
    const components = { ...base.components };
    for (const name of names) components[name] = { status: "healthy", lastChecked: this.now(), latencyMs: 0 };
    this.lastReport = { checkedAt: base.checkedAt, components };
    return this.lastReport;
  }

  getLastReport(): ComponentHealth | null {
    return this.lastReport;
  }
}
