/**
 * RecoveryManager: bounded restart cycles for failed components, run concurrently.
 * A component that is still failing after its budget is terminally failed for this cycle.
 */

import type { ComponentName, Lifecycle } from "./types";
import { withTimeout } from "./errors";
import { errorMessage, logger } from "../logging";

export interface RecoveryConfig {
  /** Restart cycles per component (default 1). */
  maxAttempts?: number;
  /** Deadline for each restart() and the health check that follows it. */
  restartTimeoutMs: number;
}

export interface ComponentRecovery {
  recovered: boolean;
  attempts: number;
  error?: string;
}

export interface RecoveryResult {
  fullyRecovered: boolean;
  components: Partial<Record<ComponentName, ComponentRecovery>>;
  terminallyFailed: ComponentName[];
}

export type ComponentLookup = (name: ComponentName) => Lifecycle | undefined;

export class RecoveryManager {
  private readonly maxAttempts: number;
  private readonly restartTimeoutMs: number;

  constructor(
    private readonly lookup: ComponentLookup,
    config: RecoveryConfig
  ) {
    this.maxAttempts = Math.max(1, config.maxAttempts ?? 1);
    this.restartTimeoutMs = config.restartTimeoutMs;
  }

  async recover(failed: ComponentName[]): Promise<RecoveryResult> {
    const unique = [...new Set(failed)];
    logger.warn({ event: "RECOVERY_START", components: unique }, "Attempting recovery for failed components");
    const outcomes = await Promise.all(unique.map(async (name) => [name, await this.recoverOne(name)] as const));

    const result: RecoveryResult = { fullyRecovered: true, components: {}, terminallyFailed: [] };
    for (const [name, outcome] of outcomes) {
      result.components[name] = outcome;
      if (!outcome.recovered) {
        result.fullyRecovered = false;
        result.terminallyFailed.push(name);
      }
    }
    logger[result.fullyRecovered ? "info" : "error"](
      { event: "RECOVERY_END", fullyRecovered: result.fullyRecovered, terminallyFailed: result.terminallyFailed },
      result.fullyRecovered ? "All failed components recovered" : "Recovery failed"
    );
    return result;
  }

  private async recoverOne(name: ComponentName): Promise<ComponentRecovery> {
    const component = this.lookup(name);
    if (!component) return { recovered: false, attempts: 0, error: "unknown component" };

    let lastError: string | undefined;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await withTimeout(Promise.resolve().then(() => component.restart()), this.restartTimeoutMs, `${name}.restart`);
        const healthy = await withTimeout(
          Promise.resolve().then(() => component.healthCheck()),
          this.restartTimeoutMs,
          `${name}.healthCheck`
        );
        if (healthy) {
          logger.info({ event: "COMPONENT_RECOVERED", component: name, attempt }, "Component recovered");
          return { recovered: true, attempts: attempt };
        }
        lastError = "unhealthy after restart";
      } catch (err) {
        lastError = errorMessage(err);
      }
      logger.warn({ event: "COMPONENT_RESTART_FAILED", component: name, attempt, err: lastError }, "Restart attempt failed");
    }
    return { recovered: false, attempts: this.maxAttempts, error: lastError };
  }
}
