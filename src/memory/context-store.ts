/**
 * ContextStore: the single owner of ConversationContext.
 * Every operation (reads included) runs under one mutex, so callers only ever see fully applied writes.
 * Reads hand out deep copies; the TTL reset is applied lazily on read.
 */

import { z } from "zod";
import type { ContextUpdate, ConversationContext, Turn, TurnInput } from "./types";
import type { Lifecycle } from "../pipeline/types";
import { SchemaMismatchError } from "../pipeline/errors";
import { Mutex } from "./mutex";
import { logger } from "../logging";

export interface ContextStoreConfig {
  /** Max turns kept in history. */
  windowSize: number;
  /** Reset to defaults when unmodified longer than this (ms). */
  ttlMs: number;
  /** Clock, for tests. */
  now?: () => number;
}

const mapping = z.record(z.string(), z.unknown());

const updateSchema = z
  .object({
    currentIntent: z.string().nullable().optional(),
    entities: mapping.optional(),
    vehicleState: mapping.optional(),
    userPreferences: mapping.optional(),
    systemStatus: mapping.optional(),
  })
  .strict();

const turnSchema = z
  .object({
    timestamp: z.number().finite().optional(),
    speaker: z.enum(["user", "assistant", "system"]),
    text: z.string(),
    intent: z.string().nullable().optional(),
    entities: mapping.optional(),
  })
  .strict();

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Merge `patch` into a copy of `target`. Nested mappings merge recursively; scalars and arrays replace.
 * A mapping may not replace a non-null scalar and a scalar or array may not replace a mapping (null clears).
 */
export function deepMerge(
  target: Record<string, unknown>,
  patch: Record<string, unknown>,
  path = ""
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const at = path ? `${path}.${key}` : key;
    const existing = out[key];
    if (isPlainObject(value)) {
      if (existing === undefined || existing === null) {
        out[key] = deepMerge({}, value, at);
      } else if (isPlainObject(existing)) {
        out[key] = deepMerge(existing, value, at);
      } else {
        throw new SchemaMismatchError("cannot merge a mapping into a scalar field", at);
      }
    } else {
      if (isPlainObject(existing) && value !== null) {
        throw new SchemaMismatchError("cannot replace a mapping with a scalar or list", at);
      }
      out[key] = value;
    }
  }
  return out;
}

function describeIssue(error: z.ZodError): { message: string; path: string } {
  const issue = error.issues[0];
  return { message: issue?.message ?? "invalid payload", path: issue ? issue.path.join(".") : "" };
}

function cloneOrMismatch<T>(value: T, path: string): T {
  try {
    return structuredClone(value);
  } catch {
    throw new SchemaMismatchError("value is not serializable", path);
  }
}

export class ContextStore implements Lifecycle {
  private readonly mutex = new Mutex();
  private readonly windowSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private context: ConversationContext;
  private running = false;

  constructor(config: ContextStoreConfig) {
    this.windowSize = Math.max(1, config.windowSize);
    this.ttlMs = config.ttlMs;
    this.now = config.now ?? Date.now;
    this.context = this.defaults();
  }

  private defaults(): ConversationContext {
    return {
      history: [],
      currentIntent: null,
      entities: {},
      vehicleState: {},
      userPreferences: {},
      systemStatus: { status: "ready", activeFeatures: [], errors: [] },
      lastUpdate: this.now(),
    };
  }

  /** Consistent snapshot; resets to defaults first when the context has outlived its TTL. */
  read(): Promise<ConversationContext> {
    return this.mutex.runExclusive(() => {
      const now = this.now();
      if (now - this.context.lastUpdate > this.ttlMs) {
        logger.info(
          { event: "CONTEXT_EXPIRED", idleMs: now - this.context.lastUpdate, ttlMs: this.ttlMs },
          "Context expired; reset to defaults"
        );
        this.context = this.defaults();
      }
      return structuredClone(this.context);
    });
  }

  /**
   * Deep-merge mapping fields, replace scalars, refresh lastUpdate.
   * Rejects with SchemaMismatchError (state untouched) when the payload does not fit the schema.
   */
  update(partial: ContextUpdate): Promise<void> {
    return this.mutex.runExclusive(() => {
      const parsed = updateSchema.safeParse(partial);
      if (!parsed.success) {
        const { message, path } = describeIssue(parsed.error);
        throw new SchemaMismatchError(message, path);
      }
      const patch = cloneOrMismatch(parsed.data, "");
      const next: ConversationContext = { ...this.context };
      if (patch.currentIntent !== undefined) next.currentIntent = patch.currentIntent;
      if (patch.entities) next.entities = deepMerge(next.entities, patch.entities, "entities");
      if (patch.vehicleState) next.vehicleState = deepMerge(next.vehicleState, patch.vehicleState, "vehicleState");
      if (patch.userPreferences) {
        next.userPreferences = deepMerge(next.userPreferences, patch.userPreferences, "userPreferences");
      }
      if (patch.systemStatus) next.systemStatus = deepMerge(next.systemStatus, patch.systemStatus, "systemStatus");
      next.lastUpdate = this.now();
      this.context = next;
    });
  }

  /** Append a turn and keep only the last windowSize turns. */
  appendTurn(turn: TurnInput): Promise<void> {
    return this.mutex.runExclusive(() => {
      const parsed = turnSchema.safeParse(turn);
      if (!parsed.success) {
        const { message, path } = describeIssue(parsed.error);
        throw new SchemaMismatchError(message, path ? `turn.${path}` : "turn");
      }
      const now = this.now();
      const entry: Turn = Object.freeze({
        timestamp: parsed.data.timestamp ?? now,
        speaker: parsed.data.speaker,
        text: parsed.data.text,
        intent: parsed.data.intent ?? null,
        entities: Object.freeze(cloneOrMismatch(parsed.data.entities ?? {}, "turn.entities")),
      });
      const history = [...this.context.history, entry];
      this.context = {
        ...this.context,
        history: history.length > this.windowSize ? history.slice(-this.windowSize) : history,
        lastUpdate: now,
      };
    });
  }

  reset(): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.context = this.defaults();
      logger.info({ event: "CONTEXT_RESET" }, "Context reset");
    });
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  /** Context survives a restart; only the running flag cycles. */
  async restart(): Promise<void> {
    await this.stop();
    await this.start();
  }

  /** Healthy when started and the lock is not wedged (a wedged lock makes the health check time out). */
  healthCheck(): Promise<boolean> {
    return this.mutex.runExclusive(() => this.running);
  }
}
