/**
 * RuleBasedUnderstanding: keyword intent scoring plus regex entities.
 *
 * Each intent scores one hit per matched keyword and per extracted entity it owns.
 * The best-scoring intent wins (ties go to the earlier intent in the table);
 * confidence = min(0.95, 0.6 + 0.15 * hits), and below the threshold the intent is "unknown".
 */

import { z } from "zod";
import intentTable from "./intents.json";
import type { NluResult, Understanding } from "../pipeline/types";
import { extractEntities, normalizeForNlu, type Entities } from "./entities";
import { logger } from "../logging";

export const UNKNOWN_INTENT = "unknown";

const intentTableSchema = z.object({
  intents: z
    .array(
      z.object({
        name: z.string().min(1),
        keywords: z.array(z.string().min(1)),
        entities: z.array(z.string()).default([]),
      })
    )
    .min(1),
});

export type IntentDefinition = z.infer<typeof intentTableSchema>["intents"][number];

export interface UnderstandingConfig {
  /** Intents below this confidence become "unknown" (default 0.7). */
  confidenceThreshold?: number;
  /** Override the bundled intent table. */
  intents?: IntentDefinition[];
}

export function loadIntentTable(raw: unknown = intentTable): IntentDefinition[] {
  return intentTableSchema.parse(raw).intents;
}

export function confidenceForHits(hits: number): number {
  if (hits <= 0) return 0;
  return Math.min(0.95, Math.round((0.6 + 0.15 * hits) * 100) / 100);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

interface CompiledIntent {
  name: string;
  patterns: RegExp[];
  entities: string[];
}

export class RuleBasedUnderstanding implements Understanding {
  private readonly threshold: number;
  private readonly intents: CompiledIntent[];
  private running = false;

  constructor(config: UnderstandingConfig = {}) {
    this.threshold = config.confidenceThreshold ?? 0.7;
    this.intents = (config.intents ?? loadIntentTable()).map((def) => ({
      name: def.name,
      patterns: def.keywords.map((k) => new RegExp(`(?:^|\\s)${escapeRegExp(normalizeForNlu(k))}(?=\\s|$)`)),
      entities: def.entities,
    }));
  }

  async process(text: string): Promise<NluResult> {
    if (!this.running) throw new Error("understanding is not running");
    const normalized = normalizeForNlu(text);
    const entities: Entities = extractEntities(normalized);

    let best: { name: string; hits: number } = { name: UNKNOWN_INTENT, hits: 0 };
    for (const intent of this.intents) {
      const keywordHits = intent.patterns.filter((p) => p.test(normalized)).length;
      const entityHits = intent.entities.filter((e) => entities[e] !== undefined).length;
      const hits = keywordHits + entityHits;
      if (hits > best.hits) best = { name: intent.name, hits };
    }

    const confidence = confidenceForHits(best.hits);
    const intent = confidence >= this.threshold ? best.name : UNKNOWN_INTENT;
    logger.debug({ event: "NLU_RESULT", intent, scored: best.name, hits: best.hits, confidence, entities }, "NLU result");
    return { text, intent, entities, confidence };
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  async restart(): Promise<void> {
    await this.stop();
    await this.start();
  }

  async healthCheck(): Promise<boolean> {
    return this.running;
  }
}
