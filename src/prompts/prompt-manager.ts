import type { Message } from "../adapters/llm";
import type { Turn } from "../memory/types";
import { CABIN_ASSISTANT_SYSTEM_PROMPT, historyToMessages } from "./cabin-assistant";

export interface PromptManagerConfig {
  /** Base system prompt. Defaults to CABIN_ASSISTANT_SYSTEM_PROMPT. */
  systemPrompt?: string;
  /** Prior turns included in the prompt (most recent last). */
  maxHistoryTurns?: number;
}

export interface BuildReplyArgs {
  history: Turn[];
  utterance: string;
  intent: string;
  /** Templated reply the model rephrases. */
  draft: string;
  /** Commands the turn will execute, described for the model. */
  actions: string[];
}

/**
 * PromptManager
 *
 * Centralizes how we build messages for the LLM so the phrasing rules can evolve without touching
 * the dialogue manager.
 */
export class PromptManager {
  private readonly systemPrompt: string;
  private readonly maxHistoryTurns: number;

  constructor(cfg: PromptManagerConfig = {}) {
    this.systemPrompt = cfg.systemPrompt ?? CABIN_ASSISTANT_SYSTEM_PROMPT;
    this.maxHistoryTurns = cfg.maxHistoryTurns ?? 4;
  }

  buildReplyMessages(args: BuildReplyArgs): Message[] {
    // The current utterance is already the last history turn; it is restated in the task below.
    const prior = args.history.slice(0, -1).slice(-this.maxHistoryTurns);
    const task = [
      `Driver said: "${args.utterance}"`,
      `Intent: ${args.intent}`,
      `Actions: ${args.actions.length > 0 ? args.actions.join("; ") : "none"}`,
      `Draft reply: ${args.draft}`,
      "Rephrase the draft reply.",
    ].join("\n");
    return [{ role: "system", content: this.systemPrompt }, ...historyToMessages(prior), { role: "user", content: task }];
  }
}
