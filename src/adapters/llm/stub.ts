/**
 * Stub LLM adapter for testing or when no provider is configured.
 * Returns a fixed reply (empty by default, which makes the dialogue manager use its templates).
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  /** Messages of every chat() call, oldest first. */
  readonly calls: Message[][] = [];

  constructor(private readonly reply: string = "") {}

  async chat(messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push(messages);
    return { text: this.reply };
  }
}
