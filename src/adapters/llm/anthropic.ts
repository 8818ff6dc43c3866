/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

type ConversationMessage = Message & { role: "user" | "assistant" };

function isConversationMessage(m: Message): m is ConversationMessage {
  return m.role !== "system";
}

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const system = messages.find((m) => m.role === "system")?.content;
    const msgs = messages.filter(isConversationMessage).map((m) => ({ role: m.role, content: m.content }));
    const response = await this.client.messages.create(
      {
        model: this.cfg.model,
        max_tokens: options?.maxTokens ?? 256,
        temperature: options?.temperature,
        system: system ?? undefined,
        messages: msgs,
      },
      { signal: options?.signal }
    );
    const textBlock = response.content.find((b) => b.type === "text");
    const text = textBlock && textBlock.type === "text" ? textBlock.text : "";
    return { text };
  }
}
