/**
 * LLM adapter types. The dialogue manager uses an LLM only to phrase replies.
 */

export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
  /** Aborts the provider request (e.g. when the caller's deadline passes). */
  signal?: AbortSignal;
}

export interface ChatResponse {
  text: string;
}

export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
