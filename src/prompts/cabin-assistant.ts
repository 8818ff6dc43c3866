/**
 * System prompt and history formatting for the in-cabin assistant's reply phrasing.
 */

import type { Message } from "../adapters/llm";
import type { Turn } from "../memory/types";

export const CABIN_ASSISTANT_SYSTEM_PROMPT = [
  "You are the voice assistant of a car. The driver hears your reply through the cabin speakers while driving.",
  "Reply in one or two short spoken sentences. No lists, no markdown, no emoji.",
  "You are given a draft reply that already states what the car did. Rephrase it naturally; keep every fact, number and unit.",
  "Never claim an action that is not in the draft. Never ask the driver to look at a screen.",
].join("\n");

/** Map stored turns to chat messages; system turns (proactive notifications) are spoken by the assistant. */
export function historyToMessages(history: Turn[]): Message[] {
  return history.map((turn) => ({
    role: turn.speaker === "user" ? "user" : "assistant",
    content: turn.text,
  }));
}
