/**
 * ReplyGate: guardrails for model-phrased replies before they are spoken in the cabin.
 *
 * - strip markup that would be read aloud
 * - cap length at a sentence boundary
 * - replace replies that look like prompt leakage or contain profanity with the templated draft
 */

export interface ReplyGateConfig {
  /** Max characters spoken (cut at the last sentence end within the limit). */
  maxChars?: number;
}

export interface GateResult {
  text: string;
  /** Set when the draft was used instead of the model's reply. */
  reason?: "empty" | "leak" | "profanity";
}

const DEFAULT_MAX_CHARS = 280;

const LEAK_PATTERNS = [/system prompt/i, /draft reply/i, /as an ai (language )?model/i, /^intent:/im];

const PROFANITY_PATTERNS = [/\bfuck\w*\b/i, /\bshit\w*\b/i, /\bdamn\b/i, /\bbitch\w*\b/i];

/** Remove markdown emphasis, headings, bullets and code ticks. */
export function stripMarkup(text: string): string {
  return text
    .replace(/[*_`#>]+/g, "")
    .replace(/^\s*[-•]\s+/gm, "")
    .replace(/\s+/g, " ")
    .trim();
}

export class ReplyGate {
  private readonly maxChars: number;

  constructor(cfg: ReplyGateConfig = {}) {
    this.maxChars = cfg.maxChars ?? DEFAULT_MAX_CHARS;
  }

  check(reply: string, draft: string): GateResult {
    const text = stripMarkup(reply || "");
    if (!text) return { text: draft, reason: "empty" };
    if (LEAK_PATTERNS.some((re) => re.test(text))) return { text: draft, reason: "leak" };
    if (PROFANITY_PATTERNS.some((re) => re.test(text))) return { text: draft, reason: "profanity" };
    return { text: this.truncate(text) };
  }

  private truncate(text: string): string {
    if (text.length <= this.maxChars) return text;
    const head = text.slice(0, this.maxChars);
    const end = Math.max(head.lastIndexOf(". "), head.lastIndexOf("? "), head.lastIndexOf("! "));
    return end > 0 ? head.slice(0, end + 1) : head.trimEnd();
  }
}
