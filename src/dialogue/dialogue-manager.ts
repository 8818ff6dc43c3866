/**
 * DialogueManager: intent + entities -> vehicle commands and a spoken reply.
 *
 * Commands are derived deterministically; the LLM (when configured) only rephrases the templated
 * draft, under its own deadline, and the draft is spoken whenever the model fails or is gated.
 */

import type { ILLM } from "../adapters/llm";
import type { ConversationContext } from "../memory/types";
import type { Dialogue, DialogueResponse, NluResult, PendingCommand, ProactiveNotification } from "../pipeline/types";
import { PromptManager } from "../prompts/prompt-manager";
import { ReplyGate } from "./safety";
import { PROACTIVE_RULES, type ProactiveRule } from "./proactive-rules";
import { MAX_FAN_SPEED, TEMPERATURE_RANGE } from "../vehicle/commands";
import { withTimeout } from "../pipeline/errors";
import { errorMessage, logger } from "../logging";

const DEFAULT_TEMPERATURE = 22;
const DEFAULT_VOLUME = 50;
const VOLUME_STEP = 10;

export interface DialogueConfig {
  /** Deadline for the LLM phrasing call; the draft is used past it. */
  llmTimeoutMs?: number;
  /** Minimum gap between two notifications for the same event type. */
  proactiveCooldownMs?: number;
  now?: () => number;
}

/** What a turn does before any phrasing. */
export interface ReplyPlan {
  draft: string;
  commands: PendingCommand[];
  uiUpdate?: Record<string, unknown>;
  endConversation: boolean;
}

type Entities = Record<string, unknown>;

function num(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function str(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function section(context: ConversationContext, key: string): Record<string, unknown> {
  const value = context.vehicleState[key];
  return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function reply(draft: string, extra: Partial<ReplyPlan> = {}): ReplyPlan {
  return { draft, commands: [], endConversation: false, ...extra };
}

function planClimate(entities: Entities, context: ConversationContext): ReplyPlan {
  const params: Record<string, unknown> = {};
  const current = num(section(context, "climate_control").temperature) ?? DEFAULT_TEMPERATURE;
  let temperature = num(entities.temperature);
  const change = str(entities.temperature_change);
  if (temperature === undefined && change) temperature = change === "up" ? current + 1 : current - 1;
  if (temperature !== undefined) {
    if (temperature < TEMPERATURE_RANGE.min || temperature > TEMPERATURE_RANGE.max) {
      return reply(`I can set the temperature between ${TEMPERATURE_RANGE.min} and ${TEMPERATURE_RANGE.max} degrees.`);
    }
    params.temperature = temperature;
  }
  const fan = num(entities.fan_speed);
  if (fan !== undefined) {
    if (fan > MAX_FAN_SPEED) return reply(`The fan goes from 0 to ${MAX_FAN_SPEED}.`);
    params.fan_speed = fan;
  }
  const zone = str(entities.zone);
  if (zone) params.zone = zone;
  const mode = str(entities.climate_mode);
  if (mode) params.mode = mode;

  if (params.temperature === undefined && params.fan_speed === undefined && params.mode === undefined) {
    return reply("What temperature would you like?");
  }
  const parts: string[] = [];
  if (params.temperature !== undefined) parts.push(`the temperature to ${temperature} degrees`);
  if (fan !== undefined) parts.push(`the fan speed to ${fan}`);
  if (mode) parts.push(`${mode} mode`);
  const where = zone ? ` for the ${zone} zone` : "";
  return reply(`Setting ${parts.join(" and ")}${where}.`, {
    commands: [{ type: "climate_control", parameters: params }],
    uiUpdate: { screen: "climate", ...params },
  });
}

function planNavigation(entities: Entities): ReplyPlan {
  const destination = str(entities.destination);
  if (!destination) return reply("Where would you like to go?");
  return reply(`Starting navigation to ${destination}.`, {
    commands: [{ type: "navigation", parameters: { destination } }],
    uiUpdate: { screen: "navigation", destination },
  });
}

const MEDIA_DRAFTS: Record<string, string> = {
  pause: "Pausing playback.",
  stop: "Stopping playback.",
  next: "Skipping to the next track.",
  previous: "Going back to the previous track.",
  mute: "Muting audio.",
  unmute: "Unmuting audio.",
};

function planMedia(entities: Entities, context: ConversationContext): ReplyPlan {
  const source = str(entities.media_source);
  let volume = num(entities.volume);
  const change = str(entities.volume_change);
  if (volume === undefined && change) {
    const current = num(section(context, "media").volume) ?? DEFAULT_VOLUME;
    volume = Math.min(100, Math.max(0, current + (change === "up" ? VOLUME_STEP : -VOLUME_STEP)));
  }
  const action = volume !== undefined ? "volume" : str(entities.media_action) ?? (source ? "play" : undefined);
  if (!action) return reply("What would you like to play?");

  const parameters: Record<string, unknown> = { action };
  if (source) parameters.source = source;
  if (volume !== undefined) parameters.volume = volume;
  const draft =
    action === "volume"
      ? `Setting the volume to ${volume}.`
      : action === "play"
        ? `Playing ${source ?? "music"}.`
        : MEDIA_DRAFTS[action] ?? "Done.";
  return reply(draft, {
    commands: [{ type: "media", parameters }],
    uiUpdate: { screen: "media", ...parameters },
  });
}

function planSettings(entities: Entities): ReplyPlan {
  const name = str(entities.setting_name);
  const value = entities.setting_value;
  if (!name || (typeof value !== "boolean" && typeof value !== "string")) {
    return reply("Which setting would you like to change?");
  }
  const label = name.replace(/_/g, " ");
  const draft =
    typeof value === "boolean"
      ? `Turning ${value ? "on" : "off"} the ${label}.`
      : `Switching ${label.replace(/ mode$/, "")} to ${value}.`;
  return reply(draft, {
    commands: [{ type: "vehicle_settings", parameters: { [name]: value } }],
    uiUpdate: { screen: "settings", [name]: value },
  });
}

function planStatus(context: ConversationContext): ReplyPlan {
  const vehicle = section(context, "vehicle");
  const facts: string[] = [];
  const fuel = num(vehicle.fuel_level);
  if (fuel !== undefined) facts.push(`fuel is at ${Math.round(fuel)} percent`);
  const battery = num(vehicle.battery_level);
  if (battery !== undefined) facts.push(`the battery is at ${Math.round(battery)} percent`);
  if (typeof vehicle.doors_locked === "boolean") facts.push(`the doors are ${vehicle.doors_locked ? "locked" : "unlocked"}`);
  if (facts.length === 0) return reply("I don't have the vehicle status right now.");
  const sentence = facts.length === 1 ? facts[0] : `${facts.slice(0, -1).join(", ")} and ${facts[facts.length - 1]}`;
  return reply(`${sentence.charAt(0).toUpperCase()}${sentence.slice(1)}.`);
}

/** Deterministic reply plan for an understood utterance. */
export function planReply(nlu: NluResult, context: ConversationContext): ReplyPlan {
  switch (nlu.intent) {
    case "greeting":
      return reply("Hello! How can I help?");
    case "farewell":
      return reply("Goodbye. Drive safely.", { endConversation: true });
    case "help":
      return reply("I can adjust the climate, navigate, control media, check the vehicle status and change settings.");
    case "climate_control":
      return planClimate(nlu.entities, context);
    case "navigation":
      return planNavigation(nlu.entities);
    case "media_control":
      return planMedia(nlu.entities, context);
    case "settings":
      return planSettings(nlu.entities);
    case "vehicle_status":
      return planStatus(context);
    case "phone_call":
      return reply("I can't place phone calls yet.");
    case "weather":
      return reply("I don't have live weather information right now.");
    case "traffic":
      return reply("I don't have live traffic information right now.");
    default:
      return reply("Sorry, I'm not sure how to help with that. You can ask me to change the temperature, navigate or play music.");
  }
}

function describeCommand(command: PendingCommand): string {
  return `${command.type} ${JSON.stringify(command.parameters)}`;
}

export class DialogueManager implements Dialogue {
  private readonly promptManager = new PromptManager();
  private readonly gate = new ReplyGate();
  private readonly llmTimeoutMs: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly lastNotified = new Map<string, number>();
  private running = false;

  constructor(
    private readonly llm: ILLM | null,
    config: DialogueConfig = {},
    private readonly rules: Record<string, ProactiveRule> = PROACTIVE_RULES
  ) {
    this.llmTimeoutMs = config.llmTimeoutMs ?? 4000;
    this.cooldownMs = config.proactiveCooldownMs ?? 5 * 60_000;
    this.now = config.now ?? Date.now;
  }

  async processTurn(nlu: NluResult, context: ConversationContext): Promise<DialogueResponse> {
    if (!this.running) throw new Error("dialogue is not running");
    const plan = planReply(nlu, context);
    const speechResponse = await this.phrase(plan, nlu, context);
    return {
      speechResponse,
      commands: plan.commands,
      uiUpdate: plan.uiUpdate,
      endConversation: plan.endConversation,
    };
  }

  async checkProactiveTrigger(
    eventType: string,
    eventData: Record<string, unknown>,
    context: ConversationContext
  ): Promise<ProactiveNotification | null> {
    if (!this.running) throw new Error("dialogue is not running");
    const rule = this.rules[eventType];
    if (!rule) return null;
    const last = this.lastNotified.get(eventType);
    if (last !== undefined && this.now() - last < this.cooldownMs) {
      logger.debug({ event: "PROACTIVE_COOLDOWN", type: eventType }, "Notification suppressed by cooldown");
      return null;
    }
    const notification = rule(eventData, context);
    if (notification) this.lastNotified.set(eventType, this.now());
    return notification;
  }

  /** LLM rephrasing of the draft; the draft itself when no model is configured or the call fails. */
  private async phrase(plan: ReplyPlan, nlu: NluResult, context: ConversationContext): Promise<string> {
    if (!this.llm) return plan.draft;
    const messages = this.promptManager.buildReplyMessages({
      history: context.history,
      utterance: nlu.text,
      intent: nlu.intent,
      draft: plan.draft,
      actions: plan.commands.map(describeCommand),
    });
    const abort = new AbortController();
    try {
      const response = await withTimeout(
        this.llm.chat(messages, { maxTokens: 120, temperature: 0.4, signal: abort.signal }),
        this.llmTimeoutMs,
        "LLM"
      );
      const gated = this.gate.check(response.text, plan.draft);
      if (gated.reason) logger.info({ event: "REPLY_GATED", reason: gated.reason }, "Using templated reply");
      return gated.text;
    } catch (err) {
      logger.warn({ event: "LLM_FAILED", err: errorMessage(err) }, "LLM phrasing failed; using templated reply");
      return plan.draft;
    } finally {
      abort.abort();
    }
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  async restart(): Promise<void> {
    await this.stop();
    this.lastNotified.clear();
    await this.start();
  }

  async healthCheck(): Promise<boolean> {
    return this.running;
  }
}
