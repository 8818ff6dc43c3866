/**
 * Proactive rules: which vehicle events are worth interrupting the driver for, and what to say.
 * A rule returns null when the event does not warrant a notification (e.g. a door opened while parked).
 */

import type { ConversationContext } from "../memory/types";
import type { ProactiveNotification } from "../pipeline/types";

export type ProactiveRule = (
  payload: Record<string, unknown>,
  context: ConversationContext
) => ProactiveNotification | null;

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

/** Payload value first, then the vehicle snapshot's `vehicle.<key>`. */
function vehicleNumber(payload: Record<string, unknown>, context: ConversationContext, key: string): number | undefined {
  return num(payload[key]) ?? num(section(context, "vehicle")[key]);
}

function isMoving(payload: Record<string, unknown>, context: ConversationContext): boolean {
  return (vehicleNumber(payload, context, "speed") ?? 0) > 0;
}

function humanize(id: string): string {
  return id.replace(/[_-]+/g, " ").trim();
}

function say(speech: string): ProactiveNotification {
  return { speech, commands: [] };
}

export const PROACTIVE_RULES: Record<string, ProactiveRule> = {
  low_fuel: (payload, context) => {
    const level = vehicleNumber(payload, context, "fuel_level");
    const head = level !== undefined ? `Fuel is low at ${Math.round(level)} percent.` : "Fuel is running low.";
    return say(`${head} Would you like me to find the nearest gas station?`);
  },
  low_battery: (payload, context) => {
    const level = vehicleNumber(payload, context, "battery_level");
    const head = level !== undefined ? `Battery is low at ${Math.round(level)} percent.` : "Battery is running low.";
    return say(`${head} Would you like me to find a charging station?`);
  },
  tire_pressure: (payload) => {
    const tire = str(payload.tire);
    return say(
      tire
        ? `Tire pressure is low on the ${humanize(tire)} tire. Please check it soon.`
        : "Tire pressure is low. Please check your tires soon."
    );
  },
  maintenance_due: (payload) => {
    const service = str(payload.service);
    const dueKm = num(payload.due_in_km);
    const what = service ? `${humanize(service).replace(/^./, (c) => c.toUpperCase())} is due` : "Scheduled maintenance is due";
    return say(dueKm !== undefined ? `${what} in ${Math.round(dueKm)} kilometers.` : `${what}.`);
  },
  door_open: (payload, context) => {
    if (!isMoving(payload, context)) return null;
    const door = str(payload.door);
    return say(door ? `The ${humanize(door)} door is open. Please check it.` : "A door is open while driving. Please check the doors.");
  },
  seatbelt_unfastened: (payload, context) => {
    if (!isMoving(payload, context)) return null;
    const seat = str(payload.seat);
    return say(seat ? `The ${humanize(seat)} seatbelt is unfastened. Please buckle up.` : "Please fasten your seatbelt.");
  },
};
