/**
 * Validation and dispatch of pending commands onto the vehicle link executors.
 */

import { z } from "zod";
import type { ClimateParams, MediaParams, NavigationParams, PendingCommand, VehicleLink } from "../pipeline/types";
import { CommandValidationError, fail, ok, type Outcome } from "../pipeline/errors";
import { logger } from "../logging";

export const TEMPERATURE_RANGE = { min: 14, max: 30 } as const;
export const MAX_FAN_SPEED = 7;

const climateSchema = z
  .object({
    temperature: z.coerce.number().min(TEMPERATURE_RANGE.min).max(TEMPERATURE_RANGE.max).optional(),
    fan_speed: z.coerce.number().int().min(0).max(MAX_FAN_SPEED).optional(),
    zone: z.enum(["driver", "passenger", "rear", "all"]).optional(),
    mode: z.string().min(1).optional(),
  })
  .refine((p) => Object.values(p).some((v) => v !== undefined), { message: "no climate setting given" });

const navigationSchema = z.object({
  destination: z.string().trim().min(1),
  route_preferences: z.record(z.string(), z.unknown()).optional(),
});

export const MEDIA_ACTIONS = ["play", "pause", "stop", "next", "previous", "volume", "mute", "unmute"] as const;

const mediaSchema = z
  .object({
    action: z.enum(MEDIA_ACTIONS),
    source: z.string().min(1).optional(),
    content: z.string().min(1).optional(),
    volume: z.coerce.number().int().min(0).max(100).optional(),
  })
  .refine((p) => p.action !== "volume" || p.volume !== undefined, { message: "volume action needs a volume" });

const settingsSchema = z
  .record(z.string(), z.unknown())
  .refine((s) => Object.keys(s).length > 0, { message: "no settings given" });

export type ValidatedCommand =
  | { type: "climate_control"; parameters: ClimateParams }
  | { type: "navigation"; parameters: NavigationParams }
  | { type: "media"; parameters: MediaParams }
  | { type: "vehicle_settings"; parameters: Record<string, unknown> };

function issueText(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/** Check a command's type and parameters before it reaches the vehicle. */
export function validateCommand(command: PendingCommand): Outcome<ValidatedCommand> {
  switch (command.type) {
    case "climate_control": {
      const r = climateSchema.safeParse(command.parameters);
      return r.success
        ? ok<ValidatedCommand>({ type: "climate_control", parameters: r.data })
        : fail(new CommandValidationError(issueText(r.error), command.type));
    }
    case "navigation": {
      const r = navigationSchema.safeParse(command.parameters);
      return r.success
        ? ok<ValidatedCommand>({ type: "navigation", parameters: r.data })
        : fail(new CommandValidationError(issueText(r.error), command.type));
    }
    case "media": {
      const r = mediaSchema.safeParse(command.parameters);
      return r.success
        ? ok<ValidatedCommand>({ type: "media", parameters: r.data })
        : fail(new CommandValidationError(issueText(r.error), command.type));
    }
    case "vehicle_settings": {
      const r = settingsSchema.safeParse(command.parameters);
      return r.success
        ? ok<ValidatedCommand>({ type: "vehicle_settings", parameters: r.data })
        : fail(new CommandValidationError(issueText(r.error), command.type));
    }
    default:
      return fail(new CommandValidationError("unknown command type", command.type || "<empty>"));
  }
}

/** Route a validated command to the matching vehicle executor. */
export function dispatchCommand(vehicle: VehicleLink, command: ValidatedCommand): Promise<boolean> {
  switch (command.type) {
    case "climate_control":
      return vehicle.setClimate(command.parameters);
    case "navigation":
      return vehicle.setNavigationDestination(command.parameters);
    case "media":
      return vehicle.controlMedia(command.parameters);
    case "vehicle_settings":
      return vehicle.updateSettings(command.parameters);
  }
}

/** Validate then dispatch; invalid commands are logged and reported as failed. */
export async function executeCommand(vehicle: VehicleLink, command: PendingCommand): Promise<boolean> {
  const validated = validateCommand(command);
  if (!validated.ok) {
    logger.warn({ event: "COMMAND_REJECTED", type: command.type, err: validated.error.message }, "Command rejected");
    return false;
  }
  const success = await dispatchCommand(vehicle, validated.value);
  logger.info({ event: "COMMAND_EXECUTED", type: command.type, success }, success ? "Command executed" : "Command failed");
  return success;
}
