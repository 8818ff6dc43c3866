import { executeCommand, validateCommand } from "../../../src/vehicle/commands";
import { SimulatedVehicle } from "../../../src/vehicle/simulated";

describe("validateCommand", () => {
  it("accepts a climate command and coerces numeric strings", () => {
    const result = validateCommand({ type: "climate_control", parameters: { temperature: "21", zone: "driver" } });
    expect(result).toEqual({ ok: true, value: { type: "climate_control", parameters: { temperature: 21, zone: "driver" } } });
  });

  it("rejects a temperature outside the supported range", () => {
    const result = validateCommand({ type: "climate_control", parameters: { temperature: 35 } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("validation");
      expect(result.error.message.startsWith("Invalid climate_control command: temperature:")).toBe(true);
    }
  });

  it("rejects a climate command with no settings", () => {
    const result = validateCommand({ type: "climate_control", parameters: {} });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Invalid climate_control command: no climate setting given");
  });

  it("requires a volume for the volume action", () => {
    const result = validateCommand({ type: "media", parameters: { action: "volume" } });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Invalid media command: volume action needs a volume");
  });

  it("rejects a blank navigation destination", () => {
    expect(validateCommand({ type: "navigation", parameters: { destination: "   " } }).ok).toBe(false);
  });

  it("rejects unknown command types", () => {
    const result = validateCommand({ type: "open_sunroof", parameters: {} });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Invalid open_sunroof command: unknown command type");
  });
});

describe("executeCommand", () => {
  it("dispatches a valid command to the vehicle", async () => {
    const vehicle = new SimulatedVehicle();
    await vehicle.start();
    expect(await executeCommand(vehicle, { type: "navigation", parameters: { destination: "the airport" } })).toBe(true);
    const state = await vehicle.getCurrentState();
    expect(state.navigation).toEqual({ destination: "the airport", route: null, eta: null, distance: null });
  });

  it("does not reach the vehicle with an invalid command", async () => {
    const vehicle = new SimulatedVehicle();
    await vehicle.start();
    expect(await executeCommand(vehicle, { type: "media", parameters: { action: "rewind" } })).toBe(false);
    const state = await vehicle.getCurrentState();
    expect(state.media).toEqual({ source: "radio", volume: 50, muted: false, current_track: null, playing: false });
  });
});
