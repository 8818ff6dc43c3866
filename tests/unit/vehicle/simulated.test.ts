import { SimulatedVehicle } from "../../../src/vehicle/simulated";

describe("SimulatedVehicle", () => {
  it("applies climate changes to the whole cabin or to one zone", async () => {
    const vehicle = new SimulatedVehicle();
    await vehicle.start();
    expect(await vehicle.setClimate({ temperature: 21 })).toBe(true);
    expect(await vehicle.setClimate({ temperature: 19, zone: "passenger" })).toBe(true);
    const state = await vehicle.getCurrentState();
    expect(state.climate_control).toEqual({
      temperature: 21,
      fan_speed: 2,
      mode: "auto",
      recirculation: false,
      zones: { passenger: { temperature: 19 } },
    });
  });

  it("handles media actions", async () => {
    const vehicle = new SimulatedVehicle();
    await vehicle.start();
    await vehicle.controlMedia({ action: "play", source: "spotify" });
    await vehicle.controlMedia({ action: "volume", volume: 70 });
    await vehicle.controlMedia({ action: "mute" });
    expect((await vehicle.getCurrentState()).media).toEqual({
      source: "spotify",
      volume: 70,
      muted: true,
      current_track: null,
      playing: true,
    });
    expect(await vehicle.controlMedia({ action: "volume" })).toBe(false);
  });

  it("returns copies of its state", async () => {
    const vehicle = new SimulatedVehicle({ vehicle: { fuel_level: 12 } });
    await vehicle.start();
    const state = await vehicle.getCurrentState();
    expect(state.vehicle).toEqual({ speed: 0, fuel_level: 12, battery_level: 100, doors_locked: true, lights: "auto" });
    state.vehicle = "changed";
    expect((await vehicle.getCurrentState()).vehicle).not.toBe("changed");
  });

  it("delivers events to subscribers until they unsubscribe", async () => {
    const vehicle = new SimulatedVehicle();
    const seen: string[] = [];
    const unsubscribe = vehicle.subscribeToEvents((type) => seen.push(type));
    vehicle.subscribeToEvents(() => {
      throw new Error("bad handler");
    });
    vehicle.emitEvent("low_fuel", { fuel_level: 10 });
    unsubscribe();
    vehicle.emitEvent("door_open");
    expect(seen).toEqual(["low_fuel"]);
    expect(vehicle.subscriberCount()).toBe(1);
  });

  it("records UI state changes and updates", async () => {
    const vehicle = new SimulatedVehicle();
    await vehicle.start();
    await vehicle.setUiState("listening");
    await vehicle.updateUi({ screen: "climate", temperature: 21 });
    expect(vehicle.uiStates).toEqual(["listening"]);
    expect(vehicle.uiUpdates).toEqual([{ screen: "climate", temperature: 21 }]);
  });

  it("fails injected operations and refuses work while stopped", async () => {
    const vehicle = new SimulatedVehicle();
    await expect(vehicle.getCurrentState()).rejects.toThrow("vehicle link is not running");
    await vehicle.start();
    vehicle.failOn("command");
    expect(await vehicle.updateSettings({ display_mode: "night" })).toBe(false);
    vehicle.failOn("command", false);
    expect(await vehicle.updateSettings({ display_mode: "night" })).toBe(true);
    vehicle.failOn("healthCheck");
    expect(await vehicle.healthCheck()).toBe(false);
  });
});
