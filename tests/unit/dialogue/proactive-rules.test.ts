import { PROACTIVE_RULES } from "../../../src/dialogue/proactive-rules";
import { makeContext } from "../../helpers/context";

describe("PROACTIVE_RULES", () => {
  it("reads the fuel level from the payload or the vehicle snapshot", () => {
    expect(PROACTIVE_RULES.low_fuel({ fuel_level: 10 }, makeContext())?.speech).toBe(
      "Fuel is low at 10 percent. Would you like me to find the nearest gas station?"
    );
    expect(PROACTIVE_RULES.low_fuel({}, makeContext({ vehicle: { fuel_level: 7.6 } }))?.speech).toBe(
      "Fuel is low at 8 percent. Would you like me to find the nearest gas station?"
    );
    expect(PROACTIVE_RULES.low_fuel({}, makeContext())?.speech).toBe(
      "Fuel is running low. Would you like me to find the nearest gas station?"
    );
  });

  it("names the tire", () => {
    expect(PROACTIVE_RULES.tire_pressure({ tire: "front_left" }, makeContext())?.speech).toBe(
      "Tire pressure is low on the front left tire. Please check it soon."
    );
  });

  it("describes due maintenance", () => {
    expect(PROACTIVE_RULES.maintenance_due({ service: "oil_change", due_in_km: 500 }, makeContext())?.speech).toBe(
      "Oil change is due in 500 kilometers."
    );
  });

  it("only warns about doors and seatbelts while moving", () => {
    expect(PROACTIVE_RULES.door_open({ door: "rear_left" }, makeContext({ vehicle: { speed: 0 } }))).toBeNull();
    expect(PROACTIVE_RULES.door_open({ door: "rear_left" }, makeContext({ vehicle: { speed: 40 } }))?.speech).toBe(
      "The rear left door is open. Please check it."
    );
    expect(PROACTIVE_RULES.seatbelt_unfastened({ speed: 30 }, makeContext())?.speech).toBe("Please fasten your seatbelt.");
  });
});
