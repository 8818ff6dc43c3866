import { extractEntities, normalizeForNlu } from "../../../src/nlu/entities";

const entities = (text: string) => extractEntities(normalizeForNlu(text));

describe("normalizeForNlu", () => {
  it("lowercases and drops punctuation but keeps decimals", () => {
    expect(normalizeForNlu("Set it to 21.5 degrees!")).toBe("set it to 21.5 degrees");
    expect(normalizeForNlu("Set temperature to 21.")).toBe("set temperature to 21");
  });
});

describe("extractEntities", () => {
  it("extracts an absolute temperature", () => {
    expect(entities("Set temperature to 21")).toEqual({ temperature: 21 });
  });

  it("extracts a temperature with a zone", () => {
    expect(entities("set the passenger side to 20 degrees")).toEqual({ temperature: 20, zone: "passenger" });
  });

  it("extracts relative temperature changes", () => {
    expect(entities("make it warmer")).toEqual({ temperature_change: "up" });
    expect(entities("a bit cooler please")).toEqual({ temperature_change: "down" });
  });

  it("extracts fan speed and defrost mode", () => {
    expect(entities("set fan speed to 3")).toEqual({ fan_speed: 3 });
    expect(entities("defrost the windshield")).toEqual({ climate_mode: "defrost" });
  });

  it("extracts a destination without filler words", () => {
    expect(entities("Navigate to the airport please")).toEqual({ destination: "airport" });
    expect(entities("take me to 42 elm street")).toEqual({ destination: "42 elm street" });
  });

  it("extracts media actions, sources and volume", () => {
    expect(entities("play spotify")).toEqual({ media_action: "play", media_source: "spotify" });
    expect(entities("volume to 30 percent")).toEqual({ volume: 30 });
    expect(entities("turn it up")).toEqual({ volume_change: "up" });
    expect(entities("skip this song")).toEqual({ media_action: "next" });
  });

  it("does not read 'stop listening' as a media command", () => {
    expect(entities("stop listening")).toEqual({});
  });

  it("extracts a contact", () => {
    expect(entities("call mom please")).toEqual({ contact: "mom" });
  });

  it("extracts settings", () => {
    expect(entities("switch to night mode")).toEqual({ setting_name: "display_mode", setting_value: "night" });
    expect(entities("turn off the seat heater")).toEqual({ setting_name: "seat_heater", setting_value: false });
  });
});
