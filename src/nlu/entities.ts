/**
 * Regex entity extraction over normalized utterances.
 * Each extractor contributes at most one entity; values are typed (numbers stay numbers).
 */

export type EntityValue = string | number | boolean;
export type Entities = Record<string, EntityValue>;

/** Lowercase, keep digits/decimal points/apostrophes/percent, collapse whitespace. */
export function normalizeForNlu(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9.'%\s]/g, " ")
    .replace(/\.(?!\d)/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

const FILLER_TAIL = /\s+(?:please|thanks|thank you|now)$/;

function cleanPhrase(raw: string): string {
  let s = raw.trim();
  while (FILLER_TAIL.test(s)) s = s.replace(FILLER_TAIL, "");
  return s;
}

type Extractor = (text: string, found: Entities) => void;

const MEDIA_ACTIONS: Record<string, string> = {
  play: "play",
  resume: "play",
  pause: "pause",
  stop: "stop",
  skip: "next",
  next: "next",
  previous: "previous",
  mute: "mute",
  unmute: "unmute",
};

const extractors: Extractor[] = [
  (text, found) => {
    const m =
      /\b(\d{1,2}(?:\.\d+)?)\s*degrees?\b/.exec(text) ??
      /\b(?:temperature|temp|heat|thermostat)\b\D*?(\d{1,2}(?:\.\d+)?)\b/.exec(text);
    if (m) found.temperature = Number(m[1]);
  },
  (text, found) => {
    if (found.temperature !== undefined) return;
    if (/\b(?:warmer|hotter|heat up|turn up the heat)\b/.test(text)) found.temperature_change = "up";
    else if (/\b(?:cooler|colder|cool down|turn down the heat)\b/.test(text)) found.temperature_change = "down";
  },
  (text, found) => {
    const m = /\bfan(?: speed)?(?: to| at)? (\d)\b/.exec(text);
    if (m) found.fan_speed = Number(m[1]);
  },
  (text, found) => {
    const m = /\b(driver|passenger|rear|back)(?:'s)? (?:side|seat|seats|zone)\b/.exec(text);
    if (m) found.zone = m[1] === "back" ? "rear" : m[1];
  },
  (text, found) => {
    if (/\bdefrost(?:er)?\b/.test(text)) found.climate_mode = "defrost";
  },
  (text, found) => {
    const m = /\b(?:navigate|directions|take me|drive|go|get me|route me)(?: to| towards)(?: the)? (.+)$/.exec(text);
    if (m) {
      const destination = cleanPhrase(m[1]);
      if (destination) found.destination = destination;
    }
  },
  (text, found) => {
    const m = /\bvolume(?: to| at)? (\d{1,3})(?:%| percent)?\b/.exec(text);
    if (m) found.volume = Math.min(100, Number(m[1]));
  },
  (text, found) => {
    if (found.volume !== undefined) return;
    if (/\b(?:louder|turn it up|volume up|turn up the volume)\b/.test(text)) found.volume_change = "up";
    else if (/\b(?:quieter|turn it down|volume down|turn down the volume)\b/.test(text)) found.volume_change = "down";
  },
  (text, found) => {
    const m = /\b(play|resume|pause|stop|skip|next|previous|mute|unmute)\b/.exec(text);
    if (m && !/\bstop listening\b/.test(text)) found.media_action = MEDIA_ACTIONS[m[1]] ?? m[1];
  },
  (text, found) => {
    const m = /\b(radio|bluetooth|spotify|usb|podcasts?)\b/.exec(text);
    if (m) found.media_source = m[1].startsWith("podcast") ? "podcast" : m[1];
  },
  (text, found) => {
    const m = /\b(?:call|dial|ring|phone)(?: up)? (.+)$/.exec(text);
    if (m) {
      const contact = cleanPhrase(m[1]);
      if (contact) found.contact = contact;
    }
  },
  (text, found) => {
    const mode = /\b(night|day) mode\b/.exec(text);
    if (mode) {
      found.setting_name = "display_mode";
      found.setting_value = mode[1];
      return;
    }
    const m = /\bturn (on|off)(?: the)? ([a-z ]+?)$/.exec(text) ?? /\bturn(?: the)? ([a-z ]+?) (on|off)$/.exec(text);
    if (!m) return;
    const [name, state] = m[1] === "on" || m[1] === "off" ? [m[2], m[1]] : [m[1], m[2]];
    const settingName = cleanPhrase(name).replace(/\s+/g, "_");
    if (settingName) {
      found.setting_name = settingName;
      found.setting_value = state === "on";
    }
  },
];

export function extractEntities(normalized: string): Entities {
  const found: Entities = {};
  for (const extract of extractors) extract(normalized, found);
  return found;
}
