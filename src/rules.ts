import yaml from "js-yaml";
import { pathToFileURL } from "url";
import { TimingError, isTimingError } from "./errors.js";
import { asNum, isRecord, readText, writeText } from "./util.js";

export type RenderRules = {
  char_width: number;
  line_height: number;
  text_row: number;
  levels: { high: number; low: number };
  signal_width: number;
  frame_width: number;
  dash: number[];
  unknown_fill: number;
};

export const defaultRenderRules: Readonly<RenderRules> = Object.freeze({
  char_width: 0.6,
  line_height: 1.2,
  text_row: 1.2,
  levels: Object.freeze({ high: 0.3, low: 0.7 }),
  signal_width: 2,
  frame_width: 1,
  dash: [4, 4],
  unknown_fill: 0x808080,
});

function asColor(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 0xffffff) return v;
  if (typeof v === "string" && /^#?[0-9a-f]{6}$/i.test(v.trim())) return parseInt(v.trim().replace(/^#/, ""), 16);
  return undefined;
}

function asFraction(v: unknown): number | undefined {
  const n = asNum(v);
  return n !== undefined && n >= 0 && n <= 1 ? n : undefined;
}

function asPositive(v: unknown): number | undefined {
  const n = asNum(v);
  return n !== undefined && n > 0 ? n : undefined;
}

/** Merges a loaded rules document over the defaults; malformed entries are ignored. */
export function mergeRules(rules?: unknown): RenderRules {
  const raw = isRecord(rules) && isRecord(rules.render) ? rules.render : {};
  const levels = isRecord(raw.levels) ? raw.levels : {};
  let high = asFraction(levels.high) ?? defaultRenderRules.levels.high;
  let low = asFraction(levels.low) ?? defaultRenderRules.levels.low;
  if (high >= low) {
    high = defaultRenderRules.levels.high;
    low = defaultRenderRules.levels.low;
  }
  const dash = Array.isArray(raw.dash)
    ? raw.dash.map(asPositive).filter((n): n is number => n !== undefined)
    : [...defaultRenderRules.dash];
  return {
    char_width: asPositive(raw.char_width) ?? defaultRenderRules.char_width,
    line_height: asPositive(raw.line_height) ?? defaultRenderRules.line_height,
    text_row: asPositive(raw.text_row) ?? defaultRenderRules.text_row,
    levels: { high, low },
    signal_width: asPositive(raw.signal_width) ?? defaultRenderRules.signal_width,
    frame_width: asPositive(raw.frame_width) ?? defaultRenderRules.frame_width,
    dash: dash.length > 0 ? dash : [...defaultRenderRules.dash],
    unknown_fill: asColor(raw.unknown_fill) ?? defaultRenderRules.unknown_fill,
  };
}

export function parseRules(text: string): RenderRules {
  try {
    return mergeRules(yaml.load(text));
  } catch (e) {
    if (e instanceof yaml.YAMLException) {
      throw new TimingError("InvalidPropertyValue", `Invalid rules file: ${e.message}`, undefined, { cause: e });
    }
    throw e;
  }
}

export function loadRules(path?: string): RenderRules {
  return path ? parseRules(readText(path)) : mergeRules();
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  try {
    const out = JSON.stringify(loadRules(process.argv[2]), null, 2);
    const output = process.argv[3] ?? "-";
    if (output === "-") {
      process.stdout.write(out);
    } else {
      writeText(output, out);
    }
  } catch (e) {
    console.error(isTimingError(e) ? `${e.kind}: ${e.message}` : e);
    process.exit(1);
  }
}
