import { type NumberedLine, fail } from "./errors.js";
import type { RawBlock } from "./blocks.js";
import { segmentLabel } from "./label.js";
import { type ChangeLine, type PropertyLine, parseColorValue, parseFloatValue, parseIntValue, parseSignalValue, splitLine } from "./line_parse.js";
import {
  type Change,
  type ClockSignal,
  DEFAULT_STYLE,
  DEFAULT_TIME,
  type Diagram,
  type Signal,
  type StyleSettings,
  type TimeSettings,
  UNKNOWN,
  type Value,
} from "./model.js";

type PropertyType = "int" | "color" | "string";

const TIME_PROPERTIES: Record<keyof TimeSettings, true> = { start: true, end: true, step: true, delay: true };

const STYLE_PROPERTIES: Record<keyof StyleSettings, PropertyType> = {
  width: "int",
  height: "int",
  margin: "int",
  font_size: "int",
  font_family: "string",
  background: "color",
  foreground: "color",
};

const CLOCK_PROPERTIES = new Set(["length", "duty", "offset"]);

function hasKey<T extends object>(table: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(table, key);
}

function requireRange(ok: boolean, at: NumberedLine, detail: string): void {
  if (!ok) fail("InvalidRange", at, detail);
}

class TimeDraft {
  readonly settings: TimeSettings = { ...DEFAULT_TIME };
  readonly seen = new Map<string, NumberedLine>();

  apply(p: PropertyLine): void {
    const key = p.key;
    if (!hasKey(TIME_PROPERTIES, key)) fail("UnknownProperty", p.line, "Unknown time property.");
    if (key === "step") {
      this.settings.step = p.value === "none" ? null : parseIntValue(p.value, p.line);
    } else {
      this.settings[key] = parseIntValue(p.value, p.line);
    }
    this.seen.set(key, p.line);
  }

  validate(header: NumberedLine): void {
    const t = this.settings;
    const at = (key: string): NumberedLine => this.seen.get(key) ?? header;
    requireRange(t.end > t.start, at(this.seen.has("end") ? "end" : "start"), "The time end must be greater than the start.");
    requireRange(t.delay >= 0, at("delay"), "The delay must not be negative.");
    requireRange(t.step === null || t.step > 0, at("step"), "The step must be positive.");
  }
}

class StyleDraft {
  readonly settings: StyleSettings = { ...DEFAULT_STYLE };
  readonly seen = new Map<string, NumberedLine>();

  apply(p: PropertyLine): void {
    const key = p.key;
    if (!hasKey(STYLE_PROPERTIES, key)) fail("UnknownProperty", p.line, "Unknown style property.");
    if (key === "font_family") {
      if (p.value.length === 0) fail("InvalidPropertyValue", p.line, "The font family must not be empty.");
      this.settings.font_family = p.value;
    } else if (STYLE_PROPERTIES[key] === "color") {
      this.settings[key] = parseColorValue(p.value, p.line);
    } else {
      this.settings[key] = parseIntValue(p.value, p.line);
    }
    this.seen.set(key, p.line);
  }

  validate(header: NumberedLine): void {
    const s = this.settings;
    const at = (key: string): NumberedLine => this.seen.get(key) ?? header;
    requireRange(s.width > 0, at("width"), "The diagram width must be positive.");
    requireRange(s.height > 0, at("height"), "The diagram height must be positive.");
    requireRange(s.font_size > 0, at("font_size"), "The font size must be positive.");
    requireRange(s.margin >= 0, at("margin"), "The margin must not be negative.");
    requireRange(
      s.margin <= s.width / 2 && s.margin <= s.height / 2,
      at("margin"),
      "The diagram margin must be less than half the width or half the height of the diagram (whichever is less).",
    );
  }
}

function buildClock(block: RawBlock, name: string): ClockSignal {
  const values = new Map<string, { value: number; line: NumberedLine }>();
  for (const line of block.lines) {
    const parsed = splitLine(line, true);
    if (parsed.type === "change") fail("MalformedChangeLine", line, "Clock signals do not support change lines.");
    if (!CLOCK_PROPERTIES.has(parsed.key)) fail("UnknownProperty", line, "Unknown clock property.");
    const value = parsed.key === "duty" ? parseFloatValue(parsed.value, line) : parseIntValue(parsed.value, line);
    values.set(parsed.key, { value, line });
  }
  const length = values.get("length");
  if (!length) fail("MissingProperty", block.header, "A clock signal must have its length specified.");
  const duty = values.get("duty");
  requireRange(length.value > 0, length.line, "The clock length must be positive.");
  if (duty) requireRange(duty.value > 0 && duty.value < 1, duty.line, "Clock duty cycle must be within (0, 1) exclusive.");
  return {
    kind: "clock",
    name,
    label: segmentLabel(name),
    length: length.value,
    duty: duty?.value ?? 0.5,
    offset: values.get("offset")?.value ?? 0,
  };
}

function buildLevelSignal(block: RawBlock, kind: "line" | "bus", name: string): Signal {
  let start: Value = UNKNOWN;
  const changes: Change[] = [];
  for (const line of block.lines) {
    const parsed: PropertyLine | ChangeLine = splitLine(line, true);
    if (parsed.type === "change") {
      changes.push({ time: parsed.time, value: parseSignalValue(parsed.value, kind, line) });
    } else {
      if (parsed.key !== "start") fail("UnknownProperty", line, `Unknown ${kind} property.`);
      start = parseSignalValue(parsed.value, kind, line);
    }
  }
  return { kind, name, label: segmentLabel(name), start, changes };
}

function freezeSignal(s: Signal): Signal {
  if (s.kind !== "clock") {
    for (const c of s.changes) Object.freeze(c);
    Object.freeze(s.changes);
  }
  return Object.freeze(s);
}

/**
 * Folds the raw blocks into a Diagram. Basic blocks may appear at most once
 * and in any position; signals keep their file order.
 */
export function buildDiagram(blocks: RawBlock[]): Diagram {
  const time = new TimeDraft();
  const style = new StyleDraft();
  const headers: Partial<Record<"time" | "style", NumberedLine>> = {};
  const signals: Signal[] = [];

  for (const block of blocks) {
    switch (block.kind) {
      case "time":
      case "style": {
        if (headers[block.kind]) fail("DuplicateBasicBlock", block.header, `Only one ${block.kind} block is allowed.`);
        headers[block.kind] = block.header;
        const draft = block.kind === "time" ? time : style;
        for (const line of block.lines) {
          const parsed = splitLine(line, false);
          if (parsed.type === "property") draft.apply(parsed);
        }
        break;
      }
      case "clock":
        signals.push(freezeSignal(buildClock(block, block.label ?? "")));
        break;
      case "line":
      case "bus":
        signals.push(freezeSignal(buildLevelSignal(block, block.kind, block.label ?? "")));
        break;
    }
  }

  const origin: NumberedLine = { number: 1, text: "" };
  time.validate(headers.time ?? origin);
  style.validate(headers.style ?? origin);

  return Object.freeze({
    time: Object.freeze(time.settings),
    style: Object.freeze(style.settings),
    signals: Object.freeze(signals),
  });
}
