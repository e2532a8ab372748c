export type Rgb = number;

export type Value =
  | { kind: "zero" }
  | { kind: "one" }
  | { kind: "unknown" }
  | { kind: "floating" }
  | { kind: "data"; text: string };

export const ZERO: Value = Object.freeze({ kind: "zero" });
export const ONE: Value = Object.freeze({ kind: "one" });
export const UNKNOWN: Value = Object.freeze({ kind: "unknown" });
export const FLOATING: Value = Object.freeze({ kind: "floating" });

export function data(text: string): Value {
  return Object.freeze({ kind: "data", text });
}

export function sameValue(a: Value, b: Value): boolean {
  if (a.kind !== b.kind) return false;
  return a.kind !== "data" || (b.kind === "data" && a.text === b.text);
}

export type SignalKind = "line" | "bus" | "clock";

export type LabelSegment = {
  readonly text: string;
  readonly overlined: boolean;
};

export type Change = {
  time: number;
  value: Value;
};

export type LineSignal = {
  kind: "line";
  name: string;
  label: readonly LabelSegment[];
  start: Value;
  changes: readonly Change[];
};

export type BusSignal = {
  kind: "bus";
  name: string;
  label: readonly LabelSegment[];
  start: Value;
  changes: readonly Change[];
};

export type ClockSignal = {
  kind: "clock";
  name: string;
  label: readonly LabelSegment[];
  length: number;
  duty: number;
  offset: number;
};

export type Signal = LineSignal | BusSignal | ClockSignal;

/**
 * `start`, `end`, `step` and `delay` are in abstract time units. `step`
 * splits the chart into labelled columns; `delay` is how long a signal takes
 * to complete a value change and only affects drawing.
 */
export type TimeSettings = {
  start: number;
  end: number;
  step: number | null;
  delay: number;
};

export type StyleSettings = {
  width: number;
  height: number;
  margin: number;
  font_size: number;
  font_family: string;
  background: Rgb;
  foreground: Rgb;
};

export type Diagram = {
  time: TimeSettings;
  style: StyleSettings;
  signals: readonly Signal[];
};

export type TimelineEntry = {
  time: number;
  value: Value;
};

export type ResolvedTimeline = TimelineEntry[];

export const DEFAULT_TIME: Readonly<TimeSettings> = Object.freeze({
  start: 0,
  end: 100,
  step: null,
  delay: 10,
});

export const DEFAULT_STYLE: Readonly<StyleSettings> = Object.freeze({
  width: 800,
  height: 600,
  margin: 10,
  font_size: 12,
  font_family: "Times New Roman",
  background: 0xffffff,
  foreground: 0x000000,
});

export function rgbToHex(c: Rgb): string {
  return `#${c.toString(16).padStart(6, "0")}`;
}
