import { type NumberedLine, fail } from "./errors.js";
import { FLOATING, ONE, UNKNOWN, type Value, ZERO, data } from "./model.js";

export type PropertyLine = {
  type: "property";
  key: string;
  value: string;
  line: NumberedLine;
};

export type ChangeLine = {
  type: "change";
  time: number;
  value: string;
  line: NumberedLine;
};

export type ParsedLine = PropertyLine | ChangeLine;

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const COLOR_RE = /^[0-9a-f]{6}$/i;

/**
 * Splits a property (`key = value`) or change (`time -> value`) line. When
 * both operators are allowed the one that appears first wins, so quoted bus
 * values may contain the other operator.
 */
export function splitLine(line: NumberedLine, allowChange: boolean): ParsedLine {
  const eq = line.text.indexOf("=");
  const arrow = allowChange ? line.text.indexOf("->") : -1;
  if (eq < 0 && arrow < 0) fail("MalformedChangeLine", line);

  if (arrow >= 0 && (eq < 0 || arrow < eq)) {
    const lhs = line.text.slice(0, arrow).trim();
    const value = line.text.slice(arrow + 2).trim();
    if (!INT_RE.test(lhs)) fail("MalformedChangeLine", line, "A change time must be an integer.");
    return { type: "change", time: Number(lhs), value, line };
  }

  const key = line.text.slice(0, eq).trim();
  const value = line.text.slice(eq + 1).trim();
  if (key.length === 0 || /\s/.test(key)) fail("UnknownProperty", line);
  return { type: "property", key, value, line };
}

export function parseIntValue(raw: string, line: NumberedLine): number {
  if (!INT_RE.test(raw)) fail("InvalidPropertyValue", line, "The specified property value is not a valid integer.");
  const n = Number(raw);
  if (!Number.isSafeInteger(n)) fail("InvalidPropertyValue", line, "The specified property value is out of the integer range.");
  return n;
}

export function parseFloatValue(raw: string, line: NumberedLine): number {
  if (!FLOAT_RE.test(raw)) fail("InvalidPropertyValue", line, "The specified property value is not a valid number.");
  return Number(raw);
}

export function parseColorValue(raw: string, line: NumberedLine): number {
  if (!COLOR_RE.test(raw)) fail("InvalidColor", line);
  return parseInt(raw, 16);
}

/**
 * Reads a double-quoted bus string. Only `\"` and `\\` are accepted escapes.
 * Returns undefined for anything that is not a well-formed quoted string.
 */
export function unquote(raw: string): string | undefined {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return undefined;
  let out = "";
  for (let i = 1; i < raw.length - 1; i += 1) {
    const ch = raw[i];
    if (ch === '"') return undefined;
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    const next = raw[i + 1];
    if (i + 1 >= raw.length - 1 || (next !== '"' && next !== "\\")) return undefined;
    out += next;
    i += 1;
  }
  return out;
}

export function quote(text: string): string {
  return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function parseSignalValue(raw: string, kind: "line" | "bus", line: NumberedLine): Value {
  if (raw === "?") return UNKNOWN;
  if (raw === "Z") return FLOATING;
  if (kind === "line") {
    if (raw === "0") return ZERO;
    if (raw === "1") return ONE;
    if (raw.startsWith('"')) fail("ValueKindMismatch", line, "Line signals cannot take string values.");
    fail("InvalidSignalValue", line, "Invalid signal value for a line signal. Accepted values are 0, 1, Z (float) and ? (unknown).");
  }
  if (raw === "0" || raw === "1") fail("ValueKindMismatch", line, "Bus signals cannot take the values 0 or 1.");
  const text = unquote(raw);
  if (text === undefined) {
    fail("InvalidSignalValue", line, "Invalid signal value for a bus signal. Accepted values are Z (float), ? (unknown) or a quoted string.");
  }
  return data(text);
}
