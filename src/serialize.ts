import { quote } from "./line_parse.js";
import type { Diagram, Signal, Value } from "./model.js";

function valueToken(v: Value): string {
  switch (v.kind) {
    case "zero":
      return "0";
    case "one":
      return "1";
    case "unknown":
      return "?";
    case "floating":
      return "Z";
    case "data":
      return quote(v.text);
  }
}

function hex(c: number): string {
  return c.toString(16).padStart(6, "0").toUpperCase();
}

function signalLines(s: Signal): string[] {
  const out = [`${s.kind} ${s.name}:`];
  if (s.kind === "clock") {
    out.push(`length = ${s.length}`, `duty = ${s.duty}`, `offset = ${s.offset}`);
    return out;
  }
  out.push(`start = ${valueToken(s.start)}`);
  for (const c of s.changes) out.push(`${c.time} -> ${valueToken(c.value)}`);
  return out;
}

/**
 * Writes a diagram back in the block language. Parsing the output yields an
 * equivalent diagram; settings equal to their defaults are still written so
 * the text is self-describing.
 */
export function serializeDiagram(diagram: Diagram): string {
  const t = diagram.time;
  const s = diagram.style;
  const lines = [
    "time:",
    `start = ${t.start}`,
    `end = ${t.end}`,
    `step = ${t.step ?? "none"}`,
    `delay = ${t.delay}`,
    "",
    "style:",
    `width = ${s.width}`,
    `height = ${s.height}`,
    `margin = ${s.margin}`,
    `font_size = ${s.font_size}`,
    `font_family = ${s.font_family}`,
    `background = ${hex(s.background)}`,
    `foreground = ${hex(s.foreground)}`,
  ];
  for (const signal of diagram.signals) lines.push("", ...signalLines(signal));
  return `${lines.join("\n")}\n`;
}
