import { pathToFileURL } from "url";
import { XMLBuilder } from "fast-xml-parser";
import type { DrawOp, DrawResult } from "./draw.js";
import { TimingError, isTimingError } from "./errors.js";
import { isRecord, readText, writeText } from "./util.js";

type XmlNode = {
  [tag: string]: XmlNode[] | Record<string, string> | string;
};

function num(n: number): string {
  return String(Math.round(n * 100) / 100);
}

function el(tag: string, attrs: Record<string, string>, children: XmlNode[] = []): XmlNode {
  const prefixed: Record<string, string> = {};
  for (const [k, v] of Object.entries(attrs)) prefixed[`@_${k}`] = v;
  return { [tag]: children, ":@": prefixed };
}

function opNode(op: DrawOp): XmlNode {
  switch (op.op) {
    case "line": {
      const attrs: Record<string, string> = {
        x1: num(op.x1),
        y1: num(op.y1),
        x2: num(op.x2),
        y2: num(op.y2),
        stroke: op.color,
        "stroke-width": num(op.width),
      };
      if (op.dash && op.dash.length > 0) attrs["stroke-dasharray"] = op.dash.map(num).join(" ");
      return el("line", attrs);
    }
    case "polygon":
      return el("polygon", {
        points: op.points.map((p) => `${num(p.x)},${num(p.y)}`).join(" "),
        fill: op.fill ?? "none",
        stroke: op.stroke ?? "none",
        "stroke-width": num(op.strokeWidth),
      });
    case "text":
      return el(
        "text",
        {
          x: num(op.x),
          y: num(op.y),
          "font-family": op.fontFamily,
          "font-size": num(op.fontSize),
          fill: op.color,
          "text-anchor": op.anchor,
          "dominant-baseline": "middle",
          "xml:space": "preserve",
        },
        [{ "#text": op.text }],
      );
  }
}

export function renderSvg(result: DrawResult): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    suppressEmptyNode: true,
    format: true,
  });
  const background = el("rect", {
    x: "0",
    y: "0",
    width: num(result.width),
    height: num(result.height),
    fill: result.background,
  });
  const svg = el(
    "svg",
    {
      xmlns: "http://www.w3.org/2000/svg",
      width: num(result.width),
      height: num(result.height),
      viewBox: `0 0 ${num(result.width)} ${num(result.height)}`,
    },
    [background, ...result.ops.map(opNode)],
  );
  return `<?xml version="1.0" encoding="UTF-8"?>\n${builder.build([svg])}`;
}

const OP_KINDS = new Set(["line", "polygon", "text"]);

export function parseDrawResult(text: string): DrawResult {
  const raw: unknown = JSON.parse(text);
  if (
    !isRecord(raw) ||
    typeof raw.width !== "number" ||
    typeof raw.height !== "number" ||
    typeof raw.background !== "string" ||
    !Array.isArray(raw.ops)
  ) {
    throw new TimingError("InvalidPropertyValue", "Not a draw result: expected width, height, background and ops.");
  }
  const ops: DrawOp[] = [];
  for (const op of raw.ops) {
    if (!isDrawOp(op)) throw new TimingError("InvalidPropertyValue", "Not a draw result: unknown draw operation.");
    ops.push(op);
  }
  return { width: raw.width, height: raw.height, background: raw.background, ops };
}

function isDrawOp(v: unknown): v is DrawOp {
  if (!isRecord(v) || typeof v.op !== "string" || !OP_KINDS.has(v.op)) return false;
  if (v.op === "line") return ["x1", "y1", "x2", "y2", "width"].every((k) => typeof v[k] === "number");
  if (v.op === "polygon") return Array.isArray(v.points) && typeof v.strokeWidth === "number";
  return typeof v.text === "string" && typeof v.x === "number" && typeof v.y === "number";
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  try {
    writeText(output, renderSvg(parseDrawResult(readText(input))));
  } catch (e) {
    console.error(isTimingError(e) ? e.message : e);
    process.exit(1);
  }
}
