import { pathToFileURL } from "url";
import { splitBlocks } from "./blocks.js";
import { buildDiagram } from "./diagram_build.js";
import { isTimingError } from "./errors.js";
import type { Diagram } from "./model.js";
import { readText, writeText } from "./util.js";

export function parseTimingDescription(text: string): Diagram {
  return buildDiagram(splitBlocks(text));
}

export { TimingError, isTimingError } from "./errors.js";
export type { TimingErrorKind } from "./errors.js";
export * from "./model.js";
export { serializeDiagram } from "./serialize.js";
export { resolveTimeline } from "./timeline.js";
export { layoutDiagram } from "./layout.js";
export { drawDiagram, type DrawOp, type DrawResult } from "./draw.js";
export { renderSvg } from "./render_svg.js";

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  const input = process.argv[2];
  const output = process.argv[3];
  if (!input || !output) {
    console.error("Usage: node dist/timing_parse.js <in.dt> <out.json>");
    process.exit(1);
  }
  try {
    const diagram = parseTimingDescription(readText(input));
    writeText(output, JSON.stringify(diagram, null, 2));
    console.error(`timing_parse: signals=${diagram.signals.length}`);
  } catch (e) {
    console.error(isTimingError(e) ? `${e.kind}: ${e.message}` : e);
    process.exit(1);
  }
}
