#!/usr/bin/env node
import { drawDiagram } from "./draw.js";
import { isTimingError } from "./errors.js";
import { loadRules } from "./rules.js";
import { writeSurface } from "./surface.js";
import { parseTimingDescription } from "./timing_parse.js";
import { readText, writeText } from "./util.js";

async function main() {
  const [sourcePath, outPath, rulesPath, outJson] = process.argv.slice(2);
  if (!sourcePath || !outPath) {
    console.error("Usage: timechart <in.dt> <out.svg|out.pdf|out.png> [rules.yaml] [out.json]");
    process.exit(1);
  }
  const diagram = parseTimingDescription(readText(sourcePath));
  const rules = loadRules(rulesPath || undefined);
  const result = drawDiagram(diagram, rules);
  writeSurface(result, outPath);
  if (outJson) writeText(outJson, JSON.stringify(result, null, 2));
  console.error(`timechart: signals=${diagram.signals.length} ops=${result.ops.length} -> ${outPath}`);
}

main().catch((e: unknown) => {
  if (isTimingError(e)) {
    console.error(`${e.kind}: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
