import fs from "fs";
import os from "os";
import path from "path";
import type { DrawResult } from "./draw.js";
import { type SpawnFn, exportImage } from "./export_image.js";
import { renderSvg } from "./render_svg.js";
import { makeTempDir, writeText } from "./util.js";

export type SurfaceOptions = {
  inkscapeBin?: string;
  spawn?: SpawnFn;
};

/**
 * Writes a draw result to `out`. SVG is written directly; any other
 * extension goes through a temporary SVG and Inkscape.
 */
export function writeSurface(result: DrawResult, out: string, opts: SurfaceOptions = {}): void {
  const svg = renderSvg(result);
  if (path.extname(out).toLowerCase() === ".svg") {
    writeText(out, svg);
    return;
  }
  const dir = makeTempDir(path.join(os.tmpdir(), "timechart-"));
  try {
    const tmp = path.join(dir, "diagram.svg");
    writeText(tmp, svg);
    exportImage(tmp, out, opts.inkscapeBin, opts.spawn);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
