import fs from "fs";
import path from "path";
import { type SpawnSyncOptions, spawnSync } from "child_process";
import { pathToFileURL } from "url";
import { TimingError, isTimingError } from "./errors.js";

export type SpawnFn = (
  command: string,
  args: string[],
  options: SpawnSyncOptions,
) => { status: number | null; error?: Error };

export const INKSCAPE_FORMATS: ReadonlySet<string> = new Set([".pdf", ".png", ".eps", ".ps", ".emf"]);

function buildArgs(svg: string, out: string): string[] {
  return ["--export-area-page", `--export-filename=${out}`, svg];
}

function ioFailure(message: string): TimingError {
  return new TimingError("IOFailure", message);
}

export function defaultInkscapeBin(): string {
  const bin = process.env.INKSCAPE_BIN;
  return bin && bin.trim().length > 0 ? bin : "inkscape";
}

/** Converts an SVG file with Inkscape; the format follows the output extension. */
export function exportImage(svg: string, out: string, inkscapeBin = defaultInkscapeBin(), spawn: SpawnFn = spawnSync): void {
  const ext = path.extname(out).toLowerCase();
  if (!INKSCAPE_FORMATS.has(ext)) {
    throw ioFailure(`Unsupported output format '${ext || out}'. Use .svg or one of ${[...INKSCAPE_FORMATS].join(", ")}.`);
  }
  if (!fs.existsSync(svg)) {
    throw ioFailure(`SVG input not found: ${svg}`);
  }
  const res = spawn(inkscapeBin, buildArgs(svg, out), {
    stdio: "inherit",
  });

  if (res.error) {
    const code = "code" in res.error ? res.error.code : undefined;
    if (code === "ENOENT") {
      throw ioFailure(`Inkscape not found ('${inkscapeBin}'). Install Inkscape or set INKSCAPE_BIN to the executable path.`);
    }
    throw ioFailure(`Failed to launch Inkscape ('${inkscapeBin}'): ${res.error.message}`);
  }
  if (res.status !== 0) {
    throw ioFailure(`Inkscape export failed with exit code ${res.status}`);
  }
  if (!fs.existsSync(out)) {
    throw ioFailure(`Inkscape reported success but ${out} was not created`);
  }
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const svg = process.argv[2];
  const out = process.argv[3];
  try {
    exportImage(svg, out);
  } catch (e) {
    console.error(isTimingError(e) ? e.message : String(e));
    process.exit(1);
  }
}
