import fs from "fs";
import { TimingError } from "./errors.js";

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function readText(path: string): string {
  try {
    return fs.readFileSync(path, "utf8");
  } catch (e) {
    throw new TimingError("IOFailure", `Cannot read ${path}: ${describe(e)}`, undefined, { cause: e });
  }
}

export function writeText(path: string, data: string): void {
  try {
    fs.writeFileSync(path, data, "utf8");
  } catch (e) {
    throw new TimingError("IOFailure", `Cannot write ${path}: ${describe(e)}`, undefined, { cause: e });
  }
}

/** Creates a fresh directory whose name starts with `prefix`. */
export function makeTempDir(prefix: string): string {
  try {
    return fs.mkdtempSync(prefix);
  } catch (e) {
    throw new TimingError("IOFailure", `Cannot create a temporary directory at ${prefix}: ${describe(e)}`, undefined, { cause: e });
  }
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
