import type { LabelSegment } from "./model.js";

const OVERLINE_MARK = "!";

function markedSegment(part: string): LabelSegment {
  if (part.startsWith(OVERLINE_MARK)) {
    return Object.freeze({ text: part.slice(OVERLINE_MARK.length), overlined: true });
  }
  return Object.freeze({ text: part, overlined: false });
}

function plainSegment(part: string): LabelSegment {
  return Object.freeze({ text: part, overlined: false });
}

/**
 * Splits a signal label on `/`. Only the first two parts honour the leading
 * `!` overline marker; the third and later parts are always shown verbatim.
 * This asymmetry is part of the label language and is kept on purpose.
 *
 *   "!AB/CD"      -> AB (overlined), CD
 *   "!AB/!CD/!EF" -> AB (overlined), CD (overlined), !EF
 */
export function segmentLabel(raw: string): readonly LabelSegment[] {
  const [first, second, ...rest] = raw.split("/");
  const out: LabelSegment[] = [markedSegment(first)];
  if (second !== undefined) out.push(markedSegment(second));
  for (const part of rest) out.push(plainSegment(part));
  return Object.freeze(out);
}

export function labelDisplayText(segments: readonly LabelSegment[]): string {
  return segments.map((s) => s.text).join("/");
}
