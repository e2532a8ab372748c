export type TimingErrorKind =
  | "UnknownBlockKind"
  | "OrphanLine"
  | "DuplicateBasicBlock"
  | "UnknownProperty"
  | "InvalidPropertyValue"
  | "InvalidColor"
  | "InvalidSignalValue"
  | "ValueKindMismatch"
  | "MalformedHeader"
  | "MalformedChangeLine"
  | "InvalidRange"
  | "MissingProperty"
  | "IOFailure";

export type NumberedLine = {
  number: number;
  text: string;
};

const DESCRIPTIONS: Record<TimingErrorKind, string> = {
  UnknownBlockKind: 'Unknown block type. Valid types are "time", "style", "clock X", "bus X" and "line X".',
  OrphanLine: "A property or change line encountered outside of a block.",
  DuplicateBasicBlock: "A time or style block may appear only once.",
  UnknownProperty: "Unknown property for this block.",
  InvalidPropertyValue: "The specified property value is not valid.",
  InvalidColor: "The specified property value is not a valid color. Colors must be in the RRGGBB format.",
  InvalidSignalValue: "Invalid signal value.",
  ValueKindMismatch: "The value is not allowed for this kind of signal.",
  MalformedHeader: "Malformed block header.",
  MalformedChangeLine: "Malformed line.",
  InvalidRange: "Value out of range.",
  MissingProperty: "A required property is missing.",
  IOFailure: "I/O failure.",
};

/**
 * The single failure value of the parse/build/render pipeline. `line` and
 * `source` are set whenever the failure can be tied to a source line.
 */
export class TimingError extends Error {
  readonly kind: TimingErrorKind;
  readonly line?: number;
  readonly source?: string;
  readonly detail: string;

  constructor(kind: TimingErrorKind, detail?: string, at?: NumberedLine, options?: { cause?: unknown }) {
    const text = detail ?? DESCRIPTIONS[kind];
    super(at ? `${text}\nLine ${at.number}: ${at.text}` : text, options);
    this.name = "TimingError";
    this.kind = kind;
    this.detail = text;
    if (at) {
      this.line = at.number;
      this.source = at.text;
    }
  }
}

export function fail(kind: TimingErrorKind, at?: NumberedLine, detail?: string): never {
  throw new TimingError(kind, detail, at);
}

export function isTimingError(e: unknown): e is TimingError {
  return e instanceof TimingError;
}
