import { type NumberedLine, fail } from "./errors.js";

export type BasicBlockKind = "time" | "style";
export type SignalBlockKind = "line" | "bus" | "clock";
export type BlockKind = BasicBlockKind | SignalBlockKind;

export type RawBlock = {
  kind: BlockKind;
  label: string | null;
  header: NumberedLine;
  lines: NumberedLine[];
};

const BASIC_KINDS: ReadonlySet<string> = new Set<BasicBlockKind>(["time", "style"]);
const SIGNAL_KINDS: ReadonlySet<string> = new Set<SignalBlockKind>(["line", "bus", "clock"]);

function isBlockKind(s: string): s is BlockKind {
  return BASIC_KINDS.has(s) || SIGNAL_KINDS.has(s);
}

export function isSignalKind(kind: BlockKind): kind is SignalBlockKind {
  return SIGNAL_KINDS.has(kind);
}

/** Trimmed, numbered source lines with blanks and `#` comments dropped. */
export function* numberedLines(text: string): Generator<NumberedLine> {
  const lines = text.split(/\r\n|\r|\n/);
  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i].trim();
    if (line.length === 0 || line.startsWith("#")) continue;
    yield { number: i + 1, text: line };
  }
}

export function isHeaderLine(line: NumberedLine): boolean {
  return line.text.endsWith(":");
}

export function parseHeader(line: NumberedLine): { kind: BlockKind; label: string | null } {
  const body = line.text.slice(0, line.text.lastIndexOf(":"));
  const m = body.match(/^(\S+)(?:\s+([\s\S]*))?$/);
  if (!m) fail("MalformedHeader", line, "A colon encountered without a block keyword.");
  const ident = m[1];
  const label = (m[2] ?? "").trim();
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(ident) || !isBlockKind(ident)) {
    fail("UnknownBlockKind", line);
  }
  if (isSignalKind(ident)) {
    if (label.length === 0) fail("MalformedHeader", line, "A signal block must have a name argument.");
    return { kind: ident, label };
  }
  if (label.length > 0) fail("MalformedHeader", line, `A ${ident} block must have no arguments.`);
  return { kind: ident, label: null };
}

export function splitBlocks(text: string): RawBlock[] {
  const blocks: RawBlock[] = [];
  let current: RawBlock | undefined;
  for (const line of numberedLines(text)) {
    if (isHeaderLine(line)) {
      const { kind, label } = parseHeader(line);
      current = { kind, label, header: line, lines: [] };
      blocks.push(current);
    } else {
      if (!current) fail("OrphanLine", line);
      current.lines.push(line);
    }
  }
  return blocks;
}
