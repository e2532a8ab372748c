/**
 * Tests for timing_parse.ts and diagram_build.ts
 */

import fs from "fs";
import { fileURLToPath } from "url";
import { describe, it, expect } from "vitest";
import { TimingError, parseTimingDescription } from "../timing_parse.js";
import { serializeDiagram } from "../serialize.js";

const fixture = (name: string): string => fs.readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), "utf8");

function errorOf(src: string): TimingError {
  try {
    parseTimingDescription(src);
  } catch (e) {
    if (e instanceof TimingError) return e;
    throw e;
  }
  throw new Error("expected a TimingError");
}

describe("parseTimingDescription", () => {
  it("applies defaults to an empty source", () => {
    const d = parseTimingDescription("");
    expect(d.time).toEqual({ start: 0, end: 100, step: null, delay: 10 });
    expect(d.style).toEqual({
      width: 800,
      height: 600,
      margin: 10,
      font_size: 12,
      font_family: "Times New Roman",
      background: 0xffffff,
      foreground: 0x000000,
    });
    expect(d.signals).toEqual([]);
  });

  it("parses the basic line scenario", () => {
    const d = parseTimingDescription("time:\nstart=0\nend=200\nline A:\nstart=0\n100->1\n150->Z");
    expect(d.time.end).toBe(200);
    expect(d.signals).toHaveLength(1);
    expect(d.signals[0]).toEqual({
      kind: "line",
      name: "A",
      label: [{ text: "A", overlined: false }],
      start: { kind: "zero" },
      changes: [
        { time: 100, value: { kind: "one" } },
        { time: 150, value: { kind: "floating" } },
      ],
    });
  });

  it("keeps signals in file order around basic blocks", () => {
    const d = parseTimingDescription("bus B:\nline A:\nstyle:\nwidth = 640\nclock C:\nlength = 10");
    expect(d.signals.map((s) => `${s.kind}:${s.name}`)).toEqual(["bus:B", "line:A", "clock:C"]);
    expect(d.style.width).toBe(640);
  });

  it("defaults the start value of lines and buses to unknown", () => {
    const d = parseTimingDescription("line A:\nbus B:\n5 -> \"x\"");
    expect(d.signals[0]).toMatchObject({ start: { kind: "unknown" }, changes: [] });
    expect(d.signals[1]).toMatchObject({ start: { kind: "unknown" } });
  });

  it("applies clock defaults for duty and offset", () => {
    const d = parseTimingDescription("clock CLK:\nlength = 8");
    expect(d.signals[0]).toEqual({
      kind: "clock",
      name: "CLK",
      label: [{ text: "CLK", overlined: false }],
      length: 8,
      duty: 0.5,
      offset: 0,
    });
  });

  it("lets a repeated property overwrite the earlier one", () => {
    const d = parseTimingDescription("style:\nwidth = 300\nwidth = 500\nline A:\nstart = 0\nstart = 1");
    expect(d.style.width).toBe(500);
    expect(d.signals[0]).toMatchObject({ start: { kind: "one" } });
  });

  it("keeps duplicate change times as declared", () => {
    const d = parseTimingDescription("line A:\n20 -> 1\n10 -> 0\n20 -> Z");
    expect(d.signals[0]).toMatchObject({
      changes: [
        { time: 20, value: { kind: "one" } },
        { time: 10, value: { kind: "zero" } },
        { time: 20, value: { kind: "floating" } },
      ],
    });
  });

  it("clears the step with none", () => {
    expect(parseTimingDescription("time:\nstep = 10\nstep = none").time.step).toBeNull();
  });

  it("segments labels at parse time", () => {
    const d = parseTimingDescription("line !WE/OE:\nstart = 1");
    expect(d.signals[0].label).toEqual([
      { text: "WE", overlined: true },
      { text: "OE", overlined: false },
    ]);
  });

  it("returns a frozen model", () => {
    const d = parseTimingDescription("line A:\n1 -> 1");
    expect(Object.isFrozen(d)).toBe(true);
    expect(Object.isFrozen(d.time)).toBe(true);
    expect(Object.isFrozen(d.signals)).toBe(true);
    expect(Object.isFrozen(d.signals[0])).toBe(true);
  });

  it("reads the handshake example", () => {
    const d = parseTimingDescription(fixture("handshake.dt"));
    expect(d.time).toEqual({ start: 0, end: 160, step: 20, delay: 4 });
    expect(d.style.font_family).toBe("Helvetica");
    expect(d.style.foreground).toBe(0x1a1a1a);
    expect(d.signals.map((s) => s.name)).toEqual(["CLK", "!RST", "REQ", "!ACK/READY", "DATA"]);
  });
});

describe("parse errors", () => {
  it("reports a bus signal given a line value", () => {
    const e = errorOf("bus X:\n0->1");
    expect(e.kind).toBe("ValueKindMismatch");
    expect(e.line).toBe(2);
    expect(e.source).toBe("0->1");
  });

  it("reports a line signal given a string", () => {
    expect(errorOf('line A:\n5 -> "hi"').kind).toBe("ValueKindMismatch");
  });

  it("reports invalid signal values", () => {
    expect(errorOf("line A:\nstart = 2").kind).toBe("InvalidSignalValue");
    expect(errorOf('bus B:\n0 -> "a\\n"').kind).toBe("InvalidSignalValue");
  });

  it("reports a second time or style block", () => {
    const e = errorOf("time:\nstart = 0\ntime:\nend = 5");
    expect(e.kind).toBe("DuplicateBasicBlock");
    expect(e.line).toBe(3);
    expect(errorOf("style:\nstyle:").kind).toBe("DuplicateBasicBlock");
  });

  it("reports unknown properties per block kind", () => {
    expect(errorOf("style:\ncolour = 000000").kind).toBe("UnknownProperty");
    expect(errorOf("time:\nwidth = 10").kind).toBe("UnknownProperty");
    expect(errorOf("line A:\nlength = 10").kind).toBe("UnknownProperty");
    expect(errorOf("clock C:\nstart = 0").kind).toBe("UnknownProperty");
    expect(errorOf("time:\ntoString = 1").kind).toBe("UnknownProperty");
  });

  it("reports bad property values", () => {
    expect(errorOf("style:\nwidth = wide").kind).toBe("InvalidPropertyValue");
    expect(errorOf("clock C:\nlength = 10\nduty = half").kind).toBe("InvalidPropertyValue");
    expect(errorOf("style:\nfont_family =").kind).toBe("InvalidPropertyValue");
  });

  it("reports bad colors", () => {
    const e = errorOf("style:\nbackground = fff");
    expect(e.kind).toBe("InvalidColor");
    expect(e.message).toBe("The specified property value is not a valid color. Colors must be in the RRGGBB format.\nLine 2: background = fff");
  });

  it("reports malformed headers and change lines", () => {
    expect(errorOf("time extra:").kind).toBe("MalformedHeader");
    expect(errorOf("line:").kind).toBe("MalformedHeader");
    expect(errorOf("line A:\nabc -> 1").kind).toBe("MalformedChangeLine");
    expect(errorOf("line A:\njust words").kind).toBe("MalformedChangeLine");
    expect(errorOf("clock C:\nlength = 4\n5 -> 1").kind).toBe("MalformedChangeLine");
  });

  it("reports unknown block kinds and orphan lines", () => {
    expect(errorOf("wire A:\n").kind).toBe("UnknownBlockKind");
    expect(errorOf("start = 0").kind).toBe("OrphanLine");
  });

  it("reports ranges at the offending property", () => {
    const e = errorOf("time:\nstart = 10\nend = 10");
    expect(e.kind).toBe("InvalidRange");
    expect(e.line).toBe(3);
    expect(errorOf("time:\nstart = 200").line).toBe(2);
    expect(errorOf("time:\ndelay = -1").kind).toBe("InvalidRange");
    expect(errorOf("time:\nstep = 0").kind).toBe("InvalidRange");
    expect(errorOf("style:\nwidth = 0").kind).toBe("InvalidRange");
    expect(errorOf("style:\nheight = -5").kind).toBe("InvalidRange");
    expect(errorOf("style:\nfont_size = 0").kind).toBe("InvalidRange");
    expect(errorOf("style:\nmargin = 301").kind).toBe("InvalidRange");
    expect(errorOf("clock C:\nlength = 0").kind).toBe("InvalidRange");
  });

  it("rejects duty cycles outside (0, 1)", () => {
    for (const duty of ["0", "1", "1.5", "-0.2"]) {
      const e = errorOf(`clock C:\nlength = 10\nduty = ${duty}`);
      expect(e.kind).toBe("InvalidRange");
      expect(e.line).toBe(3);
    }
  });

  it("requires a clock length", () => {
    const e = errorOf("line A:\nclock C:\nduty = 0.5");
    expect(e.kind).toBe("MissingProperty");
    expect(e.line).toBe(2);
  });

  it("stops at the first error", () => {
    expect(errorOf("wire A:\nstyle:\nwidth = wide").kind).toBe("UnknownBlockKind");
  });
});

describe("serializeDiagram", () => {
  it("round-trips the handshake example", () => {
    const d = parseTimingDescription(fixture("handshake.dt"));
    expect(parseTimingDescription(serializeDiagram(d))).toEqual(d);
  });

  it("round-trips awkward labels and bus strings", () => {
    const src = [
      "time:",
      "start = -20",
      "end = 40",
      "line a:b/!c:",
      "start = ?",
      "-5 -> 1",
      "bus !Q/R/!S:",
      'start = "say \\"hi\\" \\\\"',
      '3 -> "x=y->z"',
      "clock K:",
      "length = 7",
      "duty = 0.3",
      "offset = -2",
    ].join("\n");
    const d = parseTimingDescription(src);
    expect(d.signals[1]).toMatchObject({ start: { kind: "data", text: 'say "hi" \\' } });
    expect(parseTimingDescription(serializeDiagram(d))).toEqual(d);
  });

  it("writes the block grammar", () => {
    const d = parseTimingDescription("line A:\nstart = 0\n10 -> 1");
    expect(serializeDiagram(d)).toBe(
      [
        "time:",
        "start = 0",
        "end = 100",
        "step = none",
        "delay = 10",
        "",
        "style:",
        "width = 800",
        "height = 600",
        "margin = 10",
        "font_size = 12",
        "font_family = Times New Roman",
        "background = FFFFFF",
        "foreground = 000000",
        "",
        "line A:",
        "start = 0",
        "10 -> 1",
        "",
      ].join("\n"),
    );
  });
});
