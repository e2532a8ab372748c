import { describe, it, expect } from "vitest";
import { TimingError } from "../errors.js";
import { defaultRenderRules, mergeRules, parseRules } from "../rules.js";

describe("mergeRules", () => {
  it("returns the defaults without a rules document", () => {
    expect(mergeRules()).toEqual(defaultRenderRules);
    expect(mergeRules({ layout: {} })).toEqual(defaultRenderRules);
  });

  it("overrides individual settings", () => {
    const rules = mergeRules({ render: { char_width: "0.5", signal_width: 3, levels: { high: 0.2 } } });
    expect(rules.char_width).toBe(0.5);
    expect(rules.signal_width).toBe(3);
    expect(rules.levels).toEqual({ high: 0.2, low: 0.7 });
    expect(rules.line_height).toBe(1.2);
  });

  it("ignores malformed entries", () => {
    const rules = mergeRules({
      render: { char_width: -1, frame_width: "thick", levels: { high: 0.9, low: 0.1 }, dash: ["x"], unknown_fill: "grey" },
    });
    expect(rules.char_width).toBe(0.6);
    expect(rules.frame_width).toBe(1);
    expect(rules.levels).toEqual({ high: 0.3, low: 0.7 });
    expect(rules.dash).toEqual([4, 4]);
    expect(rules.unknown_fill).toBe(0x808080);
  });
});

describe("parseRules", () => {
  it("reads YAML", () => {
    const rules = parseRules("render:\n  unknown_fill: '#aabbcc'\n  dash: [2, 3]\n  text_row: 1.5\n");
    expect(rules.unknown_fill).toBe(0xaabbcc);
    expect(rules.dash).toEqual([2, 3]);
    expect(rules.text_row).toBe(1.5);
  });

  it("reports broken YAML as a TimingError", () => {
    expect(() => parseRules("render: [")).toThrow(TimingError);
  });
});
