import { fail } from "./errors.js";
import { labelDisplayText } from "./label.js";
import type { Diagram, Signal, StyleSettings } from "./model.js";
import type { RenderRules } from "./rules.js";

export type Point = {
  x: number;
  y: number;
};

export type Rect = {
  x: number;
  y: number;
  w: number;
  h: number;
};

export type Row = {
  signal: Signal;
  band: Rect;
  labelCenter: Point;
};

export type GridColumn = {
  index: number;
  from: number;
  to: number;
  labelCenter: Point;
};

export type AxisLabel = {
  time: number;
  at: Point;
  anchor: "start" | "end";
};

export type Layout = {
  canvas: { width: number; height: number };
  window: { start: number; end: number };
  outer: Rect;
  labels: Rect;
  header: Rect;
  plot: Rect;
  rows: Row[];
  axis: AxisLabel[];
  gridTimes: number[];
  columns: GridColumn[];
  metrics: FontMetrics;
};

export type FontMetrics = {
  charWidth: number;
  textHeight: number;
  rowHeight: number;
};

export function fontMetrics(style: Pick<StyleSettings, "font_size">, rules: RenderRules): FontMetrics {
  const textHeight = style.font_size * rules.line_height;
  return {
    charWidth: style.font_size * rules.char_width,
    textHeight,
    rowHeight: textHeight * rules.text_row,
  };
}

export function textWidth(text: string, metrics: FontMetrics): number {
  return Array.from(text).length * metrics.charWidth;
}

export function right(r: Rect): number {
  return r.x + r.w;
}

export function bottom(r: Rect): number {
  return r.y + r.h;
}

/** Affine map from time to x; not clamped to the plot. */
export function timeToX(layout: Pick<Layout, "plot" | "window">, t: number): number {
  const { start, end } = layout.window;
  return layout.plot.x + ((t - start) / (end - start)) * layout.plot.w;
}

export function timeDeltaToPx(layout: Pick<Layout, "plot" | "window">, dt: number): number {
  return (dt / (layout.window.end - layout.window.start)) * layout.plot.w;
}

/** Multiples of `step` inside [start, end]. */
function gridTimes(start: number, end: number, step: number): number[] {
  const out: number[] = [];
  for (let t = start + (((-start % step) + step) % step); t <= end; t += step) out.push(t);
  return out;
}

/** Column boundaries: the window edges plus every grid line between them. */
function columnBounds(start: number, end: number, times: readonly number[]): number[] {
  const bounds = [start];
  for (const t of times) if (t > start && t < end) bounds.push(t);
  bounds.push(end);
  return bounds;
}

export function layoutDiagram(diagram: Diagram, rules: RenderRules): Layout {
  const { style, time } = diagram;
  const metrics = fontMetrics(style, rules);
  const outer: Rect = {
    x: style.margin,
    y: style.margin,
    w: style.width - 2 * style.margin,
    h: style.height - 2 * style.margin,
  };

  const labelWidth = Math.max(0, ...diagram.signals.map((s) => textWidth(`${labelDisplayText(s.label)}  `, metrics)));
  const headerRows = time.step === null ? 1 : 2;
  const header: Rect = { x: outer.x + labelWidth, y: outer.y, w: outer.w - labelWidth, h: metrics.rowHeight * headerRows };
  const plot: Rect = { x: header.x, y: bottom(header), w: header.w, h: outer.h - header.h };
  if (plot.w <= 0 || plot.h <= 0) {
    fail("InvalidRange", undefined, "The diagram is too small to fit its labels and header.");
  }
  const labels: Rect = { x: outer.x, y: plot.y, w: labelWidth, h: plot.h };

  const bandHeight = diagram.signals.length > 0 ? plot.h / diagram.signals.length : 0;
  const rows = diagram.signals.map((signal, i): Row => {
    const band = { x: plot.x, y: plot.y + i * bandHeight, w: plot.w, h: bandHeight };
    return { signal, band, labelCenter: { x: labels.x + labels.w / 2, y: band.y + band.h / 2 } };
  });

  const axisY = outer.y + metrics.rowHeight / 2;
  const axis: AxisLabel[] = [
    { time: time.start, at: { x: plot.x, y: axisY }, anchor: "start" },
    { time: time.end, at: { x: right(plot), y: axisY }, anchor: "end" },
  ];

  const partial = { plot, window: { start: time.start, end: time.end } };
  const times: number[] = [];
  const columns: GridColumn[] = [];
  if (time.step !== null) {
    if ((time.end - time.start) / time.step > plot.w) {
      fail("InvalidRange", undefined, "The step is too small: grid columns would be narrower than one pixel.");
    }
    times.push(...gridTimes(time.start, time.end, time.step));
    const bounds = columnBounds(time.start, time.end, times);
    const y = outer.y + metrics.rowHeight * 1.5;
    for (let k = 1; k < bounds.length; k += 1) {
      const from = bounds[k - 1];
      const to = bounds[k];
      const x = (timeToX(partial, from) + timeToX(partial, to)) / 2;
      columns.push({ index: k, from, to, labelCenter: { x, y } });
    }
  }

  return {
    canvas: { width: style.width, height: style.height },
    window: partial.window,
    outer,
    labels,
    header,
    plot,
    rows,
    axis,
    gridTimes: times,
    columns,
    metrics,
  };
}
