import { labelDisplayText } from "./label.js";
import { type Layout, type Point, type Rect, type Row, bottom, layoutDiagram, right, textWidth, timeDeltaToPx, timeToX } from "./layout.js";
import { type Diagram, type ResolvedTimeline, type Value, rgbToHex } from "./model.js";
import type { RenderRules } from "./rules.js";
import { resolveTimeline, transitions } from "./timeline.js";

export type LineOp = {
  op: "line";
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  color: string;
  width: number;
  dash?: number[];
};

export type PolygonOp = {
  op: "polygon";
  points: Point[];
  fill: string | null;
  stroke: string | null;
  strokeWidth: number;
};

export type TextOp = {
  op: "text";
  x: number;
  y: number;
  text: string;
  color: string;
  fontFamily: string;
  fontSize: number;
  anchor: "start" | "middle" | "end";
};

export type DrawOp = LineOp | PolygonOp | TextOp;

/** Everything a surface writer needs: canvas size, background and the ordered ops. */
export type DrawResult = {
  width: number;
  height: number;
  background: string;
  ops: DrawOp[];
};

type Levels = { high: number; mid: number; low: number };

type Span = {
  value: Value;
  time: number;
  x: number;
  // Horizontal reach of the transition into this span, and out of it.
  inHalf: number;
  outHalf: number;
  next?: number;
};

class Painter {
  readonly ops: DrawOp[] = [];

  constructor(
    private readonly diagram: Diagram,
    private readonly layout: Layout,
    private readonly rules: RenderRules,
  ) {}

  get color(): string {
    return rgbToHex(this.diagram.style.foreground);
  }

  line(a: Point, b: Point, width: number, dash?: number[]): void {
    const op: LineOp = { op: "line", x1: a.x, y1: a.y, x2: b.x, y2: b.y, color: this.color, width };
    if (dash) op.dash = dash;
    this.ops.push(op);
  }

  rect(r: Rect): void {
    this.ops.push({
      op: "polygon",
      points: [
        { x: r.x, y: r.y },
        { x: right(r), y: r.y },
        { x: right(r), y: bottom(r) },
        { x: r.x, y: bottom(r) },
      ],
      fill: null,
      stroke: this.color,
      strokeWidth: this.rules.frame_width,
    });
  }

  fill(points: Point[], color: number): void {
    this.ops.push({ op: "polygon", points, fill: rgbToHex(color), stroke: null, strokeWidth: 0 });
  }

  text(text: string, at: Point, anchor: TextOp["anchor"]): void {
    this.ops.push({
      op: "text",
      x: at.x,
      y: at.y,
      text,
      color: this.color,
      fontFamily: this.diagram.style.font_family,
      fontSize: this.diagram.style.font_size,
      anchor,
    });
  }

  /** Draws a→b cut to the plot's horizontal extent. */
  clippedLine(a: Point, b: Point, width: number, dash?: number[]): void {
    const lo = this.layout.plot.x;
    const hi = right(this.layout.plot);
    const [p, q] = a.x <= b.x ? [a, b] : [b, a];
    if (q.x < lo || p.x > hi) return;
    if (q.x === p.x) {
      this.line(p, q, width, dash);
      return;
    }
    const yAt = (x: number): number => p.y + ((q.y - p.y) * (x - p.x)) / (q.x - p.x);
    const x1 = Math.max(p.x, lo);
    const x2 = Math.min(q.x, hi);
    this.line({ x: x1, y: yAt(x1) }, { x: x2, y: yAt(x2) }, width, dash);
  }
}

function rowLevels(band: Rect, rules: RenderRules): Levels {
  return {
    high: band.y + band.h * rules.levels.high,
    mid: band.y + band.h * 0.5,
    low: band.y + band.h * rules.levels.low,
  };
}

function levelOf(value: Value, levels: Levels): number {
  switch (value.kind) {
    case "one":
      return levels.high;
    case "zero":
      return levels.low;
    default:
      return levels.mid;
  }
}

/**
 * Turns a resolved timeline into spans with their transition widths. A
 * transition is `delay` wide and centred on its time, narrowed only where it
 * would overlap a neighbouring transition.
 */
function toSpans(timeline: ResolvedTimeline, layout: Layout, delay: number): Span[] {
  const changes = transitions(timeline);
  const xs = changes.map((e) => timeToX(layout, e.time));
  const half = timeDeltaToPx(layout, delay) / 2;
  const reach = xs.map((x, i) => {
    if (i === 0) return 0;
    let h = half;
    if (i > 1) h = Math.min(h, (x - xs[i - 1]) / 2);
    if (i + 1 < xs.length) h = Math.min(h, (xs[i + 1] - x) / 2);
    return h;
  });
  return changes.map((e, i) => ({
    value: e.value,
    time: e.time,
    x: i === 0 ? layout.plot.x : xs[i],
    inHalf: reach[i],
    outHalf: i + 1 < changes.length ? reach[i + 1] : 0,
    next: i + 1 < changes.length ? xs[i + 1] : undefined,
  }));
}

function drawLevelRow(p: Painter, row: Row, spans: Span[], layout: Layout, rules: RenderRules): void {
  const levels = rowLevels(row.band, rules);
  const end = right(layout.plot);
  spans.forEach((s, i) => {
    const y = levelOf(s.value, levels);
    if (i > 0) {
      const prevY = levelOf(spans[i - 1].value, levels);
      p.clippedLine({ x: s.x - s.inHalf, y: prevY }, { x: s.x + s.inHalf, y }, rules.signal_width);
    }
    const x1 = s.x + s.inHalf;
    const x2 = s.next === undefined ? end : s.next - s.outHalf;
    if (x2 <= x1) return;
    const dash = s.value.kind === "unknown" ? rules.dash : undefined;
    p.clippedLine({ x: x1, y }, { x: x2, y }, rules.signal_width, dash);
  });
}

function drawBusRow(p: Painter, row: Row, spans: Span[], layout: Layout, rules: RenderRules, background: number): void {
  const levels = rowLevels(row.band, rules);
  const lo = layout.plot.x;
  const hi = right(layout.plot);
  const cx = (x: number): number => Math.min(hi, Math.max(lo, x));

  for (const s of spans) {
    const left = s.x;
    const rightEdge = s.next ?? hi;
    if (left >= hi || rightEdge <= left) continue;

    if (s.value.kind === "floating") {
      p.clippedLine({ x: left, y: levels.mid }, { x: rightEdge, y: levels.mid }, rules.signal_width);
      continue;
    }

    const openX = cx(left + s.inHalf);
    const closeX = cx(rightEdge - s.outHalf);
    // Band ends taper to a tip at a transition and stand vertical at the plot edge.
    const outline: Point[] = [];
    if (s.inHalf > 0) outline.push({ x: cx(left), y: levels.mid });
    outline.push({ x: openX, y: levels.high }, { x: closeX, y: levels.high });
    if (s.outHalf > 0) outline.push({ x: cx(rightEdge), y: levels.mid });
    outline.push({ x: closeX, y: levels.low }, { x: openX, y: levels.low });
    p.fill(outline, s.value.kind === "data" ? background : rules.unknown_fill);

    if (s.inHalf > 0) {
      p.clippedLine({ x: left, y: levels.mid }, { x: left + s.inHalf, y: levels.high }, rules.signal_width);
      p.clippedLine({ x: left, y: levels.mid }, { x: left + s.inHalf, y: levels.low }, rules.signal_width);
    }
    if (closeX > openX) {
      p.clippedLine({ x: openX, y: levels.high }, { x: closeX, y: levels.high }, rules.signal_width);
      p.clippedLine({ x: openX, y: levels.low }, { x: closeX, y: levels.low }, rules.signal_width);
    }
    if (s.outHalf > 0) {
      p.clippedLine({ x: rightEdge - s.outHalf, y: levels.high }, { x: rightEdge, y: levels.mid }, rules.signal_width);
      p.clippedLine({ x: rightEdge - s.outHalf, y: levels.low }, { x: rightEdge, y: levels.mid }, rules.signal_width);
    }

    if (s.value.kind === "data" && s.value.text.length > 0) {
      p.text(s.value.text, { x: (cx(left) + cx(rightEdge)) / 2, y: levels.mid }, "middle");
    }
  }
}

function drawLabel(p: Painter, row: Row, layout: Layout): void {
  const { metrics } = layout;
  const total = textWidth(labelDisplayText(row.signal.label), metrics);
  const y = row.labelCenter.y;
  const overlineY = y - metrics.textHeight / 2;
  let x = row.labelCenter.x - total / 2;
  row.signal.label.forEach((segment, i) => {
    if (i > 0) {
      p.text("/", { x, y }, "start");
      x += textWidth("/", metrics);
    }
    const w = textWidth(segment.text, metrics);
    if (w > 0) p.text(segment.text, { x, y }, "start");
    if (segment.overlined && w > 0) p.line({ x, y: overlineY }, { x: x + w, y: overlineY }, 1);
    x += w;
  });
}

function drawFrame(p: Painter, layout: Layout, rules: RenderRules): void {
  p.rect(layout.outer);
  p.rect(layout.plot);
  for (const t of layout.gridTimes) {
    const x = timeToX(layout, t);
    p.line({ x, y: layout.plot.y }, { x, y: bottom(layout.plot) }, rules.frame_width, rules.dash);
  }
  for (const c of layout.columns) p.text(`T${c.index}`, c.labelCenter, "middle");
  for (const a of layout.axis) p.text(String(a.time), a.at, a.anchor);
}

/** Lays out and draws a diagram into an ordered list of draw operations. */
export function drawDiagram(diagram: Diagram, rules: RenderRules): DrawResult {
  const layout = layoutDiagram(diagram, rules);
  const p = new Painter(diagram, layout, rules);
  drawFrame(p, layout, rules);
  for (const row of layout.rows) {
    const spans = toSpans(resolveTimeline(row.signal, layout.window), layout, diagram.time.delay);
    if (row.signal.kind === "bus") {
      drawBusRow(p, row, spans, layout, rules, diagram.style.background);
    } else {
      drawLevelRow(p, row, spans, layout, rules);
    }
    drawLabel(p, row, layout);
  }
  return {
    width: layout.canvas.width,
    height: layout.canvas.height,
    background: rgbToHex(diagram.style.background),
    ops: p.ops,
  };
}
