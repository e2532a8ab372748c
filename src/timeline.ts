import { type ClockSignal, ONE, type ResolvedTimeline, type Signal, type TimeSettings, type Value, ZERO, sameValue } from "./model.js";

type Window = Pick<TimeSettings, "start" | "end">;

function mod(a: number, n: number): number {
  return ((a % n) + n) % n;
}

/**
 * Time units per cycle during which a clock is high. Boundaries are rounded
 * up, so a clock is high at integer time t exactly when
 * (t - offset) mod length < duty * length.
 */
export function clockHighTime(clock: Pick<ClockSignal, "length" | "duty">): number {
  // Snap products like 0.28 * 25 = 7.000000000000001 before rounding up.
  const high = Math.round(clock.duty * clock.length * 1e9) / 1e9;
  return Math.min(clock.length, Math.max(1, Math.ceil(high)));
}

function clockStateAt(clock: ClockSignal, t: number): Value {
  return mod(t - clock.offset, clock.length) < clockHighTime(clock) ? ONE : ZERO;
}

/** Changes ordered by time; of several changes at one time the last declared is kept. */
export function orderedChanges(changes: readonly { time: number; value: Value }[]): { time: number; value: Value }[] {
  const byTime = new Map<number, Value>();
  for (const c of changes) {
    byTime.delete(c.time);
    byTime.set(c.time, c.value);
  }
  return Array.from(byTime, ([time, value]) => ({ time, value })).sort((a, b) => a.time - b.time);
}

/** The value a signal holds at time t, ignoring the display window. */
export function stateAt(signal: Signal, t: number): Value {
  if (signal.kind === "clock") return clockStateAt(signal, t);
  let value = signal.start;
  for (const c of orderedChanges(signal.changes)) {
    if (c.time > t) break;
    value = c.value;
  }
  return value;
}

function resolveClock(clock: ClockSignal, window: Window): ResolvedTimeline {
  const out: ResolvedTimeline = [{ time: window.start, value: clockStateAt(clock, window.start) }];
  const high = clockHighTime(clock);
  if (high >= clock.length) return out;

  const push = (time: number, value: Value): void => {
    if (time <= window.start || time > window.end) return;
    out.push({ time, value });
  };
  let cycle = Math.floor((window.start - clock.offset) / clock.length);
  for (let begin = clock.offset + cycle * clock.length; begin <= window.end; begin = clock.offset + cycle * clock.length) {
    push(begin, ONE);
    push(begin + high, ZERO);
    cycle += 1;
  }
  return out;
}

/**
 * The chronological state sequence of a signal clipped to [start, end]. The
 * first entry is always at `start`; later entries are strictly increasing.
 */
export function resolveTimeline(signal: Signal, window: Window): ResolvedTimeline {
  if (signal.kind === "clock") return resolveClock(signal, window);

  let initial = signal.start;
  const out: ResolvedTimeline = [];
  for (const c of orderedChanges(signal.changes)) {
    if (c.time <= window.start) {
      initial = c.value;
    } else if (c.time <= window.end) {
      out.push({ time: c.time, value: c.value });
    }
  }
  return [{ time: window.start, value: initial }, ...out];
}

/** Entries whose value differs from the one before; the first is always kept. */
export function transitions(timeline: ResolvedTimeline): ResolvedTimeline {
  return timeline.filter((e, i) => i === 0 || !sameValue(e.value, timeline[i - 1].value));
}
