import { parseISO, addMinutes, differenceInMinutes } from "date-fns";
import type { Interval } from "../types/index.js";

export function parseIsoOffset(
  isoString: string,
  horizonStart: string
): number {
  return differenceInMinutes(parseISO(isoString), parseISO(horizonStart));
}

export function formatIsoOffset(minutes: number, horizonStart: string): string {
  return addMinutes(parseISO(horizonStart), minutes).toISOString();
}

export function parseCalendarWindows(
  calendar: readonly (readonly [string, string])[],
  horizonStart: string
): Interval[] {
  const parsed = calendar.map(([s, e]) => ({
    start: parseIsoOffset(s, horizonStart),
    end: parseIsoOffset(e, horizonStart),
  }));
  return parsed.sort((a, b) => a.start - b.start);
}

export function formatInterval(
  interval: Interval,
  horizonStart: string
): [string, string] {
  return [
    formatIsoOffset(interval.start, horizonStart),
    formatIsoOffset(interval.end, horizonStart),
  ];
}

export function doIntervalsOverlap(a: Interval, b: Interval): boolean {
  return a.start < b.end && b.start < a.end;
}

export function containsInterval(outer: Interval, inner: Interval): boolean {
  return inner.start >= outer.start && inner.end <= outer.end;
}

export function combineOverlappingIntervals(
  intervals: readonly Interval[]
): Interval[] {
  if (intervals.length === 0) return [];

  const sorted = [...intervals].sort((a, b) => a.start - b.start);
  const combined: Interval[] = [{ ...sorted[0] }];

  for (let i = 1; i < sorted.length; i++) {
    const current = sorted[i];
    const last = combined[combined.length - 1];

    if (current.start <= last.end) {
      combined[combined.length - 1] = {
        start: last.start,
        end: Math.max(last.end, current.end),
      };
    } else {
      combined.push({ ...current });
    }
  }

  return combined;
}

/** Removes `cut` from every interval, splitting those it falls inside. */
export function subtractInterval(
  intervals: readonly Interval[],
  cut: Interval
): Interval[] {
  const result: Interval[] = [];
  for (const interval of intervals) {
    if (!doIntervalsOverlap(interval, cut)) {
      result.push({ ...interval });
      continue;
    }
    if (interval.start < cut.start) {
      result.push({ start: interval.start, end: cut.start });
    }
    if (cut.end < interval.end) {
      result.push({ start: cut.end, end: interval.end });
    }
  }
  return result;
}

export function intersectIntervals(
  intervals: readonly Interval[],
  range: Interval
): Interval[] {
  const result: Interval[] = [];
  for (const interval of intervals) {
    const start = Math.max(interval.start, range.start);
    const end = Math.min(interval.end, range.end);
    if (end > start) result.push({ start, end });
  }
  return result;
}

export function clipToHorizon(
  intervals: readonly Interval[],
  horizonEnd: number
): Interval[] {
  return intersectIntervals(intervals, { start: 0, end: horizonEnd });
}

export function totalMinutes(intervals: readonly Interval[]): number {
  return intervals.reduce((sum, i) => sum + (i.end - i.start), 0);
}

export function isWithinCalendarWindow(
  interval: Interval,
  calendar: readonly Interval[]
): boolean {
  return calendar.some((window) => containsInterval(window, interval));
}
