import type { DateRange } from "../types/contracts.js";

export function fromHoursBack(hours: number, now: Date = new Date()): DateRange {
  return { start: new Date(now.getTime() - hours * 3_600_000), end: now };
}

export function fromDaysBack(days: number, now: Date = new Date()): DateRange {
  return fromHoursBack(days * 24, now);
}

/** Inclusive on both ends; an absent bound is open. */
export function inRange(at: Date, range: DateRange): boolean {
  const t = at.getTime();
  if (range.start && t < range.start.getTime()) return false;
  if (range.end && t > range.end.getTime()) return false;
  return true;
}
