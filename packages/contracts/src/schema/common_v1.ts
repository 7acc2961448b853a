import { z } from "zod";

export const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // avoid free-text versions

/** Calendar date in UTC, "YYYY-MM-DD". */
export type IsoDate = string;

export const IsoDateZ = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine((s) => isCalendarDate(s), { message: "not a calendar date" });

export const Fraction01Z = z.number().finite().min(0).max(1);

export const EstimateMethodV1Z = z.enum(["model", "fallback"]); // closed: downstream only reads confidence
export type EstimateMethodV1 = z.infer<typeof EstimateMethodV1Z>;

const DAY_MS = 24 * 60 * 60 * 1000;

function splitIsoDate(d: IsoDate): [number, number, number] {
  const [y, m, day] = d.split("-").map((p) => Number.parseInt(p, 10));
  return [y ?? NaN, m ?? NaN, day ?? NaN];
}

export function isCalendarDate(d: string): boolean {
  const [y, m, day] = splitIsoDate(d);
  if (!Number.isInteger(y) || !Number.isInteger(m) || !Number.isInteger(day)) return false;
  const probe = new Date(Date.UTC(y, m - 1, day));
  return probe.getUTCFullYear() === y && probe.getUTCMonth() === m - 1 && probe.getUTCDate() === day;
}

export function isoDateToUtcMs(d: IsoDate): number {
  const [y, m, day] = splitIsoDate(d);
  return Date.UTC(y, m - 1, day);
}

export function utcMsToIsoDate(ms: number): IsoDate {
  return new Date(ms).toISOString().slice(0, 10);
}

/** Month of the date, 1..12. */
export function isoDateMonth(d: IsoDate): number {
  return splitIsoDate(d)[1];
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetweenIsoDates(from: IsoDate, to: IsoDate): number {
  return Math.round((isoDateToUtcMs(to) - isoDateToUtcMs(from)) / DAY_MS);
}

/** First day of the month `monthsAhead` months after the month of `d`. */
export function firstOfMonthAhead(d: IsoDate, monthsAhead: number): IsoDate {
  const [y, m] = splitIsoDate(d);
  return utcMsToIsoDate(Date.UTC(y, m - 1 + monthsAhead, 1));
}
