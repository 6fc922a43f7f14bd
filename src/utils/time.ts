import { DateTime } from 'luxon';

export function dayInZone(dayISO: string, tz: string): DateTime {
  const dt = DateTime.fromISO(dayISO, { zone: tz }).startOf('day');
  if (!dt.isValid) throw new Error('Invalid ISO date: ' + dayISO);
  return dt;
}

export function toIsoString(dt: DateTime): string {
  const iso = dt.toISO();
  if (!iso) throw new Error('Cannot serialize invalid DateTime: ' + dt.invalidExplanation);
  return iso;
}

export function isWeekend(dt: DateTime): boolean {
  // Luxon weekday: 1 = Monday .. 7 = Sunday
  return dt.weekday >= 6;
}

/** Half-open intervals: touching ends do not overlap. */
export function overlaps(aStart: Date, aEnd: Date, bStart: Date, bEnd: Date): boolean {
  return aStart < bEnd && aEnd > bStart;
}
