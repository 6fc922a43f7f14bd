import type { DateTime } from 'luxon';

import type { TimeSlot } from '@core/interfaces/scheduling.types.js';
import { dayInZone } from '@utils/time.js';

export interface WorkWindow {
  start: DateTime;
  end: DateTime;
}

/** Working window [start, end) of a day ('yyyy-MM-dd') in the given zone. */
export function workWindowForDate(
  dayISO: string,
  tz: string,
  workStartHour: number,
  workEndHour: number,
): WorkWindow {
  const day = dayInZone(dayISO, tz);
  return {
    start: day.set({ hour: workStartHour }),
    end: day.set({ hour: workEndHour }),
  };
}

/** Slot grid (start-inclusive, end-exclusive); a slot never ends past the window. */
export function buildSlotGrid(window: WorkWindow, slotDurationMinutes: number): TimeSlot[] {
  const slots: TimeSlot[] = [];
  let cursor = window.start;
  while (cursor < window.end) {
    const next = cursor.plus({ minutes: slotDurationMinutes });
    if (next > window.end) break;
    slots.push({ start: cursor.toJSDate(), end: next.toJSDate() });
    cursor = next;
  }
  return slots;
}
