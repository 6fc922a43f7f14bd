import { DateTime } from 'luxon';

import { config } from '@config/env.config.js';
import type {
  BusyInterval,
  CalendarCollaborator,
  SlotOptions,
  TimeSlot,
} from '@core/interfaces/scheduling.types.js';
import { getCalendarClient } from '@infra/google/google-calendar.client.js';
import { logger } from '@utils/logger.js';
import { isWeekend, overlaps } from '@utils/time.js';

import { MAX_OPTIONS, readSchedulingConfig, type SchedulingRuntimeConfig } from './config.defaults.js';
import { buildSlotGrid, workWindowForDate } from './working-hours.util.js';

export class AvailabilityService {
  constructor(
    private readonly calendar: CalendarCollaborator = getCalendarClient(),
    private readonly settings: SchedulingRuntimeConfig = readSchedulingConfig(config),
  ) {}

  get timezone(): string {
    return this.settings.timezone;
  }

  /**
   * Weekdays after `referenceNow` (in the configured zone) that still have at
   * least one free slot, as 'yyyy-MM-dd'. Today is never offered.
   */
  async getAvailableDates(
    referenceNow: Date = new Date(),
    horizonDays: number = this.settings.horizonDays,
    maxResults: number = MAX_OPTIONS,
  ): Promise<string[]> {
    const today = DateTime.fromJSDate(referenceNow).setZone(this.settings.timezone).startOf('day');
    const dates: string[] = [];

    for (let offset = 1; offset <= horizonDays && dates.length < maxResults; offset++) {
      const day = today.plus({ days: offset });
      if (isWeekend(day)) continue;

      const dayISO = day.toFormat('yyyy-LL-dd');
      const slots = await this.getAvailableSlots(dayISO);
      if (slots.length > 0) dates.push(dayISO);
    }

    return dates.slice(0, maxResults);
  }

  async getAvailableSlots(dayISO: string, options: Partial<SlotOptions> = {}): Promise<TimeSlot[]> {
    const opts: SlotOptions = { ...this.settings.slots, ...options };
    const window = workWindowForDate(
      dayISO,
      this.settings.timezone,
      opts.workStartHour,
      opts.workEndHour,
    );

    const busy = await this.fetchBusy(window.start.toJSDate(), window.end.toJSDate());
    if (busy === null) return [];

    return buildSlotGrid(window, opts.slotDurationMinutes)
      .filter((slot) => isFree(slot, busy))
      .slice(0, opts.maxResults);
  }

  /** Re-reads the calendar for a single slot; null when the calendar could not be read. */
  async isSlotFree(slot: TimeSlot): Promise<boolean | null> {
    const busy = await this.fetchBusy(slot.start, slot.end);
    if (busy === null) return null;
    return isFree(slot, busy);
  }

  private async fetchBusy(start: Date, end: Date): Promise<BusyInterval[] | null> {
    const result = await this.calendar.listBusyIntervals(start, end);
    if (!result.ok) {
      logger.warn('[availability] calendar read failed, treating as no availability', {
        start: start.toISOString(),
        end: end.toISOString(),
        error: result.error.message,
      });
      return null;
    }
    return result.value;
  }
}

function isFree(slot: TimeSlot, busy: BusyInterval[]): boolean {
  return !busy.some((b) => overlaps(slot.start, slot.end, b.start, b.end));
}
