import type { AppConfig } from '@config/env.config.js';
import type { SlotOptions } from '@core/interfaces/scheduling.types.js';

/** WhatsApp reply messages carry at most three buttons. */
export const MAX_OPTIONS = 3;

export interface SchedulingRuntimeConfig {
  timezone: string;
  /** Days after today scanned for free dates. Default 14. */
  horizonDays: number;
  slots: SlotOptions;
  /** Popup reminders, minutes before the appointment. */
  reminderMinutes: number[];
}

export function readSchedulingConfig(
  cfg: Pick<
    AppConfig,
    | 'TIMEZONE'
    | 'BOOKING_HORIZON_DAYS'
    | 'SLOT_DURATION_MINUTES'
    | 'WORK_START_HOUR'
    | 'WORK_END_HOUR'
  >,
): SchedulingRuntimeConfig {
  return {
    timezone: cfg.TIMEZONE,
    horizonDays: cfg.BOOKING_HORIZON_DAYS,
    slots: {
      slotDurationMinutes: cfg.SLOT_DURATION_MINUTES,
      workStartHour: cfg.WORK_START_HOUR,
      workEndHour: cfg.WORK_END_HOUR,
      maxResults: MAX_OPTIONS,
    },
    reminderMinutes: [24 * 60, 60],
  };
}
