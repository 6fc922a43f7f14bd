import { config } from '@config/env.config.js';
import { err, ok, type Result } from '@core/interfaces/result.js';
import type {
  AppointmentRequest,
  BookingFailure,
  CalendarCollaborator,
  EventDescriptor,
} from '@core/interfaces/scheduling.types.js';
import { getCalendarClient } from '@infra/google/google-calendar.client.js';
import { KeyedLock } from '@utils/locks.js';
import { logger } from '@utils/logger.js';

import { AvailabilityService } from './availability.service.js';
import { readSchedulingConfig, type SchedulingRuntimeConfig } from './config.defaults.js';

const CALENDAR_LOCK_KEY = 'calendar';

export function buildAppointmentEvent(
  req: AppointmentRequest,
  settings: Pick<SchedulingRuntimeConfig, 'timezone' | 'reminderMinutes'>,
): EventDescriptor {
  const end = new Date(req.startTime.getTime() + req.durationMinutes * 60_000);
  return {
    summary: `${req.serviceType} - ${req.patientName}`,
    description: [
      `Paciente: ${req.patientName}`,
      `Telefone: ${req.callerId}`,
      `Tipo: ${req.serviceType}`,
    ].join('\n'),
    start: req.startTime,
    end,
    timeZone: settings.timezone,
    reminders: settings.reminderMinutes.map((minutes) => ({ method: 'popup' as const, minutes })),
  };
}

/**
 * Writes confirmed appointments to the calendar. Two writers in the same
 * process never interleave their re-check and insert; writers in other
 * processes can still race for the same slot.
 */
export class BookingWriter {
  constructor(
    private readonly calendar: CalendarCollaborator = getCalendarClient(),
    private readonly availability = new AvailabilityService(calendar),
    private readonly settings: SchedulingRuntimeConfig = readSchedulingConfig(config),
    private readonly lock = new KeyedLock(),
  ) {}

  async createAppointment(req: AppointmentRequest): Promise<Result<string, BookingFailure>> {
    const event = buildAppointmentEvent(req, this.settings);

    try {
      return await this.lock.run(CALENDAR_LOCK_KEY, async () => {
        const free = await this.availability.isSlotFree({ start: event.start, end: event.end });
        if (free === false) {
          logger.warn('[booking] slot taken before insert', {
            callerId: req.callerId,
            start: event.start.toISOString(),
          });
          return err<BookingFailure>({
            reason: 'slot_taken',
            message: 'Slot is no longer available',
          });
        }

        const inserted = await this.calendar.insertEvent(event);
        if (!inserted.ok) {
          return err<BookingFailure>({ reason: 'calendar_error', message: inserted.error.message });
        }

        logger.info('[booking] created', {
          callerId: req.callerId,
          eventId: inserted.value,
          start: event.start.toISOString(),
        });
        return ok(inserted.value);
      });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      logger.error('[booking] unexpected failure', { callerId: req.callerId, error: message });
      return err({ reason: 'calendar_error', message });
    }
  }
}
