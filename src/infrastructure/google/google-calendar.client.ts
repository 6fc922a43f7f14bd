import { google, type calendar_v3 } from 'googleapis';
import { DateTime } from 'luxon';

import { config } from '@config/env.config.js';
import { err, ok, type Result } from '@core/interfaces/result.js';
import type {
  BusyInterval,
  CalendarCollaborator,
  CalendarFailure,
  EventDescriptor,
} from '@core/interfaces/scheduling.types.js';
import { logger } from '@utils/logger.js';

const SCOPES = ['https://www.googleapis.com/auth/calendar'];

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Converts a Google event boundary into an instant. All-day events carry a
 * plain date, read as midnight in the calendar's zone.
 */
function toInstant(
  boundary: calendar_v3.Schema$EventDateTime | undefined,
  tz: string,
): { at: Date; allDay: boolean } | null {
  if (boundary?.dateTime) {
    const dt = DateTime.fromISO(boundary.dateTime, { zone: tz });
    return dt.isValid ? { at: dt.toJSDate(), allDay: false } : null;
  }
  if (boundary?.date) {
    const dt = DateTime.fromISO(boundary.date, { zone: tz }).startOf('day');
    return dt.isValid ? { at: dt.toJSDate(), allDay: true } : null;
  }
  return null;
}

export function toBusyIntervals(items: calendar_v3.Schema$Event[], tz: string): BusyInterval[] {
  const busy: BusyInterval[] = [];
  for (const item of items) {
    // "Show as available" events do not block the agenda
    if (item.transparency === 'transparent') continue;
    const start = toInstant(item.start, tz);
    const end = toInstant(item.end, tz);
    if (!start || !end || !(start.at < end.at)) continue;
    busy.push({ start: start.at, end: end.at, allDay: start.allDay });
  }
  return busy.sort((a, b) => a.start.getTime() - b.start.getTime());
}

export class GoogleCalendarClient implements CalendarCollaborator {
  constructor(
    private readonly calendar: calendar_v3.Calendar,
    private readonly calendarId: string,
    private readonly timezone: string,
  ) {}

  async listBusyIntervals(start: Date, end: Date): Promise<Result<BusyInterval[], CalendarFailure>> {
    try {
      const res = await this.calendar.events.list({
        calendarId: this.calendarId,
        timeMin: start.toISOString(),
        timeMax: end.toISOString(),
        singleEvents: true,
        orderBy: 'startTime',
      });
      const items = res.data.items ?? [];
      logger.debug('[calendar] events listed', {
        count: items.length,
        timeMin: start.toISOString(),
        timeMax: end.toISOString(),
      });
      return ok(toBusyIntervals(items, this.timezone));
    } catch (e) {
      logger.error('[calendar] error fetching events', { error: describe(e) });
      return err({ operation: 'list', message: describe(e), cause: e });
    }
  }

  async insertEvent(event: EventDescriptor): Promise<Result<string, CalendarFailure>> {
    try {
      const res = await this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: event.summary,
          description: event.description,
          start: { dateTime: event.start.toISOString(), timeZone: event.timeZone },
          end: { dateTime: event.end.toISOString(), timeZone: event.timeZone },
          reminders: {
            useDefault: false,
            overrides: event.reminders.map((r) => ({ method: r.method, minutes: r.minutes })),
          },
        },
      });
      const id = res.data.id;
      if (!id) {
        return err({ operation: 'insert', message: 'Calendar returned no event id' });
      }
      logger.info('[calendar] event created', { eventId: id });
      return ok(id);
    } catch (e) {
      logger.error('[calendar] error creating event', { error: describe(e) });
      return err({ operation: 'insert', message: describe(e), cause: e });
    }
  }
}

let instance: GoogleCalendarClient | null = null;

function createInstance(): GoogleCalendarClient {
  const auth = new google.auth.GoogleAuth({
    keyFile: config.GOOGLE_CREDENTIALS_FILE,
    scopes: SCOPES,
  });
  const calendar = google.calendar({ version: 'v3', auth });
  return new GoogleCalendarClient(calendar, config.GOOGLE_CALENDAR_ID, config.TIMEZONE);
}

export function getCalendarClient(): GoogleCalendarClient {
  if (!instance) {
    instance = createInstance();
  }
  return instance;
}
