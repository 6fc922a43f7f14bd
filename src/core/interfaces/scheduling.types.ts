import type { Result } from './result.js';

/** Calendar-blocked range, start-inclusive and end-exclusive. */
export interface BusyInterval {
  start: Date;
  end: Date;
  allDay?: boolean;
}

export interface TimeSlot {
  start: Date;
  end: Date;
}

export interface SlotOptions {
  slotDurationMinutes: number;
  workStartHour: number;
  workEndHour: number;
  maxResults: number;
}

export interface CalendarFailure {
  operation: 'list' | 'insert';
  message: string;
  cause?: unknown;
}

export interface EventReminder {
  method: 'popup' | 'email';
  minutes: number;
}

export interface EventDescriptor {
  summary: string;
  description: string;
  start: Date;
  end: Date;
  timeZone: string;
  reminders: EventReminder[];
}

export interface CalendarCollaborator {
  listBusyIntervals(start: Date, end: Date): Promise<Result<BusyInterval[], CalendarFailure>>;
  insertEvent(event: EventDescriptor): Promise<Result<string, CalendarFailure>>;
}

export type BookingFailureReason = 'calendar_error' | 'slot_taken';

export interface BookingFailure {
  reason: BookingFailureReason;
  message: string;
}

export interface AppointmentRequest {
  patientName: string;
  callerId: string;
  /** Human-readable service name, written into the event. */
  serviceType: string;
  startTime: Date;
  durationMinutes: number;
}
