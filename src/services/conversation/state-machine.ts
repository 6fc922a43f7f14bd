import { DateTime } from 'luxon';

import { config, type AppConfig } from '@config/env.config.js';
import type { Result } from '@core/interfaces/result.js';
import type {
  AppointmentRequest,
  BookingFailure,
  TimeSlot,
} from '@core/interfaces/scheduling.types.js';
import { AvailabilityService } from '@services/booking/availability.service.js';
import { BookingWriter } from '@services/booking/booking.writer.js';
import { MAX_OPTIONS } from '@services/booking/config.defaults.js';
import { toIsoString } from '@utils/time.js';

import { assertInvariants, isAllowedTransition } from './invariants.js';
import {
  CONFIRM_NO_ID,
  CONFIRM_OPTIONS,
  CONFIRM_YES_ID,
  MENU_OPTIONS,
  OFFICE_HOURS_ID,
  SERVICE_NAMES,
  formatDate,
  formatTime,
  messages,
  type SummaryFields,
} from './messages.js';
import {
  SERVICE_TYPES,
  type CallerSession,
  type IndexedChoices,
  type OptionItem,
  type OutboundResponse,
  type ServiceType,
} from './state.types.js';

export const RESET_KEYWORDS: ReadonlySet<string> = new Set([
  'menu',
  'start',
  'hello',
  'hi',
  'olá',
  'oi',
]);

const DIGITS = /^\d+$/;

export interface AvailabilityPort {
  getAvailableDates(referenceNow?: Date, horizonDays?: number): Promise<string[]>;
  getAvailableSlots(dayISO: string): Promise<TimeSlot[]>;
}

export interface BookingPort {
  createAppointment(req: AppointmentRequest): Promise<Result<string, BookingFailure>>;
}

export interface DialogueSettings {
  timezone: string;
  clinicName: string;
  clinicPhone: string;
  horizonDays: number;
  slotDurationMinutes: number;
  workStartHour: number;
  workEndHour: number;
}

export function readDialogueSettings(
  cfg: Pick<
    AppConfig,
    | 'TIMEZONE'
    | 'CLINIC_NAME'
    | 'CLINIC_PHONE'
    | 'BOOKING_HORIZON_DAYS'
    | 'SLOT_DURATION_MINUTES'
    | 'WORK_START_HOUR'
    | 'WORK_END_HOUR'
  >,
): DialogueSettings {
  return {
    timezone: cfg.TIMEZONE,
    clinicName: cfg.CLINIC_NAME,
    clinicPhone: cfg.CLINIC_PHONE,
    horizonDays: cfg.BOOKING_HORIZON_DAYS,
    slotDurationMinutes: cfg.SLOT_DURATION_MINUTES,
    workStartHour: cfg.WORK_START_HOUR,
    workEndHour: cfg.WORK_END_HOUR,
  };
}

export interface DialogueInput {
  callerId: string;
  text: string;
  /** Structured id sent by the channel, or the id a numeral resolved to. */
  resolvedOptionId?: string;
}

export interface DialogueResult {
  session: CallerSession;
  response: OutboundResponse;
  warnings: string[];
}

type StepOutcome = Omit<DialogueResult, 'warnings'>;

const text = (body: string): OutboundResponse => ({ type: 'TEXT', body });

const options = (body: string, items: readonly OptionItem[]): OutboundResponse => ({
  type: 'OPTIONS',
  body,
  options: items.slice(0, MAX_OPTIONS),
});

function isServiceType(id: string | undefined): id is ServiceType {
  return SERVICE_TYPES.some((s) => s === id);
}

function pick(choices: IndexedChoices | undefined, index: string | undefined): string | undefined {
  if (!choices || index === undefined || !Object.hasOwn(choices, index)) return undefined;
  return choices[index];
}

/**
 * Structured id with the expected prefix wins; otherwise all-digit text is
 * taken as the display index itself.
 */
export function resolveIndex(
  prefix: 'date_' | 'time_',
  rawText: string,
  optionId?: string,
): string | undefined {
  if (optionId?.startsWith(prefix)) return optionId.slice(prefix.length);
  if (DIGITS.test(rawText)) return rawText;
  return undefined;
}

export class DialogueStateMachine {
  constructor(
    private readonly availability: AvailabilityPort = new AvailabilityService(),
    private readonly booking: BookingPort = new BookingWriter(),
    private readonly settings: DialogueSettings = readDialogueSettings(config),
    private readonly clock: () => Date = () => new Date(),
  ) {}

  newSession(): CallerSession {
    return { step: 'MENU' };
  }

  menu(): OutboundResponse {
    return options(messages.menu(this.settings.clinicName), MENU_OPTIONS);
  }

  async transition(current: CallerSession, input: DialogueInput): Promise<DialogueResult> {
    const outcome = await this.dispatch({ ...current }, input);
    const warnings = assertInvariants(outcome.session);
    if (!isAllowedTransition(current.step, outcome.session.step)) {
      warnings.push(`illegal_transition:${current.step}->${outcome.session.step}`);
    }
    return { ...outcome, warnings };
  }

  private async dispatch(s: CallerSession, input: DialogueInput): Promise<StepOutcome> {
    const raw = input.text.trim();
    if (RESET_KEYWORDS.has(raw.toLowerCase())) {
      return { session: this.newSession(), response: this.menu() };
    }

    const optionId = input.resolvedOptionId;
    switch (s.step) {
      case 'MENU':
        return this.onMenu(s, optionId);
      case 'AWAITING_NAME':
        return this.onPatientName(s, raw);
      case 'SELECT_DATE':
        return this.onDateSelection(s, raw, optionId);
      case 'SELECT_TIME':
        return this.onTimeSelection(s, raw, optionId);
      case 'CONFIRM':
        return this.onConfirmation(s, input.callerId, raw, optionId);
      default:
        return { session: this.newSession(), response: text(messages.fallback()) };
    }
  }

  private onMenu(s: CallerSession, optionId?: string): StepOutcome {
    if (isServiceType(optionId)) {
      return {
        session: { step: 'AWAITING_NAME', serviceType: optionId },
        response: text(messages.askName()),
      };
    }
    if (optionId === OFFICE_HOURS_ID) {
      const { workStartHour, workEndHour, slotDurationMinutes } = this.settings;
      return {
        session: s,
        response: text(messages.officeHours(workStartHour, workEndHour, slotDurationMinutes)),
      };
    }
    return { session: s, response: text(messages.invalidOption()) };
  }

  private async onPatientName(s: CallerSession, name: string): Promise<StepOutcome> {
    if (!name) {
      return { session: s, response: text(messages.askNameAgain()) };
    }

    const next: CallerSession = {
      step: 'SELECT_DATE',
      serviceType: s.serviceType,
      patientName: name,
    };

    const dates = await this.availability.getAvailableDates(this.clock(), this.settings.horizonDays);
    if (dates.length === 0) {
      return { session: next, response: text(messages.noDates(this.settings.clinicPhone)) };
    }

    const offered = dates.slice(0, MAX_OPTIONS);
    next.offeredDates = Object.fromEntries(offered.map((day, i) => [String(i + 1), day]));
    return {
      session: next,
      response: options(
        messages.chooseDate(name),
        offered.map((day, i) => ({
          id: `date_${i + 1}`,
          label: formatDate(day, this.settings.timezone),
        })),
      ),
    };
  }

  private async onDateSelection(
    s: CallerSession,
    raw: string,
    optionId?: string,
  ): Promise<StepOutcome> {
    const day = pick(s.offeredDates, resolveIndex('date_', raw, optionId));
    if (!day) {
      return { session: s, response: text(messages.invalidDate()) };
    }

    const next: CallerSession = {
      step: 'SELECT_TIME',
      serviceType: s.serviceType,
      patientName: s.patientName,
      offeredDates: s.offeredDates,
      selectedDate: day,
    };

    const slots = await this.availability.getAvailableSlots(day);
    if (slots.length === 0) {
      return { session: next, response: text(messages.noTimes()) };
    }

    const tz = this.settings.timezone;
    const starts = slots
      .slice(0, MAX_OPTIONS)
      .map((slot) => toIsoString(DateTime.fromJSDate(slot.start).setZone(tz)));
    next.offeredTimes = Object.fromEntries(starts.map((iso, i) => [String(i + 1), iso]));
    return {
      session: next,
      response: options(
        messages.chooseTime(formatDate(day, tz)),
        starts.map((iso, i) => ({ id: `time_${i + 1}`, label: formatTime(iso, tz) })),
      ),
    };
  }

  private onTimeSelection(s: CallerSession, raw: string, optionId?: string): StepOutcome {
    const time = pick(s.offeredTimes, resolveIndex('time_', raw, optionId));
    if (!time) {
      return { session: s, response: text(messages.invalidTime()) };
    }

    const next: CallerSession = { ...s, step: 'CONFIRM', selectedTime: time };
    const fields = this.summaryFields(next);
    if (!fields) {
      return { session: this.newSession(), response: text(messages.fallback()) };
    }
    return { session: next, response: options(messages.summary(fields), CONFIRM_OPTIONS) };
  }

  private async onConfirmation(
    s: CallerSession,
    callerId: string,
    raw: string,
    optionId?: string,
  ): Promise<StepOutcome> {
    if (optionId === CONFIRM_NO_ID) {
      return { session: this.newSession(), response: text(messages.cancelled()) };
    }
    if (optionId !== CONFIRM_YES_ID && raw !== '1') {
      return { session: s, response: text(messages.fallback()) };
    }

    const fields = this.summaryFields(s);
    if (!fields || !s.selectedTime) {
      return { session: this.newSession(), response: text(messages.fallback()) };
    }

    const created = await this.booking.createAppointment({
      patientName: fields.patientName,
      callerId,
      serviceType: fields.serviceName,
      startTime: DateTime.fromISO(s.selectedTime).toJSDate(),
      durationMinutes: this.settings.slotDurationMinutes,
    });

    if (!created.ok) {
      const body =
        created.error.reason === 'slot_taken'
          ? messages.slotTaken()
          : messages.bookingFailed(this.settings.clinicPhone);
      return { session: s, response: text(body) };
    }

    return { session: this.newSession(), response: text(messages.bookingConfirmed(fields)) };
  }

  private summaryFields(s: CallerSession): SummaryFields | null {
    if (!s.patientName || !s.serviceType || !s.selectedDate || !s.selectedTime) return null;
    const tz = this.settings.timezone;
    return {
      patientName: s.patientName,
      serviceName: SERVICE_NAMES[s.serviceType],
      dateLabel: formatDate(s.selectedDate, tz),
      timeLabel: formatTime(s.selectedTime, tz),
    };
  }
}
