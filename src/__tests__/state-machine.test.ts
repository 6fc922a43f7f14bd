import { describe, expect, it, vi } from 'vitest';

import type { AppointmentRequest, BookingFailure, Result, TimeSlot } from '@core/interfaces/index.js';
import { err, ok } from '@core/interfaces/index.js';
import { CONFIRM_OPTIONS, MENU_OPTIONS, messages } from '@services/conversation/messages.js';
import {
  DialogueStateMachine,
  resolveIndex,
  type DialogueSettings,
} from '@services/conversation/state-machine.js';
import type { CallerSession } from '@services/conversation/state.types.js';

const CALLER = '5541999990000';
const NOW = new Date('2030-06-03T15:00:00Z');

const settings: DialogueSettings = {
  timezone: 'America/Sao_Paulo',
  clinicName: 'Clínica Teste',
  clinicPhone: '(41) 0000-0000',
  horizonDays: 14,
  slotDurationMinutes: 30,
  workStartHour: 9,
  workEndHour: 17,
};

const SLOTS: TimeSlot[] = [
  { start: new Date('2030-06-05T12:00:00Z'), end: new Date('2030-06-05T12:30:00Z') },
  { start: new Date('2030-06-05T13:00:00Z'), end: new Date('2030-06-05T13:30:00Z') },
];

function setup(opts: { dates?: string[]; slots?: TimeSlot[]; booking?: Result<string, BookingFailure> } = {}) {
  const availability = {
    getAvailableDates: vi.fn(async (_now?: Date, _horizon?: number) => opts.dates ?? ['2030-06-04', '2030-06-05']),
    getAvailableSlots: vi.fn(async (_day: string) => opts.slots ?? SLOTS),
  };
  const booking = {
    createAppointment: vi.fn(async (_req: AppointmentRequest) => opts.booking ?? ok('evt-1')),
  };
  const machine = new DialogueStateMachine(availability, booking, settings, () => NOW);
  return { machine, availability, booking };
}

const atDate: CallerSession = {
  step: 'SELECT_DATE',
  serviceType: 'appointment_1',
  patientName: 'Ana Souza',
  offeredDates: { '1': '2030-06-04', '2': '2030-06-05' },
};

const atConfirm: CallerSession = {
  step: 'CONFIRM',
  serviceType: 'appointment_1',
  patientName: 'Ana Souza',
  offeredDates: { '1': '2030-06-04', '2': '2030-06-05' },
  selectedDate: '2030-06-05',
  offeredTimes: { '1': '2030-06-05T09:00:00.000-03:00', '2': '2030-06-05T10:00:00.000-03:00' },
  selectedTime: '2030-06-05T10:00:00.000-03:00',
};

const summary = {
  patientName: 'Ana Souza',
  serviceName: 'Consulta Geral',
  dateLabel: 'Quarta, 5 Jun',
  timeLabel: '10:00',
};

describe('DialogueStateMachine', () => {
  it('answers "oi" with the menu', async () => {
    const { machine } = setup();

    const result = await machine.transition({ step: 'MENU' }, { callerId: CALLER, text: 'oi' });

    expect(result.session).toEqual({ step: 'MENU' });
    expect(result.response).toEqual({
      type: 'OPTIONS',
      body: 'Olá! Bem-vindo à Clínica Teste 🏥\n\nQual serviço deseja agendar?',
      options: [...MENU_OPTIONS],
    });
    expect(result.warnings).toEqual([]);
  });

  it('resets from any step on a reset keyword, idempotently', async () => {
    const { machine } = setup();

    const once = await machine.transition(atConfirm, { callerId: CALLER, text: '  MENU ' });
    const twice = await machine.transition(once.session, { callerId: CALLER, text: 'menu' });

    expect(once.session).toEqual({ step: 'MENU' });
    expect(twice).toEqual(once);
  });

  it('starts the booking flow for a chosen service', async () => {
    const { machine } = setup();

    const result = await machine.transition(
      { step: 'MENU' },
      { callerId: CALLER, text: 'Consulta Especializada', resolvedOptionId: 'appointment_2' },
    );

    expect(result.session).toEqual({ step: 'AWAITING_NAME', serviceType: 'appointment_2' });
    expect(result.response).toEqual({ type: 'TEXT', body: messages.askName() });
  });

  it('shows office hours without leaving the menu', async () => {
    const { machine } = setup();

    const result = await machine.transition(
      { step: 'MENU' },
      { callerId: CALLER, text: '3', resolvedOptionId: 'office_hours' },
    );

    expect(result.session).toEqual({ step: 'MENU' });
    expect(result.response.type).toBe('TEXT');
    expect(result.response.body).toContain('Segunda a Sexta: 09:00 - 17:00');
    expect(result.response.body).toContain('⏰ Duração da consulta: 30 minutos');
  });

  it('corrects an unknown menu answer', async () => {
    const { machine } = setup();

    const result = await machine.transition({ step: 'MENU' }, { callerId: CALLER, text: 'quero marcar' });

    expect(result.session).toEqual({ step: 'MENU' });
    expect(result.response).toEqual({ type: 'TEXT', body: messages.invalidOption() });
  });

  it('offers dates once the patient gives a name', async () => {
    const { machine, availability } = setup();

    const result = await machine.transition(
      { step: 'AWAITING_NAME', serviceType: 'appointment_1' },
      { callerId: CALLER, text: ' Ana Souza ' },
    );

    expect(availability.getAvailableDates).toHaveBeenCalledWith(NOW, 14);
    expect(result.session).toEqual(atDate);
    expect(result.response).toEqual({
      type: 'OPTIONS',
      body: 'Obrigado, Ana Souza!\n\nEscolha uma data disponível:',
      options: [
        { id: 'date_1', label: 'Terça, 4 Jun' },
        { id: 'date_2', label: 'Quarta, 5 Jun' },
      ],
    });
  });

  it('asks again for an empty name', async () => {
    const { machine, availability } = setup();
    const session: CallerSession = { step: 'AWAITING_NAME', serviceType: 'appointment_1' };

    const result = await machine.transition(session, { callerId: CALLER, text: '   ' });

    expect(result.session).toEqual(session);
    expect(result.response).toEqual({ type: 'TEXT', body: messages.askNameAgain() });
    expect(availability.getAvailableDates).not.toHaveBeenCalled();
  });

  it('apologises with the clinic phone when no date is free', async () => {
    const { machine } = setup({ dates: [] });

    const result = await machine.transition(
      { step: 'AWAITING_NAME', serviceType: 'appointment_1' },
      { callerId: CALLER, text: 'Ana Souza' },
    );

    expect(result.session).toEqual({
      step: 'SELECT_DATE',
      serviceType: 'appointment_1',
      patientName: 'Ana Souza',
    });
    expect(result.response).toEqual({ type: 'TEXT', body: messages.noDates('(41) 0000-0000') });
  });

  it('resolves a typed numeral against the offered dates', async () => {
    const { machine, availability } = setup();

    const result = await machine.transition(atDate, { callerId: CALLER, text: '2' });

    expect(availability.getAvailableSlots).toHaveBeenCalledWith('2030-06-05');
    expect(result.session).toEqual({
      ...atDate,
      step: 'SELECT_TIME',
      selectedDate: '2030-06-05',
      offeredTimes: { '1': '2030-06-05T09:00:00.000-03:00', '2': '2030-06-05T10:00:00.000-03:00' },
    });
    expect(result.response).toEqual({
      type: 'OPTIONS',
      body: 'Data selecionada: Quarta, 5 Jun\n\nEscolha um horário:',
      options: [
        { id: 'time_1', label: '09:00' },
        { id: 'time_2', label: '10:00' },
      ],
    });
  });

  it('prefers the structured id over the message text', async () => {
    const { machine } = setup();

    const result = await machine.transition(atDate, {
      callerId: CALLER,
      text: '2',
      resolvedOptionId: 'date_1',
    });

    expect(result.session.selectedDate).toBe('2030-06-04');
  });

  it('rejects an index that was not offered', async () => {
    const { machine } = setup();

    const result = await machine.transition(atDate, { callerId: CALLER, text: '7' });

    expect(result.session).toEqual(atDate);
    expect(result.response).toEqual({ type: 'TEXT', body: messages.invalidDate() });
  });

  it('apologises when the chosen date has no free time left', async () => {
    const { machine } = setup({ slots: [] });

    const result = await machine.transition(atDate, { callerId: CALLER, text: '1' });

    expect(result.session.step).toBe('SELECT_TIME');
    expect(result.session.offeredTimes).toBeUndefined();
    expect(result.response).toEqual({ type: 'TEXT', body: messages.noTimes() });
  });

  it('summarises the appointment after a time is chosen', async () => {
    const { machine } = setup();
    const atTime: CallerSession = { ...atConfirm, step: 'SELECT_TIME', selectedTime: undefined };

    const result = await machine.transition(atTime, {
      callerId: CALLER,
      text: '10:00',
      resolvedOptionId: 'time_2',
    });

    expect(result.session).toEqual({ ...atConfirm });
    expect(result.response).toEqual({
      type: 'OPTIONS',
      body: messages.summary(summary),
      options: [...CONFIRM_OPTIONS],
    });
  });

  it('books and returns to the menu on confirmation', async () => {
    const { machine, booking } = setup();

    const result = await machine.transition(atConfirm, {
      callerId: CALLER,
      text: 'Sim, confirmar',
      resolvedOptionId: 'confirm_yes',
    });

    expect(booking.createAppointment).toHaveBeenCalledWith({
      patientName: 'Ana Souza',
      callerId: CALLER,
      serviceType: 'Consulta Geral',
      startTime: new Date('2030-06-05T13:00:00.000Z'),
      durationMinutes: 30,
    });
    expect(result.session).toEqual({ step: 'MENU' });
    expect(result.response).toEqual({ type: 'TEXT', body: messages.bookingConfirmed(summary) });
    expect(result.response.body).toContain('👤 Paciente: Ana Souza');
  });

  it('accepts a typed "1" as confirmation', async () => {
    const { machine, booking } = setup();

    await machine.transition(atConfirm, { callerId: CALLER, text: '1' });

    expect(booking.createAppointment).toHaveBeenCalledTimes(1);
  });

  it('stays at confirmation when the calendar write fails', async () => {
    const { machine } = setup({ booking: err<BookingFailure>({ reason: 'calendar_error', message: 'boom' }) });

    const result = await machine.transition(atConfirm, {
      callerId: CALLER,
      text: '',
      resolvedOptionId: 'confirm_yes',
    });

    expect(result.session).toEqual(atConfirm);
    expect(result.response).toEqual({ type: 'TEXT', body: messages.bookingFailed('(41) 0000-0000') });
  });

  it('tells the caller when the slot was taken meanwhile', async () => {
    const { machine } = setup({ booking: err<BookingFailure>({ reason: 'slot_taken', message: 'taken' }) });

    const result = await machine.transition(atConfirm, {
      callerId: CALLER,
      text: '',
      resolvedOptionId: 'confirm_yes',
    });

    expect(result.session).toEqual(atConfirm);
    expect(result.response).toEqual({ type: 'TEXT', body: messages.slotTaken() });
  });

  it('cancels on confirm_no', async () => {
    const { machine, booking } = setup();

    const result = await machine.transition(atConfirm, {
      callerId: CALLER,
      text: 'Cancelar',
      resolvedOptionId: 'confirm_no',
    });

    expect(booking.createAppointment).not.toHaveBeenCalled();
    expect(result.session).toEqual({ step: 'MENU' });
    expect(result.response).toEqual({ type: 'TEXT', body: messages.cancelled() });
  });

  it('falls back on anything else at confirmation', async () => {
    const { machine } = setup();

    const result = await machine.transition(atConfirm, { callerId: CALLER, text: 'talvez' });

    expect(result.session).toEqual(atConfirm);
    expect(result.response).toEqual({ type: 'TEXT', body: messages.fallback() });
  });

  it('never mutates the session it was given', async () => {
    const { machine } = setup();
    const before = structuredClone(atDate);

    await machine.transition(atDate, { callerId: CALLER, text: '1' });

    expect(atDate).toEqual(before);
  });

  it('walks the whole flow through allowed steps only', async () => {
    const { machine } = setup();
    const turns = [
      { text: '1', resolvedOptionId: 'appointment_1' },
      { text: 'Ana Souza' },
      { text: '2' },
      { text: '2' },
      { text: '1' },
    ];

    let session: CallerSession = machine.newSession();
    const steps: string[] = [];
    for (const turn of turns) {
      const result = await machine.transition(session, { callerId: CALLER, ...turn });
      expect(result.warnings).toEqual([]);
      session = result.session;
      steps.push(session.step);
    }

    expect(steps).toEqual(['AWAITING_NAME', 'SELECT_DATE', 'SELECT_TIME', 'CONFIRM', 'MENU']);
  });
});

describe('resolveIndex', () => {
  it('strips the step prefix from a structured id', () => {
    expect(resolveIndex('date_', 'Terça, 4 Jun', 'date_2')).toBe('2');
  });

  it('uses all-digit text as the index', () => {
    expect(resolveIndex('time_', '3')).toBe('3');
  });

  it('ignores ids of another step and non-numeric text', () => {
    expect(resolveIndex('time_', 'amanhã', 'date_1')).toBeUndefined();
  });
});
