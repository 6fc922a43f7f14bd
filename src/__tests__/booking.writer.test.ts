import { describe, expect, it } from 'vitest';

import type { AppointmentRequest } from '@core/interfaces/index.js';
import { AvailabilityService } from '@services/booking/availability.service.js';
import { BookingWriter, buildAppointmentEvent } from '@services/booking/booking.writer.js';
import { FakeCalendar, busy, testScheduling } from '@test/fakes/fake-calendar.js';

const request: AppointmentRequest = {
  patientName: 'Ana Souza',
  callerId: '5541999990000',
  serviceType: 'Consulta Geral',
  startTime: new Date('2030-06-04T13:00:00Z'),
  durationMinutes: 30,
};

function writerFor(calendar: FakeCalendar): BookingWriter {
  return new BookingWriter(calendar, new AvailabilityService(calendar, testScheduling), testScheduling);
}

describe('buildAppointmentEvent', () => {
  it('describes the appointment for the calendar', () => {
    expect(buildAppointmentEvent(request, testScheduling)).toEqual({
      summary: 'Consulta Geral - Ana Souza',
      description: 'Paciente: Ana Souza\nTelefone: 5541999990000\nTipo: Consulta Geral',
      start: new Date('2030-06-04T13:00:00Z'),
      end: new Date('2030-06-04T13:30:00Z'),
      timeZone: 'America/Sao_Paulo',
      reminders: [
        { method: 'popup', minutes: 1440 },
        { method: 'popup', minutes: 60 },
      ],
    });
  });
});

describe('BookingWriter', () => {
  it('returns the calendar event id on success', async () => {
    const calendar = new FakeCalendar();

    const result = await writerFor(calendar).createAppointment(request);

    expect(result).toEqual({ ok: true, value: 'evt-1' });
    expect(calendar.inserted).toHaveLength(1);
  });

  it('refuses a slot that was taken since it was offered', async () => {
    const calendar = new FakeCalendar([busy('2030-06-04T13:00:00Z', '2030-06-04T13:30:00Z')]);

    const result = await writerFor(calendar).createAppointment(request);

    expect(result).toEqual({
      ok: false,
      error: { reason: 'slot_taken', message: 'Slot is no longer available' },
    });
    expect(calendar.inserted).toHaveLength(0);
  });

  it('converts an insert failure into a calendar_error', async () => {
    const calendar = new FakeCalendar();
    calendar.failInsert = true;

    const result = await writerFor(calendar).createAppointment(request);

    expect(result).toEqual({ ok: false, error: { reason: 'calendar_error', message: 'insert failed' } });
  });

  it('still inserts when the re-check cannot read the calendar', async () => {
    const calendar = new FakeCalendar();
    calendar.failList = true;

    const result = await writerFor(calendar).createAppointment(request);

    expect(result).toEqual({ ok: true, value: 'evt-1' });
  });

  it('lets only one of two concurrent writers take the same slot', async () => {
    const calendar = new FakeCalendar();
    const writer = writerFor(calendar);

    const [first, second] = await Promise.all([
      writer.createAppointment(request),
      writer.createAppointment({ ...request, patientName: 'Bruno Lima', callerId: '5541988880000' }),
    ]);

    expect(first).toEqual({ ok: true, value: 'evt-1' });
    expect(second.ok).toBe(false);
    if (!second.ok) expect(second.error.reason).toBe('slot_taken');
    expect(calendar.inserted).toHaveLength(1);
  });
});
