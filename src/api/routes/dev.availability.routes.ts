import { Router } from 'express';
import { DateTime } from 'luxon';

import { ValidationError } from '@core/errors/validation.error.js';
import { AvailabilityService } from '@services/booking/availability.service.js';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Debug listing of what the assistant would offer, outside production only. */
export function createDevAvailabilityRouter(svc: AvailabilityService = new AvailabilityService()): Router {
  const router = Router();

  // GET /v1/dev/availability/dates?from=2030-06-03T12:00:00Z
  router.get('/dev/availability/dates', async (req, res, next) => {
    try {
      const from = typeof req.query.from === 'string' ? DateTime.fromISO(req.query.from) : DateTime.now();
      if (!from.isValid) throw new ValidationError('from must be an ISO datetime');
      const dates = await svc.getAvailableDates(from.toJSDate());
      res.json({ timezone: svc.timezone, dates });
    } catch (e) {
      next(e);
    }
  });

  // GET /v1/dev/availability/2030-06-03
  router.get('/dev/availability/:date', async (req, res, next) => {
    try {
      const dateISO = req.params.date;
      if (!DAY_PATTERN.test(dateISO) || !DateTime.fromISO(dateISO).isValid) {
        throw new ValidationError('date must be yyyy-MM-dd');
      }
      const slots = await svc.getAvailableSlots(dateISO);
      res.json({
        date: dateISO,
        slots: slots.map((s) => ({ start: s.start.toISOString(), end: s.end.toISOString() })),
      });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
