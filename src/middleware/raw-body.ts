import type { RequestHandler } from 'express';
import { raw } from 'express';

/** Keeps the exact bytes the signature was computed over. */
export const rawBody: RequestHandler = (req, res, next) => {
  raw({ type: '*/*', limit: '1mb' })(req, res, (err?: unknown) => {
    if (err) return next(err);
    if (Buffer.isBuffer(req.body)) req.rawBody = req.body;
    next();
  });
};
