import { BaseError } from './base-error.js';

export class ValidationError extends BaseError {
  constructor(message = 'Validation failed', public readonly data?: unknown) {
    super('VALIDATION_ERROR', 422, message);
  }
}
