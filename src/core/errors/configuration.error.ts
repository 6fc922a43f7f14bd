import { BaseError } from './base-error.js';

export class ConfigurationError extends BaseError {
  constructor(message = 'Service is not configured') {
    super('CONFIGURATION_ERROR', 500, message);
  }
}
