import { BadRequestException } from '@nestjs/common';

/**
 * Raised for malformed product data or misuse of the gateway
 * (e.g. updating a product that was never created).
 * Never retried; surfaces as 400 Bad Request over HTTP.
 */
export class DataValidationError extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}
