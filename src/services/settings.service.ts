/**
 * Runtime booking settings.
 *
 * Buffer minutes live for the lifetime of the process only; the value is
 * read each time a conflict check runs.
 */

import { BUFFER_LIMITS } from '../config/booking';
import { type BookingConfig, DEFAULT_BOOKING_CONFIG, ErrorCode, type ServiceResult, failure, success } from './types';

export class BookingSettings {
  private bufferMinutes: number;

  constructor(initial: Partial<BookingConfig> = {}) {
    const { bufferMinutes } = { ...DEFAULT_BOOKING_CONFIG, ...initial };
    if (!isValidBufferMinutes(bufferMinutes)) {
      throw new RangeError(
        `bufferMinutes must be an integer between ${BUFFER_LIMITS.MIN} and ${BUFFER_LIMITS.MAX}, got ${bufferMinutes}`
      );
    }
    this.bufferMinutes = bufferMinutes;
  }

  get(): BookingConfig {
    return { bufferMinutes: this.bufferMinutes };
  }

  setBufferMinutes(value: number): ServiceResult<BookingConfig> {
    if (!isValidBufferMinutes(value)) {
      return failure(
        ErrorCode.VALIDATION_ERROR,
        `Buffer minutes must be an integer between ${BUFFER_LIMITS.MIN} and ${BUFFER_LIMITS.MAX}`,
        { bufferMinutes: value }
      );
    }
    this.bufferMinutes = value;
    return success(this.get());
  }
}

export function isValidBufferMinutes(value: number): boolean {
  return Number.isInteger(value) && value >= BUFFER_LIMITS.MIN && value <= BUFFER_LIMITS.MAX;
}
