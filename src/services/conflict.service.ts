/**
 * Conflict & Validation Service
 *
 * Pure checks run before any insert or update:
 * - Field validation (required text, date format, no past dates, time format)
 * - Time conflict detection against the existing set, with a buffer window
 *
 * Nothing here touches the file system.
 */

import { DEFAULT_ISSUE_TYPE, FIELD_LIMITS } from '../config/booking';
import {
  type Appointment,
  type AppointmentFields,
  type BookingConfig,
  type ConflictingAppointment,
  type CreateAppointmentInput,
  DEFAULT_BOOKING_CONFIG,
  ErrorCode,
  type ServiceResult,
  failure,
  formatTimeOfDay,
  isIsoDate,
  parseTimeOfDay,
  success,
} from './types';

// ============================================================================
// Field Validation
// ============================================================================

export interface FieldValidationOptions {
  /** Current local date, YYYY-MM-DD */
  today: string;
  /** When false the past-date rule is skipped (edits that keep their date) */
  requireFutureDate?: boolean;
}

export type FieldErrors = Partial<Record<keyof AppointmentFields, string>>;

/**
 * Validates and normalizes appointment fields.
 *
 * Collects every field error. A request whose only problem is a past date
 * is reported as BOOKING_IN_PAST, anything else as VALIDATION_ERROR.
 */
export function validateAppointmentFields(
  input: CreateAppointmentInput,
  options: FieldValidationOptions
): ServiceResult<AppointmentFields> {
  const { today, requireFutureDate = true } = options;
  const errors: FieldErrors = {};

  const name = input.name.trim();
  if (!name) {
    errors.name = 'Name is required';
  } else if (name.length > FIELD_LIMITS.NAME_MAX_LENGTH) {
    errors.name = `Name must be at most ${FIELD_LIMITS.NAME_MAX_LENGTH} characters`;
  }

  const contact = input.contact.trim();
  if (!contact) {
    errors.contact = 'Contact is required';
  } else if (contact.length > FIELD_LIMITS.CONTACT_MAX_LENGTH) {
    errors.contact = `Contact must be at most ${FIELD_LIMITS.CONTACT_MAX_LENGTH} characters`;
  }

  const date = input.date.trim();
  const validDate = isIsoDate(date);
  const inPast = validDate && requireFutureDate && date < today;
  if (!validDate) {
    errors.date = 'Date must be a valid calendar date (YYYY-MM-DD)';
  } else if (inPast) {
    errors.date = 'Date cannot be in the past';
  }

  const minutes = parseTimeOfDay(input.time);
  if (minutes === null) {
    errors.time = 'Time must be a valid time of day (HH:MM)';
  }

  const issueType = input.issueType?.trim() || DEFAULT_ISSUE_TYPE;
  if (issueType.length > FIELD_LIMITS.ISSUE_TYPE_MAX_LENGTH) {
    errors.issueType = `Issue type must be at most ${FIELD_LIMITS.ISSUE_TYPE_MAX_LENGTH} characters`;
  }

  const notes = input.notes?.trim() ?? '';
  if (notes.length > FIELD_LIMITS.NOTES_MAX_LENGTH) {
    errors.notes = `Notes must be at most ${FIELD_LIMITS.NOTES_MAX_LENGTH} characters`;
  }

  const fields = Object.keys(errors);
  if (fields.length > 0 || minutes === null) {
    if (inPast && fields.length === 1) {
      return failure(ErrorCode.BOOKING_IN_PAST, 'Cannot book appointments in the past', {
        requestedDate: date,
        today,
      });
    }
    return failure(ErrorCode.VALIDATION_ERROR, `Invalid appointment: ${Object.values(errors).join('; ')}`, {
      fields: errors,
    });
  }

  return success({
    name,
    contact,
    date,
    time: formatTimeOfDay(minutes),
    issueType,
    notes,
  });
}

// ============================================================================
// Conflict Detection
// ============================================================================

/**
 * Finds existing appointments that collide with a candidate date/time.
 *
 * Only appointments on the same calendar date are compared; the buffer does
 * not wrap across midnight. With a buffer of 0 only identical start times
 * collide, otherwise any start within `bufferMinutes` (inclusive) does.
 *
 * @param excludeId - id of the appointment being edited, never compared with itself
 */
export function findConflicts(
  candidate: Pick<Appointment, 'date' | 'time'>,
  existing: Appointment[],
  bufferMinutes: number,
  excludeId?: number
): ConflictingAppointment[] {
  const candidateMinutes = parseTimeOfDay(candidate.time);
  if (candidateMinutes === null) {
    return [];
  }

  const conflicts: ConflictingAppointment[] = [];
  for (const apt of existing) {
    if (apt.id === excludeId || apt.date !== candidate.date) {
      continue;
    }

    const otherMinutes = parseTimeOfDay(apt.time);
    if (otherMinutes === null) {
      continue;
    }

    const minutesApart = Math.abs(otherMinutes - candidateMinutes);
    const collides = bufferMinutes === 0 ? minutesApart === 0 : minutesApart <= bufferMinutes;
    if (collides) {
      conflicts.push({ id: apt.id, name: apt.name, date: apt.date, time: apt.time, minutesApart });
    }
  }

  return conflicts;
}

export interface SlotCheckOptions {
  today: string;
  /** Id of the appointment being edited */
  excludeId?: number;
  requireFutureDate?: boolean;
}

/**
 * Validation first, then conflict detection. Returns the normalized fields
 * when the slot can be booked.
 */
export function checkSlot(
  input: CreateAppointmentInput,
  existing: Appointment[],
  options: SlotCheckOptions,
  config: Partial<BookingConfig> = {}
): ServiceResult<AppointmentFields> {
  const mergedConfig = { ...DEFAULT_BOOKING_CONFIG, ...config };

  const validated = validateAppointmentFields(input, {
    today: options.today,
    requireFutureDate: options.requireFutureDate,
  });
  if (!validated.success) {
    return validated;
  }

  const conflicts = findConflicts(validated.data, existing, mergedConfig.bufferMinutes, options.excludeId);
  if (conflicts.length > 0) {
    const described = conflicts.map((c) => `#${c.id} ${c.date} ${c.time} (${c.name})`).join(', ');
    return failure(
      ErrorCode.OVERLAPPING_APPOINTMENT,
      `Time slot conflicts with existing appointment ${described}. Required buffer: ${mergedConfig.bufferMinutes} minutes.`,
      {
        conflicts,
        bufferMinutes: mergedConfig.bufferMinutes,
      }
    );
  }

  return validated;
}
