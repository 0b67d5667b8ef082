/**
 * Shared types and configuration for car service booking services
 */

import { format, isValid, parse } from 'date-fns';
import { BUFFER_LIMITS } from '../config/booking';

// ============================================================================
// Configuration
// ============================================================================

export interface BookingConfig {
  /** Minimum gap between two start times on the same date, in minutes (0 = exact match only) */
  bufferMinutes: number;
}

export const DEFAULT_BOOKING_CONFIG: BookingConfig = {
  bufferMinutes: BUFFER_LIMITS.DEFAULT,
};

// ============================================================================
// Domain
// ============================================================================

export interface Appointment {
  id: number;
  name: string;
  contact: string;
  /** ISO calendar date, YYYY-MM-DD */
  date: string;
  /** 24-hour time of day, HH:MM */
  time: string;
  issueType: string;
  notes: string;
}

export type AppointmentFields = Omit<Appointment, 'id'>;

// ============================================================================
// Result Types (discriminated unions for type-safe error handling)
// ============================================================================

export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: ServiceError };

export interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export enum ErrorCode {
  // Booking errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BOOKING_IN_PAST = 'BOOKING_IN_PAST',
  OVERLAPPING_APPOINTMENT = 'OVERLAPPING_APPOINTMENT',

  // Lookup / deletion errors
  APPOINTMENT_NOT_FOUND = 'APPOINTMENT_NOT_FOUND',
  CONFIRMATION_REQUIRED = 'CONFIRMATION_REQUIRED',

  // General errors
  STORAGE_ERROR = 'STORAGE_ERROR',
}

// ============================================================================
// Input/Output DTOs
// ============================================================================

export interface CreateAppointmentInput {
  name: string;
  contact: string;
  date: string;
  time: string;
  issueType?: string;
  notes?: string;
}

export type UpdateAppointmentInput = Partial<CreateAppointmentInput>;

export interface ConflictingAppointment {
  id: number;
  name: string;
  date: string;
  time: string;
  minutesApart: number;
}

export type SortOrder = 'asc' | 'desc';

export interface AppointmentFilter {
  /** Inclusive lower bound, YYYY-MM-DD */
  dateFrom?: string;
  /** Inclusive upper bound, YYYY-MM-DD */
  dateTo?: string;
  /** Any-of match on issue type; empty means no restriction */
  issueTypes?: string[];
  /** Case-insensitive substring over name, contact and notes */
  search?: string;
}

export interface AppointmentQuery extends AppointmentFilter {
  order?: SortOrder;
  page?: number;
  pageSize?: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  pages: number;
}

// ============================================================================
// Helper functions
// ============================================================================

/**
 * Creates a success result
 */
export function success<T>(data: T): ServiceResult<T> {
  return { success: true, data };
}

/**
 * Creates an error result
 */
export function failure<T>(code: ErrorCode, message: string, details?: Record<string, unknown>): ServiceResult<T> {
  return {
    success: false,
    error: { code, message, details },
  };
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Checks that a string is a real calendar date in YYYY-MM-DD form
 * (rejects 2024-02-30 and unpadded months).
 */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = parse(value, 'yyyy-MM-dd', new Date());
  return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === value;
}

/**
 * Parses H:MM or HH:MM into minutes since midnight, or null when invalid
 */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return hours * 60 + minutes;
}

/**
 * Formats minutes since midnight as HH:MM
 */
export function formatTimeOfDay(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Local calendar date of an instant as YYYY-MM-DD
 */
export function toIsoDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}
