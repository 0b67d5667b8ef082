/**
 * Booking Policy Configuration
 *
 * Centralized constants for the booking form: issue categories,
 * buffer limits and list pagination.
 */

export const ISSUE_TYPES = [
  'Regular Maintenance',
  'Engine Problem',
  'Electrical / Battery',
  'Brakes / Suspension',
  'Tires / Wheels',
  'Other',
] as const;

export type KnownIssueType = (typeof ISSUE_TYPES)[number];

export const DEFAULT_ISSUE_TYPE: KnownIssueType = 'Other';

export const BUFFER_LIMITS = {
  /**
   * Minutes required between two appointment start times on the same date.
   * 0 disables the buffer: only identical times collide.
   */
  DEFAULT: 0,
  MIN: 0,
  /** A full day. */
  MAX: 1440,
};

export const FIELD_LIMITS = {
  NAME_MAX_LENGTH: 100,
  CONTACT_MAX_LENGTH: 200,
  ISSUE_TYPE_MAX_LENGTH: 100,
  NOTES_MAX_LENGTH: 2000,
};

export const PAGINATION = {
  DEFAULT_PAGE_SIZE: 5,
  MAX_PAGE_SIZE: 100,
};
