/**
 * Car Service Booking Services
 *
 * Framework-agnostic service functions for the booking API. The store is
 * the only part that touches the file system; the checker and query
 * functions are pure.
 */

// Re-export all types and configuration
export type {
  BookingConfig,
  Appointment,
  AppointmentFields,
  ServiceResult,
  ServiceError,
  CreateAppointmentInput,
  UpdateAppointmentInput,
  ConflictingAppointment,
  AppointmentFilter,
  AppointmentQuery,
  Page,
  SortOrder,
} from './types';

export { DEFAULT_BOOKING_CONFIG, ErrorCode, success, failure } from './types';

// Flat-file store
export { AppointmentStore, StorageError, formatAppointmentsCsv } from './appointment.store';

// Validation and conflict detection
export { validateAppointmentFields, findConflicts, checkSlot } from './conflict.service';

// Filtering, ordering and pagination
export { filterAppointments, sortAppointments, paginate, queryAppointments } from './query.service';

// Appointment booking service
export {
  createAppointment,
  updateAppointment,
  deleteAppointment,
  getAppointment,
  listAppointments,
  validateAppointmentSlot,
  validateAppointmentEdit,
} from './appointment.service';

export { exportAppointmentsCsv } from './export.service';
export type { ExportScope, ExportOptions, CsvExport } from './export.service';

export { BookingSettings } from './settings.service';
