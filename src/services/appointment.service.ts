/**
 * Appointment Booking Service
 *
 * CRUD over the appointment set with:
 * - Field validation before anything is written
 * - Conflict prevention with a configurable buffer between start times
 * - Prevention of booking in the past
 * - A full load -> validate -> save cycle on every mutation
 */

import { type AppointmentStore, StorageError } from './appointment.store';
import { checkSlot } from './conflict.service';
import { queryAppointments } from './query.service';
import {
  type Appointment,
  type AppointmentFields,
  type AppointmentQuery,
  type BookingConfig,
  type CreateAppointmentInput,
  ErrorCode,
  type Page,
  type ServiceResult,
  type UpdateAppointmentInput,
  failure,
  success,
  toIsoDate,
} from './types';

/**
 * Runs `fn` and turns storage failures into STORAGE_ERROR results.
 * Anything else is re-thrown.
 */
export function withStorage<T>(fn: () => ServiceResult<T>): ServiceResult<T> {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StorageError) {
      return failure(ErrorCode.STORAGE_ERROR, error.message, {
        storageCode: error.code,
        filePath: error.filePath,
      });
    }
    throw error;
  }
}

function notFound<T>(id: number): ServiceResult<T> {
  return failure(ErrorCode.APPOINTMENT_NOT_FOUND, `Appointment with ID ${id} not found`);
}

// ============================================================================
// Main Booking Service
// ============================================================================

/**
 * Creates a new appointment after validation and conflict checks.
 *
 * @param config - Booking configuration overrides (buffer minutes)
 * @param now - Submission time; the date may not be before its calendar day
 */
export function createAppointment(
  store: AppointmentStore,
  input: CreateAppointmentInput,
  config: Partial<BookingConfig> = {},
  now: Date = new Date()
): ServiceResult<Appointment> {
  return withStorage(() => {
    const appointments = store.load();

    const checked = checkSlot(input, appointments, { today: toIsoDate(now) }, config);
    if (!checked.success) {
      return checked;
    }

    const appointment: Appointment = { id: store.nextId(appointments), ...checked.data };
    store.save([...appointments, appointment]);

    return success(appointment);
  });
}

/**
 * Merges partial changes over the stored record and checks the result
 * against every other appointment. The past-date rule only applies when the
 * date itself changes, so a past appointment can still have its notes edited.
 */
function checkEdit(
  appointments: Appointment[],
  current: Appointment,
  changes: UpdateAppointmentInput,
  config: Partial<BookingConfig>,
  now: Date
): ServiceResult<AppointmentFields> {
  const merged: CreateAppointmentInput = {
    name: changes.name ?? current.name,
    contact: changes.contact ?? current.contact,
    date: changes.date ?? current.date,
    time: changes.time ?? current.time,
    issueType: changes.issueType ?? current.issueType,
    notes: changes.notes ?? current.notes,
  };

  return checkSlot(
    merged,
    appointments,
    {
      today: toIsoDate(now),
      excludeId: current.id,
      requireFutureDate: merged.date.trim() !== current.date,
    },
    config
  );
}

/**
 * Applies partial changes to an existing appointment.
 */
export function updateAppointment(
  store: AppointmentStore,
  id: number,
  changes: UpdateAppointmentInput,
  config: Partial<BookingConfig> = {},
  now: Date = new Date()
): ServiceResult<Appointment> {
  return withStorage(() => {
    const appointments = store.load();
    const index = appointments.findIndex((a) => a.id === id);
    if (index === -1) {
      return notFound<Appointment>(id);
    }

    const checked = checkEdit(appointments, appointments[index], changes, config, now);
    if (!checked.success) {
      return checked;
    }

    const updated: Appointment = { id, ...checked.data };
    const next = [...appointments];
    next[index] = updated;
    store.save(next);

    return success(updated);
  });
}

/**
 * Removes an appointment. Unknown ids are reported, never thrown.
 */
export function deleteAppointment(store: AppointmentStore, id: number): ServiceResult<Appointment> {
  return withStorage(() => {
    const appointments = store.load();
    const target = appointments.find((a) => a.id === id);
    if (!target) {
      return notFound<Appointment>(id);
    }

    store.save(appointments.filter((a) => a.id !== id));
    return success(target);
  });
}

export function getAppointment(store: AppointmentStore, id: number): ServiceResult<Appointment> {
  return withStorage(() => {
    const appointment = store.load().find((a) => a.id === id);
    return appointment ? success(appointment) : notFound<Appointment>(id);
  });
}

export function listAppointments(store: AppointmentStore, query: AppointmentQuery = {}): ServiceResult<Page<Appointment>> {
  return withStorage(() => success(queryAppointments(store.load(), query)));
}

// ============================================================================
// Utility Functions for External Use
// ============================================================================

/**
 * Validates an appointment without creating it.
 * Useful for real-time form validation before submission.
 */
export function validateAppointmentSlot(
  store: AppointmentStore,
  input: CreateAppointmentInput,
  config: Partial<BookingConfig> = {},
  now: Date = new Date()
): ServiceResult<AppointmentFields> {
  return withStorage(() => checkSlot(input, store.load(), { today: toIsoDate(now) }, config));
}

/**
 * Dry run of updateAppointment: same merge, same rules, nothing saved.
 */
export function validateAppointmentEdit(
  store: AppointmentStore,
  id: number,
  changes: UpdateAppointmentInput,
  config: Partial<BookingConfig> = {},
  now: Date = new Date()
): ServiceResult<AppointmentFields> {
  return withStorage(() => {
    const appointments = store.load();
    const current = appointments.find((a) => a.id === id);
    if (!current) {
      return notFound<AppointmentFields>(id);
    }
    return checkEdit(appointments, current, changes, config, now);
  });
}
