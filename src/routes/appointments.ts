import type { FastifyPluginAsync } from 'fastify';
import {
  appointmentIdParamsSchema,
  checkAppointmentBodySchema,
  createAppointmentBodySchema,
  deleteAppointmentQuerySchema,
  exportAppointmentsQuerySchema,
  listAppointmentsQuerySchema,
  updateAppointmentBodySchema,
} from '../schemas/appointment.schema';
import {
  createAppointment,
  deleteAppointment,
  getAppointment,
  listAppointments,
  updateAppointment,
  validateAppointmentEdit,
  validateAppointmentSlot,
} from '../services/appointment.service';
import type { AppointmentStore } from '../services/appointment.store';
import { exportAppointmentsCsv } from '../services/export.service';
import type { BookingSettings } from '../services/settings.service';
import { type AppointmentFields, ErrorCode, type ServiceResult } from '../services/types';
import { sendServiceError, sendValidationError } from './errors';

export interface AppointmentRoutesOptions {
  store: AppointmentStore;
  settings: BookingSettings;
  /** Clock used for the past-date rule */
  now?: () => Date;
}

export const appointmentRoutes: FastifyPluginAsync<AppointmentRoutesOptions> = async (server, options) => {
  const { store, settings } = options;
  const now = options.now ?? (() => new Date());

  // POST /appointments - Book a new appointment
  server.post('/appointments', async (request, reply) => {
    const body = createAppointmentBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(reply, 'Invalid appointment payload', body.error);
    }

    // Buffer is read at check time so settings changes apply immediately
    const result = createAppointment(store, body.data, settings.get(), now());
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    request.log.info(
      { appointmentId: result.data.id, date: result.data.date, time: result.data.time },
      'Appointment created'
    );
    return reply.status(201).send(result.data);
  });

  // POST /appointments/check - Validate and conflict-check without saving
  server.post('/appointments/check', async (request, reply) => {
    const body = checkAppointmentBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(reply, 'Invalid appointment payload', body.error);
    }

    const { excludeId, ...changes } = body.data;
    let result: ServiceResult<AppointmentFields>;
    if (excludeId === undefined) {
      const input = createAppointmentBodySchema.safeParse(changes);
      if (!input.success) {
        return sendValidationError(reply, 'Invalid appointment payload', input.error);
      }
      result = validateAppointmentSlot(store, input.data, settings.get(), now());
    } else {
      // Checking an edit: partial fields, merged over the stored record as PATCH does
      result = validateAppointmentEdit(store, excludeId, changes, settings.get(), now());
    }
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return { valid: true, appointment: result.data };
  });

  // GET /appointments - Filter, search, sort and paginate
  server.get('/appointments', async (request, reply) => {
    const query = listAppointmentsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return sendValidationError(reply, 'Invalid query parameters', query.error);
    }

    const { issueType, ...rest } = query.data;
    const result = listAppointments(store, { ...rest, issueTypes: issueType });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return result.data;
  });

  // GET /appointments/export - Download as CSV (all or filtered)
  server.get('/appointments/export', async (request, reply) => {
    const query = exportAppointmentsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return sendValidationError(reply, 'Invalid query parameters', query.error);
    }

    const { issueType, ...rest } = query.data;
    const result = exportAppointmentsCsv(store, { ...rest, issueTypes: issueType });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return reply
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename=${result.data.fileName}`)
      .send(result.data.content);
  });

  // GET /appointments/:id
  server.get('/appointments/:id', async (request, reply) => {
    const params = appointmentIdParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, 'Invalid appointment id', params.error);
    }

    const result = getAppointment(store, params.data.id);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return result.data;
  });

  // PATCH /appointments/:id - Edit; re-validated against every other appointment
  server.patch('/appointments/:id', async (request, reply) => {
    const params = appointmentIdParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, 'Invalid appointment id', params.error);
    }

    const body = updateAppointmentBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(reply, 'Invalid appointment payload', body.error);
    }

    const result = updateAppointment(store, params.data.id, body.data, settings.get(), now());
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    request.log.info({ appointmentId: result.data.id }, 'Appointment updated');
    return result.data;
  });

  // DELETE /appointments/:id?confirm=true - Delete after explicit confirmation
  server.delete('/appointments/:id', async (request, reply) => {
    const params = appointmentIdParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, 'Invalid appointment id', params.error);
    }

    const query = deleteAppointmentQuerySchema.safeParse(request.query);
    if (!query.success) {
      return sendValidationError(reply, 'Invalid query parameters', query.error);
    }

    if (query.data.confirm !== 'true') {
      return sendServiceError(reply, {
        code: ErrorCode.CONFIRMATION_REQUIRED,
        message: 'Deleting an appointment requires confirm=true',
        details: { appointmentId: params.data.id },
      });
    }

    const result = deleteAppointment(store, params.data.id);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    request.log.info({ appointmentId: result.data.id }, 'Appointment deleted');
    return result.data;
  });
};
