import { z } from 'zod';
import { BUFFER_LIMITS, PAGINATION } from '../config/booking';
import { isIsoDate } from '../services/types';

const isoDateSchema = z.string().refine(isIsoDate, 'Expected a calendar date (YYYY-MM-DD)');

export const appointmentIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const createAppointmentBodySchema = z.object({
  name: z.string(),
  contact: z.string(),
  date: z.string(),
  time: z.string(),
  issueType: z.string().optional(),
  notes: z.string().optional(),
});

export type CreateAppointmentBody = z.infer<typeof createAppointmentBodySchema>;

export const updateAppointmentBodySchema = createAppointmentBodySchema.partial();

export type UpdateAppointmentBody = z.infer<typeof updateAppointmentBodySchema>;

// Fields are only all required for a new booking; the route checks that
export const checkAppointmentBodySchema = updateAppointmentBodySchema.extend({
  /** Id of the appointment being edited; the fields are then partial changes */
  excludeId: z.number().int().positive().optional(),
});

export const appointmentFilterQuerySchema = z.object({
  dateFrom: isoDateSchema.optional(),
  dateTo: isoDateSchema.optional(),
  // ?issueType=A&issueType=B arrives as an array
  issueType: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]))
    .transform((values) => values.map((v) => v.trim()).filter(Boolean)),
  search: z.string().optional(),
  order: z.enum(['asc', 'desc']).default('asc'),
});

export const listAppointmentsQuerySchema = appointmentFilterQuerySchema.extend({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(PAGINATION.MAX_PAGE_SIZE).default(PAGINATION.DEFAULT_PAGE_SIZE),
});

export const exportAppointmentsQuerySchema = appointmentFilterQuerySchema.extend({
  scope: z.enum(['all', 'filtered']).default('all'),
});

export const deleteAppointmentQuerySchema = z.object({
  confirm: z.enum(['true', 'false']).default('false'),
});

export const updateSettingsBodySchema = z.object({
  bufferMinutes: z.number().int().min(BUFFER_LIMITS.MIN).max(BUFFER_LIMITS.MAX),
});

export type UpdateSettingsBody = z.infer<typeof updateSettingsBodySchema>;

/**
 * Flattens zod issues into `{ path, message }` pairs for error responses.
 */
export function describeIssues(error: z.ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}
