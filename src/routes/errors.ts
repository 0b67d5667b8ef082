import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { describeIssues } from '../schemas/appointment.schema';
import { ErrorCode, type ServiceError } from '../services/types';

export function getStatusCodeForError(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.APPOINTMENT_NOT_FOUND:
      return 404;
    case ErrorCode.OVERLAPPING_APPOINTMENT:
      return 409;
    case ErrorCode.VALIDATION_ERROR:
    case ErrorCode.BOOKING_IN_PAST:
    case ErrorCode.CONFIRMATION_REQUIRED:
      return 400;
    default:
      return 500;
  }
}

export function sendServiceError(reply: FastifyReply, error: ServiceError) {
  if (error.code === ErrorCode.STORAGE_ERROR) {
    reply.log.error({ details: error.details }, error.message);
  }

  return reply.status(getStatusCodeForError(error.code)).send({
    error: {
      code: error.code,
      message: error.message,
      details: error.details,
    },
  });
}

export function sendValidationError(reply: FastifyReply, message: string, zodError: ZodError) {
  return reply.status(400).send({
    error: {
      code: ErrorCode.VALIDATION_ERROR,
      message,
      details: { issues: describeIssues(zodError) },
    },
  });
}
