import type { FastifyPluginAsync } from 'fastify';
import { updateSettingsBodySchema } from '../schemas/appointment.schema';
import type { BookingSettings } from '../services/settings.service';
import { sendServiceError, sendValidationError } from './errors';

export interface SettingsRoutesOptions {
  settings: BookingSettings;
}

export const settingsRoutes: FastifyPluginAsync<SettingsRoutesOptions> = async (server, { settings }) => {
  // GET /settings
  server.get('/settings', async () => {
    return settings.get();
  });

  // PUT /settings - Change buffer minutes for this session
  server.put('/settings', async (request, reply) => {
    const body = updateSettingsBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(reply, 'Invalid settings payload', body.error);
    }

    const result = settings.setBufferMinutes(body.data.bufferMinutes);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    request.log.info({ bufferMinutes: result.data.bufferMinutes }, 'Buffer minutes changed');
    return result.data;
  });
};
