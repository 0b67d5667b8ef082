import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { appointmentRoutes } from './routes/appointments';
import { issueTypeRoutes } from './routes/issueTypes';
import { settingsRoutes } from './routes/settings';
import type { AppointmentStore } from './services/appointment.store';
import type { BookingSettings } from './services/settings.service';

export interface BuildServerDeps {
  store: AppointmentStore;
  settings: BookingSettings;
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: string[];
  now?: () => Date;
}

export async function buildServer(deps: BuildServerDeps) {
  const { store, settings, now } = deps;
  const server = Fastify({ logger: deps.logger ?? false });

  server.get('/health', async () => {
    return { status: 'ok' };
  });

  if (deps.corsOrigins && deps.corsOrigins.length > 0) {
    await server.register(cors, {
      origin: deps.corsOrigins,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    });
  }

  await server.register(issueTypeRoutes);
  await server.register(settingsRoutes, { settings });
  await server.register(appointmentRoutes, { store, settings, now });

  return server;
}
