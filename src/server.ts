import path from 'path';
import { buildServer } from './app';
import { getEnv } from './config/env';
import { AppointmentStore } from './services/appointment.store';
import { BookingSettings } from './services/settings.service';

const start = async () => {
  const env = getEnv();
  const store = new AppointmentStore(path.resolve(env.APPOINTMENTS_FILE));
  const settings = new BookingSettings({ bufferMinutes: env.BUFFER_MINUTES });

  const server = await buildServer({
    store,
    settings,
    logger: { level: env.LOG_LEVEL },
    corsOrigins: env.CORS_ORIGINS,
  });

  try {
    // Surface an unreadable or corrupt file at startup
    const existing = store.load();
    server.log.info({ file: store.filePath, appointments: existing.length }, 'Appointments file loaded');

    await server.listen({ port: env.PORT, host: env.HOST });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
};

start().catch((err) => {
  console.error('Failed to start server', err);
  process.exit(1);
});
