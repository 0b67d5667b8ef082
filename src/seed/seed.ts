import path from 'path';
import { addDays } from 'date-fns';
import { getEnv } from '../config/env';
import { AppointmentStore, BookingSettings, createAppointment } from '../services';
import { toIsoDate } from '../services/types';

const SAMPLES = [
  { dayOffset: 1, time: '09:00', name: 'Sample Customer A', contact: '+1 555 0100', issueType: 'Regular Maintenance' },
  { dayOffset: 1, time: '11:30', name: 'Sample Customer B', contact: 'customer.b@example.com', issueType: 'Brakes / Suspension' },
  { dayOffset: 2, time: '10:00', name: 'Sample Customer C', contact: '+1 555 0102', issueType: 'Electrical / Battery' },
  { dayOffset: 3, time: '14:15', name: 'Sample Customer D', contact: 'customer.d@example.com', issueType: 'Other', notes: 'Rattle from the rear left wheel' },
];

function main() {
  const env = getEnv();
  const store = new AppointmentStore(path.resolve(env.APPOINTMENTS_FILE));
  const settings = new BookingSettings({ bufferMinutes: env.BUFFER_MINUTES });
  const today = new Date();

  console.log(`Seeding ${store.filePath}...`);

  for (const sample of SAMPLES) {
    const { dayOffset, ...fields } = sample;
    const result = createAppointment(
      store,
      { ...fields, date: toIsoDate(addDays(today, dayOffset)) },
      settings.get(),
      today
    );

    if (result.success) {
      console.log(`  + #${result.data.id} ${result.data.date} ${result.data.time} ${result.data.name}`);
    } else {
      console.log(`  - skipped ${sample.name}: ${result.error.message}`);
    }
  }

  console.log('Seeding complete.');
}

try {
  main();
} catch (error) {
  console.error('Seed failed.', error);
  process.exit(1);
}
