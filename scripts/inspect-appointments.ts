import path from 'path';
import { getEnv } from '../src/config/env';
import { AppointmentStore, sortAppointments } from '../src/services';

function main() {
  const store = new AppointmentStore(path.resolve(getEnv().APPOINTMENTS_FILE));
  const appointments = sortAppointments(store.load());

  console.log(`${store.filePath}: ${appointments.length} appointment(s)`);

  let currentDate = '';
  for (const apt of appointments) {
    if (apt.date !== currentDate) {
      currentDate = apt.date;
      console.log('');
      console.log(currentDate);
    }
    console.log(`  ${apt.time}  #${apt.id}  ${apt.name} <${apt.contact}>  [${apt.issueType}]${apt.notes ? `  ${apt.notes}` : ''}`);
  }
}

try {
  main();
} catch (error) {
  console.error('Error:', error);
  process.exit(1);
}
