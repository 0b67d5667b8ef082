/**
 * CSV export in the backing-file column layout.
 */

import { withStorage } from './appointment.service';
import { type AppointmentStore, formatAppointmentsCsv } from './appointment.store';
import { filterAppointments, sortAppointments } from './query.service';
import { type AppointmentFilter, type ServiceResult, type SortOrder, success } from './types';

export type ExportScope = 'all' | 'filtered';

export interface ExportOptions extends AppointmentFilter {
  scope: ExportScope;
  order?: SortOrder;
}

export interface CsvExport {
  fileName: string;
  count: number;
  content: string;
}

/**
 * `all` exports every appointment in file order; `filtered` exports the
 * filtered, sorted subsequence without pagination.
 */
export function exportAppointmentsCsv(store: AppointmentStore, options: ExportOptions): ServiceResult<CsvExport> {
  return withStorage(() => {
    const appointments = store.load();
    const rows =
      options.scope === 'all'
        ? appointments
        : sortAppointments(filterAppointments(appointments, options), options.order);

    return success({
      fileName: `appointments_${options.scope}.csv`,
      count: rows.length,
      content: formatAppointmentsCsv(rows),
    });
  });
}
