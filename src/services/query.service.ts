/**
 * Query Service
 *
 * Filtering, search, ordering and pagination over an in-memory
 * appointment set. Pure functions; the input array is never mutated.
 */

import { PAGINATION } from '../config/booking';
import type { Appointment, AppointmentFilter, AppointmentQuery, Page, SortOrder } from './types';

/**
 * Returns the appointments matching every supplied criterion.
 * Unset or empty criteria are ignored.
 */
export function filterAppointments(appointments: Appointment[], filter: AppointmentFilter): Appointment[] {
  const { dateFrom, dateTo } = filter;
  const issueTypes = new Set(filter.issueTypes ?? []);
  const search = filter.search?.trim().toLowerCase() ?? '';

  return appointments.filter((apt) => {
    // ISO dates compare correctly as strings
    if (dateFrom && apt.date < dateFrom) return false;
    if (dateTo && apt.date > dateTo) return false;
    if (issueTypes.size > 0 && !issueTypes.has(apt.issueType)) return false;
    if (search) {
      const haystack = `${apt.name}\n${apt.contact}\n${apt.notes}`.toLowerCase();
      if (!haystack.includes(search)) return false;
    }
    return true;
  });
}

function compareAppointments(a: Appointment, b: Appointment): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.time !== b.time) return a.time < b.time ? -1 : 1;
  return a.id - b.id;
}

/**
 * Orders by date, then time, then id.
 */
export function sortAppointments(appointments: Appointment[], order: SortOrder = 'asc'): Appointment[] {
  const sorted = [...appointments].sort(compareAppointments);
  return order === 'desc' ? sorted.reverse() : sorted;
}

/**
 * Slices one page out of `items`. Pages are 1-based; a page past the end
 * is clamped to the last page.
 */
export function paginate<T>(items: T[], page = 1, pageSize: number = PAGINATION.DEFAULT_PAGE_SIZE): Page<T> {
  const size = Math.max(1, Math.floor(pageSize));
  const total = items.length;
  const pages = Math.max(1, Math.ceil(total / size));
  const current = Math.min(Math.max(1, Math.floor(page)), pages);
  const start = (current - 1) * size;

  return {
    items: items.slice(start, start + size),
    total,
    page: current,
    pageSize: size,
    pages,
  };
}

export function queryAppointments(appointments: Appointment[], query: AppointmentQuery = {}): Page<Appointment> {
  const filtered = filterAppointments(appointments, query);
  return paginate(sortAppointments(filtered, query.order), query.page, query.pageSize);
}
