/**
 * Appointment Store
 *
 * Flat-file persistence for the appointment set:
 * - One CSV row per appointment, header first
 * - Whole-file synchronous reads and writes
 * - Writes go to a temporary file that is renamed over the target; a
 *   failed save leaves the previous file in place
 *
 * The store holds no cache. Callers load, mutate in memory and save.
 */

import fs from 'fs';
import path from 'path';
import { CsvParseError, formatCsv, parseCsv } from '../lib/csv';
import { type Appointment, formatTimeOfDay, isIsoDate, parseTimeOfDay } from './types';

export const CSV_COLUMNS = ['id', 'name', 'contact', 'date', 'time', 'issue_type', 'notes'] as const;

export type StorageErrorCode = 'READ_FAILED' | 'WRITE_FAILED' | 'CORRUPT_FILE';

export class StorageError extends Error {
  constructor(
    public readonly code: StorageErrorCode,
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export function appointmentToRow(appointment: Appointment): string[] {
  return [
    String(appointment.id),
    appointment.name,
    appointment.contact,
    appointment.date,
    appointment.time,
    appointment.issueType,
    appointment.notes,
  ];
}

/**
 * Serializes appointments in the backing-file layout (header + rows).
 * Also used for CSV exports.
 */
export function formatAppointmentsCsv(appointments: Appointment[]): string {
  return formatCsv([[...CSV_COLUMNS], ...appointments.map(appointmentToRow)]);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class AppointmentStore {
  constructor(public readonly filePath: string) {}

  /**
   * Reads every appointment in file order. A missing file is an empty set.
   */
  load(): Appointment[] {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new StorageError(
        'READ_FAILED',
        `Cannot read appointments file ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        { cause: error }
      );
    }

    return this.parse(text);
  }

  /**
   * Overwrites the backing file with the given appointments.
   */
  save(appointments: Appointment[]): void {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    } catch (error) {
      throw this.writeFailed(error);
    }

    try {
      fs.writeFileSync(tmpPath, formatAppointmentsCsv(appointments), 'utf-8');
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      // A partial write may have left the temporary file behind
      if (isRegularFile(tmpPath)) {
        fs.rmSync(tmpPath, { force: true });
      }
      throw this.writeFailed(error);
    }
  }

  private writeFailed(error: unknown): StorageError {
    return new StorageError(
      'WRITE_FAILED',
      `Cannot write appointments file ${this.filePath}: ${describeError(error)}`,
      this.filePath,
      { cause: error }
    );
  }

  /**
   * Next free identifier: one more than the largest in use.
   */
  nextId(appointments: Appointment[]): number {
    return appointments.reduce((max, a) => Math.max(max, a.id), 0) + 1;
  }

  private parse(text: string): Appointment[] {
    let rows: { line: number; fields: string[] }[];
    try {
      rows = parseCsv(text);
    } catch (error) {
      if (error instanceof CsvParseError) {
        throw this.corrupt(error.message);
      }
      throw error;
    }

    if (rows.length === 0) {
      return [];
    }

    const [header, ...records] = rows;
    if (header.fields.join(',') !== CSV_COLUMNS.join(',')) {
      throw this.corrupt(`Unexpected header "${header.fields.join(',')}", expected "${CSV_COLUMNS.join(',')}"`);
    }

    const seen = new Set<number>();
    return records.map(({ line, fields }) => {
      if (fields.length !== CSV_COLUMNS.length) {
        throw this.corrupt(`Expected ${CSV_COLUMNS.length} columns, found ${fields.length} (line ${line})`);
      }

      const [rawId, name, contact, date, time, issueType, notes] = fields;
      const id = Number(rawId);
      if (!/^\d+$/.test(rawId) || id < 1) {
        throw this.corrupt(`Invalid id "${rawId}" (line ${line})`);
      }
      if (seen.has(id)) {
        throw this.corrupt(`Duplicate id ${id} (line ${line})`);
      }
      seen.add(id);

      if (!isIsoDate(date)) {
        throw this.corrupt(`Invalid date "${date}" (line ${line})`);
      }
      const minutes = parseTimeOfDay(time);
      if (minutes === null) {
        throw this.corrupt(`Invalid time "${time}" (line ${line})`);
      }

      // Spreadsheets may save 09:00 as 9:00
      return { id, name, contact, date, time: formatTimeOfDay(minutes), issueType, notes };
    });
  }

  private corrupt(reason: string): StorageError {
    return new StorageError('CORRUPT_FILE', `Appointments file ${this.filePath} is corrupt: ${reason}`, this.filePath);
  }
}

function isRegularFile(filePath: string): boolean {
  return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
