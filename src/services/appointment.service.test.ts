import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createAppointment,
  deleteAppointment,
  getAppointment,
  listAppointments,
  updateAppointment,
  validateAppointmentEdit,
  validateAppointmentSlot,
} from './appointment.service';
import { AppointmentStore } from './appointment.store';
import { exportAppointmentsCsv } from './export.service';
import { ErrorCode } from './types';

// Local noon; "today" is 2024-05-20
const NOW = new Date(2024, 4, 20, 12, 0, 0);

const booking = {
  name: 'Test Customer',
  contact: 'test@example.com',
  date: '2024-06-01',
  time: '10:00',
  issueType: 'Engine Problem',
};

describe('appointment service', () => {
  let dir: string;
  let store: AppointmentStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'booking-service-'));
    store = new AppointmentStore(path.join(dir, 'appointments.csv'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('createAppointment', () => {
    it('assigns sequential ids and persists each appointment', () => {
      const first = createAppointment(store, booking, {}, NOW);
      const second = createAppointment(store, { ...booking, time: '11:00', notes: 'Bring spare key' }, {}, NOW);

      expect(first).toEqual({
        success: true,
        data: { id: 1, ...booking, notes: '' },
      });
      expect(second.success && second.data.id).toBe(2);
      expect(store.load().map((a) => [a.id, a.time, a.notes])).toEqual([
        [1, '10:00', ''],
        [2, '11:00', 'Bring spare key'],
      ]);
    });

    it('rejects an appointment dated yesterday without writing', () => {
      const result = createAppointment(store, { ...booking, date: '2024-05-19' }, {}, NOW);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.BOOKING_IN_PAST);
      }
      expect(fs.existsSync(store.filePath)).toBe(false);
    });

    it('accepts an appointment dated today', () => {
      expect(createAppointment(store, { ...booking, date: '2024-05-20' }, {}, NOW).success).toBe(true);
    });

    it('rejects a conflicting time and leaves the file unchanged', () => {
      createAppointment(store, booking, {}, NOW);
      const before = fs.readFileSync(store.filePath, 'utf-8');

      const result = createAppointment(store, { ...booking, time: '10:20' }, { bufferMinutes: 30 }, NOW);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.OVERLAPPING_APPOINTMENT);
      }
      expect(fs.readFileSync(store.filePath, 'utf-8')).toBe(before);
    });

    it('accepts a time just outside the buffer', () => {
      createAppointment(store, booking, {}, NOW);

      expect(createAppointment(store, { ...booking, time: '10:31' }, { bufferMinutes: 30 }, NOW).success).toBe(true);
    });

    it('reports a corrupt file as a storage error', () => {
      fs.writeFileSync(store.filePath, 'not,a,valid,header\n');

      const result = createAppointment(store, booking, {}, NOW);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.STORAGE_ERROR);
        expect(result.error.details).toEqual({ storageCode: 'CORRUPT_FILE', filePath: store.filePath });
      }
      expect(fs.readFileSync(store.filePath, 'utf-8')).toBe('not,a,valid,header\n');
    });
  });

  describe('updateAppointment', () => {
    beforeEach(() => {
      createAppointment(store, booking, {}, NOW);
      createAppointment(store, { ...booking, time: '12:00', name: 'Other Customer' }, {}, NOW);
    });

    it('does not conflict with itself', () => {
      const result = updateAppointment(store, 1, { notes: 'Customer will wait' }, { bufferMinutes: 30 }, NOW);

      expect(result).toEqual({
        success: true,
        data: { id: 1, ...booking, notes: 'Customer will wait' },
      });
      expect(store.load()[0].notes).toBe('Customer will wait');
    });

    it('allows moving within its own buffer window', () => {
      const result = updateAppointment(store, 1, { time: '10:15' }, { bufferMinutes: 30 }, NOW);

      expect(result.success && result.data.time).toBe('10:15');
    });

    it('rejects a move onto another appointment', () => {
      const result = updateAppointment(store, 1, { time: '11:45' }, { bufferMinutes: 30 }, NOW);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.OVERLAPPING_APPOINTMENT);
        expect(result.error.details).toMatchObject({ conflicts: [{ id: 2, minutesApart: 15 }] });
      }
      expect(store.load()[0].time).toBe('10:00');
    });

    it('re-validates edited fields', () => {
      const result = updateAppointment(store, 1, { name: '  ' }, {}, NOW);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      }
    });

    it('rejects moving to a past date but allows editing a past appointment in place', () => {
      const moved = updateAppointment(store, 1, { date: '2024-05-01' }, {}, NOW);
      expect(moved.success).toBe(false);
      if (!moved.success) {
        expect(moved.error.code).toBe(ErrorCode.BOOKING_IN_PAST);
      }

      // Once the appointment date has passed, its notes can still change
      const later = new Date(2024, 5, 10, 12, 0, 0);
      expect(updateAppointment(store, 1, { notes: 'Done' }, {}, later).success).toBe(true);
    });

    it('checks an edit exactly as the update would apply it', () => {
      const later = new Date(2024, 5, 10, 12, 0, 0);
      const before = fs.readFileSync(store.filePath, 'utf-8');

      const inPlace = validateAppointmentEdit(store, 1, { notes: 'Done' }, {}, later);
      expect(inPlace).toEqual({ success: true, data: { ...booking, notes: 'Done' } });

      const moved = validateAppointmentEdit(store, 1, { date: '2024-06-05' }, {}, later);
      expect(moved.success).toBe(false);
      if (!moved.success) {
        expect(moved.error.code).toBe(ErrorCode.BOOKING_IN_PAST);
      }

      const unknown = validateAppointmentEdit(store, 42, { notes: 'x' }, {}, later);
      expect(unknown.success).toBe(false);
      if (!unknown.success) {
        expect(unknown.error.code).toBe(ErrorCode.APPOINTMENT_NOT_FOUND);
      }
      expect(fs.readFileSync(store.filePath, 'utf-8')).toBe(before);

      expect(updateAppointment(store, 1, { notes: 'Done' }, {}, later)).toEqual({
        success: true,
        data: { id: 1, ...booking, notes: 'Done' },
      });
    });

    it('keeps the position of the edited row', () => {
      updateAppointment(store, 1, { date: '2024-07-01' }, {}, NOW);

      expect(store.load().map((a) => [a.id, a.date])).toEqual([
        [1, '2024-07-01'],
        [2, '2024-06-01'],
      ]);
    });

    it('reports an unknown id', () => {
      const result = updateAppointment(store, 42, { notes: 'x' }, {}, NOW);

      expect(result).toEqual({
        success: false,
        error: { code: ErrorCode.APPOINTMENT_NOT_FOUND, message: 'Appointment with ID 42 not found', details: undefined },
      });
    });
  });

  describe('deleteAppointment', () => {
    it('removes the appointment and returns it', () => {
      createAppointment(store, booking, {}, NOW);
      createAppointment(store, { ...booking, time: '11:00' }, {}, NOW);

      const result = deleteAppointment(store, 1);

      expect(result.success && result.data.id).toBe(1);
      expect(store.load().map((a) => a.id)).toEqual([2]);
    });

    it('reports a missing id without touching the file', () => {
      createAppointment(store, booking, {}, NOW);
      const before = fs.readFileSync(store.filePath, 'utf-8');

      const result = deleteAppointment(store, 99);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.APPOINTMENT_NOT_FOUND);
      }
      expect(fs.readFileSync(store.filePath, 'utf-8')).toBe(before);
    });

    it('reports a missing id when no file exists yet', () => {
      expect(deleteAppointment(store, 1).success).toBe(false);
    });

    it('assigns ids after the largest one still in use', () => {
      createAppointment(store, booking, {}, NOW);
      createAppointment(store, { ...booking, time: '11:00' }, {}, NOW);
      deleteAppointment(store, 1);

      const result = createAppointment(store, { ...booking, time: '13:00' }, {}, NOW);
      expect(result.success && result.data.id).toBe(3);
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      createAppointment(store, { ...booking, date: '2024-06-02', time: '09:00' }, {}, NOW);
      createAppointment(store, { ...booking, date: '2024-06-01', time: '15:00', issueType: 'Other' }, {}, NOW);
      createAppointment(store, { ...booking, date: '2024-06-01', time: '08:00', notes: 'Oil change' }, {}, NOW);
    });

    it('gets one appointment by id', () => {
      const result = getAppointment(store, 2);
      expect(result.success && result.data.time).toBe('15:00');
      expect(getAppointment(store, 9).success).toBe(false);
    });

    it('lists in date/time order with pagination', () => {
      const result = listAppointments(store, { pageSize: 2 });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.items.map((a) => a.id)).toEqual([3, 2]);
        expect(result.data).toMatchObject({ total: 3, page: 1, pageSize: 2, pages: 2 });
      }
    });

    it('orders unpadded times from a hand-edited file correctly', () => {
      fs.writeFileSync(
        store.filePath,
        'id,name,contact,date,time,issue_type,notes\n1,A,a@example.com,2024-06-01,10:00,Other,\n2,B,b@example.com,2024-06-01,9:00,Other,\n'
      );

      const result = listAppointments(store, {});

      expect(result.success && result.data.items.map((a) => [a.id, a.time])).toEqual([
        [2, '09:00'],
        [1, '10:00'],
      ]);
    });

    it('validates a slot without saving it', () => {
      const before = fs.readFileSync(store.filePath, 'utf-8');

      expect(validateAppointmentSlot(store, { ...booking, time: '12:00' }, {}, NOW).success).toBe(true);
      const clash = validateAppointmentSlot(store, { ...booking, time: '08:00' }, {}, NOW);
      expect(clash.success).toBe(false);
      expect(validateAppointmentEdit(store, 3, { time: '08:00' }, {}, NOW).success).toBe(true);
      expect(fs.readFileSync(store.filePath, 'utf-8')).toBe(before);
    });

    it('exports all appointments in file order', () => {
      const result = exportAppointmentsCsv(store, { scope: 'all' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.fileName).toBe('appointments_all.csv');
        expect(result.data.content.split('\n')).toEqual([
          'id,name,contact,date,time,issue_type,notes',
          '1,Test Customer,test@example.com,2024-06-02,09:00,Engine Problem,',
          '2,Test Customer,test@example.com,2024-06-01,15:00,Other,',
          '3,Test Customer,test@example.com,2024-06-01,08:00,Engine Problem,Oil change',
          '',
        ]);
      }
    });

    it('exports the filtered subsequence in date/time order', () => {
      const result = exportAppointmentsCsv(store, { scope: 'filtered', issueTypes: ['Engine Problem'] });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toMatchObject({ fileName: 'appointments_filtered.csv', count: 2 });
        expect(result.data.content.split('\n').slice(1, 3).map((line) => line.split(',')[0])).toEqual(['3', '1']);
      }
    });
  });
});
