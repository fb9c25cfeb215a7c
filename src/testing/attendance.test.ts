import { TestingModule } from '@nestjs/testing';
import { AttendanceService } from '../attendance/attendance.service';
import { StudentsService } from '../students/students.service';
import { SessionStateService } from '../session/session-state.service';
import { RecordStoreService } from '../store/record-store.service';
import { Student } from '../database/entities';
import { createRecordsTestingModule } from './records-testing.module';
import { studentInput } from './fixtures';

describe('Attendance', () => {
  let moduleRef: TestingModule;
  let attendance: AttendanceService;
  let store: RecordStoreService;
  let rollTen: Student;
  let rollTwo: Student;
  let otherSection: Student;

  const april = { className: '5', section: 'A', month: 'April', year: '2024' };

  beforeEach(async () => {
    moduleRef = await createRecordsTestingModule();
    attendance = moduleRef.get(AttendanceService);
    store = moduleRef.get(RecordStoreService);

    const students = moduleRef.get(StudentsService);
    rollTen = await students.enroll(studentInput({ fullName: 'Dev Rao', rollNumber: '10' }));
    rollTwo = await students.enroll(studentInput({ fullName: 'Isha Rao', rollNumber: '2' }));
    otherSection = await students.enroll(studentInput({ fullName: 'Neel Rao', rollNumber: '1', section: 'B' }));
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('saves a sheet and skips students outside the class', async () => {
    const saved = await attendance.saveSheet({
      ...april,
      workingDays: 20,
      entries: [
        { studentNumber: rollTen.studentNumber, daysPresent: 15 },
        { studentNumber: rollTwo.studentNumber, daysPresent: 8 },
        { studentNumber: otherSection.studentNumber, daysPresent: 20 },
        { studentNumber: 'STU999999', daysPresent: 20 },
      ],
    });

    expect(saved).toBe(2);
    expect(await store.attendance.count()).toBe(2);
  });

  it('loads the sheet in roll number order with stored values', async () => {
    await attendance.saveSheet({
      ...april,
      workingDays: 20,
      entries: [
        { studentNumber: rollTen.studentNumber, daysPresent: 15 },
        { studentNumber: rollTwo.studentNumber, daysPresent: 8 },
      ],
    });

    const sheet = await attendance.loadSheet(april);

    expect(sheet.rows.map((row) => [row.rollNumber, row.daysPresent, row.percentage, row.status])).toEqual([
      ['2', 8, 40, 'Poor'],
      ['10', 15, 75, 'Good'],
    ]);
    expect(sheet.classAverage).toBe(57.5);
  });

  it('shows students without a record as absent', async () => {
    const sheet = await attendance.loadSheet(april);

    expect(sheet.rows).toHaveLength(2);
    expect(sheet.rows[0]).toMatchObject({ fullName: 'Isha Rao', daysPresent: 0, percentage: 0, status: 'Poor' });
    expect(sheet.classAverage).toBe(0);
  });

  it('updates the same student and month in place', async () => {
    const first = await attendance.saveRecord({
      ...april,
      studentNumber: rollTen.studentNumber,
      workingDays: 20,
      daysPresent: 15,
    });
    const second = await attendance.saveRecord({
      ...april,
      studentNumber: rollTen.studentNumber,
      workingDays: 20,
      daysPresent: 10,
    });

    expect(second.id).toBe(first.id);
    const rows = await store.attendance.find({ studentNumber: rollTen.studentNumber });
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ daysPresent: 10, percentage: 50, session: '2024-25' });
  });

  it('keeps separate rows per session', async () => {
    const input = { ...april, studentNumber: rollTen.studentNumber, workingDays: 20, daysPresent: 15 };
    await attendance.saveRecord(input);
    await moduleRef.get(SessionStateService).switchTo('2025-26');
    await attendance.saveRecord(input);

    expect(await store.attendance.count({ studentNumber: rollTen.studentNumber })).toBe(2);
  });

  it('stores a zero percentage when there were no working days', async () => {
    const record = await attendance.saveRecord({
      ...april,
      studentNumber: rollTwo.studentNumber,
      workingDays: 0,
      daysPresent: 0,
    });

    expect(record.percentage).toBe(0);
  });

  it('averages attendance over the session or one month', async () => {
    await attendance.saveRecord({ ...april, studentNumber: rollTen.studentNumber, workingDays: 20, daysPresent: 20 });
    await attendance.saveRecord({
      ...april,
      month: 'May',
      studentNumber: rollTen.studentNumber,
      workingDays: 20,
      daysPresent: 10,
    });

    expect(await attendance.averageAttendance()).toBe(75);
    expect(await attendance.averageAttendance({ month: 'May', year: '2024' })).toBe(50);
    expect(await attendance.averageAttendance({ month: 'June' })).toBe(0);
  });
});
