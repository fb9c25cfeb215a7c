import { FindOptionsWhere } from 'typeorm';
import { AttendanceRecord, FeePayment, Staff, Student } from '../database/entities';
import { NaturalKey } from './record-collection';

export const studentNumberKey: NaturalKey<Student> = {
  field: 'student_number',
  valueOf: (row) => row.studentNumber,
  where: (row) => ({ studentNumber: row.studentNumber }),
};

export const staffIdKey: NaturalKey<Staff> = {
  field: 'staff_id',
  valueOf: (row) => row.staffId,
  where: (row) => ({ staffId: row.staffId }),
};

export const receiptNumberKey: NaturalKey<FeePayment> = {
  field: 'receipt_number',
  valueOf: (row) => row.receiptNumber,
  where: (row) => ({ receiptNumber: row.receiptNumber }),
};

/** One attendance row per student, month, year and session. */
export function attendanceKey(row: AttendanceRecord): FindOptionsWhere<AttendanceRecord> {
  return {
    studentNumber: row.studentNumber,
    month: row.month,
    year: row.year,
    session: row.session,
  };
}
