import { Injectable, Logger } from '@nestjs/common';
import { FindOptionsWhere } from 'typeorm';
import { AttendanceRecord, FeePayment, SalaryPayment, Staff, Student } from '../database/entities';
import { RecordStoreService } from '../store/record-store.service';
import { SessionStateService } from '../session/session-state.service';
import { SettingsService } from '../session/settings.service';
import { formatBackupDate } from '../common/date-format';
import { BackupType, SnapshotDocument, StaffSnapshot, StudentSnapshot } from './snapshot.schema';
import {
  attendanceToSnapshot,
  feeToSnapshot,
  salaryToSnapshot,
  staffToSnapshot,
  studentToSnapshot,
} from './snapshot.mapper';
import { containing } from '../store/text-match';

export type ExportScope =
  | { kind: 'complete' }
  | { kind: 'current-session' }
  | { kind: 'specific-month'; month: string };

export const BACKUP_TYPES: Record<ExportScope['kind'], BackupType> = {
  complete: 'Complete Backup',
  'current-session': 'Current Session Only',
  'specific-month': 'Specific Month',
};

interface ScopeFilters {
  students: FindOptionsWhere<Student>;
  staff: FindOptionsWhere<Staff>;
  attendance: FindOptionsWhere<AttendanceRecord>;
  salaryPayments: FindOptionsWhere<SalaryPayment>;
  feePayments: FindOptionsWhere<FeePayment>;
}

/**
 * Builds snapshot documents from the store. Read-only.
 */
@Injectable()
export class SnapshotExporterService {
  private readonly logger = new Logger(SnapshotExporterService.name);

  constructor(
    private readonly store: RecordStoreService,
    private readonly session: SessionStateService,
    private readonly settings: SettingsService,
  ) {}

  async exportDocument(scope: ExportScope, now: Date = new Date()): Promise<SnapshotDocument> {
    const filters = this.filtersFor(scope);

    const [schoolInfo, students, staff, attendance, salaryPayments, feePayments] = await Promise.all([
      this.settings.schoolInfo(),
      this.store.students.find(filters.students),
      this.store.staff.find(filters.staff),
      this.store.attendance.find(filters.attendance),
      this.store.salaryPayments.find(filters.salaryPayments),
      this.store.feePayments.find(filters.feePayments),
    ]);

    const document: SnapshotDocument = {
      backup_type: BACKUP_TYPES[scope.kind],
      backup_date: formatBackupDate(now),
      session: this.session.current,
      school_info: schoolInfo,
      students: students.map(studentToSnapshot),
      staff: staff.map(staffToSnapshot),
      attendance: attendance.map(attendanceToSnapshot),
      salary_payments: salaryPayments.map(salaryToSnapshot),
      fee_payments: feePayments.map(feeToSnapshot),
    };

    this.logger.log(
      `Exported ${document.backup_type}: ${students.length} students, ${staff.length} staff, ` +
        `${attendance.length} attendance, ${salaryPayments.length} salary, ${feePayments.length} fee rows`,
    );
    return document;
  }

  /** Students of the active session as a bare array. */
  async exportStudents(): Promise<StudentSnapshot[]> {
    const students = await this.store.students.find({ session: this.session.current });
    return students.map(studentToSnapshot);
  }

  /** Staff of the active session as a bare array. */
  async exportStaff(): Promise<StaffSnapshot[]> {
    const staff = await this.store.staff.find({ session: this.session.current });
    return staff.map(staffToSnapshot);
  }

  private filtersFor(scope: ExportScope): ScopeFilters {
    const session = this.session.current;

    switch (scope.kind) {
      case 'complete':
        return { students: {}, staff: {}, attendance: {}, salaryPayments: {}, feePayments: {} };
      case 'current-session':
        return {
          students: { session },
          staff: { session },
          attendance: { session },
          salaryPayments: { session },
          feePayments: { session },
        };
      case 'specific-month':
        // Students and staff carry no month, so they fall back to the session
        return {
          students: { session },
          staff: { session },
          attendance: { session, month: scope.month },
          salaryPayments: { session, month: scope.month },
          feePayments: { session, months: containing(scope.month) },
        };
    }
  }
}
