import { Injectable, Logger } from '@nestjs/common';
import { FindOptionsWhere } from 'typeorm';
import { AttendanceRecord } from '../database/entities';
import { RecordStoreService } from '../store/record-store.service';
import { SessionStateService } from '../session/session-state.service';
import { attendanceKey } from '../store/natural-keys';
import {
  AttendanceStatus,
  attendancePercentage,
  attendanceStatus,
  classAverage,
} from '../ledger/ledger-calculator';

export interface ClassMonth {
  className: string;
  section: string;
  month: string;
  year: string;
}

export interface AttendanceSheetRow {
  studentNumber: string;
  fullName: string;
  rollNumber: string;
  parentName: string;
  daysPresent: number;
  percentage: number;
  status: AttendanceStatus;
}

export interface AttendanceSheet extends ClassMonth {
  rows: AttendanceSheetRow[];
  classAverage: number;
}

export interface AttendanceEntry {
  studentNumber: string;
  daysPresent: number;
}

export interface SaveSheetInput extends ClassMonth {
  workingDays: number;
  entries: AttendanceEntry[];
}

export interface AttendanceInput extends ClassMonth, AttendanceEntry {
  workingDays: number;
}

function rollOrder(rollNumber: string): number {
  const value = parseInt(rollNumber, 10);
  return Number.isNaN(value) ? 0 : value;
}

@Injectable()
export class AttendanceService {
  private readonly logger = new Logger(AttendanceService.name);

  constructor(
    private readonly store: RecordStoreService,
    private readonly session: SessionStateService,
  ) {}

  /**
   * The class roster for a month with whatever attendance is already stored.
   * Students without a record show 0 days present.
   */
  async loadSheet(query: ClassMonth): Promise<AttendanceSheet> {
    const session = this.session.current;
    const [students, records] = await Promise.all([
      this.store.students.find({ className: query.className, section: query.section, session }),
      this.store.attendance.find({ month: query.month, year: query.year, session }),
    ]);

    const byStudent = new Map(records.map((record) => [record.studentNumber, record]));
    const rows = students
      .sort((a, b) => rollOrder(a.rollNumber) - rollOrder(b.rollNumber))
      .map((student): AttendanceSheetRow => {
        const record = byStudent.get(student.studentNumber);
        const percentage = record?.percentage ?? 0;
        return {
          studentNumber: student.studentNumber,
          fullName: student.fullName,
          rollNumber: student.rollNumber,
          parentName: student.parentName,
          daysPresent: record?.daysPresent ?? 0,
          percentage,
          status: attendanceStatus(percentage),
        };
      });

    return {
      ...query,
      rows,
      classAverage: classAverage(rows.map((row) => row.percentage)),
    };
  }

  /**
   * Saves one month for a class. Entries for students that are not in the
   * class in the active session are skipped. Returns the number saved.
   */
  async saveSheet(input: SaveSheetInput): Promise<number> {
    const roster = await this.store.students.find({
      className: input.className,
      section: input.section,
      session: this.session.current,
    });
    const enrolled = new Set(roster.map((student) => student.studentNumber));

    let saved = 0;
    for (const entry of input.entries) {
      if (!enrolled.has(entry.studentNumber)) {
        this.logger.warn(`Skipping attendance for ${entry.studentNumber}: not in ${input.className}-${input.section}`);
        continue;
      }
      await this.saveRecord({ ...input, ...entry });
      saved++;
    }

    this.logger.log(`Saved attendance for ${saved} students (${input.month} ${input.year})`);
    return saved;
  }

  /**
   * Writes one student's month, replacing the stored row for the same
   * student, month, year and session.
   */
  async saveRecord(input: AttendanceInput): Promise<AttendanceRecord> {
    return this.store.attendance.upsert(
      {
        studentNumber: input.studentNumber,
        className: input.className,
        section: input.section,
        month: input.month,
        year: input.year,
        workingDays: input.workingDays,
        daysPresent: input.daysPresent,
        percentage: attendancePercentage(input.daysPresent, input.workingDays),
        session: this.session.current,
      },
      attendanceKey,
    );
  }

  /**
   * Mean stored percentage for the active session, optionally for one month.
   */
  async averageAttendance(filters: { month?: string; year?: string } = {}): Promise<number> {
    const where: FindOptionsWhere<AttendanceRecord> = { session: this.session.current };
    if (filters.month) {
      where.month = filters.month;
    }
    if (filters.year) {
      where.year = filters.year;
    }

    const records = await this.store.attendance.find(where);
    return classAverage(records.map((record) => record.percentage));
  }
}
