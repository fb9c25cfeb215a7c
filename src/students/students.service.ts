import { Injectable, Logger } from '@nestjs/common';
import { FindOptionsWhere } from 'typeorm';
import { Student } from '../database/entities';
import { RecordStoreService } from '../store/record-store.service';
import { SessionStateService } from '../session/session-state.service';
import { IdentifierAllocatorService } from '../identifiers/identifier-allocator.service';
import { InvalidRecord } from '../common/errors';
import { containing } from '../store/text-match';

export interface EnrollStudentInput {
  /** Allocated when omitted. */
  studentNumber?: string;
  fullName: string;
  rollNumber: string;
  className: string;
  section: string;
  parentName: string;
  gender: string;
  dob: string;
  parentNumber: string;
  address: string;
}

export interface StudentFilters {
  className?: string;
  section?: string;
  /** Case-insensitive match on name or student number. */
  search?: string;
}

const REQUIRED_FIELDS: Array<[keyof EnrollStudentInput, string]> = [
  ['fullName', 'full name'],
  ['rollNumber', 'roll number'],
  ['parentName', 'parent name'],
  ['parentNumber', 'parent phone number'],
  ['address', 'address'],
];

@Injectable()
export class StudentsService {
  private readonly logger = new Logger(StudentsService.name);

  constructor(
    private readonly store: RecordStoreService,
    private readonly session: SessionStateService,
    private readonly identifiers: IdentifierAllocatorService,
  ) {}

  /**
   * Adds a student to the active session.
   */
  async enroll(input: EnrollStudentInput): Promise<Student> {
    for (const [field, label] of REQUIRED_FIELDS) {
      if (!input[field]?.trim()) {
        throw new InvalidRecord(`Student ${label} is required`);
      }
    }

    const studentNumber = input.studentNumber ?? (await this.identifiers.nextStudentNumber());
    const student = await this.store.students.insert({
      ...input,
      studentNumber,
      session: this.session.current,
    });

    this.logger.log(`Enrolled ${student.studentNumber} in ${student.session}`);
    return student;
  }

  /**
   * Students of the active session ordered by class, section and roll number.
   */
  async list(filters: StudentFilters = {}): Promise<Student[]> {
    const where: FindOptionsWhere<Student> = { session: this.session.current };
    if (filters.className) {
      where.className = filters.className;
    }
    if (filters.section) {
      where.section = filters.section;
    }

    const students = await this.store.students.find(where, { className: 'ASC', section: 'ASC', rollNumber: 'ASC' });
    const needle = filters.search?.trim().toLowerCase();
    if (!needle) {
      return students;
    }

    return students.filter(
      (student) =>
        student.fullName.toLowerCase().includes(needle) || student.studentNumber.toLowerCase().includes(needle),
    );
  }

  /**
   * Quick lookup for pickers: name or number contains `text`, active session only.
   */
  async search(text: string, limit = 10): Promise<Student[]> {
    const pattern = containing(text.trim());
    const session = this.session.current;
    const students = await this.store.students.find(
      [
        { session, fullName: pattern },
        { session, studentNumber: pattern },
      ],
      { fullName: 'ASC' },
    );
    return students.slice(0, limit);
  }

  /**
   * Resolves a student number in any session; null when nothing matches,
   * which is how references to deleted students surface.
   */
  async findByNumber(studentNumber: string): Promise<Student | null> {
    return this.store.students.findOne({ studentNumber });
  }

  /**
   * Deletes the row only. Attendance and fee rows that reference the
   * student are left in place.
   */
  async remove(id: number): Promise<boolean> {
    const removed = await this.store.students.delete(id);
    if (removed) {
      this.logger.log(`Removed student row ${id}`);
    }
    return removed;
  }

  async countInSession(): Promise<number> {
    return this.store.students.count({ session: this.session.current });
  }
}
