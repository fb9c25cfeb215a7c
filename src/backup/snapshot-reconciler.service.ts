import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { CollectionName, COLLECTION_NAMES, RecordStoreService } from '../store/record-store.service';
import { SessionStateService } from '../session/session-state.service';
import { SettingsService } from '../session/settings.service';
import { attendanceKey } from '../store/natural-keys';
import { MalformedDocument, UniqueConstraintViolation } from '../common/errors';
import {
  attendanceSnapshotSchema,
  collectionBackupSchema,
  feeSnapshotSchema,
  salarySnapshotSchema,
  snapshotDocumentSchema,
  staffBackupRowSchema,
  staffSnapshotSchema,
  studentBackupRowSchema,
  studentPlacementSchema,
  studentSnapshotSchema,
} from './snapshot.schema';
import {
  attendanceFromSnapshot,
  feeFromSnapshot,
  salaryFromSnapshot,
  staffFromSnapshot,
  studentFromSnapshot,
} from './snapshot.mapper';

/**
 * `override` upserts keyed rows and appends ledger rows; `reset` first
 * clears every collection the document carries.
 */
export type RestorePolicy = 'override' | 'reset';

export type StudentRestoreFilter =
  | { kind: 'all' }
  | { kind: 'class'; className: string }
  | { kind: 'section'; section: string };

export interface CollectionRestoreResult {
  applied: number;
  skipped: number;
}

export interface RestoreResult {
  policy: RestorePolicy;
  schoolInfoRestored: boolean;
  collections: Partial<Record<CollectionName, CollectionRestoreResult>>;
}

export interface StudentRestoreResult extends CollectionRestoreResult {
  /**
   * Rows left out by the class or section filter. The filter reads the raw
   * row, so an invalid row outside the selection counts here, not as skipped.
   */
  filteredOut: number;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function matchesFilter(row: { class: string; section: string }, filter: StudentRestoreFilter): boolean {
  switch (filter.kind) {
    case 'all':
      return true;
    case 'class':
      return row.class === filter.className;
    case 'section':
      return row.section === filter.section;
  }
}

@Injectable()
export class SnapshotReconcilerService {
  private readonly logger = new Logger(SnapshotReconcilerService.name);

  constructor(
    private readonly store: RecordStoreService,
    private readonly session: SessionStateService,
    private readonly settings: SettingsService,
  ) {}

  /**
   * Imports a full snapshot document. Rows keep the session recorded in the
   * document. Invalid rows and key collisions are skipped and counted.
   */
  async restoreDocument(input: unknown, policy: RestorePolicy = 'override'): Promise<RestoreResult> {
    const parsed = snapshotDocumentSchema.safeParse(input);
    if (!parsed.success) {
      throw new MalformedDocument(describeIssues(parsed.error), { cause: parsed.error });
    }

    const document = parsed.data;
    const present = COLLECTION_NAMES.filter((name) => document[name] !== undefined);
    if (present.length === 0) {
      throw new MalformedDocument('no collection arrays present');
    }

    if (policy === 'reset') {
      for (const name of present) {
        await this.store.collection(name).clear();
      }
    }

    let schoolInfoRestored = false;
    if (document.school_info) {
      await this.settings.updateSchoolInfo(document.school_info);
      schoolInfoRestored = true;
    }

    const collections: RestoreResult['collections'] = {};
    if (document.students) {
      collections.students = await this.replay('students', document.students, studentSnapshotSchema, (row) =>
        this.store.students.upsert(studentFromSnapshot(row)),
      );
    }
    if (document.staff) {
      collections.staff = await this.replay('staff', document.staff, staffSnapshotSchema, (row) =>
        this.store.staff.upsert(staffFromSnapshot(row)),
      );
    }
    if (document.attendance) {
      collections.attendance = await this.replay('attendance', document.attendance, attendanceSnapshotSchema, (row) =>
        this.store.attendance.upsert(attendanceFromSnapshot(row), attendanceKey),
      );
    }
    if (document.salary_payments) {
      collections.salary_payments = await this.replay(
        'salary_payments',
        document.salary_payments,
        salarySnapshotSchema,
        (row) => this.store.salaryPayments.append(salaryFromSnapshot(row)),
      );
    }
    if (document.fee_payments) {
      // Appended without a receipt check: importing the same document twice
      // under override yields two rows per receipt
      collections.fee_payments = await this.replay('fee_payments', document.fee_payments, feeSnapshotSchema, (row) =>
        this.store.feePayments.append(feeFromSnapshot(row)),
      );
    }

    this.logger.log(`Restored snapshot (${policy}): ${JSON.stringify(collections)}`);
    return { policy, schoolInfoRestored, collections };
  }

  /**
   * Imports a bare student array into the active session.
   */
  async restoreStudents(
    input: unknown,
    filter: StudentRestoreFilter = { kind: 'all' },
  ): Promise<StudentRestoreResult> {
    const rows = this.parseCollection(input, 'students');
    const session = this.session.current;

    const selected = rows.filter((raw) => {
      const placement = studentPlacementSchema.safeParse(raw);
      return !placement.success || matchesFilter(placement.data, filter);
    });
    const filteredOut = rows.length - selected.length;

    const result = await this.replay('students', selected, studentBackupRowSchema, (row) =>
      this.store.students.upsert({ ...studentFromSnapshot(row), session }),
    );

    this.logger.log(`Restored ${result.applied} students into ${session} (${filteredOut} filtered out)`);
    return { ...result, filteredOut };
  }

  /**
   * Imports a bare staff array into the active session.
   */
  async restoreStaff(input: unknown): Promise<CollectionRestoreResult> {
    const rows = this.parseCollection(input, 'staff');
    const session = this.session.current;

    const result = await this.replay('staff', rows, staffBackupRowSchema, (row) =>
      this.store.staff.upsert({ ...staffFromSnapshot(row), session }),
    );

    this.logger.log(`Restored ${result.applied} staff into ${session}`);
    return result;
  }

  private parseCollection(input: unknown, name: CollectionName): unknown[] {
    const parsed = collectionBackupSchema.safeParse(input);
    if (!parsed.success) {
      throw new MalformedDocument(`${name} backup must be an array`, { cause: parsed.error });
    }
    return parsed.data;
  }

  /**
   * Validates and writes each row independently.
   */
  private async replay<T>(
    name: CollectionName,
    rows: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    write: (row: T) => Promise<unknown>,
  ): Promise<CollectionRestoreResult> {
    const result: CollectionRestoreResult = { applied: 0, skipped: 0 };

    for (const [index, raw] of rows.entries()) {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn(`Skipping ${name}[${index}]: ${describeIssues(parsed.error)}`);
        result.skipped++;
        continue;
      }

      try {
        await write(parsed.data);
        result.applied++;
      } catch (error) {
        if (!(error instanceof UniqueConstraintViolation)) {
          throw error;
        }
        this.logger.warn(`Skipping ${name}[${index}]: ${error.message}`);
        result.skipped++;
      }
    }

    return result;
  }
}
