import { z } from 'zod';

/** Missing or null text fields are restored as empty strings. */
const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const identifier = z.string().trim().min(1);

/** Years were written as numbers by some older exports. */
const year = z.union([z.string(), z.number()]).transform((value) => String(value));

const studentFields = {
  student_number: identifier,
  full_name: text,
  roll_number: text,
  class: text,
  section: text,
  parent_name: text,
  gender: text,
  dob: text,
  parent_number: text,
  address: text,
};

const staffFields = {
  staff_id: identifier,
  name: text,
  phone: text,
  email: text,
  designation: text,
  qualification: text,
  department: text,
  joining_date: text,
  salary: z.number(),
  address: text,
};

export const studentSnapshotSchema = z.object({ ...studentFields, session: identifier });

export const staffSnapshotSchema = z.object({ ...staffFields, session: identifier });

/** Rows of a bare student or staff array; the session is stamped on restore. */
export const studentBackupRowSchema = z.object({ ...studentFields, session: text });

export const staffBackupRowSchema = z.object({ ...staffFields, session: text });

// percentage and total_amount are exported for readers and recomputed on import
export const attendanceSnapshotSchema = z.object({
  student_number: identifier,
  class: text,
  section: text,
  month: identifier,
  year,
  working_days: z.number().int().nonnegative(),
  days_present: z.number().int().nonnegative(),
  percentage: z.number().optional(),
  session: identifier,
});

export const salarySnapshotSchema = z.object({
  staff_id: identifier,
  staff_name: text,
  amount: z.number(),
  payment_date: text,
  month: text,
  year,
  session: identifier,
});

export const feeSnapshotSchema = z.object({
  receipt_number: identifier,
  student_number: identifier,
  student_name: text,
  class: text,
  section: text,
  parent_name: text,
  months: text,
  payment_date: text,
  tuition_fee: z.number(),
  lab_fee: z.number(),
  sport_fee: z.number(),
  computer_fee: z.number(),
  maintenance_fee: z.number(),
  exam_fee: z.number(),
  late_fee: z.number(),
  total_amount: z.number().optional(),
  payment_mode: text,
  payment_status: z.enum(['Full Paid', 'Partial Paid']),
  session: identifier,
});

export const schoolInfoSnapshotSchema = z.object({
  name: text,
  address: text,
  email: text,
});

/**
 * Top-level shape only. Collection rows stay `unknown` here so that one bad
 * row is skipped on its own instead of rejecting the document.
 */
export const snapshotDocumentSchema = z.object({
  backup_type: z.string().optional(),
  backup_date: z.string().optional(),
  session: z.string().optional(),
  school_info: schoolInfoSnapshotSchema.optional(),
  students: z.array(z.unknown()).optional(),
  staff: z.array(z.unknown()).optional(),
  attendance: z.array(z.unknown()).optional(),
  salary_payments: z.array(z.unknown()).optional(),
  fee_payments: z.array(z.unknown()).optional(),
});

export const collectionBackupSchema = z.array(z.unknown());

/** Placement fields read before a row is validated, for class and section filters. */
export const studentPlacementSchema = z.object({ class: text, section: text });

export type StudentSnapshot = z.output<typeof studentSnapshotSchema>;
export type StaffSnapshot = z.output<typeof staffSnapshotSchema>;
export type StudentBackupRow = z.output<typeof studentBackupRowSchema>;
export type StaffBackupRow = z.output<typeof staffBackupRowSchema>;
export type AttendanceSnapshot = z.output<typeof attendanceSnapshotSchema>;
export type SalarySnapshot = z.output<typeof salarySnapshotSchema>;
export type FeeSnapshot = z.output<typeof feeSnapshotSchema>;
export type SchoolInfoSnapshot = z.output<typeof schoolInfoSnapshotSchema>;
export type ParsedSnapshotDocument = z.output<typeof snapshotDocumentSchema>;

export type BackupType = 'Complete Backup' | 'Current Session Only' | 'Specific Month';

/** What the exporter writes. */
export interface SnapshotDocument {
  backup_type: BackupType;
  backup_date: string;
  session: string;
  school_info: SchoolInfoSnapshot;
  students: StudentSnapshot[];
  staff: StaffSnapshot[];
  attendance: AttendanceSnapshot[];
  salary_payments: SalarySnapshot[];
  fee_payments: FeeSnapshot[];
}
