import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AttendanceRecord, FeePayment, SalaryPayment, Setting, Staff, Student } from '../database/entities';
import { IOFailure } from '../common/errors';
import { RecordCollection } from './record-collection';
import { receiptNumberKey, staffIdKey, studentNumberKey } from './natural-keys';

export interface CollectionRows {
  students: Student;
  staff: Staff;
  attendance: AttendanceRecord;
  salary_payments: SalaryPayment;
  fee_payments: FeePayment;
}

export type CollectionName = keyof CollectionRows;

export const COLLECTION_NAMES: CollectionName[] = ['students', 'staff', 'attendance', 'salary_payments', 'fee_payments'];

export type SettingKey =
  | 'school_name'
  | 'school_address'
  | 'school_email'
  | 'last_session'
  | 'remember_me'
  | 'saved_username'
  | 'saved_password';

@Injectable()
export class RecordStoreService {
  private readonly logger = new Logger(RecordStoreService.name);

  readonly students: RecordCollection<Student>;
  readonly staff: RecordCollection<Staff>;
  readonly attendance: RecordCollection<AttendanceRecord>;
  readonly salaryPayments: RecordCollection<SalaryPayment>;
  readonly feePayments: RecordCollection<FeePayment>;

  private readonly byName: { [C in CollectionName]: RecordCollection<CollectionRows[C]> };

  constructor(
    @InjectRepository(Student)
    studentRepository: Repository<Student>,
    @InjectRepository(Staff)
    staffRepository: Repository<Staff>,
    @InjectRepository(AttendanceRecord)
    attendanceRepository: Repository<AttendanceRecord>,
    @InjectRepository(SalaryPayment)
    salaryRepository: Repository<SalaryPayment>,
    @InjectRepository(FeePayment)
    feeRepository: Repository<FeePayment>,
    @InjectRepository(Setting)
    private readonly settingRepository: Repository<Setting>,
  ) {
    this.students = new RecordCollection('students', studentRepository, studentNumberKey);
    this.staff = new RecordCollection('staff', staffRepository, staffIdKey);
    this.attendance = new RecordCollection('attendance', attendanceRepository);
    this.salaryPayments = new RecordCollection('salary_payments', salaryRepository);
    this.feePayments = new RecordCollection('fee_payments', feeRepository, receiptNumberKey);

    this.byName = {
      students: this.students,
      staff: this.staff,
      attendance: this.attendance,
      salary_payments: this.salaryPayments,
      fee_payments: this.feePayments,
    };
  }

  collection<C extends CollectionName>(name: C): RecordCollection<CollectionRows[C]> {
    return this.byName[name];
  }

  async getSetting(key: SettingKey): Promise<string | null> {
    try {
      const setting = await this.settingRepository.findOne({ where: { key } });
      return setting?.value ?? null;
    } catch (error) {
      throw new IOFailure(`settings.get(${key})`, error);
    }
  }

  async setSetting(key: SettingKey, value: string): Promise<void> {
    try {
      await this.settingRepository.save({ key, value });
    } catch (error) {
      throw new IOFailure(`settings.set(${key})`, error);
    }
  }

  /**
   * Stores `value` only when the key has never been written.
   */
  async seedSetting(key: SettingKey, value: string): Promise<boolean> {
    try {
      const existing = await this.settingRepository.findOne({ where: { key } });
      if (existing) {
        return false;
      }
      await this.settingRepository.save({ key, value });
      return true;
    } catch (error) {
      throw new IOFailure(`settings.seed(${key})`, error);
    }
  }

  /**
   * Row counts per collection across all sessions.
   */
  async collectionCounts(): Promise<Record<CollectionName, number>> {
    const [students, staff, attendance, salaryPayments, feePayments] = await Promise.all([
      this.students.count(),
      this.staff.count(),
      this.attendance.count(),
      this.salaryPayments.count(),
      this.feePayments.count(),
    ]);

    const counts = {
      students,
      staff,
      attendance,
      salary_payments: salaryPayments,
      fee_payments: feePayments,
    };
    this.logger.debug(`Collection counts: ${JSON.stringify(counts)}`);
    return counts;
  }
}
