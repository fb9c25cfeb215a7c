import { Student } from './student.entity';
import { Staff } from './staff.entity';
import { AttendanceRecord } from './attendance-record.entity';
import { SalaryPayment } from './salary-payment.entity';
import { FeePayment } from './fee-payment.entity';
import { Setting } from './setting.entity';

export * from './student.entity';
export * from './staff.entity';
export * from './attendance-record.entity';
export * from './salary-payment.entity';
export * from './fee-payment.entity';
export * from './setting.entity';

export const RECORD_ENTITIES = [Student, Staff, AttendanceRecord, SalaryPayment, FeePayment, Setting];
