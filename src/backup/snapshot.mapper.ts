import {
  AttendanceFields,
  AttendanceRecord,
  FeePayment,
  FeePaymentFields,
  SalaryPayment,
  SalaryPaymentFields,
  Staff,
  StaffFields,
  Student,
  StudentFields,
} from '../database/entities';
import { attendancePercentage, totalFee } from '../ledger/ledger-calculator';
import {
  AttendanceSnapshot,
  FeeSnapshot,
  SalarySnapshot,
  StaffBackupRow,
  StaffSnapshot,
  StudentBackupRow,
  StudentSnapshot,
} from './snapshot.schema';

// Entities to snapshot rows: business fields only, no surrogate ids.

export function studentToSnapshot(student: Student): StudentSnapshot {
  return {
    student_number: student.studentNumber,
    full_name: student.fullName,
    roll_number: student.rollNumber,
    class: student.className,
    section: student.section,
    parent_name: student.parentName,
    gender: student.gender,
    dob: student.dob,
    parent_number: student.parentNumber,
    address: student.address,
    session: student.session,
  };
}

export function staffToSnapshot(member: Staff): StaffSnapshot {
  return {
    staff_id: member.staffId,
    name: member.name,
    phone: member.phone,
    email: member.email,
    designation: member.designation,
    qualification: member.qualification,
    department: member.department,
    joining_date: member.joiningDate,
    salary: member.salary,
    address: member.address,
    session: member.session,
  };
}

export function attendanceToSnapshot(record: AttendanceRecord): AttendanceSnapshot {
  return {
    student_number: record.studentNumber,
    class: record.className,
    section: record.section,
    month: record.month,
    year: record.year,
    working_days: record.workingDays,
    days_present: record.daysPresent,
    percentage: record.percentage,
    session: record.session,
  };
}

export function salaryToSnapshot(payment: SalaryPayment): SalarySnapshot {
  return {
    staff_id: payment.staffId,
    staff_name: payment.staffName,
    amount: payment.amount,
    payment_date: payment.paymentDate,
    month: payment.month,
    year: payment.year,
    session: payment.session,
  };
}

export function feeToSnapshot(payment: FeePayment): FeeSnapshot {
  return {
    receipt_number: payment.receiptNumber,
    student_number: payment.studentNumber,
    student_name: payment.studentName,
    class: payment.className,
    section: payment.section,
    parent_name: payment.parentName,
    months: payment.months,
    payment_date: payment.paymentDate,
    tuition_fee: payment.tuitionFee,
    lab_fee: payment.labFee,
    sport_fee: payment.sportFee,
    computer_fee: payment.computerFee,
    maintenance_fee: payment.maintenanceFee,
    exam_fee: payment.examFee,
    late_fee: payment.lateFee,
    total_amount: payment.totalAmount,
    payment_mode: payment.paymentMode,
    payment_status: payment.paymentStatus,
    session: payment.session,
  };
}

// Snapshot rows to entity fields. Derived fields are recomputed.

export function studentFromSnapshot(row: StudentSnapshot | StudentBackupRow): StudentFields {
  return {
    studentNumber: row.student_number,
    fullName: row.full_name,
    rollNumber: row.roll_number,
    className: row.class,
    section: row.section,
    parentName: row.parent_name,
    gender: row.gender,
    dob: row.dob,
    parentNumber: row.parent_number,
    address: row.address,
    session: row.session,
  };
}

export function staffFromSnapshot(row: StaffSnapshot | StaffBackupRow): StaffFields {
  return {
    staffId: row.staff_id,
    name: row.name,
    phone: row.phone,
    email: row.email,
    designation: row.designation,
    qualification: row.qualification,
    department: row.department,
    joiningDate: row.joining_date,
    salary: row.salary,
    address: row.address,
    session: row.session,
  };
}

export function attendanceFromSnapshot(row: AttendanceSnapshot): AttendanceFields {
  return {
    studentNumber: row.student_number,
    className: row.class,
    section: row.section,
    month: row.month,
    year: row.year,
    workingDays: row.working_days,
    daysPresent: row.days_present,
    percentage: attendancePercentage(row.days_present, row.working_days),
    session: row.session,
  };
}

export function salaryFromSnapshot(row: SalarySnapshot): SalaryPaymentFields {
  return {
    staffId: row.staff_id,
    staffName: row.staff_name,
    amount: row.amount,
    paymentDate: row.payment_date,
    month: row.month,
    year: row.year,
    session: row.session,
  };
}

export function feeFromSnapshot(row: FeeSnapshot): FeePaymentFields {
  return {
    receiptNumber: row.receipt_number,
    studentNumber: row.student_number,
    studentName: row.student_name,
    className: row.class,
    section: row.section,
    parentName: row.parent_name,
    months: row.months,
    paymentDate: row.payment_date,
    tuitionFee: row.tuition_fee,
    labFee: row.lab_fee,
    sportFee: row.sport_fee,
    computerFee: row.computer_fee,
    maintenanceFee: row.maintenance_fee,
    examFee: row.exam_fee,
    lateFee: row.late_fee,
    totalAmount: totalFee({
      tuition: row.tuition_fee,
      lab: row.lab_fee,
      sport: row.sport_fee,
      computer: row.computer_fee,
      maintenance: row.maintenance_fee,
      exam: row.exam_fee,
      late: row.late_fee,
    }),
    paymentMode: row.payment_mode,
    paymentStatus: row.payment_status,
    session: row.session,
  };
}
