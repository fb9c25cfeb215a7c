import { TestingModule } from '@nestjs/testing';
import { EnrollStudentInput, StudentsService } from '../students/students.service';
import { HireStaffInput, StaffService } from '../staff/staff.service';
import { CollectFeeInput, FeesService } from '../fees/fees.service';
import { AttendanceService } from '../attendance/attendance.service';
import { SessionStateService } from '../session/session-state.service';
import { FeeComponents } from '../ledger/ledger-calculator';

export function studentInput(overrides: Partial<EnrollStudentInput> = {}): EnrollStudentInput {
  return {
    fullName: 'Asha Verma',
    rollNumber: '1',
    className: '5',
    section: 'A',
    parentName: 'Ravi Verma',
    gender: 'Female',
    dob: '2014-03-02',
    parentNumber: '5550001',
    address: '12 Lake Road',
    ...overrides,
  };
}

export function staffInput(overrides: Partial<HireStaffInput> = {}): HireStaffInput {
  return {
    name: 'Meera Nair',
    phone: '5550100',
    email: 'meera@example.test',
    designation: 'Teacher',
    qualification: 'M.Sc',
    department: 'Science',
    joiningDate: '2020-06-01',
    salary: 30000,
    address: '4 Hill Street',
    ...overrides,
  };
}

export function feeComponents(overrides: Partial<FeeComponents> = {}): FeeComponents {
  return { tuition: 0, lab: 0, sport: 0, computer: 0, maintenance: 0, exam: 0, late: 0, ...overrides };
}

export function feeInput(studentNumber: string, overrides: Partial<CollectFeeInput> = {}): CollectFeeInput {
  return {
    studentNumber,
    months: ['April'],
    paymentDate: '2024-04-10',
    components: feeComponents({ tuition: 1000 }),
    paymentMode: 'Cash',
    paymentStatus: 'Full Paid',
    ...overrides,
  };
}

export interface SeedServices {
  students: StudentsService;
  staff: StaffService;
  attendance: AttendanceService;
  fees: FeesService;
  session: SessionStateService;
}

/**
 * Two students, one staff member and their April/May records in 2024-25,
 * plus one student with an April fee in 2025-26. Leaves 2024-25 active.
 */
export async function seedSampleRecords(services: SeedServices): Promise<void> {
  const { students, staff, attendance, fees, session } = services;

  const asha = await students.enroll(studentInput({ fullName: 'Asha Verma', rollNumber: '1' }));
  const bina = await students.enroll(studentInput({ fullName: 'Bina Shah', rollNumber: '2', parentName: 'Om Shah' }));
  const meera = await staff.hire(staffInput());

  const april = { className: '5', section: 'A', month: 'April', year: '2024' };
  await attendance.saveRecord({ ...april, studentNumber: asha.studentNumber, workingDays: 20, daysPresent: 15 });
  await attendance.saveRecord({
    ...april,
    month: 'May',
    studentNumber: asha.studentNumber,
    workingDays: 20,
    daysPresent: 10,
  });

  await staff.paySalary({ staffId: meera.staffId, paymentDate: '2024-04-30', month: 'April', year: '2024' });
  await staff.paySalary({ staffId: meera.staffId, paymentDate: '2024-05-31', month: 'May', year: '2024' });

  await fees.collect(feeInput(asha.studentNumber, { months: ['April', 'May'] }));
  await fees.collect(feeInput(bina.studentNumber, { months: ['June'], paymentDate: '2024-06-05' }));

  await session.switchTo('2025-26');
  const dia = await students.enroll(studentInput({ fullName: 'Dia Sen', rollNumber: '1', className: '6' }));
  await fees.collect(feeInput(dia.studentNumber, { paymentDate: '2025-04-08' }));
  await session.switchTo('2024-25');
}

export function seedServices(moduleRef: TestingModule): SeedServices {
  return {
    students: moduleRef.get(StudentsService),
    staff: moduleRef.get(StaffService),
    attendance: moduleRef.get(AttendanceService),
    fees: moduleRef.get(FeesService),
    session: moduleRef.get(SessionStateService),
  };
}
