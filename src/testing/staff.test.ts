import { TestingModule } from '@nestjs/testing';
import { StaffService } from '../staff/staff.service';
import { InvalidRecord, UniqueConstraintViolation } from '../common/errors';
import { createRecordsTestingModule } from './records-testing.module';
import { staffInput } from './fixtures';

describe('Staff and payroll', () => {
  let moduleRef: TestingModule;
  let staff: StaffService;

  beforeEach(async () => {
    moduleRef = await createRecordsTestingModule();
    staff = moduleRef.get(StaffService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('lists staff of the session by name with a search', async () => {
    await staff.hire(staffInput({ name: 'Vikram Iyer' }));
    await staff.hire(staffInput({ name: 'Anita Roy' }));

    const all = await staff.list();
    expect(all.map((member) => member.name)).toEqual(['Anita Roy', 'Vikram Iyer']);

    const found = await staff.list('stf000001');
    expect(found.map((member) => member.name)).toEqual(['Vikram Iyer']);
  });

  it('rejects a blank name', async () => {
    await expect(staff.hire(staffInput({ name: ' ' }))).rejects.toBeInstanceOf(InvalidRecord);
  });

  it('rejects a staff id that is already used', async () => {
    await staff.hire(staffInput({ staffId: 'STF000010' }));

    await expect(staff.hire(staffInput({ staffId: 'STF000010' }))).rejects.toBeInstanceOf(UniqueConstraintViolation);
  });

  it('pays the staff salary by default and copies the name', async () => {
    const member = await staff.hire(staffInput());

    const payment = await staff.paySalary({
      staffId: member.staffId,
      paymentDate: '2024-04-30',
      month: 'April',
      year: '2024',
    });

    expect(payment).toMatchObject({
      staffId: 'STF000001',
      staffName: 'Meera Nair',
      amount: 30000,
      month: 'April',
      session: '2024-25',
    });
  });

  it('refuses a payment for an unknown staff id', async () => {
    await expect(
      staff.paySalary({ staffId: 'STF999999', paymentDate: '2024-04-30', month: 'April', year: '2024' }),
    ).rejects.toBeInstanceOf(InvalidRecord);
  });

  it('reports salary history newest first with a total', async () => {
    const member = await staff.hire(staffInput());
    await staff.paySalary({ staffId: member.staffId, paymentDate: '2024-04-30', month: 'April', year: '2024' });
    await staff.paySalary({
      staffId: member.staffId,
      amount: 28000,
      paymentDate: '2024-05-31',
      month: 'May',
      year: '2024',
    });

    const history = await staff.salaryHistory();
    expect(history.payments.map((payment) => payment.month)).toEqual(['May', 'April']);
    expect(history.total).toBe(58000);

    const may = await staff.salaryHistory({ month: 'May', year: '2024' });
    expect(may.total).toBe(28000);
  });

  it('keeps salary payments when the staff member is removed', async () => {
    const member = await staff.hire(staffInput());
    const payment = await staff.paySalary({
      staffId: member.staffId,
      paymentDate: '2024-04-30',
      month: 'April',
      year: '2024',
    });

    expect(await staff.remove(member.id)).toBe(true);
    expect(await staff.findByStaffId(member.staffId)).toBeNull();
    expect((await staff.salaryHistory()).payments).toHaveLength(1);

    expect(await staff.removeSalaryPayment(payment.id)).toBe(true);
    expect((await staff.salaryHistory()).total).toBe(0);
  });
});
