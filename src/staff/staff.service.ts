import { Injectable, Logger } from '@nestjs/common';
import { FindOptionsWhere } from 'typeorm';
import { SalaryPayment, Staff } from '../database/entities';
import { RecordStoreService } from '../store/record-store.service';
import { SessionStateService } from '../session/session-state.service';
import { IdentifierAllocatorService } from '../identifiers/identifier-allocator.service';
import { InvalidRecord } from '../common/errors';

export interface HireStaffInput {
  /** Allocated when omitted. */
  staffId?: string;
  name: string;
  phone: string;
  email: string;
  designation: string;
  qualification: string;
  department: string;
  joiningDate: string;
  salary: number;
  address: string;
}

export interface SalaryPaymentInput {
  staffId: string;
  /** Defaults to the staff member's salary. */
  amount?: number;
  paymentDate: string;
  month: string;
  year: string;
}

export interface SalaryHistoryFilters {
  month?: string;
  year?: string;
}

export interface SalaryHistory {
  payments: SalaryPayment[];
  total: number;
}

@Injectable()
export class StaffService {
  private readonly logger = new Logger(StaffService.name);

  constructor(
    private readonly store: RecordStoreService,
    private readonly session: SessionStateService,
    private readonly identifiers: IdentifierAllocatorService,
  ) {}

  async hire(input: HireStaffInput): Promise<Staff> {
    if (!input.name.trim()) {
      throw new InvalidRecord('Staff name is required');
    }

    const staffId = input.staffId ?? (await this.identifiers.nextStaffId());
    const member = await this.store.staff.insert({
      ...input,
      staffId,
      session: this.session.current,
    });

    this.logger.log(`Added staff member ${member.staffId} in ${member.session}`);
    return member;
  }

  /**
   * Staff of the active session ordered by name.
   */
  async list(search?: string): Promise<Staff[]> {
    const staff = await this.store.staff.find({ session: this.session.current }, { name: 'ASC' });
    const needle = search?.trim().toLowerCase();
    if (!needle) {
      return staff;
    }
    return staff.filter(
      (member) => member.name.toLowerCase().includes(needle) || member.staffId.toLowerCase().includes(needle),
    );
  }

  async findByStaffId(staffId: string): Promise<Staff | null> {
    return this.store.staff.findOne({ staffId });
  }

  async remove(id: number): Promise<boolean> {
    const removed = await this.store.staff.delete(id);
    if (removed) {
      this.logger.log(`Removed staff row ${id}`);
    }
    return removed;
  }

  /**
   * Appends a salary payment. The staff name is copied onto the payment and
   * is not updated if the staff row changes later.
   */
  async paySalary(input: SalaryPaymentInput): Promise<SalaryPayment> {
    const member = await this.findByStaffId(input.staffId);
    if (!member) {
      throw new InvalidRecord(`No staff member with id ${input.staffId}`);
    }

    const payment = await this.store.salaryPayments.append({
      staffId: member.staffId,
      staffName: member.name,
      amount: input.amount ?? member.salary,
      paymentDate: input.paymentDate,
      month: input.month,
      year: input.year,
      session: this.session.current,
    });

    this.logger.log(`Recorded salary payment ${payment.id} for ${member.staffId}`);
    return payment;
  }

  /**
   * Payments of the active session, newest payment date first.
   */
  async salaryHistory(filters: SalaryHistoryFilters = {}): Promise<SalaryHistory> {
    const where: FindOptionsWhere<SalaryPayment> = { session: this.session.current };
    if (filters.month) {
      where.month = filters.month;
    }
    if (filters.year) {
      where.year = filters.year;
    }

    const payments = await this.store.salaryPayments.find(where, { paymentDate: 'DESC' });
    const total = payments.reduce((sum, payment) => sum + payment.amount, 0);
    return { payments, total };
  }

  async removeSalaryPayment(id: number): Promise<boolean> {
    return this.store.salaryPayments.delete(id);
  }
}
