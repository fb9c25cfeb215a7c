import { Injectable, Logger } from '@nestjs/common';
import { FindOptionsWhere } from 'typeorm';
import { FeePayment, PaymentStatus, Student } from '../database/entities';
import { RecordStoreService } from '../store/record-store.service';
import { SessionStateService } from '../session/session-state.service';
import { IdentifierAllocatorService } from '../identifiers/identifier-allocator.service';
import { InvalidRecord } from '../common/errors';
import { FeeComponents, joinMonths, splitMonths, totalFee } from '../ledger/ledger-calculator';
import { amountToWords } from '../ledger/amount-in-words';
import { containing } from '../store/text-match';

export const PAYMENT_MODES = ['Cash', 'Online', 'Cheque', 'Card'] as const;

export interface CollectFeeInput {
  /** Allocated when omitted. */
  receiptNumber?: string;
  studentNumber: string;
  months: string[];
  paymentDate: string;
  components: FeeComponents;
  paymentMode: string;
  paymentStatus: PaymentStatus;
}

/** Student fields copied onto a fee payment. */
export interface FeePrefill {
  studentNumber: string;
  studentName: string;
  className: string;
  section: string;
  parentName: string;
}

export interface FeeListFilters {
  /** Matches receipt number, student name or student number. */
  search?: string;
  month?: string;
}

export interface ClassFilters {
  className?: string;
  section?: string;
}

export interface PaidStudent extends FeePrefill {
  /** Sum of the Full Paid payments covering the month. */
  amount: number;
}

export interface ReceiptView {
  payment: FeePayment;
  months: string[];
  amountInWords: string;
}

function prefillFrom(student: Student): FeePrefill {
  return {
    studentNumber: student.studentNumber,
    studentName: student.fullName,
    className: student.className,
    section: student.section,
    parentName: student.parentName,
  };
}

@Injectable()
export class FeesService {
  private readonly logger = new Logger(FeesService.name);

  constructor(
    private readonly store: RecordStoreService,
    private readonly session: SessionStateService,
    private readonly identifiers: IdentifierAllocatorService,
  ) {}

  /**
   * Records a payment against the active session. The student's name,
   * class, section and parent are copied from the student row when it
   * exists; a payment for an unknown student number keeps empty copies.
   */
  async collect(input: CollectFeeInput): Promise<FeePayment> {
    const months = joinMonths(input.months);
    if (!months) {
      throw new InvalidRecord('At least one month must be selected');
    }
    if (!PAYMENT_MODES.some((mode) => mode === input.paymentMode)) {
      throw new InvalidRecord(`Unknown payment mode ${input.paymentMode}`);
    }

    const prefill = (await this.prefill(input.studentNumber)) ?? {
      studentNumber: input.studentNumber,
      studentName: '',
      className: '',
      section: '',
      parentName: '',
    };
    const receiptNumber = input.receiptNumber ?? (await this.identifiers.nextReceiptNumber());
    const { components } = input;

    const payment = await this.store.feePayments.insert({
      ...prefill,
      receiptNumber,
      months,
      paymentDate: input.paymentDate,
      tuitionFee: components.tuition,
      labFee: components.lab,
      sportFee: components.sport,
      computerFee: components.computer,
      maintenanceFee: components.maintenance,
      examFee: components.exam,
      lateFee: components.late,
      totalAmount: totalFee(components),
      paymentMode: input.paymentMode,
      paymentStatus: input.paymentStatus,
      session: this.session.current,
    });

    this.logger.log(`Collected ${payment.totalAmount} from ${payment.studentNumber} (${payment.receiptNumber})`);
    return payment;
  }

  /**
   * Student fields for a new payment, or null when the number is unknown.
   */
  async prefill(studentNumber: string): Promise<FeePrefill | null> {
    const student = await this.store.students.findOne({ studentNumber });
    return student ? prefillFrom(student) : null;
  }

  /**
   * Payments of the active session, newest payment date first.
   */
  async list(filters: FeeListFilters = {}): Promise<FeePayment[]> {
    const where: FindOptionsWhere<FeePayment> = { session: this.session.current };
    if (filters.month) {
      where.months = containing(filters.month);
    }

    const payments = await this.store.feePayments.find(where, { paymentDate: 'DESC' });
    const needle = filters.search?.trim().toLowerCase();
    if (!needle) {
      return payments;
    }

    return payments.filter((payment) =>
      [payment.receiptNumber, payment.studentName, payment.studentNumber].some((value) =>
        value.toLowerCase().includes(needle),
      ),
    );
  }

  /**
   * Students of the active session with a Full Paid payment covering `month`.
   */
  async paidStudents(month: string, filters: ClassFilters = {}): Promise<PaidStudent[]> {
    const [students, totals] = await Promise.all([this.studentsInSession(filters), this.fullPaidTotals(month)]);

    return students
      .filter((student) => totals.has(student.studentNumber))
      .map((student) => ({
        ...prefillFrom(student),
        amount: totals.get(student.studentNumber) ?? 0,
      }));
  }

  /**
   * Students of the active session without a Full Paid payment covering
   * `month`. Partial payments do not count as paid.
   */
  async unpaidStudents(month: string, filters: ClassFilters = {}): Promise<FeePrefill[]> {
    const [students, totals] = await Promise.all([this.studentsInSession(filters), this.fullPaidTotals(month)]);

    return students.filter((student) => !totals.has(student.studentNumber)).map(prefillFrom);
  }

  async receipt(receiptNumber: string): Promise<ReceiptView | null> {
    const payment = await this.store.feePayments.findOne({ receiptNumber });
    if (!payment) {
      return null;
    }

    return {
      payment,
      months: splitMonths(payment.months),
      amountInWords: amountToWords(payment.totalAmount),
    };
  }

  async remove(id: number): Promise<boolean> {
    const removed = await this.store.feePayments.delete(id);
    if (removed) {
      this.logger.log(`Removed fee payment ${id}`);
    }
    return removed;
  }

  private async studentsInSession(filters: ClassFilters): Promise<Student[]> {
    const where: FindOptionsWhere<Student> = { session: this.session.current };
    if (filters.className) {
      where.className = filters.className;
    }
    if (filters.section) {
      where.section = filters.section;
    }
    return this.store.students.find(where, { className: 'ASC', section: 'ASC', rollNumber: 'ASC' });
  }

  private async fullPaidTotals(month: string): Promise<Map<string, number>> {
    const payments = await this.store.feePayments.find({
      session: this.session.current,
      paymentStatus: 'Full Paid',
      months: containing(month),
    });

    const totals = new Map<string, number>();
    for (const payment of payments) {
      totals.set(payment.studentNumber, (totals.get(payment.studentNumber) ?? 0) + payment.totalAmount);
    }
    return totals;
  }
}
