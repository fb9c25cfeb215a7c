import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

export type PaymentStatus = 'Full Paid' | 'Partial Paid';

@Entity('fee_payments')
export class FeePayment {
  @PrimaryGeneratedColumn()
  id!: number;

  // Indexed but not unique: re-importing a backup appends ledger rows as-is
  @Index()
  @Column({ name: 'receipt_number' })
  receiptNumber!: string;

  @Column({ name: 'student_number' })
  studentNumber!: string;

  @Column({ name: 'student_name' })
  studentName!: string;

  @Column({ name: 'class' })
  className!: string;

  @Column()
  section!: string;

  @Column({ name: 'parent_name' })
  parentName!: string;

  @Column()
  months!: string; // "January, February"

  @Column({ name: 'payment_date' })
  paymentDate!: string;

  @Column({ name: 'tuition_fee', type: 'real' })
  tuitionFee!: number;

  @Column({ name: 'lab_fee', type: 'real' })
  labFee!: number;

  @Column({ name: 'sport_fee', type: 'real' })
  sportFee!: number;

  @Column({ name: 'computer_fee', type: 'real' })
  computerFee!: number;

  @Column({ name: 'maintenance_fee', type: 'real' })
  maintenanceFee!: number;

  @Column({ name: 'exam_fee', type: 'real' })
  examFee!: number;

  @Column({ name: 'late_fee', type: 'real' })
  lateFee!: number;

  @Column({ name: 'total_amount', type: 'real' })
  totalAmount!: number;

  @Column({ name: 'payment_mode' })
  paymentMode!: string;

  @Column({ name: 'payment_status', type: 'varchar' })
  paymentStatus!: PaymentStatus;

  @Index()
  @Column()
  session!: string;
}

export type FeePaymentFields = Omit<FeePayment, 'id'>;
