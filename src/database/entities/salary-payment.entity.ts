import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

@Entity('salary_payments')
export class SalaryPayment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'staff_id' })
  staffId!: string;

  // Copied from the staff row when the payment is recorded
  @Column({ name: 'staff_name' })
  staffName!: string;

  @Column({ type: 'real' })
  amount!: number;

  @Column({ name: 'payment_date' })
  paymentDate!: string;

  @Column()
  month!: string;

  @Column()
  year!: string;

  @Index()
  @Column()
  session!: string;
}

export type SalaryPaymentFields = Omit<SalaryPayment, 'id'>;
