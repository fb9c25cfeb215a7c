import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

@Entity('staff')
export class Staff {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'staff_id', unique: true })
  staffId!: string;

  @Column()
  name!: string;

  @Column()
  phone!: string;

  @Column()
  email!: string;

  @Column()
  designation!: string;

  @Column()
  qualification!: string;

  @Column()
  department!: string;

  @Column({ name: 'joining_date' })
  joiningDate!: string;

  @Column({ type: 'real' })
  salary!: number;

  @Column({ type: 'text' })
  address!: string;

  @Index()
  @Column()
  session!: string;
}

export type StaffFields = Omit<Staff, 'id'>;
