import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

/**
 * One student's attendance for a month. Rows are unique per
 * (studentNumber, month, year, session) only by convention: the table
 * declares no constraint, so writers look the key up before inserting.
 */
@Entity('attendance')
@Index(['studentNumber', 'month', 'year', 'session'])
export class AttendanceRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'student_number' })
  studentNumber!: string;

  @Column({ name: 'class' })
  className!: string;

  @Column()
  section!: string;

  @Column()
  month!: string; // month name, e.g. "March"

  @Column()
  year!: string;

  @Column({ name: 'working_days', type: 'integer' })
  workingDays!: number;

  @Column({ name: 'days_present', type: 'integer' })
  daysPresent!: number;

  @Column({ type: 'real' })
  percentage!: number;

  @Index()
  @Column()
  session!: string;
}

export type AttendanceFields = Omit<AttendanceRecord, 'id'>;
