import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

@Entity('students')
export class Student {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'student_number', unique: true })
  studentNumber!: string;

  @Column({ name: 'full_name' })
  fullName!: string;

  @Column({ name: 'roll_number' })
  rollNumber!: string;

  @Column({ name: 'class' })
  className!: string;

  @Column()
  section!: string;

  @Column({ name: 'parent_name' })
  parentName!: string;

  @Column()
  gender!: string;

  @Column()
  dob!: string; // yyyy-MM-dd

  @Column({ name: 'parent_number' })
  parentNumber!: string;

  @Column({ type: 'text' })
  address!: string;

  @Index()
  @Column()
  session!: string;
}

export type StudentFields = Omit<Student, 'id'>;
