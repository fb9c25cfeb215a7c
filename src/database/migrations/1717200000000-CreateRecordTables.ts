import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateRecordTables1717200000000 implements MigrationInterface {
  name = 'CreateRecordTables1717200000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "students" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "student_number" varchar NOT NULL,
        "full_name" varchar NOT NULL,
        "roll_number" varchar NOT NULL,
        "class" varchar NOT NULL,
        "section" varchar NOT NULL,
        "parent_name" varchar NOT NULL,
        "gender" varchar NOT NULL,
        "dob" varchar NOT NULL,
        "parent_number" varchar NOT NULL,
        "address" text NOT NULL,
        "session" varchar NOT NULL,
        CONSTRAINT "UQ_students_student_number" UNIQUE ("student_number")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "staff" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "staff_id" varchar NOT NULL,
        "name" varchar NOT NULL,
        "phone" varchar NOT NULL,
        "email" varchar NOT NULL,
        "designation" varchar NOT NULL,
        "qualification" varchar NOT NULL,
        "department" varchar NOT NULL,
        "joining_date" varchar NOT NULL,
        "salary" real NOT NULL,
        "address" text NOT NULL,
        "session" varchar NOT NULL,
        CONSTRAINT "UQ_staff_staff_id" UNIQUE ("staff_id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "attendance" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "student_number" varchar NOT NULL,
        "class" varchar NOT NULL,
        "section" varchar NOT NULL,
        "month" varchar NOT NULL,
        "year" varchar NOT NULL,
        "working_days" integer NOT NULL,
        "days_present" integer NOT NULL,
        "percentage" real NOT NULL,
        "session" varchar NOT NULL
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "salary_payments" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "staff_id" varchar NOT NULL,
        "staff_name" varchar NOT NULL,
        "amount" real NOT NULL,
        "payment_date" varchar NOT NULL,
        "month" varchar NOT NULL,
        "year" varchar NOT NULL,
        "session" varchar NOT NULL
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "fee_payments" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "receipt_number" varchar NOT NULL,
        "student_number" varchar NOT NULL,
        "student_name" varchar NOT NULL,
        "class" varchar NOT NULL,
        "section" varchar NOT NULL,
        "parent_name" varchar NOT NULL,
        "months" varchar NOT NULL,
        "payment_date" varchar NOT NULL,
        "tuition_fee" real NOT NULL,
        "lab_fee" real NOT NULL,
        "sport_fee" real NOT NULL,
        "computer_fee" real NOT NULL,
        "maintenance_fee" real NOT NULL,
        "exam_fee" real NOT NULL,
        "late_fee" real NOT NULL,
        "total_amount" real NOT NULL,
        "payment_mode" varchar NOT NULL,
        "payment_status" varchar NOT NULL,
        "session" varchar NOT NULL
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "settings" (
        "key" varchar PRIMARY KEY NOT NULL,
        "value" text
      )
    `);

    // Create indexes
    await queryRunner.query(`CREATE INDEX "IDX_students_session" ON "students" ("session")`);
    await queryRunner.query(`CREATE INDEX "IDX_staff_session" ON "staff" ("session")`);
    await queryRunner.query(
      `CREATE INDEX "IDX_attendance_key" ON "attendance" ("student_number", "month", "year", "session")`,
    );
    await queryRunner.query(`CREATE INDEX "IDX_attendance_session" ON "attendance" ("session")`);
    await queryRunner.query(`CREATE INDEX "IDX_salary_payments_session" ON "salary_payments" ("session")`);
    await queryRunner.query(`CREATE INDEX "IDX_fee_payments_receipt_number" ON "fee_payments" ("receipt_number")`);
    await queryRunner.query(`CREATE INDEX "IDX_fee_payments_session" ON "fee_payments" ("session")`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "IDX_fee_payments_session"`);
    await queryRunner.query(`DROP INDEX "IDX_fee_payments_receipt_number"`);
    await queryRunner.query(`DROP INDEX "IDX_salary_payments_session"`);
    await queryRunner.query(`DROP INDEX "IDX_attendance_session"`);
    await queryRunner.query(`DROP INDEX "IDX_attendance_key"`);
    await queryRunner.query(`DROP INDEX "IDX_staff_session"`);
    await queryRunner.query(`DROP INDEX "IDX_students_session"`);
    await queryRunner.query(`DROP TABLE "settings"`);
    await queryRunner.query(`DROP TABLE "fee_payments"`);
    await queryRunner.query(`DROP TABLE "salary_payments"`);
    await queryRunner.query(`DROP TABLE "attendance"`);
    await queryRunner.query(`DROP TABLE "staff"`);
    await queryRunner.query(`DROP TABLE "students"`);
  }
}
