import { TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { StudentsService } from '../students/students.service';
import { FeesService } from '../fees/fees.service';
import { RecordStoreService } from '../store/record-store.service';
import { createRecordsTestingModule } from './records-testing.module';
import { buildDatabaseOptions, IN_MEMORY_DATABASE } from '../database/database.options';
import { feeInput, studentInput } from './fixtures';

describe('Production schema', () => {
  let moduleRef: TestingModule;

  beforeEach(async () => {
    moduleRef = await createRecordsTestingModule({ production: true });
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('runs the migration instead of synchronizing', async () => {
    const executed: Array<{ name: string }> = await moduleRef.get(DataSource).query('SELECT "name" FROM "migrations"');

    expect(executed.map((row) => row.name)).toEqual(['CreateRecordTables1717200000000']);
  });

  it('creates every record table', async () => {
    const tables: Array<{ name: string }> = await moduleRef
      .get(DataSource)
      .query(`SELECT "name" FROM "sqlite_master" WHERE "type" = 'table' AND "name" NOT LIKE 'sqlite_%' ORDER BY "name"`);

    expect(tables.map((row) => row.name)).toEqual([
      'attendance',
      'fee_payments',
      'migrations',
      'salary_payments',
      'settings',
      'staff',
      'students',
    ]);
  });

  it('stores records through the migrated schema', async () => {
    const student = await moduleRef.get(StudentsService).enroll(studentInput());
    await moduleRef.get(FeesService).collect(feeInput(student.studentNumber));

    expect(await moduleRef.get(RecordStoreService).collectionCounts()).toEqual({
      students: 1,
      staff: 0,
      attendance: 0,
      salary_payments: 0,
      fee_payments: 1,
    });
  });
});

describe('Database options', () => {
  it('saves a file database back to its path', () => {
    const options = buildDatabaseOptions({ databasePath: './data/records.db', production: true });

    expect(options).toMatchObject({
      type: 'sqljs',
      location: './data/records.db',
      autoSave: true,
      synchronize: false,
      migrationsRun: true,
      logging: false,
    });
  });

  it('keeps an in-memory database off disk', () => {
    const options = buildDatabaseOptions({ databasePath: IN_MEMORY_DATABASE, production: false });

    expect(options).toMatchObject({ type: 'sqljs', synchronize: true, migrationsRun: false });
    expect(options).not.toHaveProperty('location');
    expect(options).not.toHaveProperty('autoSave');
  });
});
