import { TestingModule } from '@nestjs/testing';
import { SnapshotExporterService } from '../backup/snapshot-exporter.service';
import { SnapshotReconcilerService } from '../backup/snapshot-reconciler.service';
import { SnapshotDocument } from '../backup/snapshot.schema';
import { RecordStoreService } from '../store/record-store.service';
import { SettingsService } from '../session/settings.service';
import { MalformedDocument } from '../common/errors';
import { createRecordsTestingModule } from './records-testing.module';
import { seedSampleRecords, seedServices } from './fixtures';

function studentRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    student_number: 'STU000010',
    full_name: 'Tara Bose',
    roll_number: '7',
    class: '5',
    section: 'A',
    parent_name: 'Sunil Bose',
    gender: 'Female',
    dob: '2014-08-11',
    parent_number: '5550003',
    address: '3 River Road',
    session: '2023-24',
    ...overrides,
  };
}

function staffRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    staff_id: 'STF000020',
    name: 'Pooja Menon',
    phone: '5550200',
    email: 'pooja@example.test',
    designation: 'Clerk',
    qualification: 'B.Com',
    department: 'Office',
    joining_date: '2019-07-01',
    salary: 18000,
    address: '9 Park Street',
    session: '2023-24',
    ...overrides,
  };
}

describe('Snapshot restore', () => {
  let source: TestingModule;
  let target: TestingModule;
  let reconciler: SnapshotReconcilerService;
  let store: RecordStoreService;
  let snapshot: SnapshotDocument;

  beforeEach(async () => {
    source = await createRecordsTestingModule();
    await seedSampleRecords(seedServices(source));
    const exported = await source.get(SnapshotExporterService).exportDocument({ kind: 'current-session' });
    // Restores read parsed JSON, not the exporter's objects
    snapshot = JSON.parse(JSON.stringify(exported));

    target = await createRecordsTestingModule();
    reconciler = target.get(SnapshotReconcilerService);
    store = target.get(RecordStoreService);
  });

  afterEach(async () => {
    await source.close();
    await target.close();
  });

  it('reproduces the business fields of an exported session', async () => {
    const result = await reconciler.restoreDocument(snapshot);

    expect(result.collections).toEqual({
      students: { applied: 2, skipped: 0 },
      staff: { applied: 1, skipped: 0 },
      attendance: { applied: 2, skipped: 0 },
      salary_payments: { applied: 2, skipped: 0 },
      fee_payments: { applied: 2, skipped: 0 },
    });

    const restored = await target.get(SnapshotExporterService).exportDocument({ kind: 'current-session' });
    expect(restored.students).toEqual(snapshot.students);
    expect(restored.staff).toEqual(snapshot.staff);
    expect(restored.attendance).toEqual(snapshot.attendance);
    expect(restored.salary_payments).toEqual(snapshot.salary_payments);
    expect(restored.fee_payments).toEqual(snapshot.fee_payments);
  });

  it('duplicates ledger rows when the same document is restored twice with override', async () => {
    await reconciler.restoreDocument(snapshot, 'override');
    await reconciler.restoreDocument(snapshot, 'override');

    expect(await store.feePayments.count({ receiptNumber: 'REC000001' })).toBe(2);
    expect(await store.feePayments.count()).toBe(4);
    expect(await store.salaryPayments.count()).toBe(4);
    expect(await store.students.count()).toBe(2);
    expect(await store.staff.count()).toBe(1);
    expect(await store.attendance.count()).toBe(2);
  });

  it('keeps one row per entry when restored twice with reset', async () => {
    await reconciler.restoreDocument(snapshot, 'reset');
    await reconciler.restoreDocument(snapshot, 'reset');

    expect(await store.feePayments.count({ receiptNumber: 'REC000001' })).toBe(1);
    expect(await store.feePayments.count()).toBe(2);
    expect(await store.salaryPayments.count()).toBe(2);
    expect(await store.students.count()).toBe(2);
  });

  it('clears only the collections the document carries on reset', async () => {
    const sourceStore = source.get(RecordStoreService);
    const result = await source.get(SnapshotReconcilerService).restoreDocument({ students: [studentRow()] }, 'reset');

    expect(result.collections).toEqual({ students: { applied: 1, skipped: 0 } });
    expect((await sourceStore.students.find()).map((row) => row.studentNumber)).toEqual(['STU000010']);
    expect(await sourceStore.staff.count()).toBe(1);
    expect(await sourceStore.feePayments.count()).toBe(3);
  });

  it('keeps the session recorded in the document', async () => {
    await reconciler.restoreDocument({ students: [studentRow()] });

    expect(await store.students.findOne({ studentNumber: 'STU000010' })).toMatchObject({ session: '2023-24' });
  });

  it('replaces a stored student with the same number', async () => {
    await reconciler.restoreDocument({ students: [studentRow()] });
    await reconciler.restoreDocument({ students: [studentRow({ full_name: 'Tara B. Bose' })] });

    const rows = await store.students.find();
    expect(rows).toHaveLength(1);
    expect(rows[0].fullName).toBe('Tara B. Bose');
  });

  it('recomputes derived fields', async () => {
    await reconciler.restoreDocument({
      attendance: [
        {
          student_number: 'STU000010',
          class: '5',
          section: 'A',
          month: 'April',
          year: 2024,
          working_days: 20,
          days_present: 15,
          percentage: 12,
          session: '2023-24',
        },
      ],
      fee_payments: [
        {
          ...snapshot.fee_payments[0],
          lab_fee: 250,
          total_amount: 5,
        },
      ],
    });

    expect(await store.attendance.findOne({ studentNumber: 'STU000010' })).toMatchObject({
      year: '2024',
      percentage: 75,
    });
    expect(await store.feePayments.findOne({ receiptNumber: 'REC000001' })).toMatchObject({ totalAmount: 1250 });
  });

  it('writes the school information back to the settings', async () => {
    const result = await reconciler.restoreDocument({
      school_info: { name: 'Hill School', address: '1 Main Road', email: null },
      staff: [],
    });

    expect(result.schoolInfoRestored).toBe(true);
    expect(await target.get(SettingsService).schoolInfo()).toEqual({
      name: 'Hill School',
      address: '1 Main Road',
      email: '',
    });
  });

  it('skips and counts rows that fail validation', async () => {
    const result = await reconciler.restoreDocument({
      students: [
        studentRow({ address: null }),
        { full_name: 'No Number' },
        studentRow({ student_number: '  ' }),
        'not a row',
      ],
    });

    expect(result.collections.students).toEqual({ applied: 1, skipped: 3 });
    expect(await store.students.findOne({ studentNumber: 'STU000010' })).toMatchObject({ address: '' });
  });

  it.each([
    ['a string', 'backup'],
    ['an array', []],
    ['null', null],
    ['a collection that is not an array', { students: 'STU000001' }],
    ['a document without collections', { backup_type: 'Complete Backup', session: '2024-25' }],
  ])('rejects %s as malformed', async (_label, input) => {
    await expect(reconciler.restoreDocument(input)).rejects.toBeInstanceOf(MalformedDocument);
  });

  it('writes nothing when the document is malformed', async () => {
    const sourceStore = source.get(RecordStoreService);

    await expect(
      source.get(SnapshotReconcilerService).restoreDocument({ students: [], staff: {} }, 'reset'),
    ).rejects.toBeInstanceOf(MalformedDocument);
    expect(await sourceStore.students.count()).toBe(3);
  });

  describe('collection backups', () => {
    it('stamps restored students with the active session', async () => {
      const result = await reconciler.restoreStudents([studentRow()]);

      expect(result).toEqual({ applied: 1, skipped: 0, filteredOut: 0 });
      expect(await store.students.findOne({ studentNumber: 'STU000010' })).toMatchObject({ session: '2024-25' });
    });

    it('restores only the selected class', async () => {
      const rows = [studentRow(), studentRow({ student_number: 'STU000011', class: '6', section: 'B' })];

      const result = await reconciler.restoreStudents(rows, { kind: 'class', className: '6' });

      expect(result).toEqual({ applied: 1, skipped: 0, filteredOut: 1 });
      expect((await store.students.find()).map((row) => row.studentNumber)).toEqual(['STU000011']);
    });

    it('restores only the selected section', async () => {
      const rows = [studentRow(), studentRow({ student_number: 'STU000011', class: '6', section: 'B' })];

      const result = await reconciler.restoreStudents(rows, { kind: 'section', section: 'A' });

      expect(result).toEqual({ applied: 1, skipped: 0, filteredOut: 1 });
      expect((await store.students.find()).map((row) => row.studentNumber)).toEqual(['STU000010']);
    });

    it('counts an invalid row outside the selected class as filtered out', async () => {
      const rows = [studentRow({ class: '6' }), { class: '7', section: 'B' }];

      const result = await reconciler.restoreStudents(rows, { kind: 'class', className: '6' });

      expect(result).toEqual({ applied: 1, skipped: 0, filteredOut: 1 });
    });

    it('counts an invalid row inside the selected class as skipped', async () => {
      const rows = [studentRow({ class: '6' }), { class: '6', section: 'B' }];

      const result = await reconciler.restoreStudents(rows, { kind: 'class', className: '6' });

      expect(result).toEqual({ applied: 1, skipped: 1, filteredOut: 0 });
    });

    it('accepts student rows without a session', async () => {
      const row = studentRow();
      delete row.session;

      expect(await reconciler.restoreStudents([row])).toEqual({ applied: 1, skipped: 0, filteredOut: 0 });
    });

    it('upserts staff by id into the active session', async () => {
      await reconciler.restoreStaff([staffRow()]);
      const result = await reconciler.restoreStaff([staffRow({ salary: 19000 }), staffRow({ salary: 'high' })]);

      expect(result).toEqual({ applied: 1, skipped: 1 });
      const rows = await store.staff.find();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({ staffId: 'STF000020', salary: 19000, session: '2024-25' });
    });

    it('rejects a collection backup that is not an array', async () => {
      await expect(reconciler.restoreStudents({ students: [] })).rejects.toBeInstanceOf(MalformedDocument);
      await expect(reconciler.restoreStaff('staff')).rejects.toBeInstanceOf(MalformedDocument);
    });
  });
});
