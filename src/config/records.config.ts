export interface IdentifierScheme {
  prefix: string;
  width: number;
}

export const recordsConfig = {
  identifiers: {
    student: { prefix: 'STU', width: 6 },
    staff: { prefix: 'STF', width: 6 },
    receipt: { prefix: 'REC', width: 6 },
  },
  session: {
    default: '2024-25',
  },
  database: {
    path: './data/school-records.db',
  },
  dashboard: {
    refreshIntervalMs: 5000,
  },
  backup: {
    directory: './backups',
    indent: 4,
  },
  school: {
    defaultName: 'School ERP',
  },
};
