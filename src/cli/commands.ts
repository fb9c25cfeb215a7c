import { INestApplicationContext, Logger } from '@nestjs/common';
import { parseArgs } from 'util';
import { BackupService } from '../backup/backup.service';
import { ExportScope } from '../backup/snapshot-exporter.service';
import { StudentRestoreFilter } from '../backup/snapshot-reconciler.service';
import { DashboardService } from '../dashboard/dashboard.service';
import { SessionStateService } from '../session/session-state.service';
import { COLLECTION_NAMES } from '../store/record-store.service';
import { RecordsError, RecordsErrorCode, describeError } from '../common/errors';

export const USAGE = [
  'Usage: school-records <command> [options]',
  '',
  '  backup [--scope complete|current-session|specific-month] [--month <name>] [--dir <folder>]',
  '  backup-students [--dir <folder>]',
  '  backup-staff [--dir <folder>]',
  '  restore <file> [--reset]',
  '  restore-students <file> [--class <class> | --section <section>]',
  '  restore-staff <file>',
  '  session [<name>]',
  '  dashboard',
].join('\n');

export const EXIT_CODES: Record<RecordsErrorCode | 'USAGE' | 'UNEXPECTED', number> = {
  USAGE: 64,
  INVALID_RECORD: 65,
  MALFORMED_DOCUMENT: 65,
  UNIQUE_CONSTRAINT_VIOLATION: 65,
  IO_FAILURE: 74,
  UNEXPECTED: 70,
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type Output = (line: string) => void;

const logger = new Logger('Cli');

function parseScope(scope: string | undefined, month: string | undefined): ExportScope {
  switch (scope ?? 'complete') {
    case 'complete':
      return { kind: 'complete' };
    case 'current-session':
      return { kind: 'current-session' };
    case 'specific-month':
      if (!month) {
        throw new UsageError('--month is required with --scope specific-month');
      }
      return { kind: 'specific-month', month };
    default:
      throw new UsageError(`Unknown scope ${scope}`);
  }
}

function parseStudentFilter(className: string | undefined, section: string | undefined): StudentRestoreFilter {
  if (className && section) {
    throw new UsageError('Use either --class or --section, not both');
  }
  if (className) {
    return { kind: 'class', className };
  }
  if (section) {
    return { kind: 'section', section };
  }
  return { kind: 'all' };
}

function requireFile(positionals: string[]): string {
  const [file] = positionals;
  if (!file) {
    throw new UsageError('A backup file path is required');
  }
  return file;
}

async function dispatch(app: INestApplicationContext, argv: string[], out: Output): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      scope: { type: 'string' },
      month: { type: 'string' },
      dir: { type: 'string' },
      reset: { type: 'boolean', default: false },
      class: { type: 'string' },
      section: { type: 'string' },
    },
  });

  const [command, ...rest] = positionals;
  const backup = app.get(BackupService);

  switch (command) {
    case 'backup': {
      const written = await backup.createBackup(parseScope(values.scope, values.month), values.dir);
      out(`${written.document.backup_type} written to ${written.path}`);
      return;
    }
    case 'backup-students':
      out(`Students backup written to ${await backup.backupStudents(values.dir)}`);
      return;
    case 'backup-staff':
      out(`Staff backup written to ${await backup.backupStaff(values.dir)}`);
      return;
    case 'restore': {
      const result = await backup.restoreBackup(requireFile(rest), values.reset ? 'reset' : 'override');
      for (const name of COLLECTION_NAMES) {
        const counts = result.collections[name];
        if (counts) {
          out(`${name}: ${counts.applied} restored, ${counts.skipped} skipped`);
        }
      }
      return;
    }
    case 'restore-students': {
      const filter = parseStudentFilter(values.class, values.section);
      const result = await backup.restoreStudents(requireFile(rest), filter);
      out(`students: ${result.applied} restored, ${result.skipped} skipped, ${result.filteredOut} filtered out`);
      return;
    }
    case 'restore-staff': {
      const result = await backup.restoreStaff(requireFile(rest));
      out(`staff: ${result.applied} restored, ${result.skipped} skipped`);
      return;
    }
    case 'session': {
      const session = app.get(SessionStateService);
      const [name] = rest;
      out(name ? `Switched to ${await session.switchTo(name)}` : session.current);
      return;
    }
    case 'dashboard': {
      const summary = await app.get(DashboardService).summary();
      out(`Session: ${summary.session}`);
      out(`Students: ${summary.totalStudents}`);
      out(`Staff: ${summary.totalStaff}`);
      out(`Fees collected: ${summary.feesCollected.toFixed(2)}`);
      out(`Expenses: ${summary.expenses.toFixed(2)}`);
      return;
    }
    default:
      throw new UsageError(command ? `Unknown command ${command}` : 'No command given');
  }
}

/**
 * Runs one command against a booted application context and returns the
 * process exit code.
 */
export async function runCommand(app: INestApplicationContext, argv: string[], out: Output = console.log): Promise<number> {
  try {
    await dispatch(app, argv, out);
    return 0;
  } catch (error) {
    if (error instanceof UsageError || (error instanceof TypeError && 'code' in error)) {
      out(`${error.message}\n\n${USAGE}`);
      return EXIT_CODES.USAGE;
    }
    if (error instanceof RecordsError) {
      logger.error(error.message);
      return EXIT_CODES[error.code];
    }
    logger.error(`Unexpected failure: ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
    return EXIT_CODES.UNEXPECTED;
  }
}
