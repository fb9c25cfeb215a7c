import { Injectable } from '@nestjs/common';
import { SessionStateService } from '../session/session-state.service';
import { SnapshotDocument } from './snapshot.schema';
import { ExportScope, SnapshotExporterService } from './snapshot-exporter.service';
import {
  CollectionRestoreResult,
  RestorePolicy,
  RestoreResult,
  SnapshotReconcilerService,
  StudentRestoreFilter,
  StudentRestoreResult,
} from './snapshot-reconciler.service';
import { BackupFileService, collectionFileName, snapshotFileName } from './backup-file.service';

export interface WrittenBackup {
  path: string;
  document: SnapshotDocument;
}

/**
 * File-level backup and restore: export or reconcile, then write or read
 * the JSON file.
 */
@Injectable()
export class BackupService {
  constructor(
    private readonly exporter: SnapshotExporterService,
    private readonly reconciler: SnapshotReconcilerService,
    private readonly files: BackupFileService,
    private readonly session: SessionStateService,
  ) {}

  async createBackup(scope: ExportScope, directory?: string): Promise<WrittenBackup> {
    const now = new Date();
    const document = await this.exporter.exportDocument(scope, now);
    const filePath = await this.files.write(snapshotFileName(now), document, directory);
    return { path: filePath, document };
  }

  async backupStudents(directory?: string): Promise<string> {
    const students = await this.exporter.exportStudents();
    return this.files.write(collectionFileName('students', this.session.current), students, directory);
  }

  async backupStaff(directory?: string): Promise<string> {
    const staff = await this.exporter.exportStaff();
    return this.files.write(collectionFileName('staff', this.session.current), staff, directory);
  }

  async restoreBackup(file: string, policy: RestorePolicy = 'override'): Promise<RestoreResult> {
    return this.reconciler.restoreDocument(await this.files.read(file), policy);
  }

  async restoreStudents(file: string, filter?: StudentRestoreFilter): Promise<StudentRestoreResult> {
    return this.reconciler.restoreStudents(await this.files.read(file), filter);
  }

  async restoreStaff(file: string): Promise<CollectionRestoreResult> {
    return this.reconciler.restoreStaff(await this.files.read(file));
  }
}
