import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { SessionModule } from '../session/session.module';
import { SnapshotExporterService } from './snapshot-exporter.service';
import { SnapshotReconcilerService } from './snapshot-reconciler.service';
import { BackupFileService } from './backup-file.service';
import { BackupService } from './backup.service';

@Module({
  imports: [StoreModule, SessionModule],
  providers: [SnapshotExporterService, SnapshotReconcilerService, BackupFileService, BackupService],
  exports: [SnapshotExporterService, SnapshotReconcilerService, BackupFileService, BackupService],
})
export class BackupModule {}
