import { Logger, Module, OnApplicationBootstrap } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { buildDatabaseOptions, ensureDatabaseDirectory } from './database/database.options';
import { recordsConfig } from './config/records.config';
import { StoreModule } from './store/store.module';
import { SessionModule } from './session/session.module';
import { IdentifiersModule } from './identifiers/identifiers.module';
import { StudentsModule } from './students/students.module';
import { StaffModule } from './staff/staff.module';
import { AttendanceModule } from './attendance/attendance.module';
import { FeesModule } from './fees/fees.module';
import { DashboardModule } from './dashboard/dashboard.module';
import { BackupModule } from './backup/backup.module';
import { RecordStoreService } from './store/record-store.service';
import { SessionStateService } from './session/session-state.service';
import { describeError } from './common/errors';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    ScheduleModule.forRoot(),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: async (configService: ConfigService) => {
        const databasePath = configService.get<string>('DATABASE_PATH', recordsConfig.database.path);
        await ensureDatabaseDirectory(databasePath);
        return buildDatabaseOptions({
          databasePath,
          production: configService.get<string>('NODE_ENV') === 'production',
          logging: configService.get<string>('NODE_ENV') === 'development',
        });
      },
    }),
    StoreModule,
    SessionModule,
    IdentifiersModule,
    StudentsModule,
    StaffModule,
    AttendanceModule,
    FeesModule,
    DashboardModule,
    BackupModule,
  ],
})
export class AppModule implements OnApplicationBootstrap {
  private readonly logger = new Logger(AppModule.name);

  constructor(
    private readonly store: RecordStoreService,
    private readonly session: SessionStateService,
  ) {}

  async onApplicationBootstrap() {
    // Database integrity check on startup
    try {
      const counts = await this.store.collectionCounts();
      if (Object.values(counts).every((count) => count === 0)) {
        this.logger.warn('Record store is empty');
      }
      this.logger.log(`Session ${this.session.current}, stored rows: ${JSON.stringify(counts)}`);
    } catch (error) {
      this.logger.error(`Database integrity check failed: ${describeError(error)}`);
      throw error;
    }
  }
}
