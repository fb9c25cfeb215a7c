import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { SessionModule } from '../session/session.module';
import { AttendanceService } from './attendance.service';

@Module({
  imports: [StoreModule, SessionModule],
  providers: [AttendanceService],
  exports: [AttendanceService],
})
export class AttendanceModule {}
