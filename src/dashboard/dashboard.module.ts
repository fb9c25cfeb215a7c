import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { SessionModule } from '../session/session.module';
import { DashboardService } from './dashboard.service';

@Module({
  imports: [StoreModule, SessionModule],
  providers: [DashboardService],
  exports: [DashboardService],
})
export class DashboardModule {}
