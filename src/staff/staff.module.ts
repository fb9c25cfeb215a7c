import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { SessionModule } from '../session/session.module';
import { IdentifiersModule } from '../identifiers/identifiers.module';
import { StaffService } from './staff.service';

@Module({
  imports: [StoreModule, SessionModule, IdentifiersModule],
  providers: [StaffService],
  exports: [StaffService],
})
export class StaffModule {}
