import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { SessionStateService } from './session-state.service';
import { SettingsService } from './settings.service';

@Module({
  imports: [StoreModule],
  providers: [SessionStateService, SettingsService],
  exports: [SessionStateService, SettingsService],
})
export class SessionModule {}
