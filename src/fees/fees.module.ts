import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { SessionModule } from '../session/session.module';
import { IdentifiersModule } from '../identifiers/identifiers.module';
import { FeesService } from './fees.service';

@Module({
  imports: [StoreModule, SessionModule, IdentifiersModule],
  providers: [FeesService],
  exports: [FeesService],
})
export class FeesModule {}
