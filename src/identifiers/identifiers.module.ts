import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { IdentifierAllocatorService } from './identifier-allocator.service';

@Module({
  imports: [StoreModule],
  providers: [IdentifierAllocatorService],
  exports: [IdentifierAllocatorService],
})
export class IdentifiersModule {}
