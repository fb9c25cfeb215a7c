import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RECORD_ENTITIES } from '../database/entities';
import { RecordStoreService } from './record-store.service';

@Module({
  imports: [TypeOrmModule.forFeature(RECORD_ENTITIES)],
  providers: [RecordStoreService],
  exports: [RecordStoreService, TypeOrmModule],
})
export class StoreModule {}
