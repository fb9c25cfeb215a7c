import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { SessionModule } from '../session/session.module';
import { IdentifiersModule } from '../identifiers/identifiers.module';
import { StudentsService } from './students.service';

@Module({
  imports: [StoreModule, SessionModule, IdentifiersModule],
  providers: [StudentsService],
  exports: [StudentsService],
})
export class StudentsModule {}
