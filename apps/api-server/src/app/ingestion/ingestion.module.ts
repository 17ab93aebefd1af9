import { Module } from '@nestjs/common';
import { ServicesModule } from '../services/services.module';
import { IngestionController } from './ingestion.controller';
import { CsvIngestionService } from './csv-ingestion.service';
import { RecordStoreService } from './record-store.service';

@Module({
  imports: [ServicesModule],
  controllers: [IngestionController],
  providers: [CsvIngestionService, RecordStoreService],
  exports: [RecordStoreService],
})
export class IngestionModule {}
