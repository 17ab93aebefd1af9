import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { ServicesModule } from '../services/services.module';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './analytics.service';
import { CsvExportService } from './csv-export.service';
import { QueryBuilderService } from './query-builder.service';

@Module({
  imports: [ServicesModule, IngestionModule],
  controllers: [AnalyticsController],
  providers: [AnalyticsService, CsvExportService, QueryBuilderService],
})
export class AnalyticsModule {}
