import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { analyticsConfig } from './config/analytics.config';
import { ServicesModule } from './services/services.module';
import { IngestionModule } from './ingestion/ingestion.module';
import { AnalyticsModule } from './analytics/analytics.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [analyticsConfig] }),
    ServicesModule,
    IngestionModule,
    AnalyticsModule,
  ],
})
export class AppModule {}
