import { Module } from '@nestjs/common';
import { DurationParserService } from './duration-parser.service';
import { TemporalResolverService } from './temporal-resolver.service';
import { ColumnResolverService } from './column-resolver.service';
import { NameMatcherService } from './name-matcher.service';
import { TeamRosterService } from './team-roster.service';
import { FilterEngineService } from './filter-engine.service';
import { AggregationEngineService } from './aggregation-engine.service';

@Module({
  providers: [
    DurationParserService,
    TemporalResolverService,
    ColumnResolverService,
    NameMatcherService,
    TeamRosterService,
    FilterEngineService,
    AggregationEngineService,
  ],
  exports: [
    DurationParserService,
    TemporalResolverService,
    ColumnResolverService,
    NameMatcherService,
    TeamRosterService,
    FilterEngineService,
    AggregationEngineService,
  ],
})
export class ServicesModule {}
